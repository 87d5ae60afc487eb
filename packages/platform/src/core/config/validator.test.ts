/**
 * Runtime Configuration Validator: Test Suite
 */

import { describe, it, expect } from "vitest";
import type { ActionConfig, EntityConfig, RuntimeConfig } from "@rowguard/contracts";
import { assertValidRuntimeConfig, validateRuntimeConfig } from "./validator.js";
import { ConfigurationError } from "../authorization/errors.js";
import { StaticMetadataProvider } from "../metadata/index.js";

const metadata = new StaticMetadataProvider({
  Book: ["id", "title", "price", "owner"],
  PublishBook: ["id"],
});

function book(actions: ActionConfig[], extra: Partial<EntityConfig> = {}): RuntimeConfig {
  return {
    entities: {
      Book: {
        source: { object: "dbo.books", type: "table" },
        mappings: {},
        permissions: [{ role: "Reader", actions }],
        ...extra,
      },
    },
  };
}

const SCOPE = "entity:Book, role:Reader";

describe("validateRuntimeConfig", () => {
  it("accepts a valid configuration", () => {
    const config = book([
      { operation: "read", fields: { include: ["*"], exclude: ["price"] } },
      { operation: "update", policy: { database: "@claims.sub eq @item.owner" } },
    ]);
    expect(validateRuntimeConfig(config, metadata)).toEqual([]);
  });

  it("requires column metadata for every entity", () => {
    const config: RuntimeConfig = {
      entities: {
        Ghost: { source: { object: "dbo.ghost", type: "table" }, mappings: {}, permissions: [] },
      },
    };
    expect(validateRuntimeConfig(config, metadata)).toEqual([
      "Entity Ghost: no column metadata is available.",
    ]);
  });

  it("rejects a role configured twice under different casing", () => {
    const config = book([{ operation: "read" }]);
    config.entities.Book.permissions.push({ role: "reader", actions: [{ operation: "delete" }] });
    expect(validateRuntimeConfig(config, metadata)).toEqual([
      "Entity Book: role reader is configured more than once.",
    ]);
  });

  describe("fields", () => {
    it("rejects other fields next to a wildcard", () => {
      const config = book([{ operation: "read", fields: { include: ["*", "id"] } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `No other field can be present with wildcard in the included set for: ${SCOPE}, action:read`,
      ]);
    });

    it("rejects fields that are not columns", () => {
      const config = book([{ operation: "read", fields: { exclude: ["isbn"] } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `Field isbn in the excluded set is not a column of the entity: ${SCOPE}, action:read`,
      ]);
    });
  });

  describe("operations", () => {
    it("rejects execute on a table", () => {
      expect(validateRuntimeConfig(book([{ operation: "execute" }]), metadata)).toEqual([
        "Invalid operation for Entity: Book. The 'execute' operation can only be configured for entities backed by stored procedures.",
      ]);
    });

    it("allows only execute or the wildcard on a stored procedure", () => {
      const config: RuntimeConfig = {
        entities: {
          PublishBook: {
            source: { object: "dbo.publish_book", type: "stored-procedure" },
            mappings: {},
            permissions: [
              { role: "Editor", actions: [{ operation: "execute" }] },
              { role: "Admin", actions: [{ operation: "*" }] },
              { role: "Reader", actions: [{ operation: "read" }] },
            ],
          },
        },
      };
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        "Invalid operation for Entity: PublishBook. Stored procedures can only be configured with the 'execute' operation.",
      ]);
    });
  });

  describe("database policies", () => {
    it("rejects a policy on create", () => {
      const config = book([{ operation: "create", policy: { database: "@item.id eq 1" } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `The create action does not support defining a database policy: ${SCOPE}, action:create`,
      ]);
    });

    it.each(["*", "upsert"] as const)("accepts a policy on a %s action", (operation) => {
      const config = book([{ operation, policy: { database: "@claims.sub eq @item.owner" } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([]);
    });

    it("reports syntax errors with their offset", () => {
      const config = book([{ operation: "read", policy: { database: "@claims. eq @item.id" } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `Invalid database policy for ${SCOPE}, action:read: ClaimType cannot be empty. (at offset 0)`,
      ]);
    });

    it("reports unbalanced parentheses", () => {
      const config = book([{ operation: "read", policy: { database: "(@item.id eq 1" } }]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `Invalid database policy for ${SCOPE}, action:read: Unbalanced parenthesis (at offset 0)`,
      ]);
    });

    it("requires policy columns to be accessible to the action", () => {
      const config = book([
        {
          operation: "read",
          fields: { include: ["title"] },
          policy: { database: "@item.owner eq @claims.sub" },
        },
      ]);
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        `Not all the columns required by policy are accessible. ${SCOPE}, action:read`,
      ]);
    });
  });

  describe("mappings", () => {
    it("rejects mappings of unknown columns", () => {
      const config = book([{ operation: "read" }], { mappings: { isbn: "code" } });
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        "Entity Book: mapped column isbn is not a column of the entity.",
      ]);
    });

    it("rejects two columns exposed under one name", () => {
      const config = book([{ operation: "read" }], { mappings: { id: "title" } });
      expect(validateRuntimeConfig(config, metadata)).toEqual([
        "Entity Book: exposed name title is used by more than one column.",
      ]);
    });
  });

  it("reports every problem at once", () => {
    const config = book([
      { operation: "execute" },
      { operation: "read", fields: { include: ["isbn"] } },
    ]);
    expect(validateRuntimeConfig(config, metadata)).toHaveLength(2);
  });
});

describe("assertValidRuntimeConfig", () => {
  it("throws a ConfigurationError carrying every issue", () => {
    const config = book([
      { operation: "execute" },
      { operation: "read", fields: { include: ["isbn"] } },
    ]);
    let error: unknown;
    try {
      assertValidRuntimeConfig(config, metadata);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.issues).toHaveLength(2);
  });

  it("returns quietly for a valid configuration", () => {
    expect(() => assertValidRuntimeConfig(book([{ operation: "read" }]), metadata)).not.toThrow();
  });
});
