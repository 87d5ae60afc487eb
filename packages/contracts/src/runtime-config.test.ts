/**
 * Runtime Configuration Schema: Test Suite
 *
 * Structural validation of the JSON permission file. Semantic checks
 * (columns, policies) are covered by the platform validator tests.
 */

import { describe, it, expect } from "vitest";
import { RuntimeConfigSchema } from "./runtime-config.js";

function configWith(entity: Record<string, unknown>): unknown {
  return { entities: { Book: entity } };
}

describe("RuntimeConfigSchema", () => {
  describe("actions", () => {
    it("accepts a bare operation string", () => {
      const result = RuntimeConfigSchema.parse(
        configWith({
          source: "dbo.books",
          permissions: [{ role: "reader", actions: ["Read"] }],
        })
      );
      expect(result.entities.Book.permissions[0].actions).toEqual([
        { operation: "read" },
      ]);
    });

    it("normalizes the all alias to the wildcard", () => {
      const result = RuntimeConfigSchema.parse(
        configWith({
          source: "dbo.books",
          permissions: [{ role: "admin", actions: [{ action: "All" }] }],
        })
      );
      expect(result.entities.Book.permissions[0].actions[0].operation).toBe("*");
    });

    it("keeps fields and policy on object actions", () => {
      const result = RuntimeConfigSchema.parse(
        configWith({
          source: "dbo.books",
          permissions: [
            {
              role: "reader",
              actions: [
                {
                  action: "read",
                  fields: { include: ["id", "title"], exclude: null },
                  policy: { database: "@item.id gt 0" },
                },
              ],
            },
          ],
        })
      );
      expect(result.entities.Book.permissions[0].actions[0]).toEqual({
        operation: "read",
        fields: { include: ["id", "title"] },
        policy: { database: "@item.id gt 0" },
      });
    });

    it("rejects an unknown operation with a readable message", () => {
      const result = RuntimeConfigSchema.safeParse(
        configWith({
          source: "dbo.books",
          permissions: [{ role: "reader", actions: ["fetch"] }],
        })
      );
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe('Unknown operation "fetch".');
      }
    });

    it("rejects unknown keys inside an action", () => {
      const result = RuntimeConfigSchema.safeParse(
        configWith({
          source: "dbo.books",
          permissions: [{ role: "reader", actions: [{ action: "read", columns: ["id"] }] }],
        })
      );
      expect(result.success).toBe(false);
    });
  });

  describe("permissions", () => {
    it("rejects an empty role name", () => {
      const result = RuntimeConfigSchema.safeParse(
        configWith({
          source: "dbo.books",
          permissions: [{ role: "  ", actions: ["read"] }],
        })
      );
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Role name cannot be empty.");
      }
    });
  });

  describe("source", () => {
    it("treats a bare object name as a table", () => {
      const result = RuntimeConfigSchema.parse(
        configWith({ source: "dbo.books", permissions: [] })
      );
      expect(result.entities.Book.source).toEqual({ object: "dbo.books", type: "table" });
    });

    it("accepts stored procedures", () => {
      const result = RuntimeConfigSchema.parse(
        configWith({
          source: { object: "dbo.get_books", type: "stored-procedure" },
          permissions: [],
        })
      );
      expect(result.entities.Book.source.type).toBe("stored-procedure");
    });

    it("rejects an unknown source type", () => {
      const result = RuntimeConfigSchema.safeParse(
        configWith({ source: { object: "dbo.books", type: "function" }, permissions: [] })
      );
      expect(result.success).toBe(false);
    });
  });

  it("defaults mappings to an empty object", () => {
    const result = RuntimeConfigSchema.parse(
      configWith({ source: "dbo.books", permissions: [] })
    );
    expect(result.entities.Book.mappings).toEqual({});
  });
});
