/**
 * Metadata Provider: Test Suite
 */

import { describe, it, expect } from "vitest";
import { loadMetadataFile, StaticMetadataProvider } from "./index.js";
import { ConfigurationError } from "../authorization/errors.js";

describe("StaticMetadataProvider", () => {
  const provider = new StaticMetadataProvider({ Book: ["id", "title"], Author: ["id"] });

  it("returns columns by exact entity name", () => {
    expect(provider.getColumns("Book")).toEqual(["id", "title"]);
    expect(provider.getColumns("book")).toBeUndefined();
  });

  it("lists entity names", () => {
    expect(provider.entityNames()).toEqual(["Book", "Author"]);
  });
});

describe("loadMetadataFile", () => {
  it("reads columns per entity", () => {
    const provider = loadMetadataFile("metadata.json", () =>
      JSON.stringify({ entities: { Book: { columns: ["id", "title", "price"] } } })
    );
    expect(provider.getColumns("Book")).toEqual(["id", "title", "price"]);
  });

  it("rejects malformed JSON", () => {
    expect(() => loadMetadataFile("metadata.json", () => "not json")).toThrow(ConfigurationError);
  });

  it("reports schema problems with their path", () => {
    let issues: string[] = [];
    try {
      loadMetadataFile("metadata.json", () => JSON.stringify({ entities: { Book: { columns: [""] } } }));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      issues = err.issues;
    }
    expect(issues).toEqual(["metadata.json: entities.Book.columns.0: Column names cannot be empty."]);
  });
});
