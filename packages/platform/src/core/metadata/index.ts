/**
 * Metadata Provider
 *
 * Column names per entity, the only schema knowledge the authorization
 * engine needs. Loaded from a JSON file exported by whatever owns the
 * database schema:
 *
 *   { "entities": { "Book": { "columns": ["id", "title", "price"] } } }
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { MetadataProvider } from "@rowguard/contracts";
import { ConfigurationError } from "../authorization/errors.js";

const MetadataFileSchema = z.object({
  entities: z.record(
    z.object({
      columns: z.array(z.string().min(1, "Column names cannot be empty.")),
    })
  ),
});

/**
 * In-memory provider. Entity names are matched exactly.
 */
export class StaticMetadataProvider implements MetadataProvider {
  private readonly entities: Map<string, readonly string[]>;

  constructor(entities: Record<string, readonly string[]>) {
    this.entities = new Map(Object.entries(entities).map(([name, columns]) => [name, [...columns]]));
  }

  getColumns(entityName: string): readonly string[] | undefined {
    return this.entities.get(entityName);
  }

  entityNames(): string[] {
    return [...this.entities.keys()];
  }
}

/**
 * Reads a metadata file.
 *
 * @throws ConfigurationError when the file is unreadable or malformed
 */
export function loadMetadataFile(
  path: string,
  readFile: (path: string) => string = (p) => readFileSync(p, "utf8")
): StaticMetadataProvider {
  let document: unknown;
  try {
    document = JSON.parse(readFile(path));
  } catch (err) {
    throw new ConfigurationError([
      `Cannot load metadata from ${path}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  const result = MetadataFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${path}: ${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const entities: Record<string, string[]> = {};
  for (const [name, entity] of Object.entries(result.data.entities)) {
    entities[name] = entity.columns;
  }
  return new StaticMetadataProvider(entities);
}
