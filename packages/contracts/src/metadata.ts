/**
 * Metadata Contract
 *
 * The authorization engine never talks to a database. It only needs to
 * know, per entity, which columns exist. A MetadataProvider supplies that
 * before the permission table is built.
 */

export const SOURCE_TYPES = ["table", "view", "stored-procedure"] as const;

/** What an entity is backed by in the data store */
export type SourceType = (typeof SOURCE_TYPES)[number];

export interface MetadataProvider {
  /**
   * Backing column names of an entity, or undefined when the entity is
   * unknown to the metadata source.
   */
  getColumns(entityName: string): readonly string[] | undefined;
}
