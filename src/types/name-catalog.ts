/**
 * Known original paths keyed by their 32-bit name hash.
 */
export type NameCatalog = ReadonlyMap<number, string>;
