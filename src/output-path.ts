/**
 * Chooses where each directory record is written.
 */
import { join, sep } from 'node:path';
import { EXTRACTED_ROOT, UNKNOWN_DIR } from './constants/directory-format.js';
import type { DirectoryRecord } from './types/directory-record.js';
import type { NameCatalog } from './types/name-catalog.js';

/**
 * Converts a catalog path with backslash separators to the platform convention.
 */
export function normalizeCatalogPath(name: string): string {
  return name.replaceAll('\\', '/').split('/').join(sep);
}

/**
 * Resolves the output path of a record. Known hashes mirror the catalog path under
 * `root`; unknown ones go to `root/__UNKNOWN__/<HEX localOffset>`. Never touches the filesystem.
 */
export function resolveOutputPath(record: DirectoryRecord, catalog: NameCatalog, root: string = EXTRACTED_ROOT): string {
  const name: string | undefined = catalog.get(record.nameHash);
  if (name !== undefined) {
    return join(root, normalizeCatalogPath(name));
  }
  return join(root, UNKNOWN_DIR, record.localOffset.toString(16).toUpperCase());
}
