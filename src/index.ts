/**
 * zdir-extract - Main entry point
 *
 * Restores the files packed in a game archive from its directory file and a list of known names.
 */

// Re-export extraction workflow
export { extractArchive } from './extract.js';
export type { ExtractOptions, ExtractSummary } from './extract.js';

// Re-export format helpers
export { DirectoryBinary, detectDirectoryLayout, toArchiveByteOffset } from './directory-binary.js';
export { hashName } from './name-hash.js';
export { parseNameCatalog, readNameCatalog, DEFAULT_NAMES_FILE } from './name-catalog.js';
export { resolveOutputPath, normalizeCatalogPath } from './output-path.js';
export { extractSlice } from './archive-slice.js';
export type { SliceRequest } from './archive-slice.js';

// Re-export errors and types
export { ArgumentError, IoError, InvalidFormatError, ExtractError } from './errors.js';
export type { CanonicalDirectoryRecord, ExtendedDirectoryRecord, DirectoryRecord, DirectoryLayout } from './types/directory-record.js';
export type { NameCatalog } from './types/name-catalog.js';
export type { Logger } from './types/logger.js';
export { runCli } from './program.js';
