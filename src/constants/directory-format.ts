/**
 * Fixed constants of the directory/archive container format.
 */

/** Width of a canonical directory record: nameHash, localOffset, size. */
export const CANONICAL_RECORD_SIZE = 12;

/** Width of an extended directory record, which adds archive selection and a checksum. */
export const EXTENDED_RECORD_SIZE = 24;

/** Directory offsets are block indices; a block is 2048 bytes. */
export const BLOCK_SHIFT = 11;
export const BLOCK_SIZE = 1 << BLOCK_SHIFT;

/** Root directory for extracted files. */
export const EXTRACTED_ROOT = 'EXTRACTED';

/** Subdirectory for records whose name hash is not in the catalog. */
export const UNKNOWN_DIR = '__UNKNOWN__';

export const COPY_BUFFER_SIZE = 32 * 1024;

export const NAME_HASH_SEED = 0xffffffff;
