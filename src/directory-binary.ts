/**
 * Directory file helpers: record decoding, layout detection and offset conversion.
 */
import { readFile, stat } from 'node:fs/promises';
import {
  BLOCK_SIZE,
  CANONICAL_RECORD_SIZE,
  EXTENDED_RECORD_SIZE,
} from './constants/directory-format.js';
import { InvalidFormatError, toIoError } from './errors.js';
import type {
  CanonicalDirectoryRecord,
  DirectoryLayout,
  DirectoryRecord,
  ExtendedDirectoryRecord,
} from './types/directory-record.js';

const RECORD_SIZES: Readonly<Record<DirectoryLayout, number>> = {
  canonical: CANONICAL_RECORD_SIZE,
  extended: EXTENDED_RECORD_SIZE,
};

/**
 * Picks the record layout consistent with a directory file's size.
 * A length divisible by 24 is read as extended even though it is also a multiple of 12.
 *
 * @param byteLength - Size of the directory file
 * @throws {InvalidFormatError} If neither record width divides the length
 */
export function detectDirectoryLayout(byteLength: number): DirectoryLayout {
  if (byteLength % EXTENDED_RECORD_SIZE === 0) {
    return 'extended';
  }
  if (byteLength % CANONICAL_RECORD_SIZE === 0) {
    return 'canonical';
  }
  throw new InvalidFormatError(`Invalid directory file size ${byteLength}: not a multiple of ${CANONICAL_RECORD_SIZE} or ${EXTENDED_RECORD_SIZE}`);
}

/**
 * Converts a record's block offset into a byte offset within the archive.
 * Multiplies rather than shifting so offsets past 2 GiB stay positive.
 */
export function toArchiveByteOffset(localOffset: number): number {
  return localOffset * BLOCK_SIZE;
}

function recordCount(byteLength: number, layout: DirectoryLayout): number {
  const width: number = RECORD_SIZES[layout];
  if (byteLength % width !== 0) {
    throw new InvalidFormatError(`Invalid directory file size ${byteLength}: not a multiple of ${width}`);
  }
  return byteLength / width;
}

function decodeCanonical(buffer: Buffer, offset: number): CanonicalDirectoryRecord {
  return {
    kind: 'canonical',
    nameHash: buffer.readUInt32LE(offset),
    localOffset: buffer.readUInt32LE(offset + 4),
    size: buffer.readUInt32LE(offset + 8),
  };
}

function decodeExtended(buffer: Buffer, offset: number): ExtendedDirectoryRecord {
  return {
    kind: 'extended',
    nameHash: buffer.readUInt32LE(offset),
    archiveId: buffer.readUInt32LE(offset + 4),
    localOffset: buffer.readUInt32LE(offset + 8),
    totalOffset: buffer.readUInt32LE(offset + 12),
    size: buffer.readUInt32LE(offset + 16),
    checksum: buffer.readUInt32LE(offset + 20),
  };
}

function decodeRecords(buffer: Buffer, layout: 'canonical'): CanonicalDirectoryRecord[];
function decodeRecords(buffer: Buffer, layout: DirectoryLayout): DirectoryRecord[];
function decodeRecords(buffer: Buffer, layout: DirectoryLayout): DirectoryRecord[] {
  const count: number = recordCount(buffer.length, layout);
  const width: number = RECORD_SIZES[layout];
  const records: DirectoryRecord[] = [];
  for (let index = 0; index < count; index++) {
    const offset: number = index * width;
    records.push(layout === 'canonical' ? decodeCanonical(buffer, offset) : decodeExtended(buffer, offset));
  }
  return records;
}

/**
 * Directory file reading utilities.
 */
export class DirectoryBinary {
  /**
   * Reads a directory file as canonical 12-byte records, in file order.
   *
   * @param filePath - Path to the directory file
   * @throws {InvalidFormatError} If the file size is not a multiple of 12
   * @throws {IoError} If the file cannot be opened or read
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<CanonicalDirectoryRecord[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw toIoError(error, `Cannot read directory file ${filePath}`);
    }
    return decodeRecords(buffer, 'canonical');
  }

  /**
   * Decodes an in-memory directory image with an explicit layout.
   */
  static decode({ buffer, layout }: { readonly buffer: Buffer; readonly layout: DirectoryLayout }): DirectoryRecord[] {
    return decodeRecords(buffer, layout);
  }

  /**
   * Number of records a directory of the given size holds.
   *
   * @throws {InvalidFormatError} If the size does not divide evenly
   */
  static recordCount({ byteLength, layout }: { readonly byteLength: number; readonly layout: DirectoryLayout }): number {
    return recordCount(byteLength, layout);
  }

  /**
   * Detects the record layout of a directory file from its size on disk.
   * Advisory: extraction always reads the canonical layout.
   */
  static async detect({ filePath }: { readonly filePath: string }): Promise<DirectoryLayout> {
    let byteLength: number;
    try {
      byteLength = (await stat(filePath)).size;
    } catch (error) {
      throw toIoError(error, `Cannot stat directory file ${filePath}`);
    }
    return detectDirectoryLayout(byteLength);
  }
}
