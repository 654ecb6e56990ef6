/**
 * Records stored in a directory file. The `kind` tag tells the two layouts apart.
 */

export type DirectoryLayout = 'canonical' | 'extended';

/**
 * 12-byte record addressing a single data archive.
 */
export interface CanonicalDirectoryRecord {
  readonly kind: 'canonical';
  readonly nameHash: number;
  /** Offset in 2048-byte blocks. */
  readonly localOffset: number;
  readonly size: number;
}

/**
 * 24-byte record able to address one of several data archives.
 * Decoded for inspection only; extraction does not consume it.
 */
export interface ExtendedDirectoryRecord {
  readonly kind: 'extended';
  readonly nameHash: number;
  readonly archiveId: number;
  readonly localOffset: number;
  readonly totalOffset: number;
  readonly size: number;
  readonly checksum: number;
}

export type DirectoryRecord = CanonicalDirectoryRecord | ExtendedDirectoryRecord;
