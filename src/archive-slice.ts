/**
 * Copies a byte range of an archive into its own file.
 */
import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { COPY_BUFFER_SIZE } from './constants/directory-format.js';
import { IoError, toIoError } from './errors.js';

export interface SliceRequest {
  readonly archivePath: string;
  readonly outputPath: string;
  /** Byte offset in the archive (already converted from blocks). */
  readonly offset: number;
  readonly length: number;
}

/** The part of a file handle `writeFully` needs. */
export interface WriteTarget {
  write(buffer: Buffer, offset: number, length: number): Promise<{ readonly bytesWritten: number }>;
}

/**
 * Writes the first `length` bytes of `buffer`, retrying after short writes.
 */
export async function writeFully(target: WriteTarget, buffer: Buffer, length: number): Promise<void> {
  let written = 0;
  while (written < length) {
    const { bytesWritten } = await target.write(buffer, written, length - written);
    if (bytesWritten === 0) {
      throw new IoError(`Write made no progress: wrote ${written} of ${length} bytes`);
    }
    written += bytesWritten;
  }
}

async function copyRange(source: FileHandle, target: FileHandle, offset: number, length: number): Promise<void> {
  const buffer: Buffer = Buffer.alloc(Math.min(COPY_BUFFER_SIZE, Math.max(length, 1)));
  let copied = 0;
  while (copied < length) {
    const chunk: number = Math.min(buffer.length, length - copied);
    const { bytesRead } = await source.read(buffer, 0, chunk, offset + copied);
    if (bytesRead === 0) {
      throw new IoError(`Unexpected end of archive: copied ${copied} of ${length} bytes from offset ${offset}`);
    }
    await writeFully(target, buffer, bytesRead);
    copied += bytesRead;
  }
}

/**
 * Streams `length` bytes starting at `offset` of the archive into `outputPath`,
 * creating parent directories and truncating any existing file.
 * On failure the destination may be left empty or partially written.
 *
 * @throws {IoError} On open, create, read or write failure, or when the archive is too short
 */
export async function extractSlice({ archivePath, outputPath, offset, length }: SliceRequest): Promise<void> {
  let archive: FileHandle;
  try {
    archive = await open(archivePath, 'r');
  } catch (error) {
    throw toIoError(error, `Cannot open archive ${archivePath}`);
  }

  try {
    try {
      await mkdir(dirname(outputPath), { recursive: true, mode: 0o755 });
    } catch (error) {
      throw toIoError(error, `Cannot create directory ${dirname(outputPath)}`);
    }

    let output: FileHandle;
    try {
      output = await open(outputPath, 'w');
    } catch (error) {
      throw toIoError(error, `Cannot create ${outputPath}`);
    }

    try {
      await copyRange(archive, output, offset, length);
    } catch (error) {
      throw toIoError(error, `Cannot copy ${length} bytes at offset ${offset}`);
    } finally {
      await output.close();
    }
  } finally {
    await archive.close();
  }
}
