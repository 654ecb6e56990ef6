import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface RecordSpec {
  readonly nameHash: number;
  readonly localOffset: number;
  readonly size: number;
}

/**
 * Encodes canonical 12-byte directory records.
 */
export function encodeDirectory(records: readonly RecordSpec[]): Buffer {
  const buffer = Buffer.alloc(records.length * 12);
  records.forEach((record, index) => {
    buffer.writeUInt32LE(record.nameHash, index * 12);
    buffer.writeUInt32LE(record.localOffset, index * 12 + 4);
    buffer.writeUInt32LE(record.size, index * 12 + 8);
  });
  return buffer;
}

/**
 * Archive filled with a repeating byte pattern so every slice is distinguishable.
 */
export function createPatternArchive(length: number): Buffer {
  const buffer = Buffer.alloc(length);
  for (let index = 0; index < length; index++) {
    buffer[index] = index % 251;
  }
  return buffer;
}

export async function createTempDirectory(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'zdir-extract-'));
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

export class CapturingLogger {
  public readonly lines: string[] = [];
  public readonly errors: string[] = [];

  public log = (message: string): void => {
    this.lines.push(message);
  };

  public error = (message: string): void => {
    this.errors.push(message);
  };
}
