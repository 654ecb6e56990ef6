/**
 * Name catalog: maps name hashes back to the original paths they were computed from.
 */
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { IoError } from './errors.js';
import { hashName } from './name-hash.js';
import type { NameCatalog } from './types/name-catalog.js';

/** Name list shipped with the tool. */
export const DEFAULT_NAMES_FILE: string = fileURLToPath(new URL('../data/files.list', import.meta.url));

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Splits raw bytes into lines the way a line scanner does: `\n` terminates a line,
 * a trailing `\r` is dropped, and a final terminator does not yield an empty line.
 */
function scanLines(bytes: Buffer): Buffer[] {
  const lines: Buffer[] = [];
  let start = 0;
  while (start < bytes.length) {
    const newline: number = bytes.indexOf(LINE_FEED, start);
    const end: number = newline === -1 ? bytes.length : newline;
    const line: Buffer = bytes.subarray(start, end);
    lines.push(line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN ? line.subarray(0, -1) : line);
    start = end + 1;
  }
  return lines;
}

/**
 * Decodes a path for display and output. Lines that are not valid UTF-8 are read as Latin-1.
 */
function decodeName(line: Buffer): string {
  try {
    return utf8Decoder.decode(line);
  } catch {
    return line.toString('latin1');
  }
}

/**
 * Builds a catalog from a newline-delimited list of paths.
 * Every line is hashed over its raw bytes, empty lines included; on a hash collision the later line wins.
 *
 * @param list - Name list as raw bytes, or as text (hashed over its UTF-8 encoding)
 */
export function parseNameCatalog(list: string | Uint8Array): NameCatalog {
  const bytes: Buffer = typeof list === 'string' ? Buffer.from(list, 'utf8') : Buffer.from(list.buffer, list.byteOffset, list.byteLength);
  const catalog = new Map<number, string>();
  for (const line of scanLines(bytes)) {
    catalog.set(hashName(line), decodeName(line));
  }
  return catalog;
}

/**
 * Reads a name list from disk and builds its catalog.
 *
 * @throws {IoError} If the list cannot be read
 */
export async function readNameCatalog(filePath: string = DEFAULT_NAMES_FILE): Promise<NameCatalog> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new IoError(`Cannot read name list ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
  }
  return parseNameCatalog(bytes);
}
