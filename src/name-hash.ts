/**
 * Path hash used as the key of directory records.
 */
import { NAME_HASH_SEED } from './constants/directory-format.js';

/**
 * Computes the 32-bit name hash of a path: `h = 33 * h + byte` over the unsigned
 * bytes of the input, seeded with 0xFFFFFFFF and wrapping at 2^32.
 *
 * Strings are hashed over their UTF-8 encoding, so ASCII paths hash byte for byte.
 *
 * @param input - Path text or its raw bytes
 * @returns Unsigned 32-bit hash
 */
export function hashName(input: string | Uint8Array): number {
  const bytes: Uint8Array = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  let hash: number = NAME_HASH_SEED;
  for (const byte of bytes) {
    hash = (Math.imul(hash, 33) + byte) >>> 0;
  }
  return hash;
}
