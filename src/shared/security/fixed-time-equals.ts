import { timingSafeEqual } from 'node:crypto';

/**
 * Compares two buffers in time that depends only on their length.
 * Different lengths return false immediately (length is not a secret here).
 */
export function fixedTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
