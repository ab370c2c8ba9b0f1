/**
 * src/shared/security/key-derivation.ts
 *
 * WHY:
 * - PBKDF2 is the only KDF of format version 1. The PRF is stored in the record,
 *   so verification must be able to derive with any of the three historical PRFs.
 *
 * PRF IDS (wire values, never renumber):
 * - HMACSHA1 = 0, HMACSHA256 = 1, HMACSHA512 = 2
 *
 * RULES:
 * - Passwords are encoded as UTF-8 before derivation.
 * - deriveSubkey throws on parameters node:crypto rejects; callers on the verify
 *   path must treat that as a failed verification.
 */

import { pbkdf2Sync } from 'node:crypto';

export const KEY_DERIVATION_PRFS = {
  HMACSHA1: 0,
  HMACSHA256: 1,
  HMACSHA512: 2,
} as const;

export type KeyDerivationPrf = keyof typeof KEY_DERIVATION_PRFS;

const DIGEST_BY_PRF: Record<KeyDerivationPrf, string> = {
  HMACSHA1: 'sha1',
  HMACSHA256: 'sha256',
  HMACSHA512: 'sha512',
};

export function prfToId(prf: KeyDerivationPrf): number {
  return KEY_DERIVATION_PRFS[prf];
}

/** Maps a wire id back to a PRF; null for ids this format does not define. */
export function prfFromId(id: number): KeyDerivationPrf | null {
  switch (id) {
    case KEY_DERIVATION_PRFS.HMACSHA1:
      return 'HMACSHA1';
    case KEY_DERIVATION_PRFS.HMACSHA256:
      return 'HMACSHA256';
    case KEY_DERIVATION_PRFS.HMACSHA512:
      return 'HMACSHA512';
    default:
      return null;
  }
}

export function deriveSubkey(input: {
  password: string;
  salt: Uint8Array;
  prf: KeyDerivationPrf;
  iterationCount: number;
  length: number;
}): Buffer {
  return pbkdf2Sync(
    Buffer.from(input.password, 'utf8'),
    input.salt,
    input.iterationCount,
    input.length,
    DIGEST_BY_PRF[input.prf],
  );
}
