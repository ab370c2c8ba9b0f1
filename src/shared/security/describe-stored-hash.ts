/**
 * src/shared/security/describe-stored-hash.ts
 *
 * WHY:
 * - Tooling (CLI, migration reports) needs to see which parameters a stored
 *   hash was written with, without touching salt or subkey bytes.
 *
 * RULES:
 * - Returns lengths only, never key material.
 * - null for anything that does not parse.
 */

import type { KeyDerivationPrf } from './key-derivation';
import { decodeHashRecord } from './pbkdf2-hash-format';

export type StoredHashDescription = Readonly<{
  prf: KeyDerivationPrf;
  iterationCount: number;
  saltLength: number;
  subkeyLength: number;
}>;

export function describeStoredHash(storedHash: string): StoredHashDescription | null {
  const parsed = decodeHashRecord(storedHash);
  if (!parsed.ok) return null;

  return {
    prf: parsed.record.prf,
    iterationCount: parsed.record.iterationCount,
    saltLength: parsed.record.salt.length,
    subkeyLength: parsed.record.subkey.length,
  };
}
