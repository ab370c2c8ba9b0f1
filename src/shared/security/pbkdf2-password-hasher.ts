/**
 * src/shared/security/pbkdf2-password-hasher.ts
 *
 * WHY:
 * - Version 1 PasswordHasher: PBKDF2 with HMAC-SHA512, 128-bit salt,
 *   256-bit subkey, 100_000 iterations by default.
 * - Verification honours the parameters embedded in the stored hash, so hashes
 *   written with older settings keep verifying and are flagged for rehash.
 *
 * HOW TO USE:
 * - const hasher = new Pbkdf2PasswordHasher({ random: new CryptoRandomSource() })
 * - const stored = hasher.hash('secret')
 * - const result = hasher.verify(stored, 'secret') // 'SUCCESS'
 *
 * RULES:
 * - verify() is total: malformed input, unknown parameters and mismatches all
 *   return 'FAILED'. Callers cannot tell a wrong password from a corrupt record.
 * - hash() throws HasherError.entropyUnavailable if the random source fails.
 * - No logging here; that is the caller's concern.
 */

import { HasherError } from '../errors';
import { deriveSubkey } from './key-derivation';
import { fixedTimeEquals } from './fixed-time-equals';
import type { PasswordHasher, PasswordVerificationResult } from './password-hasher';
import { decodeHashRecord, encodeHashRecord } from './pbkdf2-hash-format';
import type { RandomSource } from './random-source';
import { isRehashNeeded, REQUIRED_PRF } from './rehash.policy';

export const DEFAULT_ITERATIONS = 100_000;
export const SALT_LENGTH = 128 / 8;
export const SUBKEY_LENGTH = 256 / 8;

// node:crypto rejects iteration counts that do not fit a signed 32-bit int.
const MAX_ITERATIONS = 2_147_483_647;

export class Pbkdf2PasswordHasher implements PasswordHasher {
  private readonly random: RandomSource;
  private readonly iterations: number;

  constructor(opts: { random: RandomSource; iterations?: number }) {
    const iterations = opts.iterations ?? DEFAULT_ITERATIONS;

    if (!Number.isInteger(iterations) || iterations < 1 || iterations > MAX_ITERATIONS) {
      throw HasherError.invalidConfig(
        `Pbkdf2PasswordHasher: iterations must be an integer in 1..${MAX_ITERATIONS}. Got ${iterations}.`,
      );
    }

    this.random = opts.random;
    this.iterations = iterations;
  }

  get targetIterations(): number {
    return this.iterations;
  }

  hash(plain: string): string {
    const salt = this.nextSalt();
    const subkey = deriveSubkey({
      password: plain,
      salt,
      prf: REQUIRED_PRF,
      iterationCount: this.iterations,
      length: SUBKEY_LENGTH,
    });

    return encodeHashRecord({ prf: REQUIRED_PRF, iterationCount: this.iterations, salt, subkey });
  }

  verify(storedHash: string, candidate: string): PasswordVerificationResult {
    const parsed = decodeHashRecord(storedHash);
    if (!parsed.ok) return 'FAILED';

    const { record } = parsed;

    let actualSubkey: Buffer;
    try {
      actualSubkey = deriveSubkey({
        password: candidate,
        salt: record.salt,
        prf: record.prf,
        iterationCount: record.iterationCount,
        length: record.subkey.length,
      });
    } catch {
      // e.g. iterationCount 0 or above int32: the record is unverifiable.
      return 'FAILED';
    }

    if (!fixedTimeEquals(actualSubkey, record.subkey)) return 'FAILED';

    return isRehashNeeded(record, { targetIterations: this.iterations })
      ? 'SUCCESS_REHASH_NEEDED'
      : 'SUCCESS';
  }

  private nextSalt(): Buffer {
    let salt: Buffer;
    try {
      salt = this.random.bytes(SALT_LENGTH);
    } catch (err) {
      throw HasherError.entropyUnavailable(err);
    }

    if (salt.length !== SALT_LENGTH) {
      throw HasherError.entropyUnavailable(undefined, {
        requested: SALT_LENGTH,
        received: salt.length,
      });
    }
    return salt;
  }
}
