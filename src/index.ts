/**
 * src/index.ts
 *
 * WHY:
 * - Public surface of the library.
 * - Callers import from here, never from deep paths.
 */

export type {
  PasswordHasher,
  PasswordVerificationResult,
} from './shared/security/password-hasher';
export { PASSWORD_VERIFICATION_RESULTS, isVerified } from './shared/security/password-hasher';

export {
  Pbkdf2PasswordHasher,
  DEFAULT_ITERATIONS,
  SALT_LENGTH,
  SUBKEY_LENGTH,
} from './shared/security/pbkdf2-password-hasher';

export type { RandomSource } from './shared/security/random-source';
export { CryptoRandomSource } from './shared/security/random-source';

export type { KeyDerivationPrf } from './shared/security/key-derivation';
export { KEY_DERIVATION_PRFS } from './shared/security/key-derivation';

export type { StoredHashDescription } from './shared/security/describe-stored-hash';
export { describeStoredHash } from './shared/security/describe-stored-hash';

export { HasherError, HASHER_ERROR_CODES } from './shared/errors';
export type { HasherErrorCode } from './shared/errors';

export { executeVerifyPasswordFlow } from './modules/passwords';
export type { VerifyPasswordParams, VerifyPasswordOutcome } from './modules/passwords';
