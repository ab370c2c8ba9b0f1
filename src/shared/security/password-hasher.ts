/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Callers depend on this interface, not on a concrete KDF or format version.
 *
 * HOW TO USE:
 * - const stored = hasher.hash(password)
 * - const result = hasher.verify(stored, candidate)
 * - 'SUCCESS_REHASH_NEEDED' is a success: re-hash and store, without telling the user.
 */

export const PASSWORD_VERIFICATION_RESULTS = [
  'FAILED',
  'SUCCESS',
  'SUCCESS_REHASH_NEEDED',
] as const;

export type PasswordVerificationResult = (typeof PASSWORD_VERIFICATION_RESULTS)[number];

export interface PasswordHasher {
  hash(plain: string): string;
  verify(storedHash: string, candidate: string): PasswordVerificationResult;
}

export function isVerified(result: PasswordVerificationResult): boolean {
  return result !== 'FAILED';
}
