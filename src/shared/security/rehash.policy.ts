/**
 * WHY:
 * - A verified hash can still be stale. Keep the staleness rule pure + unit-testable.
 *
 * RULE:
 * - Iteration count below the configured target → rehash.
 * - PRF other than HMAC-SHA512 → rehash.
 * - Salt length is NOT a staleness trigger.
 */

import type { KeyDerivationPrf } from './key-derivation';

export const REQUIRED_PRF: KeyDerivationPrf = 'HMACSHA512';

export type RehashInput = Readonly<{
  iterationCount: number;
  prf: KeyDerivationPrf;
}>;

export function isRehashNeeded(input: RehashInput, policy: { targetIterations: number }): boolean {
  if (input.iterationCount < policy.targetIterations) return true;
  return input.prf !== REQUIRED_PRF;
}
