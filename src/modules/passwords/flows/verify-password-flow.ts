/**
 * src/modules/passwords/flows/verify-password-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case around the hasher: verify, log, and issue
 *   a replacement hash when the stored one is stale.
 * - Keeps the hasher itself free of logging and policy side effects.
 *
 * RULES:
 * - Never logs the password, the stored hash or the replacement hash.
 * - Does not persist anything: the caller decides whether to store replacementHash.
 * - 'FAILED' is logged once, with no detail about why (wrong password and
 *   corrupt record look the same).
 */

import type { Logger } from '../../../shared/logger/logger';
import type {
  PasswordHasher,
  PasswordVerificationResult,
} from '../../../shared/security/password-hasher';

export type VerifyPasswordParams = {
  storedHash: string;
  candidate: string;
  subjectId?: string;
};

export type VerifyPasswordOutcome = {
  result: PasswordVerificationResult;
  replacementHash: string | null;
};

export function executeVerifyPasswordFlow(
  deps: {
    passwordHasher: PasswordHasher;
    logger: Logger;
  },
  params: VerifyPasswordParams,
): VerifyPasswordOutcome {
  const subjectId = params.subjectId ?? null;
  const result = deps.passwordHasher.verify(params.storedHash, params.candidate);

  if (result === 'FAILED') {
    deps.logger.info({ msg: 'password.verify.failed', flow: 'password.verify', subjectId });
    return { result, replacementHash: null };
  }

  deps.logger.info({ msg: 'password.verify.succeeded', flow: 'password.verify', subjectId, result });

  if (result === 'SUCCESS') {
    return { result, replacementHash: null };
  }

  const replacementHash = deps.passwordHasher.hash(params.candidate);
  deps.logger.info({ msg: 'password.rehash.issued', flow: 'password.verify', subjectId });

  return { result, replacementHash };
}
