/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph: the logger and hasher are built ONCE.
 * - This is the only place that picks a concrete RandomSource.
 *
 * RULES:
 * - No business logic here.
 */

import type { AppConfig } from './config';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { CryptoRandomSource } from '../shared/security/random-source';
import type { RandomSource } from '../shared/security/random-source';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { Pbkdf2PasswordHasher } from '../shared/security/pbkdf2-password-hasher';

export type AppDeps = {
  logger: Logger;
  passwordHasher: PasswordHasher;
};

export function buildDeps(config: AppConfig): AppDeps {
  const logger = createLogger({
    level: config.logLevel,
    service: config.serviceName,
    env: config.nodeEnv,
  });

  const random: RandomSource = new CryptoRandomSource();
  const passwordHasher: PasswordHasher = new Pbkdf2PasswordHasher({
    random,
    iterations: config.passwordHash.iterations,
  });

  return { logger, passwordHasher };
}
