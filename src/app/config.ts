/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Hasher parameters are fixed once here and never change per call.
 *
 * HOW TO USE:
 * - In dev, a local .env is loaded via dotenv.
 * - buildConfig() reads process.env; tests pass an explicit env object.
 *
 * TYPING:
 * - nodeEnv is a union, so invalid values ('prod', 'staging') fail at startup.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('password-hashing'),

  // Below 10k is not a production setting; tests construct the hasher directly.
  PASSWORD_HASH_ITERATIONS: z.coerce.number().int().min(10_000).max(2_147_483_647).default(100_000),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  logLevel: string;
  serviceName: string;

  passwordHash: {
    iterations: number;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    passwordHash: {
      iterations: parsed.PASSWORD_HASH_ITERATIONS,
    },
  };
}
