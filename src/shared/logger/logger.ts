/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Adds stable metadata (service, env) to every line.
 *
 * HOW TO USE:
 * - Import `logger` in the composition root and pass it down as a dependency.
 * - Do not log raw Error objects only—pass `{ err }` so stack/message is preserved.
 * - Never log passwords or stored hashes.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export function createLogger(opts: { level: string; service: string; env: string }): Logger {
  return winston.createLogger({
    level: opts.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }), // ensures Error.stack is serialized
      winston.format.json(),
    ),
    defaultMeta: {
      service: opts.service,
      env: opts.env,
    },
    // stderr keeps stdout free for CLI output.
    transports: [new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) })],
  });
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  service: process.env.SERVICE_NAME ?? 'password-hashing',
  env: process.env.NODE_ENV ?? 'development',
});
