#!/usr/bin/env node
/**
 * src/bin/password-hash.ts
 *
 * WHY:
 * - Process entrypoint for the CLI; src/cli.ts stays import-safe for tests.
 */

import { main } from '../cli';
import { logger } from '../shared/logger/logger';

try {
  main();
} catch (err: unknown) {
  logger.error('cli.fatal_error', { err });
  process.exitCode = 1;
}
