/**
 * src/cli.ts
 *
 * WHY:
 * - Operators need a "one command" way to produce a stored hash (seeding an
 *   admin account) or check one against a password, outside the app.
 *
 * HOW TO USE:
 * - printf '%s' 'secret' | password-hash hash
 * - printf '%s' 'secret' | password-hash verify <storedHash>
 * - password-hash inspect <storedHash>
 *
 * RULES:
 * - Secrets are read from stdin, never from argv (argv ends up in shell history).
 * - stdout carries the result only; logs go to stderr.
 */

import fs from 'node:fs';

import { buildConfig } from './app/config';
import { buildDeps, type AppDeps } from './app/di';
import { describeStoredHash } from './shared/security/describe-stored-hash';
import { isVerified } from './shared/security/password-hasher';
import { executeVerifyPasswordFlow } from './modules/passwords';

export type CliIo = {
  readStdin: () => string;
  out: (line: string) => void;
  err: (line: string) => void;
};

const USAGE = 'Usage: password-hash <hash | verify <storedHash> | inspect <storedHash>>';

function readSecret(io: CliIo): string {
  // One trailing newline is what `echo` adds; it is not part of the password.
  return io.readStdin().replace(/\r?\n$/, '');
}

export function runCli(argv: string[], deps: Pick<AppDeps, 'passwordHasher' | 'logger'>, io: CliIo): number {
  const [command, arg] = argv;

  switch (command) {
    case 'hash': {
      const password = readSecret(io);
      if (password.length === 0) {
        io.err('Refusing to hash an empty password.');
        return 1;
      }
      io.out(deps.passwordHasher.hash(password));
      return 0;
    }

    case 'verify': {
      if (!arg) {
        io.err(USAGE);
        return 1;
      }
      const { result } = executeVerifyPasswordFlow(deps, {
        storedHash: arg,
        candidate: readSecret(io),
      });
      io.out(result);
      return isVerified(result) ? 0 : 1;
    }

    case 'inspect': {
      if (!arg) {
        io.err(USAGE);
        return 1;
      }
      const description = describeStoredHash(arg);
      if (!description) {
        io.err('Not a valid stored hash.');
        return 1;
      }
      io.out(JSON.stringify(description));
      return 0;
    }

    default:
      io.err(USAGE);
      return 1;
  }
}

export function main(): void {
  const config = buildConfig();
  const deps = buildDeps(config);

  process.exitCode = runCli(process.argv.slice(2), deps, {
    readStdin: () => fs.readFileSync(0, 'utf8'),
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });
}
