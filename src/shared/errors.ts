/**
 * src/shared/errors.ts
 *
 * WHY:
 * - Single error primitive for the few faults that are allowed to leave the hasher.
 * - Verification never throws; only hashing (entropy) and construction (config) do.
 *
 * RULES:
 * - Keep this file small.
 * - Never put passwords, salts or hashes in meta.
 */

export const HASHER_ERROR_CODES = ['ENTROPY_UNAVAILABLE', 'INVALID_CONFIG'] as const;

export type HasherErrorCode = (typeof HASHER_ERROR_CODES)[number];
export type HasherErrorMeta = Record<string, unknown>;

export class HasherError extends Error {
  readonly code: HasherErrorCode;
  readonly meta?: HasherErrorMeta;

  constructor(opts: { code: HasherErrorCode; message: string; meta?: HasherErrorMeta; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'HasherError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static entropyUnavailable(cause?: unknown, meta?: HasherErrorMeta) {
    return new HasherError({
      code: 'ENTROPY_UNAVAILABLE',
      message: 'Secure random source failed; refusing to hash without entropy.',
      meta,
      cause,
    });
  }

  static invalidConfig(message: string, meta?: HasherErrorMeta) {
    return new HasherError({ code: 'INVALID_CONFIG', message, meta });
  }
}
