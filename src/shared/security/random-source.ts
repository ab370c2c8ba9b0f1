/**
 * src/shared/security/random-source.ts
 *
 * WHY:
 * - Salt generation depends on an injected capability, not a process-wide RNG.
 * - Tests can pass a deterministic source; production wires CryptoRandomSource in di.ts.
 *
 * RULES:
 * - Implementations must return exactly `size` bytes or throw.
 */

import { randomBytes } from 'node:crypto';

export interface RandomSource {
  bytes(size: number): Buffer;
}

export class CryptoRandomSource implements RandomSource {
  bytes(size: number): Buffer {
    return randomBytes(size);
  }
}
