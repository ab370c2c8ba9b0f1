/**
 * src/shared/security/pbkdf2-hash-format.ts
 *
 * WHY:
 * - Stored hashes are self-describing so parameters can change without
 *   invalidating existing rows. The layout must stay bit-exact with hashes
 *   already in storage.
 *
 * FORMAT (version 1):
 * - Stored as: base64(marker || prf || iterCount || saltLength || salt || subkey)
 * - marker: 1 byte, always 0x01
 * - prf, iterCount, saltLength: 4 bytes each, unsigned, big-endian (network order)
 * - salt: saltLength bytes
 * - subkey: the rest of the payload
 *
 * RULES:
 * - Parsing is total: it returns a tagged result and never throws.
 * - Whitespace in the text form is ignored; any other character outside the
 *   base64 alphabet makes the hash unverifiable.
 * - Header integers are packed byte by byte so the layout never depends on the host.
 */

import { z } from 'zod';
import { prfFromId, prfToId, type KeyDerivationPrf } from './key-derivation';

export const FORMAT_MARKER = 0x01;
export const HEADER_LENGTH = 13;

/** Salt and subkey must both be at least 128 bits to be accepted. */
export const MIN_SALT_LENGTH = 128 / 8;
export const MIN_SUBKEY_LENGTH = 128 / 8;

const UINT32_MAX = 0xffffffff;

export type HashRecord = Readonly<{
  prf: KeyDerivationPrf;
  iterationCount: number;
  salt: Buffer;
  subkey: Buffer;
}>;

export type HashParseFailureReason =
  | 'not_base64'
  | 'empty'
  | 'truncated_header'
  | 'unsupported_format'
  | 'unsupported_prf'
  | 'salt_too_short'
  | 'salt_out_of_range'
  | 'subkey_too_short';

export type HashParseResult =
  | { ok: true; record: HashRecord }
  | { ok: false; reason: HashParseFailureReason };

// Standard alphabet with padding; Buffer.from(..., 'base64') alone would
// silently skip invalid characters.
const StoredHashSchema = z.string().base64();

// Whitespace is not part of the payload: stored hashes may carry a trailing
// newline or 76-column line wrapping from the system that wrote them.
const WHITESPACE = /\s+/g;

export function readNetworkByteOrder(buffer: Uint8Array, offset: number): number {
  return (
    ((buffer[offset] << 24) |
      (buffer[offset + 1] << 16) |
      (buffer[offset + 2] << 8) |
      buffer[offset + 3]) >>>
    0
  );
}

export function writeNetworkByteOrder(buffer: Uint8Array, offset: number, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new RangeError(`value out of uint32 range: ${value}`);
  }
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

export function serializeHashRecord(record: HashRecord): Buffer {
  const out = Buffer.alloc(HEADER_LENGTH + record.salt.length + record.subkey.length);

  out[0] = FORMAT_MARKER;
  writeNetworkByteOrder(out, 1, prfToId(record.prf));
  writeNetworkByteOrder(out, 5, record.iterationCount);
  writeNetworkByteOrder(out, 9, record.salt.length);
  record.salt.copy(out, HEADER_LENGTH);
  record.subkey.copy(out, HEADER_LENGTH + record.salt.length);

  return out;
}

export function parseHashRecord(payload: Buffer): HashParseResult {
  if (payload.length === 0) return { ok: false, reason: 'empty' };
  if (payload.length < HEADER_LENGTH) return { ok: false, reason: 'truncated_header' };
  if (payload[0] !== FORMAT_MARKER) return { ok: false, reason: 'unsupported_format' };

  const prf = prfFromId(readNetworkByteOrder(payload, 1));
  if (prf === null) return { ok: false, reason: 'unsupported_prf' };

  const iterationCount = readNetworkByteOrder(payload, 5);
  const saltLength = readNetworkByteOrder(payload, 9);

  if (saltLength < MIN_SALT_LENGTH) return { ok: false, reason: 'salt_too_short' };
  if (saltLength > payload.length - HEADER_LENGTH) {
    return { ok: false, reason: 'salt_out_of_range' };
  }

  const subkeyOffset = HEADER_LENGTH + saltLength;
  if (payload.length - subkeyOffset < MIN_SUBKEY_LENGTH) {
    return { ok: false, reason: 'subkey_too_short' };
  }

  // Copies, so the record does not alias the caller's buffer.
  const salt = Buffer.from(payload.subarray(HEADER_LENGTH, subkeyOffset));
  const subkey = Buffer.from(payload.subarray(subkeyOffset));

  return { ok: true, record: { prf, iterationCount, salt, subkey } };
}

export function encodeHashRecord(record: HashRecord): string {
  return serializeHashRecord(record).toString('base64');
}

export function decodeHashRecord(stored: string): HashParseResult {
  const text = StoredHashSchema.safeParse(stored.replace(WHITESPACE, ''));
  if (!text.success) return { ok: false, reason: 'not_base64' };

  return parseHashRecord(Buffer.from(text.data, 'base64'));
}
