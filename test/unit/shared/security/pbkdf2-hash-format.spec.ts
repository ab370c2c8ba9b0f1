import { describe, it, expect } from 'vitest';
import {
  decodeHashRecord,
  encodeHashRecord,
  parseHashRecord,
  readNetworkByteOrder,
  serializeHashRecord,
  writeNetworkByteOrder,
  type HashRecord,
} from '../../../../src/shared/security/pbkdf2-hash-format';

function sampleRecord(): HashRecord {
  return {
    prf: 'HMACSHA512',
    iterationCount: 100_000,
    salt: Buffer.alloc(16, 0xaa),
    subkey: Buffer.alloc(32, 0xbb),
  };
}

function failureReason(payload: Buffer): string | null {
  const res = parseHashRecord(payload);
  return res.ok ? null : res.reason;
}

describe('network byte order helpers', () => {
  it('writes big-endian at the given offset', () => {
    const buf = Buffer.alloc(5);
    writeNetworkByteOrder(buf, 1, 0x01020304);
    expect([...buf]).toEqual([0x00, 0x01, 0x02, 0x03, 0x04]);
  });

  it('reads values with the top bit set as unsigned', () => {
    const buf = Buffer.from([0xff, 0xff, 0xff, 0xff]);
    expect(readNetworkByteOrder(buf, 0)).toBe(4_294_967_295);
  });

  it('reads back what it wrote', () => {
    const buf = Buffer.alloc(4);
    writeNetworkByteOrder(buf, 0, 100_000);
    expect(readNetworkByteOrder(buf, 0)).toBe(100_000);
  });

  it('rejects values outside uint32', () => {
    expect(() => writeNetworkByteOrder(Buffer.alloc(4), 0, -1)).toThrowError(RangeError);
    expect(() => writeNetworkByteOrder(Buffer.alloc(4), 0, 2 ** 32)).toThrowError(RangeError);
  });
});

describe('serializeHashRecord', () => {
  it('produces the version 1 layout', () => {
    const out = serializeHashRecord(sampleRecord());

    expect(out.length).toBe(61);
    expect([...out.subarray(0, 13)]).toEqual([
      0x01, // marker
      0x00, 0x00, 0x00, 0x02, // HMACSHA512
      0x00, 0x01, 0x86, 0xa0, // 100000
      0x00, 0x00, 0x00, 0x10, // salt length 16
    ]);
    expect(out.subarray(13, 29).equals(Buffer.alloc(16, 0xaa))).toBe(true);
    expect(out.subarray(29).equals(Buffer.alloc(32, 0xbb))).toBe(true);
  });
});

describe('parseHashRecord', () => {
  it('parses a serialized record', () => {
    const res = parseHashRecord(serializeHashRecord(sampleRecord()));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.record.prf).toBe('HMACSHA512');
    expect(res.record.iterationCount).toBe(100_000);
    expect(res.record.salt.equals(Buffer.alloc(16, 0xaa))).toBe(true);
    expect(res.record.subkey.equals(Buffer.alloc(32, 0xbb))).toBe(true);
  });

  it('empty payload => empty', () => {
    expect(failureReason(Buffer.alloc(0))).toBe('empty');
  });

  it('shorter than the header => truncated_header', () => {
    expect(failureReason(Buffer.alloc(12, 0x01))).toBe('truncated_header');
  });

  it('marker other than 0x01 => unsupported_format', () => {
    const payload = serializeHashRecord(sampleRecord());
    payload[0] = 0x00;
    expect(failureReason(payload)).toBe('unsupported_format');
  });

  it('unknown PRF id => unsupported_prf', () => {
    const payload = serializeHashRecord(sampleRecord());
    payload.writeUInt32BE(3, 1);
    expect(failureReason(payload)).toBe('unsupported_prf');
  });

  it('salt length below 16 => salt_too_short', () => {
    const payload = serializeHashRecord(sampleRecord());
    payload.writeUInt32BE(15, 9);
    expect(failureReason(payload)).toBe('salt_too_short');
  });

  it('salt length past the end of the payload => salt_out_of_range', () => {
    const payload = serializeHashRecord(sampleRecord());
    payload.writeUInt32BE(0xffffffff, 9);
    expect(failureReason(payload)).toBe('salt_out_of_range');
  });

  it('salt length consuming the whole body => subkey_too_short', () => {
    const payload = serializeHashRecord(sampleRecord());
    payload.writeUInt32BE(48, 9);
    expect(failureReason(payload)).toBe('subkey_too_short');
  });

  it('subkey of 15 bytes => subkey_too_short', () => {
    const payload = serializeHashRecord({ ...sampleRecord(), subkey: Buffer.alloc(15, 0xbb) });
    expect(failureReason(payload)).toBe('subkey_too_short');
  });

  it('does not alias the input buffer', () => {
    const payload = serializeHashRecord(sampleRecord());
    const res = parseHashRecord(payload);
    payload.fill(0);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.record.salt[0]).toBe(0xaa);
    expect(res.record.subkey[0]).toBe(0xbb);
  });
});

describe('decodeHashRecord', () => {
  it('decodes the text produced by encodeHashRecord', () => {
    const res = decodeHashRecord(encodeHashRecord(sampleRecord()));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.record.iterationCount).toBe(100_000);
  });

  it('strips whitespace before decoding', () => {
    const text = encodeHashRecord(sampleRecord());
    const res = decodeHashRecord(` ${text.slice(0, 20)}\r\n${text.slice(20)}\n`);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.record.subkey.equals(Buffer.alloc(32, 0xbb))).toBe(true);
  });

  it('whitespace only => empty', () => {
    expect(decodeHashRecord(' \r\n\t')).toEqual({ ok: false, reason: 'empty' });
  });

  it('empty string => empty', () => {
    expect(decodeHashRecord('')).toEqual({ ok: false, reason: 'empty' });
  });

  it('characters outside base64 => not_base64', () => {
    expect(decodeHashRecord('not base64!')).toEqual({ ok: false, reason: 'not_base64' });
  });

  it('unpadded base64 => not_base64', () => {
    expect(decodeHashRecord('AAA')).toEqual({ ok: false, reason: 'not_base64' });
  });

  it('valid base64 of three bytes => truncated_header', () => {
    expect(decodeHashRecord('AAAA')).toEqual({ ok: false, reason: 'truncated_header' });
  });
});
