/**
 * Byte, bigint and encoding helpers.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  i2osp,
  os2ip,
  concat,
  constantTimeEqual,
  fromHex,
  toHex,
  mod,
  modPow,
  modInverse,
  bitLength,
} from '../src/crypto/primitives.js';
import { base64Encode, base64Decode, base64UrlEncode, base64UrlDecode, strToBytes, bytesToStr } from '../src/crypto/encoding.js';
import { randomBelow } from '../src/crypto/random.js';

describe('i2osp / os2ip', () => {
  it('encodes big-endian with fixed length', () => {
    expect(toHex(i2osp(258, 2))).toBe('0102');
    expect(toHex(i2osp(1n, 4))).toBe('00000001');
  });

  it('rejects values that do not fit', () => {
    expect(() => i2osp(256, 1)).toThrow('overflows');
    expect(() => i2osp(-1, 1)).toThrow('negative');
  });

  it('os2ip reads big-endian', () => {
    expect(os2ip(fromHex('0102'))).toBe(258n);
    expect(os2ip(new Uint8Array(0))).toBe(0n);
  });
});

describe('hex and byte helpers', () => {
  it('concat joins in order', () => {
    expect(toHex(concat(fromHex('01'), fromHex(''), fromHex('0203')))).toBe('010203');
  });

  it('fromHex rejects odd length and bad characters', () => {
    expect(() => fromHex('abc')).toThrow('odd-length');
    expect(() => fromHex('zz')).toThrow('invalid hex character');
  });

  it('constantTimeEqual compares content and length', () => {
    expect(constantTimeEqual(fromHex('0a0b'), fromHex('0a0b'))).toBe(true);
    expect(constantTimeEqual(fromHex('0a0b'), fromHex('0a0c'))).toBe(false);
    expect(constantTimeEqual(fromHex('0a0b'), fromHex('0a'))).toBe(false);
  });
});

describe('modular arithmetic', () => {
  it('mod wraps negatives into [0, m)', () => {
    expect(mod(-1n, 5n)).toBe(4n);
    expect(mod(-10n, 5n)).toBe(0n);
    expect(mod(7n, 5n)).toBe(2n);
  });

  it('modPow', () => {
    expect(modPow(3n, 4n, 7n)).toBe(4n);
    expect(modPow(5n, 0n, 1n)).toBe(0n);
    expect(modPow(-2n, 3n, 7n)).toBe(6n);
    expect(() => modPow(2n, -1n, 7n)).toThrow('negative exponent');
  });

  it('modInverse', () => {
    expect(modInverse(3n, 7n)).toBe(5n);
    expect(modInverse(-4n, 7n)).toBe(5n);
    expect(() => modInverse(14n, 7n)).toThrow('zero has no inverse');
  });

  it('bitLength', () => {
    expect(bitLength(1n)).toBe(1);
    expect(bitLength(255n)).toBe(8);
    expect(bitLength(256n)).toBe(9);
  });
});

describe('encoding', () => {
  it('base64 round-trips', () => {
    expect(base64Encode(fromHex('fbff'))).toBe('+/8=');
    expect(toHex(base64Decode('+/8='))).toBe('fbff');
  });

  it('base64url is unpadded and URL-safe', () => {
    expect(base64UrlEncode(fromHex('fbff'))).toBe('-_8');
    expect(toHex(base64UrlDecode('-_8'))).toBe('fbff');
  });

  it('UTF-8 strings', () => {
    expect(toHex(strToBytes('é'))).toBe('c3a9');
    expect(bytesToStr(fromHex('c3a9'))).toBe('é');
  });
});

describe('randomBelow', () => {
  it('draws 16 bytes beyond the range size', () => {
    const source = vi.fn((length: number) => new Uint8Array(length));
    expect(randomBelow(10n, source)).toBe(0n);
    expect(source).toHaveBeenCalledWith(17);
  });

  it('offsets by min', () => {
    const ones = (length: number) => new Uint8Array(length).fill(0xff);
    // 17 bytes of 0xff: 2^136 - 1 = 1 (mod 7)
    expect(randomBelow(7n, ones, 1n)).toBe(2n);
  });

  it('rejects an empty range', () => {
    expect(() => randomBelow(0n)).toThrow('range must be positive');
  });
});
