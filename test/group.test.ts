/**
 * Group arithmetic and element validation for MODP2048 and ristretto255.
 */
import { describe, it, expect } from 'vitest';
import { MODP2048, MODP2048_PRIME } from '../src/group/modp.js';
import { RISTRETTO255 } from '../src/group/ristretto.js';
import { i2osp, modPow, toHex } from '../src/crypto/primitives.js';
import { InvalidElementError, MalformedRequestError } from '../src/errors.js';

const P = MODP2048_PRIME;
const zeros = (length: number) => new Uint8Array(length);

// ── MODP2048 ─────────────────────────────────────────────────────────────────

describe('MODP2048', () => {
  it('has the RFC 3526 2048-bit prime and q = (p - 1) / 2', () => {
    expect(P.toString(2).length).toBe(2048);
    expect(P % 2n ** 64n).toBe(2n ** 64n - 1n);
    expect(MODP2048.order).toBe((P - 1n) / 2n);
    expect(MODP2048.L).toBe(272);
  });

  it('both generators lie in the order-q subgroup', () => {
    expect(modPow(MODP2048.g, MODP2048.order, P)).toBe(1n);
    expect(modPow(MODP2048.h, MODP2048.order, P)).toBe(1n);
  });

  it('h is distinct from g and from the identity', () => {
    expect(MODP2048.h).not.toBe(MODP2048.g);
    expect(MODP2048.h).not.toBe(1n);
  });

  it('reduces exponents mod q', () => {
    expect(MODP2048.exponentiate(2n, MODP2048.order + 3n)).toBe(8n);
    expect(MODP2048.isIdentity(MODP2048.exponentiate(MODP2048.h, MODP2048.order))).toBe(true);
  });

  it('combine multiplies mod p', () => {
    expect(MODP2048.combine(P - 1n, P - 1n)).toBe(1n);
  });

  it('encodes to 256 bytes and decodes back', () => {
    const y = MODP2048.exponentiate(MODP2048.g, 12345n);
    const bytes = MODP2048.encode(y);
    expect(bytes.length).toBe(256);
    expect(MODP2048.decode(bytes)).toBe(y);
  });

  it('rejects wrong-length encodings', () => {
    expect(() => MODP2048.decode(zeros(255))).toThrow(InvalidElementError);
  });

  it('rejects 0 and values >= p', () => {
    expect(() => MODP2048.decode(zeros(256))).toThrow('out of range');
    expect(() => MODP2048.decode(i2osp(P, 256))).toThrow('out of range');
  });

  it('rejects p - 1 (order 2) and other non-residues', () => {
    expect(() => MODP2048.decode(i2osp(P - 1n, 256))).toThrow('not in the prime-order subgroup');
    // p = 7 mod 8 makes -2 a non-residue
    expect(() => MODP2048.decode(i2osp(P - 2n, 256))).toThrow(InvalidElementError);
  });

  it('decodeScalar checks length only', () => {
    expect(MODP2048.decodeScalar(i2osp(5n, 256))).toBe(5n);
    expect(() => MODP2048.decodeScalar(zeros(32))).toThrow(MalformedRequestError);
  });

  it('sampleScalar stays in [1, q - 1]', () => {
    expect(MODP2048.sampleScalar(zeros)).toBe(1n);
    const x = MODP2048.sampleScalar();
    expect(x >= 1n && x < MODP2048.order).toBe(true);
  });
});

// ── ristretto255 ─────────────────────────────────────────────────────────────

describe('RISTRETTO255', () => {
  it('has the prime order l', () => {
    expect(RISTRETTO255.order).toBe(2n ** 252n + 27742317777372353535851937790883648493n);
    expect(RISTRETTO255.isIdentity(RISTRETTO255.exponentiate(RISTRETTO255.g, RISTRETTO255.order))).toBe(true);
    expect(RISTRETTO255.isIdentity(RISTRETTO255.exponentiate(RISTRETTO255.h, RISTRETTO255.order))).toBe(true);
  });

  it('h is distinct from g and from the identity', () => {
    expect(RISTRETTO255.equals(RISTRETTO255.h, RISTRETTO255.g)).toBe(false);
    expect(RISTRETTO255.isIdentity(RISTRETTO255.h)).toBe(false);
  });

  it('exponentiate agrees with repeated combine', () => {
    const { g } = RISTRETTO255;
    const thrice = RISTRETTO255.combine(RISTRETTO255.combine(g, g), g);
    expect(RISTRETTO255.equals(RISTRETTO255.exponentiate(g, 3n), thrice)).toBe(true);
  });

  it('encodes to 32 bytes and decodes back', () => {
    const y = RISTRETTO255.exponentiate(RISTRETTO255.h, 987654321n);
    const bytes = RISTRETTO255.encode(y);
    expect(bytes.length).toBe(32);
    expect(RISTRETTO255.equals(RISTRETTO255.decode(bytes), y)).toBe(true);
  });

  it('the identity encodes as zero bytes', () => {
    expect(toHex(RISTRETTO255.encode(RISTRETTO255.identity))).toBe('00'.repeat(32));
  });

  it('rejects wrong-length and non-canonical encodings', () => {
    expect(() => RISTRETTO255.decode(zeros(31))).toThrow(InvalidElementError);
    expect(() => RISTRETTO255.decode(new Uint8Array(32).fill(0xff))).toThrow(InvalidElementError);
  });

  it('decodeScalar checks length only', () => {
    expect(() => RISTRETTO255.decodeScalar(zeros(256))).toThrow(MalformedRequestError);
  });
});
