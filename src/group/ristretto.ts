/**
 * ristretto255 (RFC 9496): the prime-order group built on Curve25519.
 *
 * Every valid 32-byte encoding is a member of the prime-order group, so the
 * decoding check alone rules out small-subgroup and invalid-curve points.
 *
 * g = standard base point
 * h = RistrettoPoint.hashToCurve(expand_message_xmd("h", DST, 64, SHA-512))
 */
import { RistrettoPoint } from '@noble/curves/ed25519';
import { sha512 } from '@noble/hashes/sha512';
import { expand_message_xmd } from '@noble/curves/abstract/hash-to-curve';
import { constantTimeEqual, i2osp, mod, os2ip } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { randomBelow, secureRandom } from '../crypto/random.js';
import { InvalidElementError, MalformedRequestError } from '../errors.js';
import type { Group } from './types.js';

export type RistrettoElement = InstanceType<typeof RistrettoPoint>;

/** l = 2^252 + 27742317777372353535851937790883648493 */
const ORDER = 2n ** 252n + 27742317777372353535851937790883648493n;
const N_ELEMENT = 32;
const L = 48;

export const RISTRETTO255_H_DST = strToBytes('ChaumPedersen-V1-ristretto255-SHA512-SecondGenerator');

function encode(e: RistrettoElement): Uint8Array {
  return e.toRawBytes();
}

export const RISTRETTO255: Group<RistrettoElement> = {
  name: 'ristretto255',
  order: ORDER,
  g: RistrettoPoint.BASE,
  h: RistrettoPoint.hashToCurve(expand_message_xmd(strToBytes('h'), RISTRETTO255_H_DST, 64, sha512)),
  identity: RistrettoPoint.ZERO,
  elementLength: N_ELEMENT,
  scalarLength: N_ELEMENT,
  L,

  exponentiate(base: RistrettoElement, exponent: bigint): RistrettoElement {
    const e = mod(exponent, ORDER);
    // multiply() only takes scalars in [1, l)
    return e === 0n ? RistrettoPoint.ZERO : base.multiply(e);
  },

  combine(a: RistrettoElement, b: RistrettoElement): RistrettoElement {
    return a.add(b);
  },

  equals(a: RistrettoElement, b: RistrettoElement): boolean {
    return constantTimeEqual(encode(a), encode(b));
  },

  isIdentity(e: RistrettoElement): boolean {
    return e.equals(RistrettoPoint.ZERO);
  },

  encode,

  decode(bytes: Uint8Array): RistrettoElement {
    if (bytes.length !== N_ELEMENT) {
      throw new InvalidElementError(`ristretto255: expected ${N_ELEMENT} bytes, got ${bytes.length}`);
    }
    try {
      return RistrettoPoint.fromHex(bytes);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidElementError(`ristretto255: invalid encoding (${reason})`);
    }
  },

  sampleScalar(random = secureRandom): bigint {
    return randomBelow(ORDER - 1n, random, 1n);
  },

  hashToScalar(input: Uint8Array, dst: Uint8Array): bigint {
    return os2ip(expand_message_xmd(input, dst, L, sha512)) % ORDER;
  },

  encodeScalar(s: bigint): Uint8Array {
    return i2osp(s, N_ELEMENT);
  },

  decodeScalar(bytes: Uint8Array): bigint {
    if (bytes.length !== N_ELEMENT) {
      throw new MalformedRequestError(`ristretto255: expected ${N_ELEMENT}-byte scalar, got ${bytes.length}`);
    }
    return os2ip(bytes);
  },
};
