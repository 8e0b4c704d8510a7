/**
 * Prime-order subgroup of Z_p* for the RFC 3526 2048-bit MODP group (§3).
 *
 * p = 2^2048 - 2^1984 - 1 + 2^64 * ([2^1918 pi] + 124476), a safe prime.
 * q = (p - 1) / 2 is prime; the subgroup of order q is the quadratic residues.
 * g = 2 (a residue, since p = 7 mod 8).
 * h = (OS2IP(expand_message_xmd("h", DST, 272, SHA-512)) mod p)^2 mod p
 *
 * Elements encode as 256-byte big-endian integers in [1, p).
 */
import { sha512 } from '@noble/hashes/sha512';
import { expand_message_xmd } from '@noble/curves/abstract/hash-to-curve';
import { bitLength, constantTimeEqual, i2osp, mod, modPow, os2ip } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { randomBelow, secureRandom } from '../crypto/random.js';
import { InvalidElementError, MalformedRequestError } from '../errors.js';
import type { Group } from './types.js';

export const MODP2048_PRIME = BigInt(
  '0x' +
  'FFFFFFFFFFFFFFFFC90FDAA22168C234C4C6628B80DC1CD1' +
  '29024E088A67CC74020BBEA63B139B22514A08798E3404DD' +
  'EF9519B3CD3A431B302B0A6DF25F14374FE1356D6D51C245' +
  'E485B576625E7EC6F44C42E9A637ED6B0BFF5CB6F406B7ED' +
  'EE386BFB5A899FA5AE9F24117C4B1FE649286651ECE45B3D' +
  'C2007CB8A163BF0598DA48361C55D39A69163FA8FD24CF5F' +
  '83655D23DCA3AD961C62F356208552BB9ED529077096966D' +
  '670C354E4ABC9804F1746C08CA18217C32905E462E36CE3B' +
  'E39E772C180E86039B2783A2EC07A28FB5C55DF06F4C52C9' +
  'DE2BCBF6955817183995497CEA956AE515D2261898FA0510' +
  '15728E5A8AACAA68FFFFFFFFFFFFFFFF',
);

const P = MODP2048_PRIME;
const Q = (P - 1n) / 2n;
const N_ELEMENT = 256;
const L = Math.ceil((bitLength(Q) + 128) / 8); // 272

export const MODP2048_H_DST = strToBytes('ChaumPedersen-V1-MODP2048-SHA512-SecondGenerator');

function deriveSecondGenerator(): bigint {
  const uniform = expand_message_xmd(strToBytes('h'), MODP2048_H_DST, L, sha512);
  const h = modPow(os2ip(uniform) % P, 2n, P);
  if (h <= 1n) {
    throw new Error('MODP2048: degenerate second generator');
  }
  return h;
}

function encode(e: bigint): Uint8Array {
  return i2osp(e, N_ELEMENT);
}

export const MODP2048: Group<bigint> = {
  name: 'MODP2048',
  order: Q,
  g: 2n,
  h: deriveSecondGenerator(),
  identity: 1n,
  elementLength: N_ELEMENT,
  scalarLength: N_ELEMENT,
  L,

  exponentiate(base: bigint, exponent: bigint): bigint {
    return modPow(base, mod(exponent, Q), P);
  },

  combine(a: bigint, b: bigint): bigint {
    return (a * b) % P;
  },

  equals(a: bigint, b: bigint): boolean {
    return constantTimeEqual(encode(a), encode(b));
  },

  isIdentity(e: bigint): boolean {
    return e === 1n;
  },

  encode,

  decode(bytes: Uint8Array): bigint {
    if (bytes.length !== N_ELEMENT) {
      throw new InvalidElementError(`MODP2048: expected ${N_ELEMENT} bytes, got ${bytes.length}`);
    }
    const e = os2ip(bytes);
    if (e < 1n || e >= P) {
      throw new InvalidElementError('MODP2048: element out of range');
    }
    // Only quadratic residues have order dividing q; this rejects the order-2 element and its coset.
    if (modPow(e, Q, P) !== 1n) {
      throw new InvalidElementError('MODP2048: element is not in the prime-order subgroup');
    }
    return e;
  },

  sampleScalar(random = secureRandom): bigint {
    return randomBelow(Q - 1n, random, 1n);
  },

  hashToScalar(input: Uint8Array, dst: Uint8Array): bigint {
    return os2ip(expand_message_xmd(input, dst, L, sha512)) % Q;
  },

  encodeScalar(s: bigint): Uint8Array {
    return i2osp(s, N_ELEMENT);
  },

  decodeScalar(bytes: Uint8Array): bigint {
    if (bytes.length !== N_ELEMENT) {
      throw new MalformedRequestError(`MODP2048: expected ${N_ELEMENT}-byte scalar, got ${bytes.length}`);
    }
    return os2ip(bytes);
  },
};
