/**
 * Pure byte and bigint helpers shared by both groups and the wire layer.
 */
import { invert, pow } from '@noble/curves/abstract/modular';

/**
 * I2OSP: Integer-to-Octet-String Primitive (RFC 8017 §4.1).
 * Serializes a non-negative integer as a big-endian byte array of the given length.
 */
export function i2osp(value: number | bigint, length: number): Uint8Array {
  const result = new Uint8Array(length);
  let v = BigInt(value);
  if (v < 0n) {
    throw new Error(`i2osp: negative value ${value}`);
  }
  for (let i = length - 1; i >= 0; i--) {
    result[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  if (v !== 0n) {
    throw new Error(`i2osp: value ${value} overflows ${length} bytes`);
  }
  return result;
}

/**
 * OS2IP: big-endian bytes to bigint (RFC 8017 §4.2).
 */
export function os2ip(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const b of bytes) {
    result = (result << 8n) | BigInt(b);
  }
  return result;
}

/**
 * Concatenate multiple Uint8Arrays into one.
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, a) => sum + a.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const a of arrays) {
    result.set(a, offset);
    offset += a.length;
  }
  return result;
}

/**
 * Constant-time equality check. Accumulates XOR differences so no early exit.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Decode a hex string to a Uint8Array.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error(`fromHex: odd-length hex string`);
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`fromHex: invalid hex character`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Encode a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/** Reduce `a` into `[0, m)`, also for negative inputs. */
export function mod(a: bigint, m: bigint): bigint {
  const r = a % m;
  return r < 0n ? r + m : r;
}

/** `base^exp mod m` for any sign of `base`. */
export function modPow(base: bigint, exp: bigint, m: bigint): bigint {
  if (exp < 0n) {
    throw new Error('modPow: negative exponent');
  }
  return pow(mod(base, m), exp, m);
}

/** Modular inverse of `a` mod prime `p`. */
export function modInverse(a: bigint, p: bigint): bigint {
  const r = mod(a, p);
  if (r === 0n) {
    throw new Error('modInverse: zero has no inverse');
  }
  return invert(r, p);
}

/** Bit length of a positive bigint. */
export function bitLength(n: bigint): number {
  return n.toString(2).length;
}
