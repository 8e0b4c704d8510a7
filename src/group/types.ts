/**
 * Prime-order group abstraction the proof engine is written against.
 *
 * Implementations are available as MODP2048 (integers modulo the RFC 3526
 * 2048-bit safe prime) and RISTRETTO255 (Curve25519-based, RFC 9496).
 */
import type { RandomSource } from '../crypto/random.js';

export interface Group<E> {
  /** Group name, e.g. "MODP2048". Also the group segment of protocol DSTs. */
  readonly name: string;
  /** Prime order `q` of the group; scalars live in `[0, q)`. */
  readonly order: bigint;
  /** First generator. */
  readonly g: E;
  /** Second generator, with no known discrete log relative to `g`. */
  readonly h: E;
  readonly identity: E;

  // Size constants
  /** Canonical element encoding length in bytes (256 / 32). */
  readonly elementLength: number;
  /** Scalar encoding length in bytes (256 / 32). */
  readonly scalarLength: number;
  /** expand_message_xmd output length used for hashToScalar: ceil((bits(q) + 128) / 8). */
  readonly L: number;

  /** `base^exponent` (scalar multiplication for curve groups). Exponent is reduced mod q. */
  exponentiate(base: E, exponent: bigint): E;
  /** The group operation. */
  combine(a: E, b: E): E;
  /** Constant-time comparison of canonical encodings. */
  equals(a: E, b: E): boolean;
  isIdentity(e: E): boolean;

  /** Canonical fixed-length encoding. */
  encode(e: E): Uint8Array;
  /**
   * Decode and check subgroup membership.
   * @throws InvalidElementError on wrong length, non-canonical bytes, or a non-member.
   */
  decode(bytes: Uint8Array): E;

  /** Uniform scalar in `[1, q - 1]`. */
  sampleScalar(random?: RandomSource): bigint;
  /** Uniform scalar in `[0, q)` from expand_message_xmd(input, dst, L). */
  hashToScalar(input: Uint8Array, dst: Uint8Array): bigint;

  /** Big-endian fixed-length scalar encoding. */
  encodeScalar(s: bigint): Uint8Array;
  /** Inverse of encodeScalar. Performs no range reduction; callers check `< order`. */
  decodeScalar(bytes: Uint8Array): bigint;
}
