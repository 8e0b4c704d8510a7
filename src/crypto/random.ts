/**
 * Injectable randomness. Production code always uses the platform CSPRNG;
 * tests may pass their own source to make sampling reproducible.
 */
import { randomBytes } from '@noble/hashes/utils';
import { mod, os2ip } from './primitives.js';

/** Returns `length` random bytes. */
export type RandomSource = (length: number) => Uint8Array;

export const secureRandom: RandomSource = (length) => randomBytes(length);

/**
 * Uniform value in `[min, min + range)`.
 * Draws 16 bytes more than the range needs so the modular bias is below 2^-128.
 */
export function randomBelow(range: bigint, random: RandomSource = secureRandom, min = 0n): bigint {
  if (range <= 0n) {
    throw new Error('randomBelow: range must be positive');
  }
  const bytes = Math.ceil(range.toString(2).length / 8) + 16;
  return min + mod(os2ip(random(bytes)), range);
}
