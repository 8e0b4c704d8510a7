/**
 * Challenge sources: verifier randomness for the interactive protocol, or the
 * Fiat-Shamir transcript hash for the non-interactive one.
 */
import { concat } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { type RandomSource, randomBelow, secureRandom } from '../crypto/random.js';
import type { Group } from '../group/types.js';
import type { Commitment, ProofMode, Statement } from './types.js';

export interface ChallengeSource<E> {
  readonly mode: ProofMode;
  /** Produce `c` in `[0, q)` for the given statement and commitment. */
  challenge(statement: Statement<E>, commitment: Commitment<E>): bigint;
}

/** A challenge source that takes nothing from the prover. */
export interface VerifierChallengeSource<E> extends ChallengeSource<E> {
  challenge(): bigint;
}

/**
 * Uniform challenge drawn after the commitment arrives. Ignores its arguments:
 * the challenge must not depend on anything the prover chose.
 */
export function randomChallenge<E>(group: Group<E>, random: RandomSource = secureRandom): VerifierChallengeSource<E> {
  return {
    mode: 'interactive',
    challenge: () => randomBelow(group.order, random),
  };
}

/** DST for the Fiat-Shamir challenge hash. */
export function challengeDst(groupName: string): Uint8Array {
  return strToBytes(`ChaumPedersen-V1-${groupName}-SHA512-Challenge`);
}

/**
 * Canonical transcript: g || h || y1 || y2 || r1 || r2, every element in its
 * fixed-length encoding, so the byte string parses one way only.
 */
export function transcript<E>(group: Group<E>, statement: Statement<E>, commitment: Commitment<E>): Uint8Array {
  return concat(
    group.encode(group.g),
    group.encode(group.h),
    group.encode(statement.y1),
    group.encode(statement.y2),
    group.encode(commitment.r1),
    group.encode(commitment.r2),
  );
}

/**
 * Fiat-Shamir challenge:
 *   c = OS2IP(expand_message_xmd(transcript, DST, L)) mod q
 */
export function fiatShamirChallenge<E>(group: Group<E>): ChallengeSource<E> {
  const dst = challengeDst(group.name);
  return {
    mode: 'fiat-shamir',
    challenge: (statement, commitment) => group.hashToScalar(transcript(group, statement, commitment), dst),
  };
}
