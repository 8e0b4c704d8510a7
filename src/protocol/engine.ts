/**
 * Chaum-Pedersen sigma protocol over any prime-order group.
 *
 *   commit:   r1 = g^k, r2 = h^k          (k fresh per attempt)
 *   respond:  s  = k - c*x mod q
 *   verify:   g^s * y1^c == r1  AND  h^s * y2^c == r2
 *
 * The interactive and Fiat-Shamir flows share commit/respond/verify and differ
 * only in where `c` comes from (see challenge.ts).
 */
import { constantTimeEqual, mod, modInverse } from '../crypto/primitives.js';
import { type RandomSource, secureRandom } from '../crypto/random.js';
import type { Group } from '../group/types.js';
import {
  type ChallengeSource,
  type VerifierChallengeSource,
  fiatShamirChallenge,
  randomChallenge,
} from './challenge.js';
import type { Commitment, NonInteractiveProof, ProverCommitment, Statement } from './types.js';

export class ChaumPedersen<E> {
  private readonly fiatShamir: ChallengeSource<E>;
  private readonly verifierChallenge: VerifierChallengeSource<E>;

  constructor(
    readonly group: Group<E>,
    private readonly random: RandomSource = secureRandom,
  ) {
    this.fiatShamir = fiatShamirChallenge(group);
    this.verifierChallenge = randomChallenge(group, random);
  }

  /**
   * Registration: the public commitment (y1, y2) = (g^x, h^x).
   */
  publicCommitment(x: bigint): Statement<E> {
    this.assertSecret(x);
    const { g, h } = this.group;
    return { y1: this.group.exponentiate(g, x), y2: this.group.exponentiate(h, x) };
  }

  /**
   * Prover commit step with a fresh nonce.
   */
  commit(): ProverCommitment<E> {
    return this.commitWith(this.group.sampleScalar(this.random));
  }

  /**
   * Prover commit step (deterministic): use a fixed nonce.
   * For test fixtures only; reusing a nonce across two challenges reveals x.
   */
  commitWith(k: bigint): ProverCommitment<E> {
    this.assertSecret(k);
    const { g, h } = this.group;
    return { k, r1: this.group.exponentiate(g, k), r2: this.group.exponentiate(h, k) };
  }

  /**
   * Verifier challenge for the interactive protocol, uniform in [0, q).
   */
  issueChallenge(): bigint {
    return this.verifierChallenge.challenge();
  }

  /**
   * Prover response s = k - c*x mod q, wrapped into [0, q).
   */
  respond(k: bigint, x: bigint, c: bigint): bigint {
    return mod(k - c * x, this.group.order);
  }

  /**
   * Check both verification equations. False on any mismatch or any scalar
   * outside [0, q); both equations are always evaluated.
   */
  verify(statement: Statement<E>, commitment: Commitment<E>, c: bigint, s: bigint): boolean {
    const q = this.group.order;
    if (c < 0n || c >= q || s < 0n || s >= q) return false;
    const G = this.group;
    const t1 = G.combine(G.exponentiate(G.g, s), G.exponentiate(statement.y1, c));
    const t2 = G.combine(G.exponentiate(G.h, s), G.exponentiate(statement.y2, c));
    const ok1 = G.equals(t1, commitment.r1);
    const ok2 = G.equals(t2, commitment.r2);
    return ok1 && ok2;
  }

  /**
   * Fiat-Shamir challenge for a statement and commitment.
   */
  deriveChallenge(statement: Statement<E>, commitment: Commitment<E>): bigint {
    return this.fiatShamir.challenge(statement, commitment);
  }

  /**
   * Non-interactive proof of knowledge of x for `statement`.
   *
   * @param x          The secret scalar.
   * @param statement  (y1, y2); computed from x when omitted.
   * @param k          Fixed nonce for testing; random if omitted.
   */
  prove(x: bigint, statement?: Statement<E>, k?: bigint): NonInteractiveProof<E> {
    const stmt = statement ?? this.publicCommitment(x);
    const { k: nonce, r1, r2 } = k === undefined ? this.commit() : this.commitWith(k);
    const c = this.deriveChallenge(stmt, { r1, r2 });
    return { r1, r2, c, s: this.respond(nonce, x, c) };
  }

  /**
   * Verify a non-interactive proof: recompute c from the transcript, require the
   * sent c to match, then check the same equations as the interactive verifier.
   */
  verifyProof(statement: Statement<E>, proof: NonInteractiveProof<E>): boolean {
    const q = this.group.order;
    if (proof.c < 0n || proof.c >= q) return false;
    const expected = this.deriveChallenge(statement, proof);
    const sameChallenge = constantTimeEqual(this.group.encodeScalar(expected), this.group.encodeScalar(proof.c));
    const equationsHold = this.verify(statement, proof, expected, proof.s);
    return sameChallenge && equationsHold;
  }

  /**
   * Special-soundness extractor: two accepting responses to distinct challenges
   * for the same commitment yield x = (s1 - s2) / (c2 - c1) mod q.
   */
  extractWitness(c1: bigint, s1: bigint, c2: bigint, s2: bigint): bigint {
    const q = this.group.order;
    if (mod(c1 - c2, q) === 0n) {
      throw new Error('extractWitness: challenges must differ');
    }
    return mod((s1 - s2) * modInverse(c2 - c1, q), q);
  }

  private assertSecret(v: bigint): void {
    if (v <= 0n || v >= this.group.order) {
      throw new RangeError(`${this.group.name}: scalar must be in [1, q - 1]`);
    }
  }
}
