/**
 * Chaum-Pedersen protocol values (equality of discrete logs of y1 to base g and y2 to base h).
 */

/** How the verifier's challenge is obtained. */
export type ProofMode = 'interactive' | 'fiat-shamir';

/** Public commitment stored at registration: y1 = g^x, y2 = h^x. */
export interface Statement<E> {
  y1: E;
  y2: E;
}

/** Prover's per-attempt commitment: r1 = g^k, r2 = h^k. */
export interface Commitment<E> {
  r1: E;
  r2: E;
}

/** Commitment plus the nonce the prover must keep until it responds. */
export interface ProverCommitment<E> extends Commitment<E> {
  k: bigint;
}

/** Non-interactive proof as sent on the wire; `c` is recomputed by the verifier. */
export interface NonInteractiveProof<E> extends Commitment<E> {
  c: bigint;
  s: bigint;
}
