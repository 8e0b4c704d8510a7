/**
 * Chaum-Pedersen prover. No I/O: pair with ZkpHttpClient or any transport.
 * KSF is pluggable (default: identity, no stretching).
 */
import { type KSF, identityKsf } from '../protocol/ksf.js';
import { derivePasswordScalar } from '../protocol/password.js';
import type { ProtocolSuite } from '../protocol/suite.js';
import type { NonInteractiveProof, ProverCommitment, Statement } from '../protocol/types.js';

/** Login attempt in progress: keep until the challenge is answered, then drop. */
export interface LoginAttempt<E> {
  x: bigint;
  commitment: ProverCommitment<E>;
}

export class ChaumPedersenClient<E> {
  constructor(
    readonly suite: ProtocolSuite<E>,
    private readonly ksf: KSF = identityKsf,
  ) {}

  /** Secret scalar x for the credentials. */
  deriveSecret(username: string, password: string): Promise<bigint> {
    return derivePasswordScalar(this.suite.group, username, password, this.ksf);
  }

  /**
   * Registration: the public commitment (y1, y2) to upload.
   */
  async createRegistration(username: string, password: string): Promise<Statement<E>> {
    return this.suite.engine.publicCommitment(await this.deriveSecret(username, password));
  }

  /**
   * Interactive step 1: derive x and commit with a fresh nonce.
   */
  async startLogin(username: string, password: string): Promise<LoginAttempt<E>> {
    const x = await this.deriveSecret(username, password);
    return { x, commitment: this.suite.engine.commit() };
  }

  /**
   * Interactive step 1 (deterministic): commit with a fixed nonce.
   * Use for testing only.
   */
  async startLoginDeterministic(username: string, password: string, k: bigint): Promise<LoginAttempt<E>> {
    const x = await this.deriveSecret(username, password);
    return { x, commitment: this.suite.engine.commitWith(k) };
  }

  /**
   * Interactive step 2: response s = k - c*x mod q to the server's challenge.
   */
  solveChallenge(attempt: LoginAttempt<E>, c: bigint): bigint {
    return this.suite.engine.respond(attempt.commitment.k, attempt.x, c);
  }

  /**
   * Non-interactive login: a self-contained Fiat-Shamir proof.
   *
   * @param k  Fixed nonce for testing; random if omitted.
   */
  async createProof(username: string, password: string, k?: bigint): Promise<NonInteractiveProof<E>> {
    const x = await this.deriveSecret(username, password);
    return this.suite.engine.prove(x, undefined, k);
  }
}
