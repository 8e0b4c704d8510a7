/**
 * Server-side authentication flows over a single protocol suite.
 *
 *   register                      store (y1, y2) for a username
 *   createAuthChallenge           interactive: commitment in, challenge out
 *   verifyAuthChallenge           interactive: response in, credential out
 *   verifyNonInteractive          Fiat-Shamir: whole proof in, credential out
 *   validateCredential / unregister
 *
 * Methods take decoded group elements; decoding (and its membership check)
 * happens at the transport edge.
 */
import { toHex } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { type RandomSource, secureRandom } from '../crypto/random.js';
import {
  InvalidCredentialError,
  InvalidElementError,
  MalformedRequestError,
  RejectedError,
  UnknownUserError,
} from '../errors.js';
import type { ProtocolSuite } from '../protocol/suite.js';
import type { Commitment, ProofMode, Statement } from '../protocol/types.js';
import type { CredentialIssuer, IssuedCredential } from './credential.js';
import { type Logger, silentLogger } from './logger.js';
import { InMemoryUserRegistry, type UserRegistry } from './registry.js';
import { LoginSession, ReplayGuard, SessionStore } from './sessions.js';

export interface AuthServiceOptions<E> {
  suite: ProtocolSuite<E>;
  credentials: CredentialIssuer;
  registry?: UserRegistry<E>;
  /** Login attempt lifetime. Default 60 s. */
  sessionTtlMs?: number;
  /** How long accepted commitments are remembered. Default 24 h. */
  replayWindowMs?: number;
  /** Re-registration replaces the stored commitment. Default true. */
  allowOverwrite?: boolean;
  /** Interactive challenge override; tests use it to pin `c`. */
  issueChallenge?: () => bigint;
  /** Source for session ids. */
  random?: RandomSource;
  now?: () => number;
  logger?: Logger;
}

/** A non-interactive proof as received; `c` may be left for the server to derive. */
export interface SubmittedProof<E> extends Commitment<E> {
  c?: bigint;
  s: bigint;
}

export interface ChallengeIssued {
  sessionId: string;
  c: bigint;
}

export interface SessionInfo {
  username: string;
  expiresAt: number;
}

const MAX_USERNAME_BYTES = 255;

export class AuthService<E> {
  readonly suite: ProtocolSuite<E>;
  private readonly credentials: CredentialIssuer;
  private readonly registry: UserRegistry<E>;
  private readonly sessions: SessionStore<E>;
  private readonly replay: ReplayGuard;
  private readonly sessionTtlMs: number;
  private readonly allowOverwrite: boolean;
  private readonly issueChallenge: () => bigint;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: AuthServiceOptions<E>) {
    this.suite = options.suite;
    this.credentials = options.credentials;
    this.registry = options.registry ?? new InMemoryUserRegistry<E>();
    this.now = options.now ?? Date.now;
    this.sessions = new SessionStore<E>(this.now);
    this.replay = new ReplayGuard(options.replayWindowMs ?? 24 * 60 * 60 * 1000, this.now);
    this.sessionTtlMs = options.sessionTtlMs ?? 60_000;
    this.allowOverwrite = options.allowOverwrite ?? true;
    this.issueChallenge = options.issueChallenge ?? (() => this.suite.engine.issueChallenge());
    this.random = options.random ?? secureRandom;
    this.logger = options.logger ?? silentLogger;
  }

  get mode(): ProofMode {
    return this.suite.mode;
  }

  /** Pending login attempts. */
  get pendingSessions(): number {
    return this.sessions.size;
  }

  /**
   * @throws AlreadyExistsError when the user exists and overwrite is disabled
   * @throws InvalidElementError when either commitment is the identity
   */
  async register(username: string, statement: Statement<E>): Promise<void> {
    assertUsername(username);
    this.assertNotIdentity(statement.y1, 'y1');
    this.assertNotIdentity(statement.y2, 'y2');
    await this.registry.put({ username, statement, registeredAt: this.now() }, this.allowOverwrite);
    this.logger.info(`Registered user "${username}"`);
  }

  /**
   * Interactive step one. Opens a session and returns the verifier's challenge.
   * @throws UnknownUserError, InvalidElementError, RejectedError (commitment reused)
   */
  async createAuthChallenge(username: string, commitment: Commitment<E>): Promise<ChallengeIssued> {
    this.requireMode('interactive', 'createAuthChallenge');
    assertUsername(username);
    const record = await this.registry.get(username);
    if (record === undefined) {
      throw new UnknownUserError(username);
    }
    this.assertNotIdentity(commitment.r1, 'r1');
    this.assertNotIdentity(commitment.r2, 'r2');
    if (!this.replay.remember(this.replayKey(username, commitment))) {
      this.logger.warn(`Reused commitment from "${username}"`);
      throw new RejectedError();
    }

    const session = this.openSession(username, record.statement);
    // The challenge is drawn only now, after the commitment is fixed.
    const c = this.issueChallenge();
    session.awaitResponse(commitment, c);
    this.sessions.insert(session);
    return { sessionId: session.id, c };
  }

  /**
   * Interactive step two. The session is consumed whatever the outcome.
   * @throws SessionNotFoundError, SessionExpiredError, RejectedError
   */
  async verifyAuthChallenge(sessionId: string, s: bigint): Promise<IssuedCredential> {
    this.requireMode('interactive', 'verifyAuthChallenge');
    // claim() removes the session before anything else runs.
    const session = this.sessions.claim(sessionId);
    const { commitment, challenge } = session.beginVerification();
    const verified = this.suite.engine.verify(session.statement, commitment, challenge, s);
    return this.conclude(session, verified);
  }

  /**
   * Fiat-Shamir login in one call. When `c` is omitted it is derived from the
   * transcript; when present it must equal the derived value.
   * @throws UnknownUserError, InvalidElementError, RejectedError
   */
  async verifyNonInteractive(username: string, proof: SubmittedProof<E>): Promise<IssuedCredential> {
    this.requireMode('fiat-shamir', 'verifyNonInteractive');
    assertUsername(username);
    const record = await this.registry.get(username);
    if (record === undefined) {
      throw new UnknownUserError(username);
    }
    this.assertNotIdentity(proof.r1, 'r1');
    this.assertNotIdentity(proof.r2, 'r2');

    const session = this.openSession(username, record.statement);
    session.acceptProof();
    const engine = this.suite.engine;
    const c = proof.c ?? engine.deriveChallenge(record.statement, proof);
    const valid = engine.verifyProof(record.statement, { r1: proof.r1, r2: proof.r2, c, s: proof.s });
    // Only accepted proofs are remembered, so a forged one cannot block the real user.
    const fresh = valid && this.replay.remember(this.replayKey(username, proof));
    if (valid && !fresh) {
      this.logger.warn(`Replayed proof for "${username}"`);
    }
    return this.conclude(session, fresh);
  }

  /**
   * @throws InvalidCredentialError
   */
  validateCredential(token: string): SessionInfo {
    const claims = this.credentials.validate(token);
    return { username: claims.sub, expiresAt: claims.exp };
  }

  /**
   * Delete a registration. The credential must have been issued to `username`.
   * @throws InvalidCredentialError, UnknownUserError
   */
  async unregister(username: string, token: string): Promise<void> {
    const { username: subject } = this.validateCredential(token);
    if (subject !== username) {
      throw new InvalidCredentialError('session credential was issued to a different user');
    }
    if (!(await this.registry.delete(username))) {
      throw new UnknownUserError(username);
    }
    this.logger.info(`Unregistered user "${username}"`);
  }

  /** Drop expired sessions and replay entries. */
  sweep(): number {
    return this.sessions.sweep() + this.replay.sweep();
  }

  private openSession(username: string, statement: Statement<E>): LoginSession<E> {
    const createdAt = this.now();
    const session = new LoginSession<E>(
      toHex(this.random(32)),
      username,
      statement,
      createdAt,
      createdAt + this.sessionTtlMs,
    );
    session.open();
    return session;
  }

  private conclude(session: LoginSession<E>, verified: boolean): IssuedCredential {
    session.finish(verified);
    if (!verified) {
      this.logger.info(`Login rejected for "${session.username}"`);
      throw new RejectedError();
    }
    this.logger.info(`Login succeeded for "${session.username}"`);
    return this.credentials.issue(session.username);
  }

  private replayKey(username: string, commitment: Commitment<E>): string {
    return ReplayGuard.key(username, this.suite.group.encode(commitment.r1));
  }

  private assertNotIdentity(e: E, label: string): void {
    if (this.suite.group.isIdentity(e)) {
      throw new InvalidElementError(`${label} must not be the identity element`);
    }
  }

  private requireMode(mode: ProofMode, operation: string): void {
    if (this.suite.mode !== mode) {
      throw new MalformedRequestError(`${operation} is not available for ${this.suite.name} (${this.suite.mode})`);
    }
  }
}

function assertUsername(username: string): void {
  const length = strToBytes(username).length;
  if (length === 0 || length > MAX_USERNAME_BYTES) {
    throw new MalformedRequestError(`username must be 1 to ${MAX_USERNAME_BYTES} bytes`);
  }
}
