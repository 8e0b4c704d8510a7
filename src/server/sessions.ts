/**
 * Per-attempt login sessions and the store that owns them.
 *
 * Session lifecycle:
 *   Start -> AwaitingCommitment -> AwaitingResponse (interactive) -> Verifying -> Success | Failure
 *   Start -> AwaitingCommitment -> Verifying (non-interactive)    -> Success | Failure
 *
 * The store hands a session out exactly once (claim() removes it), so a second
 * response for the same id finds nothing. claim() never suspends, so nothing
 * can interleave between the lookup and the removal.
 */
import { sha256 } from '@noble/hashes/sha256';
import { concat, toHex } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { SessionExpiredError, SessionNotFoundError } from '../errors.js';
import type { Commitment, Statement } from '../protocol/types.js';
import type { Logger } from './logger.js';

export type SessionState =
  | 'Start'
  | 'AwaitingCommitment'
  | 'AwaitingResponse'
  | 'Verifying'
  | 'Success'
  | 'Failure';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Start: ['AwaitingCommitment'],
  AwaitingCommitment: ['AwaitingResponse', 'Verifying', 'Failure'],
  AwaitingResponse: ['Verifying', 'Failure'],
  Verifying: ['Success', 'Failure'],
  Success: [],
  Failure: [],
};

interface PendingChallenge<E> {
  commitment: Commitment<E>;
  challenge: bigint;
}

export class LoginSession<E> {
  private _state: SessionState = 'Start';
  private pending: PendingChallenge<E> | undefined;

  constructor(
    readonly id: string,
    readonly username: string,
    readonly statement: Statement<E>,
    readonly createdAt: number,
    readonly expiresAt: number,
  ) {}

  get state(): SessionState {
    return this._state;
  }

  isExpired(now: number): boolean {
    return now >= this.expiresAt;
  }

  /** Registration lookup succeeded. */
  open(): void {
    this.transition('AwaitingCommitment');
  }

  /** Interactive: commitment received, challenge issued. */
  awaitResponse(commitment: Commitment<E>, challenge: bigint): void {
    this.transition('AwaitingResponse');
    this.pending = { commitment, challenge };
  }

  /** Non-interactive: commitment, challenge and response arrived together. */
  acceptProof(): void {
    this.transition('Verifying');
  }

  /** Interactive: response received; returns what the response must be checked against. */
  beginVerification(): PendingChallenge<E> {
    const pending = this.pending;
    if (pending === undefined) {
      throw new Error(`LoginSession ${this.id}: no challenge was issued`);
    }
    this.transition('Verifying');
    this.pending = undefined;
    return pending;
  }

  finish(verified: boolean): void {
    this.transition(verified ? 'Success' : 'Failure');
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`LoginSession ${this.id}: illegal transition ${this._state} -> ${next}`);
    }
    this._state = next;
  }
}

export class SessionStore<E> {
  private readonly sessions = new Map<string, LoginSession<E>>();

  constructor(private readonly now: () => number = Date.now) {}

  insert(session: LoginSession<E>): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`SessionStore: duplicate session id ${session.id}`);
    }
    this.sessions.set(session.id, session);
  }

  /**
   * Remove and return a session awaiting a response.
   * @throws SessionNotFoundError for unknown ids (including already-claimed ones)
   * @throws SessionExpiredError when the session outlived its expiry
   */
  claim(id: string): LoginSession<E> {
    const session = this.sessions.get(id);
    if (session === undefined) {
      throw new SessionNotFoundError();
    }
    this.sessions.delete(id);
    if (session.isExpired(this.now())) {
      throw new SessionExpiredError();
    }
    return session;
  }

  /** Drop expired sessions; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.isExpired(now)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Remembers (username, r1) commitments for a window so a captured proof cannot
 * be replayed and a client that reuses a nonce is refused.
 */
export class ReplayGuard {
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  static key(username: string, encodedR1: Uint8Array): string {
    const user = strToBytes(username);
    return toHex(sha256(concat(user, new Uint8Array([0x00]), encodedR1)));
  }

  /** True the first time a key is seen inside the window; false on a repeat. */
  remember(key: string): boolean {
    const now = this.now();
    const until = this.seen.get(key);
    if (until !== undefined && until > now) {
      return false;
    }
    this.seen.set(key, now + this.windowMs);
    return true;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, until] of this.seen) {
      if (until <= now) {
        this.seen.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

/**
 * Run `sweep` on an interval that does not keep the process alive.
 * Returns a function that stops it.
 */
export function startSweeper(sweep: () => number, intervalMs: number, logger: Logger): () => void {
  const timer = setInterval(() => {
    const removed = sweep();
    if (removed > 0) logger.debug(`Swept ${removed} expired entries`);
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
