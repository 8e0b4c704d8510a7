/**
 * Login session state machine, session store and replay guard.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { LoginSession, ReplayGuard, SessionStore, startSweeper } from '../src/server/sessions.js';
import { SessionExpiredError, SessionNotFoundError } from '../src/errors.js';
import { silentLogger } from '../src/server/logger.js';
import { strToBytes } from '../src/crypto/encoding.js';

const statement = { y1: 4n, y2: 9n };
const commitment = { r1: 16n, r2: 25n };

function session(id = 'session-1', createdAt = 0, expiresAt = 1000): LoginSession<bigint> {
  return new LoginSession(id, 'alice', statement, createdAt, expiresAt);
}

describe('LoginSession', () => {
  it('walks the interactive path', () => {
    const s = session();
    expect(s.state).toBe('Start');
    s.open();
    expect(s.state).toBe('AwaitingCommitment');
    s.awaitResponse(commitment, 4n);
    expect(s.state).toBe('AwaitingResponse');
    expect(s.beginVerification()).toEqual({ commitment, challenge: 4n });
    expect(s.state).toBe('Verifying');
    s.finish(true);
    expect(s.state).toBe('Success');
  });

  it('walks the non-interactive path', () => {
    const s = session();
    s.open();
    s.acceptProof();
    expect(s.state).toBe('Verifying');
    s.finish(false);
    expect(s.state).toBe('Failure');
  });

  it('refuses illegal transitions', () => {
    const s = session();
    expect(() => s.acceptProof()).toThrow('illegal transition Start -> Verifying');
    s.open();
    expect(() => s.finish(true)).toThrow('illegal transition AwaitingCommitment -> Success');
  });

  it('terminal states are final', () => {
    const s = session();
    s.open();
    s.acceptProof();
    s.finish(true);
    expect(() => s.finish(true)).toThrow('illegal transition Success -> Success');
  });

  it('beginVerification needs an issued challenge', () => {
    const s = session();
    s.open();
    expect(() => s.beginVerification()).toThrow('no challenge was issued');
  });

  it('expires at expiresAt', () => {
    const s = session('id', 0, 1000);
    expect(s.isExpired(999)).toBe(false);
    expect(s.isExpired(1000)).toBe(true);
  });
});

describe('SessionStore', () => {
  it('hands a session out once', () => {
    const store = new SessionStore<bigint>(() => 0);
    const s = session();
    store.insert(s);
    expect(store.claim('session-1')).toBe(s);
    expect(store.size).toBe(0);
    expect(() => store.claim('session-1')).toThrow(SessionNotFoundError);
  });

  it('reports unknown ids as not found', () => {
    const store = new SessionStore<bigint>(() => 0);
    expect(() => store.claim('missing')).toThrow(SessionNotFoundError);
  });

  it('reports expired sessions as expired and drops them', () => {
    let now = 0;
    const store = new SessionStore<bigint>(() => now);
    store.insert(session());
    now = 1000;
    expect(() => store.claim('session-1')).toThrow(SessionExpiredError);
    expect(() => store.claim('session-1')).toThrow(SessionNotFoundError);
  });

  it('rejects duplicate ids', () => {
    const store = new SessionStore<bigint>(() => 0);
    store.insert(session());
    expect(() => store.insert(session())).toThrow('duplicate session id');
  });

  it('sweep removes only expired sessions', () => {
    let now = 0;
    const store = new SessionStore<bigint>(() => now);
    store.insert(session('a', 0, 100));
    store.insert(session('b', 0, 500));
    now = 200;
    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.claim('b').id).toBe('b');
  });
});

describe('ReplayGuard', () => {
  it('accepts a key once per window', () => {
    let now = 0;
    const guard = new ReplayGuard(1000, () => now);
    const key = ReplayGuard.key('alice', strToBytes('r1'));
    expect(guard.remember(key)).toBe(true);
    expect(guard.remember(key)).toBe(false);
    now = 1000;
    expect(guard.remember(key)).toBe(true);
  });

  it('keys depend on username and commitment', () => {
    const r1 = strToBytes('r1');
    expect(ReplayGuard.key('alice', r1)).not.toBe(ReplayGuard.key('bob', r1));
    expect(ReplayGuard.key('alice', r1)).not.toBe(ReplayGuard.key('alice', strToBytes('r2')));
    expect(ReplayGuard.key('alice', r1)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('sweep forgets expired keys', () => {
    let now = 0;
    const guard = new ReplayGuard(100, () => now);
    guard.remember('a');
    now = 50;
    guard.remember('b');
    now = 100;
    expect(guard.sweep()).toBe(1);
  });
});

describe('startSweeper', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on the interval until stopped', () => {
    vi.useFakeTimers();
    const sweep = vi.fn(() => 0);
    const stop = startSweeper(sweep, 1000, silentLogger);
    vi.advanceTimersByTime(2500);
    expect(sweep).toHaveBeenCalledTimes(2);
    stop();
    vi.advanceTimersByTime(5000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });
});
