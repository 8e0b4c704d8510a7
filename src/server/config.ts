import { SUITE_NAMES } from '../protocol/suite.js';

export interface ServerConfig {
  port: number;
  suite: string;
  sessionTtlMs: number;
  credentialTtlMs: number;
  replayWindowMs: number;
  allowOverwrite: boolean;
  /** HMAC key for session credentials; undefined means a per-process random key. */
  credentialSecret: string | undefined;
  sweepIntervalMs: number;
  argon2MemoryKib: number;
  argon2Iterations: number;
  argon2Parallelism: number;
}

type Env = Record<string, string | undefined>;

function int(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const suite = env.ZKP_SUITE || 'MODP2048_SHA512';
  if (!SUITE_NAMES.some((name) => name === suite)) {
    throw new Error(`ZKP_SUITE must be one of ${SUITE_NAMES.join(', ')}, got "${suite}"`);
  }
  const argon2MemoryKib = int(env, 'ZKP_ARGON2_MEMORY_KIB', 0);
  return {
    port: int(env, 'PORT', 8080),
    suite,
    sessionTtlMs: int(env, 'ZKP_SESSION_TTL_MS', 60_000),
    credentialTtlMs: int(env, 'ZKP_CREDENTIAL_TTL_MS', 60 * 60 * 1000),
    replayWindowMs: int(env, 'ZKP_REPLAY_WINDOW_MS', 24 * 60 * 60 * 1000),
    allowOverwrite: bool(env, 'ZKP_ALLOW_OVERWRITE', true),
    credentialSecret: env.ZKP_CREDENTIAL_SECRET || undefined,
    sweepIntervalMs: int(env, 'ZKP_SWEEP_INTERVAL_MS', 30_000),
    argon2MemoryKib,
    // Only meaningful when memory > 0; typical Argon2id defaults otherwise.
    argon2Iterations: int(env, 'ZKP_ARGON2_ITERATIONS', argon2MemoryKib > 0 ? 3 : 0),
    argon2Parallelism: int(env, 'ZKP_ARGON2_PARALLELISM', argon2MemoryKib > 0 ? 1 : 0),
  };
}
