import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/server/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      suite: 'MODP2048_SHA512',
      sessionTtlMs: 60_000,
      credentialTtlMs: 3_600_000,
      replayWindowMs: 86_400_000,
      allowOverwrite: true,
      credentialSecret: undefined,
      sweepIntervalMs: 30_000,
      argon2MemoryKib: 0,
      argon2Iterations: 0,
      argon2Parallelism: 0,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '9000',
      ZKP_SUITE: 'RISTRETTO255_SHA512',
      ZKP_ALLOW_OVERWRITE: 'false',
      ZKP_CREDENTIAL_SECRET: 'test-secret-test-secret',
      ZKP_ARGON2_MEMORY_KIB: '65536',
    });
    expect(config.port).toBe(9000);
    expect(config.suite).toBe('RISTRETTO255_SHA512');
    expect(config.allowOverwrite).toBe(false);
    expect(config.credentialSecret).toBe('test-secret-test-secret');
    expect(config.argon2MemoryKib).toBe(65536);
    expect(config.argon2Iterations).toBe(3);
    expect(config.argon2Parallelism).toBe(1);
  });

  it('rejects unknown suites and bad numbers', () => {
    expect(() => loadConfig({ ZKP_SUITE: 'P256_SHA256' })).toThrow('ZKP_SUITE must be one of');
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a non-negative integer');
    expect(() => loadConfig({ ZKP_ALLOW_OVERWRITE: 'maybe' })).toThrow('ZKP_ALLOW_OVERWRITE must be true or false');
  });
});
