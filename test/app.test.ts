import type { Server } from 'node:http';
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { assembleServer, createApp } from '../src/server/app.js';
import { loadConfig } from '../src/server/config.js';
import { silentLogger } from '../src/server/logger.js';
import * as library from '../src/index.js';

describe('assembleServer', () => {
  it('builds the configured suite', () => {
    const config = loadConfig({ ZKP_SUITE: 'RISTRETTO255_SHA512', ZKP_CREDENTIAL_SECRET: 'test-secret-test-secret' });
    const { app, service } = assembleServer(config, silentLogger);
    expect(typeof app.listen).toBe('function');
    expect(service.suite.name).toBe('RISTRETTO255_SHA512');
    expect(service.mode).toBe('fiat-shamir');
  });

  it('warns when no credential secret is configured', () => {
    const logger = { ...silentLogger, warn: vi.fn() };
    assembleServer(loadConfig({}), logger);
    expect(logger.warn).toHaveBeenCalledWith('ZKP_CREDENTIAL_SECRET is not set; credentials will not survive a restart');
  });

  it('refuses a credential secret shorter than 16 bytes', () => {
    expect(() => assembleServer(loadConfig({ ZKP_CREDENTIAL_SECRET: 'short' }), silentLogger)).toThrow('at least 16 bytes');
  });
});

describe('library entry', () => {
  it('leaves Express and env loading to the server entry point', () => {
    expect(Object.keys(library)).not.toContain('loadConfig');
    expect(Object.keys(library)).not.toContain('createApp');
    expect(Object.keys(library)).not.toContain('assembleServer');
    expect(Object.keys(library)).toContain('ZkpHttpClient');
  });
});

// ── Express app on a loopback port ──────────────────────────────────────────

describe('createApp', () => {
  const logger = { ...silentLogger, error: vi.fn() };
  let server: Server;
  let baseUrl = '';

  beforeAll(async () => {
    const config = loadConfig({ ZKP_CREDENTIAL_SECRET: 'test-secret-test-secret' });
    const { app } = assembleServer(config, logger);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });
  }

  it('serves /health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toHaveProperty('status', 'ok');
  });

  it('serves the route table', async () => {
    const res = await fetch(`${baseUrl}/zkp/config`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      suite: 'MODP2048_SHA512',
      argon2MemoryKib: 0,
      argon2Iterations: 0,
      argon2Parallelism: 0,
    });
  });

  it('answers invalid JSON with 400 MalformedRequest', async () => {
    const res = await post('/zkp/register', '{nope');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'MalformedRequest', message: 'request body is not valid JSON' });
  });

  it('answers an oversized body with 413 MalformedRequest', async () => {
    const res = await post('/zkp/register', JSON.stringify({ username: 'a'.repeat(20_000), y1: '', y2: '' }));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'MalformedRequest', message: 'request entity too large' });
  });

  it('does not log client errors as internal faults', () => {
    expect(logger.error).not.toHaveBeenCalled();
  });
});

describe('createApp error handler', () => {
  it('passes through 4xx statuses carried by the error', async () => {
    const app = createApp([
      {
        method: 'GET',
        path: '/boom',
        handle: async () => { throw Object.assign(new Error('unsupported charset "LATIN-9"'), { status: 415 }); },
      },
    ], silentLogger);
    const server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    try {
      const address = server.address();
      if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
      const res = await fetch(`http://127.0.0.1:${address.port}/boom`);
      expect(res.status).toBe(415);
      expect(await res.json()).toEqual({ error: 'MalformedRequest', message: 'unsupported charset "LATIN-9"' });
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
