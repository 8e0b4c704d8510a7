#!/usr/bin/env node
/**
 * ZKP authentication server
 *
 * Endpoints:
 *   GET    /zkp/config          - Suite and Argon2id parameters
 *   POST   /zkp/register        - Store (y1, y2) for a username
 *   POST   /zkp/auth/challenge  - Interactive: commitment in, challenge out
 *   POST   /zkp/auth/verify     - Interactive: response in, credential out
 *   POST   /zkp/auth/proof      - Fiat-Shamir: proof in, credential out
 *   GET    /zkp/session         - Inspect a bearer credential
 *   DELETE /zkp/registration    - Remove a registration (bearer)
 *   GET    /health              - Health check
 */
import dotenv from 'dotenv';
import { assembleServer } from './app.js';
import { loadConfig } from './config.js';
import { consoleLogger } from './logger.js';
import { startSweeper } from './sessions.js';

dotenv.config();

const logger = consoleLogger('Server');
const config = loadConfig();
const { app, service } = assembleServer(config, logger);

app.listen(config.port, () => {
  console.log('');
  console.log('='.repeat(50));
  console.log('  ZKP Auth Server');
  console.log('='.repeat(50));
  console.log(`  Port:       ${config.port}`);
  console.log(`  Suite:      ${service.suite.name} (${service.mode})`);
  console.log(`  Argon2id:   ${config.argon2MemoryKib > 0 ? `${config.argon2MemoryKib} KiB` : 'disabled'}`);
  console.log(`  Session TTL: ${config.sessionTtlMs} ms`);
  console.log('='.repeat(50));
  console.log('');
});

startSweeper(() => service.sweep(), config.sweepIntervalMs, consoleLogger('Sweeper'));
