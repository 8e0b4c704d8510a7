/**
 * Protocol suites: a prime-order group paired with the way challenges are produced
 * (verifier randomness or the Fiat-Shamir hash).
 *
 * Each suite bundles everything the client and server must agree on, so the
 * rest of the library can be written generically against ProtocolSuite.
 */
import { MODP2048 } from '../group/modp.js';
import { RISTRETTO255 } from '../group/ristretto.js';
import type { RistrettoElement } from '../group/ristretto.js';
import type { Group } from '../group/types.js';
import { ChaumPedersen } from './engine.js';
import type { ProofMode } from './types.js';

export interface ProtocolSuite<E> {
  /** Suite name as exchanged in server config, e.g. "MODP2048_SHA512". */
  readonly name: string;
  readonly mode: ProofMode;
  readonly group: Group<E>;
  readonly engine: ChaumPedersen<E>;
}

export function createProtocolSuite<E>(name: string, group: Group<E>, mode: ProofMode): ProtocolSuite<E> {
  return {
    name,
    mode,
    group,
    engine: new ChaumPedersen(group),
  };
}

/**
 * Interactive three-move protocol over the RFC 3526 2048-bit MODP group.
 */
export const MODP2048_SHA512 = createProtocolSuite('MODP2048_SHA512', MODP2048, 'interactive');

/**
 * Non-interactive (Fiat-Shamir) protocol over ristretto255.
 */
export const RISTRETTO255_SHA512: ProtocolSuite<RistrettoElement> = createProtocolSuite('RISTRETTO255_SHA512', RISTRETTO255, 'fiat-shamir');

export const SUITE_NAMES = ['MODP2048_SHA512', 'RISTRETTO255_SHA512'] as const;

/**
 * Resolve a suite by the name returned in server config responses.
 */
export function getProtocolSuite(name: string): ProtocolSuite<unknown> {
  switch (name) {
    case 'MODP2048_SHA512': return MODP2048_SHA512;
    case 'RISTRETTO255_SHA512': return RISTRETTO255_SHA512;
    default: throw new Error(`Unknown protocol suite: "${name}". Expected ${SUITE_NAMES.join(' or ')}.`);
  }
}
