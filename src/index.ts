/**
 * zkp-auth: Chaum-Pedersen zero-knowledge password authentication.
 *
 * Supports MODP2048_SHA512 (interactive, RFC 3526 group) and
 * RISTRETTO255_SHA512 (non-interactive, Fiat-Shamir) protocol suites.
 * The suite is negotiated automatically from the server's /zkp/config endpoint
 * when using ZkpHttpClient.create().
 */

// ── Crypto utilities ────────────────────────────────────────────────────────
export { i2osp, os2ip, concat, constantTimeEqual, fromHex, toHex, mod, modPow, modInverse } from './crypto/primitives.js';
export { base64Encode, base64Decode, base64UrlEncode, base64UrlDecode, strToBytes, bytesToStr } from './crypto/encoding.js';
export { type RandomSource, secureRandom, randomBelow } from './crypto/random.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export {
  type ZkpErrorCode,
  ZkpAuthError,
  InvalidElementError,
  UnknownUserError,
  AlreadyExistsError,
  SessionNotFoundError,
  SessionExpiredError,
  RejectedError,
  InvalidCredentialError,
  MalformedRequestError,
  errorFromCode,
} from './errors.js';

// ── Groups ──────────────────────────────────────────────────────────────────
export type { Group } from './group/types.js';
export { MODP2048, MODP2048_PRIME } from './group/modp.js';
export { RISTRETTO255, type RistrettoElement } from './group/ristretto.js';

// ── Protocol ────────────────────────────────────────────────────────────────
export type { ProofMode, Statement, Commitment, ProverCommitment, NonInteractiveProof } from './protocol/types.js';
export {
  type ChallengeSource,
  type VerifierChallengeSource,
  randomChallenge,
  fiatShamirChallenge,
  challengeDst,
  transcript,
} from './protocol/challenge.js';
export { ChaumPedersen } from './protocol/engine.js';
export {
  type ProtocolSuite,
  createProtocolSuite,
  MODP2048_SHA512,
  RISTRETTO255_SHA512,
  SUITE_NAMES,
  getProtocolSuite,
} from './protocol/suite.js';
export { type KSF, identityKsf, argon2idKsf, ksfFromParams, PASSWORD_KSF_SALT } from './protocol/ksf.js';
export { derivePasswordScalar, deriveScalar, PASSWORD_SCALAR_INFO } from './protocol/password.js';

// ── Client ──────────────────────────────────────────────────────────────────
export { ChaumPedersenClient, type LoginAttempt } from './client/client.js';
export { ZkpHttpClient, type ZkpHttpClientOptions } from './client/http.js';
export * from './wire.js';

// ── Server ──────────────────────────────────────────────────────────────────
// Express wiring and env config live behind the zkp-auth-server entry point.
export { type Logger, consoleLogger, silentLogger } from './server/logger.js';
export { type UserRecord, type UserRegistry, InMemoryUserRegistry } from './server/registry.js';
export { type SessionState, LoginSession, SessionStore, ReplayGuard, startSweeper } from './server/sessions.js';
export { type CredentialClaims, type IssuedCredential, CredentialIssuer } from './server/credential.js';
export {
  type AuthServiceOptions,
  type SubmittedProof,
  type ChallengeIssued,
  type SessionInfo,
  AuthService,
} from './server/service.js';
export { type Route, type RouteRequest, type RouteResponse, type KsfParams, createRoutes, statusFor } from './server/routes.js';
