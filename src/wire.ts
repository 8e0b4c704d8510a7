/**
 * JSON bodies exchanged over /zkp/*. Shared by the server routes and the HTTP
 * client so both sides parse the same shapes.
 *
 * Group elements and scalars travel as standard base64 of their fixed-length
 * big-endian encodings.
 */
import { z } from 'zod';

const base64 = z.string().regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'expected base64');
const username = z.string().min(1);

// ── Requests ───────────────────────────────────────────────────────────────

export const RegisterRequestSchema = z.object({
  username,
  y1: base64,
  y2: base64,
});
export type RegisterRequestDto = z.infer<typeof RegisterRequestSchema>;

export const ChallengeRequestSchema = z.object({
  username,
  r1: base64,
  r2: base64,
});
export type ChallengeRequestDto = z.infer<typeof ChallengeRequestSchema>;

export const VerifyRequestSchema = z.object({
  sessionId: z.string().min(1),
  s: base64,
});
export type VerifyRequestDto = z.infer<typeof VerifyRequestSchema>;

export const ProofRequestSchema = z.object({
  username,
  r1: base64,
  r2: base64,
  /** Optional: the server derives the challenge itself when absent. */
  c: base64.optional(),
  s: base64,
});
export type ProofRequestDto = z.infer<typeof ProofRequestSchema>;

export const UnregisterRequestSchema = z.object({
  username,
});
export type UnregisterRequestDto = z.infer<typeof UnregisterRequestSchema>;

// ── Responses ──────────────────────────────────────────────────────────────

export const ConfigResponseSchema = z.object({
  suite: z.string(),
  argon2MemoryKib: z.number().int().nonnegative(),
  argon2Iterations: z.number().int().nonnegative(),
  argon2Parallelism: z.number().int().nonnegative(),
});
export type ConfigResponseDto = z.infer<typeof ConfigResponseSchema>;

export const ChallengeResponseSchema = z.object({
  sessionId: z.string(),
  c: base64,
});
export type ChallengeResponseDto = z.infer<typeof ChallengeResponseSchema>;

export const CredentialResponseSchema = z.object({
  token: z.string(),
  expiresAt: z.number(),
});
export type CredentialResponseDto = z.infer<typeof CredentialResponseSchema>;

export const SessionResponseSchema = z.object({
  username: z.string(),
  expiresAt: z.number(),
});
export type SessionResponseDto = z.infer<typeof SessionResponseSchema>;

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
});
export type ErrorResponseDto = z.infer<typeof ErrorResponseSchema>;
