/**
 * Transport-agnostic route table for the /zkp/* endpoints.
 *
 * Handlers never throw: every failure becomes an `{ error, message }` body
 * with the status mapped from the error code. app.ts mounts the table on
 * Express; tests call handlers directly.
 */
import type { z } from 'zod';
import { base64Decode, base64Encode } from '../crypto/encoding.js';
import {
  InvalidCredentialError,
  InvalidElementError,
  MalformedRequestError,
  ZkpAuthError,
  type ZkpErrorCode,
} from '../errors.js';
import type { Group } from '../group/types.js';
import {
  ChallengeRequestSchema,
  type ChallengeResponseDto,
  type ConfigResponseDto,
  type CredentialResponseDto,
  type ErrorResponseDto,
  ProofRequestSchema,
  RegisterRequestSchema,
  type SessionResponseDto,
  UnregisterRequestSchema,
  VerifyRequestSchema,
} from '../wire.js';
import type { IssuedCredential } from './credential.js';
import { type Logger, silentLogger } from './logger.js';
import type { AuthService } from './service.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RouteRequest {
  body: unknown;
  /** Raw Authorization header, if any. */
  authorization?: string;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export interface Route {
  method: HttpMethod;
  path: string;
  handle(request: RouteRequest): Promise<RouteResponse>;
}

/** Argon2id parameters published to clients; memory 0 means no stretching. */
export interface KsfParams {
  argon2MemoryKib: number;
  argon2Iterations: number;
  argon2Parallelism: number;
}

const STATUS: Record<ZkpErrorCode, number> = {
  InvalidElement: 400,
  MalformedRequest: 400,
  Rejected: 401,
  InvalidCredential: 401,
  UnknownUser: 404,
  SessionNotFound: 404,
  AlreadyExists: 409,
  SessionExpired: 410,
};

export function statusFor(err: unknown): number {
  return err instanceof ZkpAuthError ? STATUS[err.code] : 500;
}

export function createRoutes<E>(service: AuthService<E>, ksf: KsfParams, logger: Logger = silentLogger): Route[] {
  const group = service.suite.group;

  const route = (method: HttpMethod, path: string, run: (request: RouteRequest) => Promise<unknown>): Route => ({
    method,
    path,
    async handle(request) {
      try {
        return { status: 200, body: await run(request) };
      } catch (err) {
        const status = statusFor(err);
        if (err instanceof ZkpAuthError) {
          const body: ErrorResponseDto = { error: err.code, message: err.message };
          return { status, body };
        }
        logger.error(`${method} ${path} failed`, err);
        const body: ErrorResponseDto = { error: 'Internal', message: 'internal server error' };
        return { status, body };
      }
    },
  });

  return [
    route('GET', '/zkp/config', async () => {
      const body: ConfigResponseDto = { suite: service.suite.name, ...ksf };
      return body;
    }),

    route('POST', '/zkp/register', async ({ body }) => {
      const req = parse(RegisterRequestSchema, body);
      await service.register(req.username, {
        y1: decodeElement(group, req.y1, 'y1'),
        y2: decodeElement(group, req.y2, 'y2'),
      });
      return {};
    }),

    route('POST', '/zkp/auth/challenge', async ({ body }) => {
      const req = parse(ChallengeRequestSchema, body);
      const { sessionId, c } = await service.createAuthChallenge(req.username, {
        r1: decodeElement(group, req.r1, 'r1'),
        r2: decodeElement(group, req.r2, 'r2'),
      });
      const res: ChallengeResponseDto = { sessionId, c: base64Encode(group.encodeScalar(c)) };
      return res;
    }),

    route('POST', '/zkp/auth/verify', async ({ body }) => {
      const req = parse(VerifyRequestSchema, body);
      const issued = await service.verifyAuthChallenge(req.sessionId, decodeScalar(group, req.s, 's'));
      return credentialBody(issued);
    }),

    route('POST', '/zkp/auth/proof', async ({ body }) => {
      const req = parse(ProofRequestSchema, body);
      const issued = await service.verifyNonInteractive(req.username, {
        r1: decodeElement(group, req.r1, 'r1'),
        r2: decodeElement(group, req.r2, 'r2'),
        c: req.c === undefined ? undefined : decodeScalar(group, req.c, 'c'),
        s: decodeScalar(group, req.s, 's'),
      });
      return credentialBody(issued);
    }),

    route('GET', '/zkp/session', async ({ authorization }) => {
      const res: SessionResponseDto = service.validateCredential(bearerToken(authorization));
      return res;
    }),

    route('DELETE', '/zkp/registration', async ({ body, authorization }) => {
      const token = bearerToken(authorization);
      const req = parse(UnregisterRequestSchema, body);
      await service.unregister(req.username, token);
      return {};
    }),
  ];
}

// ── Helpers ────────────────────────────────────────────────────────────────

function parse<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new MalformedRequestError(`invalid request body: ${where}${issue.message}`);
  }
  return result.data;
}

function decodeElement<E>(group: Group<E>, value: string, field: string): E {
  try {
    return group.decode(base64Decode(value));
  } catch (err) {
    if (err instanceof InvalidElementError) {
      throw new InvalidElementError(`${field}: ${err.message}`);
    }
    throw err;
  }
}

function decodeScalar<E>(group: Group<E>, value: string, field: string): bigint {
  try {
    return group.decodeScalar(base64Decode(value));
  } catch (err) {
    if (err instanceof ZkpAuthError) {
      throw new MalformedRequestError(`${field}: ${err.message}`);
    }
    throw err;
  }
}

function bearerToken(header: string | undefined): string {
  const match = header === undefined ? null : /^Bearer\s+(\S+)$/i.exec(header);
  if (match === null) {
    throw new InvalidCredentialError('missing bearer credential');
  }
  return match[1];
}

function credentialBody(issued: IssuedCredential): CredentialResponseDto {
  return { token: issued.token, expiresAt: issued.expiresAt };
}
