/**
 * HTTP client for the /zkp/* endpoints.
 * Elements and scalars are sent as base64 of their fixed-length encodings.
 *
 * The protocol suite is read from GET /zkp/config so the client
 * automatically uses the same suite the server was configured with.
 */
import { z } from 'zod';
import { base64Decode, base64Encode } from '../crypto/encoding.js';
import { errorFromCode } from '../errors.js';
import { type KSF, identityKsf, ksfFromParams } from '../protocol/ksf.js';
import { MODP2048_SHA512, type ProtocolSuite, getProtocolSuite } from '../protocol/suite.js';
import {
  type ChallengeRequestDto,
  ChallengeResponseSchema,
  type ConfigResponseDto,
  ConfigResponseSchema,
  type CredentialResponseDto,
  CredentialResponseSchema,
  ErrorResponseSchema,
  type ProofRequestDto,
  type RegisterRequestDto,
  type SessionResponseDto,
  SessionResponseSchema,
  type UnregisterRequestDto,
  type VerifyRequestDto,
} from '../wire.js';
import { ChaumPedersenClient } from './client.js';

export interface ZkpHttpClientOptions {
  /** Key stretching function; must match the server's KSF configuration. Default: identity. */
  ksf?: KSF;
  /** Protocol suite to use. Resolved automatically from server config when using create(). */
  suite?: ProtocolSuite<unknown>;
}

const EmptyResponseSchema = z.object({});

type Method = 'GET' | 'POST' | 'DELETE';

/** Empty text is `{}`; text that is not JSON (a proxy's error page) is undefined. */
function parseJson(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/**
 * HTTP wrapper for the registration and login flows.
 *
 * Use the static `create()` factory to resolve the suite and KSF from the
 * server's /zkp/config endpoint.
 */
export class ZkpHttpClient {
  private readonly prover: ChaumPedersenClient<unknown>;
  configResponse: ConfigResponseDto | null = null;

  constructor(private readonly baseUrl: string, options?: ZkpHttpClientOptions) {
    this.prover = new ChaumPedersenClient<unknown>(options?.suite ?? MODP2048_SHA512, options?.ksf ?? identityKsf);
  }

  get suite(): ProtocolSuite<unknown> {
    return this.prover.suite;
  }

  async getConfig(): Promise<ConfigResponseDto> {
    return this._request('GET', '/zkp/config', ConfigResponseSchema);
  }

  /**
   * Factory that fetches server config, resolves suite + KSF, and returns a
   * fully configured client.
   */
  static async create(baseUrl: string): Promise<ZkpHttpClient> {
    const cfg = await new ZkpHttpClient(baseUrl).getConfig();
    const client = new ZkpHttpClient(baseUrl, {
      suite: getProtocolSuite(cfg.suite),
      ksf: ksfFromParams(cfg.argon2MemoryKib, cfg.argon2Iterations, cfg.argon2Parallelism),
    });
    client.configResponse = cfg;
    return client;
  }

  /**
   * Derive (y1, y2) from the password and upload them.
   */
  async register(username: string, password: string): Promise<void> {
    const { y1, y2 } = await this.prover.createRegistration(username, password);
    const group = this.suite.group;
    const dto: RegisterRequestDto = {
      username,
      y1: base64Encode(group.encode(y1)),
      y2: base64Encode(group.encode(y2)),
    };
    await this._request('POST', '/zkp/register', EmptyResponseSchema, dto);
  }

  /**
   * Full login flow for the configured suite: challenge/response for
   * interactive suites, a single proof upload for Fiat-Shamir suites.
   *
   * @returns  Session credential from the server
   */
  async login(username: string, password: string): Promise<CredentialResponseDto> {
    return this.suite.mode === 'interactive'
      ? this.loginInteractive(username, password)
      : this.loginNonInteractive(username, password);
  }

  /**
   * Inspect a credential: who it was issued to and when it expires.
   */
  async whoami(token: string): Promise<SessionResponseDto> {
    return this._request('GET', '/zkp/session', SessionResponseSchema, undefined, token);
  }

  /**
   * Delete a registration.
   *
   * @param token  Credential from a previous login() for the same user
   */
  async deleteRegistration(username: string, token: string): Promise<void> {
    const dto: UnregisterRequestDto = { username };
    await this._request('DELETE', '/zkp/registration', EmptyResponseSchema, dto, token);
  }

  private async loginInteractive(username: string, password: string): Promise<CredentialResponseDto> {
    const group = this.suite.group;

    // Step 1: commit
    const attempt = await this.prover.startLogin(username, password);
    const challengeDto: ChallengeRequestDto = {
      username,
      r1: base64Encode(group.encode(attempt.commitment.r1)),
      r2: base64Encode(group.encode(attempt.commitment.r2)),
    };
    const { sessionId, c } = await this._request('POST', '/zkp/auth/challenge', ChallengeResponseSchema, challengeDto);

    // Step 2: answer the challenge
    const s = this.prover.solveChallenge(attempt, group.decodeScalar(base64Decode(c)));
    const verifyDto: VerifyRequestDto = { sessionId, s: base64Encode(group.encodeScalar(s)) };
    return this._request('POST', '/zkp/auth/verify', CredentialResponseSchema, verifyDto);
  }

  private async loginNonInteractive(username: string, password: string): Promise<CredentialResponseDto> {
    const group = this.suite.group;
    const proof = await this.prover.createProof(username, password);
    const dto: ProofRequestDto = {
      username,
      r1: base64Encode(group.encode(proof.r1)),
      r2: base64Encode(group.encode(proof.r2)),
      c: base64Encode(group.encodeScalar(proof.c)),
      s: base64Encode(group.encodeScalar(proof.s)),
    };
    return this._request('POST', '/zkp/auth/proof', CredentialResponseSchema, dto);
  }

  private async _request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    body?: unknown,
    token?: string,
  ): Promise<z.infer<S>> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (token !== undefined) headers['Authorization'] = `Bearer ${token}`;
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const json = parseJson(await response.text());
    if (!response.ok) {
      const error = ErrorResponseSchema.safeParse(json);
      if (error.success && response.status < 500) {
        throw errorFromCode(error.data.error, error.data.message);
      }
      throw new Error(`ZKP server error [${path}]: ${response.status} ${response.statusText}`);
    }
    if (json === undefined) {
      throw new Error(`ZKP server returned a non-JSON body for ${path}`);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`ZKP server returned an unexpected body for ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
