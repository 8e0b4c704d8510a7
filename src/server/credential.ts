/**
 * Session credentials issued after a successful proof.
 *
 *   token = base64url(JSON(claims)) "." base64url(HMAC-SHA256(key, payload))
 *
 * payload is the first segment exactly as sent, so validation never
 * re-serializes the claims.
 */
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { z } from 'zod';
import { base64UrlDecode, base64UrlEncode, bytesToStr, strToBytes } from '../crypto/encoding.js';
import { constantTimeEqual, toHex } from '../crypto/primitives.js';
import { type RandomSource, secureRandom } from '../crypto/random.js';
import { InvalidCredentialError } from '../errors.js';

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export type CredentialClaims = z.infer<typeof ClaimsSchema>;

export interface IssuedCredential {
  token: string;
  /** Expiry, milliseconds since the epoch. */
  expiresAt: number;
}

const BASE64URL = /^[A-Za-z0-9_-]+$/;

export class CredentialIssuer {
  private readonly key: Uint8Array;

  constructor(
    key: Uint8Array,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
    private readonly random: RandomSource = secureRandom,
  ) {
    if (key.length < 16) {
      throw new Error('CredentialIssuer: key must be at least 16 bytes');
    }
    this.key = key.slice();
  }

  issue(username: string): IssuedCredential {
    const iat = this.now();
    const claims: CredentialClaims = {
      sub: username,
      iat,
      exp: iat + this.ttlMs,
      jti: toHex(this.random(16)),
    };
    const payload = base64UrlEncode(strToBytes(JSON.stringify(claims)));
    return { token: `${payload}.${this.sign(payload)}`, expiresAt: claims.exp };
  }

  /**
   * @throws InvalidCredentialError on a bad format, a bad MAC, or an expired token.
   */
  validate(token: string): CredentialClaims {
    const parts = token.split('.');
    if (parts.length !== 2) {
      throw new InvalidCredentialError('session credential is malformed');
    }
    const [payload, mac] = parts;
    if (!BASE64URL.test(payload) || !BASE64URL.test(mac)) {
      throw new InvalidCredentialError('session credential is malformed');
    }
    if (!constantTimeEqual(strToBytes(this.sign(payload)), strToBytes(mac))) {
      throw new InvalidCredentialError();
    }
    const claims = parseClaims(payload);
    if (this.now() >= claims.exp) {
      throw new InvalidCredentialError();
    }
    return claims;
  }

  private sign(payload: string): string {
    return base64UrlEncode(hmac(sha256, this.key, strToBytes(payload)));
  }
}

function parseClaims(payload: string): CredentialClaims {
  let json: unknown;
  try {
    json = JSON.parse(bytesToStr(base64UrlDecode(payload)));
  } catch (err) {
    throw new InvalidCredentialError(`session credential is malformed: ${String(err)}`);
  }
  const parsed = ClaimsSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidCredentialError('session credential is malformed');
  }
  return parsed.data;
}
