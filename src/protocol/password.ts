/**
 * Password-to-scalar derivation. Changing anything here, or the KSF salt
 * (PASSWORD_KSF_SALT = "ChaumPedersen-V1-PasswordKSF" in ksf.ts), invalidates
 * every stored public commitment.
 *
 *   seed = KSF(I2OSP(len(username), 2) || username || password)
 *   for counter in 0..255:
 *     x = HashToScalar(seed || I2OSP(len(info), 2) || info || I2OSP(counter, 1), DST)
 *     if x != 0: return x
 *
 * info = "ChaumPedersen-V1-PasswordScalar"
 * DST  = "DeriveScalar-ChaumPedersen-V1-" || group name
 */
import { concat, i2osp } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import type { Group } from '../group/types.js';
import { type KSF, identityKsf } from './ksf.js';

export const PASSWORD_SCALAR_INFO = strToBytes('ChaumPedersen-V1-PasswordScalar');

export function deriveScalarDst(groupName: string): Uint8Array {
  return strToBytes(`DeriveScalar-ChaumPedersen-V1-${groupName}`);
}

/**
 * Derive a nonzero scalar from seed and info (same retry loop as RFC 9497 DeriveKeyPair).
 */
export function deriveScalar<E>(group: Group<E>, seed: Uint8Array, info: Uint8Array): bigint {
  const dst = deriveScalarDst(group.name);
  const deriveInput = concat(seed, i2osp(info.length, 2), info);
  for (let counter = 0; counter <= 255; counter++) {
    const x = group.hashToScalar(concat(deriveInput, i2osp(counter, 1)), dst);
    if (x !== 0n) return x;
  }
  throw new Error('deriveScalar: no valid scalar after 256 iterations');
}

/**
 * The secret x for a (username, password) pair in the given group.
 */
export async function derivePasswordScalar<E>(
  group: Group<E>,
  username: string,
  password: string,
  ksf: KSF = identityKsf,
): Promise<bigint> {
  const user = strToBytes(username);
  const seed = await ksf(concat(i2osp(user.length, 2), user, strToBytes(password)));
  return deriveScalar(group, seed, PASSWORD_SCALAR_INFO);
}
