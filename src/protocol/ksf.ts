/**
 * Key Stretching Function (KSF) interface and implementations.
 *
 * The KSF stretches the encoded (username, password) pair before it is hashed
 * to the secret scalar. Client and server config must name identical KSF
 * parameters, otherwise logins derive a different x than registration did.
 */

import { strToBytes } from '../crypto/encoding.js';

/**
 * Argon2 salt for password stretching. The username is already inside the
 * stretched input, so the salt only separates this use of Argon2id from others.
 */
export const PASSWORD_KSF_SALT = strToBytes('ChaumPedersen-V1-PasswordKSF');

/**
 * A KSF receives the encoded credentials and returns the stretched output.
 */
export type KSF = (input: Uint8Array) => Promise<Uint8Array>;

/**
 * Identity KSF: no stretching. Returned output equals the input.
 */
export const identityKsf: KSF = (input) => Promise.resolve(input);

/**
 * Argon2id over the encoded credentials, salted with PASSWORD_KSF_SALT.
 * The 64-byte output becomes the seed of the scalar derivation.
 *
 * Memory 0 disables stretching server-side (see ksfFromParams); a typical
 * deployment uses 65536 KiB, 3 iterations, parallelism 1.
 */
export function argon2idKsf(memoryKib: number, iterations: number, parallelism: number): KSF {
  if (memoryKib < 8 * parallelism || iterations < 1 || parallelism < 1) {
    throw new Error(
      `argon2idKsf: need iterations >= 1, parallelism >= 1 and memory >= 8 KiB per lane, got m=${memoryKib} t=${iterations} p=${parallelism}`,
    );
  }
  return async (input) => {
    const { argon2id } = await import('hash-wasm');
    return argon2id({
      password: input,
      salt: PASSWORD_KSF_SALT,
      iterations,
      parallelism,
      memorySize: memoryKib,
      hashLength: 64,
      outputType: 'binary',
    });
  };
}

/** Identity when memory is 0, Argon2id otherwise. */
export function ksfFromParams(memoryKib: number, iterations: number, parallelism: number): KSF {
  return memoryKib > 0 ? argon2idKsf(memoryKib, iterations, parallelism) : identityKsf;
}
