/**
 * Error taxonomy for the authentication protocol.
 *
 * Every error carries a stable `code` so the HTTP layer can map it to a status
 * and the HTTP client can rebuild the same class on the other side.
 */

export type ZkpErrorCode =
  | 'InvalidElement'
  | 'UnknownUser'
  | 'AlreadyExists'
  | 'SessionNotFound'
  | 'SessionExpired'
  | 'Rejected'
  | 'InvalidCredential'
  | 'MalformedRequest';

export class ZkpAuthError extends Error {
  constructor(readonly code: ZkpErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
  }
}

/** A decoded group element is not a member of the prime-order subgroup. */
export class InvalidElementError extends ZkpAuthError {
  constructor(message = 'element is not a member of the group') {
    super('InvalidElement', message);
  }
}

export class UnknownUserError extends ZkpAuthError {
  constructor(username: string) {
    super('UnknownUser', `user "${username}" is not registered`);
  }
}

export class AlreadyExistsError extends ZkpAuthError {
  constructor(username: string) {
    super('AlreadyExists', `user "${username}" is already registered`);
  }
}

export class SessionNotFoundError extends ZkpAuthError {
  constructor() {
    super('SessionNotFound', 'no login attempt is awaiting a response under this session id');
  }
}

export class SessionExpiredError extends ZkpAuthError {
  constructor() {
    super('SessionExpired', 'login attempt expired; start again with a fresh commitment');
  }
}

/**
 * Proof rejected. The message is the same whatever the cause, so callers learn
 * nothing about which check failed.
 */
export class RejectedError extends ZkpAuthError {
  constructor() {
    super('Rejected', 'proof rejected');
  }
}

export class InvalidCredentialError extends ZkpAuthError {
  constructor(message = 'session credential is invalid or expired') {
    super('InvalidCredential', message);
  }
}

export class MalformedRequestError extends ZkpAuthError {
  constructor(message: string) {
    super('MalformedRequest', message);
  }
}

/** Rebuild the typed error for a code received over the wire. */
export function errorFromCode(code: string, message: string): ZkpAuthError {
  const err = blankError(code);
  err.message = message;
  return err;
}

function blankError(code: string): ZkpAuthError {
  switch (code) {
    case 'InvalidElement': return new InvalidElementError();
    case 'UnknownUser': return new UnknownUserError('');
    case 'AlreadyExists': return new AlreadyExistsError('');
    case 'SessionNotFound': return new SessionNotFoundError();
    case 'SessionExpired': return new SessionExpiredError();
    case 'Rejected': return new RejectedError();
    case 'InvalidCredential': return new InvalidCredentialError();
    default: return new MalformedRequestError(`unexpected error code "${code}"`);
  }
}
