/**
 * Error taxonomy for a provisioning run.
 *
 * Every error carries the operation that was attempted and, when the provider
 * answered, its status and response body so a halted run can be diagnosed by
 * hand. Messages never include the token or a secret value.
 */

export type SetupErrorCode =
  | 'CONFIG'
  | 'AUTH'
  | 'PROVISION'
  | 'TRANSPORT'
  | 'UPLOAD'
  | 'UPLOAD_CONFLICT'
  | 'KEY_FORMAT'
  | 'SECRET_WRITE';

export type SetupErrorDetails = {
  /** Attempted operation, e.g. `GET /repos/octo/stream` */
  operation?: string;
  /** HTTP status returned by the provider (if any) */
  status?: number;
  /** Provider response body, kept for diagnostics */
  responseBody?: unknown;
  /** Underlying error */
  cause?: unknown;
};

/**
 * Base error class for all provisioning errors
 */
export class SetupError extends Error {
  public readonly code: SetupErrorCode;
  public readonly operation: string | undefined;
  public readonly status: number | undefined;
  public readonly responseBody: unknown;
  public readonly cause: unknown;

  constructor(code: SetupErrorCode, message: string, details: SetupErrorDetails = {}) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.operation = details.operation;
    this.status = details.status;
    this.responseBody = details.responseBody;
    this.cause = details.cause;
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}

/**
 * Local inputs are missing or malformed; raised before any network call
 */
export class ConfigError extends SetupError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string, details: SetupErrorDetails = {}) {
    super('CONFIG', message, details);
    this.name = 'ConfigError';
    this.field = field;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * The credential was rejected; raised before any mutation
 */
export class AuthError extends SetupError {
  constructor(message: string, details: SetupErrorDetails = {}) {
    super('AUTH', message, details);
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * Repository create/reuse or public key retrieval failed
 */
export class ProvisionError extends SetupError {
  constructor(message: string, details: SetupErrorDetails = {}) {
    super('PROVISION', message, details);
    this.name = 'ProvisionError';
    Object.setPrototypeOf(this, ProvisionError.prototype);
  }
}

/**
 * Network-level fault (DNS, TLS, reset, timeout). Never retried.
 */
export class TransportError extends SetupError {
  constructor(message: string, details: SetupErrorDetails = {}) {
    super('TRANSPORT', message, details);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * A file write was rejected for a reason other than a marker conflict
 */
export class UploadError extends SetupError {
  public readonly path: string;

  constructor(path: string, message: string, details: SetupErrorDetails = {}, code: SetupErrorCode = 'UPLOAD') {
    super(code, message, details);
    this.name = 'UploadError';
    this.path = path;
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * The revision marker sent with a write no longer matches the remote content
 */
export class UploadConflict extends UploadError {
  public readonly revisionMarker: string | undefined;

  constructor(path: string, revisionMarker: string | undefined, details: SetupErrorDetails = {}) {
    super(
      path,
      `Conflict writing ${path}: remote content changed since it was probed`,
      details,
      'UPLOAD_CONFLICT',
    );
    this.name = 'UploadConflict';
    this.revisionMarker = revisionMarker;
    Object.setPrototypeOf(this, UploadConflict.prototype);
  }
}

/**
 * The provider public key is not a valid 32-byte base64 key
 */
export class KeyFormatError extends SetupError {
  constructor(message: string, details: SetupErrorDetails = {}) {
    super('KEY_FORMAT', message, details);
    this.name = 'KeyFormatError';
    Object.setPrototypeOf(this, KeyFormatError.prototype);
  }
}

/**
 * A single secret slot rejected its write. Recorded, never halts the others.
 */
export class SecretWriteError extends SetupError {
  public readonly secretName: string;

  constructor(secretName: string, message: string, details: SetupErrorDetails = {}) {
    super('SECRET_WRITE', message, details);
    this.name = 'SecretWriteError';
    this.secretName = secretName;
    Object.setPrototypeOf(this, SecretWriteError.prototype);
  }
}

export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}
