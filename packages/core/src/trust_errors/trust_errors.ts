/**
 * Error taxonomy for the trust engine.
 *
 * Every error carries the offending role/path/key as fields so callers can
 * report exactly what failed without parsing the message.
 */

export type TrustErrorCode =
  | 'NOT_FOUND'
  | 'UNKNOWN_DELEGATION'
  | 'PATH_NOT_AUTHORIZED'
  | 'PATH_CONFLICT'
  | 'THRESHOLD_NOT_MET'
  | 'INVALID_ROOT_KEYS'
  | 'INVALID_ROLE'
  | 'ALREADY_INITIALIZED'
  | 'NOT_INITIALIZED'
  | 'PUBLISH_IN_PROGRESS'
  | 'PUBLISH_CANCELLED'
  | 'SESSION_FAILED'
  | 'UNIMPLEMENTED'
  | 'TRANSPORT_ERROR'
  | 'DETAILED_VALIDATION_ERROR';

/**
 * Base class for all trust engine errors.
 */
export class TrustError extends Error {
  constructor(message: string, public readonly code: TrustErrorCode) {
    super(message);
    this.name = "TrustError";
    Object.setPrototypeOf(this, TrustError.prototype);
  }
}

export type NotFoundKind = 'role' | 'delegation' | 'target' | 'key' | 'config';

export class NotFoundError extends TrustError {
  constructor(public readonly kind: NotFoundKind, public readonly identifier: string) {
    super(`${kind} not found: ${identifier}`, 'NOT_FOUND');
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Thrown when a delegation mutation other than create names a delegation
 * that does not exist.
 */
export class UnknownDelegationError extends TrustError {
  constructor(public readonly delegation: string) {
    super(`Unknown delegation: ${delegation}`, 'UNKNOWN_DELEGATION');
    this.name = "UnknownDelegationError";
    Object.setPrototypeOf(this, UnknownDelegationError.prototype);
  }
}

export class PathNotAuthorizedError extends TrustError {
  constructor(public readonly role: string, public readonly path: string) {
    super(`Role ${role} is not authorized to sign for path "${path}"`, 'PATH_NOT_AUTHORIZED');
    this.name = "PathNotAuthorizedError";
    Object.setPrototypeOf(this, PathNotAuthorizedError.prototype);
  }
}

/**
 * Thrown when paths added to a delegation are not within its parent's paths.
 */
export class PathConflictError extends TrustError {
  constructor(
    public readonly role: string,
    public readonly parent: string,
    public readonly paths: string[]
  ) {
    super(
      `Paths [${paths.join(', ')}] of ${role} are not within the paths of its parent ${parent}`,
      'PATH_CONFLICT'
    );
    this.name = "PathConflictError";
    Object.setPrototypeOf(this, PathConflictError.prototype);
  }
}

export class ThresholdNotMetError extends TrustError {
  constructor(
    public readonly role: string,
    public readonly threshold: number,
    public readonly validSignatures: number,
    public readonly keyIds: string[]
  ) {
    super(
      `Role ${role} requires ${threshold} valid signature(s), got ${validSignatures}`,
      'THRESHOLD_NOT_MET'
    );
    this.name = "ThresholdNotMetError";
    Object.setPrototypeOf(this, ThresholdNotMetError.prototype);
  }
}

export class InvalidRootKeysError extends TrustError {
  constructor(public readonly keyIds: string[]) {
    super(`Root key(s) unknown to key custody: ${keyIds.join(', ')}`, 'INVALID_ROOT_KEYS');
    this.name = "InvalidRootKeysError";
    Object.setPrototypeOf(this, InvalidRootKeysError.prototype);
  }
}

/**
 * Thrown when a role would break its own invariants (threshold bounds,
 * naming, server-managed restrictions).
 */
export class InvalidRoleError extends TrustError {
  constructor(public readonly role: string, public readonly reason: string) {
    super(`Invalid role ${role}: ${reason}`, 'INVALID_ROLE');
    this.name = "InvalidRoleError";
    Object.setPrototypeOf(this, InvalidRoleError.prototype);
  }
}

export class AlreadyInitializedError extends TrustError {
  constructor(public readonly gun: string) {
    super(`Trust data for ${gun} is already initialized`, 'ALREADY_INITIALIZED');
    this.name = "AlreadyInitializedError";
    Object.setPrototypeOf(this, AlreadyInitializedError.prototype);
  }
}

export class NotInitializedError extends TrustError {
  constructor(public readonly gun: string, public readonly operation: string) {
    super(`Cannot ${operation}: trust data for ${gun} is not initialized`, 'NOT_INITIALIZED');
    this.name = "NotInitializedError";
    Object.setPrototypeOf(this, NotInitializedError.prototype);
  }
}

export class PublishInProgressError extends TrustError {
  constructor(public readonly gun: string) {
    super(`A publish for ${gun} is already in progress`, 'PUBLISH_IN_PROGRESS');
    this.name = "PublishInProgressError";
    Object.setPrototypeOf(this, PublishInProgressError.prototype);
  }
}

export class PublishCancelledError extends TrustError {
  constructor(public readonly gun: string) {
    super(`Publish for ${gun} was cancelled before signing`, 'PUBLISH_CANCELLED');
    this.name = "PublishCancelledError";
    Object.setPrototypeOf(this, PublishCancelledError.prototype);
  }
}

/**
 * A publish committed but its changelist could not be cleared. Only
 * reads and deleteTrustData are accepted afterwards.
 */
export class SessionFailedError extends TrustError {
  constructor(public readonly gun: string, public readonly operation: string) {
    super(`Cannot ${operation}: the session for ${gun} failed after committing a publish`, 'SESSION_FAILED');
    this.name = "SessionFailedError";
    Object.setPrototypeOf(this, SessionFailedError.prototype);
  }
}

/**
 * The operation is not available in this backend configuration.
 * Not a transient failure: retrying will not help.
 */
export class UnimplementedError extends TrustError {
  public readonly retryable = false;

  constructor(public readonly operation: string, public readonly reason: string) {
    super(`${operation} is not available: ${reason}`, 'UNIMPLEMENTED');
    this.name = "UnimplementedError";
    Object.setPrototypeOf(this, UnimplementedError.prototype);
  }
}

/**
 * Opaque failure raised by a collaborator (remote authority, transport).
 * The core rethrows it unchanged.
 */
export class TransportError extends TrustError {
  constructor(message: string, public readonly origin?: unknown) {
    super(message, 'TRANSPORT_ERROR');
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export type FieldError = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Schema validation failure with field-level detail.
 */
export class DetailedValidationError extends TrustError {
  constructor(public readonly entity: string, public readonly errors: FieldError[]) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');
    super(`${entity} validation failed: ${errorSummary}`, 'DETAILED_VALIDATION_ERROR');
    this.name = "DetailedValidationError";
    Object.setPrototypeOf(this, DetailedValidationError.prototype);
  }
}

export function isTrustError(error: unknown): error is TrustError {
  return error instanceof TrustError;
}
