export {
  TrustError,
  NotFoundError,
  UnknownDelegationError,
  PathNotAuthorizedError,
  PathConflictError,
  ThresholdNotMetError,
  InvalidRootKeysError,
  InvalidRoleError,
  AlreadyInitializedError,
  NotInitializedError,
  PublishInProgressError,
  PublishCancelledError,
  SessionFailedError,
  UnimplementedError,
  TransportError,
  DetailedValidationError,
  isTrustError,
} from './trust_errors';

export type { TrustErrorCode, NotFoundKind, FieldError } from './trust_errors';
