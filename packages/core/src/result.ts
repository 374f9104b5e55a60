import {
  FileSystemError,
  LockTimeoutError,
  ValidationError,
  VersionConflictError,
} from './errors.js';

/** Failure categories shared by every public coordination operation. */
export const ErrorKind = {
  NotFound: 'not_found',
  CapacityExceeded: 'capacity_exceeded',
  PermissionDenied: 'permission_denied',
  Conflict: 'conflict',
  CorruptState: 'corrupt_state',
  IOFailure: 'io_failure',
  InvalidInput: 'invalid_input',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Structured failure value. `reason` is a stable machine-readable code
 * (e.g. `session_full`, `self_validation_forbidden`); `message` is for humans.
 */
export interface Failure<R extends string = string> {
  ok: false;
  error: ErrorKind;
  reason: R;
  message: string;
  details?: Record<string, unknown>;
}

/** Build a failure value. */
export function failure<R extends string>(
  error: ErrorKind,
  reason: R,
  message: string,
  details?: Record<string, unknown>,
): Failure<R> {
  return details ? { ok: false, error, reason, message, details } : { ok: false, error, reason, message };
}

/** Narrow an outcome union to its failure branch. */
export function isFailure<T extends { ok: boolean }>(
  outcome: T,
): outcome is Extract<T, { ok: false }> {
  return !outcome.ok;
}

/**
 * Translate an exception raised by the storage layer into a failure value.
 * Errors that are not storage errors are rethrown: they indicate bugs.
 */
export function failureFromError(err: unknown): Failure {
  if (err instanceof VersionConflictError) {
    return failure(ErrorKind.Conflict, 'version_conflict', err.message, {
      documentId: err.documentId,
      attempts: err.attempts,
    });
  }
  if (err instanceof FileSystemError || err instanceof LockTimeoutError) {
    return failure(ErrorKind.IOFailure, 'storage_unavailable', err.message, {
      filePath: err.filePath,
    });
  }
  if (err instanceof ValidationError) {
    return failure(ErrorKind.InvalidInput, 'schema_violation', err.message, {
      schema: err.path,
      errors: err.details,
    });
  }
  throw err;
}
