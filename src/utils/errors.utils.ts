/**
 * Error Hierarchy
 *
 * Every failure a caller can see is an AppError with:
 * - code: stable machine-readable kind (maps to an HTTP status)
 * - reason: finer reason code, e.g. BLOB_MISSING vs SAMPLE_NOT_FOUND
 * - message: human-readable, never containing paths, stacks or digests
 */

export type ErrorCode =
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'DUPLICATE_ACTIVE_REQUEST'
  | 'SELF_APPROVAL_FORBIDDEN'
  | 'NOT_APPROVED'
  | 'GRANT_EXPIRED'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'STORAGE_IO_ERROR'
  | 'PERSISTENCE_TIMEOUT'
  | 'VALIDATION_ERROR'
  | 'CONFLICT';

/**
 * Base error class for all domain errors
 */
export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    public readonly reason: string = code,
    public readonly recoverable: boolean = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Extra fields written to the audit entry for this failure (never sent to clients)
   */
  auditMetadata(): Record<string, unknown> {
    return {};
  }
}

export class UnauthenticatedError extends AppError {
  constructor(reason: string = 'UNAUTHENTICATED') {
    super('Authentication required. Please log in.', 'UNAUTHENTICATED', 401, reason);
  }
}

export class ForbiddenError extends AppError {
  constructor(reason: string = 'FORBIDDEN', message = 'You do not have permission to perform this action.') {
    super(message, 'FORBIDDEN', 403, reason);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, reason: string = 'NOT_FOUND') {
    super(`${resource} not found`, 'NOT_FOUND', 404, reason);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly from: string,
    public readonly attempted: string
  ) {
    super(`Cannot ${attempted} a ${entity} that is ${from}`, 'INVALID_TRANSITION', 409);
  }

  auditMetadata(): Record<string, unknown> {
    return { from: this.from, attempted: this.attempted };
  }
}

export class DuplicateActiveRequestError extends AppError {
  constructor() {
    super(
      'An active download request already exists for this sample',
      'DUPLICATE_ACTIVE_REQUEST',
      409
    );
  }
}

export class SelfApprovalForbiddenError extends AppError {
  constructor() {
    super('Reviewers cannot decide their own requests', 'SELF_APPROVAL_FORBIDDEN', 403);
  }
}

export class NotApprovedError extends AppError {
  constructor(public readonly status: string) {
    super('This request has not been approved', 'NOT_APPROVED', 403);
  }

  auditMetadata(): Record<string, unknown> {
    return { status: this.status };
  }
}

export class GrantExpiredError extends AppError {
  constructor(public readonly transitioned: boolean) {
    super('The download grant has expired. File a new request.', 'GRANT_EXPIRED', 410);
  }

  auditMetadata(): Record<string, unknown> {
    return this.transitioned ? { from: 'approved', to: 'expired' } : {};
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(public readonly mimeType: string) {
    super(`Media type '${mimeType}' is not accepted`, 'UNSUPPORTED_MEDIA_TYPE', 415);
  }

  auditMetadata(): Record<string, unknown> {
    return { mime_type: this.mimeType };
  }
}

export class StorageIOError extends AppError {
  constructor(reason: string = 'STORAGE_IO_ERROR', cause?: unknown) {
    super('Unable to access sample storage. Please try again.', 'STORAGE_IO_ERROR', 500, reason, true, cause);
  }
}

export class PersistenceTimeoutError extends AppError {
  constructor(cause?: unknown) {
    super('The database did not respond in time. Please try again.', 'PERSISTENCE_TIMEOUT', 503, 'PERSISTENCE_TIMEOUT', true, cause);
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(public readonly errors: FieldError[]) {
    super('Please fix the following errors', 'VALIDATION_ERROR', 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, reason: string = 'CONFLICT') {
    super(message, 'CONFLICT', 409, reason);
  }
}

export function usernameTakenError(): ConflictError {
  return new ConflictError('This username is already taken. Please choose another.', 'USERNAME_TAKEN');
}

export function datasetNameTakenError(): ConflictError {
  return new ConflictError('A dataset with this name already exists.', 'DATASET_NAME_TAKEN');
}

/**
 * Authorization failures are audited as `denied`, everything else as `failure`
 */
export function isAuthorizationError(error: unknown): boolean {
  return (
    error instanceof UnauthenticatedError ||
    error instanceof ForbiddenError ||
    error instanceof SelfApprovalForbiddenError
  );
}

/**
 * Reason code to store for any thrown value
 */
export function reasonCodeOf(error: unknown): string {
  return error instanceof AppError ? error.reason : 'INTERNAL_ERROR';
}
