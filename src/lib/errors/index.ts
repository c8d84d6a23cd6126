export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static validation(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(message, details);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }

  toJSON(): { code: string; message: string; statusCode: number; details?: Record<string, unknown> } {
    return { code: this.code, message: this.message, statusCode: this.statusCode, details: this.details };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404, true);
  }
}

// ============================================================================
// VERIFICATION
// ============================================================================

export type VerificationFailureCode =
  | 'METHOD_NOT_ALLOWED'
  | 'LOCATION_ACCURACY_INSUFFICIENT'
  | 'LOCATION_OUTSIDE_GEOFENCE'
  | 'BIOMETRIC_LOW_CONFIDENCE'
  | 'PIN_MISMATCH'
  | 'PIN_LOCKED_OUT'
  | 'TOKEN_EXPIRED_OR_REUSED'
  | 'REMOTE_WORK_NOT_ALLOWED';

/** Terminal, local, user-correctable */
export class VerificationFailure extends AppError {
  declare public readonly code: VerificationFailureCode;

  constructor(code: VerificationFailureCode, message: string, details?: Record<string, unknown>) {
    super(message, code, 403, true, details);
  }
}

// ============================================================================
// DERIVATION
// ============================================================================

export type DerivationErrorCode = 'MISSING_POLICY' | 'MISSING_SHIFT_TEMPLATE' | 'UNPAIRED_EVENTS';

/** Configuration or programming bug: never approximate a result */
export class DerivationError extends AppError {
  declare public readonly code: DerivationErrorCode;

  constructor(code: DerivationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, code, 422, false, details);
  }
}

// ============================================================================
// SYNC
// ============================================================================

export type SyncErrorCode =
  | 'NETWORK_UNAVAILABLE'
  | 'SERVER_TIMEOUT'
  | 'SERVER_UNAVAILABLE'
  | 'SERVER_REJECTED'
  | 'CONFLICT';

const TRANSIENT_SYNC_CODES: ReadonlySet<SyncErrorCode> = new Set([
  'NETWORK_UNAVAILABLE',
  'SERVER_TIMEOUT',
  'SERVER_UNAVAILABLE',
]);

export class SyncError extends AppError {
  declare public readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, code, code === 'SERVER_TIMEOUT' ? 504 : 503, true, details);
  }

  get isTransient(): boolean {
    return TRANSIENT_SYNC_CODES.has(this.code);
  }
}

// ============================================================================
// STORAGE / STATE
// ============================================================================

/** Fatal for the current operation; the queue log is left untouched */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', 500, false, cause instanceof Error ? { cause: cause.message } : undefined);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_TRANSITION', 409, false, details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
