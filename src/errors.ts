// ── Error codes ──────────────────────────────────────────────────

export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  CONFLICT: 'CONFLICT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  RATE_LIMITED: 'RATE_LIMITED',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// ── Errors ───────────────────────────────────────────────────────

export class StorewardError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'StorewardError';
    this.code = code;
    this.details = details;
  }
}

/** The reserved account could not be reached, timed out, or answered with a 5xx. */
export class BackingStoreError extends StorewardError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.BACKEND_UNAVAILABLE, message, details);
    this.name = 'BackingStoreError';
  }
}

export class ConfigurationError extends StorewardError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.CONFIGURATION_ERROR, message, details);
    this.name = 'ConfigurationError';
  }
}

export function isStorewardError(error: unknown): error is StorewardError {
  return error instanceof StorewardError;
}
