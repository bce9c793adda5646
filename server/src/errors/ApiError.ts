/**
 * API Error Class Hierarchy
 *
 * Standardized error responses across all API endpoints. Each error type
 * maps to an HTTP status code and carries structured details for clients.
 *
 * ## Usage
 *
 * ```typescript
 * throw new ProviderNotReadyError(provider.id, provider.name);
 *
 * // In error middleware:
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse());
 * }
 * ```
 */

export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Not found errors (404)
  NOT_FOUND: 'NOT_FOUND',
  PROVIDER_NOT_FOUND: 'PROVIDER_NOT_FOUND',

  // Validation errors (400)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',

  // Conflict errors (409)
  CONFLICT: 'CONFLICT',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',

  // Internal errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Service unavailable (503)
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  PROVIDER_NOT_READY: 'PROVIDER_NOT_READY',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base API Error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode = ErrorCodes.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, 404, code, details);
  }
}

export class ProviderNotFoundApiError extends NotFoundError {
  constructor(providerId: string) {
    super(`provider ${providerId} not found`, ErrorCodes.PROVIDER_NOT_FOUND, { providerId });
  }
}

// =============================================================================
// Validation Errors (400)
// =============================================================================

export class ValidationError extends ApiError {
  constructor(
    message: string = 'Invalid input',
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 400, code, details);
  }
}

// =============================================================================
// Conflict Errors (409)
// =============================================================================

export class ConflictError extends ApiError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode = ErrorCodes.CONFLICT,
    details?: Record<string, unknown>
  ) {
    super(message, 409, code, details);
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 500, code, details, false);
  }
}

// =============================================================================
// Service Unavailable (503)
// =============================================================================

export class ServiceUnavailableError extends ApiError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode = ErrorCodes.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, 503, code, details);
  }
}

/**
 * Raised when a request targets a provider the health monitor has marked
 * not_ready
 */
export class ProviderNotReadyError extends ServiceUnavailableError {
  constructor(providerId: string, name: string) {
    super(`provider '${name}' is not ready`, ErrorCodes.PROVIDER_NOT_READY, { providerId, name });
  }
}
