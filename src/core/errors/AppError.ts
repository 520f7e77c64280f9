/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a validator
 * throw new ValidationError('Calories must be at least 10', ErrorCode.CALORIES_OUT_OF_RANGE);
 *
 * // In a tool handler
 * if (isOperationalError(error)) return `Error: ${error.message}`;
 * ```
 *
 * Tool boundaries turn every AppError into a single `Error: ...` line;
 * the HTTP surface maps them onto status codes.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - bad mode, calorie target or location
 */
export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, details);
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const fields = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    const first = fields[0];
    const message = first
      ? (first.field ? `${first.field}: ${first.message}` : first.message)
      : 'Validation failed';
    return new ValidationError(message, ErrorCode.VALIDATION_ERROR, { fields });
  }
}

/**
 * 503 Lookup Unavailable - geocoding or places could not answer
 */
export class LookupUnavailableError extends AppError {
  constructor(
    message: string = 'Lookup service unavailable',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, ErrorCode.LOOKUP_UNAVAILABLE, true, details);
  }
}

/**
 * 502 Provider Error - directions status not OK, HTTP or transport failure
 */
export class ProviderError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.PROVIDER_ERROR,
    details?: Record<string, unknown>
  ) {
    const statusCode = code === ErrorCode.PROVIDER_TIMEOUT
      ? HTTP_STATUS.GATEWAY_TIMEOUT
      : HTTP_STATUS.BAD_GATEWAY;
    super(message, statusCode, code, true, details);
  }
}

/**
 * 404 No Result Found - no gym, place or waypoint nearby
 */
export class NoResultFoundError extends AppError {
  constructor(
    message: string = 'No result found',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, ErrorCode.NO_RESULT_FOUND, true, details);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Best-effort message extraction for unknown throwables
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
