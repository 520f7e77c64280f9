/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for the HTTP surface.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { AppError, ValidationError } from '../../core/errors/AppError';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { logger } from '../services/logger.service';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // express.json() rejects malformed bodies with a SyntaxError
  if (error instanceof SyntaxError) {
    logger.warn('Malformed JSON body', { path: req.path, method: req.method });
    ApiResponse.error(res, new ValidationError('Malformed JSON body'));
    return;
  }

  if (error instanceof AppError) {
    const logData = {
      error: error.message,
      code: error.code,
      path: req.path,
      method: req.method
    };
    if (error.statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
      logger.error('Request error', logData);
    } else {
      logger.warn('Request error', logData);
    }
    ApiResponse.error(res, error);
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  // SECURITY: Never expose internal error details in production
  ApiResponse.error(res, new AppError(
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message,
    HTTP_STATUS.INTERNAL_ERROR,
    ErrorCode.INTERNAL_ERROR,
    false
  ));
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  ApiResponse.error(res, new AppError(
    `Cannot ${req.method} ${req.path}`,
    HTTP_STATUS.NOT_FOUND,
    ErrorCode.NOT_FOUND
  ));
}
