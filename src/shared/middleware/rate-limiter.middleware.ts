/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * In-memory, per-IP limits (single process, no shared store).
 *
 * - rateLimiter:      every route
 * - toolsRateLimiter: tool invocations, which spend Google Maps quota
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { logger } from '../services/logger.service';

function limitExceededBody(message: string) {
  return {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message
    }
  };
}

/**
 * Default rate limiter for all routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests * 5,
  statusCode: HTTP_STATUS.TOO_MANY_REQUESTS,
  message: limitExceededBody('Too many requests. Please try again later.'),
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => config.isTest
});

/**
 * Tool invocations: each call may fan out to several Maps requests
 */
export const toolsRateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  statusCode: HTTP_STATUS.TOO_MANY_REQUESTS,
  keyGenerator: (req) => `tools:${req.ip || 'unknown'}`,
  handler: (req, res, _next, options) => {
    logger.warn('Tool rate limit exceeded', { ip: req.ip, path: req.path });
    res.status(options.statusCode).json(limitExceededBody('Too many tool calls. Please slow down.'));
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => config.isTest
});
