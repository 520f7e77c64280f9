/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Request ID tracking (X-Request-ID, generated when absent)
 * - Helmet security headers for a JSON-only API
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = req.get('x-request-id')?.trim();
  const requestId = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Security headers using Helmet
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});
