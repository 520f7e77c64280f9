/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 *
 * Standardized envelope for the HTTP surface.
 *
 * RESPONSE FORMAT:
 * ```json
 * { "success": true,  "data": { ... }, "meta": { "timestamp": "...", "requestId": "..." } }
 * { "success": false, "error": { "code": "VAL_2001", "message": "...", "details": { ... } } }
 * ```
 *
 * USAGE:
 * ```typescript
 * return ApiResponse.success(res, { tool: 'get_route', text });
 * return ApiResponse.error(res, new ValidationError('origin: Required'));
 * ```
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';
import { AppError, ErrorResponse } from '../errors/AppError';

export interface SuccessResponse<T> {
  success: true;
  data: T;
  meta: ResponseMeta;
}

export interface ResponseMeta {
  timestamp: string;
  requestId?: string;
  [key: string]: unknown;
}

function requestIdOf(res: Response): string | undefined {
  const header = res.getHeader('X-Request-ID');
  return typeof header === 'string' ? header : undefined;
}

export class ApiResponse {
  /**
   * 200 OK
   */
  static success<T>(res: Response, data: T, meta?: Record<string, unknown>): Response {
    const requestId = requestIdOf(res);
    const response: SuccessResponse<T> = {
      success: true,
      data,
      meta: {
        timestamp: new Date().toISOString(),
        ...(requestId && { requestId }),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }

  /**
   * AppError -> its status code and JSON body
   */
  static error(res: Response, error: AppError): Response {
    const body: ErrorResponse = error.toJSON();
    return res.status(error.statusCode).json(body);
  }
}
