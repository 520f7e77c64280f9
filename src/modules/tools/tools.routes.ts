/**
 * =============================================================================
 * TOOLS MODULE - ROUTES
 * =============================================================================
 *
 * HTTP access to the same four tools the MCP server exposes.
 *
 * ENDPOINTS:
 * - GET  /tools        - List tools
 * - POST /tools/:name  - Invoke a tool; JSON body = tool arguments
 *
 * A tool that fails still answers 200 with its "Error: ..." text; only
 * malformed arguments (400) and unknown tools (404) are HTTP errors.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { toolsRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { ToolsService } from './tools.service';

export function createToolsRouter(tools: ToolsService): Router {
  const router = Router();

  /**
   * @route   GET /tools
   * @desc    Tool names, titles and descriptions
   */
  router.get('/', (_req: Request, res: Response) => {
    ApiResponse.success(res, { tools: tools.listTools() });
  });

  /**
   * @route   POST /tools/:name
   * @desc    Invoke one tool
   * @body    Tool arguments, e.g. { "origin": "Chicago, IL", "target_calories": 300 }
   */
  router.post(
    '/:name',
    toolsRateLimiter,
    asyncHandler(async (req: Request, res: Response) => {
      const name = req.params.name;
      const text = await tools.invoke(name, req.body);
      ApiResponse.success(res, { tool: name, text });
    })
  );

  return router;
}
