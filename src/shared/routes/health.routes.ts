/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health       - Quick health check
 * - GET /health/live  - Liveness probe (is the process running?)
 * - GET /health/ready - Readiness probe (is a Maps key configured?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { HTTP_STATUS } from '../../core/constants';
import { MapsClient } from '../services/google-maps.service';

export function createHealthRouter(maps: MapsClient): Router {
  const router = Router();
  const startTime = Date.now();

  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  // Without a key every tool answers with an error string
  router.get('/health/ready', (_req: Request, res: Response) => {
    const checks = { googleMaps: maps.isAvailable() };
    const ready = Object.values(checks).every(Boolean);

    res.status(ready ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
