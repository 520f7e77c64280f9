/**
 * =============================================================================
 * HTTP SERVER
 * =============================================================================
 *
 * REST access to the route tools, for clients that do not speak MCP.
 *
 * ROUTES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ GET  /health, /health/live, /health/ready │ probes                      │
 * │ GET  /api/v1/tools                        │ list tools                  │
 * │ POST /api/v1/tools/:name                  │ invoke a tool               │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * SECURITY:
 * - Helmet security headers
 * - Rate limiting per IP (tighter on tool calls)
 * - Input validation using Zod schemas
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { createServer, Server } from 'http';

import { config } from './config/environment';
import { logger, logError } from './shared/services/logger.service';
import { MapsClient } from './shared/services/google-maps.service';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';

// Routes
import { createHealthRouter } from './shared/routes/health.routes';
import { createToolsRouter } from './modules/tools/tools.routes';
import { ToolsService } from './modules/tools/tools.service';

const API_PREFIX = '/api/v1';
const SHUTDOWN_TIMEOUT_MS = 10000;

// =============================================================================
// APP
// =============================================================================

export function createApp(tools: ToolsService, maps: MapsClient): Express {
  const app = express();

  // Trust the first proxy so rate limiting sees client IPs
  app.set('trust proxy', 1);

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({ threshold: 1024 }));

  app.use(securityHeaders);

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400
  }));

  app.use(express.json({ limit: '100kb' }));

  app.use(requestLogger);

  app.use(rateLimiter);

  // Health & monitoring (no prefix)
  app.use('/', createHealthRouter(maps));

  app.use(`${API_PREFIX}/tools`, createToolsRouter(tools));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// =============================================================================
// START SERVER
// =============================================================================

export function startHttpServer(tools: ToolsService, maps: MapsClient): Server {
  const app = createApp(tools, maps);
  const server = createServer(app);

  server.listen(config.port, config.host, () => {
    logger.info(`HTTP server listening on http://${config.host}:${config.port} (${config.nodeEnv})`);
    if (!maps.isAvailable()) {
      logger.warn('GOOGLE_MAPS_API_KEY not set: route tools will answer with errors');
    }
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close((err) => {
      if (err) {
        logError('Error closing HTTP server', err);
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.once('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.once('SIGINT', () => gracefulShutdown('SIGINT'));

  return server;
}
