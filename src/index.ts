#!/usr/bin/env node
/**
 * =============================================================================
 * ENTRY POINT
 * =============================================================================
 *
 * TRANSPORT=stdio (default) -> MCP server on stdin/stdout
 * TRANSPORT=http            -> Express server on PORT
 * =============================================================================
 */

import { config } from './config/environment';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { logger, logError } from './shared/services/logger.service';
import { GoogleMapsService } from './shared/services/google-maps.service';
import { ToolsService } from './modules/tools/tools.service';
import { startStdioServer } from './mcp';
import { startHttpServer } from './server';

validateAndLogEnvironment();

const maps = new GoogleMapsService({
  apiKey: config.googleMaps.apiKey,
  timeoutMs: config.timeouts.requestMs,
});

const tools = new ToolsService(maps, {
  defaultOrigin: config.defaultOrigin,
  locationCheckTimeoutMs: config.timeouts.locationCheckMs,
});

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', reason);
  process.exit(1);
});

if (config.transport === 'http') {
  startHttpServer(tools, maps);
} else {
  startStdioServer(tools).catch((error: unknown) => {
    logError('Failed to start MCP server', error);
    process.exit(1);
  });
}

logger.debug(`Transport: ${config.transport}`);
