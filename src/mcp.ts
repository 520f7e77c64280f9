/**
 * =============================================================================
 * MCP SERVER - stdio transport
 * =============================================================================
 *
 * Registers the four tools on an McpServer. Each handler returns a single
 * text content block; tool failures are already rendered as text by
 * ToolsService, so nothing here sets isError.
 *
 * stdout belongs to the protocol. Logs go to stderr (see logger.service).
 * =============================================================================
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SERVER_INFO } from './core/constants';
import { logger } from './shared/services/logger.service';
import {
  TOOL_DESCRIPTORS,
  findNearestShape,
  getFitnessRouteShape,
  getRouteShape,
  queryRouteShape
} from './modules/tools/tools.schema';
import { ToolsService } from './modules/tools/tools.service';

function textContent(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function createMcpServer(tools: ToolsService): McpServer {
  const server = new McpServer({ name: SERVER_INFO.name, version: SERVER_INFO.version });

  server.registerTool(
    'get_fitness_route',
    {
      title: TOOL_DESCRIPTORS.get_fitness_route.title,
      description: TOOL_DESCRIPTORS.get_fitness_route.description,
      inputSchema: getFitnessRouteShape,
    },
    async (args) => textContent(await tools.getFitnessRoute(args))
  );

  server.registerTool(
    'get_route',
    {
      title: TOOL_DESCRIPTORS.get_route.title,
      description: TOOL_DESCRIPTORS.get_route.description,
      inputSchema: getRouteShape,
    },
    async (args) => textContent(await tools.getRoute(args))
  );

  server.registerTool(
    'find_nearest',
    {
      title: TOOL_DESCRIPTORS.find_nearest.title,
      description: TOOL_DESCRIPTORS.find_nearest.description,
      inputSchema: findNearestShape,
    },
    async (args) => textContent(await tools.findNearest(args))
  );

  server.registerTool(
    'query_route',
    {
      title: TOOL_DESCRIPTORS.query_route.title,
      description: TOOL_DESCRIPTORS.query_route.description,
      inputSchema: queryRouteShape,
    },
    async (args) => textContent(await tools.queryRoute(args))
  );

  return server;
}

export async function startStdioServer(tools: ToolsService): Promise<McpServer> {
  const server = createMcpServer(tools);
  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_INFO.name} MCP server listening on stdio`);
  return server;
}
