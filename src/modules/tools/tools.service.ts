/**
 * =============================================================================
 * TOOLS SERVICE - The four tool operations
 * =============================================================================
 *
 * Shared by the stdio MCP server and the HTTP surface. Every tool resolves
 * to exactly one text block; failures are rendered as text too:
 *
 *   ProviderError      -> "Error getting directions: <reason>"
 *   NoResultFoundError -> "<message>" (not an error to the caller)
 *   other AppError     -> "Error: <message>"
 *
 * Services are built once from a MapsClient and the read-only config.
 * =============================================================================
 */

import { z } from 'zod';
import { AppError, NoResultFoundError, ProviderError, ValidationError, getErrorMessage } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { logger } from '../../shared/services/logger.service';
import { MapsClient } from '../../shared/services/google-maps.service';
import { FitnessService } from '../fitness/fitness.service';
import { normalizeLocation } from '../fitness/fitness.schema';
import {
  formatDirectionsReport,
  formatFitnessPlan,
  formatNearestPlace,
  formatNoPlaceFound
} from '../fitness/report.formatter';
import { LocationVerifier } from '../places/location-verifier.service';
import { validatePlaceType, validateRadiusKm } from '../places/places.schema';
import { PlacesService } from '../places/places.service';
import { classifyQuery } from '../query/intent.service';
import { DirectionsService } from '../routing/directions.service';
import { RoutingService } from '../routing/routing.service';
import { WaypointService } from '../routing/waypoint.service';
import {
  FindNearestArgs,
  GetFitnessRouteArgs,
  GetRouteArgs,
  QueryRouteArgs,
  TOOL_DESCRIPTORS,
  TOOL_NAMES,
  ToolDescriptor,
  ToolName,
  findNearestSchema,
  getFitnessRouteSchema,
  getRouteSchema,
  queryRouteSchema
} from './tools.schema';

export interface ToolsServiceOptions {
  /** Origin used by query_route */
  defaultOrigin: string;
  /** Timeout of the best-effort location check */
  locationCheckTimeoutMs: number;
}

/**
 * Render any failure as the tool's text answer
 */
export function renderToolError(error: unknown): string {
  if (error instanceof ProviderError) {
    return `Error getting directions: ${error.message}`;
  }
  if (error instanceof NoResultFoundError) {
    return error.message;
  }
  if (error instanceof AppError) {
    return `Error: ${error.message}`;
  }
  logger.error('Unexpected tool failure', { error: getErrorMessage(error) });
  return `Error: ${getErrorMessage(error)}`;
}

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(toolName => toolName === name);
}

export class ToolsService {
  private readonly fitness: FitnessService;
  private readonly directions: DirectionsService;
  private readonly places: PlacesService;
  private readonly verifier: LocationVerifier;

  constructor(maps: MapsClient, private readonly options: ToolsServiceOptions) {
    const routing = new RoutingService(maps);
    const waypoints = new WaypointService(maps);
    this.places = new PlacesService(maps);
    this.verifier = new LocationVerifier(maps, options.locationCheckTimeoutMs);
    this.directions = new DirectionsService(routing, waypoints, this.verifier);
    this.fitness = new FitnessService({ routing, waypoints, places: this.places, verifier: this.verifier });
  }

  listTools(): ToolDescriptor[] {
    return TOOL_NAMES.map(name => TOOL_DESCRIPTORS[name]);
  }

  // ===========================================================================
  // TOOLS
  // ===========================================================================

  async getFitnessRoute(args: GetFitnessRouteArgs): Promise<string> {
    return this.run('get_fitness_route', async () => {
      const plan = await this.fitness.planFitnessRoute({
        origin: args.origin,
        targetCalories: args.target_calories,
        destination: args.destination,
        mode: args.mode,
      });
      return formatFitnessPlan(plan);
    });
  }

  async getRoute(args: GetRouteArgs): Promise<string> {
    return this.run('get_route', async () => {
      const route = await this.directions.getDirections({
        origin: args.origin,
        destination: args.destination,
        mode: args.mode,
      });
      return formatDirectionsReport(route);
    });
  }

  async findNearest(args: FindNearestArgs): Promise<string> {
    return this.run('find_nearest', async () => {
      const origin = normalizeLocation(args.origin);
      const placeType = validatePlaceType(args.place_type);
      const radiusMeters = validateRadiusKm(args.radius_km);

      await this.verifier.verify(origin);

      const place = await this.places.findNearbyPlace(origin, placeType, radiusMeters);
      if (!place) {
        throw new NoResultFoundError(
          formatNoPlaceFound(placeType, args.radius_km, origin),
          { placeType, radiusMeters }
        );
      }
      return formatNearestPlace(placeType, place);
    });
  }

  async queryRoute(args: QueryRouteArgs): Promise<string> {
    const intent = classifyQuery(args.query);
    logger.info(`query_route intent: ${intent.kind}`);

    switch (intent.kind) {
      case 'fitness_route':
        if (!intent.targetCalories) {
          return "Error: Could not find calorie amount in query. Please include something like 'burn 300 calories'.";
        }
        return this.getFitnessRoute({
          origin: this.options.defaultOrigin,
          target_calories: intent.targetCalories,
          destination: undefined,
          mode: 'walking',
        });
      case 'directions':
        return this.getRoute({
          origin: this.options.defaultOrigin,
          destination: undefined,
          mode: 'driving',
        });
      case 'unknown':
        return `Could not understand query intent. Detected: ${intent.kind}. Please be more specific about what you need.`;
    }
  }

  /**
   * Validate raw arguments against the tool's shape, then dispatch.
   * Argument and unknown-tool errors are thrown; tool failures are text.
   */
  async invoke(name: string, rawArgs: unknown): Promise<string> {
    if (!isToolName(name)) {
      throw new AppError(`Unknown tool: ${name}`, HTTP_STATUS.NOT_FOUND, ErrorCode.UNKNOWN_TOOL, true, { tools: TOOL_NAMES });
    }

    switch (name) {
      case 'get_fitness_route':
        return this.getFitnessRoute(parseArgs(getFitnessRouteSchema, rawArgs));
      case 'get_route':
        return this.getRoute(parseArgs(getRouteSchema, rawArgs));
      case 'find_nearest':
        return this.findNearest(parseArgs(findNearestSchema, rawArgs));
      case 'query_route':
        return this.queryRoute(parseArgs(queryRouteSchema, rawArgs));
    }
  }

  private async run(tool: ToolName, fn: () => Promise<string>): Promise<string> {
    const startTime = Date.now();
    try {
      const text = await fn();
      logger.info(`${tool} completed in ${Date.now() - startTime}ms`);
      return text;
    } catch (error) {
      logger.warn(`${tool} failed: ${getErrorMessage(error)}`);
      return renderToolError(error);
    }
  }
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rawArgs: unknown): T {
  const parsed = schema.safeParse(rawArgs ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return parsed.data;
}
