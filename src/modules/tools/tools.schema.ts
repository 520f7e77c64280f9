/**
 * =============================================================================
 * TOOLS MODULE - INPUT SHAPES
 * =============================================================================
 *
 * One zod raw shape per tool. The MCP server registers the shapes as-is;
 * the HTTP surface wraps them in z.object() to validate request bodies.
 *
 * Shapes only check types. Range and format rules live in the service
 * validators so both transports report them the same way.
 * =============================================================================
 */

import { z } from 'zod';
import { ROUTE_PLANNING, TravelMode } from '../../core/constants';

export const TOOL_NAMES = ['get_fitness_route', 'get_route', 'find_nearest', 'query_route'] as const;

export type ToolName = typeof TOOL_NAMES[number];

const locationField = (what: string) => z.string()
  .describe(`${what} (e.g. "Chicago, IL", "123 Main St, Chicago, IL", "41.8781,-87.6298" or "current location")`);

// =============================================================================
// SHAPES
// =============================================================================

export const getFitnessRouteShape = {
  origin: locationField('Starting location'),
  target_calories: z.number().describe('Calories to burn, 10 to 10000'),
  destination: locationField('Optional end location; omit for a loop back to origin').nullish(),
  mode: z.string().default(TravelMode.WALKING).describe('walking, bicycling, driving or transit'),
};

export const getRouteShape = {
  origin: locationField('Starting location'),
  destination: locationField('Optional end location; omit for a loop back to origin').nullish(),
  mode: z.string().default(TravelMode.DRIVING).describe('walking, bicycling, driving or transit'),
};

export const findNearestShape = {
  origin: locationField('Location to search around'),
  place_type: z.string().describe('Place type, e.g. gym, park, restaurant, hospital, gas_station'),
  radius_km: z.number()
    .default(ROUTE_PLANNING.DEFAULT_SEARCH_RADIUS_KM)
    .describe(`Search radius in km, up to ${ROUTE_PLANNING.MAX_SEARCH_RADIUS_KM}`),
};

export const queryRouteShape = {
  query: z.string().describe('Free text, e.g. "burn 300 calories around here"'),
};

export const getFitnessRouteSchema = z.object(getFitnessRouteShape);
export const getRouteSchema = z.object(getRouteShape);
export const findNearestSchema = z.object(findNearestShape);
export const queryRouteSchema = z.object(queryRouteShape);

export type GetFitnessRouteArgs = z.infer<typeof getFitnessRouteSchema>;
export type GetRouteArgs = z.infer<typeof getRouteSchema>;
export type FindNearestArgs = z.infer<typeof findNearestSchema>;
export type QueryRouteArgs = z.infer<typeof queryRouteSchema>;

// =============================================================================
// DESCRIPTORS
// =============================================================================

export interface ToolDescriptor {
  name: ToolName;
  title: string;
  description: string;
}

export const TOOL_DESCRIPTORS: Record<ToolName, ToolDescriptor> = {
  get_fitness_route: {
    name: 'get_fitness_route',
    title: 'Fitness route',
    description: 'Get a route that burns a target number of calories. Without a destination, plans a loop back to the origin.',
  },
  get_route: {
    name: 'get_route',
    title: 'Directions',
    description: 'Get directions between two locations. Without a destination, plans a loop back to the origin.',
  },
  find_nearest: {
    name: 'find_nearest',
    title: 'Nearest place',
    description: 'Find the nearest place of a given type around a location.',
  },
  query_route: {
    name: 'query_route',
    title: 'Route query',
    description: 'Answer a free-text request such as "burn 300 calories" or "directions please".',
  },
};
