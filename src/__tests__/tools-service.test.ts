/**
 * =============================================================================
 * TOOLS SERVICE - End-to-end tool text
 * =============================================================================
 *
 * Drives the four tools through a FakeMapsClient and asserts on the
 * exact text a client would see.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../core/constants';
import { AppError, LookupUnavailableError, NoResultFoundError, ProviderError, ValidationError } from '../core/errors/AppError';
import { ToolsService, isToolName, renderToolError } from '../modules/tools/tools.service';
import { FakeMapsClient, directionsOk, leg, placesOk } from './helpers/fake-maps-client';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const LOOP_LEGS = [
  leg('Chicago, IL, USA', 'Lincoln Park, Chicago, IL', 2100, 1620),
  leg('Lincoln Park, Chicago, IL', 'Chicago, IL, USA', 2300, 1740),
];

describe('renderToolError', () => {
  it('prefixes provider failures as direction errors', () => {
    expect(renderToolError(new ProviderError('ZERO_RESULTS'))).toBe('Error getting directions: ZERO_RESULTS');
  });

  it('passes empty-search messages through', () => {
    expect(renderToolError(new NoResultFoundError('No park found'))).toBe('No park found');
  });

  it('prefixes every other error', () => {
    expect(renderToolError(new ValidationError('Calories must be at least 10'))).toBe('Error: Calories must be at least 10');
    expect(renderToolError(new LookupUnavailableError('Geocoding error: OVER_QUERY_LIMIT')))
      .toBe('Error: Geocoding error: OVER_QUERY_LIMIT');
    expect(renderToolError(new Error('boom'))).toBe('Error: boom');
  });
});

describe('ToolsService', () => {
  let maps: FakeMapsClient;
  let tools: ToolsService;

  beforeEach(() => {
    maps = new FakeMapsClient();
    tools = new ToolsService(maps, { defaultOrigin: 'Chicago, IL', locationCheckTimeoutMs: 5000 });
  });

  it('lists the four tools in order', () => {
    expect(tools.listTools().map(tool => tool.name))
      .toEqual(['get_fitness_route', 'get_route', 'find_nearest', 'query_route']);
    expect(isToolName('get_route')).toBe(true);
    expect(isToolName('get_weather')).toBe(false);
  });

  describe('get_route', () => {
    it('plans a driving loop through a nearby waypoint', async () => {
      maps.nearbyResponses.park = placesOk({ name: 'Lincoln Park', vicinity: 'Lincoln Park, Chicago' });
      maps.directionsResponse = directionsOk(...LOOP_LEGS);

      const text = await tools.getRoute({ origin: 'Chicago, IL', destination: undefined, mode: 'driving' });

      expect(text).toBe([
        'Route Information:',
        '',
        'Origin: Chicago, IL, USA',
        'Route Type: Loop (returns to start)',
        'Distance: 4.40 km',
        'Duration: 56m',
        'Mode: driving',
      ].join('\n'));
      expect(maps.nearbyCalls[0]).toMatchObject({ type: 'park', radiusMeters: 1200 });
      expect(maps.directionsCalls[0].waypoints).toEqual(['Lincoln Park, Chicago']);
    });

    it('renders a provider status as a directions error', async () => {
      maps.directionsResponse = { status: 'NOT_FOUND' };

      const text = await tools.getRoute({ origin: 'Chicago, IL', destination: 'Nowhere', mode: 'walking' });

      expect(text).toBe('Error getting directions: NOT_FOUND');
    });

    it('renders a bad mode as an input error', async () => {
      const text = await tools.getRoute({ origin: 'Chicago, IL', destination: null, mode: 'flying' });

      expect(text).toBe("Error: Invalid mode 'flying'. Must be one of: walking, bicycling, driving, transit");
      expect(maps.geocodeCalls).toHaveLength(0);
    });

    it('reports the missing key from the directions step', async () => {
      maps.available = false;

      const text = await tools.getRoute({ origin: 'Chicago, IL', destination: undefined, mode: 'driving' });

      expect(text).toBe('Error getting directions: GOOGLE_MAPS_API_KEY not set');
    });
  });

  describe('get_fitness_route', () => {
    it('returns the fitness report', async () => {
      maps.directionsResponse = directionsOk(leg('Chicago, IL, USA', 'Chicago, IL, USA', 6000, 4320));

      const text = await tools.getFitnessRoute({
        origin: 'Chicago, IL',
        target_calories: 300,
        destination: undefined,
        mode: 'walking',
      });

      expect(text.split('\n')[0]).toBe('Fitness Route Information:');
      expect(text).toContain('Distance: 6.0 km (6.00 km)\n');
      expect(text).toContain('Total Calories Burned: ~318.0 kcal\n');
      expect(text.endsWith('Great! This route should help you burn approximately 300 calories.')).toBe(true);
    });

    it('renders the zero-burn rejection', async () => {
      const text = await tools.getFitnessRoute({
        origin: 'Chicago, IL',
        target_calories: 300,
        destination: undefined,
        mode: 'driving',
      });

      expect(text).toBe("Error: Mode 'driving' does not burn calories. Use 'walking' or 'bicycling' for fitness routes.");
    });

    it('renders an unknown origin', async () => {
      maps.geocodeResponse = { status: 'ZERO_RESULTS', results: [] };

      const text = await tools.getFitnessRoute({
        origin: 'Atlantis',
        target_calories: 300,
        destination: undefined,
        mode: 'walking',
      });

      expect(text).toBe("Error: Location 'Atlantis' not found. Please check spelling or use a more specific address.");
    });
  });

  describe('find_nearest', () => {
    it('names the nearest place', async () => {
      maps.nearbyResponses.gym = placesOk({ name: 'Iron Gym', vicinity: '100 W Lake St' });

      const text = await tools.findNearest({ origin: 'Chicago, IL', place_type: 'gym', radius_km: 2.5 });

      expect(text).toBe([
        'Nearest Gym:',
        '',
        'Name: Iron Gym',
        'Address: 100 W Lake St',
        '',
        'Would you like directions to this location?',
      ].join('\n'));
      expect(maps.nearbyCalls[0]).toMatchObject({ type: 'gym', radiusMeters: 2500 });
    });

    it('explains an empty search', async () => {
      const text = await tools.findNearest({ origin: 'Chicago, IL', place_type: 'gym', radius_km: 2.5 });

      expect(text).toBe(
        'No gym found within 2.5 km of Chicago, IL. Try increasing the search radius or checking a different location.'
      );
    });

    it('rejects radii outside (0, 50] km', async () => {
      expect(await tools.findNearest({ origin: 'Chicago, IL', place_type: 'gym', radius_km: 0 }))
        .toBe('Error: Search radius must be greater than 0 km');
      expect(await tools.findNearest({ origin: 'Chicago, IL', place_type: 'gym', radius_km: 51 }))
        .toBe('Error: Search radius must be at most 50 km');
      expect(maps.nearbyCalls).toHaveLength(0);
    });
  });

  describe('query_route', () => {
    it('plans a walking loop from the default origin', async () => {
      maps.directionsResponse = directionsOk(leg('Chicago, IL, USA', 'Chicago, IL, USA', 6000, 4320));

      const text = await tools.queryRoute({ query: 'I want to burn 300 calories' });

      expect(text).toContain('Target Calories: 300 kcal');
      expect(maps.directionsCalls[0]).toMatchObject({ origin: 'Chicago, IL', destination: 'Chicago, IL', mode: 'walking' });
    });

    it('asks for an amount when none is given', async () => {
      const message = "Error: Could not find calorie amount in query. Please include something like 'burn 300 calories'.";

      expect(await tools.queryRoute({ query: 'burn some calories' })).toBe(message);
      expect(await tools.queryRoute({ query: 'burn 0 calories' })).toBe(message);
      expect(maps.geocodeCalls).toHaveLength(0);
    });

    it('gives driving directions for a directions request', async () => {
      maps.directionsResponse = directionsOk(...LOOP_LEGS);

      const text = await tools.queryRoute({ query: 'directions please' });

      expect(text).toContain('Mode: driving');
      expect(maps.directionsCalls[0]).toMatchObject({ origin: 'Chicago, IL', mode: 'driving' });
    });

    it('explains an unknown request', async () => {
      expect(await tools.queryRoute({ query: "what's the weather" }))
        .toBe('Could not understand query intent. Detected: unknown. Please be more specific about what you need.');
    });
  });

  describe('invoke', () => {
    it('rejects unknown tools with a 404', async () => {
      const error = await tools.invoke('get_weather', {}).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        message: 'Unknown tool: get_weather',
        statusCode: HTTP_STATUS.NOT_FOUND,
        code: ErrorCode.UNKNOWN_TOOL,
      });
    });

    it('rejects arguments of the wrong type', async () => {
      const error = await tools.invoke('get_route', { origin: 5 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'origin: Expected string, received number', code: ErrorCode.VALIDATION_ERROR });
    });

    it('reports a missing argument', async () => {
      await expect(tools.invoke('query_route', undefined)).rejects.toThrow('query: Required');
    });

    it('fills defaults before dispatching', async () => {
      const text = await tools.invoke('find_nearest', { origin: 'Chicago, IL', place_type: 'park' });

      expect(maps.nearbyCalls[0]).toMatchObject({ type: 'park', radiusMeters: 5000 });
      expect(text).toBe(
        'No park found within 5.0 km of Chicago, IL. Try increasing the search radius or checking a different location.'
      );
    });
  });
});
