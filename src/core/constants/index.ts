/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// SERVER
// =============================================================================

export const SERVER_INFO = {
  name: 'fitroute',
  version: '1.0.0',
} as const;

// =============================================================================
// TRAVEL MODES
// =============================================================================

/**
 * Transportation modes understood by the Directions API
 */
export enum TravelMode {
  WALKING = 'walking',
  BICYCLING = 'bicycling',
  DRIVING = 'driving',
  TRANSIT = 'transit'
}

export const TRAVEL_MODES: readonly TravelMode[] = [
  TravelMode.WALKING,
  TravelMode.BICYCLING,
  TravelMode.DRIVING,
  TravelMode.TRANSIT
];

// =============================================================================
// CALORIE MODEL
// =============================================================================

/**
 * Kilocalories burned per kilometre, per mode.
 *
 * Averages for a ~70 kg (155 lb) adult:
 * - Walking:   ~85 kcal/mile  = ~53 kcal/km
 * - Bicycling: ~37 kcal/mile  = ~23 kcal/km
 * Motorized modes are modelled as burning nothing.
 */
export const KCAL_PER_KM: Readonly<Record<TravelMode, number>> = Object.freeze({
  [TravelMode.WALKING]: 53.0,
  [TravelMode.BICYCLING]: 23.0,
  [TravelMode.DRIVING]: 0.0,
  [TravelMode.TRANSIT]: 0.0
});

export const CALORIE_LIMITS = {
  MIN: 10,
  MAX: 10000,
  /** Above this a walking target gets a gym suggestion (~19 km / 12 mi) */
  MAX_WALKING: 1000,
} as const;

export const KM_TO_MILES = 0.621371;

// =============================================================================
// ROUTE PLANNING
// =============================================================================

export const ROUTE_PLANNING = {
  /** Minimum nearby-search radius when looking for a loop waypoint (m) */
  MIN_WAYPOINT_RADIUS_M: 500,
  /** Share of the half-distance used as the waypoint search radius */
  WAYPOINT_RADIUS_FACTOR: 0.6,
  /** Place categories tried in order when picking a loop waypoint */
  WAYPOINT_PLACE_TYPES: ['park', 'point_of_interest', 'establishment'] as const,
  /** Half-distance used by plain directions when asked for a loop (km) */
  DEFAULT_LOOP_TARGET_KM: 2.0,
  /** Gym search radius for long walking targets (m) */
  GYM_SEARCH_RADIUS_M: 10000,
  /** Default radius for find_nearest (km) */
  DEFAULT_SEARCH_RADIUS_KM: 5.0,
  /** Places Nearby Search upper bound (km) */
  MAX_SEARCH_RADIUS_KM: 50,
} as const;

export const LOCATION_MIN_LENGTH = 2;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  // =============================================================================
  // VALIDATION ERRORS (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',
  INVALID_MODE = 'VAL_2002',
  CALORIES_OUT_OF_RANGE = 'VAL_2003',
  EMPTY_LOCATION = 'VAL_2004',
  LOCATION_NOT_FOUND = 'VAL_2005',
  MODE_BURNS_NO_CALORIES = 'VAL_2006',

  // =============================================================================
  // LOOKUPS (3xxx)
  // =============================================================================
  LOOKUP_UNAVAILABLE = 'LOOK_3001',
  NO_RESULT_FOUND = 'LOOK_3002',

  // =============================================================================
  // DIRECTIONS PROVIDER (4xxx)
  // =============================================================================
  PROVIDER_ERROR = 'PROV_4001',
  PROVIDER_TIMEOUT = 'PROV_4002',
  PROVIDER_HTTP_ERROR = 'PROV_4003',
  PROVIDER_NOT_CONFIGURED = 'PROV_4004',

  // =============================================================================
  // SYSTEM & INFRASTRUCTURE (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  NOT_FOUND = 'SYS_9004',
  UNKNOWN_TOOL = 'SYS_9005'
}
