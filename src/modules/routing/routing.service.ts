/**
 * =============================================================================
 * ROUTING SERVICE - Directions request & normalization
 * =============================================================================
 *
 * Requests a path from the Directions API and folds the multi-leg answer
 * into a single RouteResult:
 * - No destination -> destination = origin (loop), isLoop = true
 * - Leg distances/durations summed, steps flattened in order
 * - Step instructions stripped of markup, entities decoded
 * - One leg: provider labels reused verbatim; several legs: labels synthesized
 *
 * Failures (missing key, timeout, non-2xx, status != OK) are returned as
 * { success: false, error } and never thrown.
 * =============================================================================
 */

import { ErrorCode } from '../../core/constants';
import { ProviderError, getErrorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { GoogleDirectionsLeg, GoogleDirectionsStep, MapsClient } from '../../shared/services/google-maps.service';
import { cleanInstruction } from '../../shared/utils/text.utils';
import { RouteOutcome, RouteRequest, RouteResult, RouteStep } from './routing.schema';

// =============================================================================
// LABELS
// =============================================================================

/**
 * 850 -> "850 m", 4400 -> "4.40 km"
 */
export function formatDistanceLabel(meters: number): string {
  if (meters < 1000) {
    return `${meters} m`;
  }
  return `${(meters / 1000).toFixed(2)} km`;
}

/**
 * 3360 -> "56m", 5400 -> "1h 30m"
 */
export function formatDurationLabel(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

function toRouteStep(step: GoogleDirectionsStep): RouteStep {
  return {
    instruction: cleanInstruction(step.html_instructions ?? ''),
    distanceText: step.distance?.text ?? '',
    distanceMeters: step.distance?.value ?? 0,
    durationText: step.duration?.text ?? '',
    maneuver: step.maneuver ?? '',
  };
}

/**
 * Fold the legs of one route into a RouteResult
 */
export function normalizeRoute(legs: GoogleDirectionsLeg[], request: RouteRequest): RouteResult {
  const isLoop = request.destination === undefined;
  let distanceMeters = 0;
  let durationSeconds = 0;
  const steps: RouteStep[] = [];

  for (const leg of legs) {
    distanceMeters += leg.distance?.value ?? 0;
    durationSeconds += leg.duration?.value ?? 0;
    for (const step of leg.steps ?? []) {
      steps.push(toRouteStep(step));
    }
  }

  const firstLeg = legs[0];
  const lastLeg = legs[legs.length - 1];
  const singleLeg = legs.length === 1 ? firstLeg : undefined;

  return {
    origin: firstLeg?.start_address ?? request.origin,
    destination: lastLeg?.end_address ?? request.destination ?? request.origin,
    distanceMeters,
    distanceText: singleLeg?.distance?.text ?? formatDistanceLabel(distanceMeters),
    durationSeconds,
    durationText: singleLeg?.duration?.text ?? formatDurationLabel(durationSeconds),
    mode: request.mode,
    isLoop,
    legCount: legs.length,
    steps,
  };
}

// =============================================================================
// ROUTING SERVICE CLASS
// =============================================================================

export class RoutingService {
  constructor(private readonly maps: MapsClient) {}

  async requestRoute(request: RouteRequest): Promise<RouteOutcome> {
    if (!this.maps.isAvailable()) {
      logger.warn('Google Maps API key not configured');
      return {
        success: false,
        error: new ProviderError('GOOGLE_MAPS_API_KEY not set', ErrorCode.PROVIDER_NOT_CONFIGURED),
      };
    }

    const destination = request.destination ?? request.origin;
    const waypoints = request.waypoints?.filter(Boolean) ?? [];

    try {
      const data = await this.maps.directions({
        origin: request.origin,
        destination,
        mode: request.mode,
        ...(waypoints.length > 0 && { waypoints }),
      });

      if (data.status !== 'OK') {
        logger.error(`Google Directions error: ${data.status}`, { errorMessage: data.error_message });
        return {
          success: false,
          error: new ProviderError(data.status || 'UNKNOWN_ERROR', ErrorCode.PROVIDER_ERROR, { status: data.status }),
        };
      }

      const route = data.routes?.[0];
      if (!route) {
        return {
          success: false,
          error: new ProviderError('ZERO_RESULTS', ErrorCode.PROVIDER_ERROR, { status: data.status }),
        };
      }

      const result = normalizeRoute(route.legs ?? [], request);
      logger.info(`Route resolved: ${result.distanceText}, ${result.durationText} (${result.legCount} legs, loop=${result.isLoop})`);
      return { success: true, route: result };
    } catch (error) {
      if (error instanceof ProviderError) {
        logger.error(`Google Directions failed: ${error.message}`);
        return { success: false, error };
      }
      logger.error(`Google Directions failed unexpectedly: ${getErrorMessage(error)}`);
      return {
        success: false,
        error: new ProviderError(`Unexpected error: ${getErrorMessage(error)}`),
      };
    }
  }
}
