/**
 * =============================================================================
 * DIRECTIONS SERVICE - Plain point-to-point / loop directions
 * =============================================================================
 *
 * validate -> verify locations -> (loop: pick waypoint) -> request route
 *
 * A loop without a destination is shaped around a fixed 2 km half-distance.
 * =============================================================================
 */

import { ROUTE_PLANNING, TravelMode } from '../../core/constants';
import { logger } from '../../shared/services/logger.service';
import { normalizeLocation, normalizeOptionalLocation, validateMode } from '../fitness/fitness.schema';
import { LocationVerifier } from '../places/location-verifier.service';
import { RouteResult } from './routing.schema';
import { RoutingService } from './routing.service';
import { WaypointService } from './waypoint.service';

export interface DirectionsInput {
  origin: string;
  destination?: string | null;
  /** Defaults to driving */
  mode?: string;
}

export class DirectionsService {
  constructor(
    private readonly routing: RoutingService,
    private readonly waypoints: WaypointService,
    private readonly verifier: LocationVerifier
  ) {}

  /**
   * Throws ValidationError / LookupUnavailableError on bad input and the
   * route's ProviderError when the Directions API fails
   */
  async getDirections(input: DirectionsInput): Promise<RouteResult> {
    const mode = validateMode(input.mode ?? TravelMode.DRIVING);
    const origin = normalizeLocation(input.origin);
    const destination = normalizeOptionalLocation(input.destination);

    await this.verifier.verifyAll([origin, destination]);

    let waypoints: string[] | undefined;
    if (destination === undefined) {
      const waypoint = await this.waypoints.findLoopWaypoint(origin, ROUTE_PLANNING.DEFAULT_LOOP_TARGET_KM);
      if (waypoint) {
        waypoints = [waypoint];
      }
    }

    logger.info(`Directions: ${origin} -> ${destination ?? '(loop)'} [${mode}]`);

    const outcome = await this.routing.requestRoute({ origin, destination, mode, waypoints });
    if (!outcome.success) {
      throw outcome.error;
    }
    return outcome.route;
  }
}
