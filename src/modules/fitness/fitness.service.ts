/**
 * =============================================================================
 * FITNESS SERVICE - Calorie-targeted route planning
 * =============================================================================
 *
 * FLOW:
 * 1. Validate mode, calories, origin, destination
 * 2. Reject modes that burn nothing (driving, transit)
 * 3. Best-effort existence check of origin / destination
 * 4. neededKm = calories / burn rate
 * 5. Long walking target (> 1000 kcal): look for a gym within 10 km
 *    - found     -> gym suggestion, no route is requested
 *    - not found -> keep going, flag a warning
 * 6. No destination: pick a loop waypoint around neededKm / 2
 * 7. Request the route
 * 8. Compare route km with neededKm (reported, never re-queried)
 * =============================================================================
 */

import { CALORIE_LIMITS, ErrorCode, ROUTE_PLANNING, TravelMode } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { LocationVerifier } from '../places/location-verifier.service';
import { PlacesService } from '../places/places.service';
import { RoutingService } from '../routing/routing.service';
import { WaypointService } from '../routing/waypoint.service';
import { caloriesToDistanceKm, getBurnRate } from './calorie.utils';
import {
  FitnessPlan,
  FitnessRouteInput,
  normalizeLocation,
  normalizeOptionalLocation,
  validateCalories,
  validateMode
} from './fitness.schema';

export interface FitnessServiceDeps {
  routing: RoutingService;
  waypoints: WaypointService;
  places: PlacesService;
  verifier: LocationVerifier;
}

export class FitnessService {
  private readonly routing: RoutingService;
  private readonly waypoints: WaypointService;
  private readonly places: PlacesService;
  private readonly verifier: LocationVerifier;

  constructor(deps: FitnessServiceDeps) {
    this.routing = deps.routing;
    this.waypoints = deps.waypoints;
    this.places = deps.places;
    this.verifier = deps.verifier;
  }

  async planFitnessRoute(input: FitnessRouteInput): Promise<FitnessPlan> {
    const mode = validateMode(input.mode ?? TravelMode.WALKING);
    const targetCalories = validateCalories(input.targetCalories);
    const origin = normalizeLocation(input.origin);
    const destination = normalizeOptionalLocation(input.destination);

    const burnRate = getBurnRate(mode);
    if (burnRate === 0) {
      throw new ValidationError(
        `Mode '${mode}' does not burn calories. Use 'walking' or 'bicycling' for fitness routes.`,
        ErrorCode.MODE_BURNS_NO_CALORIES,
        { mode }
      );
    }

    await this.verifier.verifyAll([origin, destination]);

    const neededKm = caloriesToDistanceKm(targetCalories, mode);

    let longWalkWarning = false;
    if (targetCalories > CALORIE_LIMITS.MAX_WALKING && mode === TravelMode.WALKING) {
      const gym = await this.places.findNearbyPlace(origin, 'gym', ROUTE_PLANNING.GYM_SEARCH_RADIUS_M);
      if (gym) {
        logger.info(`Long walk (${targetCalories} kcal): suggesting gym "${gym.name}"`);
        return { kind: 'gym_suggestion', targetCalories, mode, gym };
      }
      longWalkWarning = true;
    }

    let waypoints: string[] | undefined;
    if (destination === undefined) {
      const waypoint = await this.waypoints.findLoopWaypoint(origin, neededKm / 2);
      if (waypoint) {
        waypoints = [waypoint];
      }
    }

    logger.info(`Fitness route: ${targetCalories} kcal ${mode} from ${origin}, need ${neededKm.toFixed(2)} km`);

    const outcome = await this.routing.requestRoute({ origin, destination, mode, waypoints });
    if (!outcome.success) {
      throw outcome.error;
    }

    const route = outcome.route;
    const routeKm = route.distanceMeters / 1000;

    return {
      kind: 'route',
      targetCalories,
      neededKm,
      burnRate,
      route,
      longWalkWarning,
      shortfallKm: routeKm < neededKm ? neededKm - routeKm : 0,
    };
  }
}
