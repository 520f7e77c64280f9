/**
 * =============================================================================
 * WAYPOINT SERVICE - Loop shaping
 * =============================================================================
 *
 * Picks one place label near the origin so that origin -> waypoint -> origin
 * comes out roughly 2 x targetHalfDistanceKm long.
 *
 * - Search radius: max(500 m, 0.6 x half-distance). The 0.6 factor is an
 *   empirical constant, not a geometric guarantee.
 * - Categories tried in order: park, point_of_interest, establishment.
 *   First result of the first category with any result wins.
 * - Label: vicinity, else formatted address, else name.
 *
 * null means "loop straight back to origin"; it is never an error.
 * =============================================================================
 */

import { ROUTE_PLANNING } from '../../core/constants';
import { getErrorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { GooglePlace, MapsClient } from '../../shared/services/google-maps.service';
import { PlacesService } from '../places/places.service';

/**
 * Nearby-search radius in meters for a loop of 2 x `targetHalfDistanceKm`
 */
export function waypointSearchRadius(targetHalfDistanceKm: number): number {
  return Math.max(
    ROUTE_PLANNING.MIN_WAYPOINT_RADIUS_M,
    Math.trunc(targetHalfDistanceKm * 1000 * ROUTE_PLANNING.WAYPOINT_RADIUS_FACTOR)
  );
}

function waypointLabel(place: GooglePlace): string | undefined {
  return place.vicinity || place.formatted_address || place.name || undefined;
}

export class WaypointService {
  private readonly places: PlacesService;

  constructor(private readonly maps: MapsClient) {
    this.places = new PlacesService(maps);
  }

  async findLoopWaypoint(origin: string, targetHalfDistanceKm: number): Promise<string | null> {
    if (!this.maps.isAvailable()) {
      return null;
    }

    try {
      const location = await this.places.locate(origin);
      if (!location) {
        return null;
      }

      const radiusMeters = waypointSearchRadius(targetHalfDistanceKm);

      for (const placeType of ROUTE_PLANNING.WAYPOINT_PLACE_TYPES) {
        const data = await this.maps.nearbySearch({ location, radiusMeters, type: placeType });
        const place = data.status === 'OK' ? data.results?.[0] : undefined;
        const label = place ? waypointLabel(place) : undefined;

        if (label) {
          logger.debug(`Loop waypoint (${placeType}, r=${radiusMeters}m): ${label}`);
          return label;
        }
      }

      logger.debug(`No loop waypoint within ${radiusMeters}m of "${origin}"`);
      return null;
    } catch (error) {
      logger.warn(`Waypoint search failed: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
