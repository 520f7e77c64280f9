/**
 * =============================================================================
 * PLACES SERVICE - Geocode + Nearby Search
 * =============================================================================
 *
 * Resolves a free-form origin to coordinates, then asks Places Nearby
 * Search for one category around it. Used for gym suggestions and
 * find_nearest.
 *
 * Lookups are opportunistic: a missing key, a non-OK status, a timeout
 * or a transport failure all mean "nothing found" (null).
 * =============================================================================
 */

import { getErrorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { GooglePlace, LatLng, MapsClient } from '../../shared/services/google-maps.service';

export interface PlaceCandidate {
  name: string;
  address: string;
  /** "lat,lng" */
  location: string;
  placeId: string;
}

export function toPlaceCandidate(place: GooglePlace): PlaceCandidate {
  const location = place.geometry?.location;
  return {
    name: place.name ?? '',
    address: place.vicinity || place.formatted_address || '',
    location: `${location?.lat ?? ''},${location?.lng ?? ''}`,
    placeId: place.place_id ?? '',
  };
}

export class PlacesService {
  constructor(private readonly maps: MapsClient) {}

  /**
   * Coordinates of the first geocoding result, or null.
   * Transport failures propagate; callers decide whether they matter.
   */
  async locate(origin: string): Promise<LatLng | null> {
    const data = await this.maps.geocode(origin);
    if (data.status !== 'OK') {
      return null;
    }

    const location = data.results?.[0]?.geometry?.location;
    if (!location || typeof location.lat !== 'number' || typeof location.lng !== 'number') {
      return null;
    }

    return { lat: location.lat, lng: location.lng };
  }

  /**
   * First nearby place of `placeType` within `radiusMeters` of `origin`
   */
  async findNearbyPlace(origin: string, placeType: string, radiusMeters: number = 5000): Promise<PlaceCandidate | null> {
    if (!this.maps.isAvailable()) {
      return null;
    }

    try {
      const location = await this.locate(origin);
      if (!location) {
        logger.debug(`Could not geocode "${origin}" for ${placeType} search`);
        return null;
      }

      const data = await this.maps.nearbySearch({ location, radiusMeters, type: placeType });
      const place = data.status === 'OK' ? data.results?.[0] : undefined;
      if (!place) {
        return null;
      }

      return toPlaceCandidate(place);
    } catch (error) {
      logger.warn(`Nearby ${placeType} search failed: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
