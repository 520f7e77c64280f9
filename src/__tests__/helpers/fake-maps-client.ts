/**
 * In-process stand-in for the Google Maps web services.
 *
 * Responses are configured per test; every call is recorded so tests can
 * assert on order and parameters.
 */

import {
  DirectionsParams,
  GoogleDirectionsLeg,
  GoogleDirectionsResponse,
  GoogleGeocodingResponse,
  GooglePlace,
  GooglePlacesNearbyResponse,
  MapsClient,
  NearbySearchParams,
  RequestOptions
} from '../../shared/services/google-maps.service';

export const CHICAGO = { lat: 41.8781, lng: -87.6298 };

export function geocodeOk(location = CHICAGO): GoogleGeocodingResponse {
  return { status: 'OK', results: [{ geometry: { location } }] };
}

export function placesOk(...places: GooglePlace[]): GooglePlacesNearbyResponse {
  return { status: 'OK', results: places };
}

export function directionsOk(...legs: GoogleDirectionsLeg[]): GoogleDirectionsResponse {
  return { status: 'OK', routes: [{ legs }] };
}

/**
 * Single leg of `meters`, labelled the way the provider labels it
 */
export function leg(
  start: string,
  end: string,
  meters: number,
  seconds: number,
  extra: Partial<GoogleDirectionsLeg> = {}
): GoogleDirectionsLeg {
  return {
    start_address: start,
    end_address: end,
    distance: { text: `${(meters / 1000).toFixed(1)} km`, value: meters },
    duration: { text: `${Math.round(seconds / 60)} mins`, value: seconds },
    steps: [],
    ...extra,
  };
}

export class FakeMapsClient implements MapsClient {
  available = true;

  geocodeResponse: GoogleGeocodingResponse = geocodeOk();
  geocodeError?: Error;

  /** Keyed by place type; missing types answer ZERO_RESULTS */
  nearbyResponses: Record<string, GooglePlacesNearbyResponse> = {};
  nearbyError?: Error;

  directionsResponse: GoogleDirectionsResponse = directionsOk();
  directionsError?: Error;

  readonly geocodeCalls: Array<{ address: string; options?: RequestOptions }> = [];
  readonly nearbyCalls: NearbySearchParams[] = [];
  readonly directionsCalls: DirectionsParams[] = [];

  isAvailable(): boolean {
    return this.available;
  }

  async geocode(address: string, options?: RequestOptions): Promise<GoogleGeocodingResponse> {
    this.geocodeCalls.push({ address, options });
    if (this.geocodeError) throw this.geocodeError;
    return this.geocodeResponse;
  }

  async nearbySearch(params: NearbySearchParams): Promise<GooglePlacesNearbyResponse> {
    this.nearbyCalls.push(params);
    if (this.nearbyError) throw this.nearbyError;
    return this.nearbyResponses[params.type] ?? { status: 'ZERO_RESULTS', results: [] };
  }

  async directions(params: DirectionsParams): Promise<GoogleDirectionsResponse> {
    this.directionsCalls.push(params);
    if (this.directionsError) throw this.directionsError;
    return this.directionsResponse;
  }
}
