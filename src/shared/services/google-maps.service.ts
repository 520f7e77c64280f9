/**
 * =============================================================================
 * GOOGLE MAPS SERVICE - Geocoding, Places Nearby, Directions
 * =============================================================================
 *
 * Thin pass-through to the Google Maps web services:
 * - Geocoding API: address -> coordinates
 * - Places API (Nearby Search): coordinates + radius + type -> places
 * - Directions API: origin/destination/waypoints -> routes
 *
 * The service never interprets provider statuses; callers decide what an
 * OK / ZERO_RESULTS / INVALID_REQUEST means for them. Transport problems
 * (timeout, non-2xx, network) are raised as ProviderError.
 *
 * The API key is injected at construction and never logged.
 * =============================================================================
 */

import { logger } from './logger.service';
import { ErrorCode, TravelMode } from '../../core/constants';
import { ProviderError, getErrorMessage } from '../../core/errors/AppError';

// =============================================================================
// TYPES
// =============================================================================

export interface LatLng {
    lat: number;
    lng: number;
}

export interface TextValue {
    text?: string;
    value?: number;
}

export interface GoogleGeocodingResponse {
    status: string;
    results?: Array<{
        formatted_address?: string;
        geometry?: { location?: Partial<LatLng> };
    }>;
    error_message?: string;
}

export interface GooglePlace {
    name?: string;
    vicinity?: string;
    formatted_address?: string;
    place_id?: string;
    geometry?: { location?: Partial<LatLng> };
}

export interface GooglePlacesNearbyResponse {
    status: string;
    results?: GooglePlace[];
    error_message?: string;
}

export interface GoogleDirectionsStep {
    html_instructions?: string;
    distance?: TextValue;
    duration?: TextValue;
    maneuver?: string;
}

export interface GoogleDirectionsLeg {
    distance?: TextValue;
    duration?: TextValue;
    start_address?: string;
    end_address?: string;
    steps?: GoogleDirectionsStep[];
}

export interface GoogleDirectionsResponse {
    status: string;
    routes?: Array<{ legs?: GoogleDirectionsLeg[] }>;
    error_message?: string;
}

export interface NearbySearchParams {
    location: LatLng;
    radiusMeters: number;
    type: string;
}

export interface DirectionsParams {
    origin: string;
    destination: string;
    mode: TravelMode;
    waypoints?: string[];
}

export interface RequestOptions {
    timeoutMs?: number;
}

/**
 * Everything the route-planning core needs from a maps provider.
 * Tests substitute an in-process fake.
 */
export interface MapsClient {
    isAvailable(): boolean;
    geocode(address: string, options?: RequestOptions): Promise<GoogleGeocodingResponse>;
    nearbySearch(params: NearbySearchParams, options?: RequestOptions): Promise<GooglePlacesNearbyResponse>;
    directions(params: DirectionsParams, options?: RequestOptions): Promise<GoogleDirectionsResponse>;
}

export interface GoogleMapsConfig {
    apiKey: string;
    /** Default per-request timeout (ms) */
    timeoutMs: number;
    /** Override for tests or proxies */
    baseUrl?: string;
}

const DEFAULT_BASE_URL = 'https://maps.googleapis.com/maps/api';
const ERROR_BODY_PREVIEW_CHARS = 100;

// =============================================================================
// GOOGLE MAPS SERVICE CLASS
// =============================================================================

export class GoogleMapsService implements MapsClient {
    private readonly geocodingUrl: string;
    private readonly placesNearbyUrl: string;
    private readonly directionsUrl: string;

    constructor(private readonly config: GoogleMapsConfig) {
        const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
        this.geocodingUrl = `${baseUrl}/geocode/json`;
        this.placesNearbyUrl = `${baseUrl}/place/nearbysearch/json`;
        this.directionsUrl = `${baseUrl}/directions/json`;
    }

    /**
     * Check if service is available (API key configured)
     */
    isAvailable(): boolean {
        return this.config.apiKey.length > 0;
    }

    // =========================================================================
    // GEOCODING API
    // =========================================================================

    async geocode(address: string, options: RequestOptions = {}): Promise<GoogleGeocodingResponse> {
        const params = new URLSearchParams({ address });
        const data = await this.request<GoogleGeocodingResponse>(this.geocodingUrl, params, options);
        logger.debug(`📍 Google Geocoding: "${address}" -> ${data.status}`);
        return data;
    }

    // =========================================================================
    // PLACES API - Nearby Search
    // =========================================================================

    async nearbySearch(
        { location, radiusMeters, type }: NearbySearchParams,
        options: RequestOptions = {}
    ): Promise<GooglePlacesNearbyResponse> {
        const params = new URLSearchParams({
            location: `${location.lat},${location.lng}`,
            radius: String(radiusMeters),
            type,
        });
        const data = await this.request<GooglePlacesNearbyResponse>(this.placesNearbyUrl, params, options);
        logger.debug(`📍 Google Places: ${type} within ${radiusMeters}m -> ${data.status} (${data.results?.length ?? 0} results)`);
        return data;
    }

    // =========================================================================
    // DIRECTIONS API
    // =========================================================================

    async directions(
        { origin, destination, mode, waypoints }: DirectionsParams,
        options: RequestOptions = {}
    ): Promise<GoogleDirectionsResponse> {
        const params = new URLSearchParams({ origin, destination, mode });

        if (waypoints && waypoints.length > 0) {
            params.append('waypoints', waypoints.join('|'));
        }

        const data = await this.request<GoogleDirectionsResponse>(this.directionsUrl, params, options);
        logger.debug(`📍 Google Directions: ${mode} -> ${data.status}`);
        return data;
    }

    // =========================================================================
    // HTTP
    // =========================================================================

    private async request<T>(url: string, params: URLSearchParams, options: RequestOptions): Promise<T> {
        const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
        params.set('key', this.config.apiKey);

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);
        const startTime = Date.now();

        try {
            const response = await fetch(`${url}?${params.toString()}`, {
                method: 'GET',
                signal: controller.signal,
                headers: { Accept: 'application/json' },
            });

            if (!response.ok) {
                const body = await response.text();
                throw new ProviderError(
                    `HTTP error ${response.status}: ${body.slice(0, ERROR_BODY_PREVIEW_CHARS)}`,
                    ErrorCode.PROVIDER_HTTP_ERROR,
                    { status: response.status }
                );
            }

            const data = (await response.json()) as T;
            logger.debug(`Google Maps call completed in ${Date.now() - startTime}ms`);
            return data;
        } catch (error) {
            if (error instanceof ProviderError) {
                throw error;
            }
            if (controller.signal.aborted) {
                throw new ProviderError('Request timed out. Please try again.', ErrorCode.PROVIDER_TIMEOUT, { timeoutMs });
            }
            throw new ProviderError(`Request failed: ${getErrorMessage(error)}`);
        } finally {
            clearTimeout(timeout);
        }
    }
}
