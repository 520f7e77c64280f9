/**
 * =============================================================================
 * LOCATION VERIFIER - Best-effort geocoding check
 * =============================================================================
 *
 * Confirms a location exists before a route is requested. Availability wins
 * over strictness: no key, a timeout or a transport failure all count as
 * "valid" and the Directions API gets the final say.
 *
 *   OK + results     -> valid
 *   ZERO_RESULTS     -> ValidationError (not found)
 *   INVALID_REQUEST  -> ValidationError (bad format)
 *   anything else    -> LookupUnavailableError
 * =============================================================================
 */

import { ErrorCode } from '../../core/constants';
import { LookupUnavailableError, ValidationError, getErrorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { GoogleGeocodingResponse, MapsClient } from '../../shared/services/google-maps.service';

export class LocationVerifier {
  constructor(
    private readonly maps: MapsClient,
    private readonly timeoutMs: number = 5000
  ) {}

  /**
   * Resolves when the location is usable, throws an AppError when the
   * geocoder positively rejects it
   */
  async verify(location: string): Promise<void> {
    if (!this.maps.isAvailable()) {
      return;
    }

    let data: GoogleGeocodingResponse;
    try {
      data = await this.maps.geocode(location, { timeoutMs: this.timeoutMs });
    } catch (error) {
      logger.debug(`Location check skipped for "${location}": ${getErrorMessage(error)}`);
      return;
    }

    if (data.status === 'OK' && data.results && data.results.length > 0) {
      return;
    }

    if (data.status === 'ZERO_RESULTS') {
      throw new ValidationError(
        `Location '${location}' not found. Please check spelling or use a more specific address.`,
        ErrorCode.LOCATION_NOT_FOUND
      );
    }

    if (data.status === 'INVALID_REQUEST') {
      throw new ValidationError(`Invalid location format: '${location}'`, ErrorCode.LOCATION_NOT_FOUND);
    }

    throw new LookupUnavailableError(`Geocoding error: ${data.status || 'UNKNOWN'}`, { status: data.status });
  }

  async verifyAll(locations: Array<string | undefined>): Promise<void> {
    for (const location of locations) {
      if (location !== undefined) {
        await this.verify(location);
      }
    }
  }
}
