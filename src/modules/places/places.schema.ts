/**
 * =============================================================================
 * PLACES MODULE - SCHEMAS & VALIDATORS
 * =============================================================================
 */

import { z } from 'zod';
import { ErrorCode, ROUTE_PLANNING } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';

export const searchRadiusSchema = z.number()
  .gt(0, 'Search radius must be greater than 0 km')
  .max(ROUTE_PLANNING.MAX_SEARCH_RADIUS_KM, `Search radius must be at most ${ROUTE_PLANNING.MAX_SEARCH_RADIUS_KM} km`);

export const placeTypeSchema = z.string()
  .trim()
  .min(1, 'Place type cannot be empty');

function firstIssue(error: z.ZodError, fallback: string): string {
  return error.errors[0]?.message ?? fallback;
}

/**
 * Search radius in km, converted to whole meters
 */
export function validateRadiusKm(radiusKm: number): number {
  const parsed = searchRadiusSchema.safeParse(radiusKm);
  if (!parsed.success) {
    throw new ValidationError(firstIssue(parsed.error, 'Invalid search radius'), ErrorCode.VALIDATION_ERROR, { radiusKm });
  }
  return Math.trunc(parsed.data * 1000);
}

export function validatePlaceType(placeType: string): string {
  const parsed = placeTypeSchema.safeParse(placeType);
  if (!parsed.success) {
    throw new ValidationError(firstIssue(parsed.error, 'Invalid place type'), ErrorCode.VALIDATION_ERROR);
  }
  return parsed.data;
}
