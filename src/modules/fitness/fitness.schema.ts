/**
 * =============================================================================
 * FITNESS MODULE - SCHEMAS & VALIDATORS
 * =============================================================================
 *
 * Input normalization shared by every tool:
 * - mode:      case-insensitive, one of walking | bicycling | driving | transit
 * - calories:  whole number in [10, 10000]
 * - location:  trimmed, at least 2 characters
 *
 * Locations are not parsed. Anything the geocoder accepts is fine here
 * ("Chicago, IL", "123 Main St", "41.8781,-87.6298", "current location").
 * =============================================================================
 */

import { z } from 'zod';
import {
  CALORIE_LIMITS,
  ErrorCode,
  LOCATION_MIN_LENGTH,
  TRAVEL_MODES,
  TravelMode
} from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import type { PlaceCandidate } from '../places/places.service';
import type { RouteResult } from '../routing/routing.schema';

// =============================================================================
// SCHEMAS
// =============================================================================

export const travelModeSchema = z.nativeEnum(TravelMode);

export const calorieTargetSchema = z.number()
  .int('Calories must be a whole number')
  .min(CALORIE_LIMITS.MIN, `Calories must be at least ${CALORIE_LIMITS.MIN}`)
  .max(CALORIE_LIMITS.MAX, `Calories must be at most ${CALORIE_LIMITS.MAX}`);

export const locationSchema = z.string()
  .trim()
  .min(1, 'Location cannot be empty')
  .min(LOCATION_MIN_LENGTH, `Location must be at least ${LOCATION_MIN_LENGTH} characters`);

// =============================================================================
// VALIDATORS
// =============================================================================

/**
 * Validate and normalize a transportation mode
 */
export function validateMode(raw: string): TravelMode {
  const parsed = travelModeSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid mode '${raw}'. Must be one of: ${TRAVEL_MODES.join(', ')}`,
      ErrorCode.INVALID_MODE,
      { mode: raw }
    );
  }
  return parsed.data;
}

/**
 * Validate a calorie target is within bounds
 */
export function validateCalories(calories: number): number {
  const parsed = calorieTargetSchema.safeParse(calories);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.errors[0]?.message ?? 'Invalid calorie target',
      ErrorCode.CALORIES_OUT_OF_RANGE,
      { calories }
    );
  }
  return parsed.data;
}

/**
 * Trim and length-check a free-form location string
 */
export function normalizeLocation(location: string): string {
  const parsed = locationSchema.safeParse(location);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.errors[0]?.message ?? 'Invalid location',
      ErrorCode.EMPTY_LOCATION
    );
  }
  return parsed.data;
}

/**
 * Normalize an optional destination; blank counts as absent
 */
export function normalizeOptionalLocation(location: string | null | undefined): string | undefined {
  if (!location) {
    return undefined;
  }
  return normalizeLocation(location);
}

// =============================================================================
// PLANNER TYPES
// =============================================================================

export interface FitnessRouteInput {
  origin: string;
  targetCalories: number;
  /** Absent or blank: loop back to origin */
  destination?: string | null;
  /** Defaults to walking */
  mode?: string;
}

/**
 * What the planner decided; rendered by the report formatter
 */
export type FitnessPlan =
  | {
      kind: 'gym_suggestion';
      targetCalories: number;
      mode: TravelMode;
      gym: PlaceCandidate;
    }
  | {
      kind: 'route';
      targetCalories: number;
      neededKm: number;
      burnRate: number;
      route: RouteResult;
      /** Set when a long walking target found no gym nearby */
      longWalkWarning: boolean;
      /** km still missing; 0 when the route covers the target */
      shortfallKm: number;
    };
