/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Defines data structures for route requests and their normalized results.
 *
 * KEY CONCEPTS:
 * - Leg: one contiguous segment returned by the Directions API
 * - Loop: destination equals origin, optionally through one waypoint
 * - RouteResult: all legs folded into one total with a flat step list
 *
 * EXAMPLE:
 * Loop from "Chicago, IL" via "Lincoln Park":
 *
 *   Leg 0: Chicago, IL  -> Lincoln Park (2.1 km, 27 mins)
 *   Leg 1: Lincoln Park -> Chicago, IL  (2.3 km, 29 mins)
 *
 * Total: 4400 m, "4.40 km", 3360 s, "56m"
 * =============================================================================
 */

import { TravelMode } from '../../core/constants';
import { ProviderError } from '../../core/errors/AppError';

// =============================================================================
// ROUTE STEP
// =============================================================================

/**
 * One maneuver of the flattened step list
 */
export interface RouteStep {
  /** Instruction with markup stripped and entities decoded */
  instruction: string;

  /** Provider's distance label, e.g. "0.3 km" (may be empty) */
  distanceText: string;

  /** Distance in meters */
  distanceMeters: number;

  /** Provider's duration label, e.g. "4 mins" (may be empty) */
  durationText: string;

  /** Maneuver tag, e.g. "turn-left" (may be empty) */
  maneuver: string;
}

// =============================================================================
// ROUTE RESULT
// =============================================================================

export interface RouteResult {
  /** First leg's start address */
  origin: string;

  /** Last leg's end address */
  destination: string;

  distanceMeters: number;
  distanceText: string;

  durationSeconds: number;
  durationText: string;

  mode: TravelMode;

  /** True when no destination was requested */
  isLoop: boolean;

  legCount: number;

  steps: RouteStep[];
}

// =============================================================================
// REQUEST / OUTCOME
// =============================================================================

export interface RouteRequest {
  origin: string;
  /** Absent: loop back to origin */
  destination?: string;
  mode: TravelMode;
  waypoints?: string[];
}

/**
 * Route requests never throw; failures come back as a ProviderError value
 */
export type RouteOutcome =
  | { success: true; route: RouteResult }
  | { success: false; error: ProviderError };
