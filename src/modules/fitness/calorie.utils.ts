/**
 * =============================================================================
 * CALORIE UTILITIES - Calories <-> distance
 * =============================================================================
 *
 * Pure functions over the fixed KCAL_PER_KM table. Motorized modes have a
 * rate of zero, so both directions yield 0 for them.
 *
 * An unrecognized mode falls back to the walking rate. Every production
 * path validates the mode before it reaches these functions.
 * =============================================================================
 */

import { KCAL_PER_KM, KM_TO_MILES, TravelMode } from '../../core/constants';

/**
 * Kilocalories per kilometre for a mode (walking rate when unknown)
 */
export function getBurnRate(mode: TravelMode | string): number {
  const rates: Readonly<Record<string, number>> = KCAL_PER_KM;
  return rates[mode] ?? KCAL_PER_KM[TravelMode.WALKING];
}

/**
 * Round to one decimal place
 */
export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Distance (km) needed to burn `calories` in `mode`; 0 when the mode burns nothing
 */
export function caloriesToDistanceKm(calories: number, mode: TravelMode | string = TravelMode.WALKING): number {
  const kcalPerKm = getBurnRate(mode);
  if (kcalPerKm === 0) {
    return 0;
  }
  return calories / kcalPerKm;
}

/**
 * Calories burned over `distanceMeters`, rounded to 1 decimal
 */
export function distanceToCalories(distanceMeters: number, mode: TravelMode | string = TravelMode.WALKING): number {
  const kcalPerKm = getBurnRate(mode);
  if (kcalPerKm === 0) {
    return 0;
  }
  return roundTo1((distanceMeters / 1000) * kcalPerKm);
}

export function kmToMiles(km: number): number {
  return km * KM_TO_MILES;
}
