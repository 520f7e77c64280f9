/**
 * =============================================================================
 * REPORT FORMATTER - Plain-text tool output
 * =============================================================================
 *
 * Every tool answers with one text block. The layouts here are what a
 * chat client shows the user, so line order and number precision are
 * part of the contract:
 *
 *   Needed distance  -> 2 decimals ("5.66 km")
 *   Burn rate        -> 0 decimals ("~53 kcal/km")
 *   Route km         -> 2 decimals
 *   Calories         -> 1 decimal  ("~185.5 kcal")
 *
 * Optional provider fields may be empty; nothing here throws.
 * =============================================================================
 */

import { TravelMode } from '../../core/constants';
import { toTitleCase } from '../../shared/utils/text.utils';
import { PlaceCandidate } from '../places/places.service';
import { RouteResult, RouteStep } from '../routing/routing.schema';
import { caloriesToDistanceKm, distanceToCalories, kmToMiles } from './calorie.utils';
import { FitnessPlan } from './fitness.schema';

const STEPS_HEADER = '--- Detailed Route Steps ---';

// =============================================================================
// STEPS
// =============================================================================

export function formatRouteStep(step: RouteStep, index: number, mode: TravelMode): string {
  let line = `${index}. ${step.instruction}`;
  if (!step.distanceText) {
    return line;
  }

  line += ` (${step.distanceText}`;
  if (step.durationText) {
    line += `, ${step.durationText}`;
  }
  const calories = distanceToCalories(step.distanceMeters, mode);
  if (calories > 0) {
    line += `, ~${calories.toFixed(1)} kcal`;
  }
  return `${line})`;
}

/**
 * Numbered turn-by-turn list, one step per line
 */
export function formatRouteSteps(steps: RouteStep[], mode: TravelMode = TravelMode.WALKING): string {
  if (steps.length === 0) {
    return 'No detailed route steps available.';
  }
  return steps.map((step, i) => formatRouteStep(step, i + 1, mode)).join('\n');
}

function stepsSection(route: RouteResult): string {
  if (route.steps.length === 0) {
    return '';
  }
  return `\n\n${STEPS_HEADER}\n\n${formatRouteSteps(route.steps, route.mode)}`;
}

function endpointLine(route: RouteResult): string {
  return route.isLoop
    ? 'Route Type: Loop (returns to start)'
    : `Destination: ${route.destination}`;
}

// =============================================================================
// FITNESS ROUTE
// =============================================================================

export interface FitnessReportInput {
  targetCalories: number;
  neededKm: number;
  burnRate: number;
  route: RouteResult;
  shortfallKm: number;
}

/**
 * Route summary with a comparison against the distance the target needs
 */
export function formatFitnessReport({ targetCalories, neededKm, burnRate, route, shortfallKm }: FitnessReportInput): string {
  const routeKm = route.distanceMeters / 1000;
  const totalCalories = distanceToCalories(route.distanceMeters, route.mode);

  const lines = [
    'Fitness Route Information:',
    '',
    `Target Calories: ${targetCalories} kcal`,
    `Needed Distance: ${neededKm.toFixed(2)} km (at ~${burnRate.toFixed(0)} kcal/km for ${route.mode})`,
    '',
    'Route Details:',
    `Origin: ${route.origin}`,
    endpointLine(route),
    `Distance: ${route.distanceText} (${routeKm.toFixed(2)} km)`,
    `Duration: ${route.durationText}`,
    `Mode: ${route.mode}`,
  ];
  if (totalCalories > 0) {
    lines.push(`Total Calories Burned: ~${totalCalories.toFixed(1)} kcal`);
  }
  lines.push('');

  let comparison: string;
  if (shortfallKm > 0) {
    const shortfall = shortfallKm.toFixed(2);
    comparison = route.isLoop
      ? `Note: This route is ${shortfall} km shorter than needed. You may want to extend the loop or make multiple loops to burn ${targetCalories} calories.`
      : `Note: This route is ${shortfall} km shorter than needed. You may need to extend the route or make multiple trips to burn ${targetCalories} calories.`;
  } else {
    comparison = `Great! This route should help you burn approximately ${targetCalories} calories.`;
  }
  lines.push(comparison);

  return lines.join('\n') + stepsSection(route);
}

export function formatFitnessPlan(plan: FitnessPlan): string {
  if (plan.kind === 'gym_suggestion') {
    return formatGymSuggestion(plan.targetCalories, plan.mode, plan.gym);
  }
  const report = formatFitnessReport(plan);
  if (!plan.longWalkWarning) {
    return report;
  }
  return `${formatLongWalkWarning(plan.targetCalories, plan.route.mode)}\n\n${report}`;
}

// =============================================================================
// PLAIN DIRECTIONS
// =============================================================================

export function formatDirectionsReport(route: RouteResult): string {
  const lines = [
    'Route Information:',
    '',
    `Origin: ${route.origin}`,
    endpointLine(route),
    `Distance: ${route.distanceText}`,
    `Duration: ${route.durationText}`,
    `Mode: ${route.mode}`,
  ];
  const totalCalories = distanceToCalories(route.distanceMeters, route.mode);
  if (totalCalories > 0) {
    lines.push(`Total Calories Burned: ~${totalCalories.toFixed(1)} kcal`);
  }

  return lines.join('\n') + stepsSection(route);
}

// =============================================================================
// LONG WALKS
// =============================================================================

function longWalkNote(targetCalories: number, mode: TravelMode): string {
  const km = caloriesToDistanceKm(targetCalories, mode);
  return `⚠️ Note: Burning ${targetCalories} calories through walking alone would require approximately ` +
    `${km.toFixed(1)} km (~${kmToMiles(km).toFixed(1)} miles), which is quite a long walk!`;
}

/**
 * Terminal answer for a long walking target when a gym is nearby
 */
export function formatGymSuggestion(targetCalories: number, mode: TravelMode, gym: PlaceCandidate): string {
  return [
    `Target Calories: ${targetCalories} kcal`,
    '',
    longWalkNote(targetCalories, mode),
    '',
    '💪 Gym Suggestion:',
    'Instead, consider working out at a nearby gym:',
    '',
    `Name: ${gym.name}`,
    `Address: ${gym.address}`,
    '',
    `You can burn ${targetCalories} calories much more efficiently at a gym through:`,
    '- Cardio exercises (running, cycling, rowing)',
    '- Strength training',
    '- High-intensity interval training (HIIT)',
    '',
    'Would you like me to find a route to this gym instead?',
  ].join('\n');
}

/**
 * Paragraph prefixed to the route report when no gym was found
 */
export function formatLongWalkWarning(targetCalories: number, mode: TravelMode): string {
  return [
    `Target Calories: ${targetCalories} kcal`,
    '',
    longWalkNote(targetCalories, mode),
    '',
    "💡 Suggestion: Consider finding a nearby gym for a more efficient workout. I couldn't find a gym nearby, but you might want to search for one manually.",
    '',
    "I can still provide the walking route if you'd like, but it will be a very long distance.",
  ].join('\n');
}

// =============================================================================
// NEAREST PLACE
// =============================================================================

export function formatNearestPlace(placeType: string, place: PlaceCandidate): string {
  return [
    `Nearest ${toTitleCase(placeType)}:`,
    '',
    `Name: ${place.name}`,
    `Address: ${place.address}`,
    '',
    'Would you like directions to this location?',
  ].join('\n');
}

/**
 * Radius as typed, whole numbers with one decimal ("5.0", "2.5")
 */
function formatRadiusKm(radiusKm: number): string {
  return Number.isInteger(radiusKm) ? radiusKm.toFixed(1) : String(radiusKm);
}

export function formatNoPlaceFound(placeType: string, radiusKm: number, origin: string): string {
  return `No ${placeType} found within ${formatRadiusKm(radiusKm)} km of ${origin}. ` +
    'Try increasing the search radius or checking a different location.';
}
