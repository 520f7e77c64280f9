/**
 * =============================================================================
 * INTENT SERVICE - Keyword query classification
 * =============================================================================
 *
 * "burn 300 calories around here"   -> fitness_route (300)
 * "directions to the lake"          -> directions
 * "what's the weather"              -> unknown
 *
 * Matching is case-insensitive substring search; fitness wins when both
 * rules match.
 * =============================================================================
 */

export type IntentKind = 'fitness_route' | 'directions' | 'unknown';

export type QueryIntent =
  | { kind: 'fitness_route'; targetCalories: number | null }
  | { kind: 'directions' }
  | { kind: 'unknown' };

const DIRECTIONS_KEYWORDS = ['route', 'directions', 'how to get'];

export function detectIntent(query: string): IntentKind {
  const q = query.toLowerCase();
  if (q.includes('burn') && q.includes('calorie')) {
    return 'fitness_route';
  }
  if (DIRECTIONS_KEYWORDS.some(keyword => q.includes(keyword))) {
    return 'directions';
  }
  return 'unknown';
}

/**
 * Number following the first "burn", or null
 */
export function extractCalories(query: string): number | null {
  const match = /burn\s+(\d+)/.exec(query.toLowerCase());
  return match ? parseInt(match[1], 10) : null;
}

export function classifyQuery(query: string): QueryIntent {
  const kind = detectIntent(query);
  switch (kind) {
    case 'fitness_route':
      return { kind, targetCalories: extractCalories(query) };
    case 'directions':
      return { kind };
    default:
      return { kind: 'unknown' };
  }
}
