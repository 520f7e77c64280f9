/**
 * =============================================================================
 * TEXT UTILITIES
 * =============================================================================
 *
 * Provider text arrives as HTML fragments ("Turn <b>left</b> onto
 * <b>N State St</b>", "Walk &amp; cross"). Reports are plain text.
 * =============================================================================
 */

import { decodeHTML } from 'entities';

/**
 * Remove HTML tags
 */
export function stripTags(input: string): string {
  return input.replace(/<[^>]+>/g, '');
}

/**
 * Decode every HTML5 named entity (&eacute;, &rsquo;) and numeric references (&#39; / &#x2F;)
 */
export function decodeEntities(input: string): string {
  return decodeHTML(input);
}

/**
 * Markup-free instruction text
 */
export function cleanInstruction(html: string): string {
  return decodeEntities(stripTags(html));
}

/**
 * "gas_station" -> "Gas_Station", "cafés" -> "Cafés"
 */
export function toTitleCase(input: string): string {
  return input.replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
