/**
 * Shared keyword matching over an event's searchable text fields
 */

import type { VolunteerEvent } from '../types/index.js';

/**
 * Lower-cased title, description and organization name. Kept separate so a
 * term never matches across a field boundary.
 */
export function searchableFields(event: VolunteerEvent): [string, string, string] {
  return [
    event.title.toLowerCase(),
    event.description.toLowerCase(),
    event.orgTitle.toLowerCase(),
  ];
}

/**
 * Terms (already lower-cased) that occur in any searchable field
 */
export function findMatchedTerms(event: VolunteerEvent, terms: readonly string[]): string[] {
  if (terms.length === 0) return [];
  const fields = searchableFields(event);
  return terms.filter(term => fields.some(field => field.includes(term)));
}
