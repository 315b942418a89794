/**
 * Fuzzy "did you mean" suggestions for keyword searches with no hits
 */

import Fuse from 'fuse.js';
import type { EventTable, VolunteerEvent } from '../types/index.js';

export function suggestEvents(table: EventTable, keyword: string, limit: number): VolunteerEvent[] {
  const pattern = keyword.trim();
  if (limit <= 0 || !pattern || table.length === 0) {
    return [];
  }

  const fuse = new Fuse([...table], {
    keys: [
      { name: 'title', weight: 0.7 },
      { name: 'orgTitle', weight: 0.3 },
    ],
    threshold: 0.4,
    ignoreLocation: true,
  });

  // One suggestion per title; recurring events share one
  const seen = new Set<string>();
  const suggestions: VolunteerEvent[] = [];
  for (const { item } of fuse.search(pattern)) {
    const key = item.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    suggestions.push(item);
    if (suggestions.length >= limit) break;
  }

  return suggestions;
}
