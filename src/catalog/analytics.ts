/**
 * Catalog analytics: facet counts, date spread and rating leaders
 */

import type {
  CatalogStats,
  EventTable,
  FacetCount,
  Facets,
  RatingLookup,
  TopRatedEvent,
} from '../types/index.js';

export const BLANK_FACET = '(none)';

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function countBy(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

function toFacetCounts(counts: Map<string, number>): FacetCount[] {
  return Array.from(counts, ([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || compareText(a.value, b.value));
}

function distinctSorted(values: string[]): string[] {
  return Array.from(new Set(values.filter(v => v.length > 0))).sort(compareText);
}

/**
 * Option lists for theme and mood selection
 */
export function listFacets(table: EventTable): Facets {
  return {
    themes: distinctSorted(table.map(e => e.theme)),
    moods: distinctSorted(table.map(e => e.mood)),
  };
}

export function summarizeCatalog(
  table: EventTable,
  ratings: RatingLookup,
  topN: number = 5
): CatalogStats {
  const byTheme = countBy(table.map(e => e.theme || BLANK_FACET));
  const byMood = countBy(table.map(e => e.mood || BLANK_FACET));

  const dated = table.filter(e => e.startDate !== null);
  const byMonth = Array.from(
    countBy(dated.map(e => (e.startDate ?? '').slice(0, 7))),
    ([value, count]) => ({ value, count })
  ).sort((a, b) => compareText(a.value, b.value));

  // Identical rows share an id; count their ratings once
  const seen = new Set<string>();
  const rated: TopRatedEvent[] = [];
  let totalRatings = 0;

  for (const event of table) {
    if (seen.has(event.id)) continue;
    seen.add(event.id);

    const summary = ratings.getSummary(event.id);
    if (!summary) continue;

    totalRatings += summary.count;
    rated.push({ event, average: summary.average, count: summary.count });
  }

  const topRated = [...rated]
    .sort((a, b) => b.average - a.average || b.count - a.count || a.event.row - b.event.row)
    .slice(0, topN);

  return {
    totalEvents: table.length,
    byTheme: toFacetCounts(byTheme),
    byMood: toFacetCounts(byMood),
    byMonth,
    undated: table.length - dated.length,
    totalRatings,
    ratedEvents: rated.length,
    topRated,
  };
}
