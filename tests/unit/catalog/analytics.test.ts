import { describe, it, expect } from 'vitest';
import { BLANK_FACET, listFacets, summarizeCatalog } from '../../../src/catalog/analytics.js';
import { parseEventsCsv } from '../../../src/catalog/csv-loader.js';
import { buildEventsCsv } from '../../helpers/fixtures.js';
import { ratingLookup } from '../../helpers/ratings.js';

const table = parseEventsCsv(buildEventsCsv([
  { title: 'Beach Cleanup', org: 'Shore', date: '2025-06-14', theme: 'Environment', mood: 'Hands-on' },
  { title: 'Food Drive', org: 'Pantry', date: '2025-06-20', theme: 'Social', mood: 'Hands-on' },
  { title: 'Park Cleanup', org: 'Parks', date: '2025-08-15', theme: 'Environment', mood: 'Relaxed' },
  { title: 'Mystery Event', org: 'Unknown' },
]));

const [beach, food, park] = table;

describe('listFacets', () => {
  it('should list distinct non-empty values in sorted order', () => {
    expect(listFacets(table)).toEqual({
      themes: ['Environment', 'Social'],
      moods: ['Hands-on', 'Relaxed'],
    });
  });

  it('should return empty lists for an empty table', () => {
    expect(listFacets([])).toEqual({ themes: [], moods: [] });
  });
});

describe('summarizeCatalog', () => {
  it('should count facets most frequent first, blanks as a named bucket', () => {
    const stats = summarizeCatalog(table, ratingLookup({}));

    expect(stats.totalEvents).toBe(4);
    expect(stats.byTheme).toEqual([
      { value: 'Environment', count: 2 },
      { value: BLANK_FACET, count: 1 },
      { value: 'Social', count: 1 },
    ]);
    expect(stats.byMood).toEqual([
      { value: 'Hands-on', count: 2 },
      { value: BLANK_FACET, count: 1 },
      { value: 'Relaxed', count: 1 },
    ]);
  });

  it('should count events by month and report undated ones', () => {
    const stats = summarizeCatalog(table, ratingLookup({}));

    expect(stats.byMonth).toEqual([
      { value: '2025-06', count: 2 },
      { value: '2025-08', count: 1 },
    ]);
    expect(stats.undated).toBe(1);
  });

  it('should report no ratings for an unrated catalog', () => {
    const stats = summarizeCatalog(table, ratingLookup({}));

    expect(stats.totalRatings).toBe(0);
    expect(stats.ratedEvents).toBe(0);
    expect(stats.topRated).toEqual([]);
  });

  it('should order top rated by average, then count, then table order', () => {
    if (!beach || !food || !park) throw new Error('fixture table is incomplete');

    const stats = summarizeCatalog(table, ratingLookup({
      [beach.id]: { average: 4, count: 1 },
      [food.id]: { average: 4, count: 3 },
      [park.id]: { average: 5, count: 1 },
    }));

    expect(stats.totalRatings).toBe(5);
    expect(stats.ratedEvents).toBe(3);
    expect(stats.topRated.map(t => t.event.title)).toEqual(['Park Cleanup', 'Food Drive', 'Beach Cleanup']);
  });

  it('should limit the top rated list', () => {
    if (!beach || !food) throw new Error('fixture table is incomplete');

    const stats = summarizeCatalog(table, ratingLookup({
      [beach.id]: { average: 3, count: 1 },
      [food.id]: { average: 2, count: 1 },
    }), 1);

    expect(stats.topRated).toEqual([{ event: beach, average: 3, count: 1 }]);
    expect(stats.ratedEvents).toBe(2);
  });

  it('should count ratings once for rows that share an id', () => {
    const duplicated = parseEventsCsv(buildEventsCsv([
      { title: 'Repeat', org: 'Org', date: '2025-01-01' },
      { title: 'Repeat', org: 'Org', date: '2025-01-01' },
    ]));
    const id = duplicated[0]?.id ?? '';

    const stats = summarizeCatalog(duplicated, ratingLookup({ [id]: { average: 4, count: 2 } }));

    expect(stats.totalEvents).toBe(2);
    expect(stats.totalRatings).toBe(2);
    expect(stats.ratedEvents).toBe(1);
  });
});
