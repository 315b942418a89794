import { describe, it, expect } from 'vitest';
import { configSchema, ratingsConfigSchema, synonymsConfigSchema } from '../../../src/config/schema.js';

describe('Config Schema', () => {
  it('should fill every section with defaults', () => {
    const config = configSchema.parse({});

    expect(config).toEqual({
      data: { eventsCsv: 'Merged_Enriched_Events_CLUSTERED.csv' },
      output: { database: '.event-scout/ratings.db' },
      synonyms: {
        enabled: true,
        useBuiltinSynonyms: true,
        customSynonyms: [],
        overrides: {},
        disabled: [],
        minWeightThreshold: 0.3,
        maxExpansions: 15,
      },
      scoring: { keywordWeight: 1, ratingWeight: 0.5, unratedScore: 0 },
      ratings: { min: 1, max: 5, maxCommentLength: 500 },
      search: { defaultLimit: 10, suggestions: 3 },
    });
  });

  it('should reject rating bounds where min is not below max', () => {
    const result = ratingsConfigSchema.safeParse({ min: 5, max: 5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0]?.path).toEqual(['min']);
    }
  });

  it('should reject fractional rating bounds', () => {
    expect(ratingsConfigSchema.safeParse({ min: 0.5 }).success).toBe(false);
  });

  it('should accept override lists in either synonym form', () => {
    const parsed = synonymsConfigSchema.parse({
      overrides: { food: ['meals', { term: 'pantry', weight: 0.5, bidirectional: false }] },
    });

    expect(parsed.overrides['food']).toEqual([
      { term: 'meals', weight: 0.8, bidirectional: true },
      { term: 'pantry', weight: 0.5, bidirectional: false },
    ]);
  });

  it('should reject synonym weights above 1', () => {
    const result = synonymsConfigSchema.safeParse({
      customSynonyms: [{ canonical: 'x', synonyms: [{ term: 'y', weight: 1.5 }] }],
    });

    expect(result.success).toBe(false);
  });

  it('should bound maxExpansions', () => {
    expect(synonymsConfigSchema.safeParse({ maxExpansions: 0 }).success).toBe(false);
    expect(synonymsConfigSchema.safeParse({ maxExpansions: 51 }).success).toBe(false);
  });
});
