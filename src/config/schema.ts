/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const dataConfigSchema = z.object({
  eventsCsv: z.string().default('Merged_Enriched_Events_CLUSTERED.csv'),
});

export const outputConfigSchema = z.object({
  database: z.string().default('.event-scout/ratings.db'),
});

// Synonym configuration schema
export const synonymSchema = z.object({
  term: z.string().min(1),
  weight: z.number().min(0).max(1).default(0.8),
  bidirectional: z.boolean().default(true),
});

// Plain strings are shorthand for a default-weight bidirectional synonym
export const synonymInputSchema = z.union([
  z.string().min(1).transform(term => ({ term, weight: 0.8, bidirectional: true })),
  synonymSchema,
]);

export const synonymEntrySchema = z.object({
  canonical: z.string().min(1),
  synonyms: z.array(synonymInputSchema),
});

export const synonymsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  useBuiltinSynonyms: z.boolean().default(true),
  customSynonyms: z.array(synonymEntrySchema).default([]),
  overrides: z.record(z.string(), z.array(synonymInputSchema)).default({}),
  disabled: z.array(z.string()).default([]),
  minWeightThreshold: z.number().min(0).max(1).default(0.3),
  maxExpansions: z.number().int().min(1).max(50).default(15),
});

export const scoringConfigSchema = z.object({
  keywordWeight: z.number().min(0).default(1),
  ratingWeight: z.number().min(0).default(0.5),
  unratedScore: z.number().min(0).default(0),
});

export const ratingsConfigSchema = z.object({
  min: z.number().int().default(1),
  max: z.number().int().default(5),
  maxCommentLength: z.number().int().min(0).default(500),
}).refine(r => r.min < r.max, { message: 'min must be lower than max', path: ['min'] });

export const searchConfigSchema = z.object({
  defaultLimit: z.number().int().min(1).max(500).default(10),
  suggestions: z.number().int().min(0).max(20).default(3),
});

export const configSchema = z.object({
  data: dataConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  synonyms: synonymsConfigSchema.default({}),
  scoring: scoringConfigSchema.default({}),
  ratings: ratingsConfigSchema.default({}),
  search: searchConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type DataConfig = z.infer<typeof dataConfigSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type SynonymsConfig = z.infer<typeof synonymsConfigSchema>;
export type ScoringConfig = z.infer<typeof scoringConfigSchema>;
export type RatingsConfig = z.infer<typeof ratingsConfigSchema>;
export type SearchConfig = z.infer<typeof searchConfigSchema>;
