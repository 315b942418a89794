/**
 * Type definitions for the keyword synonym table
 */

/**
 * A single synonym with metadata
 */
export interface Synonym {
  term: string;
  weight: number;  // 0.0 - 1.0
  bidirectional: boolean;
}

/**
 * A canonical term with its synonyms
 */
export interface SynonymEntry {
  canonical: string;
  synonyms: Synonym[];
}

/**
 * The effective, read-only table used to expand search keywords
 */
export type SynonymTable = readonly SynonymEntry[];

/**
 * Configuration for synonym expansion
 */
export interface SynonymConfig {
  enabled: boolean;
  useBuiltinSynonyms: boolean;
  customSynonyms: SynonymEntry[];
  overrides: Record<string, Synonym[]>;
  disabled: string[];  // Canonical terms to disable
  minWeightThreshold: number;
  maxExpansions: number;
}

/**
 * Default synonym configuration
 */
export const DEFAULT_SYNONYM_CONFIG: SynonymConfig = {
  enabled: true,
  useBuiltinSynonyms: true,
  customSynonyms: [],
  overrides: {},
  disabled: [],
  minWeightThreshold: 0.3,
  maxExpansions: 15,
};

export type ExpansionSource = 'original' | 'canonical' | 'synonym';

export interface ExpansionTerm {
  term: string;
  weight: number;
  source: ExpansionSource;
}

/**
 * Result of expanding a keyword. `terms` always starts with the original.
 */
export interface ExpansionResult {
  original: string;
  terms: ExpansionTerm[];
}
