/**
 * Keyword expansion using the synonym table
 */

import type {
  SynonymConfig,
  SynonymEntry,
  SynonymTable,
  ExpansionResult,
  ExpansionSource,
  ExpansionTerm,
} from './types.js';
import { DEFAULT_SYNONYM_CONFIG } from './types.js';
import { getDefaultSynonyms } from './default-synonyms.js';

type ExpansionMap = Map<string, { weight: number; source: ExpansionSource }>;

/**
 * Split a keyword into lookup tokens
 */
function tokenize(keyword: string): string[] {
  return keyword
    .toLowerCase()
    .split(/\s+/)
    .filter(term => term.length > 1);
}

function cloneEntry(entry: SynonymEntry): SynonymEntry {
  return {
    canonical: entry.canonical,
    synonyms: entry.synonyms.map(s => ({ ...s })),
  };
}

/**
 * Build the effective synonym table based on configuration
 */
export function buildSynonymTable(config: Partial<SynonymConfig> = {}): SynonymTable {
  const fullConfig: SynonymConfig = { ...DEFAULT_SYNONYM_CONFIG, ...config };
  let table: SynonymEntry[] = [];

  if (fullConfig.useBuiltinSynonyms) {
    table = getDefaultSynonyms().map(cloneEntry);
  }

  for (const custom of fullConfig.customSynonyms) {
    const existing = table.find(e => e.canonical.toLowerCase() === custom.canonical.toLowerCase());
    if (!existing) {
      table.push(cloneEntry(custom));
      continue;
    }

    // Merge into the existing entry; a custom synonym replaces one with the same term
    for (const syn of custom.synonyms) {
      const index = existing.synonyms.findIndex(s => s.term.toLowerCase() === syn.term.toLowerCase());
      if (index >= 0) {
        existing.synonyms[index] = { ...syn };
      } else {
        existing.synonyms.push({ ...syn });
      }
    }
  }

  for (const [canonical, synonyms] of Object.entries(fullConfig.overrides)) {
    const entry = table.find(e => e.canonical.toLowerCase() === canonical.toLowerCase());
    if (entry) {
      entry.synonyms = synonyms.map(s => ({ ...s }));
    }
  }

  const disabled = new Set(fullConfig.disabled.map(d => d.toLowerCase()));
  table = table.filter(e => !disabled.has(e.canonical.toLowerCase()));

  return Object.freeze(table);
}

function keepHeavier(expansions: ExpansionMap, term: string, weight: number, source: ExpansionSource): void {
  const existing = expansions.get(term);
  if (!existing || existing.weight < weight) {
    expansions.set(term, { weight, source });
  }
}

/**
 * Expand a single lookup term against every matching entry.
 * Returns whether any entry matched.
 */
function expandTerm(
  term: string,
  table: SynonymTable,
  config: SynonymConfig,
  expansions: ExpansionMap
): boolean {
  let matched = false;

  for (const entry of table) {
    const canonical = entry.canonical.toLowerCase();
    let matchWeight = 0;

    if (canonical === term) {
      matchWeight = 1.0;
    } else {
      const hit = entry.synonyms.find(s => s.bidirectional && s.term.toLowerCase() === term);
      if (hit) {
        matchWeight = hit.weight;
      }
    }

    if (matchWeight === 0) continue;
    matched = true;

    if (canonical !== term) {
      keepHeavier(expansions, canonical, 0.9 * matchWeight, 'canonical');
    }

    for (const syn of entry.synonyms) {
      if (syn.weight >= config.minWeightThreshold) {
        keepHeavier(expansions, syn.term.toLowerCase(), syn.weight * matchWeight, 'synonym');
      }
    }
  }

  return matched;
}

/**
 * Expand a search keyword into the set of terms to match.
 *
 * The trimmed, lower-cased keyword is always the first term, so matching on the
 * expansion can only ever widen the matches of the plain keyword.
 */
export function expandKeyword(
  keyword: string,
  table: SynonymTable,
  config: Partial<SynonymConfig> = {}
): ExpansionResult {
  const fullConfig: SynonymConfig = { ...DEFAULT_SYNONYM_CONFIG, ...config };
  const original = keyword.trim().toLowerCase();

  if (!original) {
    return { original, terms: [] };
  }

  const expansions: ExpansionMap = new Map();
  expansions.set(original, { weight: 1.0, source: 'original' });

  if (!fullConfig.enabled) {
    return { original, terms: [{ term: original, weight: 1.0, source: 'original' }] };
  }

  expandTerm(original, table, fullConfig, expansions);

  const tokens = tokenize(original);
  if (tokens.length > 1) {
    for (const token of tokens) {
      // A word with its own entry also matches as typed
      if (expandTerm(token, table, fullConfig, expansions)) {
        keepHeavier(expansions, token, 0.9, 'original');
      }
    }
  }

  // The original always stays; it has the top weight and was inserted first
  const terms: ExpansionTerm[] = Array.from(expansions.entries())
    .map(([term, data]) => ({ term, ...data }))
    .sort((a, b) => b.weight - a.weight)
    .slice(0, fullConfig.maxExpansions);

  return { original, terms };
}

/**
 * Get a simple list of expanded terms for a keyword
 */
export function getExpandedTerms(
  keyword: string,
  table: SynonymTable,
  config: Partial<SynonymConfig> = {}
): string[] {
  return expandKeyword(keyword, table, config).terms.map(t => t.term);
}
