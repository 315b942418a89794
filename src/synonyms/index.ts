/**
 * Synonym table and keyword expansion
 */

export type {
  Synonym,
  SynonymEntry,
  SynonymTable,
  SynonymConfig,
  ExpansionSource,
  ExpansionTerm,
  ExpansionResult,
} from './types.js';

export { DEFAULT_SYNONYM_CONFIG } from './types.js';

export { getDefaultSynonyms, loadSynonymFile, resetSynonymCache } from './default-synonyms.js';

export { buildSynonymTable, expandKeyword, getExpandedTerms } from './expander.js';
