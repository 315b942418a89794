/**
 * event-scout - search, rank and rate volunteer events
 *
 * The catalog is a CSV loaded once per session. Searches are pure functions
 * over that table; ratings live in an append-only SQLite store.
 */

// Types
export * from './types/index.js';
export { ValidationError, CatalogLoadError } from './errors.js';

// Session
export { EventAgent, type EventAgentConfig, type SearchOptions, type SearchResponse } from './agent/index.js';

// Catalog
export {
  REQUIRED_COLUMNS,
  parseEventsCsv,
  loadEventsCsv,
  normalizeDate,
  listFacets,
  summarizeCatalog,
} from './catalog/index.js';

// Search
export {
  filterEvents,
  rankEvents,
  scoreEvent,
  explainScore,
  suggestEvents,
  DEFAULT_SCORING_WEIGHTS,
  type FilterOptions,
  type FilterResult,
  type ScoringWeights,
} from './search/index.js';

// Synonyms
export {
  buildSynonymTable,
  expandKeyword,
  getExpandedTerms,
  type SynonymTable,
  type SynonymEntry,
  type ExpansionResult,
} from './synonyms/index.js';

// Ratings
export { RatingService, SqliteRatingStore, type RatingStore } from './ratings/index.js';

// Server
export { createServer, startStdioServer, registerTools, type ServerOptions } from './server/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
} from './config/index.js';
