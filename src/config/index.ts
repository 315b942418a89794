/**
 * Config module exports
 */

export {
  configSchema,
  dataConfigSchema,
  outputConfigSchema,
  synonymSchema,
  synonymEntrySchema,
  synonymsConfigSchema,
  scoringConfigSchema,
  ratingsConfigSchema,
  searchConfigSchema,
  type Config,
  type DataConfig,
  type OutputConfig,
  type SynonymsConfig,
  type ScoringConfig,
  type RatingsConfig,
  type SearchConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
