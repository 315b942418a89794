export {
  REQUIRED_COLUMNS,
  normalizeDate,
  computeEventId,
  parseEventsCsv,
  loadEventsCsv,
} from './csv-loader.js';

export { BLANK_FACET, listFacets, summarizeCatalog } from './analytics.js';
