/**
 * Event search, ranking and suggestions
 */

export type { FilterOptions, FilterResult } from './filter.js';
export { filterEvents } from './filter.js';

export type { ScoringWeights } from './scorer.js';
export { DEFAULT_SCORING_WEIGHTS, scoreEvent, scoreEvents, rankEvents, explainScore } from './scorer.js';

export { suggestEvents } from './suggest.js';

export { searchableFields, findMatchedTerms } from './text.js';

export { DESCRIPTION_PREVIEW, describeCriteria, previewDescription } from './describe.js';
