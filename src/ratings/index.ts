export { RatingService, DEFAULT_RATING_BOUNDS, type RatingBounds } from './service.js';
export { SqliteRatingStore, type RatingStore } from './store/index.js';
