/**
 * Rating store interface and exports
 */

import type { Rating } from '../../types/index.js';

/**
 * Append-only persistence for ratings. Rows are never updated or deleted.
 */
export interface RatingStore {
  append(rating: Rating): Promise<void>;
  list(): Promise<Rating[]>;

  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;
}

export { SqliteRatingStore } from './sqlite.js';
