/**
 * Rating submission and per-event aggregates
 */

import type {
  EventTable,
  Rating,
  RatingInput,
  RatingLookup,
  RatingResult,
  RatingSummary,
} from '../types/index.js';
import { ValidationError } from '../errors.js';
import type { RatingStore } from './store/index.js';

export interface RatingBounds {
  min: number;
  max: number;
  maxCommentLength: number;
}

export const DEFAULT_RATING_BOUNDS: RatingBounds = {
  min: 1,
  max: 5,
  maxCommentLength: 500,
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface Aggregate {
  sum: number;
  count: number;
}

export class RatingService implements RatingLookup {
  private store: RatingStore;
  private bounds: RatingBounds;
  private eventIds: Set<string>;
  private aggregates = new Map<string, Aggregate>();
  private now: () => Date;
  private storeAvailable = false;

  constructor(
    store: RatingStore,
    table: EventTable,
    bounds: Partial<RatingBounds> = {},
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.bounds = { ...DEFAULT_RATING_BOUNDS, ...bounds };
    this.eventIds = new Set(table.map(e => e.id));
    this.now = now;
  }

  /**
   * Open the store and fold every stored rating into the averages.
   *
   * A store that cannot be opened or read is logged, and the session runs on
   * in-memory aggregates alone.
   */
  async initialize(): Promise<void> {
    this.aggregates.clear();

    let stored: Rating[];
    try {
      await this.store.initialize();
      stored = await this.store.list();
      this.storeAvailable = true;
    } catch (error) {
      this.storeAvailable = false;
      console.warn(`Warning: rating store unavailable (${describeError(error)}); ratings will only count for this session.`);
      return;
    }

    let skipped = 0;
    for (const rating of stored) {
      if (!this.isScoreInRange(rating.score)) {
        skipped++;
        continue;
      }
      this.record(rating);
    }

    if (skipped > 0) {
      console.warn(`Skipped ${skipped} stored rating(s) outside ${this.bounds.min}-${this.bounds.max}`);
    }
  }

  /**
   * Whether submissions are being written to the store
   */
  isPersistent(): boolean {
    return this.storeAvailable;
  }

  getSummary(eventId: string): RatingSummary | null {
    const aggregate = this.aggregates.get(eventId);
    if (!aggregate || aggregate.count === 0) return null;
    return { average: aggregate.sum / aggregate.count, count: aggregate.count };
  }

  getAverage(eventId: string): number | null {
    return this.getSummary(eventId)?.average ?? null;
  }

  /**
   * Validate a submission, append it, and return the event's new average.
   *
   * Invalid input throws ValidationError before the store is touched. A failed
   * store write is logged and still counted for this session.
   */
  async submit(input: RatingInput): Promise<RatingResult> {
    const rating = this.validate(input);

    let persisted = false;
    let reason = 'rating store unavailable';
    if (this.storeAvailable) {
      try {
        await this.store.append(rating);
        persisted = true;
      } catch (error) {
        reason = describeError(error);
      }
    }
    if (!persisted) {
      console.warn(`Warning: rating for ${rating.eventId} was not saved (${reason}); it only counts for this session.`);
    }

    this.record(rating);
    const summary = this.getSummary(rating.eventId);

    return {
      rating,
      average: summary?.average ?? rating.score,
      count: summary?.count ?? 1,
      persisted,
    };
  }

  validate(input: RatingInput): Rating {
    const eventId = input.eventId.trim();
    if (!this.eventIds.has(eventId)) {
      throw new ValidationError('eventId', `Unknown event: ${input.eventId}`);
    }

    if (!Number.isInteger(input.score)) {
      throw new ValidationError('score', `Score must be a whole number from ${this.bounds.min} to ${this.bounds.max}`);
    }
    if (!this.isScoreInRange(input.score)) {
      throw new ValidationError('score', `Score ${input.score} is out of range (${this.bounds.min}-${this.bounds.max})`);
    }

    const comment = input.comment?.trim();
    if (comment && comment.length > this.bounds.maxCommentLength) {
      throw new ValidationError('comment', `Comment is longer than ${this.bounds.maxCommentLength} characters`);
    }

    return {
      eventId,
      score: input.score,
      ...(comment ? { comment } : {}),
      createdAt: this.now().toISOString(),
    };
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private isScoreInRange(score: number): boolean {
    return score >= this.bounds.min && score <= this.bounds.max;
  }

  private record(rating: Rating): void {
    const aggregate = this.aggregates.get(rating.eventId) ?? { sum: 0, count: 0 };
    aggregate.sum += rating.score;
    aggregate.count += 1;
    this.aggregates.set(rating.eventId, aggregate);
  }
}
