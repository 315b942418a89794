/**
 * Recommendation scoring: keyword hits plus stored ratings
 */

import type { RankedEvent, RatingLookup, VolunteerEvent } from '../types/index.js';
import { findMatchedTerms } from './text.js';

export interface ScoringWeights {
  /** Points per distinct keyword term found in the event text */
  keywordWeight: number;
  /** Multiplier on the event's average rating */
  ratingWeight: number;
  /** Stand-in average for events nobody has rated */
  unratedScore: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  keywordWeight: 1,
  ratingWeight: 0.5,
  unratedScore: 0,
};

export function scoreEvent(
  event: VolunteerEvent,
  terms: readonly string[],
  ratings: RatingLookup,
  weights: Partial<ScoringWeights> = {}
): RankedEvent {
  const full = { ...DEFAULT_SCORING_WEIGHTS, ...weights };
  const matchedTerms = findMatchedTerms(event, terms);
  const rating = ratings.getSummary(event.id);
  const average = rating ? rating.average : full.unratedScore;

  return {
    event,
    score: matchedTerms.length * full.keywordWeight + average * full.ratingWeight,
    matchedTerms,
    rating,
  };
}

/**
 * Score every event without reordering
 */
export function scoreEvents(
  events: readonly VolunteerEvent[],
  terms: readonly string[],
  ratings: RatingLookup,
  weights: Partial<ScoringWeights> = {}
): RankedEvent[] {
  return events.map(event => scoreEvent(event, terms, ratings, weights));
}

/**
 * Score and sort events, best first. Equal scores keep their input order.
 */
export function rankEvents(
  events: readonly VolunteerEvent[],
  terms: readonly string[],
  ratings: RatingLookup,
  weights: Partial<ScoringWeights> = {}
): RankedEvent[] {
  return scoreEvents(events, terms, ratings, weights)
    .map((ranked, index) => ({ ranked, index }))
    .sort((a, b) => b.ranked.score - a.ranked.score || a.index - b.index)
    .map(entry => entry.ranked);
}

/**
 * Human-readable breakdown of a ranked event's score
 */
export function explainScore(result: RankedEvent, weights: Partial<ScoringWeights> = {}): string {
  const full = { ...DEFAULT_SCORING_WEIGHTS, ...weights };
  const parts: string[] = [];

  if (result.matchedTerms.length > 0) {
    const terms = result.matchedTerms.map(t => `"${t}"`).join(', ');
    parts.push(`${result.matchedTerms.length} term(s) x ${full.keywordWeight} (${terms})`);
  }

  if (result.rating) {
    parts.push(`avg ${result.rating.average.toFixed(1)} of ${result.rating.count} x ${full.ratingWeight}`);
  } else if (full.unratedScore > 0) {
    parts.push(`unrated ${full.unratedScore} x ${full.ratingWeight}`);
  } else {
    parts.push('unrated');
  }

  return `${result.score.toFixed(2)} = ${parts.join(' + ')}`;
}
