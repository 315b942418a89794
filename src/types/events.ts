/**
 * Core record types for the volunteer event catalog
 */

export interface VolunteerEvent {
  readonly id: string;
  readonly row: number;  // 0-based position in the source CSV
  readonly title: string;
  readonly description: string;
  readonly orgTitle: string;
  readonly startDate: string | null;  // YYYY-MM-DD
  readonly location: string;
  readonly theme: string;
  readonly mood: string;
}

/**
 * The full catalog for one session. Loaded once, never mutated.
 */
export type EventTable = readonly VolunteerEvent[];

export interface DateRange {
  from?: string;
  to?: string;
}

export interface FilterCriteria {
  keyword?: string;
  theme?: string;
  mood?: string;
  dateRange?: DateRange;
  location?: string;
}

export interface Rating {
  eventId: string;
  score: number;
  comment?: string;
  createdAt: string;
}

export interface RatingSummary {
  average: number;
  count: number;
}

/**
 * Read side of the rating aggregates, as seen by ranking and analytics
 */
export interface RatingLookup {
  getSummary(eventId: string): RatingSummary | null;
}

export interface RatingInput {
  eventId: string;
  score: number;
  comment?: string;
}

export interface RatingResult {
  rating: Rating;
  average: number;
  count: number;
  persisted: boolean;
}

export interface RankedEvent {
  event: VolunteerEvent;
  score: number;
  matchedTerms: string[];
  rating: RatingSummary | null;
}

export interface FacetCount {
  value: string;
  count: number;
}

export interface TopRatedEvent {
  event: VolunteerEvent;
  average: number;
  count: number;
}

export interface CatalogStats {
  totalEvents: number;
  byTheme: FacetCount[];
  byMood: FacetCount[];
  byMonth: FacetCount[];
  undated: number;
  totalRatings: number;
  ratedEvents: number;
  topRated: TopRatedEvent[];
}

export interface Facets {
  themes: string[];
  moods: string[];
}
