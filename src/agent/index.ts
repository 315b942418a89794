/**
 * Session orchestration: one loaded catalog, its synonym table and ratings
 */

import type {
  CatalogStats,
  EventTable,
  Facets,
  FilterCriteria,
  RankedEvent,
  RatingInput,
  RatingResult,
  RatingSummary,
  VolunteerEvent,
} from '../types/index.js';
import type { Config } from '../config/index.js';
import { getDefaultConfig } from '../config/index.js';
import { loadEventsCsv, listFacets, summarizeCatalog } from '../catalog/index.js';
import { buildSynonymTable, type SynonymTable } from '../synonyms/index.js';
import { filterEvents, rankEvents, scoreEvents, suggestEvents } from '../search/index.js';
import { RatingService, SqliteRatingStore, type RatingStore } from '../ratings/index.js';

export interface EventAgentConfig {
  eventsPath: string;
  databasePath: string;
  config?: Config;
  /** Replaces the SQLite store at databasePath */
  store?: RatingStore;
}

export interface SearchOptions {
  expandSynonyms?: boolean;
  rank?: boolean;
  limit?: number;
}

export interface SearchResponse {
  /** Matches before the limit was applied */
  total: number;
  results: RankedEvent[];
  terms: string[];
  ranked: boolean;
  /** Close titles, offered only when a keyword search found nothing */
  suggestions: string[];
}

export class EventAgent {
  private settings: EventAgentConfig;
  private config: Config;
  private table: EventTable = [];
  private synonyms: SynonymTable = [];
  private ratings: RatingService | null = null;
  private initialized = false;

  constructor(settings: EventAgentConfig) {
    this.settings = settings;
    this.config = settings.config ?? getDefaultConfig();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    this.table = await loadEventsCsv(this.settings.eventsPath);
    this.synonyms = buildSynonymTable(this.config.synonyms);

    const store = this.settings.store ?? new SqliteRatingStore(this.settings.databasePath);
    const ratings = new RatingService(store, this.table, this.config.ratings);
    await ratings.initialize();
    this.ratings = ratings;

    this.initialized = true;
  }

  async close(): Promise<void> {
    if (this.ratings) {
      await this.ratings.close();
      this.ratings = null;
    }
    this.initialized = false;
  }

  get events(): EventTable {
    return this.table;
  }

  getConfig(): Config {
    return this.config;
  }

  getEvent(eventId: string): VolunteerEvent | null {
    const id = eventId.trim();
    return this.table.find(e => e.id === id) ?? null;
  }

  search(criteria: FilterCriteria, options: SearchOptions = {}): SearchResponse {
    const ratings = this.requireRatings();
    const expandSynonyms = options.expandSynonyms ?? this.config.synonyms.enabled;
    const rank = options.rank ?? false;
    const limit = options.limit ?? this.config.search.defaultLimit;

    const filtered = filterEvents(this.table, criteria, {
      synonyms: this.synonyms,
      expandSynonyms,
      synonymConfig: this.config.synonyms,
    });

    const scored = rank
      ? rankEvents(filtered.events, filtered.terms, ratings, this.config.scoring)
      : scoreEvents(filtered.events, filtered.terms, ratings, this.config.scoring);

    const keyword = criteria.keyword?.trim() ?? '';
    const suggestions = filtered.events.length === 0 && keyword
      ? suggestEvents(this.table, keyword, this.config.search.suggestions).map(e => e.title)
      : [];

    return {
      total: filtered.events.length,
      results: scored.slice(0, Math.max(0, limit)),
      terms: filtered.terms,
      ranked: rank,
      suggestions,
    };
  }

  getRating(eventId: string): RatingSummary | null {
    return this.requireRatings().getSummary(eventId.trim());
  }

  /**
   * False when the rating store could not be opened for this session
   */
  isPersistent(): boolean {
    return this.requireRatings().isPersistent();
  }

  async rate(input: RatingInput): Promise<RatingResult> {
    return this.requireRatings().submit(input);
  }

  getStats(topN?: number): CatalogStats {
    return summarizeCatalog(this.table, this.requireRatings(), topN);
  }

  getFacets(): Facets {
    return listFacets(this.table);
  }

  private requireRatings(): RatingService {
    if (!this.ratings) throw new Error('EventAgent not initialized');
    return this.ratings;
  }
}
