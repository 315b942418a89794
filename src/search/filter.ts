/**
 * Search & filter over the in-memory event table
 */

import type { DateRange, EventTable, FilterCriteria, VolunteerEvent } from '../types/index.js';
import type { ExpansionResult, SynonymConfig, SynonymTable } from '../synonyms/index.js';
import { expandKeyword } from '../synonyms/index.js';
import { normalizeDate } from '../catalog/csv-loader.js';
import { ValidationError } from '../errors.js';
import { findMatchedTerms } from './text.js';

export interface FilterOptions {
  /** Table used to expand the keyword; without one the keyword is matched as typed */
  synonyms?: SynonymTable;
  expandSynonyms?: boolean;
  synonymConfig?: Partial<SynonymConfig>;
}

export interface FilterResult {
  events: VolunteerEvent[];
  /** Lower-cased keyword terms the events were matched against; empty without a keyword */
  terms: string[];
  expansion: ExpansionResult | null;
}

interface ActiveCriteria {
  terms: string[];
  theme: string | null;
  mood: string | null;
  from: string | null;
  to: string | null;
  location: string | null;
}

function normalizeOptionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function normalizeBound(value: string | undefined, field: 'from' | 'to'): string | null {
  const raw = normalizeOptionalText(value);
  if (raw === null) return null;

  const date = normalizeDate(raw);
  if (date === null) {
    throw new ValidationError(`dateRange.${field}`, `Invalid ${field} date "${raw}". Expected YYYY-MM-DD.`);
  }
  return date;
}

function resolveDateRange(range: DateRange | undefined): { from: string | null; to: string | null } {
  return {
    from: normalizeBound(range?.from, 'from'),
    to: normalizeBound(range?.to, 'to'),
  };
}

function matchesDate(event: VolunteerEvent, from: string | null, to: string | null): boolean {
  if (from === null && to === null) return true;
  if (event.startDate === null) return false;
  // YYYY-MM-DD compares correctly as text
  if (from !== null && event.startDate < from) return false;
  if (to !== null && event.startDate > to) return false;
  return true;
}

function matchesEvent(event: VolunteerEvent, active: ActiveCriteria): boolean {
  if (active.terms.length > 0 && findMatchedTerms(event, active.terms).length === 0) {
    return false;
  }
  if (active.theme !== null && event.theme !== active.theme) return false;
  if (active.mood !== null && event.mood !== active.mood) return false;
  if (!matchesDate(event, active.from, active.to)) return false;
  if (active.location !== null && !event.location.toLowerCase().includes(active.location)) {
    return false;
  }
  return true;
}

/**
 * Select the events that satisfy every active criterion, in table order.
 *
 * Pure: the table is only read. An unset criterion places no constraint, and
 * a query that matches nothing yields an empty list. Throws ValidationError
 * only for a date bound that is not a date.
 */
export function filterEvents(
  table: EventTable,
  criteria: FilterCriteria,
  options: FilterOptions = {}
): FilterResult {
  const keyword = normalizeOptionalText(criteria.keyword);
  const { from, to } = resolveDateRange(criteria.dateRange);

  let expansion: ExpansionResult | null = null;
  if (keyword !== null) {
    const expand = options.expandSynonyms !== false && options.synonyms !== undefined;
    expansion = expandKeyword(keyword, options.synonyms ?? [], {
      ...options.synonymConfig,
      enabled: expand && options.synonymConfig?.enabled !== false,
    });
  }

  const active: ActiveCriteria = {
    terms: expansion ? expansion.terms.map(t => t.term) : [],
    // Theme and mood are exact matches, so only surrounding whitespace is dropped
    theme: normalizeOptionalText(criteria.theme),
    mood: normalizeOptionalText(criteria.mood),
    from,
    to,
    location: normalizeOptionalText(criteria.location)?.toLowerCase() ?? null,
  };

  return {
    events: table.filter(event => matchesEvent(event, active)),
    terms: active.terms,
    expansion,
  };
}
