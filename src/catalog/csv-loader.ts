/**
 * Events CSV loader
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import Papa from 'papaparse';

import type { EventTable, VolunteerEvent } from '../types/index.js';
import { CatalogLoadError } from '../errors.js';

export const REQUIRED_COLUMNS = [
  'title',
  'description',
  'org_title',
  'start_date_date',
  'primary_loc',
  'Topical Theme',
  'Mood/Intent',
] as const;

type CsvRow = Record<string, string | undefined>;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function buildIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (month < 1 || month > 12 || day < 1) return null;

  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;

  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Normalize a date cell to YYYY-MM-DD.
 * Accepts ISO dates (optionally followed by a time) and M/D/YYYY.
 */
export function normalizeDate(raw: string): string | null {
  const value = raw.trim();
  if (!value) return null;

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/.exec(value);
  if (iso) {
    return buildIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: .*)?$/.exec(value);
  if (us) {
    return buildIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

export function computeEventId(title: string, orgTitle: string, startDate: string | null): string {
  return crypto
    .createHash('sha256')
    .update(`${title}\u0000${orgTitle}\u0000${startDate ?? ''}`)
    .digest('hex')
    .slice(0, 12);
}

function cell(row: CsvRow, column: string): string {
  return (row[column] ?? '').trim();
}

function toEvent(row: CsvRow, index: number): VolunteerEvent {
  const title = cell(row, 'title');
  const orgTitle = cell(row, 'org_title');
  const startDate = normalizeDate(cell(row, 'start_date_date'));

  return Object.freeze({
    id: computeEventId(title, orgTitle, startDate),
    row: index,
    title,
    description: cell(row, 'description'),
    orgTitle,
    startDate,
    location: cell(row, 'primary_loc'),
    theme: cell(row, 'Topical Theme'),
    mood: cell(row, 'Mood/Intent'),
  });
}

/**
 * Parse CSV text into an event table. Any structural problem is fatal.
 */
export function parseEventsCsv(content: string, filePath = '<inline>'): EventTable {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: header => header.trim(),
  });

  const fields = result.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter(column => !fields.includes(column));
  if (missing.length > 0) {
    throw new CatalogLoadError(filePath, `Missing required column(s) in ${filePath}: ${missing.join(', ')}`);
  }

  // Short rows are padded with empty cells; everything else is malformed input
  const fatal = result.errors.find(e => e.code !== 'TooFewFields');
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw new CatalogLoadError(filePath, `Malformed CSV in ${filePath}${where}: ${fatal.message}`);
  }

  return Object.freeze(result.data.map((row, index) => toEvent(row, index)));
}

export async function loadEventsCsv(filePath: string): Promise<EventTable> {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new CatalogLoadError(absolutePath, `Events file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');
  return parseEventsCsv(content, absolutePath);
}
