/**
 * Test fixture utilities
 */

import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { REQUIRED_COLUMNS } from '../../src/catalog/csv-loader.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(...parts: string[]): string {
  return path.join(__dirname, '../fixtures', ...parts);
}

export const SAMPLE_EVENTS_CSV = getFixturePath('events', 'sample-events.csv');

export interface TempDirResult {
  dir: string;
  cleanup: () => void;
  writeFile: (relativePath: string, content: string) => string;
}

export function createTempDir(prefix = 'event-scout-test-'): TempDirResult {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));

  const cleanup = () => {
    try {
      fs.rmSync(dir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  };

  const writeFile = (relativePath: string, content: string): string => {
    const filePath = path.join(dir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  return { dir, cleanup, writeFile };
}

export interface CsvEventRow {
  title: string;
  description?: string;
  org?: string;
  date?: string;
  location?: string;
  theme?: string;
  mood?: string;
}

function quote(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

/**
 * Build events CSV text with the required header
 */
export function buildEventsCsv(rows: CsvEventRow[]): string {
  const lines = [REQUIRED_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push([
      row.title,
      row.description ?? '',
      row.org ?? '',
      row.date ?? '',
      row.location ?? '',
      row.theme ?? '',
      row.mood ?? '',
    ].map(quote).join(','));
  }
  return `${lines.join('\n')}\n`;
}
