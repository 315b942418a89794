/**
 * Built-in synonym table for volunteer causes, audiences and activities.
 * The entries live in data/default-synonyms.json.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { synonymEntrySchema } from '../config/schema.js';
import type { SynonymEntry } from './types.js';

// src/synonyms and dist/synonyms sit at the same depth below the package root
const DEFAULT_SYNONYMS_URL = new URL('../../data/default-synonyms.json', import.meta.url);

let cached: SynonymEntry[] | null = null;

export function loadSynonymFile(fileUrl: URL | string): SynonymEntry[] {
  const content = fs.readFileSync(fileUrl, 'utf-8');
  const result = z.array(synonymEntrySchema).safeParse(JSON.parse(content));
  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid synonym file ${String(fileUrl)}:\n${errors}`);
  }
  return result.data;
}

/**
 * Built-in entries, read once per process
 */
export function getDefaultSynonyms(): readonly SynonymEntry[] {
  if (!cached) {
    cached = loadSynonymFile(DEFAULT_SYNONYMS_URL);
  }
  return cached;
}

export function resetSynonymCache(): void {
  cached = null;
}

