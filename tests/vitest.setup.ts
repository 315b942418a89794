/**
 * Vitest setup file
 * This file runs before each test file
 */

import { beforeAll, afterAll } from 'vitest';
import { resetSynonymCache } from '../src/synonyms/default-synonyms.js';

// Each file starts from a freshly read built-in synonym table
beforeAll(() => {
  resetSynonymCache();
});

afterAll(() => {
  resetSynonymCache();
});
