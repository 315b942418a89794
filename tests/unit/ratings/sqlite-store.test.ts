import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { SqliteRatingStore } from '../../../src/ratings/store/sqlite.js';
import { createTempDir, type TempDirResult } from '../../helpers/fixtures.js';
import { makeRating } from '../../helpers/ratings.js';

describe('SqliteRatingStore', () => {
  let temp: TempDirResult;
  let dbPath: string;
  let store: SqliteRatingStore;

  beforeEach(async () => {
    temp = createTempDir('event-scout-sqlite-');
    dbPath = path.join(temp.dir, 'nested', 'ratings.db');
    store = new SqliteRatingStore(dbPath);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    temp.cleanup();
  });

  it('should create the database file and its directory', () => {
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it('should start empty', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('should append and list ratings in insertion order', async () => {
    await store.append(makeRating('aaa', 4, { comment: 'Fun' }));
    await store.append(makeRating('bbb', 2));

    expect(await store.list()).toEqual([
      { eventId: 'aaa', score: 4, comment: 'Fun', createdAt: '2025-05-01T12:00:00.000Z' },
      { eventId: 'bbb', score: 2, createdAt: '2025-05-01T12:00:00.000Z' },
    ]);
  });

  it('should keep ratings across reopen', async () => {
    await store.append(makeRating('aaa', 5));
    await store.close();

    const reopened = new SqliteRatingStore(dbPath);
    await reopened.initialize();

    expect(await reopened.list()).toHaveLength(1);
    await reopened.close();
  });

  it('should throw when used before initialize', async () => {
    const fresh = new SqliteRatingStore(path.join(temp.dir, 'other.db'));

    await expect(fresh.append(makeRating('aaa', 1))).rejects.toThrow('Database not initialized');
  });

  it('should allow close to be called twice', async () => {
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
