/**
 * SQLite storage for submitted ratings
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';

import type { Rating } from '../../types/index.js';
import type { RatingStore } from './index.js';

interface RatingRow {
  id: number;
  event_id: string;
  score: number;
  comment: string | null;
  created_at: string;
}

export class SqliteRatingStore implements RatingStore {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    // Ensure directory exists
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(this.dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.createTables();
  }

  private createTables(): void {
    const db = this.requireDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS ratings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL,
        score INTEGER NOT NULL,
        comment TEXT,
        created_at TEXT NOT NULL
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_ratings_event_id ON ratings(event_id);
    `);
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }

  async append(rating: Rating): Promise<void> {
    const db = this.requireDb();

    db.prepare<[string, number, string | null, string]>(
      'INSERT INTO ratings (event_id, score, comment, created_at) VALUES (?, ?, ?, ?)'
    ).run(rating.eventId, rating.score, rating.comment ?? null, rating.createdAt);
  }

  async list(): Promise<Rating[]> {
    const db = this.requireDb();

    const rows = db.prepare<[], RatingRow>(
      'SELECT id, event_id, score, comment, created_at FROM ratings ORDER BY id'
    ).all();

    return rows.map(row => ({
      eventId: row.event_id,
      score: row.score,
      ...(row.comment !== null ? { comment: row.comment } : {}),
      createdAt: row.created_at,
    }));
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
