/**
 * On-disk cache of provider responses, keyed by request URL
 *
 * Pitch-level pulls take hundreds of requests per season; reruns within the
 * TTL read from SQLite instead of the network.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

interface CachedResponse {
  body: string;
  fetched_at: number;
}

export class ResponseCache {
  private db: Database.Database;

  /**
   * @param dbPath - SQLite file, or ':memory:'
   * @param ttlMs - How long a response may be reused; 0 disables reuse
   * @param now - Clock in epoch milliseconds
   */
  constructor(
    dbPath: string,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS responses (
        url TEXT PRIMARY KEY,
        body TEXT NOT NULL,
        fetched_at INTEGER NOT NULL
      );
    `);
  }

  /**
   * Cached body for a URL, or null when missing or expired
   */
  get(url: string): string | null {
    if (this.ttlMs <= 0) return null;

    const row = this.db
      .prepare<[string], CachedResponse>('SELECT body, fetched_at FROM responses WHERE url = ?')
      .get(url);

    if (!row) return null;
    if (this.now() - row.fetched_at > this.ttlMs) return null;
    return row.body;
  }

  set(url: string, body: string): void {
    this.db
      .prepare('INSERT OR REPLACE INTO responses (url, body, fetched_at) VALUES (?, ?, ?)')
      .run(url, body, this.now());
  }

  /**
   * Number of stored responses, expired ones included
   */
  size(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM responses')
      .get();
    return row ? row.count : 0;
  }

  clear(): void {
    this.db.exec('DELETE FROM responses');
  }

  close(): void {
    this.db.close();
  }
}
