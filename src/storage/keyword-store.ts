/**
 * FTS5-backed keyword search for knowledge passages.
 *
 * BM25 ranking with porter stemming. Used alongside VectorStore when hybrid
 * search is enabled.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('keyword-store');

export interface KeywordSearchResult {
  id: string;
  /** Negated bm25(); higher is better */
  score: number;
}

/**
 * Sanitize a query string for FTS5 MATCH syntax. Each term is quoted so
 * FTS5 operators in user text are matched literally. Terms are OR-ed so a
 * passage matching any of them is a candidate.
 */
export function sanitizeQuery(query: string): string {
  const sanitized = query
    .replace(/\b(AND|OR|NOT|NEAR)\b/g, ' ')
    .replace(/[*"(){}^~:\-+?.,;!'`[\]]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!sanitized) return '';

  return sanitized
    .split(' ')
    .filter(Boolean)
    .map((t) => `"${t}"`)
    .join(' OR ');
}

export class KeywordStore {
  constructor(private readonly db?: Database.Database) {}

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Full-text search with BM25 ranking. Returns [] (and logs) on failure.
   */
  search(query: string, limit: number): KeywordSearchResult[] {
    const sanitized = sanitizeQuery(query);
    if (!sanitized || limit <= 0) return [];

    try {
      const rows = this.getDatabase()
        .prepare(
          `
        SELECT passages.id, bm25(passages_fts) as score
        FROM passages_fts
        JOIN passages ON passages.rowid = passages_fts.rowid
        WHERE passages_fts MATCH ?
        ORDER BY bm25(passages_fts), passages.id
        LIMIT ?
      `,
        )
        .all(sanitized, limit) as Array<{ id: string; score: number }>;

      // bm25() is negative, lower is better
      return rows.map((r) => ({ id: r.id, score: -r.score }));
    } catch (error) {
      log.warn('Keyword search failed', { error: errorMessage(error) });
      return [];
    }
  }
}
