/**
 * In-memory vector store with SQLite persistence.
 *
 * Passage embeddings are stored as Float32 blobs in `passage_vectors` and
 * loaded into a Map on first access for brute-force cosine search. That is
 * plenty for a product knowledge base of a few tens of thousands of passages.
 *
 * @module storage/vector-store
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import type { VectorSearchResult } from './types.js';
import { cosineSimilarity } from '../utils/vector-math.js';
import { serializeEmbedding, deserializeEmbedding } from '../utils/embedding-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

export class VectorStore {
  private vectors: Map<string, number[]> = new Map();
  private loaded = false;

  constructor(private readonly db?: Database.Database) {}

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Load vectors from the database into memory.
   */
  load(): void {
    if (this.loaded) return;

    const rows = this.getDatabase().prepare('SELECT id, embedding FROM passage_vectors').all() as {
      id: string;
      embedding: Buffer;
    }[];

    for (const row of rows) {
      this.vectors.set(row.id, deserializeEmbedding(row.embedding));
    }

    this.loaded = true;
    log.debug('Vectors loaded', { count: this.vectors.size });
  }

  /**
   * Insert or replace vectors in one transaction.
   */
  insertBatch(items: Array<{ id: string; embedding: number[] }>, model?: string): void {
    this.load();

    const db = this.getDatabase();
    const stmt = db.prepare(
      'INSERT OR REPLACE INTO passage_vectors (id, embedding, model) VALUES (?, ?, ?)',
    );

    const insertMany = db.transaction((batch: Array<{ id: string; embedding: number[] }>) => {
      for (const item of batch) {
        stmt.run(item.id, serializeEmbedding(item.embedding), model ?? null);
      }
    });
    insertMany(items);

    for (const item of items) {
      this.vectors.set(item.id, item.embedding);
    }
  }

  /**
   * Top `limit` vectors by cosine similarity, highest first. Ties are broken
   * by id so results are stable.
   */
  search(query: number[], limit: number): VectorSearchResult[] {
    this.load();
    if (limit <= 0 || this.vectors.size === 0) return [];

    const results: VectorSearchResult[] = [];
    for (const [id, embedding] of this.vectors) {
      if (embedding.length !== query.length) {
        log.warn('Skipping vector with mismatched dimensions', {
          id,
          expected: query.length,
          actual: embedding.length,
        });
        continue;
      }
      results.push({ id, score: cosineSimilarity(query, embedding) });
    }

    results.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return results.slice(0, limit);
  }

  count(): number {
    this.load();
    return this.vectors.size;
  }
}
