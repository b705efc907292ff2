import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { VectorStore } from '../../src/storage/vector-store.js';
import { upsertPassages } from '../../src/storage/passage-store.js';
import { createTestDb, teardownTestDb } from './test-utils.js';

describe('VectorStore', () => {
  let db: Database.Database;
  let store: VectorStore;

  beforeEach(() => {
    db = createTestDb();
    upsertPassages(
      ['a', 'b', 'c', 'd', 'e'].map((id) => ({ id, text: `passage ${id}` })),
      db,
    );
    store = new VectorStore(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('ranks by cosine similarity', () => {
    store.insertBatch([
      { id: 'a', embedding: [0, 1, 0] },
      { id: 'b', embedding: [0.6, 0.8, 0] },
      { id: 'c', embedding: [1, 0, 0] },
    ]);

    const results = store.search([1, 0, 0], 3);

    expect(results.map((r) => r.id)).toEqual(['c', 'b', 'a']);
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(0.6, 6);
    expect(results[2].score).toBe(0);
  });

  it('breaks score ties by id', () => {
    store.insertBatch([
      { id: 'd', embedding: [2, 0] },
      { id: 'a', embedding: [1, 0] },
    ]);

    expect(store.search([1, 0], 2).map((r) => r.id)).toEqual(['a', 'd']);
  });

  it('respects the limit', () => {
    store.insertBatch([
      { id: 'a', embedding: [1, 0] },
      { id: 'b', embedding: [0, 1] },
    ]);

    expect(store.search([1, 0], 1)).toHaveLength(1);
    expect(store.search([1, 0], 0)).toEqual([]);
  });

  it('skips vectors whose dimensions differ from the query', () => {
    store.insertBatch([
      { id: 'a', embedding: [1, 0, 0] },
      { id: 'b', embedding: [1, 0] },
    ]);

    expect(store.search([1, 0], 5).map((r) => r.id)).toEqual(['b']);
  });

  it('persists vectors for other instances', () => {
    store.insertBatch([{ id: 'a', embedding: [0.5, 0.25] }], 'test-embed');

    const reloaded = new VectorStore(db);

    expect(reloaded.count()).toBe(1);
    expect(reloaded.search([0.5, 0.25], 1)[0].id).toBe('a');
    const row = db.prepare("SELECT model FROM passage_vectors WHERE id = 'a'").get();
    expect(row).toEqual({ model: 'test-embed' });
  });

  it('replaces a vector on re-insert', () => {
    store.insertBatch([{ id: 'a', embedding: [1, 0] }]);
    store.insertBatch([{ id: 'a', embedding: [0, 1] }]);

    expect(store.count()).toBe(1);
    expect(store.search([0, 1], 1)[0].score).toBe(1);
  });

  it('loads vectors written before the first search', () => {
    db.prepare('INSERT INTO passage_vectors (id, embedding, model) VALUES (?, ?, ?)').run(
      'e',
      Buffer.from(new Float32Array([0, 1]).buffer),
      null,
    );

    expect(store.search([0, 1], 1)).toEqual([{ id: 'e', score: 1 }]);
  });
});
