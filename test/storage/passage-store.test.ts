import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { upsertPassages, getPassagesByIds, getPassageCount } from '../../src/storage/passage-store.js';
import { createTestDb, setupTestDb, teardownTestDb } from './test-utils.js';

describe('passage-store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('inserts passages and returns ids in input order', () => {
    const ids = upsertPassages([
      { id: 'kb-1', text: 'Reset the handset to factory defaults.', title: 'Factory reset', product: 'phones' },
      { text: 'Enable call recording on the trunk.' },
    ]);

    expect(ids[0]).toBe('kb-1');
    expect(ids[1]).toMatch(/^[0-9a-f-]{36}$/);
    expect(getPassageCount()).toBe(2);
  });

  it('reads a stored passage with nulls for absent fields', () => {
    upsertPassages([{ id: 'kb-1', text: 'Body text' }]);

    const [passage] = getPassagesByIds(['kb-1']);

    expect(passage).toMatchObject({ id: 'kb-1', text: 'Body text', title: null, url: null, product: null });
    expect(typeof passage?.createdAt).toBe('string');
  });

  it('returns nothing for an unknown id', () => {
    expect(getPassagesByIds(['missing'])).toEqual([]);
  });

  it('replaces an existing passage on upsert', () => {
    upsertPassages([{ id: 'kb-1', text: 'Old text', title: 'Old' }]);
    upsertPassages([{ id: 'kb-1', text: 'New text', url: 'https://help.example.com/kb-1' }]);

    expect(getPassagesByIds(['kb-1'])[0]).toMatchObject({
      text: 'New text',
      title: null,
      url: 'https://help.example.com/kb-1',
    });
    expect(getPassageCount()).toBe(1);
  });

  it('fetches by ids in the requested order and skips missing ids', () => {
    upsertPassages([
      { id: 'a', text: 'A' },
      { id: 'b', text: 'B' },
      { id: 'c', text: 'C' },
    ]);

    expect(getPassagesByIds(['c', 'missing', 'a']).map((p) => p.id)).toEqual(['c', 'a']);
    expect(getPassagesByIds([])).toEqual([]);
  });

  it('accepts an explicit database', () => {
    const other = createTestDb();
    upsertPassages([{ id: 'x', text: 'Elsewhere' }], other);

    expect(getPassageCount(other)).toBe(1);
    expect(getPassageCount()).toBe(0);
    other.close();
  });
});
