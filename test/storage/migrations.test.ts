/**
 * Tests for schema setup and version checks.
 */

import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3-multiple-ciphers';
import { runMigrations, getSchemaVersion, SCHEMA_VERSION } from '../../src/storage/migrations.js';
import { PersistenceError } from '../../src/utils/errors.js';

function columnsOf(db: Database.Database, table: string): string[] {
  return (db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[]).map((c) => c.name);
}

describe('runMigrations', () => {
  it('creates a fresh database at version 1', () => {
    const db = new Database(':memory:');
    expect(getSchemaVersion(db)).toBe(0);

    runMigrations(db);

    expect(SCHEMA_VERSION).toBe(1);
    expect(getSchemaVersion(db)).toBe(1);
    expect(columnsOf(db, 'passages')).toEqual(['id', 'text', 'title', 'url', 'product', 'created_at']);
    db.close();
  });

  it('installs the keyword index triggers', () => {
    const db = new Database(':memory:');
    runMigrations(db);

    const triggers = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'trigger' ORDER BY name")
      .all() as { name: string }[];
    expect(triggers).toHaveLength(3);
    db.close();
  });

  it('is a no-op on an up-to-date database', () => {
    const db = new Database(':memory:');
    runMigrations(db);
    runMigrations(db);

    const { count } = db.prepare('SELECT COUNT(*) as count FROM schema_version').get() as { count: number };
    expect(count).toBe(1);
    db.close();
  });

  it('refuses a database written by a newer release', () => {
    const db = new Database(':memory:');
    runMigrations(db);
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(2);

    expect(() => runMigrations(db)).toThrow(PersistenceError);
    expect(() => runMigrations(db)).toThrow('Database schema v2 is newer than supported v1');
    db.close();
  });
});
