/**
 * SQLite database connection.
 *
 * Supports optional encryption using better-sqlite3-multiple-ciphers. The
 * encryption key is read from SIGNALPATH_DB_KEY and never from config files.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { randomUUID } from 'crypto';
import { resolvePath } from '../config/assistant-config.js';
import { loadRuntimeConfig } from '../config/loader.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { runMigrations } from './migrations.js';

const log = createLogger('db');

export type EncryptionCipher = 'chacha20' | 'sqlcipher';

export interface DbOptions {
  /** Database file path; `:memory:` for an in-process database */
  dbPath?: string;
  encryption?: {
    enabled: boolean;
    cipher: EncryptionCipher;
  };
}

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` returns this instance instead of opening one.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   setDb(openDatabase({ dbPath: ':memory:' }));
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear any custom database and close the singleton connection.
 */
export function resetDb(): void {
  if (customDb) {
    customDb = null;
  }
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Open a database, apply encryption if requested, and migrate it.
 */
export function openDatabase(options: DbOptions = {}): Database.Database {
  const path = options.dbPath ?? ':memory:';
  const resolvedPath = path === ':memory:' ? path : resolvePath(path);

  if (resolvedPath !== ':memory:') {
    const dir = dirname(resolvedPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(resolvedPath);

  if (options.encryption?.enabled) {
    const key = process.env.SIGNALPATH_DB_KEY;
    if (!key) {
      database.close();
      throw new ConfigError(
        'Database encryption is enabled but SIGNALPATH_DB_KEY is not set',
        'MISSING_REQUIRED',
      );
    }
    applyEncryption(database, options.encryption.cipher, key);
  }

  database.pragma('foreign_keys = ON');
  if (resolvedPath !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  runMigrations(database);
  log.debug('Database opened', {
    path: resolvedPath,
    encrypted: options.encryption?.enabled ?? false,
  });

  return database;
}

/**
 * Cipher must be set before the key.
 */
function applyEncryption(database: Database.Database, cipher: EncryptionCipher, key: string): void {
  database.pragma(`cipher = '${cipher}'`);
  database.pragma(`key = '${key.replace(/'/g, "''")}'`);
}

/**
 * Return the database connection.
 *
 * Returns (in priority order):
 * 1. Custom database set via `setDb()` (for testing)
 * 2. Existing singleton connection
 * 3. New connection to the configured path
 */
export function getDb(options?: DbOptions): Database.Database {
  if (customDb) {
    return customDb;
  }

  if (db) {
    return db;
  }

  let resolved = options;
  if (!resolved) {
    const config = loadRuntimeConfig();
    resolved = {
      dbPath: config.dbPath,
      encryption: { enabled: config.encryptionEnabled, cipher: config.encryptionCipher },
    };
  }

  db = openDatabase(resolved);
  return db;
}

/**
 * Close the singleton connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Row counts for status output.
 */
export function getDbStats(
  database?: Database.Database,
): { sessions: number; turns: number; passages: number; vectors: number } {
  const d = database ?? getDb();
  const count = (table: string): number =>
    (d.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

  return {
    sessions: count('sessions'),
    turns: count('turns'),
    passages: count('passages'),
    vectors: count('passage_vectors'),
  };
}

/**
 * Generate a unique ID.
 */
export function generateId(): string {
  return randomUUID();
}
