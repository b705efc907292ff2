/**
 * Schema setup and version tracking.
 *
 * A fresh database gets schema.sql in one transaction and is stamped with
 * SCHEMA_VERSION. A database stamped with a newer version was written by a
 * later release and is refused.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type Database from 'better-sqlite3-multiple-ciphers';
import { PersistenceError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('migrations');

const SCHEMA_PATH = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');

/** Latest schema version */
export const SCHEMA_VERSION = 1;

/**
 * Current schema version, 0 when the schema_version table does not exist.
 */
export function getSchemaVersion(database: Database.Database): number {
  const table = database
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();
  if (!table) return 0;

  const row = database.prepare('SELECT MAX(version) as version FROM schema_version').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Bring the database up to SCHEMA_VERSION.
 */
export function runMigrations(database: Database.Database): void {
  const currentVersion = getSchemaVersion(database);

  if (currentVersion > SCHEMA_VERSION) {
    throw new PersistenceError(
      `Database schema v${currentVersion} is newer than supported v${SCHEMA_VERSION}`,
      'SCHEMA_TOO_NEW',
    );
  }
  if (currentVersion === SCHEMA_VERSION) return;

  const schema = readFileSync(SCHEMA_PATH, 'utf-8');
  const apply = database.transaction(() => {
    database.exec(schema);
    database.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  });
  apply();
  log.debug('Schema created', { version: SCHEMA_VERSION });
}
