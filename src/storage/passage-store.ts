/**
 * CRUD operations for knowledge passages.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb, generateId } from './db.js';
import type { StoredPassage, PassageInput } from './types.js';

interface PassageRow {
  id: string;
  text: string;
  title: string | null;
  url: string | null;
  product: string | null;
  created_at: string;
}

function rowToPassage(row: PassageRow): StoredPassage {
  return {
    id: row.id,
    text: row.text,
    title: row.title,
    url: row.url,
    product: row.product,
    createdAt: row.created_at,
  };
}

const UPSERT_SQL = `
  INSERT INTO passages (id, text, title, url, product)
  VALUES (?, ?, ?, ?, ?)
  ON CONFLICT(id) DO UPDATE SET
    text = excluded.text,
    title = excluded.title,
    url = excluded.url,
    product = excluded.product
`;

/**
 * Insert or update passages in one transaction. Returns ids in input order.
 */
export function upsertPassages(passages: PassageInput[], database?: Database.Database): string[] {
  const db = database ?? getDb();
  const stmt = db.prepare(UPSERT_SQL);
  const ids: string[] = [];

  const insertMany = db.transaction((items: PassageInput[]) => {
    for (const passage of items) {
      const id = passage.id ?? generateId();
      stmt.run(id, passage.text, passage.title ?? null, passage.url ?? null, passage.product ?? null);
      ids.push(id);
    }
  });

  insertMany(passages);
  return ids;
}

/**
 * Fetch passages by id. Missing ids are skipped; order follows `ids`.
 */
export function getPassagesByIds(ids: string[], database?: Database.Database): StoredPassage[] {
  if (ids.length === 0) return [];

  const db = database ?? getDb();
  const placeholders = ids.map(() => '?').join(',');
  const rows = db
    .prepare(`SELECT * FROM passages WHERE id IN (${placeholders})`)
    .all(...ids) as PassageRow[];

  const byId = new Map(rows.map((r) => [r.id, rowToPassage(r)]));
  return ids.flatMap((id) => {
    const passage = byId.get(id);
    return passage ? [passage] : [];
  });
}

export function getPassageCount(database?: Database.Database): number {
  const db = database ?? getDb();
  return (db.prepare('SELECT COUNT(*) as count FROM passages').get() as { count: number }).count;
}
