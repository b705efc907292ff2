/**
 * Storage layer exports.
 */

export { getDb, setDb, resetDb, closeDb, openDatabase, getDbStats, generateId } from './db.js';
export type { DbOptions, EncryptionCipher } from './db.js';
export { runMigrations, getSchemaVersion, SCHEMA_VERSION } from './migrations.js';

export type {
  Role,
  Turn,
  TurnInput,
  Session,
  StoredPassage,
  PassageInput,
  VectorSearchResult,
} from './types.js';

export {
  ConversationStore,
  recentTurns,
  DEFAULT_SUMMARIZATION_POLICY,
} from './conversation-store.js';
export type {
  Summarizer,
  SummarizationPolicy,
  SummarizeOutcome,
  SummarizeSkipReason,
  ConversationStoreOptions,
} from './conversation-store.js';

export {
  upsertPassages,
  getPassagesByIds,
  getPassageCount,
} from './passage-store.js';

export { VectorStore } from './vector-store.js';
export { KeywordStore, sanitizeQuery } from './keyword-store.js';
export type { KeywordSearchResult } from './keyword-store.js';
