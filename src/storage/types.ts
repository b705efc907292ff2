/**
 * Types for the storage layer.
 *
 * - **Sessions** and **turns**: the per-conversation append-only log plus a
 *   rolling summary of the turns folded out of the recent window.
 * - **Passages**: knowledge-base text with an embedding for vector search
 *   and an FTS5 row for keyword search.
 *
 * @module storage/types
 */

import type { Intent } from '../intent/types.js';

export type Role = 'user' | 'assistant';

/**
 * A persisted turn. Immutable once appended.
 */
export interface Turn {
  /** 1-based position within the session, assigned by the store */
  seq: number;
  role: Role;
  text: string;
  /** ISO-8601 */
  timestamp: string;
  /** Intent of the user message; null for assistant turns and unclassified input */
  intent: Intent | null;
}

/**
 * A turn before the store assigns its sequence number.
 */
export type TurnInput = Omit<Turn, 'seq' | 'intent'> & { intent?: Intent | null };

/**
 * A conversation with its full turn log.
 */
export interface Session {
  id: string;
  turns: Turn[];
  /** Condensed text of turns with seq <= summarizedThroughSeq */
  summary: string | null;
  /** Highest turn seq folded into the summary; 0 when none */
  summarizedThroughSeq: number;
  /** Null until the first append */
  createdAt: string | null;
  updatedAt: string | null;
}

/**
 * A knowledge-base passage as stored.
 */
export interface StoredPassage {
  id: string;
  text: string;
  title: string | null;
  url: string | null;
  product: string | null;
  createdAt: string;
}

/**
 * Input for inserting passages. `id` is generated when omitted.
 */
export interface PassageInput {
  id?: string;
  text: string;
  title?: string;
  url?: string;
  product?: string;
}

/**
 * Result from vector similarity search.
 */
export interface VectorSearchResult {
  id: string;
  /** Cosine similarity, 1 = identical */
  score: number;
}
