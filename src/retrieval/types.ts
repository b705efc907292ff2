/**
 * Evidence types shared by the retrievers, the fuser and the generator.
 *
 * @module retrieval/types
 */

import type { RetrievalError } from '../utils/errors.js';

export type EvidenceSource = 'knowledge' | 'web';

/**
 * One retrieved passage or web snippet. Lives for one message only.
 */
export interface EvidenceItem {
  source: EvidenceSource;
  text: string;
  /** Higher is more relevant; comparable only within one source */
  score: number;
  /** 1-based position within its source's result list */
  rank: number;
  /** Passage id or URL */
  reference?: string;
  title?: string;
}

/**
 * Bounded, ordered evidence for one prompt. Knowledge items come first.
 */
export interface ContextBundle {
  items: EvidenceItem[];
  knowledgeCount: number;
  webCount: number;
  totalChars: number;
  /** True when items were dropped to fit the character budget */
  truncated: boolean;
}

export interface Retriever {
  readonly source: EvidenceSource;
  /** A disabled retriever is skipped without being called */
  readonly enabled: boolean;
  /**
   * Items by descending score, at most `topK`. Resolves `[]` when there is
   * nothing to find; rejects with RetrievalError when the source is down.
   */
  retrieve(query: string, topK: number, signal?: AbortSignal): Promise<EvidenceItem[]>;
}

/**
 * What happened to one source during fan-out.
 */
export type SourceOutcome =
  | { status: 'ok'; items: EvidenceItem[]; durationMs: number }
  | { status: 'failed'; error: RetrievalError; durationMs: number }
  | { status: 'timeout'; durationMs: number }
  | { status: 'skipped' };

export type SourceStatus = SourceOutcome['status'];

export function emptyBundle(): ContextBundle {
  return { items: [], knowledgeCount: 0, webCount: 0, totalChars: 0, truncated: false };
}
