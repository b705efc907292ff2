/**
 * Knowledge retrieval over the local passage index.
 *
 * Vector search by default. With hybrid search enabled, BM25 keyword hits
 * are fused with the vector hits using RRF, which helps with exact product
 * names and error strings that embed poorly.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import type { EvidenceItem, Retriever } from './types.js';
import { fuseRRF } from './rrf.js';
import type { Embedder } from '../models/embedder.js';
import { VectorStore } from '../storage/vector-store.js';
import { KeywordStore } from '../storage/keyword-store.js';
import { getPassagesByIds, upsertPassages } from '../storage/passage-store.js';
import type { PassageInput } from '../storage/types.js';
import type { AssistantConfig } from '../config/assistant-config.js';
import { RetrievalError, errorMessage } from '../utils/errors.js';
import { abortReason } from '../utils/deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('knowledge-retriever');

export interface KnowledgeRetrieverOptions {
  embedder: Embedder;
  vectorStore?: VectorStore;
  keywordStore?: KeywordStore;
  hybrid?: AssistantConfig['hybridSearch'];
  /** Defaults to the shared connection */
  db?: Database.Database;
}

export interface IngestResult {
  ids: string[];
  embedded: number;
}

export class KnowledgeRetriever implements Retriever {
  readonly source = 'knowledge' as const;
  readonly enabled = true;

  private readonly embedder: Embedder;
  private readonly vectorStore: VectorStore;
  private readonly keywordStore: KeywordStore;
  private readonly hybrid?: AssistantConfig['hybridSearch'];
  private readonly db?: Database.Database;

  constructor(options: KnowledgeRetrieverOptions) {
    this.embedder = options.embedder;
    this.db = options.db;
    this.vectorStore = options.vectorStore ?? new VectorStore(options.db);
    this.keywordStore = options.keywordStore ?? new KeywordStore(options.db);
    this.hybrid = options.hybrid;
  }

  async retrieve(query: string, topK = 5, signal?: AbortSignal): Promise<EvidenceItem[]> {
    if (topK <= 0 || !query.trim()) return [];

    const indexSize = this.guard(() => this.vectorStore.count());
    if (indexSize === 0) {
      log.debug('Knowledge index is empty');
      return [];
    }

    let embedding: number[];
    try {
      [embedding] = await this.embedder.embed([query], signal);
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      if (signal?.aborted) throw abortReason(signal, 'knowledge retrieval');
      throw new RetrievalError(`Query embedding failed: ${errorMessage(error)}`, 'EMBEDDING_FAILED', error);
    }
    if (signal?.aborted) throw abortReason(signal, 'knowledge retrieval');

    const ranked = this.guard(() => this.rank(query, embedding, topK));
    const passages = this.guard(() => getPassagesByIds(ranked.map((r) => r.id), this.db));
    const scores = new Map(ranked.map((r) => [r.id, r.score]));

    return passages.slice(0, topK).map((passage, index): EvidenceItem => ({
      source: 'knowledge',
      text: passage.text,
      score: scores.get(passage.id) ?? 0,
      rank: index + 1,
      reference: passage.url ?? passage.id,
      ...(passage.title ? { title: passage.title } : {}),
    }));
  }

  private rank(query: string, embedding: number[], topK: number): Array<{ id: string; score: number }> {
    const hybrid = this.hybrid;
    if (!hybrid?.enabled) {
      return this.vectorStore.search(embedding, topK);
    }

    const candidateLimit = Math.max(topK, hybrid.keywordSearchLimit);
    const vectorHits = this.vectorStore.search(embedding, candidateLimit);
    const keywordHits = this.keywordStore.search(query, hybrid.keywordSearchLimit);

    if (keywordHits.length === 0) {
      return vectorHits.slice(0, topK);
    }

    const fused = fuseRRF(
      [
        { name: 'vector', ids: vectorHits.map((h) => h.id), weight: hybrid.vectorWeight },
        { name: 'keyword', ids: keywordHits.map((h) => h.id), weight: hybrid.keywordWeight },
      ],
      hybrid.rrfK,
    );

    log.debug('Hybrid ranking', {
      vector: vectorHits.length,
      keyword: keywordHits.length,
      fused: fused.length,
    });
    return fused.slice(0, topK);
  }

  /**
   * Store passages with their embeddings. Existing ids are replaced.
   */
  async ingest(passages: PassageInput[], signal?: AbortSignal): Promise<IngestResult> {
    if (passages.length === 0) return { ids: [], embedded: 0 };

    const embeddings = await this.embedder.embed(
      passages.map((p) => (p.title ? `${p.title}\n${p.text}` : p.text)),
      signal,
    );
    const ids = upsertPassages(passages, this.db);
    this.vectorStore.insertBatch(
      ids.map((id, i) => ({ id, embedding: embeddings[i] })),
      this.embedder.model,
    );

    log.info('Passages ingested', { count: ids.length, model: this.embedder.model });
    return { ids, embedded: embeddings.length };
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new RetrievalError(
        `Knowledge index unavailable: ${errorMessage(error)}`,
        'KNOWLEDGE_UNAVAILABLE',
        error,
      );
    }
  }
}
