/**
 * In-process stand-ins for the model, embedder and retrievers.
 */

import type { CompletionRequest, ModelClient } from '../../src/models/model-client.js';
import type { Embedder } from '../../src/models/embedder.js';
import type { EvidenceItem, EvidenceSource, Retriever } from '../../src/retrieval/types.js';

type Reply = string | Error | ((request: CompletionRequest) => string | Promise<string>);

/**
 * Model client that answers from a queue of scripted replies, then repeats
 * the last one. Every request is recorded.
 */
export class FakeModelClient implements ModelClient {
  readonly name = 'fake:model';
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies.length > 0 ? replies : ['ok'];
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const index = Math.min(this.requests.length - 1, this.replies.length - 1);
    const reply = this.replies[index];
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}

/**
 * Embedder that looks texts up in a table, with a fallback vector.
 */
export class FakeEmbedder implements Embedder {
  readonly model = 'test-embed';
  readonly calls: string[][] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [0, 0, 1],
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((t) => this.vectors[t] ?? this.fallback);
  }
}

/**
 * Retriever returning fixed items, or running a custom implementation.
 */
export class FakeRetriever implements Retriever {
  readonly calls: Array<{ query: string; topK: number }> = [];

  constructor(
    readonly source: EvidenceSource,
    private readonly impl: EvidenceItem[] | ((signal?: AbortSignal) => Promise<EvidenceItem[]>),
    readonly enabled = true,
  ) {}

  async retrieve(query: string, topK: number, signal?: AbortSignal): Promise<EvidenceItem[]> {
    this.calls.push({ query, topK });
    if (typeof this.impl === 'function') return this.impl(signal);
    return this.impl.slice(0, topK);
  }
}

/**
 * Evidence item with sensible defaults.
 */
export function item(
  source: EvidenceSource,
  text: string,
  score: number,
  rank: number,
  extra: Partial<EvidenceItem> = {},
): EvidenceItem {
  return { source, text, score, rank, ...extra };
}

/**
 * Promise that never settles unless the signal aborts.
 */
export function hang<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
