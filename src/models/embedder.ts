/**
 * Text embedding over an Ollama-compatible `/api/embed` endpoint.
 *
 * The endpoint takes `{ model, input: string[] }` and returns
 * `{ embeddings: number[][] }`, one vector per input in order.
 */

import { RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

export interface Embedder {
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface HttpEmbedderOptions {
  baseUrl: string;
  model: string;
  /** Inputs per request. Default: 16 */
  batchSize?: number;
}

function isEmbeddingMatrix(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((x) => typeof x === 'number'))
  );
}

export class HttpEmbedder implements Embedder {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;

  constructor(options: HttpEmbedderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize ?? 16);
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.embedBatch(batch, signal)));
    }
    return vectors;
  }

  private async embedBatch(input: string[], signal?: AbortSignal): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input }),
        signal,
      });
    } catch (error) {
      throw new RetrievalError(`Embedding request failed: ${errorMessage(error)}`, 'EMBEDDING_FAILED', error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      log.error(`Embedding HTTP ${response.status}`, { body: body.slice(0, 200) });
      throw new RetrievalError(`Embedding API error: ${response.status}`, 'EMBEDDING_FAILED');
    }

    const data: unknown = await response.json();
    const embeddings =
      typeof data === 'object' && data !== null && 'embeddings' in data ? data.embeddings : undefined;
    if (!isEmbeddingMatrix(embeddings) || embeddings.length !== input.length) {
      throw new RetrievalError('Invalid embedding response format', 'EMBEDDING_FAILED');
    }
    return embeddings;
  }
}
