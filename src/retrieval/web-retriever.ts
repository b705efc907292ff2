/**
 * Web search through a Tavily-compatible API.
 *
 * Best-effort: the orchestrator skips this source when it is disabled or has
 * no API key, and drops it when the call fails or runs late.
 */

import type { EvidenceItem, Retriever } from './types.js';
import { cleanSnippet } from './snippet-cleaner.js';
import { RetrievalError, errorMessage } from '../utils/errors.js';
import { abortReason } from '../utils/deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('web-retriever');

export interface WebRetrieverOptions {
  enabled: boolean;
  baseUrl: string;
  /** Defaults to SIGNALPATH_WEB_API_KEY */
  apiKey?: string;
  /** Restrict results to these domains; empty searches everywhere */
  includeDomains?: string[];
  maxSnippetChars?: number;
}

interface SearchResult {
  url: string;
  title?: string;
  /** Raw page text when available, else the service's short content */
  body: string;
  score: number;
}

/**
 * Validate one entry of the service's `results` array.
 */
function toSearchResult(value: unknown): SearchResult | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('url' in value) || typeof value.url !== 'string') return null;
  if (!('score' in value) || typeof value.score !== 'number') return null;

  const raw = 'raw_content' in value && typeof value.raw_content === 'string' ? value.raw_content : '';
  const content = 'content' in value && typeof value.content === 'string' ? value.content : '';
  const title = 'title' in value && typeof value.title === 'string' ? value.title : undefined;

  return { url: value.url, title, body: raw || content, score: value.score };
}

export class WebRetriever implements Retriever {
  readonly source = 'web' as const;

  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly includeDomains: string[];
  private readonly maxSnippetChars: number;
  private readonly configured: boolean;

  constructor(options: WebRetrieverOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? process.env.SIGNALPATH_WEB_API_KEY;
    this.includeDomains = options.includeDomains ?? [];
    this.maxSnippetChars = options.maxSnippetChars ?? 2000;
    this.configured = options.enabled;
  }

  get enabled(): boolean {
    return this.configured && Boolean(this.apiKey);
  }

  async retrieve(query: string, topK = 2, signal?: AbortSignal): Promise<EvidenceItem[]> {
    if (topK <= 0 || !query.trim()) return [];

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/search`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey ?? ''}`,
        },
        body: JSON.stringify({
          query,
          max_results: topK,
          include_raw_content: true,
          ...(this.includeDomains.length > 0 ? { include_domains: this.includeDomains } : {}),
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal, 'web retrieval');
      throw new RetrievalError(`Web search request failed: ${errorMessage(error)}`, 'WEB_SEARCH_FAILED', error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new RetrievalError(
        `Web search error ${response.status}: ${body.slice(0, 200)}`,
        'WEB_SEARCH_FAILED',
      );
    }

    const data: unknown = await response.json();
    const results =
      typeof data === 'object' && data !== null && 'results' in data && Array.isArray(data.results)
        ? data.results.flatMap((entry: unknown) => {
            const result = toSearchResult(entry);
            return result ? [result] : [];
          })
        : null;
    if (!results) {
      throw new RetrievalError('Web search returned an unexpected payload', 'WEB_SEARCH_FAILED');
    }

    const items = results
      .map((result, order) => ({
        result,
        order,
        text: cleanSnippet(result.body, this.maxSnippetChars),
      }))
      .filter((r) => r.text.length > 0)
      .sort((a, b) => b.result.score - a.result.score || a.order - b.order)
      .slice(0, topK)
      .map(({ result, text }, index): EvidenceItem => ({
        source: 'web',
        text,
        score: result.score,
        rank: index + 1,
        reference: result.url,
        ...(result.title ? { title: result.title } : {}),
      }));

    log.debug('Web search complete', { returned: results.length, kept: items.length });
    return items;
  }
}
