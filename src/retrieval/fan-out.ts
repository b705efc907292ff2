/**
 * Concurrent retrieval across evidence sources.
 *
 * Sources start together and are joined once all have settled. Each has its
 * own deadline; a failed, late or skipped source never fails the join.
 */

import type { EvidenceItem, EvidenceSource, Retriever, SourceOutcome } from './types.js';
import { withDeadline } from '../utils/deadline.js';
import { DeadlineError, RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('fan-out');

export interface FanOutRequest {
  query: string;
  knowledge: Retriever | null;
  web: Retriever | null;
  knowledgeTopK: number;
  webTopK: number;
  /** Deadline applied to each source separately */
  timeoutMs: number;
  /** Overall cancellation (the per-message deadline) */
  signal?: AbortSignal;
  /** For log metadata */
  sessionId?: string;
}

export type FanOutResult = Record<EvidenceSource, SourceOutcome>;

const FAILURE_CODES: Record<EvidenceSource, string> = {
  knowledge: 'KNOWLEDGE_UNAVAILABLE',
  web: 'WEB_SEARCH_FAILED',
};

async function runSource(
  source: EvidenceSource,
  retriever: Retriever | null,
  topK: number,
  request: FanOutRequest,
): Promise<SourceOutcome> {
  if (!retriever || !retriever.enabled || topK <= 0) {
    return { status: 'skipped' };
  }

  const sourceLog = log.child({ sessionId: request.sessionId, stage: 'retrieving', source });
  const start = Date.now();
  try {
    const items = await withDeadline((signal) => retriever.retrieve(request.query, topK, signal), {
      timeoutMs: request.timeoutMs,
      code: 'RETRIEVAL_TIMEOUT',
      label: `${source} retrieval`,
      signal: request.signal,
    });
    return { status: 'ok', items, durationMs: Date.now() - start };
  } catch (error) {
    const durationMs = Date.now() - start;

    if (error instanceof DeadlineError) {
      sourceLog.warn(`${source} retrieval timed out`, { durationMs });
      return { status: 'timeout', durationMs };
    }

    const wrapped =
      error instanceof RetrievalError
        ? error
        : new RetrievalError(`${source} retrieval failed: ${errorMessage(error)}`, FAILURE_CODES[source], error);
    sourceLog.warn(`${source} retrieval failed`, { code: wrapped.code, error: wrapped.message });
    return { status: 'failed', error: wrapped, durationMs };
  }
}

/**
 * Query both sources concurrently and report what each produced.
 */
export async function retrieveAll(request: FanOutRequest): Promise<FanOutResult> {
  const [knowledge, web] = await Promise.all([
    runSource('knowledge', request.knowledge, request.knowledgeTopK, request),
    runSource('web', request.web, request.webTopK, request),
  ]);
  return { knowledge, web };
}

/**
 * Items of a successful outcome; empty otherwise.
 */
export function outcomeItems(outcome: SourceOutcome): EvidenceItem[] {
  return outcome.status === 'ok' ? outcome.items : [];
}
