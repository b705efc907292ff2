/**
 * Reply generation with bounded retries and a fallback reply.
 *
 * The generator never rejects on model failure: after the last attempt it
 * returns the configured fallback text so the chat user always gets an
 * answer. Summaries are different: a failed summary throws and the caller
 * leaves the session as it was.
 */

import type { ModelClient } from '../models/model-client.js';
import type { Intent } from '../intent/types.js';
import type { ContextBundle } from '../retrieval/types.js';
import type { Turn } from '../storage/types.js';
import type { Summarizer } from '../storage/conversation-store.js';
import { buildReplyPrompt, buildSummaryPrompt, type ConversationHistory } from './prompt-builder.js';
import { withRetry, RetryExhaustedError } from '../utils/retry.js';
import { GenerationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('response-generator');

export interface GenerationResult {
  text: string;
  /** True when every attempt failed and `text` is the fallback reply */
  fallback: boolean;
  /** Model calls made */
  attempts: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  sessionId?: string;
}

export interface ResponseGeneratorOptions {
  model: ModelClient;
  fallbackText: string;
  assistantName?: string;
  /** Default: 2 */
  maxAttempts?: number;
  /** Delay before the second attempt; doubles after. Default: 500 */
  backoffMs?: number;
}

export class ResponseGenerator implements Summarizer {
  private readonly model: ModelClient;
  private readonly fallbackText: string;
  private readonly assistantName: string;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;

  constructor(options: ResponseGeneratorOptions) {
    this.model = options.model;
    this.fallbackText = options.fallbackText;
    this.assistantName = options.assistantName ?? 'Signalpath';
    this.maxAttempts = options.maxAttempts ?? 2;
    this.backoffMs = options.backoffMs ?? 500;
  }

  async generate(
    history: ConversationHistory,
    intent: Intent,
    bundle?: ContextBundle,
    options: GenerateOptions = {},
  ): Promise<GenerationResult> {
    const { system, prompt } = buildReplyPrompt(history, intent, bundle, this.assistantName);
    const { signal, sessionId } = options;
    const genLog = log.child({ sessionId, stage: 'generating', model: this.model.name });

    try {
      const { value, attempts } = await withRetry(
        'generate',
        () => this.model.complete({ prompt, system, mode: 'respond', signal }),
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.backoffMs,
          backoffFactor: 2,
          signal,
          logger: genLog,
        },
      );
      return { text: value, fallback: false, attempts };
    } catch (error) {
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 0;
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const exhausted = new GenerationError(
        `Generation failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
        'GENERATION_EXHAUSTED',
        cause,
      );
      genLog.error('Using fallback reply', { error: exhausted.toDetailedString() });
      return { text: this.fallbackText, fallback: true, attempts };
    }
  }

  /**
   * Fold turns into the prior summary.
   */
  async summarize(turns: Turn[], priorSummary: string | null, signal?: AbortSignal): Promise<string> {
    try {
      return await this.model.complete({
        prompt: buildSummaryPrompt(turns, priorSummary),
        mode: 'summarize',
        signal,
      });
    } catch (error) {
      throw new GenerationError(`Summarization failed: ${errorMessage(error)}`, 'SUMMARY_FAILED', error);
    }
  }
}
