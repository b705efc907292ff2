/**
 * Intent labels and classifier contract.
 */

/**
 * Processing branch for one inbound message. Extend the union to add
 * branches; the orchestrator dispatches with an exhaustive switch.
 */
export type Intent = 'small_talk' | 'rag_query';

export const INTENTS: readonly Intent[] = ['small_talk', 'rag_query'];

export type IntentReason = 'classified' | 'classifier_failure' | 'empty_message';

export interface IntentDecision {
  intent: Intent;
  reason: IntentReason;
}

export interface IntentClassifier {
  /**
   * Label a message. Never rejects: failures resolve to `rag_query` with
   * reason `classifier_failure`.
   */
  classify(message: string, summary?: string | null, signal?: AbortSignal): Promise<IntentDecision>;
}

export function isIntent(value: unknown): value is Intent {
  return value === 'small_talk' || value === 'rag_query';
}
