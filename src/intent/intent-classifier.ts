/**
 * Intent classification.
 *
 * Two strategies share one contract:
 * - `KeywordIntentClassifier` looks for product names and task words.
 * - `ModelIntentClassifier` asks the language model for a label.
 *
 * Both resolve to `rag_query` when they cannot decide. Answering a small-talk
 * message with retrieved context costs a little latency; answering a
 * technical question without it loses the answer.
 */

import type { Intent, IntentClassifier, IntentDecision } from './types.js';
import type { ModelClient } from '../models/model-client.js';
import type { AssistantConfig } from '../config/assistant-config.js';
import { ClassificationError, errorMessage } from '../utils/errors.js';
import { fillTemplate } from '../utils/template.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('intent');

const EMPTY_DECISION: IntentDecision = { intent: 'rag_query', reason: 'empty_message' };
const FAILURE_DECISION: IntentDecision = { intent: 'rag_query', reason: 'classifier_failure' };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive keyword matcher. A keyword matches only as whole words:
 * "sip" matches "SIP trunk" but not "gossip".
 */
export function buildKeywordMatcher(keywords: readonly string[]): (message: string) => string | null {
  const patterns = keywords
    .map((k) => k.trim().toLowerCase())
    .filter(Boolean)
    .map((k) => ({
      keyword: k,
      regex: new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(k).replace(/\s+/g, '\\s+')}(?=$|[^\\p{L}\\p{N}])`, 'iu'),
    }));

  return (message) => patterns.find((p) => p.regex.test(message))?.keyword ?? null;
}

export class KeywordIntentClassifier implements IntentClassifier {
  private readonly match: (message: string) => string | null;

  constructor(keywords: readonly string[]) {
    this.match = buildKeywordMatcher(keywords);
  }

  async classify(message: string): Promise<IntentDecision> {
    if (!message.trim()) return EMPTY_DECISION;

    const keyword = this.match(message);
    log.debug('Keyword classification', { keyword, intent: keyword ? 'rag_query' : 'small_talk' });
    return { intent: keyword ? 'rag_query' : 'small_talk', reason: 'classified' };
  }
}

export const CLASSIFY_TEMPLATE = `Classify the user's message for a technical support assistant covering collaboration products (calling, meetings, call control, session border controllers, networking).

Reply with exactly one label:
SMALL_TALK - greetings, thanks, chit-chat, questions about the assistant itself
RAG_QUERY - anything that needs product or technical knowledge

Conversation summary (may be empty):
{summary}

Message:
{message}

Label:`;

/**
 * Parse the first recognizable label in a model reply.
 */
export function parseIntentLabel(reply: string): Intent | null {
  const match = /\b(SMALL[_ ]TALK|RAG[_ ]QUERY)\b/i.exec(reply);
  if (!match) return null;
  return match[1].toUpperCase().startsWith('SMALL') ? 'small_talk' : 'rag_query';
}

export class ModelIntentClassifier implements IntentClassifier {
  constructor(private readonly model: ModelClient) {}

  async classify(
    message: string,
    summary?: string | null,
    signal?: AbortSignal,
  ): Promise<IntentDecision> {
    if (!message.trim()) return EMPTY_DECISION;

    try {
      const prompt = fillTemplate(CLASSIFY_TEMPLATE, { summary: summary ?? '', message });
      const reply = await this.model.complete({ prompt, mode: 'classify', signal });
      const intent = parseIntentLabel(reply);
      if (!intent) {
        throw new ClassificationError(`Unrecognized label: ${reply.slice(0, 40)}`, 'UNPARSEABLE_LABEL');
      }
      return { intent, reason: 'classified' };
    } catch (error) {
      const wrapped =
        error instanceof ClassificationError
          ? error
          : new ClassificationError(`Classifier failed: ${errorMessage(error)}`, 'CLASSIFIER_FAILED', error);
      log.warn('Classification failed, defaulting to rag_query', {
        stage: 'classifying',
        code: wrapped.code,
        error: wrapped.message,
      });
      return FAILURE_DECISION;
    }
  }
}

/**
 * Build the classifier selected by `intentMode`.
 */
export function createIntentClassifier(
  config: Pick<AssistantConfig, 'intentMode' | 'technicalKeywords'>,
  model: ModelClient,
): IntentClassifier {
  switch (config.intentMode) {
    case 'keyword':
      return new KeywordIntentClassifier(config.technicalKeywords);
    case 'model':
      return new ModelIntentClassifier(model);
  }
}
