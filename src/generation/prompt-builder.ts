/**
 * Prompt assembly for replies and summaries.
 */

import type { Intent } from '../intent/types.js';
import type { ContextBundle } from '../retrieval/types.js';
import type { Turn } from '../storage/types.js';
import { fillTemplate } from '../utils/template.js';
import { NO_REFERENCE_NOTE, SUMMARY_TEMPLATE, SYSTEM_GENERAL, SYSTEM_TECHNICAL } from './prompts.js';

/**
 * What the generator sees of the conversation: the summary of older turns,
 * the turns after it, and the message being answered.
 */
export interface ConversationHistory {
  summary: string | null;
  recentTurns: Turn[];
  message: string;
}

export interface BuiltPrompt {
  system: string;
  prompt: string;
}

export function formatTurns(turns: Turn[]): string {
  return turns.map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.text}`).join('\n');
}

/**
 * Numbered reference list, in bundle order.
 */
export function formatReferences(bundle: ContextBundle): string {
  return bundle.items
    .map((item, i) => {
      const title = item.title ? `${item.title}\n` : '';
      return `[${i + 1}] (${item.source}) ${title}${item.text}`;
    })
    .join('\n\n');
}

export function buildReplyPrompt(
  history: ConversationHistory,
  intent: Intent,
  bundle: ContextBundle | undefined,
  assistantName: string,
): BuiltPrompt {
  const sections: string[] = [];
  let system: string;

  switch (intent) {
    case 'rag_query':
      system = fillTemplate(SYSTEM_TECHNICAL, { name: assistantName });
      sections.push(
        bundle && bundle.items.length > 0
          ? `Reference material:\n${formatReferences(bundle)}`
          : NO_REFERENCE_NOTE,
      );
      if (history.summary) {
        sections.push(`Conversation summary:\n${history.summary}`);
      }
      break;
    case 'small_talk':
      system = fillTemplate(SYSTEM_GENERAL, { name: assistantName });
      if (history.summary) {
        sections.push(`[INTERNAL MEMORY]\n${history.summary}\n[END INTERNAL MEMORY]`);
      }
      break;
  }

  if (history.recentTurns.length > 0) {
    sections.push(`Recent conversation:\n${formatTurns(history.recentTurns)}`);
  }
  sections.push(`User message:\n${history.message}`);

  return { system, prompt: sections.join('\n\n---\n\n') };
}

export function buildSummaryPrompt(turns: Turn[], priorSummary: string | null): string {
  return fillTemplate(SUMMARY_TEMPLATE, {
    summary: priorSummary ?? '',
    messages: formatTurns(turns),
  });
}
