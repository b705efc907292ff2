import { describe, it, expect } from 'vitest';
import {
  buildReplyPrompt,
  buildSummaryPrompt,
  formatReferences,
  formatTurns,
} from '../../src/generation/prompt-builder.js';
import { NO_REFERENCE_NOTE } from '../../src/generation/prompts.js';
import { fuse } from '../../src/retrieval/context-fuser.js';
import { emptyBundle } from '../../src/retrieval/types.js';
import type { Turn } from '../../src/storage/types.js';
import { item } from '../helpers/fakes.js';

const TS = '2026-03-01T10:00:00.000Z';

const turns: Turn[] = [
  { seq: 3, role: 'user', text: 'My trunk is down', timestamp: TS, intent: 'rag_query' },
  { seq: 4, role: 'assistant', text: 'Check the registration status.', timestamp: TS, intent: null },
];

describe('formatTurns', () => {
  it('labels speakers', () => {
    expect(formatTurns(turns)).toBe('User: My trunk is down\nAssistant: Check the registration status.');
  });
});

describe('formatReferences', () => {
  it('numbers items in bundle order with source and title', () => {
    const bundle = fuse([item('knowledge', 'Step 1. Open the portal.', 0.9, 1, { title: 'Portal guide' })], [
      item('web', 'Forum answer', 0.5, 1),
    ]);

    expect(formatReferences(bundle)).toBe(
      '[1] (knowledge) Portal guide\nStep 1. Open the portal.\n\n[2] (web) Forum answer',
    );
  });
});

describe('buildReplyPrompt', () => {
  it('builds a technical prompt with references, summary and recent turns', () => {
    const bundle = fuse([item('knowledge', 'Restart the SBC.', 0.9, 1)], []);

    const { system, prompt } = buildReplyPrompt(
      { summary: 'Customer runs CUBE 17.', recentTurns: turns, message: 'What next?' },
      'rag_query',
      bundle,
      'Signalpath',
    );

    expect(system.startsWith('You are Signalpath, an expert technical assistant')).toBe(true);
    expect(prompt).toBe(
      [
        'Reference material:\n[1] (knowledge) Restart the SBC.',
        'Conversation summary:\nCustomer runs CUBE 17.',
        'Recent conversation:\nUser: My trunk is down\nAssistant: Check the registration status.',
        'User message:\nWhat next?',
      ].join('\n\n---\n\n'),
    );
  });

  it('says when no reference material was found', () => {
    const { prompt } = buildReplyPrompt(
      { summary: null, recentTurns: [], message: 'Is G.729 supported?' },
      'rag_query',
      emptyBundle(),
      'Signalpath',
    );

    expect(prompt).toBe(`${NO_REFERENCE_NOTE}\n\n---\n\nUser message:\nIs G.729 supported?`);
  });

  it('builds a casual prompt with the summary as internal memory', () => {
    const { system, prompt } = buildReplyPrompt(
      { summary: 'Talked about the weather.', recentTurns: [], message: 'Thanks!' },
      'small_talk',
      undefined,
      'Nova',
    );

    expect(system.startsWith('Your name is Nova.')).toBe(true);
    expect(prompt).toBe(
      '[INTERNAL MEMORY]\nTalked about the weather.\n[END INTERNAL MEMORY]\n\n---\n\nUser message:\nThanks!',
    );
  });

  it('omits empty sections for small talk', () => {
    const { prompt } = buildReplyPrompt({ summary: null, recentTurns: [], message: 'hi' }, 'small_talk', undefined, 'Nova');

    expect(prompt).toBe('User message:\nhi');
  });
});

describe('buildSummaryPrompt', () => {
  it('includes the prior summary and the folded turns', () => {
    const prompt = buildSummaryPrompt(turns, '- trunk issue reported');

    expect(prompt).toContain('Current summary (may be empty):\n- trunk issue reported\n');
    expect(prompt).toContain('New messages:\nUser: My trunk is down\nAssistant: Check the registration status.\n');
    expect(prompt.endsWith('Updated summary:')).toBe(true);
  });

  it('leaves the summary slot empty on the first fold', () => {
    expect(buildSummaryPrompt(turns, null)).toContain('Current summary (may be empty):\n\n');
  });
});
