import { describe, it, expect } from 'vitest';
import { ResponseGenerator } from '../../src/generation/response-generator.js';
import { GenerationError } from '../../src/utils/errors.js';
import type { Turn } from '../../src/storage/types.js';
import { FakeModelClient } from '../helpers/fakes.js';

const FALLBACK = 'Sorry, try again later.';
const HISTORY = { summary: null, recentTurns: [], message: 'hello' };

function generator(model: FakeModelClient, maxAttempts = 2): ResponseGenerator {
  return new ResponseGenerator({ model, fallbackText: FALLBACK, maxAttempts, backoffMs: 0 });
}

describe('ResponseGenerator', () => {
  describe('generate', () => {
    it('returns the model reply on the first attempt', async () => {
      const model = new FakeModelClient('Hi! How can I help?');

      const result = await generator(model).generate(HISTORY, 'small_talk');

      expect(result).toEqual({ text: 'Hi! How can I help?', fallback: false, attempts: 1 });
      expect(model.requests[0]).toMatchObject({ mode: 'respond', prompt: 'User message:\nhello' });
      expect(model.requests[0].system?.startsWith('Your name is Signalpath.')).toBe(true);
    });

    it('retries a failed call', async () => {
      const model = new FakeModelClient(new Error('overloaded'), 'Second time lucky');

      expect(await generator(model).generate(HISTORY, 'small_talk')).toEqual({
        text: 'Second time lucky',
        fallback: false,
        attempts: 2,
      });
    });

    it('returns the fallback after the last attempt fails', async () => {
      const model = new FakeModelClient(new Error('overloaded'));

      const result = await generator(model, 3).generate(HISTORY, 'rag_query');

      expect(result).toEqual({ text: FALLBACK, fallback: true, attempts: 3 });
      expect(model.requests).toHaveLength(3);
    });

    it('stops retrying once the signal aborts', async () => {
      const controller = new AbortController();
      const model = new FakeModelClient(() => {
        controller.abort();
        throw new Error('aborted mid-call');
      });

      const result = await generator(model, 5).generate(HISTORY, 'small_talk', undefined, {
        signal: controller.signal,
      });

      expect(result).toEqual({ text: FALLBACK, fallback: true, attempts: 1 });
    });
  });

  describe('summarize', () => {
    const turns: Turn[] = [
      { seq: 1, role: 'user', text: 'Trunk down', timestamp: '2026-03-01T10:00:00.000Z', intent: 'rag_query' },
    ];

    it('asks the model in summarize mode', async () => {
      const model = new FakeModelClient('- trunk down');

      expect(await generator(model).summarize(turns, null)).toBe('- trunk down');
      expect(model.requests[0].mode).toBe('summarize');
      expect(model.requests[0].prompt).toContain('User: Trunk down');
    });

    it('throws SUMMARY_FAILED when the model fails', async () => {
      const error = await generator(new FakeModelClient(new Error('down')))
        .summarize(turns, null)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GenerationError);
      expect(error).toMatchObject({ code: 'SUMMARY_FAILED', message: 'Summarization failed: down' });
    });
  });
});
