import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { createAssistant } from '../src/assistant.js';
import { getConfig } from '../src/config/assistant-config.js';
import { KeywordIntentClassifier, ModelIntentClassifier } from '../src/intent/intent-classifier.js';
import { createTestDb, seedPassages, teardownTestDb } from './storage/test-utils.js';
import { FakeEmbedder, FakeModelClient } from './helpers/fakes.js';

describe('createAssistant', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    vi.stubEnv('SIGNALPATH_WEB_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    teardownTestDb(db);
  });

  it('uses the injected model and database', () => {
    const model = new FakeModelClient();
    const assistant = createAssistant({ config: getConfig(), db, model, embedder: new FakeEmbedder() });

    expect(assistant.model).toBe(model);
    expect(assistant.classifier).toBeInstanceOf(KeywordIntentClassifier);
    expect(assistant.config.knowledgeTopK).toBe(5);
  });

  it('classifies with the model in model mode', () => {
    const assistant = createAssistant({
      config: getConfig({ intentMode: 'model' }),
      db,
      model: new FakeModelClient(),
      embedder: new FakeEmbedder(),
    });

    expect(assistant.classifier).toBeInstanceOf(ModelIntentClassifier);
  });

  it('disables web search without an API key', () => {
    const assistant = createAssistant({ config: getConfig(), db, model: new FakeModelClient(), embedder: new FakeEmbedder() });

    expect(assistant.web.enabled).toBe(false);
  });

  it('enables web search with an API key', () => {
    const assistant = createAssistant({
      config: getConfig(),
      db,
      model: new FakeModelClient(),
      embedder: new FakeEmbedder(),
      webApiKey: 'test-secret',
    });

    expect(assistant.web.enabled).toBe(true);
  });

  it('keeps web search off when configured off, key or not', () => {
    const assistant = createAssistant({
      config: getConfig({ webEnabled: false }),
      db,
      model: new FakeModelClient(),
      embedder: new FakeEmbedder(),
      webApiKey: 'test-secret',
    });

    expect(assistant.web.enabled).toBe(false);
  });

  it('answers a knowledge question from the seeded index', async () => {
    seedPassages(db, [
      { id: 'p1', text: 'Configure a SIP trunk', embedding: [1, 0, 0] },
      { id: 'p2', text: 'Reset voicemail PIN', embedding: [0, 1, 0] },
    ]);
    const model = new FakeModelClient('1. Open the trunk settings.');
    const assistant = createAssistant({
      config: getConfig({ generationBackoffMs: 0 }),
      db,
      model,
      embedder: new FakeEmbedder({ 'sip trunk error': [1, 0, 0] }),
    });

    const { reply, trace } = await assistant.handleMessage({
      sessionId: 'room-1',
      text: 'sip trunk error',
      timestamp: '2026-03-01T10:00:00.000Z',
    });

    expect(reply).toEqual({ sessionId: 'room-1', replyText: '1. Open the trunk settings.' });
    expect(trace.intent?.intent).toBe('rag_query');
    expect(trace.retrieval?.web).toEqual({ status: 'skipped' });
    expect(trace.bundle?.items[0].text).toBe('Configure a SIP trunk');
    expect(model.requests[0].prompt).toContain('[1] (knowledge) Configure a SIP trunk');
    expect((await assistant.store.get('room-1')).turns).toHaveLength(2);
  });
});
