/**
 * Integration tests for the HTTP API.
 *
 * Uses a real Express app with an in-memory test database.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import type Database from 'better-sqlite3-multiple-ciphers';
import { createApp } from '../../src/server/app.js';
import { parseInboundMessage } from '../../src/server/routes/messages.js';
import { HttpError } from '../../src/server/middleware/error-handler.js';
import type { ReplySink } from '../../src/server/reply-sink.js';
import { createAssistant, type Assistant } from '../../src/assistant.js';
import type { OutboundReply } from '../../src/orchestrator/orchestrator.js';
import { getConfig } from '../../src/config/assistant-config.js';
import { PersistenceError } from '../../src/utils/errors.js';
import { createTestDb, teardownTestDb } from '../storage/test-utils.js';
import { FakeEmbedder, FakeModelClient } from '../helpers/fakes.js';

let db: Database.Database;
let server: Server;
let baseUrl: string;
let model: FakeModelClient;
let delivered: OutboundReply[];

const sink: ReplySink = {
  deliver: async (reply) => {
    delivered.push(reply);
  },
};

function makeAssistant(): Assistant {
  return createAssistant({
    config: getConfig({ ignoreSenders: ['signalpath-bot'], generationBackoffMs: 0 }),
    db,
    model,
    embedder: new FakeEmbedder(),
  });
}

async function listen(assistant: Assistant): Promise<void> {
  const app = createApp(assistant, { replySink: sink });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') {
        baseUrl = `http://localhost:${addr.port}`;
      }
      resolve();
    });
  });
}

function post(path: string, body: unknown): Promise<Response> {
  return globalThis.fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  db = createTestDb();
  model = new FakeModelClient('Hello!');
  delivered = [];
  vi.stubEnv('SIGNALPATH_WEB_API_KEY', '');
});

afterEach(async () => {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  vi.unstubAllEnvs();
  teardownTestDb(db);
});

describe('GET /api/health', () => {
  it('reports the model and web search state', async () => {
    await listen(makeAssistant());

    const res = await globalThis.fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', model: 'fake:model', webSearch: false });
  });
});

describe('POST /api/messages', () => {
  it('replies and hands the reply to the sink', async () => {
    await listen(makeAssistant());

    const res = await post('/api/messages', {
      session_id: 'room-1',
      text: 'Hi there',
      timestamp: '2026-03-01T10:00:00.000Z',
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      session_id: 'room-1',
      reply_text: 'Hello!',
      intent: 'small_talk',
      fallback: false,
    });
    expect(delivered).toEqual([{ sessionId: 'room-1', replyText: 'Hello!' }]);
  });

  it('ignores messages from the bot itself', async () => {
    await listen(makeAssistant());

    const res = await post('/api/messages', { session_id: 'room-1', text: 'Hello!', sender: 'Signalpath-Bot' });

    expect(await res.json()).toEqual({ ignored: true });
    expect(model.requests).toEqual([]);
    expect(delivered).toEqual([]);
  });

  it('rejects a message without a session id', async () => {
    await listen(makeAssistant());

    const res = await post('/api/messages', { text: 'Hi' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'session_id is required' });
  });

  it('rejects malformed JSON', async () => {
    await listen(makeAssistant());

    const res = await post('/api/messages', '{"session_id":');

    expect(res.status).toBe(400);
  });

  it('returns 500 with the error code when handling throws', async () => {
    const assistant = makeAssistant();
    await listen({
      ...assistant,
      handleMessage: async () => {
        throw new PersistenceError('database is locked', 'DB_LOCKED');
      },
    });

    const res = await post('/api/messages', { session_id: 'room-1', text: 'Hi there' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error', code: 'DB_LOCKED' });
  });
});

describe('GET /api/sessions/:id', () => {
  it('returns the stored conversation', async () => {
    await listen(makeAssistant());
    await post('/api/messages', { session_id: 'room-1', text: 'Hi there', timestamp: '2026-03-01T10:00:00.000Z' });

    const res = await globalThis.fetch(`${baseUrl}/api/sessions/room-1`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: 'room-1',
      summary: null,
      summarizedThroughSeq: 0,
      turns: [
        { seq: 1, role: 'user', text: 'Hi there', timestamp: '2026-03-01T10:00:00.000Z', intent: 'small_talk' },
        { seq: 2, role: 'assistant', text: 'Hello!', intent: null },
      ],
    });
  });

  it('returns 404 for an unknown session', async () => {
    await listen(makeAssistant());

    const res = await globalThis.fetch(`${baseUrl}/api/sessions/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Session not found: nope' });
  });
});

describe('unknown API routes', () => {
  it('returns a JSON 404', async () => {
    await listen(makeAssistant());

    const res = await globalThis.fetch(`${baseUrl}/api/nothing-here`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('parseInboundMessage', () => {
  it('maps the wire fields', () => {
    expect(
      parseInboundMessage({ session_id: ' room-1 ', text: 'Hi', timestamp: '2026-03-01T10:00:00Z', sender: 'ana' }),
    ).toEqual({ sessionId: 'room-1', text: 'Hi', timestamp: '2026-03-01T10:00:00Z', sender: 'ana' });
  });

  it('fills in a missing timestamp', () => {
    const event = parseInboundMessage({ session_id: 'room-1', text: '' });

    expect(event.text).toBe('');
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    expect(event).not.toHaveProperty('sender');
  });

  it.each([
    [[], 'Request body must be a JSON object'],
    [{ session_id: 'room-1' }, 'text is required'],
    [{ session_id: 7, text: 'Hi' }, 'session_id must be a string'],
    [{ session_id: 'room-1', text: 'Hi', timestamp: 'yesterday' }, 'timestamp must be an ISO-8601 date'],
  ])('rejects %j', (body, message) => {
    expect(() => parseInboundMessage(body)).toThrow(HttpError);
    expect(() => parseInboundMessage(body)).toThrow(message);
  });
});
