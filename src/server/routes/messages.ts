import { Router } from 'express';
import type { Assistant } from '../../assistant.js';
import type { InboundMessage } from '../../orchestrator/orchestrator.js';
import type { ReplySink } from '../reply-sink.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { HttpError } from '../middleware/error-handler.js';

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new HttpError(400, `${key} must be a string`);
  return value;
}

/**
 * Validate `{ session_id, text, timestamp?, sender? }`.
 */
export function parseInboundMessage(body: unknown): InboundMessage {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new HttpError(400, 'Request body must be a JSON object');
  }
  const fields = Object.fromEntries(Object.entries(body));

  const sessionId = optionalString(fields, 'session_id')?.trim();
  if (!sessionId) throw new HttpError(400, 'session_id is required');

  const text = optionalString(fields, 'text');
  if (text === undefined) throw new HttpError(400, 'text is required');

  const timestamp = optionalString(fields, 'timestamp') ?? new Date().toISOString();
  if (Number.isNaN(Date.parse(timestamp))) {
    throw new HttpError(400, 'timestamp must be an ISO-8601 date');
  }

  const sender = optionalString(fields, 'sender');
  return { sessionId, text, timestamp, ...(sender ? { sender } : {}) };
}

export function createMessagesRouter(assistant: Assistant, sink: ReplySink): Router {
  const router = Router();
  const ignored = new Set(assistant.config.ignoreSenders.map((s) => s.toLowerCase()));

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const event = parseInboundMessage(req.body);

      if (event.sender && ignored.has(event.sender.toLowerCase())) {
        res.json({ ignored: true });
        return;
      }

      const { reply, trace } = await assistant.handleMessage(event);
      res.json({
        session_id: reply.sessionId,
        reply_text: reply.replyText,
        intent: trace.intent?.intent ?? null,
        fallback: trace.fallback,
      });

      await sink.deliver(reply);
    }),
  );

  return router;
}
