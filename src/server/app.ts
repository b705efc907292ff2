import express, { type Express } from 'express';
import type { Assistant } from '../assistant.js';
import { createMessagesRouter } from './routes/messages.js';
import { createSessionsRouter } from './routes/sessions.js';
import { errorHandler } from './middleware/error-handler.js';
import { createReplySink, type ReplySink } from './reply-sink.js';

export interface AppOptions {
  /** Defaults to a webhook sink when replyWebhookUrl is set */
  replySink?: ReplySink;
}

export function createApp(assistant: Assistant, options: AppOptions = {}): Express {
  const app = express();
  const sink = options.replySink ?? createReplySink(assistant.config.replyWebhookUrl);

  app.use(express.json({ limit: '256kb' }));

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      model: assistant.model.name,
      webSearch: assistant.web.enabled,
    });
  });
  app.use('/api/messages', createMessagesRouter(assistant, sink));
  app.use('/api/sessions', createSessionsRouter(assistant.store));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use('/api', errorHandler);

  return app;
}
