export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { startServer } from './start.js';
export { WebhookReplySink, noopReplySink, createReplySink } from './reply-sink.js';
export type { ReplySink } from './reply-sink.js';
export { HttpError } from './middleware/error-handler.js';
export { parseInboundMessage } from './routes/messages.js';
