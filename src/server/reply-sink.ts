/**
 * Delivery of replies to the chat platform.
 */

import type { OutboundReply } from '../orchestrator/orchestrator.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reply-sink');

export interface ReplySink {
  /** Never rejects; delivery failures are logged */
  deliver(reply: OutboundReply): Promise<void>;
}

export const noopReplySink: ReplySink = {
  deliver: async () => {},
};

/**
 * POSTs `{ session_id, reply_text }` to a webhook. One attempt per reply.
 */
export class WebhookReplySink implements ReplySink {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async deliver(reply: OutboundReply): Promise<void> {
    const deliveryLog = log.child({ sessionId: reply.sessionId, stage: 'delivering' });
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ session_id: reply.sessionId, reply_text: reply.replyText }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        deliveryLog.warn('Reply webhook rejected delivery', { status: response.status });
      }
    } catch (error) {
      deliveryLog.warn('Reply webhook unreachable', { error: errorMessage(error) });
    }
  }
}

export function createReplySink(webhookUrl: string): ReplySink {
  return webhookUrl ? new WebhookReplySink(webhookUrl) : noopReplySink;
}
