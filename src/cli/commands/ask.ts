import type { Command } from '../types.js';
import { getFlagValue, positionalArgs } from '../utils.js';
import { createAssistant } from '../../assistant.js';

export const askCommand: Command = {
  name: 'ask',
  description: 'Send one message through the pipeline and print the reply',
  usage: 'signalpath ask <text> [--session <id>] [--json]',
  handler: async (args) => {
    const text = positionalArgs(args, ['--session'], ['--json']).join(' ').trim();
    if (!text) {
      console.error('Error: Message text required');
      console.log('Usage: signalpath ask <text> [--session <id>] [--json]');
      process.exit(2);
      return;
    }

    const assistant = createAssistant();
    const { reply, trace } = await assistant.handleMessage({
      sessionId: getFlagValue(args, '--session') ?? 'cli',
      text,
      timestamp: new Date().toISOString(),
    });

    if (args.includes('--json')) {
      console.log(
        JSON.stringify(
          {
            reply: reply.replyText,
            sessionId: reply.sessionId,
            intent: trace.intent,
            states: trace.states,
            knowledge: trace.retrieval?.knowledge.status ?? null,
            web: trace.retrieval?.web.status ?? null,
            evidence: trace.bundle?.items.length ?? 0,
            fallback: trace.fallback,
            persisted: trace.persisted,
            durationMs: trace.durationMs,
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log(reply.replyText);
  },
};
