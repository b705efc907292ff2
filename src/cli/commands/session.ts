import type { Command } from '../types.js';
import { createAssistant } from '../../assistant.js';
import { recentTurns } from '../../storage/conversation-store.js';

export const sessionCommand: Command = {
  name: 'session',
  description: 'Show the stored history of a session',
  usage: 'signalpath session <id> [--json]',
  handler: async (args) => {
    const id = args.find((a) => !a.startsWith('--'));
    if (!id) {
      console.error('Error: Session id required');
      console.log('Usage: signalpath session <id> [--json]');
      process.exit(2);
      return;
    }

    const { store } = createAssistant();
    const session = await store.get(id);
    if (!session.createdAt) {
      console.error(`Session not found: ${id}`);
      process.exit(1);
      return;
    }

    if (args.includes('--json')) {
      console.log(JSON.stringify(session, null, 2));
      return;
    }

    console.log(`Session ${session.id} (${session.turns.length} turns)`);
    if (session.summary) {
      console.log('');
      console.log(`Summary (through turn ${session.summarizedThroughSeq}):`);
      console.log(session.summary);
    }
    console.log('');
    for (const turn of recentTurns(session)) {
      const label = turn.role === 'user' ? 'User' : 'Assistant';
      const intent = turn.intent ? ` [${turn.intent}]` : '';
      console.log(`#${turn.seq} ${label}${intent}: ${turn.text}`);
    }
  },
};
