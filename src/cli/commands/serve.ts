import type { Command } from '../types.js';
import { getFlagValue, parsePort } from '../utils.js';
import { createAssistant } from '../../assistant.js';
import { startServer } from '../../server/start.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP message endpoint',
  usage: 'signalpath serve [--port <port>]',
  handler: async (args) => {
    const assistant = createAssistant();
    const port = parsePort(getFlagValue(args, '--port'), assistant.config.port);
    await startServer(assistant, port);
  },
};
