import type { Command } from '../types.js';
import { serveCommand } from './serve.js';
import { askCommand } from './ask.js';
import { ingestCommand } from './ingest.js';
import { sessionCommand } from './session.js';
import { configCommand } from './config.js';

export const commands: Command[] = [
  serveCommand,
  askCommand,
  ingestCommand,
  sessionCommand,
  configCommand,
];
