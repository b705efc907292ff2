#!/usr/bin/env node
/**
 * signalpath command-line interface
 *
 * Usage: signalpath <command> [options]
 */

import { commands } from './commands/index.js';
import { errorMessage } from '../utils/errors.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log('signalpath: technical support assistant');
  console.log('');
  console.log('Usage: signalpath <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(12)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version    Show version');
  console.log('  --help       Show help');
  console.log('');
  console.log('Run "signalpath <command> --help" for command usage.');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`signalpath ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "signalpath --help" for available commands.');
    process.exit(2);
  }

  if (args.includes('--help') || args.includes('-h')) {
    console.log(`${command.description}\n\nUsage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
