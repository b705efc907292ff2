import type { Command } from '../types.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: 'signalpath config <show|validate>',
  handler: async (args) => {
    const subcommand = args[0] ?? 'show';

    switch (subcommand) {
      case 'show': {
        console.log(JSON.stringify(loadConfig(), null, 2));
        break;
      }
      case 'validate': {
        const errors = validateExternalConfig(loadConfig());
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(3);
        }
        break;
      }
      default:
        console.error(`Error: Unknown subcommand: ${subcommand}`);
        console.log('Usage: signalpath config <show|validate>');
        process.exit(2);
    }
  },
};
