/**
 * Status Command
 */

import { Command } from 'commander';
import { createOrchestrator, fail, globalOptions, printJson } from '../context.js';
import { renderStatus } from '../render.js';

export const statusCommand = new Command('status')
  .description('Show the active model backend, learned knowledge and the last run')
  .action((_options: unknown, command: Command) => {
    try {
      const options = globalOptions(command);
      const status = createOrchestrator(options).getStatus();

      if (options.json) {
        printJson(status);
      } else {
        renderStatus(status);
      }
    } catch (error) {
      fail(null, 'Failed to read status', error);
    }
  });
