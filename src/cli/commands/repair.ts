/**
 * Repair Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { REPAIR_KINDS } from '../../repair/types.js';
import { createOrchestrator, fail, globalOptions, printJson, requestedKinds, startSpinner } from '../context.js';
import { renderRepair } from '../render.js';

export const repairCommand = new Command('repair')
  .description('Repair log errors, code issues and dependencies')
  .option('-t, --types <types...>', `Repair types (${REPAIR_KINDS.join(', ')})`)
  .action(async (_options: unknown, command: Command) => {
    let spinner: Ora | null = null;

    try {
      const options = globalOptions(command);
      const kinds = requestedKinds(command, REPAIR_KINDS);
      spinner = startSpinner('Running repairs...', options);

      const result = await createOrchestrator(options).runAutoRepair(kinds);
      if (result.status === 'failed') {
        if (options.json) {
          printJson(result);
        }
        fail(spinner, 'Repair failed', result.error);
      }

      spinner.succeed(chalk.green('Repairs complete'));
      if (options.json) {
        printJson(result);
      } else {
        renderRepair(result);
      }
    } catch (error) {
      fail(spinner, 'Repair failed', error);
    }
  });
