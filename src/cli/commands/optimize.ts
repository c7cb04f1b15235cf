/**
 * Optimize Command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { OPTIMIZATION_REQUESTS } from '../../optimization/types.js';
import { createOrchestrator, fail, globalOptions, printJson, requestedKinds, startSpinner } from '../context.js';
import { renderOptimization } from '../render.js';

export const optimizeCommand = new Command('optimize')
  .description('Apply safe code optimizations and check for outdated dependencies')
  .option('-t, --types <types...>', `Optimization types (${OPTIMIZATION_REQUESTS.join(', ')})`)
  .action(async (_options: unknown, command: Command) => {
    let spinner: Ora | null = null;

    try {
      const options = globalOptions(command);
      const kinds = requestedKinds(command, OPTIMIZATION_REQUESTS);
      spinner = startSpinner('Optimizing...', options);

      const result = await createOrchestrator(options).runOptimization(kinds);
      if (result.status === 'failed') {
        if (options.json) {
          printJson(result);
        }
        fail(spinner, 'Optimization failed', result.error);
      }

      spinner.succeed(chalk.green('Optimization complete'));
      if (options.json) {
        printJson(result);
      } else {
        renderOptimization(result);
      }
    } catch (error) {
      fail(spinner, 'Optimization failed', error);
    }
  });
