/**
 * Insights Command
 *
 * Display what the knowledge store has learned so far.
 */

import { Command } from 'commander';
import type { Ora } from 'ora';
import { createOrchestrator, fail, globalOptions, printJson, startSpinner } from '../context.js';
import { renderInsights } from '../render.js';

export const insightsCommand = new Command('insights')
  .description('Display learned error patterns and fix effectiveness')
  .action(async (_options: unknown, command: Command) => {
    let spinner: Ora | null = null;

    try {
      const options = globalOptions(command);
      spinner = startSpinner('Gathering insights...', options);

      const insights = await createOrchestrator(options).getInsights();
      spinner.succeed('Insights gathered');

      if (options.json) {
        printJson(insights);
      } else {
        renderInsights(insights);
      }
    } catch (error) {
      fail(spinner, 'Failed to gather insights', error);
    }
  });
