/**
 * Audit Command
 *
 * Analyze logs and source files, learn from the errors found.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { createOrchestrator, fail, globalOptions, printJson, startSpinner } from '../context.js';
import { renderAudit } from '../render.js';

export const auditCommand = new Command('audit')
  .description('Run a full audit of logs and source files')
  .action(async (_options: unknown, command: Command) => {
    let spinner: Ora | null = null;

    try {
      const options = globalOptions(command);
      spinner = startSpinner('Auditing application...', options);

      const result = await createOrchestrator(options).runFullAudit();
      if (result.status === 'failed') {
        if (options.json) {
          printJson(result);
        }
        fail(spinner, 'Audit failed', result.error);
      }

      spinner.succeed(chalk.green('Audit complete'));
      if (options.json) {
        printJson(result);
      } else {
        renderAudit(result);
      }
    } catch (error) {
      fail(spinner, 'Audit failed', error);
    }
  });
