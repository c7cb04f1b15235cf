#!/usr/bin/env node
/**
 * Autoheal CLI
 *
 * Command-line interface for the audit, repair and optimize loop.
 */

import { Command } from 'commander';
import { auditCommand } from './commands/audit.js';
import { repairCommand } from './commands/repair.js';
import { optimizeCommand } from './commands/optimize.js';
import { insightsCommand } from './commands/insights.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('autoheal')
  .description('Autoheal - Self-auditing, self-healing application maintenance')
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file (default: search for autoheal.config.json)')
  .option('-b, --backend <name>', 'Model backend (anthropic, openai, ollama, disabled)')
  .option('--json', 'Print results as JSON', false);

program.addCommand(auditCommand);
program.addCommand(repairCommand);
program.addCommand(optimizeCommand);
program.addCommand(insightsCommand);
program.addCommand(statusCommand);

await program.parseAsync();
