/**
 * Shared CLI plumbing: global options, orchestrator construction, output
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { z } from 'zod';
import { loadConfig } from '../config/ConfigLoader.js';
import { REQUESTED_BACKENDS } from '../config/types.js';
import { createLogger } from '../core/Logger.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import { Orchestrator } from '../orchestrator/Orchestrator.js';

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  backend: z.enum(REQUESTED_BACKENDS).optional(),
  json: z.boolean().default(false)
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export function globalOptions(command: Command): GlobalOptions {
  const parsed = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError('Invalid command-line options', null, [
      `${issue?.path.join('.') ?? 'options'}: ${issue?.message ?? 'invalid value'}`
    ]);
  }
  return parsed.data;
}

/**
 * Split `--types a,b c` into validated kinds
 */
export function parseKinds<T extends string>(values: string[] | undefined, allowed: readonly T[]): T[] | undefined {
  if (!values || values.length === 0) {
    return undefined;
  }

  const kinds: T[] = [];
  for (const value of values.flatMap(v => v.split(',')).map(v => v.trim()).filter(Boolean)) {
    const kind = allowed.find(candidate => candidate === value);
    if (!kind) {
      throw new ConfigurationError(`Unknown type "${value}"`, null, [`expected one of: ${allowed.join(', ')}`]);
    }
    if (!kinds.includes(kind)) {
      kinds.push(kind);
    }
  }
  return kinds;
}

export function createOrchestrator(options: GlobalOptions): Orchestrator {
  const loaded = loadConfig({
    path: options.config,
    overrides: options.backend ? { backend: options.backend } : {}
  });

  // JSON output owns stdout
  const level = options.json ? 'error' : loaded.config.logging.level;
  const logger = createLogger('Orchestrator', { level, timestamps: loaded.config.logging.timestamps });

  return new Orchestrator(loaded, { logger });
}

export function startSpinner(text: string, options: GlobalOptions): Ora {
  return ora({ text, isSilent: options.json }).start();
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Report a fatal command error and exit non-zero
 */
export function fail(spinner: Ora | null, title: string, error: unknown): never {
  if (spinner) {
    spinner.fail(chalk.red(title));
  } else {
    console.error(chalk.red(title));
  }
  console.error(errorMessage(error));
  process.exit(1);
}

const TypesOptionSchema = z.object({ types: z.array(z.string()).optional() });

/**
 * The command's own `--types` option, validated against the allowed kinds
 */
export function requestedKinds<T extends string>(command: Command, allowed: readonly T[]): T[] | undefined {
  const parsed = TypesOptionSchema.safeParse(command.opts());
  return parseKinds(parsed.success ? parsed.data.types : undefined, allowed);
}
