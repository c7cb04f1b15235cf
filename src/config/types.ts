/**
 * Configuration Types
 *
 * The zod schema is the single source of truth: every section has defaults,
 * so an empty object (or no file at all) yields a complete configuration.
 */

import { z } from 'zod';

export const REQUESTED_BACKENDS = ['anthropic', 'openai', 'ollama', 'disabled'] as const;

const CommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([])
});

export type CommandConfig = z.infer<typeof CommandSchema>;

export const PrimaryModelSchema = z.object({
  model: z.string().default('claude-sonnet-4-20250514'),
  apiKey: z.string().optional(),
  maxTokens: z.number().int().positive().default(2048)
});

export const FallbackModelSchema = z.object({
  model: z.string().default('gpt-4o-mini'),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  /** Model used when the endpoint is a local-inference server */
  localModel: z.string().default('llama3'),
  maxTokens: z.number().int().positive().default(2048)
});

export const ModelConfigSchema = z.object({
  backend: z.enum(REQUESTED_BACKENDS).default('anthropic'),
  primary: PrimaryModelSchema.default({}),
  fallback: FallbackModelSchema.default({})
});

export const AutohealConfigSchema = z.object({
  /** Root of the audited application, relative to the config file */
  projectRoot: z.string().default('.'),

  model: ModelConfigSchema.default({}),

  logs: z.object({
    sources: z.record(z.string()).default({
      debug: 'logs/debug.log',
      error: 'logs/error.log'
    }),
    windowHours: z.number().positive().default(24),
    /** Errors handed to the model when asking for recommendations */
    sampleSize: z.number().int().positive().default(5)
  }).default({}),

  analysis: z.object({
    maxFunctionLines: z.number().int().positive().default(50),
    excludeDirs: z.array(z.string()).default([
      'node_modules', 'dist', 'build', 'coverage', '.git', '.venv', 'venv', '.autoheal'
    ])
  }).default({}),

  repair: z.object({
    maxLogRepairs: z.number().int().nonnegative().default(5),
    /** Re-parse rewritten files and restore them when they no longer parse */
    verifyRewrites: z.boolean().default(true),
    manifest: z.string().default('package.json'),
    dependencyTool: CommandSchema.default({ command: 'npx', args: ['depcheck', '--json'] })
  }).default({}),

  optimization: z.object({
    outdatedTool: CommandSchema.default({ command: 'npm', args: ['outdated', '--json'] })
  }).default({}),

  backups: z.object({
    dir: z.string().default('.autoheal/backups'),
    /** Newest backups kept per file; null keeps every backup */
    retention: z.number().int().positive().nullable().default(null)
  }).default({}),

  learning: z.object({
    knowledgeFile: z.string().default('.autoheal/knowledge.json'),
    trustThreshold: z.number().min(0).max(1).default(0.7),
    insightLimit: z.number().int().positive().default(5)
  }).default({}),

  status: z.object({
    file: z.string().default('.autoheal/status.json')
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    timestamps: z.boolean().default(false)
  }).default({})
});

export type AutohealConfig = z.infer<typeof AutohealConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type PrimaryModelConfig = z.infer<typeof PrimaryModelSchema>;
export type FallbackModelConfig = z.infer<typeof FallbackModelSchema>;
export type RequestedBackend = (typeof REQUESTED_BACKENDS)[number];

/**
 * Values that take precedence over the file (CLI flags)
 */
export interface ConfigOverrides {
  backend?: RequestedBackend;
  projectRoot?: string;
}

/**
 * Result of loading configuration
 */
export interface LoadedConfig {
  config: AutohealConfig;
  /** File the configuration was read from, null when defaults were used */
  path: string | null;
  /** Absolute project root */
  projectRoot: string;
}
