/**
 * Configuration Loader
 *
 * Finds and loads the JSON configuration file, expands ${VAR} placeholders
 * from the environment, applies environment and CLI overrides, and validates
 * the result against the zod schema.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import {
  AutohealConfigSchema,
  REQUESTED_BACKENDS,
  type AutohealConfig,
  type ConfigOverrides,
  type LoadedConfig,
  type RequestedBackend
} from './types.js';

export const CONFIG_FILE_NAMES = ['autoheal.config.json', '.autoheal.json'];

export interface LoadOptions {
  /** Explicit configuration file; searched for when omitted */
  path?: string;
  /** Directory the search (and .env lookup) starts from */
  cwd?: string;
  overrides?: ConfigOverrides;
}

/**
 * Replace ${VAR} placeholders in every string of a JSON value.
 * Unknown variables are left as written.
 */
export function expandEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVars(item, env));
  }
  if (value !== null && typeof value === 'object') {
    const expanded: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      expanded[key] = expandEnvVars(inner, env);
    }
    return expanded;
  }
  return value;
}

function isRequestedBackend(value: string): value is RequestedBackend {
  return REQUESTED_BACKENDS.some(backend => backend === value);
}

/**
 * ConfigLoader class
 */
export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Find configuration file in the start directory and its parents
   */
  findConfigFile(startDir?: string): string | null {
    let currentDir = resolve(startDir || process.cwd());

    // Search up to 10 levels
    for (let i = 0; i < 10; i++) {
      for (const name of CONFIG_FILE_NAMES) {
        const configPath = join(currentDir, name);
        if (existsSync(configPath)) {
          return configPath;
        }
      }

      const parentDir = dirname(currentDir);
      if (parentDir === currentDir) {
        // Reached root
        break;
      }
      currentDir = parentDir;
    }

    return null;
  }

  /**
   * Load, expand, override and validate the configuration
   */
  load(options: LoadOptions = {}): LoadedConfig {
    const cwd = resolve(options.cwd || process.cwd());

    const envPath = join(cwd, '.env');
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath, processEnv: this.env });
    }

    const configPath = options.path ? resolve(cwd, options.path) : this.findConfigFile(cwd);
    let raw: unknown = {};

    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigurationError('Configuration file not found', configPath);
      }
      try {
        raw = JSON.parse(readFileSync(configPath, 'utf-8'));
      } catch (error) {
        throw new ConfigurationError(
          'Configuration file is not valid JSON',
          configPath,
          [error instanceof Error ? error.message : String(error)]
        );
      }
    }

    const config = this.parse(this.applyOverrides(expandEnvVars(raw, this.env), options.overrides), configPath);
    const baseDir = configPath ? dirname(configPath) : cwd;

    return {
      config,
      path: configPath,
      projectRoot: resolve(baseDir, config.projectRoot)
    };
  }

  /**
   * Validate a raw configuration object
   */
  parse(raw: unknown, source: string | null = null): AutohealConfig {
    const result = AutohealConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        'Invalid configuration',
        source,
        result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return result.data;
  }

  /**
   * Environment overrides first, then explicit overrides on top
   */
  private applyOverrides(raw: unknown, overrides: ConfigOverrides = {}): unknown {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      return raw;
    }

    const result: Record<string, unknown> = { ...raw };

    const envBackend = this.env.AUTOHEAL_BACKEND?.toLowerCase();
    const backend = overrides.backend ?? (envBackend && isRequestedBackend(envBackend) ? envBackend : undefined);
    if (backend) {
      const model = result.model;
      const modelSection = model !== null && typeof model === 'object' && !Array.isArray(model) ? model : {};
      result.model = { ...modelSection, backend };
    }

    const projectRoot = overrides.projectRoot ?? this.env.AUTOHEAL_PROJECT_ROOT;
    if (projectRoot) {
      result.projectRoot = projectRoot;
    }

    return result;
  }
}

/**
 * Load configuration with the process environment
 */
export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  return new ConfigLoader().load(options);
}
