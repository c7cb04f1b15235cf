/**
 * ModelClient - Uniform analysis interface over one selected backend
 *
 * The backend is chosen once, at construction, by trying candidates in a
 * fixed preference order:
 *   anthropic       -> primary, then openai-compatible fallback
 *   openai / ollama -> openai-compatible fallback
 *   disabled        -> none
 * When every candidate fails the client holds a DisabledBackend. analyze()
 * never throws: failures come back as `{ status: 'error' }`.
 */

import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import type {
  FallbackModelConfig,
  ModelConfig,
  PrimaryModelConfig,
  RequestedBackend
} from '../config/types.js';
import { AnthropicBackend } from './AnthropicBackend.js';
import { DisabledBackend } from './DisabledBackend.js';
import { OpenAICompatibleBackend } from './OpenAICompatibleBackend.js';
import type {
  AnalysisContext,
  AnalysisResult,
  BackendProfile,
  BackendProfileKind,
  ModelBackend,
  TextAnalyzer
} from './types.js';

export interface BackendFactories {
  primary(config: PrimaryModelConfig, env: NodeJS.ProcessEnv): ModelBackend;
  fallback(config: FallbackModelConfig, env: NodeJS.ProcessEnv, requested: RequestedBackend): ModelBackend;
}

export interface ModelClientOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Replace backend construction (tests) */
  factories?: Partial<BackendFactories>;
}

const defaultFactories: BackendFactories = {
  primary: (config, env) => AnthropicBackend.create(config, env),
  fallback: (config, env, requested) => OpenAICompatibleBackend.create(config, env, requested)
};

const CANDIDATES: Record<RequestedBackend, Array<Exclude<BackendProfileKind, 'disabled'>>> = {
  anthropic: ['primary', 'openai-compatible-fallback'],
  openai: ['openai-compatible-fallback'],
  ollama: ['openai-compatible-fallback'],
  disabled: []
};

const NATURAL_KIND: Record<RequestedBackend, BackendProfileKind> = {
  anthropic: 'primary',
  openai: 'openai-compatible-fallback',
  ollama: 'openai-compatible-fallback',
  disabled: 'disabled'
};

export class ModelClient implements TextAnalyzer {
  private readonly backend: ModelBackend;
  private readonly profile: BackendProfile;
  private readonly logger: Logger;

  constructor(backend: ModelBackend, profile: BackendProfile, logger: Logger = createLogger('ModelClient')) {
    this.backend = backend;
    this.profile = Object.freeze({ ...profile });
    this.logger = logger;
  }

  /**
   * Select a backend from configuration
   */
  static fromConfig(config: ModelConfig, options: ModelClientOptions = {}): ModelClient {
    const env = options.env ?? process.env;
    const logger = options.logger ?? createLogger('ModelClient');
    const factories: BackendFactories = { ...defaultFactories, ...options.factories };
    const requested = config.backend;
    const failures: string[] = [];

    let backend: ModelBackend = new DisabledBackend();

    for (const candidate of CANDIDATES[requested]) {
      try {
        backend = candidate === 'primary'
          ? factories.primary(config.primary, env)
          : factories.fallback(config.fallback, env, requested);
        break;
      } catch (error) {
        failures.push(errorMessage(error));
        logger.debug(`Backend ${candidate} unavailable: ${errorMessage(error)}`);
      }
    }

    const substituted = backend.kind !== NATURAL_KIND[requested];
    const profile: BackendProfile = {
      kind: backend.kind,
      name: backend.name,
      model: backend.model,
      endpoint: backend.endpoint,
      local: backend.local,
      requested,
      ...(substituted ? { substitutedFrom: requested, reason: failures.join('; ') } : {})
    };

    if (substituted) {
      logger.warn(`Requested backend "${requested}" unavailable, using ${backend.name} (${profile.reason})`);
    } else {
      logger.debug(`Using backend ${backend.name}`);
    }

    return new ModelClient(backend, profile, logger);
  }

  /**
   * Send one prompt (plus optional context) to the backend. Single attempt, no retry.
   */
  async analyze(prompt: string, context?: AnalysisContext): Promise<AnalysisResult> {
    const fullPrompt = context
      ? `${prompt}\n\nContext:\n${JSON.stringify(context, null, 2)}`
      : prompt;

    try {
      const response = await this.backend.complete(fullPrompt);
      return { status: 'success', response, backend: this.backend.kind };
    } catch (error) {
      const message = errorMessage(error);
      if (this.backend.kind !== 'disabled') {
        this.logger.warn(`Analysis failed on ${this.backend.name}: ${message}`);
      }
      return { status: 'error', error: message, backend: this.backend.kind };
    }
  }

  getProfile(): BackendProfile {
    return this.profile;
  }

  isAvailable(): boolean {
    return this.backend.kind !== 'disabled';
  }
}
