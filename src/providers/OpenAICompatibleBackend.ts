/**
 * OpenAICompatibleBackend - Fallback backend over the OpenAI chat API
 *
 * Also serves local-inference servers that speak the same protocol (Ollama).
 * A local endpoint needs no credential.
 */

import OpenAI from 'openai';
import { BackendInitializationError } from '../core/errors.js';
import type { FallbackModelConfig, RequestedBackend } from '../config/types.js';
import type { ModelBackend } from './types.js';

const LOCAL_ENDPOINT_SIGNATURES = ['ollama', 'localhost:11434'];
const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

/**
 * Check whether a base URL points at a local-inference server
 */
export function isLocalInferenceEndpoint(baseUrl: string | undefined): boolean {
  if (!baseUrl) {
    return false;
  }
  const lower = baseUrl.toLowerCase();
  return LOCAL_ENDPOINT_SIGNATURES.some(signature => lower.includes(signature));
}

/**
 * Ollama serves the OpenAI protocol under /v1
 */
export function normalizeLocalEndpoint(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

export class OpenAICompatibleBackend implements ModelBackend {
  readonly kind = 'openai-compatible-fallback' as const;
  readonly name: string;
  readonly model: string;
  readonly endpoint: string | null;
  readonly local: boolean;

  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(client: OpenAI, options: { model: string; endpoint: string | null; local: boolean; maxTokens: number }) {
    this.client = client;
    this.model = options.model;
    this.endpoint = options.endpoint;
    this.local = options.local;
    this.maxTokens = options.maxTokens;
    this.name = `${this.local ? 'ollama' : 'openai'}:${this.model}`;
  }

  /**
   * Build from configuration. Requesting `ollama` without a base URL targets
   * the default local server.
   */
  static create(
    config: FallbackModelConfig,
    env: NodeJS.ProcessEnv = process.env,
    requested: RequestedBackend = 'openai'
  ): OpenAICompatibleBackend {
    const baseUrl = config.baseUrl || (requested === 'ollama' ? DEFAULT_OLLAMA_URL : undefined);
    const local = isLocalInferenceEndpoint(baseUrl);

    if (local && baseUrl) {
      const endpoint = normalizeLocalEndpoint(baseUrl);
      const client = new OpenAI({
        apiKey: config.apiKey || env.OLLAMA_API_KEY || 'ollama',
        baseURL: endpoint,
        maxRetries: 0
      });
      return new OpenAICompatibleBackend(client, {
        model: config.localModel,
        endpoint,
        local: true,
        maxTokens: config.maxTokens
      });
    }

    const apiKey = config.apiKey || env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new BackendInitializationError('openai', 'OPENAI_API_KEY is not set');
    }

    const client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
    return new OpenAICompatibleBackend(client, {
      model: config.model,
      endpoint: baseUrl ?? null,
      local: false,
      maxTokens: config.maxTokens
    });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        { role: 'user', content: prompt }
      ]
    });

    const text = response.choices[0]?.message?.content ?? '';
    if (!text.trim()) {
      throw new Error(`No text response from ${this.name}`);
    }

    return text;
  }
}
