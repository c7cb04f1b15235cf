/**
 * AnthropicBackend - Primary backend over the Anthropic Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import { BackendInitializationError } from '../core/errors.js';
import type { PrimaryModelConfig } from '../config/types.js';
import type { ModelBackend } from './types.js';

export class AnthropicBackend implements ModelBackend {
  readonly kind = 'primary' as const;
  readonly name: string;
  readonly model: string;
  readonly endpoint = null;
  readonly local = false;

  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(client: Anthropic, model: string, maxTokens: number) {
    this.client = client;
    this.model = model;
    this.maxTokens = maxTokens;
    this.name = `anthropic:${model}`;
  }

  /**
   * Build from configuration; the credential comes from the config, then ANTHROPIC_API_KEY
   */
  static create(config: PrimaryModelConfig, env: NodeJS.ProcessEnv = process.env): AnthropicBackend {
    const apiKey = config.apiKey || env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new BackendInitializationError('anthropic', 'ANTHROPIC_API_KEY is not set');
    }

    const client = new Anthropic({ apiKey, maxRetries: 0 });
    return new AnthropicBackend(client, config.model, config.maxTokens);
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        { role: 'user', content: prompt }
      ]
    });

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!text.trim()) {
      throw new Error('No text response from Anthropic API');
    }

    return text;
  }
}
