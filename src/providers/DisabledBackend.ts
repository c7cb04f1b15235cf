import type { ModelBackend } from './types.js';

/**
 * Stand-in used when no backend could be initialized.
 * Every call fails so callers take their deterministic fallback path.
 */
export class DisabledBackend implements ModelBackend {
  readonly kind = 'disabled' as const;
  readonly name = 'disabled';
  readonly model = null;
  readonly endpoint = null;
  readonly local = false;

  async complete(_prompt: string): Promise<string> {
    throw new Error('Model backend not initialized');
  }
}
