/**
 * Model Client Types
 *
 * Abstraction over interchangeable text-completion backends:
 * - primary: Anthropic Claude models
 * - openai-compatible-fallback: OpenAI API or a local Ollama server
 * - disabled: no backend could be initialized
 */

import type { RequestedBackend } from '../config/types.js';

export type BackendProfileKind = 'primary' | 'openai-compatible-fallback' | 'disabled';

/**
 * One text-completion backend. Implementations throw on failure;
 * ModelClient converts failures into error results.
 */
export interface ModelBackend {
  readonly kind: BackendProfileKind;
  /** Human-readable identity, e.g. "anthropic:claude-sonnet-4-20250514" */
  readonly name: string;
  /** Model name sent with each request (null when disabled) */
  readonly model: string | null;
  /** Endpoint base URL, null for the SDK default */
  readonly endpoint: string | null;
  /** Whether a local-inference server is used (no credential required) */
  readonly local: boolean;
  complete(prompt: string): Promise<string>;
}

/**
 * Which backend is active and how it was chosen. Frozen at construction.
 */
export interface BackendProfile {
  readonly kind: BackendProfileKind;
  readonly name: string;
  readonly model: string | null;
  readonly endpoint: string | null;
  readonly local: boolean;
  readonly requested: RequestedBackend;
  /** Set when the requested backend failed and another one took its place */
  readonly substitutedFrom?: RequestedBackend;
  readonly reason?: string;
}

export type AnalysisContext = Record<string, unknown>;

export type AnalysisResult =
  | { status: 'success'; response: string; backend: BackendProfileKind }
  | { status: 'error'; error: string; backend: BackendProfileKind };

/**
 * The part of ModelClient the other components depend on
 */
export interface TextAnalyzer {
  analyze(prompt: string, context?: AnalysisContext): Promise<AnalysisResult>;
}
