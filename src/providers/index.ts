/**
 * Model Client
 */

export * from './types.js';
export { ModelClient, type BackendFactories, type ModelClientOptions } from './ModelClient.js';
export { AnthropicBackend } from './AnthropicBackend.js';
export { OpenAICompatibleBackend, isLocalInferenceEndpoint, normalizeLocalEndpoint } from './OpenAICompatibleBackend.js';
export { DisabledBackend } from './DisabledBackend.js';
export { parseRecommendations } from './recommendations.js';
