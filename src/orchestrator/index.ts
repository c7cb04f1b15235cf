/**
 * Orchestrator Module
 */

export { Orchestrator, type OrchestratorOptions } from './Orchestrator.js';
export { StatusStore } from './StatusStore.js';
export * from './types.js';
