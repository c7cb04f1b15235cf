/**
 * Learning Module
 */

export { KnowledgeStore, type KnowledgeStoreOptions } from './KnowledgeStore.js';
export * from './types.js';
