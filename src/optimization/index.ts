/**
 * Optimization Module
 */

export { OptimizationRunner, calculateImprovements } from './OptimizationRunner.js';
export type { OptimizationRunnerOptions } from './OptimizationRunner.js';
export * from './types.js';
