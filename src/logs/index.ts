/**
 * Log Classifier
 */

export * from './types.js';
export { LogClassifier, type LogClassifierOptions, extractTimestamp, isErrorLine, isWarningLine, classifyError } from './LogClassifier.js';
export { ERROR_CATEGORIES, FALLBACK_RECOMMENDATIONS } from './patterns.js';
