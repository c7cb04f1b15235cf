/**
 * Autoheal
 *
 * Self-auditing, self-healing loop: classify log errors and source issues,
 * apply guarded fixes, and learn which fixes work.
 */

export * from './config/index.js';
export * from './providers/index.js';
export * from './logs/index.js';
export * from './analysis/index.js';
export * from './learning/index.js';
export * from './repair/index.js';
export * from './optimization/index.js';
export * from './orchestrator/index.js';

export { Logger, createLogger, silentLogger, type LogLevel, type LoggerConfig } from './core/Logger.js';
export {
  ConfigurationError,
  BackendInitializationError,
  RewriteVerificationError,
  errorMessage
} from './core/errors.js';
export { systemClock, compactTimestamp, type Clock } from './core/time.js';
