/**
 * Configuration Module
 */

export { ConfigLoader, loadConfig, expandEnvVars, CONFIG_FILE_NAMES, type LoadOptions } from './ConfigLoader.js';
export * from './types.js';
