/**
 * Repair Executor
 */

export * from './types.js';
export { RepairExecutor, type RepairExecutorOptions, type FixAdvisor } from './RepairExecutor.js';
export { BackupManager, type BackupManagerOptions } from './BackupManager.js';
export { SafeWriter, type SafeWriteResult } from './SafeWriter.js';
export { DependencyManifest, extractModuleName, packageNameFromSpecifier, type ManifestUpdate } from './DependencyManifest.js';
export { ChildProcessRunner, type CommandRunner, type CommandResult } from './CommandRunner.js';
export { narrowCatchClauses, rewriteIndexLoops, extractCodeFromResponse } from './rewrites.js';
