/**
 * Repair Types
 */

export type RepairKind = 'logs' | 'code' | 'dependencies';

export const REPAIR_KINDS: readonly RepairKind[] = ['logs', 'code', 'dependencies'];

export type RepairStatus = 'success' | 'failed' | 'skipped' | 'suggested';

/**
 * Stable fix-action identifier recorded in the knowledge store
 */
export type RepairStrategy =
  | 'add_to_manifest'
  | 'manual_verification'
  | 'model_suggestion'
  | 'learned_fix'
  | 'narrow_catch'
  | 'model_rewrite'
  | 'dependency_tool'
  | 'none';

/**
 * One repair attempt. Immutable once recorded.
 */
export interface RepairOutcome {
  readonly issueKind: string;
  readonly action: string;
  readonly strategy: RepairStrategy;
  readonly status: RepairStatus;
  readonly file?: string;
  readonly backup?: string;
  readonly error?: string;
  readonly reason?: string;
  readonly recommendation?: string;
  readonly suggestion?: string;
  readonly confidence?: number;
  readonly timestamp: string;
}

export interface RepairReport {
  timestamp: string;
  kinds: RepairKind[];
  repairs: RepairOutcome[];
  successCount: number;
  failedCount: number;
  /** skipped and suggested outcomes */
  skippedCount: number;
}
