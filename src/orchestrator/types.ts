/**
 * Orchestrator Types
 */

import type { CodeAnalysis } from '../analysis/types.js';
import type { Insights, KnowledgeStats } from '../learning/types.js';
import type { LogAnalysis } from '../logs/types.js';
import type { OptimizationReport } from '../optimization/types.js';
import type { BackendProfile } from '../providers/types.js';
import type { RepairReport } from '../repair/types.js';

export type RunStatus = 'completed' | 'failed';

export type Operation = 'full_audit' | 'auto_repair' | 'optimization' | 'insights';

interface RunBase {
  runId: string;
  timestamp: string;
  status: RunStatus;
  error?: string;
}

export interface AuditResult extends RunBase {
  logAnalysis?: LogAnalysis;
  codeAnalysis?: CodeAnalysis;
  insights?: Insights;
  recommendations: string[];
}

export interface RepairRunResult extends RunBase {
  report?: RepairReport;
}

export interface OptimizationRunResult extends RunBase {
  report?: OptimizationReport;
}

/**
 * Persisted after every orchestrated operation
 */
export interface StatusSnapshot {
  last_run: string;
  operation: string;
  results: unknown;
  /** When the last full audit ran; carried across other operations */
  last_audit?: string;
}

export interface SystemStatus {
  backend: BackendProfile;
  available: boolean;
  knowledge: KnowledgeStats;
  lastRun: StatusSnapshot | null;
}
