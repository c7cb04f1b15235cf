/**
 * Optimization Types
 */

import type { AnalysisMetrics, OptimizationKind } from '../analysis/types.js';

export type OptimizationRequest = 'code' | 'dependencies';

export const OPTIMIZATION_REQUESTS: readonly OptimizationRequest[] = ['code', 'dependencies'];

export type OptimizationStatus = 'success' | 'failed' | 'skipped' | 'suggested';

export interface OptimizationOutcome {
  readonly kind: OptimizationKind | 'dependencies';
  readonly action: string;
  readonly status: OptimizationStatus;
  readonly file?: string;
  readonly backup?: string;
  readonly reason?: string;
  readonly error?: string;
  /** Raw output of an external tool */
  readonly details?: string;
  readonly timestamp: string;
}

export type ImprovementMetric = 'total_issues' | 'high_severity' | 'optimization_opportunities';

export interface Improvement {
  metric: ImprovementMetric;
  before: number;
  after: number;
  percent: number;
  /** percent with one decimal, e.g. "33.3%" */
  improvement: string;
}

export interface OptimizationReport {
  timestamp: string;
  kinds: OptimizationRequest[];
  optimizations: OptimizationOutcome[];
  improvements: Improvement[];
  metricsBefore: AnalysisMetrics;
  metricsAfter: AnalysisMetrics;
}
