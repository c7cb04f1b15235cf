/**
 * Analysis Types
 *
 * Type definitions for source issue detection.
 */

export type Severity = 'high' | 'medium' | 'low';

export type IssueKind =
  | 'syntax_error'
  | 'long_function'
  | 'bare_except'
  | 'print_debug'
  | 'hardcoded_paths'
  | 'todo_comments';

export type OptimizationKind = 'inefficient_iteration' | 'multiple_append';

/**
 * One detected problem. Never mutated; a fresh pass supersedes it.
 */
export interface Issue {
  readonly kind: IssueKind;
  readonly severity: Severity;
  /** Path relative to the project root */
  readonly file: string;
  readonly line: number;
  readonly message: string;
  readonly detail?: string;
}

export interface OptimizationOpportunity {
  readonly kind: OptimizationKind;
  readonly file: string;
  /** First matching line */
  readonly line: number;
  readonly suggestion: string;
}

export interface AnalysisMetrics {
  totalIssues: number;
  highSeverity: number;
  mediumSeverity: number;
  lowSeverity: number;
  optimizationOpportunities: number;
}

export interface FileAnalysis {
  file: string;
  issues: Issue[];
  optimizations: OptimizationOpportunity[];
}

export interface CodeAnalysis {
  timestamp: string;
  filesAnalyzed: number;
  issues: Issue[];
  optimizations: OptimizationOpportunity[];
  metrics: AnalysisMetrics;
  recommendations: string[];
  /** Files that could not be read */
  fileErrors: Array<{ file: string; error: string }>;
}

export interface CodeAnalyzeOptions {
  /** Ask the model for recommendations (default true) */
  recommendations?: boolean;
}
