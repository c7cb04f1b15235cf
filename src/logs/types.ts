/**
 * Log Classifier Types
 */

import type { ErrorCategory } from './patterns.js';

export type { ErrorCategory };

export interface LogErrorRecord {
  rawLine: string;
  /** ISO timestamp, absent when the line carries none that parses */
  timestamp?: string;
  classifiedType: ErrorCategory;
  /** Name of the log source the line came from */
  source: string;
}

export interface LogWarningRecord {
  rawLine: string;
  timestamp?: string;
  source: string;
}

export interface LogSourceResult {
  source: string;
  file: string;
  errors: LogErrorRecord[];
  warnings: LogWarningRecord[];
  infoCount: number;
  totalLines: number;
  /** Set when the source could not be read; its records are excluded from the aggregate */
  error?: string;
}

export interface LogAnalysis {
  timestamp: string;
  windowHours: number;
  scope: string;
  sources: LogSourceResult[];
  errors: LogErrorRecord[];
  warnings: LogWarningRecord[];
  typeHistogram: Record<string, number>;
  recommendations: string[];
}

export interface LogAnalyzeOptions {
  /** Ask the model for recommendations (default true) */
  recommendations?: boolean;
}
