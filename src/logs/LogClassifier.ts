/**
 * LogClassifier - Time-windowed log analysis
 *
 * Reads newline-delimited log sources, splits lines into errors, warnings
 * and info, classifies each error into one category, and asks the model
 * for recommendations (with a deterministic fallback).
 *
 * Lines whose timestamp cannot be parsed are always inside the window.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import { parseRecommendations } from '../providers/recommendations.js';
import type { TextAnalyzer } from '../providers/types.js';
import {
  CATEGORY_PATTERNS,
  ERROR_MARKERS,
  FALLBACK_RECOMMENDATIONS,
  NO_ERRORS_RECOMMENDATION,
  WARNING_MARKERS,
  type ErrorCategory
} from './patterns.js';
import type {
  LogAnalysis,
  LogAnalyzeOptions,
  LogErrorRecord,
  LogSourceResult,
  LogWarningRecord
} from './types.js';

const TIMESTAMP = /(\d{4})-(\d{2})-(\d{2})[\sT](\d{2}):(\d{2}):(\d{2})(?:[.,]\d+)?/;
const RECENT_LINES = 100;

export interface LogClassifierOptions {
  projectRoot: string;
  /** Source name -> path (relative to projectRoot) */
  sources: Record<string, string>;
  analyzer: TextAnalyzer;
  /** Errors handed to the model (default 5) */
  sampleSize?: number;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Parse the first timestamp on a line as local time.
 * Dates that do not exist (2026-02-30) count as unparseable.
 */
export function extractTimestamp(line: string): Date | null {
  const match = TIMESTAMP.exec(line);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const date = new Date(year, month - 1, day, hour, minute, second);

  const valid =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hour &&
    date.getMinutes() === minute &&
    date.getSeconds() === second;

  return valid ? date : null;
}

export function isErrorLine(line: string): boolean {
  return ERROR_MARKERS.some(marker => line.includes(marker));
}

export function isWarningLine(line: string): boolean {
  const upper = line.toUpperCase();
  return WARNING_MARKERS.some(marker => upper.includes(marker));
}

/**
 * First matching category, or `unknown`. The timestamp is removed first so
 * its digits cannot look like HTTP status codes.
 */
export function classifyError(line: string): ErrorCategory {
  const text = line.replace(TIMESTAMP, '');
  for (const { category, patterns } of CATEGORY_PATTERNS) {
    if (patterns.some(pattern => pattern.test(text))) {
      return category;
    }
  }
  return 'unknown';
}

function splitLines(content: string): string[] {
  if (!content) {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function toErrorRecord(line: string, source: string, timestamp: Date | null): LogErrorRecord {
  return {
    rawLine: line.trim(),
    ...(timestamp ? { timestamp: timestamp.toISOString() } : {}),
    classifiedType: classifyError(line),
    source
  };
}

export class LogClassifier {
  private readonly projectRoot: string;
  private readonly sources: Record<string, string>;
  private readonly analyzer: TextAnalyzer;
  private readonly sampleSize: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: LogClassifierOptions) {
    this.projectRoot = options.projectRoot;
    this.sources = options.sources;
    this.analyzer = options.analyzer;
    this.sampleSize = options.sampleSize ?? 5;
    this.logger = options.logger ?? createLogger('LogClassifier');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Analyze the given sources ("all" or one source name) over the last windowHours
   */
  async analyze(windowHours = 24, scope = 'all', options: LogAnalyzeOptions = {}): Promise<LogAnalysis> {
    const now = this.clock();
    const cutoff = new Date(now.getTime() - windowHours * 3600 * 1000);

    const names = scope === 'all' ? Object.keys(this.sources) : [scope];
    const sources = names.map(name => this.analyzeSource(name, cutoff));

    const errors: LogErrorRecord[] = [];
    const warnings: LogWarningRecord[] = [];
    for (const source of sources) {
      if (source.error) {
        continue;
      }
      errors.push(...source.errors);
      warnings.push(...source.warnings);
    }

    const typeHistogram: Record<string, number> = {};
    for (const error of errors) {
      typeHistogram[error.classifiedType] = (typeHistogram[error.classifiedType] ?? 0) + 1;
    }

    this.logger.info(`Analyzed ${sources.length} log source(s): ${errors.length} errors, ${warnings.length} warnings`);

    const recommendations = options.recommendations === false
      ? []
      : await this.generateRecommendations(errors, typeHistogram);

    return {
      timestamp: now.toISOString(),
      windowHours,
      scope,
      sources,
      errors,
      warnings,
      typeHistogram,
      recommendations
    };
  }

  /**
   * Most recent errors from the `error` source, newest first.
   * Only the last 100 lines are scanned.
   */
  getRecentErrors(count = 10): LogErrorRecord[] {
    const file = this.sourcePath('error');
    if (!file || !existsSync(file)) {
      return [];
    }

    let lines: string[];
    try {
      lines = splitLines(readFileSync(file, 'utf-8'));
    } catch (error) {
      this.logger.error(`Error reading recent errors from ${file}: ${errorMessage(error)}`);
      return [];
    }

    const recent: LogErrorRecord[] = [];
    for (const line of lines.slice(-RECENT_LINES).reverse()) {
      if (recent.length >= count) {
        break;
      }
      if (isErrorLine(line)) {
        recent.push(toErrorRecord(line, 'error', extractTimestamp(line)));
      }
    }
    return recent;
  }

  private sourcePath(name: string): string | null {
    const path = this.sources[name];
    if (path === undefined) {
      return null;
    }
    return isAbsolute(path) ? path : join(this.projectRoot, path);
  }

  private analyzeSource(name: string, cutoff: Date): LogSourceResult {
    const file = this.sourcePath(name);
    const result: LogSourceResult = {
      source: name,
      file: file ?? '',
      errors: [],
      warnings: [],
      infoCount: 0,
      totalLines: 0
    };

    if (!file) {
      result.error = `Unknown log source: ${name}`;
      return result;
    }
    if (!existsSync(file)) {
      result.error = `Log file not found: ${file}`;
      return result;
    }

    let lines: string[];
    try {
      lines = splitLines(readFileSync(file, 'utf-8'));
    } catch (error) {
      this.logger.error(`Error analyzing log file ${file}: ${errorMessage(error)}`);
      result.error = errorMessage(error);
      return result;
    }

    for (const line of lines) {
      result.totalLines++;

      const timestamp = extractTimestamp(line);
      if (timestamp && timestamp < cutoff) {
        continue;
      }

      if (isErrorLine(line)) {
        result.errors.push(toErrorRecord(line, name, timestamp));
      } else if (isWarningLine(line)) {
        result.warnings.push({
          rawLine: line.trim(),
          ...(timestamp ? { timestamp: timestamp.toISOString() } : {}),
          source: name
        });
      } else if (line.toUpperCase().includes('INFO')) {
        result.infoCount++;
      }
    }

    return result;
  }

  private async generateRecommendations(
    errors: LogErrorRecord[],
    typeHistogram: Record<string, number>
  ): Promise<string[]> {
    if (errors.length === 0) {
      return [NO_ERRORS_RECOMMENDATION];
    }

    const sample = errors.slice(0, this.sampleSize);
    const prompt = [
      'Analyze these application errors and provide specific recommendations:',
      '',
      `Error Patterns: ${JSON.stringify(typeHistogram)}`,
      `Sample Errors: ${JSON.stringify(sample, null, 2)}`,
      '',
      'Provide actionable recommendations to fix these issues.'
    ].join('\n');

    const analysis = await this.analyzer.analyze(prompt, {
      error_count: errors.length,
      error_patterns: typeHistogram,
      sample_errors: sample
    });

    if (analysis.status === 'success') {
      const parsed = parseRecommendations(analysis.response);
      if (parsed.length > 0) {
        return parsed;
      }
    } else {
      this.logger.debug(`Using fallback recommendations: ${analysis.error}`);
    }

    return FALLBACK_RECOMMENDATIONS
      .filter(([category]) => category in typeHistogram)
      .map(([, text]) => text);
  }
}
