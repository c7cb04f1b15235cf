/**
 * OptimizationRunner - Measure, apply safe rewrites, measure again
 *
 * The index-loop rewrite is a textual substitution; with verification on,
 * a result that no longer parses is rolled back.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import type { IssueDetector } from '../analysis/IssueDetector.js';
import type { AnalysisMetrics, OptimizationOpportunity } from '../analysis/types.js';
import type { CommandConfig } from '../config/types.js';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import type { CommandRunner } from '../repair/CommandRunner.js';
import type { SafeWriter } from '../repair/SafeWriter.js';
import { rewriteIndexLoops } from '../repair/rewrites.js';
import {
  OPTIMIZATION_REQUESTS,
  type Improvement,
  type ImprovementMetric,
  type OptimizationOutcome,
  type OptimizationReport,
  type OptimizationRequest
} from './types.js';

const IMPROVEMENT_METRICS: ReadonlyArray<[ImprovementMetric, keyof AnalysisMetrics]> = [
  ['total_issues', 'totalIssues'],
  ['high_severity', 'highSeverity'],
  ['optimization_opportunities', 'optimizationOpportunities']
];

export interface OptimizationRunnerOptions {
  projectRoot: string;
  issueDetector: IssueDetector;
  writer: SafeWriter;
  runner: CommandRunner;
  /** Manifest path relative to the project root */
  manifest: string;
  outdatedTool: CommandConfig;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Percentage drop per metric; metrics that stayed equal or grew are omitted
 */
export function calculateImprovements(before: AnalysisMetrics, after: AnalysisMetrics): Improvement[] {
  const improvements: Improvement[] = [];

  for (const [metric, key] of IMPROVEMENT_METRICS) {
    const beforeValue = before[key];
    const afterValue = after[key];
    if (afterValue < beforeValue) {
      const percent = ((beforeValue - afterValue) / beforeValue) * 100;
      improvements.push({
        metric,
        before: beforeValue,
        after: afterValue,
        percent,
        improvement: `${percent.toFixed(1)}%`
      });
    }
  }

  return improvements;
}

export class OptimizationRunner {
  private readonly projectRoot: string;
  private readonly issueDetector: IssueDetector;
  private readonly writer: SafeWriter;
  private readonly runner: CommandRunner;
  private readonly manifest: string;
  private readonly outdatedTool: CommandConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: OptimizationRunnerOptions) {
    this.projectRoot = options.projectRoot;
    this.issueDetector = options.issueDetector;
    this.writer = options.writer;
    this.runner = options.runner;
    this.manifest = options.manifest;
    this.outdatedTool = options.outdatedTool;
    this.logger = options.logger ?? createLogger('OptimizationRunner');
    this.clock = options.clock ?? systemClock;
  }

  async optimizeApplication(kinds: OptimizationRequest[] = [...OPTIMIZATION_REQUESTS]): Promise<OptimizationReport> {
    const before = await this.issueDetector.analyze(undefined, { recommendations: false });
    const optimizations: OptimizationOutcome[] = [];

    if (kinds.includes('code')) {
      for (const opportunity of before.optimizations) {
        optimizations.push(this.applyOpportunity(opportunity));
      }
    }

    if (kinds.includes('dependencies')) {
      const outcome = await this.checkOutdated();
      if (outcome) {
        optimizations.push(outcome);
      }
    }

    const after = await this.issueDetector.analyze(undefined, { recommendations: false });
    const improvements = calculateImprovements(before.metrics, after.metrics);

    this.logger.info(
      `Applied ${optimizations.filter(o => o.status === 'success').length} optimization(s); ` +
      `${improvements.length} metric(s) improved`
    );

    return {
      timestamp: this.clock().toISOString(),
      kinds,
      optimizations,
      improvements,
      metricsBefore: before.metrics,
      metricsAfter: after.metrics
    };
  }

  applyOpportunity(opportunity: OptimizationOpportunity): OptimizationOutcome {
    if (opportunity.kind === 'multiple_append') {
      return this.outcome({
        kind: 'multiple_append',
        action: 'No action taken',
        status: 'skipped',
        reason: 'Requires manual review',
        file: opportunity.file
      });
    }

    const path = resolve(this.projectRoot, opportunity.file);
    if (!existsSync(path)) {
      return this.outcome({
        kind: opportunity.kind,
        action: 'No action taken',
        status: 'skipped',
        reason: 'File not found',
        file: opportunity.file
      });
    }

    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      return this.outcome({
        kind: opportunity.kind,
        action: `Optimize iteration in ${opportunity.file}`,
        status: 'failed',
        error: errorMessage(error),
        file: opportunity.file
      });
    }

    const rewritten = rewriteIndexLoops(content);
    if (rewritten === content) {
      return this.outcome({
        kind: opportunity.kind,
        action: 'No action taken',
        status: 'skipped',
        reason: 'No changes needed',
        file: opportunity.file
      });
    }

    const action = `Optimized iteration in ${opportunity.file}`;
    const written = this.writer.write(path, rewritten);
    if (!written.ok) {
      this.logger.warn(`Optimization of ${opportunity.file} rolled back: ${written.error}`);
      return this.outcome({
        kind: opportunity.kind,
        action,
        status: 'failed',
        error: written.error,
        file: opportunity.file,
        ...(written.backup ? { backup: written.backup } : {})
      });
    }

    return this.outcome({
      kind: opportunity.kind,
      action,
      status: 'success',
      backup: written.backup,
      file: opportunity.file
    });
  }

  /**
   * Run the outdated-dependency tool; any output becomes a suggestion
   */
  private async checkOutdated(): Promise<OptimizationOutcome | null> {
    if (!existsSync(resolve(this.projectRoot, this.manifest))) {
      return null;
    }

    const { command, args } = this.outdatedTool;
    try {
      const result = await this.runner.run(command, args, this.projectRoot);
      const output = result.stdout.trim();

      // npm outdated exits 1 when it finds something
      if (output && output !== '{}') {
        return this.outcome({
          kind: 'dependencies',
          action: 'Update outdated dependencies',
          status: 'suggested',
          details: output
        });
      }
      if (result.exitCode !== 0) {
        this.logger.error(`Error checking dependencies: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
      }
    } catch (error) {
      this.logger.error(`Error checking dependencies: ${errorMessage(error)}`);
    }

    return null;
  }

  private outcome(fields: Omit<OptimizationOutcome, 'timestamp'>): OptimizationOutcome {
    return Object.freeze({ ...fields, timestamp: this.clock().toISOString() });
  }
}
