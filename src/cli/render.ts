/**
 * Text rendering for command results
 */

import chalk from 'chalk';
import type { Insights } from '../learning/types.js';
import type { OptimizationOutcome } from '../optimization/types.js';
import type { AuditResult, OptimizationRunResult, RepairRunResult, SystemStatus } from '../orchestrator/types.js';
import type { RepairOutcome } from '../repair/types.js';

const RULE = '─'.repeat(40);

function heading(title: string): void {
  console.log();
  console.log(chalk.cyan(title));
  console.log(chalk.dim(RULE));
}

function field(label: string, value: string | number): void {
  console.log(chalk.dim(`${label}:`), chalk.white(String(value)));
}

function list(title: string, items: string[]): void {
  if (items.length === 0) {
    return;
  }
  console.log();
  console.log(chalk.cyan(title));
  for (const item of items) {
    console.log(`  • ${item}`);
  }
}

function statusColor(status: string): string {
  switch (status) {
    case 'success':
      return chalk.green(status);
    case 'failed':
      return chalk.red(status);
    case 'suggested':
      return chalk.yellow(status);
    default:
      return chalk.dim(status);
  }
}

function outcomeLine(outcome: RepairOutcome | OptimizationOutcome): string {
  const why = outcome.error ?? outcome.reason;
  return `${statusColor(outcome.status)} ${outcome.action}${why ? chalk.dim(` (${why})`) : ''}`;
}

export function renderAudit(result: AuditResult): void {
  heading('Audit Report');
  field('Run', result.runId);

  const logs = result.logAnalysis;
  if (logs) {
    field('Log errors', logs.errors.length);
    field('Log warnings', logs.warnings.length);
    for (const [type, count] of Object.entries(logs.typeHistogram)) {
      console.log(chalk.dim(`  ${type}:`), count);
    }
    for (const source of logs.sources.filter(s => s.error)) {
      console.log(chalk.yellow(`  ${source.source}: ${source.error}`));
    }
  }

  const code = result.codeAnalysis;
  if (code) {
    console.log();
    field('Files analyzed', code.filesAnalyzed);
    field('Issues', `${code.metrics.totalIssues} (${code.metrics.highSeverity} high, ` +
      `${code.metrics.mediumSeverity} medium, ${code.metrics.lowSeverity} low)`);
    field('Optimization opportunities', code.metrics.optimizationOpportunities);
    for (const issue of code.issues.filter(i => i.severity === 'high').slice(0, 10)) {
      console.log(chalk.red(`  ${issue.file}:${issue.line}`), issue.message);
    }
  }

  list('Recommendations', result.recommendations);
  console.log();
}

export function renderRepair(result: RepairRunResult): void {
  heading('Repair Report');
  field('Run', result.runId);

  const report = result.report;
  if (!report) {
    return;
  }
  field('Succeeded', report.successCount);
  field('Failed', report.failedCount);
  field('Skipped', report.skippedCount);
  console.log();
  for (const repair of report.repairs) {
    console.log(`  ${outcomeLine(repair)}`);
    if (repair.backup) {
      console.log(chalk.dim(`    backup: ${repair.backup}`));
    }
    if (repair.suggestion) {
      console.log(chalk.dim(`    suggestion: ${repair.suggestion}`));
    }
  }
  console.log();
}

export function renderOptimization(result: OptimizationRunResult): void {
  heading('Optimization Report');
  field('Run', result.runId);

  const report = result.report;
  if (!report) {
    return;
  }
  for (const optimization of report.optimizations) {
    console.log(`  ${outcomeLine(optimization)}`);
  }
  list('Improvements', report.improvements.map(i => `${i.metric}: ${i.before} → ${i.after} (${i.improvement})`));
  console.log();
}

export function renderInsights(insights: Insights): void {
  heading('Learned Insights');

  list('Common errors', insights.commonErrors.map(e => `${e.type} (${e.count}, last seen ${e.lastSeen})`));
  list('Effective fixes', insights.effectiveFixes.map(f =>
    `${f.errorType} → ${f.fixAction}: ${(f.successRate * 100).toFixed(0)}% of ${f.totalAttempts}`
  ));
  list('Optimizations', insights.optimizationSummary.map(o =>
    `${o.type}: ${o.successes}/${o.attempts} succeeded`
  ));
  list('Recommendations', insights.recommendations);

  if (insights.commonErrors.length === 0 && insights.effectiveFixes.length === 0) {
    console.log(chalk.dim('Nothing learned yet. Run an audit or a repair first.'));
  }
  console.log();
}

export function renderStatus(status: SystemStatus): void {
  heading('Autoheal Status');

  const { backend } = status;
  field('Backend', `${backend.name}${status.available ? '' : chalk.yellow(' (unavailable)')}`);
  if (backend.substitutedFrom) {
    console.log(chalk.yellow(`  substituted for ${backend.substitutedFrom}: ${backend.reason ?? 'unknown reason'}`));
  }
  if (backend.endpoint) {
    field('Endpoint', backend.endpoint);
  }

  console.log();
  field('Error patterns', status.knowledge.errorPatterns);
  field('Fix patterns', status.knowledge.fixPatterns);
  field('Trusted fixes', status.knowledge.trustedFixes);
  field('Learned rules', status.knowledge.learnedRules);

  console.log();
  if (status.lastRun) {
    field('Last run', `${status.lastRun.operation} at ${status.lastRun.last_run}`);
  } else {
    console.log(chalk.dim('No runs recorded yet'));
  }
  console.log();
}
