/**
 * RepairExecutor - Attempts one fix per detected problem
 *
 * Log-derived repairs (first N errors, detection order):
 *   import_errors    -> add the missing package to the dependency manifest
 *   api_errors       -> always skipped; needs manual verification
 *   attribute_errors -> learned fix or model suggestion, never applied
 *
 * Code repairs run for high-severity issues and for kinds with a
 * deterministic transform. Every file write goes through SafeWriter, so a
 * failed repair leaves the file byte-identical to what it was.
 *
 * One repair failing never stops the batch.
 */

import { existsSync, readFileSync } from 'fs';
import { extname, resolve } from 'path';
import type { IssueDetector } from '../analysis/IssueDetector.js';
import type { Issue, IssueKind } from '../analysis/types.js';
import type { CommandConfig } from '../config/types.js';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import type { LogClassifier } from '../logs/LogClassifier.js';
import type { LogErrorRecord } from '../logs/types.js';
import type { SuggestedFix } from '../learning/types.js';
import type { TextAnalyzer } from '../providers/types.js';
import type { CommandRunner } from './CommandRunner.js';
import { DependencyManifest, extractModuleName, packageNameFromSpecifier } from './DependencyManifest.js';
import { extractCodeFromResponse, narrowCatchClauses } from './rewrites.js';
import type { SafeWriter } from './SafeWriter.js';
import {
  REPAIR_KINDS,
  type RepairKind,
  type RepairOutcome,
  type RepairReport,
  type RepairStrategy
} from './types.js';

/**
 * Source of previously learned fixes
 */
export interface FixAdvisor {
  getSuggestedFix(error: { type: string }): SuggestedFix | null;
}

export interface RepairExecutorOptions {
  projectRoot: string;
  logClassifier: LogClassifier;
  issueDetector: IssueDetector;
  advisor: FixAdvisor;
  analyzer: TextAnalyzer;
  writer: SafeWriter;
  runner: CommandRunner;
  /** Manifest path relative to the project root */
  manifest: string;
  dependencyTool: CommandConfig;
  windowHours?: number;
  maxLogRepairs?: number;
  logger?: Logger;
  clock?: Clock;
}

type FixPlan =
  | { kind: 'rewrite'; content: string; action: string }
  | { kind: 'skip'; reason: string }
  | { kind: 'fail'; reason: string };

interface CodeFixer {
  strategy: RepairStrategy;
  plan(issue: Issue, path: string, content: string): Promise<FixPlan>;
}

/** Kinds repaired even below high severity */
const DETERMINISTIC_KINDS: ReadonlySet<IssueKind> = new Set(['bare_except']);

function languageOf(file: string): string {
  return ['.ts', '.tsx', '.mts', '.cts'].includes(extname(file)) ? 'TypeScript' : 'JavaScript';
}

export class RepairExecutor {
  private readonly projectRoot: string;
  private readonly logClassifier: LogClassifier;
  private readonly issueDetector: IssueDetector;
  private readonly advisor: FixAdvisor;
  private readonly analyzer: TextAnalyzer;
  private readonly writer: SafeWriter;
  private readonly runner: CommandRunner;
  private readonly manifest: DependencyManifest;
  private readonly dependencyTool: CommandConfig;
  private readonly windowHours: number;
  private readonly maxLogRepairs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly fixers: Partial<Record<IssueKind, CodeFixer>>;

  constructor(options: RepairExecutorOptions) {
    this.projectRoot = options.projectRoot;
    this.logClassifier = options.logClassifier;
    this.issueDetector = options.issueDetector;
    this.advisor = options.advisor;
    this.analyzer = options.analyzer;
    this.writer = options.writer;
    this.runner = options.runner;
    this.manifest = new DependencyManifest(resolve(options.projectRoot, options.manifest));
    this.dependencyTool = options.dependencyTool;
    this.windowHours = options.windowHours ?? 24;
    this.maxLogRepairs = options.maxLogRepairs ?? 5;
    this.logger = options.logger ?? createLogger('RepairExecutor');
    this.clock = options.clock ?? systemClock;

    this.fixers = {
      bare_except: {
        strategy: 'narrow_catch',
        plan: async (issue, path, content) => {
          const fixed = narrowCatchClauses(path, content);
          return fixed === content
            ? { kind: 'skip', reason: 'No changes needed' }
            : { kind: 'rewrite', content: fixed, action: `Narrowed bare catch clauses in ${issue.file}` };
        }
      },
      syntax_error: {
        strategy: 'model_rewrite',
        plan: (issue, path, content) => this.planSyntaxFix(issue, path, content)
      }
    };
  }

  /**
   * Analyze fresh, then repair the requested kinds (default: all)
   */
  async autoRepair(kinds: RepairKind[] = [...REPAIR_KINDS]): Promise<RepairReport> {
    const repairs: RepairOutcome[] = [];

    if (kinds.includes('logs')) {
      const analysis = await this.logClassifier.analyze(this.windowHours, 'all', { recommendations: false });
      for (const error of analysis.errors.slice(0, this.maxLogRepairs)) {
        repairs.push(await this.repairLogError(error));
      }
    }

    if (kinds.includes('code')) {
      const analysis = await this.issueDetector.analyze(undefined, { recommendations: false });
      for (const issue of analysis.issues) {
        if (issue.severity === 'high' || DETERMINISTIC_KINDS.has(issue.kind)) {
          repairs.push(await this.repairCodeIssue(issue));
        }
      }
    }

    if (kinds.includes('dependencies')) {
      const outcome = await this.repairDependencies();
      if (outcome) {
        repairs.push(outcome);
      }
    }

    const report: RepairReport = {
      timestamp: this.clock().toISOString(),
      kinds,
      repairs,
      successCount: repairs.filter(r => r.status === 'success').length,
      failedCount: repairs.filter(r => r.status === 'failed').length,
      skippedCount: repairs.filter(r => r.status === 'skipped' || r.status === 'suggested').length
    };

    this.logger.info(
      `Repairs: ${report.successCount} succeeded, ${report.failedCount} failed, ${report.skippedCount} skipped`
    );
    return report;
  }

  // ===========================================================================
  // Log-derived repairs
  // ===========================================================================

  async repairLogError(error: LogErrorRecord): Promise<RepairOutcome> {
    switch (error.classifiedType) {
      case 'import_errors':
        return this.repairImportError(error);

      case 'api_errors':
        return this.outcome({
          issueKind: 'api_errors',
          action: 'Manual verification required',
          strategy: 'manual_verification',
          status: 'skipped',
          reason: 'API errors require manual verification',
          recommendation: 'Check API key and network connectivity'
        });

      case 'attribute_errors':
        return this.repairAttributeError(error);

      default:
        return this.outcome({
          issueKind: error.classifiedType,
          action: 'No action taken',
          strategy: 'none',
          status: 'skipped',
          reason: `No automated repair for ${error.classifiedType}`
        });
    }
  }

  private repairImportError(error: LogErrorRecord): RepairOutcome {
    const specifier = extractModuleName(error.rawLine);
    const name = specifier ? packageNameFromSpecifier(specifier) : null;

    if (!name) {
      return this.outcome({
        issueKind: 'import_errors',
        action: 'No action taken',
        strategy: 'add_to_manifest',
        status: 'skipped',
        reason: specifier ? `Not an installable package: ${specifier}` : 'Could not extract module name'
      });
    }

    try {
      const update = this.manifest.addDependency(name);
      if (update.status === 'present') {
        return this.outcome({
          issueKind: 'import_errors',
          action: `${name} already present in ${this.manifest.name}`,
          strategy: 'add_to_manifest',
          status: 'skipped',
          reason: 'Already listed'
        });
      }
      return this.outcome({
        issueKind: 'import_errors',
        action: `Added ${name} to ${this.manifest.name}`,
        strategy: 'add_to_manifest',
        status: 'success',
        file: this.manifest.path
      });
    } catch (err) {
      return this.outcome({
        issueKind: 'import_errors',
        action: `Add ${name} to ${this.manifest.name}`,
        strategy: 'add_to_manifest',
        status: 'failed',
        error: errorMessage(err)
      });
    }
  }

  private async repairAttributeError(error: LogErrorRecord): Promise<RepairOutcome> {
    const learned = this.advisor.getSuggestedFix({ type: 'attribute_errors' });
    if (learned) {
      return this.outcome({
        issueKind: 'attribute_errors',
        action: `Apply learned fix: ${learned.action}`,
        strategy: 'learned_fix',
        status: 'suggested',
        suggestion: learned.action,
        confidence: learned.confidence
      });
    }

    const prompt = `Fix this JavaScript/TypeScript error:\n\n${error.rawLine}\n\nProvide the corrected code.`;
    const analysis = await this.analyzer.analyze(prompt, { error });

    if (analysis.status === 'success') {
      return this.outcome({
        issueKind: 'attribute_errors',
        action: 'Review the suggested fix',
        strategy: 'model_suggestion',
        status: 'suggested',
        suggestion: analysis.response
      });
    }

    return this.outcome({
      issueKind: 'attribute_errors',
      action: 'No action taken',
      strategy: 'model_suggestion',
      status: 'skipped',
      reason: 'Could not generate fix'
    });
  }

  // ===========================================================================
  // Code repairs
  // ===========================================================================

  async repairCodeIssue(issue: Issue): Promise<RepairOutcome> {
    const path = resolve(this.projectRoot, issue.file);
    const fixer = this.fixers[issue.kind];

    if (!existsSync(path)) {
      return this.outcome({
        issueKind: issue.kind,
        action: 'No action taken',
        strategy: fixer?.strategy ?? 'none',
        status: 'skipped',
        reason: 'File not found',
        file: issue.file
      });
    }

    if (!fixer) {
      return this.outcome({
        issueKind: issue.kind,
        action: 'No action taken',
        strategy: 'none',
        status: 'skipped',
        reason: `No auto-fix available for ${issue.kind}`,
        file: issue.file
      });
    }

    let plan: FixPlan;
    try {
      plan = await fixer.plan(issue, path, readFileSync(path, 'utf-8'));
    } catch (error) {
      plan = { kind: 'fail', reason: errorMessage(error) };
    }

    if (plan.kind === 'skip') {
      return this.outcome({
        issueKind: issue.kind,
        action: 'No action taken',
        strategy: fixer.strategy,
        status: 'skipped',
        reason: plan.reason,
        file: issue.file
      });
    }

    if (plan.kind === 'fail') {
      return this.outcome({
        issueKind: issue.kind,
        action: `Repair ${issue.kind} in ${issue.file}`,
        strategy: fixer.strategy,
        status: 'failed',
        reason: plan.reason,
        file: issue.file
      });
    }

    const written = this.writer.write(path, plan.content);
    if (!written.ok) {
      this.logger.warn(`Repair of ${issue.file} rolled back: ${written.error}`);
      return this.outcome({
        issueKind: issue.kind,
        action: plan.action,
        strategy: fixer.strategy,
        status: 'failed',
        error: written.error,
        file: issue.file,
        ...(written.backup ? { backup: written.backup } : {})
      });
    }

    this.logger.info(plan.action);
    return this.outcome({
      issueKind: issue.kind,
      action: plan.action,
      strategy: fixer.strategy,
      status: 'success',
      backup: written.backup,
      file: issue.file
    });
  }

  private async planSyntaxFix(issue: Issue, path: string, content: string): Promise<FixPlan> {
    const prompt = [
      `Fix the syntax error in this ${languageOf(path)} code:`,
      '',
      content,
      '',
      `Error: ${issue.message}`,
      `Line: ${issue.line}`,
      '',
      'Provide the corrected code.'
    ].join('\n');

    const analysis = await this.analyzer.analyze(prompt, { issue });
    if (analysis.status !== 'success') {
      return { kind: 'fail', reason: 'Could not generate fix' };
    }

    const code = extractCodeFromResponse(analysis.response);
    if (code === null) {
      return { kind: 'fail', reason: 'Could not generate fix' };
    }

    return { kind: 'rewrite', content: code, action: `Fixed syntax error in ${issue.file}` };
  }

  // ===========================================================================
  // Dependency repairs
  // ===========================================================================

  /**
   * Run the configured dependency tool and report what it did: a changed
   * manifest is a success, findings on a non-zero exit are suggestions,
   * and a clean run that changed nothing is skipped.
   */
  private async repairDependencies(): Promise<RepairOutcome | null> {
    if (!this.manifest.exists()) {
      return null;
    }

    const { command, args } = this.dependencyTool;
    const commandLine = `${command} ${args.join(' ')}`.trim();
    const base = { issueKind: 'dependencies', strategy: 'dependency_tool' } as const;

    try {
      const before = this.manifest.read();
      const result = await this.runner.run(command, args, this.projectRoot);
      const changed = this.manifest.exists() && this.manifest.read() !== before;

      if (result.exitCode !== 0) {
        const findings = result.stdout.trim();
        if (findings) {
          return this.outcome({
            ...base,
            action: `Review findings from ${commandLine}`,
            status: 'suggested',
            suggestion: findings
          });
        }
        return this.outcome({
          ...base,
          action: commandLine,
          status: 'failed',
          error: result.stderr.trim() || `Exited with code ${result.exitCode}`
        });
      }

      if (changed) {
        return this.outcome({ ...base, action: `Updated ${this.manifest.name} with ${commandLine}`, status: 'success' });
      }
      return this.outcome({
        ...base,
        action: `Ran ${commandLine}`,
        status: 'skipped',
        reason: `${this.manifest.name} unchanged`
      });
    } catch (error) {
      return this.outcome({ ...base, action: commandLine, status: 'failed', error: errorMessage(error) });
    }
  }

  private outcome(fields: Omit<RepairOutcome, 'timestamp'>): RepairOutcome {
    return Object.freeze({ ...fields, timestamp: this.clock().toISOString() });
  }
}
