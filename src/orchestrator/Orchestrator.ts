/**
 * Orchestrator - Audit, repair and optimize pipelines
 *
 * Composes the model client, detectors, knowledge store, repair executor and
 * optimization runner from one loaded configuration. Each entry point returns
 * a structured result and persists a status snapshot; none of them throw.
 */

import { resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IssueDetector } from '../analysis/IssueDetector.js';
import type { AutohealConfig, LoadedConfig } from '../config/types.js';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import { KnowledgeStore } from '../learning/KnowledgeStore.js';
import type { Insights } from '../learning/types.js';
import { LogClassifier } from '../logs/LogClassifier.js';
import { OptimizationRunner } from '../optimization/OptimizationRunner.js';
import type { OptimizationRequest } from '../optimization/types.js';
import { ModelClient, type BackendFactories } from '../providers/ModelClient.js';
import { BackupManager } from '../repair/BackupManager.js';
import { ChildProcessRunner, type CommandRunner } from '../repair/CommandRunner.js';
import { RepairExecutor } from '../repair/RepairExecutor.js';
import { SafeWriter } from '../repair/SafeWriter.js';
import type { RepairKind } from '../repair/types.js';
import { StatusStore } from './StatusStore.js';
import type { AuditResult, OptimizationRunResult, RepairRunResult, SystemStatus } from './types.js';

export interface OrchestratorOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  clock?: Clock;
  /** Replace backend construction (tests) */
  modelFactories?: Partial<BackendFactories>;
  runner?: CommandRunner;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Whether a log error is newer than the previous audit. Without a watermark
 * everything counts; after one, lines with no timestamp are not re-learned.
 */
function isAfterWatermark(timestamp: string | undefined, since: string | undefined): boolean {
  const watermark = since === undefined ? NaN : Date.parse(since);
  if (Number.isNaN(watermark)) {
    return true;
  }
  return timestamp !== undefined && Date.parse(timestamp) > watermark;
}

export class Orchestrator {
  private readonly config: AutohealConfig;
  private readonly projectRoot: string;
  private readonly logger: Logger;
  private readonly clock: Clock;

  readonly client: ModelClient;
  readonly logClassifier: LogClassifier;
  readonly issueDetector: IssueDetector;
  readonly knowledge: KnowledgeStore;
  readonly repairExecutor: RepairExecutor;
  readonly optimizer: OptimizationRunner;
  private readonly status: StatusStore;

  constructor(loaded: LoadedConfig, options: OrchestratorOptions = {}) {
    const { config, projectRoot } = loaded;
    this.config = config;
    this.projectRoot = projectRoot;
    this.clock = options.clock ?? systemClock;

    const root = options.logger ?? createLogger('Orchestrator', config.logging);
    this.logger = root.child('Orchestrator');
    const clock = this.clock;
    const runner = options.runner ?? new ChildProcessRunner();

    this.client = ModelClient.fromConfig(config.model, {
      env: options.env,
      logger: root.child('ModelClient'),
      factories: options.modelFactories
    });

    this.logClassifier = new LogClassifier({
      projectRoot,
      sources: config.logs.sources,
      analyzer: this.client,
      sampleSize: config.logs.sampleSize,
      logger: root.child('LogClassifier'),
      clock
    });

    this.issueDetector = new IssueDetector({
      projectRoot,
      analyzer: this.client,
      maxFunctionLines: config.analysis.maxFunctionLines,
      excludeDirs: config.analysis.excludeDirs,
      logger: root.child('IssueDetector'),
      clock
    });

    this.knowledge = new KnowledgeStore({
      file: this.resolvePath(config.learning.knowledgeFile),
      analyzer: this.client,
      trustThreshold: config.learning.trustThreshold,
      insightLimit: config.learning.insightLimit,
      logger: root.child('KnowledgeStore'),
      clock
    });

    const writer = new SafeWriter({
      backups: new BackupManager({
        dir: this.resolvePath(config.backups.dir),
        root: projectRoot,
        retention: config.backups.retention,
        logger: root.child('BackupManager'),
        clock
      }),
      verify: config.repair.verifyRewrites,
      logger: root.child('SafeWriter')
    });

    this.repairExecutor = new RepairExecutor({
      projectRoot,
      logClassifier: this.logClassifier,
      issueDetector: this.issueDetector,
      advisor: this.knowledge,
      analyzer: this.client,
      writer,
      runner,
      manifest: config.repair.manifest,
      dependencyTool: config.repair.dependencyTool,
      windowHours: config.logs.windowHours,
      maxLogRepairs: config.repair.maxLogRepairs,
      logger: root.child('RepairExecutor'),
      clock
    });

    this.optimizer = new OptimizationRunner({
      projectRoot,
      issueDetector: this.issueDetector,
      writer,
      runner,
      manifest: config.repair.manifest,
      outdatedTool: config.optimization.outdatedTool,
      logger: root.child('OptimizationRunner'),
      clock
    });

    this.status = new StatusStore(this.resolvePath(config.status.file), {
      logger: root.child('StatusStore'),
      clock
    });
  }

  /**
   * Logs, source tree and accumulated knowledge in one pass
   */
  async runFullAudit(): Promise<AuditResult> {
    const runId = uuidv4();
    this.logger.info(`Starting full audit ${runId}`);

    let result: AuditResult;
    try {
      const logAnalysis = await this.logClassifier.analyze(this.config.logs.windowHours);
      const codeAnalysis = await this.issueDetector.analyze();

      const since = this.status.read()?.last_audit;
      const fresh = logAnalysis.errors.filter(error => isAfterWatermark(error.timestamp, since));
      for (const error of fresh) {
        this.knowledge.learnFromError({ type: error.classifiedType, message: error.rawLine });
      }

      const insights = await this.knowledge.generateInsights();

      result = {
        runId,
        timestamp: this.clock().toISOString(),
        status: 'completed',
        logAnalysis,
        codeAnalysis,
        insights,
        recommendations: unique([
          ...logAnalysis.recommendations,
          ...codeAnalysis.recommendations,
          ...insights.recommendations
        ])
      };
      this.logger.info(
        `Audit complete: ${logAnalysis.errors.length} log error(s), ${codeAnalysis.metrics.totalIssues} code issue(s)`
      );
    } catch (error) {
      this.logger.error(`Audit failed: ${errorMessage(error)}`);
      result = {
        runId,
        timestamp: this.clock().toISOString(),
        status: 'failed',
        error: errorMessage(error),
        recommendations: []
      };
    }

    this.status.write('full_audit', result);
    return result;
  }

  /**
   * Repair, then feed every attempted fix back into the knowledge store
   */
  async runAutoRepair(kinds?: RepairKind[]): Promise<RepairRunResult> {
    const runId = uuidv4();
    this.logger.info(`Starting auto-repair ${runId}`);

    let result: RepairRunResult;
    try {
      const report = await this.repairExecutor.autoRepair(kinds);

      for (const repair of report.repairs) {
        if (repair.status === 'success' || repair.status === 'failed') {
          this.knowledge.learnFromError(
            { type: repair.issueKind, message: repair.action },
            { action: repair.strategy, status: repair.status }
          );
        }
      }

      result = { runId, timestamp: this.clock().toISOString(), status: 'completed', report };
    } catch (error) {
      this.logger.error(`Auto-repair failed: ${errorMessage(error)}`);
      result = { runId, timestamp: this.clock().toISOString(), status: 'failed', error: errorMessage(error) };
    }

    this.status.write('auto_repair', result);
    return result;
  }

  async runOptimization(kinds?: OptimizationRequest[]): Promise<OptimizationRunResult> {
    const runId = uuidv4();
    this.logger.info(`Starting optimization ${runId}`);

    let result: OptimizationRunResult;
    try {
      const report = await this.optimizer.optimizeApplication(kinds);

      for (const optimization of report.optimizations) {
        this.knowledge.learnFromOptimization({ type: optimization.kind }, { status: optimization.status });
      }

      result = { runId, timestamp: this.clock().toISOString(), status: 'completed', report };
    } catch (error) {
      this.logger.error(`Optimization failed: ${errorMessage(error)}`);
      result = { runId, timestamp: this.clock().toISOString(), status: 'failed', error: errorMessage(error) };
    }

    this.status.write('optimization', result);
    return result;
  }

  async getInsights(): Promise<Insights> {
    const insights = await this.knowledge.generateInsights();
    this.status.write('insights', insights);
    return insights;
  }

  getStatus(): SystemStatus {
    return {
      backend: this.client.getProfile(),
      available: this.client.isAvailable(),
      knowledge: this.knowledge.getStats(),
      lastRun: this.status.read()
    };
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }

  private resolvePath(path: string): string {
    return resolve(this.projectRoot, path);
  }
}
