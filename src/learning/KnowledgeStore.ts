/**
 * KnowledgeStore - Persisted ledger of error and fix outcomes
 *
 * Loaded once at construction and flushed to disk synchronously after
 * every mutation. A failed flush is logged; the in-memory change stays.
 *
 * A fix pattern is trusted when successes / attempts is strictly above the
 * trust threshold (default 0.7) with at least one attempt recorded.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import { parseRecommendations } from '../providers/recommendations.js';
import type { TextAnalyzer } from '../providers/types.js';
import {
  KnowledgeDocumentSchema,
  type CommonError,
  type EffectiveFix,
  type ErrorObservation,
  type FixObservation,
  type FixPattern,
  type Insights,
  type KnowledgeDocument,
  type KnowledgeStats,
  type LearnedRule,
  type OptimizationObservation,
  type OptimizationResultObservation,
  type OptimizationSummary,
  type SuggestedFix
} from './types.js';

export interface KnowledgeStoreOptions {
  file: string;
  analyzer: TextAnalyzer;
  trustThreshold?: number;
  /** Entries per insight list (default 5) */
  insightLimit?: number;
  logger?: Logger;
  clock?: Clock;
}

function emptyDocument(): KnowledgeDocument {
  return {
    error_patterns: {},
    fix_patterns: {},
    optimization_patterns: {},
    user_preferences: {},
    learned_rules: []
  };
}

/**
 * Own record for a key; inherited members such as `constructor` never match
 */
function ownRecord<T>(records: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(records, key) ? records[key] : undefined;
}

function setRecord<T>(records: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(records, key, { value, enumerable: true, writable: true, configurable: true });
}

function attempts(pattern: FixPattern): number {
  return pattern.success_count + pattern.failure_count;
}

export class KnowledgeStore {
  private readonly file: string;
  private readonly analyzer: TextAnalyzer;
  private readonly trustThreshold: number;
  private readonly insightLimit: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly document: KnowledgeDocument;

  constructor(options: KnowledgeStoreOptions) {
    this.file = options.file;
    this.analyzer = options.analyzer;
    this.trustThreshold = options.trustThreshold ?? 0.7;
    this.insightLimit = options.insightLimit ?? 5;
    this.logger = options.logger ?? createLogger('KnowledgeStore');
    this.clock = options.clock ?? systemClock;
    this.document = this.load();
  }

  /**
   * Record one error occurrence, and the outcome of a fix if one was tried
   */
  learnFromError(error: ErrorObservation, fix?: FixObservation): void {
    const now = this.clock().toISOString();
    const errorType = error.type || 'unknown';

    const pattern = ownRecord(this.document.error_patterns, errorType) ?? {
      count: 0,
      first_seen: now,
      last_seen: now,
      messages: []
    };
    pattern.count += 1;
    pattern.last_seen = now;
    if (error.message && !pattern.messages.includes(error.message)) {
      pattern.messages.push(error.message);
    }
    setRecord(this.document.error_patterns, errorType, pattern);

    if (fix) {
      const action = fix.action || 'unknown';
      const key = this.fixPatternKey(errorType, action);
      const fixPattern = ownRecord(this.document.fix_patterns, key) ?? {
        error_type: errorType,
        fix_action: action,
        success_count: 0,
        failure_count: 0
      };

      if (fix.status === 'success') {
        fixPattern.success_count += 1;
      } else {
        fixPattern.failure_count += 1;
      }
      setRecord(this.document.fix_patterns, key, fixPattern);

      this.recordRuleIfTrusted(fixPattern, now);
    }

    this.save();
  }

  /**
   * Record one optimization attempt
   */
  learnFromOptimization(optimization: OptimizationObservation, result: OptimizationResultObservation): void {
    const type = optimization.type || 'unknown';
    const pattern = ownRecord(this.document.optimization_patterns, type) ?? {
      attempts: 0,
      successes: 0,
      improvements: []
    };

    pattern.attempts += 1;
    if (result.status === 'success') {
      pattern.successes += 1;
      if (result.improvement !== undefined) {
        pattern.improvements.push(result.improvement);
      }
    }
    setRecord(this.document.optimization_patterns, type, pattern);

    this.save();
  }

  /**
   * Highest-confidence trusted fix for the error type, or null
   */
  getSuggestedFix(error: Pick<ErrorObservation, 'type'>): SuggestedFix | null {
    let best: SuggestedFix | null = null;

    for (const pattern of Object.values(this.document.fix_patterns)) {
      if (pattern.error_type !== error.type) {
        continue;
      }
      const rate = this.trustedRate(pattern);
      if (rate !== null && (best === null || rate > best.confidence)) {
        best = { action: pattern.fix_action, confidence: rate, source: 'learned_pattern' };
      }
    }

    return best;
  }

  /**
   * Most frequent errors, fixes with the most successes, optimization
   * outcomes, and model recommendations (empty when the model is unavailable)
   */
  async generateInsights(options: { recommendations?: boolean } = {}): Promise<Insights> {
    const commonErrors: CommonError[] = Object.entries(this.document.error_patterns)
      .sort(([, a], [, b]) => b.count - a.count)
      .slice(0, this.insightLimit)
      .map(([type, pattern]) => ({
        type,
        count: pattern.count,
        firstSeen: pattern.first_seen,
        lastSeen: pattern.last_seen
      }));

    // Ranked by raw success count, not rate
    const effectiveFixes: EffectiveFix[] = Object.values(this.document.fix_patterns)
      .sort((a, b) => b.success_count - a.success_count)
      .slice(0, this.insightLimit)
      .filter(pattern => attempts(pattern) > 0)
      .map(pattern => ({
        errorType: pattern.error_type,
        fixAction: pattern.fix_action,
        successRate: pattern.success_count / attempts(pattern),
        totalAttempts: attempts(pattern)
      }));

    const optimizationSummary: OptimizationSummary[] = Object.entries(this.document.optimization_patterns)
      .map(([type, pattern]) => ({
        type,
        attempts: pattern.attempts,
        successes: pattern.successes,
        successRate: pattern.attempts > 0 ? pattern.successes / pattern.attempts : 0
      }));

    const insights: Insights = {
      timestamp: this.clock().toISOString(),
      commonErrors,
      effectiveFixes,
      optimizationSummary,
      recommendations: []
    };

    if (options.recommendations !== false) {
      insights.recommendations = await this.generateRecommendations(insights);
    }

    return insights;
  }

  getLearnedRules(): LearnedRule[] {
    return [...this.document.learned_rules];
  }

  getStats(): KnowledgeStats {
    const fixPatterns = Object.values(this.document.fix_patterns);
    return {
      errorPatterns: Object.keys(this.document.error_patterns).length,
      fixPatterns: fixPatterns.length,
      trustedFixes: fixPatterns.filter(pattern => this.trustedRate(pattern) !== null).length,
      learnedRules: this.document.learned_rules.length,
      optimizationPatterns: Object.keys(this.document.optimization_patterns).length
    };
  }

  getFilePath(): string {
    return this.file;
  }

  /**
   * `<error_type>_<fix_action>`, with a `#n` suffix when that key already
   * belongs to a different pair (`a` + `b_c` and `a_b` + `c` join the same way)
   */
  private fixPatternKey(errorType: string, action: string): string {
    const base = `${errorType}_${action}`;
    for (let n = 1; ; n++) {
      const key = n === 1 ? base : `${base}#${n}`;
      const existing = ownRecord(this.document.fix_patterns, key);
      if (!existing || (existing.error_type === errorType && existing.fix_action === action)) {
        return key;
      }
    }
  }

  private trustedRate(pattern: FixPattern): number | null {
    const total = attempts(pattern);
    if (total === 0) {
      return null;
    }
    const rate = pattern.success_count / total;
    return rate > this.trustThreshold ? rate : null;
  }

  private recordRuleIfTrusted(pattern: FixPattern, now: string): void {
    const rate = this.trustedRate(pattern);
    if (rate === null) {
      return;
    }
    const known = this.document.learned_rules.some(
      rule => rule.error_type === pattern.error_type && rule.fix_action === pattern.fix_action
    );
    if (!known) {
      this.document.learned_rules.push({
        error_type: pattern.error_type,
        fix_action: pattern.fix_action,
        confidence: rate,
        learned_at: now
      });
      this.logger.info(`Learned rule: ${pattern.error_type} -> ${pattern.fix_action} (${(rate * 100).toFixed(0)}%)`);
    }
  }

  private async generateRecommendations(insights: Insights): Promise<string[]> {
    const prompt = [
      'Based on these learned patterns, provide recommendations:',
      '',
      `Common Errors: ${JSON.stringify(insights.commonErrors, null, 2)}`,
      `Effective Fixes: ${JSON.stringify(insights.effectiveFixes, null, 2)}`,
      '',
      'Provide actionable recommendations to prevent recurring issues.'
    ].join('\n');

    const analysis = await this.analyzer.analyze(prompt, {
      common_errors: insights.commonErrors,
      effective_fixes: insights.effectiveFixes
    });

    return analysis.status === 'success' ? parseRecommendations(analysis.response) : [];
  }

  private load(): KnowledgeDocument {
    if (!existsSync(this.file)) {
      return emptyDocument();
    }

    try {
      const parsed = KnowledgeDocumentSchema.safeParse(JSON.parse(readFileSync(this.file, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.error(`Invalid knowledge file ${this.file}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    } catch (error) {
      this.logger.error(`Error loading knowledge file ${this.file}: ${errorMessage(error)}`);
    }

    return emptyDocument();
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.file), { recursive: true });
      writeFileSync(this.file, JSON.stringify(this.document, null, 2));
    } catch (error) {
      this.logger.error(`Error saving knowledge file ${this.file}: ${errorMessage(error)}`);
    }
  }
}
