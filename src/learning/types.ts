/**
 * Knowledge Store Types
 *
 * The on-disk document uses snake_case keys; unknown keys are carried
 * through untouched so files written by other tools survive a rewrite.
 */

import { z } from 'zod';

const count = z.number().int().nonnegative().default(0);

export const ErrorPatternSchema = z.object({
  count,
  first_seen: z.string(),
  last_seen: z.string(),
  messages: z.array(z.string()).default([])
}).passthrough();

export const FixPatternSchema = z.object({
  error_type: z.string(),
  fix_action: z.string().nullable().transform(action => action ?? 'unknown'),
  success_count: count,
  failure_count: count
}).passthrough();

export const OptimizationPatternSchema = z.object({
  attempts: count,
  successes: count,
  improvements: z.array(z.union([z.string(), z.number()])).default([])
}).passthrough();

export const LearnedRuleSchema = z.object({
  error_type: z.string(),
  fix_action: z.string(),
  confidence: z.number(),
  learned_at: z.string()
}).passthrough();

export const KnowledgeDocumentSchema = z.object({
  error_patterns: z.record(ErrorPatternSchema).default({}),
  fix_patterns: z.record(FixPatternSchema).default({}),
  optimization_patterns: z.record(OptimizationPatternSchema).default({}),
  user_preferences: z.record(z.unknown()).default({}),
  learned_rules: z.array(LearnedRuleSchema).default([])
}).passthrough();

export type ErrorPattern = z.infer<typeof ErrorPatternSchema>;
export type FixPattern = z.infer<typeof FixPatternSchema>;
export type OptimizationPattern = z.infer<typeof OptimizationPatternSchema>;
export type LearnedRule = z.infer<typeof LearnedRuleSchema>;
export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

export interface ErrorObservation {
  type: string;
  message?: string;
}

export interface FixObservation {
  action: string;
  /** Only "success" counts as a success; anything else is a failure */
  status: string;
}

export interface OptimizationObservation {
  type: string;
}

export interface OptimizationResultObservation {
  status: string;
  improvement?: string | number;
}

export interface SuggestedFix {
  action: string;
  confidence: number;
  source: 'learned_pattern';
}

export interface CommonError {
  type: string;
  count: number;
  firstSeen: string;
  lastSeen: string;
}

export interface EffectiveFix {
  errorType: string;
  fixAction: string;
  successRate: number;
  totalAttempts: number;
}

export interface OptimizationSummary {
  type: string;
  attempts: number;
  successes: number;
  successRate: number;
}

export interface Insights {
  timestamp: string;
  commonErrors: CommonError[];
  effectiveFixes: EffectiveFix[];
  optimizationSummary: OptimizationSummary[];
  recommendations: string[];
}

export interface KnowledgeStats {
  errorPatterns: number;
  fixPatterns: number;
  trustedFixes: number;
  learnedRules: number;
  optimizationPatterns: number;
}
