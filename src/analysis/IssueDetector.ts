/**
 * IssueDetector - Structural and textual checks over JS/TS sources
 *
 * Per file: parse with Babel (a failure becomes one high-severity
 * syntax_error and the batch moves on), then
 *   - tree pass: long functions, catch clauses without a binding
 *   - line pass: console debugging, hard-coded paths and TODO markers
 *   - optimization heuristics: index loops, consecutive push calls
 */

import { readFileSync } from 'fs';
import { isAbsolute, relative, resolve } from 'path';
import { glob } from 'glob';
import * as t from '@babel/types';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import { parseRecommendations } from '../providers/recommendations.js';
import type { TextAnalyzer } from '../providers/types.js';
import { errorLine, isSourceFile, parseSource, SOURCE_EXTENSIONS } from './sourceParser.js';
import type {
  AnalysisMetrics,
  CodeAnalysis,
  CodeAnalyzeOptions,
  FileAnalysis,
  Issue,
  IssueKind,
  OptimizationOpportunity
} from './types.js';

export const INDEX_LOOP = /for\s*\(\s*(?:let|var)\s+([A-Za-z_$][\w$]*)\s*=\s*0\s*;\s*\1\s*<\s*([A-Za-z_$][\w$.]*)\.length\s*;\s*\1\s*\+\+\s*\)/;
const PUSH_CALL = /^\s*([A-Za-z_$][\w$.]*)\.push\(.*\)\s*;?\s*$/;

const LINE_CHECKS: ReadonlyArray<{ kind: IssueKind; pattern: RegExp; message: string }> = [
  {
    kind: 'print_debug',
    pattern: /\bconsole\.(?:log|debug)\s*\(/,
    message: 'Use a logger instead of console output'
  },
  {
    kind: 'hardcoded_paths',
    pattern: /["'`](?:[A-Za-z]:\\|\/(?:home|Users|usr|var|etc|opt|tmp|root)\/)/,
    message: 'Avoid hardcoded paths'
  },
  {
    kind: 'todo_comments',
    pattern: /(?:\/\/|\/\*|^\s*\*)\s*(?:TODO|FIXME|XXX)\b/,
    message: 'Address TODO comments'
  }
];

export interface IssueDetectorOptions {
  projectRoot: string;
  analyzer: TextAnalyzer;
  maxFunctionLines?: number;
  excludeDirs?: string[];
  logger?: Logger;
  clock?: Clock;
}

export function calculateMetrics(issues: Issue[], optimizations: OptimizationOpportunity[]): AnalysisMetrics {
  return {
    totalIssues: issues.length,
    highSeverity: issues.filter(i => i.severity === 'high').length,
    mediumSeverity: issues.filter(i => i.severity === 'medium').length,
    lowSeverity: issues.filter(i => i.severity === 'low').length,
    optimizationOpportunities: optimizations.length
  };
}

function functionName(node: t.Function): string {
  if ((t.isFunctionDeclaration(node) || t.isFunctionExpression(node)) && node.id) {
    return node.id.name;
  }
  if ((t.isClassMethod(node) || t.isObjectMethod(node)) && t.isIdentifier(node.key)) {
    return node.key.name;
  }
  if (t.isClassPrivateMethod(node)) {
    return `#${node.key.id.name}`;
  }
  return '<anonymous>';
}

export class IssueDetector {
  private readonly projectRoot: string;
  private readonly analyzer: TextAnalyzer;
  private readonly maxFunctionLines: number;
  private readonly excludeDirs: string[];
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: IssueDetectorOptions) {
    this.projectRoot = options.projectRoot;
    this.analyzer = options.analyzer;
    this.maxFunctionLines = options.maxFunctionLines ?? 50;
    this.excludeDirs = options.excludeDirs ?? ['node_modules', 'dist', '.git'];
    this.logger = options.logger ?? createLogger('IssueDetector');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Analyze the whole tree, or only the given files
   */
  async analyze(paths?: string[], options: CodeAnalyzeOptions = {}): Promise<CodeAnalysis> {
    const files = paths && paths.length > 0
      ? paths.filter(isSourceFile).map(p => this.toRelative(p))
      : await this.listSourceFiles();

    const issues: Issue[] = [];
    const optimizations: OptimizationOpportunity[] = [];
    const fileErrors: CodeAnalysis['fileErrors'] = [];

    for (const file of files) {
      let content: string;
      try {
        content = readFileSync(resolve(this.projectRoot, file), 'utf-8');
      } catch (error) {
        this.logger.error(`Error analyzing ${file}: ${errorMessage(error)}`);
        fileErrors.push({ file, error: errorMessage(error) });
        continue;
      }

      const result = this.analyzeSource(file, content);
      issues.push(...result.issues);
      optimizations.push(...result.optimizations);
    }

    const metrics = calculateMetrics(issues, optimizations);
    this.logger.info(
      `Analyzed ${files.length} file(s): ${metrics.totalIssues} issues (${metrics.highSeverity} high), ` +
      `${metrics.optimizationOpportunities} optimization opportunities`
    );

    const recommendations = options.recommendations === false
      ? []
      : await this.generateRecommendations(issues, optimizations, metrics);

    return {
      timestamp: this.clock().toISOString(),
      filesAnalyzed: files.length,
      issues,
      optimizations,
      metrics,
      recommendations,
      fileErrors
    };
  }

  /**
   * Source files under the project root, relative and sorted
   */
  async listSourceFiles(): Promise<string[]> {
    const extensions = SOURCE_EXTENSIONS.map(ext => ext.slice(1)).join(',');
    const matches = await glob(`**/*.{${extensions}}`, {
      cwd: this.projectRoot,
      nodir: true,
      ignore: this.excludeDirs.map(dir => `**/${dir}/**`),
      windowsPathsNoEscape: true
    });

    return matches
      .filter(isSourceFile)
      .map(file => file.split('\\').join('/'))
      .sort();
  }

  /**
   * Run every check on one file's content
   */
  analyzeSource(file: string, content: string): FileAnalysis {
    let ast: t.File;
    try {
      ast = parseSource(file, content);
    } catch (error) {
      return {
        file,
        issues: [{
          kind: 'syntax_error',
          severity: 'high',
          file,
          line: errorLine(error),
          message: `Syntax error: ${errorMessage(error)}`
        }],
        optimizations: []
      };
    }

    const issues = this.treeIssues(file, ast);
    const seen = new Set(issues.map(issue => `${issue.kind}:${issue.line}`));

    for (const issue of this.lineIssues(file, content)) {
      const key = `${issue.kind}:${issue.line}`;
      if (!seen.has(key)) {
        seen.add(key);
        issues.push(issue);
      }
    }

    return { file, issues, optimizations: this.findOptimizations(file, content) };
  }

  private treeIssues(file: string, ast: t.File): Issue[] {
    const issues: Issue[] = [];

    t.traverseFast(ast.program, (node) => {
      if (t.isCatchClause(node) && !node.param && node.loc) {
        issues.push({
          kind: 'bare_except',
          severity: 'medium',
          file,
          line: node.loc.start.line,
          message: 'Catch clause without a binding - handle specific errors'
        });
      } else if (t.isFunction(node) && node.loc) {
        const span = node.loc.end.line - node.loc.start.line;
        if (span > this.maxFunctionLines) {
          const name = functionName(node);
          issues.push({
            kind: 'long_function',
            severity: 'low',
            file,
            line: node.loc.start.line,
            message: `Function ${name} is ${span} lines long`,
            detail: `Functions should be at most ${this.maxFunctionLines} lines`
          });
        }
      }
    });

    return issues.sort((a, b) => a.line - b.line);
  }

  private lineIssues(file: string, content: string): Issue[] {
    const issues: Issue[] = [];
    const lines = content.split('\n');

    lines.forEach((line, index) => {
      for (const check of LINE_CHECKS) {
        if (check.pattern.test(line)) {
          issues.push({
            kind: check.kind,
            severity: 'medium',
            file,
            line: index + 1,
            message: check.message
          });
        }
      }
    });

    return issues;
  }

  private findOptimizations(file: string, content: string): OptimizationOpportunity[] {
    const optimizations: OptimizationOpportunity[] = [];
    const lines = content.split('\n');

    const loopLine = lines.findIndex(line => INDEX_LOOP.test(line));
    if (loopLine >= 0) {
      optimizations.push({
        kind: 'inefficient_iteration',
        file,
        line: loopLine + 1,
        suggestion: 'Iterate with for...of over entries() instead of indexing'
      });
    }

    for (let i = 1; i < lines.length; i++) {
      const previous = PUSH_CALL.exec(lines[i - 1]);
      const current = PUSH_CALL.exec(lines[i]);
      if (previous && current && previous[1] === current[1]) {
        optimizations.push({
          kind: 'multiple_append',
          file,
          line: i,
          suggestion: 'Combine consecutive push() calls into one call'
        });
        break;
      }
    }

    return optimizations;
  }

  private toRelative(path: string): string {
    const absolute = isAbsolute(path) ? path : resolve(this.projectRoot, path);
    return relative(this.projectRoot, absolute).split('\\').join('/');
  }

  private async generateRecommendations(
    issues: Issue[],
    optimizations: OptimizationOpportunity[],
    metrics: AnalysisMetrics
  ): Promise<string[]> {
    const context = {
      issues: issues.slice(0, 10),
      optimizations: optimizations.slice(0, 5),
      metrics
    };

    const prompt = [
      'Analyze these code issues and provide specific recommendations:',
      '',
      `Issues: ${JSON.stringify(context.issues, null, 2)}`,
      `Optimizations: ${JSON.stringify(context.optimizations, null, 2)}`,
      `Metrics: ${JSON.stringify(metrics, null, 2)}`,
      '',
      'Provide actionable recommendations to improve code quality.'
    ].join('\n');

    const analysis = await this.analyzer.analyze(prompt, context);
    if (analysis.status === 'success') {
      const parsed = parseRecommendations(analysis.response);
      if (parsed.length > 0) {
        return parsed;
      }
    }

    const fallback: string[] = [];
    if (metrics.highSeverity > 0) {
      fallback.push('Address high-severity issues immediately');
    }
    if (metrics.optimizationOpportunities > 0) {
      fallback.push('Review and implement optimization opportunities');
    }
    return fallback;
  }
}
