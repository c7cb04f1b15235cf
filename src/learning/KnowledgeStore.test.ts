/**
 * Knowledge Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { silentLogger } from '../core/Logger.js';
import { FakeAnalyzer } from '../testing/fakes.js';
import { KnowledgeStore } from './KnowledgeStore.js';

describe('KnowledgeStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'autoheal-knowledge-'));
    file = join(dir, 'state', 'knowledge.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function store(analyzer = new FakeAnalyzer()): KnowledgeStore {
    return new KnowledgeStore({
      file,
      analyzer,
      logger: silentLogger,
      clock: () => new Date('2026-01-03T12:00:00.000Z')
    });
  }

  function readDisk(): Record<string, unknown> {
    return JSON.parse(readFileSync(file, 'utf-8'));
  }

  describe('getSuggestedFix', () => {
    it('should trust a fix that succeeded 8 times out of 10', () => {
      const knowledge = store();
      for (let i = 0; i < 8; i++) {
        knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'success' });
      }
      knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'failed' });
      knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'failed' });

      expect(knowledge.getSuggestedFix({ type: 'X' })).toEqual({
        action: 'Y',
        confidence: 0.8,
        source: 'learned_pattern'
      });

      const disk = readDisk();
      expect(disk.fix_patterns).toEqual({
        X_Y: { error_type: 'X', fix_action: 'Y', success_count: 8, failure_count: 2 }
      });
    });

    it('should not trust a rate of exactly 0.7', () => {
      const knowledge = store();
      for (let i = 0; i < 7; i++) {
        knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'success' });
      }
      for (let i = 0; i < 3; i++) {
        knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'failed' });
      }

      expect(knowledge.getSuggestedFix({ type: 'X' })).toBeNull();
    });

    it('should return nothing without recorded attempts', () => {
      const knowledge = store();
      knowledge.learnFromError({ type: 'X', message: 'boom' });

      expect(knowledge.getSuggestedFix({ type: 'X' })).toBeNull();
      expect(knowledge.getSuggestedFix({ type: 'unseen' })).toBeNull();
    });

    it('should pick the most reliable trusted fix', () => {
      const knowledge = store();
      knowledge.learnFromError({ type: 'X' }, { action: 'first', status: 'success' });
      for (let i = 0; i < 9; i++) {
        knowledge.learnFromError({ type: 'X' }, { action: 'second', status: 'success' });
      }
      knowledge.learnFromError({ type: 'X' }, { action: 'first', status: 'failed' });
      knowledge.learnFromError({ type: 'X' }, { action: 'first', status: 'failed' });

      expect(knowledge.getSuggestedFix({ type: 'X' })?.action).toBe('second');
    });
  });

  it('should tally error occurrences with distinct messages', () => {
    const knowledge = store();
    knowledge.learnFromError({ type: 'import_errors', message: "No module named 'foo'" });
    knowledge.learnFromError({ type: 'import_errors', message: "No module named 'foo'" });
    knowledge.learnFromError({ type: 'import_errors', message: "No module named 'bar'" });

    const disk = readDisk();
    expect(disk.error_patterns).toEqual({
      import_errors: {
        count: 3,
        first_seen: '2026-01-03T12:00:00.000Z',
        last_seen: '2026-01-03T12:00:00.000Z',
        messages: ["No module named 'foo'", "No module named 'bar'"]
      }
    });
  });

  it('should persist across instances and keep unknown keys', () => {
    mkdirSync(join(dir, 'state'));
    writeFileSync(file, JSON.stringify({
      error_patterns: {},
      fix_patterns: {},
      optimization_patterns: {},
      user_preferences: { theme: 'dark' },
      learned_rules: [],
      notes: 'kept'
    }));

    store().learnFromError({ type: 'X' }, { action: 'Y', status: 'success' });
    const reloaded = store();

    expect(reloaded.getSuggestedFix({ type: 'X' })?.confidence).toBe(1);
    const disk = readDisk();
    expect(disk.notes).toBe('kept');
    expect(disk.user_preferences).toEqual({ theme: 'dark' });
  });

  it('should start empty when the file is corrupt', () => {
    mkdirSync(join(dir, 'state'));
    writeFileSync(file, '{ broken');

    const knowledge = store();

    expect(knowledge.getStats()).toEqual({
      errorPatterns: 0,
      fixPatterns: 0,
      trustedFixes: 0,
      learnedRules: 0,
      optimizationPatterns: 0
    });
  });

  it('should keep the in-memory change when the flush fails', () => {
    writeFileSync(join(dir, 'state'), 'a file where a directory is expected');

    const knowledge = store();
    knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'success' });

    expect(knowledge.getSuggestedFix({ type: 'X' })?.action).toBe('Y');
  });

  it('should treat built-in property names as ordinary error types', () => {
    const knowledge = store();

    knowledge.learnFromError({ type: 'constructor', message: 'm' });
    knowledge.learnFromError({ type: 'toString' }, { action: 'retry', status: 'success' });
    knowledge.learnFromOptimization({ type: 'hasOwnProperty' }, { status: 'success' });

    expect(knowledge.getStats()).toEqual({
      errorPatterns: 2,
      fixPatterns: 1,
      trustedFixes: 1,
      learnedRules: 1,
      optimizationPatterns: 1
    });
    expect(readDisk().error_patterns).toMatchObject({ constructor: { count: 1, messages: ['m'] } });
    expect(store().getSuggestedFix({ type: 'toString' })).toEqual({
      action: 'retry',
      confidence: 1,
      source: 'learned_pattern'
    });
  });

  it('should keep fix patterns apart when joined keys collide', () => {
    const knowledge = store();
    knowledge.learnFromError({ type: 'a' }, { action: 'b_c', status: 'success' });
    for (let i = 0; i < 3; i++) {
      knowledge.learnFromError({ type: 'a_b' }, { action: 'c', status: 'success' });
    }

    expect(knowledge.getStats().fixPatterns).toBe(2);
    expect(knowledge.getSuggestedFix({ type: 'a_b' })).toEqual({ action: 'c', confidence: 1, source: 'learned_pattern' });
    expect(knowledge.getSuggestedFix({ type: 'a' })).toEqual({ action: 'b_c', confidence: 1, source: 'learned_pattern' });
    expect(readDisk().fix_patterns).toEqual({
      a_b_c: { error_type: 'a', fix_action: 'b_c', success_count: 1, failure_count: 0 },
      'a_b_c#2': { error_type: 'a_b', fix_action: 'c', success_count: 3, failure_count: 0 }
    });

    const reloaded = store();
    reloaded.learnFromError({ type: 'a_b' }, { action: 'c', status: 'failed' });
    expect(reloaded.getStats().fixPatterns).toBe(2);
  });

  it('should record a learned rule once when a fix becomes trusted', () => {
    const knowledge = store();
    knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'failed' });
    expect(knowledge.getLearnedRules()).toEqual([]);

    for (let i = 0; i < 4; i++) {
      knowledge.learnFromError({ type: 'X' }, { action: 'Y', status: 'success' });
    }

    expect(knowledge.getLearnedRules()).toEqual([{
      error_type: 'X',
      fix_action: 'Y',
      confidence: 0.75,
      learned_at: '2026-01-03T12:00:00.000Z'
    }]);
  });

  describe('generateInsights', () => {
    it('should rank common errors by count and keep at most five', async () => {
      const knowledge = store();
      const counts: Array<[string, number]> = [['a', 1], ['b', 6], ['c', 3], ['d', 2], ['e', 5], ['f', 4]];
      for (const [type, count] of counts) {
        for (let i = 0; i < count; i++) {
          knowledge.learnFromError({ type });
        }
      }

      const insights = await knowledge.generateInsights();

      expect(insights.commonErrors.map(e => [e.type, e.count])).toEqual([
        ['b', 6], ['e', 5], ['f', 4], ['c', 3], ['d', 2]
      ]);
      expect(insights.recommendations).toEqual([]);
    });

    it('should rank fixes by success count and summarise optimizations', async () => {
      const knowledge = store(new FakeAnalyzer('- Pin dependency versions'));
      knowledge.learnFromError({ type: 'A' }, { action: 'rare', status: 'success' });
      for (let i = 0; i < 3; i++) {
        knowledge.learnFromError({ type: 'B' }, { action: 'common', status: 'success' });
      }
      knowledge.learnFromError({ type: 'B' }, { action: 'common', status: 'failed' });
      knowledge.learnFromOptimization({ type: 'inefficient_iteration' }, { status: 'success', improvement: '12.5%' });
      knowledge.learnFromOptimization({ type: 'inefficient_iteration' }, { status: 'failed' });

      const insights = await knowledge.generateInsights();

      expect(insights.effectiveFixes).toEqual([
        { errorType: 'B', fixAction: 'common', successRate: 0.75, totalAttempts: 4 },
        { errorType: 'A', fixAction: 'rare', successRate: 1, totalAttempts: 1 }
      ]);
      expect(insights.optimizationSummary).toEqual([
        { type: 'inefficient_iteration', attempts: 2, successes: 1, successRate: 0.5 }
      ]);
      expect(insights.recommendations).toEqual(['Pin dependency versions']);
      expect(insights.timestamp).toBe('2026-01-03T12:00:00.000Z');

      const disk = readDisk();
      expect(disk.optimization_patterns).toEqual({
        inefficient_iteration: { attempts: 2, successes: 1, improvements: ['12.5%'] }
      });
    });
  });
});
