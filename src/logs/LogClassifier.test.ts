/**
 * Log Classifier Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { silentLogger } from '../core/Logger.js';
import { FakeAnalyzer } from '../testing/fakes.js';
import { LogClassifier, classifyError, extractTimestamp, isErrorLine, isWarningLine } from './LogClassifier.js';

const NOW = new Date(2026, 0, 3, 20, 0, 0);

const ERROR_LOG = [
  '2026-01-01 10:00:00 ERROR old failure',
  "2026-01-03 19:39:40,497 ERROR ModuleNotFoundError: No module named 'foo'",
  '2026-01-03T19:00:00 WARNING disk almost full',
  '2026-01-03 19:10:00 INFO started',
  'Traceback (most recent call last):',
  '2026-01-03 19:45:00 ERROR Request failed with status 500',
  'plain line',
  "2026-13-45 10:00:00 ERROR KeyError: 'id'"
].join('\n') + '\n';

describe('LogClassifier', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'autoheal-logs-'));
    mkdirSync(join(dir, 'logs'));
    writeFileSync(join(dir, 'logs', 'error.log'), ERROR_LOG);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function classifier(analyzer = new FakeAnalyzer()): LogClassifier {
    return new LogClassifier({
      projectRoot: dir,
      sources: { debug: 'logs/debug.log', error: 'logs/error.log' },
      analyzer,
      logger: silentLogger,
      clock: () => NOW
    });
  }

  it('should classify errors inside the window', async () => {
    const result = await classifier().analyze(24, 'all');

    expect(result.errors.map(e => e.classifiedType)).toEqual([
      'import_errors',
      'unknown',
      'api_errors',
      'key_errors'
    ]);
    expect(result.errors[0]).toEqual({
      rawLine: "2026-01-03 19:39:40,497 ERROR ModuleNotFoundError: No module named 'foo'",
      timestamp: new Date(2026, 0, 3, 19, 39, 40).toISOString(),
      classifiedType: 'import_errors',
      source: 'error'
    });
    expect(result.errors[3].timestamp).toBeUndefined();
    expect(result.typeHistogram).toEqual({ import_errors: 1, unknown: 1, api_errors: 1, key_errors: 1 });
  });

  it('should count lines, warnings and info per source', async () => {
    const result = await classifier().analyze(24, 'error');
    const source = result.sources[0];

    expect(source.totalLines).toBe(8);
    expect(source.infoCount).toBe(1);
    expect(source.warnings).toEqual([{
      rawLine: '2026-01-03T19:00:00 WARNING disk almost full',
      timestamp: new Date(2026, 0, 3, 19, 0, 0).toISOString(),
      source: 'error'
    }]);
  });

  it('should include old lines when the window is wide enough', async () => {
    const result = await classifier().analyze(72, 'error');
    expect(result.errors).toHaveLength(5);
    expect(result.errors[0].rawLine).toBe('2026-01-01 10:00:00 ERROR old failure');
  });

  it('should report a missing source without failing', async () => {
    const result = await classifier().analyze(24, 'all');
    const debug = result.sources.find(s => s.source === 'debug');

    expect(debug?.error).toBe(`Log file not found: ${join(dir, 'logs', 'debug.log')}`);
    expect(result.errors).toHaveLength(4);
  });

  it('should report an unknown scope as a source error', async () => {
    const result = await classifier().analyze(24, 'nope');

    expect(result.sources).toHaveLength(1);
    expect(result.sources[0].error).toBe('Unknown log source: nope');
    expect(result.recommendations).toEqual(['No errors found in the analyzed period.']);
  });

  it('should fall back to canned recommendations when the model is unavailable', async () => {
    const result = await classifier().analyze(24, 'all');
    expect(result.recommendations).toEqual([
      'Check the dependency manifest for missing packages',
      'Verify API key validity and network connectivity'
    ]);
  });

  it('should parse model recommendations', async () => {
    const analyzer = new FakeAnalyzer('1. Install foo\n2. Rotate keys');
    const result = await classifier(analyzer).analyze(24, 'all');

    expect(result.recommendations).toEqual(['Install foo', 'Rotate keys']);
    expect(analyzer.calls).toHaveLength(1);
    expect(analyzer.calls[0].context?.error_count).toBe(4);
  });

  it('should skip the model when recommendations are not wanted', async () => {
    const analyzer = new FakeAnalyzer('- anything');
    const result = await classifier(analyzer).analyze(24, 'all', { recommendations: false });

    expect(result.recommendations).toEqual([]);
    expect(analyzer.calls).toHaveLength(0);
  });

  it('should return recent errors newest first', () => {
    const recent = classifier().getRecentErrors(2);
    expect(recent.map(r => r.rawLine)).toEqual([
      "2026-13-45 10:00:00 ERROR KeyError: 'id'",
      '2026-01-03 19:45:00 ERROR Request failed with status 500'
    ]);
  });
});

describe('log line helpers', () => {
  it('should parse both timestamp formats as local time', () => {
    expect(extractTimestamp('2026-01-03 19:39:40,497 x')).toEqual(new Date(2026, 0, 3, 19, 39, 40));
    expect(extractTimestamp('at 2026-01-03T19:39:40 x')).toEqual(new Date(2026, 0, 3, 19, 39, 40));
    expect(extractTimestamp('2026-02-30 10:00:00')).toBeNull();
    expect(extractTimestamp('no time here')).toBeNull();
  });

  it('should use case-sensitive error markers', () => {
    expect(isErrorLine('ERROR boom')).toBe(true);
    expect(isErrorLine('TypeError: x is undefined')).toBe(true);
    expect(isErrorLine('error: lowercase')).toBe(false);
  });

  it('should use case-insensitive warning markers', () => {
    expect(isWarningLine('warn: low memory')).toBe(true);
    expect(isWarningLine('all good')).toBe(false);
  });

  it('should classify node-style messages', () => {
    expect(classifyError("Error: Cannot find module 'lodash'")).toBe('import_errors');
    expect(classifyError("TypeError: Cannot read properties of undefined (reading 'id')")).toBe('attribute_errors');
    expect(classifyError('RangeError: Invalid array length')).toBe('value_errors');
    expect(classifyError('Error: unable to get local issuer certificate')).toBe('ssl_errors');
  });

  it('should not read timestamp digits as status codes', () => {
    expect(classifyError('2026-01-03 10:00:00,500 ERROR something odd')).toBe('unknown');
    expect(classifyError('ERROR upstream returned 500')).toBe('api_errors');
  });
});
