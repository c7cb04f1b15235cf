/**
 * Repair Executor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { IssueDetector } from '../analysis/IssueDetector.js';
import { silentLogger } from '../core/Logger.js';
import { LogClassifier } from '../logs/LogClassifier.js';
import { FakeAnalyzer, FakeRunner } from '../testing/fakes.js';
import { BackupManager } from './BackupManager.js';
import { RepairExecutor, type FixAdvisor } from './RepairExecutor.js';
import { narrowCatchClauses } from './rewrites.js';
import { SafeWriter } from './SafeWriter.js';

const NOW = new Date(2026, 0, 3, 20, 0, 0);

const CATCH_ON_LINE_10 = [
  'export function load(path: string): string {',
  "  const parts = path.split('/');",
  '  const out: string[] = [];',
  '  for (const part of parts) {',
  '    out.push(part);',
  '  }',
  "  const joined = out.join('/');",
  '  try {',
  '    return JSON.parse(joined);',
  '  } catch {',
  '    return joined;',
  '  }',
  '}',
  ''
].join('\n');

describe('RepairExecutor', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'autoheal-repair-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(file: string, content: string): void {
    mkdirSync(dirname(join(dir, file)), { recursive: true });
    writeFileSync(join(dir, file), content);
  }

  function read(file: string): string {
    return readFileSync(join(dir, file), 'utf-8');
  }

  function executor(options: {
    analyzer?: FakeAnalyzer;
    advisor?: FixAdvisor;
    runner?: FakeRunner;
    manifest?: string;
  } = {}): RepairExecutor {
    const analyzer = options.analyzer ?? new FakeAnalyzer();
    const clock = () => NOW;
    const backups = new BackupManager({ dir: join(dir, '.autoheal', 'backups'), logger: silentLogger, clock });

    return new RepairExecutor({
      projectRoot: dir,
      logClassifier: new LogClassifier({
        projectRoot: dir,
        sources: { error: 'logs/error.log' },
        analyzer,
        logger: silentLogger,
        clock
      }),
      issueDetector: new IssueDetector({
        projectRoot: dir,
        analyzer,
        excludeDirs: ['node_modules', '.autoheal'],
        logger: silentLogger
      }),
      advisor: options.advisor ?? { getSuggestedFix: () => null },
      analyzer,
      writer: new SafeWriter({ backups, logger: silentLogger }),
      runner: options.runner ?? new FakeRunner(),
      manifest: options.manifest ?? 'requirements.txt',
      dependencyTool: { command: 'npx', args: ['depcheck', '--json'] },
      logger: silentLogger,
      clock
    });
  }

  describe('log repairs', () => {
    it('should add a missing module to the text manifest', async () => {
      write('requirements.txt', 'requests\n');
      write('logs/error.log', "2026-01-03 19:39:40 ERROR ModuleNotFoundError: No module named 'foo'\n");

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs).toHaveLength(1);
      expect(report.repairs[0]).toMatchObject({
        issueKind: 'import_errors',
        status: 'success',
        action: 'Added foo to requirements.txt',
        strategy: 'add_to_manifest'
      });
      expect(report.successCount).toBe(1);
      expect(read('requirements.txt')).toBe('requests\n\nfoo\n');
    });

    it('should not add a module twice', async () => {
      write('requirements.txt', 'requests\nFoo==1.0\n');
      write('logs/error.log', "ModuleNotFoundError: No module named 'foo'\n");

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs[0]).toMatchObject({
        status: 'skipped',
        action: 'foo already present in requirements.txt'
      });
      expect(read('requirements.txt')).toBe('requests\nFoo==1.0\n');
    });

    it('should add the package name to package.json', async () => {
      write('package.json', JSON.stringify({ name: 'demo', dependencies: { express: '^4.0.0' } }));
      write('logs/error.log', "Error: Cannot find module 'lodash/fp'\n");

      const report = await executor({ manifest: 'package.json' }).autoRepair(['logs']);

      expect(report.repairs[0].action).toBe('Added lodash to package.json');
      expect(JSON.parse(read('package.json'))).toEqual({
        name: 'demo',
        dependencies: { express: '^4.0.0', lodash: '*' }
      });
    });

    it('should fail the import repair when the manifest is missing', async () => {
      write('logs/error.log', "ModuleNotFoundError: No module named 'foo'\n");

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs[0].status).toBe('failed');
      expect(report.repairs[0].error).toBe(`Dependency manifest not found: ${join(dir, 'requirements.txt')}`);
    });

    it('should always skip api errors without touching files', async () => {
      write('requirements.txt', 'requests\n');
      write('src/app.ts', CATCH_ON_LINE_10);
      write('logs/error.log', 'ERROR HTTP 401 Unauthorized from upstream API\n');

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs).toEqual([expect.objectContaining({
        issueKind: 'api_errors',
        status: 'skipped',
        strategy: 'manual_verification',
        reason: 'API errors require manual verification',
        recommendation: 'Check API key and network connectivity'
      })]);
      expect(report.skippedCount).toBe(1);
      expect(read('requirements.txt')).toBe('requests\n');
      expect(read('src/app.ts')).toBe(CATCH_ON_LINE_10);
    });

    it('should skip error types without a repair', async () => {
      write('logs/error.log', "KeyError: 'id'\n");

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs[0]).toMatchObject({
        issueKind: 'key_errors',
        status: 'skipped',
        reason: 'No automated repair for key_errors'
      });
    });

    it('should repair at most five log errors per run', async () => {
      write('requirements.txt', '');
      write('logs/error.log', ['a', 'b', 'c', 'd', 'e', 'f', 'g']
        .map(name => `ModuleNotFoundError: No module named 'pkg${name}'`)
        .join('\n'));

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs).toHaveLength(5);
      expect(read('requirements.txt')).toBe('\npkga\n\npkgb\n\npkgc\n\npkgd\n\npkge\n');
    });

    it('should surface a model suggestion for attribute errors', async () => {
      write('logs/error.log', "TypeError: Cannot read properties of undefined (reading 'id')\n");
      const analyzer = new FakeAnalyzer('Use optional chaining: user?.id');

      const report = await executor({ analyzer }).autoRepair(['logs']);

      expect(report.repairs[0]).toMatchObject({
        issueKind: 'attribute_errors',
        status: 'suggested',
        strategy: 'model_suggestion',
        suggestion: 'Use optional chaining: user?.id'
      });
      expect(report.skippedCount).toBe(1);
    });

    it('should prefer a trusted learned fix over the model', async () => {
      write('logs/error.log', "AttributeError: 'NoneType' object has no attribute 'id'\n");
      const analyzer = new FakeAnalyzer('unused');
      const advisor: FixAdvisor = {
        getSuggestedFix: () => ({ action: 'guard_null', confidence: 0.9, source: 'learned_pattern' })
      };

      const report = await executor({ analyzer, advisor }).autoRepair(['logs']);

      expect(report.repairs[0]).toMatchObject({
        status: 'suggested',
        strategy: 'learned_fix',
        suggestion: 'guard_null',
        confidence: 0.9
      });
      expect(analyzer.calls).toHaveLength(0);
    });

    it('should skip attribute errors when no suggestion can be made', async () => {
      write('logs/error.log', "AttributeError: 'NoneType' object has no attribute 'id'\n");

      const report = await executor().autoRepair(['logs']);

      expect(report.repairs[0]).toMatchObject({ status: 'skipped', reason: 'Could not generate fix' });
    });
  });

  describe('code repairs', () => {
    it('should narrow a bare catch and keep a backup', async () => {
      write('src/app.ts', CATCH_ON_LINE_10);

      const report = await executor().autoRepair(['code']);

      const backup = join(dir, '.autoheal', 'backups', 'app_20260103_200000.ts');
      expect(report.repairs).toEqual([expect.objectContaining({
        issueKind: 'bare_except',
        status: 'success',
        strategy: 'narrow_catch',
        backup,
        file: 'src/app.ts'
      })]);
      expect(readFileSync(backup, 'utf-8')).toBe(CATCH_ON_LINE_10);
      expect(read('src/app.ts').split('\n')[9]).toBe('  } catch (error) { if (!(error instanceof Error)) throw error;');

      const second = await executor().autoRepair(['code']);
      expect(second.repairs).toEqual([]);
    });

    it('should report no changes needed for an already narrowed file', async () => {
      write('src/app.ts', narrowCatchClauses('app.ts', CATCH_ON_LINE_10));

      const outcome = await executor().repairCodeIssue({
        kind: 'bare_except',
        severity: 'medium',
        file: 'src/app.ts',
        line: 10,
        message: 'Use specific exception types'
      });

      expect(outcome.status).toBe('skipped');
      expect(outcome.reason).toBe('No changes needed');
      expect(existsSync(join(dir, '.autoheal', 'backups'))).toBe(false);
    });

    it('should produce the same output when narrowing twice', () => {
      const once = narrowCatchClauses('app.ts', CATCH_ON_LINE_10);
      expect(narrowCatchClauses('app.ts', once)).toBe(once);
    });

    it('should rewrite a syntax error with the model response', async () => {
      write('src/broken.js', 'const a = ;\n');
      const analyzer = new FakeAnalyzer('Here you go:\n```js\nconst a = 1;\n```\n');

      const report = await executor({ analyzer }).autoRepair(['code']);

      expect(report.repairs[0]).toMatchObject({
        issueKind: 'syntax_error',
        status: 'success',
        strategy: 'model_rewrite',
        action: 'Fixed syntax error in src/broken.js'
      });
      expect(read('src/broken.js')).toBe('const a = 1;');
      expect(analyzer.calls[0].prompt.startsWith('Fix the syntax error in this JavaScript code:')).toBe(true);
    });

    it('should restore the file when the rewrite does not parse', async () => {
      write('src/broken.js', 'const a = ;\n');
      const analyzer = new FakeAnalyzer('```js\nconst a = ;;\n```');

      const report = await executor({ analyzer }).autoRepair(['code']);

      expect(report.repairs[0].status).toBe('failed');
      expect(report.repairs[0].error).toMatch(/^Rewrite of .*broken\.js does not parse/);
      expect(report.failedCount).toBe(1);
      expect(read('src/broken.js')).toBe('const a = ;\n');
    });

    it('should fail without touching the file when no fix is generated', async () => {
      write('src/broken.js', 'const a = ;\n');

      const report = await executor().autoRepair(['code']);

      expect(report.repairs[0]).toMatchObject({ status: 'failed', reason: 'Could not generate fix' });
      expect(read('src/broken.js')).toBe('const a = ;\n');
    });

    it('should skip issues whose file disappeared', async () => {
      const outcome = await executor().repairCodeIssue({
        kind: 'syntax_error',
        severity: 'high',
        file: 'src/gone.ts',
        line: 1,
        message: 'Syntax error'
      });

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'File not found' });
    });

    it('should skip kinds without a fixer', async () => {
      write('src/debug.js', 'console.log(1);\n');

      const outcome = await executor().repairCodeIssue({
        kind: 'print_debug',
        severity: 'medium',
        file: 'src/debug.js',
        line: 1,
        message: 'Use a logger instead of console output'
      });

      expect(outcome).toMatchObject({ status: 'skipped', reason: 'No auto-fix available for print_debug' });
    });
  });

  describe('dependency repairs', () => {
    it('should skip a clean run that leaves the manifest unchanged', async () => {
      write('requirements.txt', 'requests\n');
      const runner = new FakeRunner({ exitCode: 0, stdout: '{}', stderr: '' });

      const report = await executor({ runner }).autoRepair(['dependencies']);

      expect(report.repairs[0]).toMatchObject({
        status: 'skipped',
        action: 'Ran npx depcheck --json',
        reason: 'requirements.txt unchanged'
      });
      expect(runner.invocations).toEqual([{ command: 'npx', args: ['depcheck', '--json'], cwd: dir }]);
    });

    it('should report success when the tool updates the manifest', async () => {
      write('requirements.txt', 'requests\n');
      const runner = new FakeRunner({ exitCode: 0, stdout: '', stderr: '' }, cwd => {
        writeFileSync(join(cwd, 'requirements.txt'), 'requests\nurllib3\n');
      });

      const report = await executor({ runner }).autoRepair(['dependencies']);

      expect(report.repairs[0]).toMatchObject({
        status: 'success',
        action: 'Updated requirements.txt with npx depcheck --json'
      });
      expect(report.successCount).toBe(1);
    });

    it('should surface scan findings as a suggestion', async () => {
      write('package.json', '{"name":"demo"}');
      const findings = '{"dependencies":[],"missing":{"left-pad":["src/pad.js"]}}';
      const runner = new FakeRunner({ exitCode: 255, stdout: `${findings}\n`, stderr: '' });

      const report = await executor({ runner, manifest: 'package.json' }).autoRepair(['dependencies']);

      expect(report.repairs[0]).toMatchObject({
        status: 'suggested',
        action: 'Review findings from npx depcheck --json',
        suggestion: findings
      });
      expect(report.failedCount).toBe(0);
      expect(read('package.json')).toBe('{"name":"demo"}');
    });

    it('should record tool failures', async () => {
      write('requirements.txt', 'requests\n');
      const runner = new FakeRunner({ exitCode: 1, stdout: '', stderr: 'depcheck crashed\n' });

      const report = await executor({ runner }).autoRepair(['dependencies']);

      expect(report.repairs[0]).toMatchObject({
        status: 'failed',
        action: 'npx depcheck --json',
        error: 'depcheck crashed'
      });
    });

    it('should record a tool that cannot start', async () => {
      write('requirements.txt', 'requests\n');
      const runner = new FakeRunner(new Error('spawn npx ENOENT'));

      const report = await executor({ runner }).autoRepair(['dependencies']);

      expect(report.repairs[0]).toMatchObject({ status: 'failed', error: 'spawn npx ENOENT' });
    });

    it('should do nothing without a manifest', async () => {
      const runner = new FakeRunner();

      const report = await executor({ runner }).autoRepair(['dependencies']);

      expect(report.repairs).toEqual([]);
      expect(runner.invocations).toEqual([]);
    });
  });
});
