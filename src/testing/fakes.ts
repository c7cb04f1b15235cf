/**
 * In-process stand-ins for the model backend and external tools
 */

import type { CommandResult, CommandRunner } from '../repair/CommandRunner.js';
import type {
  AnalysisContext,
  AnalysisResult,
  BackendProfileKind,
  ModelBackend,
  TextAnalyzer
} from '../providers/types.js';

type Reply = string | null | ((prompt: string, context?: AnalysisContext) => string | null);

/**
 * TextAnalyzer returning scripted replies. A null reply is an error result.
 */
export class FakeAnalyzer implements TextAnalyzer {
  readonly calls: Array<{ prompt: string; context?: AnalysisContext }> = [];
  private readonly reply: Reply;

  constructor(reply: Reply = null) {
    this.reply = reply;
  }

  async analyze(prompt: string, context?: AnalysisContext): Promise<AnalysisResult> {
    this.calls.push({ prompt, context });
    const response = typeof this.reply === 'function' ? this.reply(prompt, context) : this.reply;
    if (response === null) {
      return { status: 'error', error: 'Model backend not initialized', backend: 'disabled' };
    }
    return { status: 'success', response, backend: 'primary' };
  }
}

/**
 * ModelBackend that answers with a fixed text, or fails when given an Error
 */
export class FakeBackend implements ModelBackend {
  readonly name: string;
  readonly model = 'fake-model';
  readonly endpoint = null;
  readonly local = false;
  readonly prompts: string[] = [];

  constructor(readonly kind: BackendProfileKind, private readonly answer: string | Error) {
    this.name = `fake:${kind}`;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return this.answer;
  }
}

/**
 * CommandRunner returning a canned result and recording invocations
 */
export class FakeRunner implements CommandRunner {
  readonly invocations: Array<{ command: string; args: string[]; cwd: string }> = [];
  private readonly result: CommandResult | Error;
  private readonly effect?: (cwd: string) => void;

  /**
   * `effect` runs before the result is returned, standing in for what the
   * command would have done to the working directory
   */
  constructor(result: CommandResult | Error = { exitCode: 0, stdout: '', stderr: '' }, effect?: (cwd: string) => void) {
    this.result = result;
    this.effect = effect;
  }

  async run(command: string, args: string[], cwd: string): Promise<CommandResult> {
    this.invocations.push({ command, args, cwd });
    this.effect?.(cwd);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}
