/**
 * kubectl stand-in answering from a table of argument lines
 */

import { Kubectl, type CommandOptions, type CommandResult } from '../../src/kubectl/kubectl';

export function ok(stdout: string): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function failed(stderr: string, exitCode = 1): CommandResult {
  return { stdout: '', stderr, exitCode };
}

export class FakeKubectl extends Kubectl {
  readonly calls: { args: string; input?: string }[] = [];
  readonly interactiveCalls: string[] = [];

  /** Answers argument lines without an entry in the table */
  fallback: ((line: string) => CommandResult) | null = null;

  constructor(private readonly answers: Record<string, CommandResult> = {}) {
    super({ binary: 'kubectl-not-used' });
  }

  override async run(args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const line = args.join(' ');
    this.calls.push({ args: line, input: options.input });
    const answer = this.answers[line];
    if (answer) return answer;
    return this.fallback ? this.fallback(line) : failed(`no answer for: ${line}`);
  }

  override async interactive(args: string[]): Promise<number> {
    this.interactiveCalls.push(args.join(' '));
    return 0;
  }
}
