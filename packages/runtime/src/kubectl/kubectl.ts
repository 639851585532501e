/**
 * kubectl command runner
 * @module @loadramp/runtime/kubectl/kubectl
 *
 * Thin wrapper over the kubectl binary. Everything that talks to the
 * cluster goes through a CommandRunner so tests can stand in for it.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable, Writable } from 'stream';
import { waitForExit } from '../hosts/process';
import { RunError, createServiceLogger } from '@loadramp/shared';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'kubectl' },
);

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Written to the command's stdin */
  input?: string;
  timeoutMs?: number;
}

export interface CommandRunner {
  /** Resolves with the result whatever the exit code; rejects when the binary cannot start */
  run(args: string[], options?: CommandOptions): Promise<CommandResult>;
  /**
   * Run with the caller's terminal attached; resolves with the exit code.
   * Aborting the signal ends the command.
   */
  interactive(args: string[], signal?: AbortSignal): Promise<number>;
}

/**
 * Run and return stdout, failing on a non-zero exit
 */
export async function runChecked(runner: CommandRunner, args: string[], options?: CommandOptions): Promise<string> {
  const result = await runner.run(args, options);
  if (result.exitCode !== 0) {
    throw RunError.hostCommandFailed('kubectl', args.join(' '), result.stderr.trim() || `exit code ${result.exitCode}`);
  }
  return result.stdout;
}

// ─────────────────────────────────────────────────────────────────────────────
// Kubectl
// ─────────────────────────────────────────────────────────────────────────────

export interface KubectlOptions {
  binary?: string;
  /** kubeconfig context */
  context?: string;
  /** Default command timeout (default: 60000) */
  timeoutMs?: number;
}

export class Kubectl implements CommandRunner {
  private readonly binary: string;
  private readonly context?: string;
  private readonly timeoutMs: number;

  constructor(options: KubectlOptions = {}) {
    this.binary = options.binary ?? 'kubectl';
    this.context = options.context;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  private withContext(args: string[]): string[] {
    return this.context ? ['--context', this.context, ...args] : args;
  }

  run(args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const fullArgs = this.withContext(args);
    logger.debug('kubectl', { args: fullArgs.join(' ') });

    return new Promise((resolve, reject) => {
      const proc = spawn(this.binary, fullArgs, { stdio: ['pipe', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      const timer = setTimeout(() => proc.kill('SIGTERM'), options.timeoutMs ?? this.timeoutMs);

      proc.stdout.setEncoding('utf8').on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.setEncoding('utf8').on('data', (chunk: string) => {
        stderr += chunk;
      });
      proc.on('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });
      proc.on('close', (code, signal) => {
        clearTimeout(timer);
        resolve({ stdout, stderr: signal ? `${stderr}terminated by ${signal}` : stderr, exitCode: code ?? 1 });
      });

      proc.stdin.end(options.input ?? '');
    });
  }

  interactive(args: string[], signal?: AbortSignal): Promise<number> {
    return waitForExit(spawn(this.binary, this.withContext(args), { stdio: 'inherit', signal }), signal);
  }

  /**
   * Spawn with stdout piped, for streaming binary output out of the cluster
   */
  readStream(args: string[]): ChildProcessByStdio<null, Readable, null> {
    return spawn(this.binary, this.withContext(args), { stdio: ['ignore', 'pipe', 'inherit'] });
  }

  /**
   * Spawn with stdin piped, for streaming binary input into the cluster
   */
  writeStream(args: string[]): ChildProcessByStdio<Writable, null, null> {
    return spawn(this.binary, this.withContext(args), { stdio: ['pipe', 'ignore', 'inherit'] });
  }
}
