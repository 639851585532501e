/**
 * Execution host running inside a Kubernetes pod
 * @module @loadramp/runtime/hosts/pod-execution-host
 *
 * The pod keeps running scenarios after the operator disconnects. All file
 * access goes through `kubectl exec`; directories move as tar streams.
 */

import { spawn } from 'child_process';
import fs from 'fs-extra';
import path from 'path';
import type { HostSettings, IExecutionHost } from '@loadramp/shared';
import { RunError, createServiceLogger } from '@loadramp/shared';
import { runChecked, type CommandResult, type Kubectl } from '../kubectl/kubectl';
import { waitForExit } from './process';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'pod-execution-host' },
);

/**
 * Single-quote a value for sh
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface PodExecutionHostOptions {
  /** Local payload directory synchronised to the pod when it becomes ready */
  payloadDir?: string;
}

export class PodExecutionHost implements IExecutionHost {
  readonly name: string;
  private readonly resultsRoot: string;

  constructor(
    private readonly kubectl: Kubectl,
    private readonly settings: HostSettings,
    private readonly options: PodExecutionHostOptions = {},
  ) {
    this.name = `pod/${settings.namespace}/${settings.podName}`;
    this.resultsRoot = path.posix.join(settings.remoteDir, 'results');
  }

  private remote(relative: string): string {
    return relative === '' ? this.resultsRoot : path.posix.join(this.resultsRoot, relative);
  }

  private exec(script: string, input?: string): Promise<CommandResult> {
    const args = ['exec', ...(input === undefined ? [] : ['-i']), this.settings.podName, '-n', this.settings.namespace];
    return this.kubectl.run([...args, '--', 'sh', '-c', script], { input });
  }

  private command(args: string[]): string {
    const words = [...this.settings.entrypoint, ...args].map(shellQuote).join(' ');
    return `cd ${shellQuote(this.settings.remoteDir)} && export LOADRAMP_RESULTS_DIR=${shellQuote(this.resultsRoot)} && exec ${words}`;
  }

  async podPhase(): Promise<string> {
    const result = await this.kubectl.run([
      'get',
      'pod',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '-o',
      'jsonpath={.status.phase}',
    ]);
    return result.exitCode === 0 && result.stdout.trim() !== '' ? result.stdout.trim() : 'NotFound';
  }

  async isReady(): Promise<boolean> {
    return (await this.podPhase()) === 'Running';
  }

  async ensureReady(): Promise<void> {
    const phase = await this.podPhase();
    if (phase !== 'Running') {
      if (phase !== 'NotFound') {
        logger.warn('Host pod not running; recreating', { pod: this.settings.podName, phase });
        await runChecked(this.kubectl, ['delete', 'pod', this.settings.podName, '-n', this.settings.namespace, '--wait=true']);
      }
      if (!this.settings.manifestPath) {
        throw RunError.hostUnavailable(this.name, new Error('pod is not running and no manifest is configured'));
      }
      await runChecked(this.kubectl, ['apply', '-f', this.settings.manifestPath]);
      await runChecked(
        this.kubectl,
        [
          'wait',
          '--for=condition=Ready',
          `pod/${this.settings.podName}`,
          '-n',
          this.settings.namespace,
          `--timeout=${Math.round(this.settings.readyTimeoutMs / 1000)}s`,
        ],
        { timeoutMs: this.settings.readyTimeoutMs + 10_000 },
      );
      logger.info('Host pod ready', { pod: this.settings.podName });
    }

    await this.exec(`mkdir -p ${shellQuote(this.resultsRoot)} ${shellQuote(path.posix.join(this.settings.remoteDir, 'payloads'))}`);
    if (this.options.payloadDir && (await fs.pathExists(this.options.payloadDir))) {
      await this.uploadDirectory(this.options.payloadDir, path.posix.join(this.settings.remoteDir, 'payloads'));
    }
  }

  async readFile(relative: string): Promise<string | null> {
    const result = await this.exec(`cat ${shellQuote(this.remote(relative))}`);
    return result.exitCode === 0 ? result.stdout : null;
  }

  async writeFile(relative: string, content: string): Promise<void> {
    const target = this.remote(relative);
    const result = await this.exec(
      `mkdir -p ${shellQuote(path.posix.dirname(target))} && cat > ${shellQuote(target)}`,
      content,
    );
    if (result.exitCode !== 0) {
      throw RunError.hostCommandFailed(this.name, `write ${relative}`, result.stderr.trim());
    }
  }

  async removeFile(relative: string): Promise<void> {
    await this.exec(`rm -f ${shellQuote(this.remote(relative))}`);
  }

  async listDirectories(relative: string): Promise<string[]> {
    const result = await this.exec(
      `find ${shellQuote(this.remote(relative))} -mindepth 1 -maxdepth 1 -type d -exec basename {} \\;`,
    );
    if (result.exitCode !== 0) return [];
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .sort();
  }

  async isAlive(pid: number): Promise<boolean> {
    const result = await this.exec(`kill -0 ${pid}`);
    return result.exitCode === 0;
  }

  async spawnDetached(args: string[], logPath: string): Promise<number> {
    const log = this.remote(logPath);
    const script =
      `mkdir -p ${shellQuote(path.posix.dirname(log))} && ` +
      `(${this.command(args)}) > ${shellQuote(log)} 2>&1 < /dev/null & echo $!`;
    const stdout = await runChecked(this.kubectl, [
      'exec',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--',
      'nohup',
      'sh',
      '-c',
      script,
    ]);
    const pid = Number.parseInt(stdout.trim().split('\n').pop() ?? '', 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      throw RunError.hostCommandFailed(this.name, args.join(' '), `unexpected pid output: ${stdout.trim()}`);
    }
    return pid;
  }

  runAttached(args: string[]): Promise<number> {
    return this.kubectl.interactive([
      'exec',
      '-i',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--',
      'sh',
      '-c',
      this.command(args),
    ]);
  }

  async followFile(relative: string, signal?: AbortSignal): Promise<void> {
    await this.kubectl.interactive(
      ['exec', this.settings.podName, '-n', this.settings.namespace, '--', 'tail', '-n', '+1', '-F', this.remote(relative)],
      signal,
    );
  }

  async copyDirectory(relative: string, localDir: string): Promise<void> {
    await fs.ensureDir(localDir);
    const source = this.kubectl.readStream([
      'exec',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--',
      'tar',
      'cf',
      '-',
      '-C',
      this.remote(relative),
      '.',
    ]);
    const sink = spawn('tar', ['xf', '-', '-C', localDir], { stdio: ['pipe', 'ignore', 'inherit'] });
    source.stdout.pipe(sink.stdin);
    const [sourceCode, sinkCode] = await Promise.all([waitForExit(source), waitForExit(sink)]);
    if (sourceCode !== 0 || sinkCode !== 0) {
      throw RunError.hostCommandFailed(this.name, `copy ${relative || '.'}`, `tar exited with ${sourceCode}/${sinkCode}`);
    }
  }

  private async uploadDirectory(localDir: string, remoteDir: string): Promise<void> {
    const source = spawn('tar', ['cf', '-', '-C', localDir, '.'], { stdio: ['ignore', 'pipe', 'inherit'] });
    const sink = this.kubectl.writeStream([
      'exec',
      '-i',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--',
      'tar',
      'xf',
      '-',
      '-C',
      remoteDir,
    ]);
    source.stdout.pipe(sink.stdin);
    const [sourceCode, sinkCode] = await Promise.all([waitForExit(source), waitForExit(sink)]);
    if (sourceCode !== 0 || sinkCode !== 0) {
      throw RunError.hostCommandFailed(this.name, `upload ${localDir}`, `tar exited with ${sourceCode}/${sinkCode}`);
    }
    logger.debug('Directory uploaded', { localDir, remoteDir });
  }

  async openShell(): Promise<void> {
    await this.kubectl.interactive([
      'exec',
      '-it',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--',
      'sh',
      '-c',
      `cd ${shellQuote(this.resultsRoot)} && (bash || sh)`,
    ]);
  }

  async destroy(): Promise<void> {
    await runChecked(this.kubectl, [
      'delete',
      'pod',
      this.settings.podName,
      '-n',
      this.settings.namespace,
      '--ignore-not-found',
    ]);
  }
}
