/**
 * Execution host on the operator's machine
 * @module @loadramp/runtime/hosts/local-execution-host
 *
 * Detached runs are background processes of the local loadramp CLI; the
 * results root is a local directory.
 */

import { spawn } from 'child_process';
import { once } from 'events';
import fs from 'fs-extra';
import path from 'path';
import type { IExecutionHost } from '@loadramp/shared';
import { RunError, createServiceLogger } from '@loadramp/shared';
import { FsArtifactStore } from '@loadramp/core';
import { isProcessAlive, waitForExit } from './process';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'local-execution-host' },
);

/**
 * Command that starts this CLI again: the Node binary, its loader flags
 * and the entry script.
 */
export function selfEntrypoint(): string[] {
  return [process.execPath, ...process.execArgv, ...(process.argv[1] ? [process.argv[1]] : [])];
}

export class LocalExecutionHost implements IExecutionHost {
  readonly name = 'local';
  private readonly files: FsArtifactStore;
  private readonly root: string;

  constructor(
    resultsRoot: string,
    private readonly entrypoint: string[] = selfEntrypoint(),
  ) {
    this.root = path.resolve(resultsRoot);
    this.files = new FsArtifactStore(this.root);
  }

  async ensureReady(): Promise<void> {
    await fs.ensureDir(this.root);
  }

  isReady(): Promise<boolean> {
    return fs.pathExists(this.root);
  }

  readFile(relative: string): Promise<string | null> {
    return this.files.read(relative);
  }

  writeFile(relative: string, content: string): Promise<void> {
    return this.files.write(relative, content);
  }

  removeFile(relative: string): Promise<void> {
    return this.files.remove(relative);
  }

  listDirectories(relative: string): Promise<string[]> {
    return this.files.listDirectories(relative);
  }

  async isAlive(pid: number): Promise<boolean> {
    return isProcessAlive(pid);
  }

  private commandFor(args: string[]): { command: string; argv: string[] } {
    const [command, ...rest] = this.entrypoint;
    if (!command) {
      throw RunError.hostCommandFailed(this.name, args.join(' '), 'no entrypoint configured');
    }
    return { command, argv: [...rest, ...args] };
  }

  async spawnDetached(args: string[], logPath: string): Promise<number> {
    const { command, argv } = this.commandFor(args);
    const logFile = this.files.resolve(logPath);
    await fs.ensureDir(path.dirname(logFile));
    const fd = await fs.open(logFile, 'a');
    try {
      const child = spawn(command, argv, {
        detached: true,
        stdio: ['ignore', fd, fd],
        env: { ...process.env, LOADRAMP_RESULTS_DIR: this.root },
      });
      await once(child, 'spawn');
      child.unref();
      if (child.pid === undefined) {
        throw RunError.hostCommandFailed(this.name, args.join(' '), 'process has no pid');
      }
      logger.debug('Detached process started', { pid: child.pid, logFile });
      return child.pid;
    } finally {
      await fs.close(fd);
    }
  }

  runAttached(args: string[]): Promise<number> {
    const { command, argv } = this.commandFor(args);
    return waitForExit(
      spawn(command, argv, { stdio: 'inherit', env: { ...process.env, LOADRAMP_RESULTS_DIR: this.root } }),
    );
  }

  async followFile(relative: string, signal?: AbortSignal): Promise<void> {
    await waitForExit(spawn('tail', ['-n', '+1', '-F', this.files.resolve(relative)], { stdio: 'inherit', signal }), signal);
  }

  async copyDirectory(relative: string, localDir: string): Promise<void> {
    const source = this.files.resolve(relative);
    if (path.resolve(localDir) === source) return;
    await fs.copy(source, localDir, { overwrite: true });
  }

  async openShell(): Promise<void> {
    await waitForExit(spawn(process.env.SHELL ?? 'sh', [], { cwd: this.root, stdio: 'inherit' }));
  }

  async destroy(): Promise<void> {
    logger.info('Local host has nothing to remove', { root: this.root });
  }
}
