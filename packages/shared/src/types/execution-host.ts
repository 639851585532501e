/**
 * Execution host abstraction
 *
 * A host runs scenario processes independently of the operator session.
 * Paths are relative to the host's results root.
 *
 * @module @loadramp/shared/types/execution-host
 */

export interface IExecutionHost {
  /** Human readable name used in log lines */
  readonly name: string;

  /** Provision the host if needed and wait until it accepts commands */
  ensureReady(): Promise<void>;
  isReady(): Promise<boolean>;

  readFile(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;
  removeFile(path: string): Promise<void>;
  /** Names of the immediate sub-directories of `path` */
  listDirectories(path: string): Promise<string[]>;

  isAlive(pid: number): Promise<boolean>;
  /**
   * Start `args` through the loadramp entrypoint on the host, detached from
   * the caller, writing its output to `logPath`. Resolves with the pid.
   */
  spawnDetached(args: string[], logPath: string): Promise<number>;
  /** Run `args` through the entrypoint and stream its output; resolves with the exit code */
  runAttached(args: string[]): Promise<number>;

  /** Stream a file's tail until the signal aborts or the stream ends */
  followFile(path: string, signal?: AbortSignal): Promise<void>;
  /** Copy a directory from the host into a local directory */
  copyDirectory(path: string, localDir: string): Promise<void>;
  openShell(): Promise<void>;
  destroy(): Promise<void>;
}

/**
 * Starts the background results watcher for a launched target.
 */
export interface IWatcherLauncher {
  launch(target: string, launchedAt: Date): Promise<number | null>;
}
