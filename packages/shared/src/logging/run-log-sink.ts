/**
 * Run Log Sink
 * @module @loadramp/shared/logging/run-log-sink
 *
 * Appends timestamped lines to a plain-text log that belongs to a run (the
 * suite master log, a scenario's monitor log). Writes are serialized; after
 * close every write is dropped.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Destination of log text
 */
export interface LogTarget {
  append(text: string): Promise<void>;
}

/**
 * Log target appending to a file on the local disk
 */
export function fileLogTarget(path: string): LogTarget {
  return {
    async append(text: string) {
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, text, 'utf8');
    },
  };
}

export interface RunLogSinkOptions {
  /** Mirror each line to the console */
  echo?: boolean;
  /** Time source for line prefixes */
  now?: () => Date;
}

export class RunLogSink {
  private readonly target: LogTarget;
  private readonly echo: boolean;
  private readonly now: () => Date;
  private closed = false;
  private queue: Promise<void> = Promise.resolve();
  private failure: Error | null = null;

  constructor(target: string | LogTarget, options: RunLogSinkOptions = {}) {
    this.target = typeof target === 'string' ? fileLogTarget(target) : target;
    this.echo = options.echo ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append one line prefixed with an ISO timestamp.
   */
  write(message: string): void {
    this.writeRaw(`[${this.now().toISOString()}] ${message}`);
  }

  /**
   * Append text verbatim, one line per entry.
   */
  writeRaw(...lines: string[]): void {
    if (this.closed) {
      return;
    }
    const text = lines.map((line) => `${line}\n`).join('');
    if (this.echo) {
      process.stdout.write(text);
    }
    this.queue = this.queue.then(() => this.append(text));
  }

  private async append(text: string): Promise<void> {
    try {
      await this.target.append(text);
    } catch (error) {
      this.failure ??= error instanceof Error ? error : new Error(String(error));
    }
  }

  /**
   * Wait for queued writes. Rejects with the first write failure, if any.
   */
  async flush(): Promise<void> {
    await this.queue;
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }

  /**
   * Flush and close. Later writes are dropped.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.flush();
  }
}
