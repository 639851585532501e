/**
 * Push load generator
 * @module @loadramp/core/services/push-load-generator
 *
 * Every cycle pushes one payload per (node, node-level job) plus one per
 * cluster-level job. Each push waits a random delay up to the jitter, then
 * takes a slot from a bounded pool of in-flight requests.
 */

import { EventEmitter } from 'events';
import type { IPayloadSource, IPushClient, JobSet, PushResult } from '@loadramp/shared';
import {
  ErrorCode,
  LoadRampError,
  createServiceLogger,
  errorMessage,
  jobCategories,
  percentile,
  systemClock,
  type Clock,
} from '@loadramp/shared';
import {
  CLUSTER_LEVEL_JOBS,
  NODE_LEVEL_JOBS,
  inflatePodPayload,
  instanceFor,
  nodeIdentities,
  type PushCycleStats,
  type PushJob,
} from '../models/push-jobs';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'push-load-generator' },
);

export interface PushLoadSettings {
  endpoint: string;
  loadSize: number;
  jobSet: JobSet;
  jitterMs: number;
  intervalMs: number;
  podMultiplier: number;
}

export interface PushLoadGeneratorOptions {
  client: IPushClient;
  payloads: IPayloadSource;
  /** Maximum concurrent pushes (default: 200) */
  maxInFlight?: number;
  clock?: Clock;
  /** Uniform random source in [0, 1) */
  random?: () => number;
}

/**
 * One planned push
 */
export interface PushTask {
  job: string;
  instance: string;
  payload: string;
}

/**
 * Counting semaphore
 */
export class Semaphore {
  private available: number;
  private readonly waiters: (() => void)[] = [];

  constructor(permits: number) {
    this.available = Math.max(1, permits);
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }
}

/**
 * Build the push plan of one cycle
 */
export function planCycle(settings: PushLoadSettings, payloads: ReadonlyMap<string, string>): PushTask[] {
  const categories = jobCategories(settings.jobSet);
  const tasks: PushTask[] = [];

  if (categories.includes('node')) {
    for (const node of nodeIdentities(settings.loadSize)) {
      for (const job of NODE_LEVEL_JOBS) {
        tasks.push({ job: job.name, instance: instanceFor(job, node), payload: payloads.get(job.name) ?? '' });
      }
    }
  }

  if (categories.includes('cluster')) {
    for (const job of CLUSTER_LEVEL_JOBS) {
      tasks.push({ job: job.name, instance: instanceFor(job, null), payload: payloads.get(job.name) ?? '' });
    }
  }

  return tasks;
}

/**
 * Aggregate the results of one cycle
 */
export function summarizeCycle(cycle: number, startedAt: Date, elapsedMs: number, results: PushResult[]): PushCycleStats {
  const succeeded = results.filter((result) => result.ok).length;
  const errors = new Map<string, number>();
  for (const result of results) {
    if (!result.ok) {
      const key = result.error ?? `HTTP ${result.statusCode ?? 'error'}`;
      errors.set(key, (errors.get(key) ?? 0) + 1);
    }
  }
  let topError: string | null = null;
  let topCount = 0;
  for (const [message, count] of errors) {
    if (count > topCount) {
      topError = message;
      topCount = count;
    }
  }
  return {
    cycle,
    startedAt,
    elapsedMs,
    attempted: results.length,
    succeeded,
    failed: results.length - succeeded,
    latenciesMs: results.map((result) => result.latencyMs),
    topError,
  };
}

export class PushLoadGenerator extends EventEmitter {
  private readonly client: IPushClient;
  private readonly payloads: IPayloadSource;
  private readonly maxInFlight: number;
  private readonly clock: Clock;
  private readonly random: () => number;

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private latest: PushCycleStats | null = null;
  private cycles = 0;

  constructor(options: PushLoadGeneratorOptions) {
    super();
    this.client = options.client;
    this.payloads = options.payloads;
    this.maxInFlight = options.maxInFlight ?? 200;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Most recent completed cycle
   */
  get latestCycle(): PushCycleStats | null {
    return this.latest;
  }

  /**
   * Load every payload the settings need, inflating the cluster payload
   */
  async loadPayloads(settings: PushLoadSettings): Promise<Map<string, string>> {
    const jobs: PushJob[] = [];
    const categories = jobCategories(settings.jobSet);
    if (categories.includes('node')) jobs.push(...NODE_LEVEL_JOBS);
    if (categories.includes('cluster')) jobs.push(...CLUSTER_LEVEL_JOBS);

    const loaded = new Map<string, string>();
    for (const job of jobs) {
      let payload: string;
      try {
        payload = await this.payloads.load(job.file);
      } catch (error) {
        throw new LoadRampError(
          `Payload for ${job.name} unavailable: ${errorMessage(error)}`,
          ErrorCode.PAYLOAD_UNAVAILABLE,
          { job: job.name, file: job.file },
          error instanceof Error ? error : undefined,
        );
      }
      loaded.set(job.name, job.category === 'cluster' ? inflatePodPayload(payload, settings.podMultiplier) : payload);
    }
    return loaded;
  }

  /**
   * Start pushing with `settings`, replacing any running loop. Resolves
   * once payloads are loaded and the loop is running.
   */
  async start(settings: PushLoadSettings): Promise<void> {
    const payloads = await this.loadPayloads(settings);
    await this.stop();

    const abort = new AbortController();
    this.abort = abort;
    this.latest = null;
    this.cycles = 0;
    logger.info('Push load started', {
      endpoint: settings.endpoint,
      loadSize: settings.loadSize,
      jobSet: settings.jobSet,
      pushesPerCycle: planCycle(settings, payloads).length,
    });
    this.loop = this.runLoop(settings, payloads, abort.signal);
  }

  /**
   * Stop the loop and wait for in-flight pushes to settle
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.abort?.abort();
    await loop;
    this.loop = null;
    this.abort = null;
    logger.info('Push load stopped', { cycles: this.cycles });
  }

  /**
   * Remove every metric group from the gateway at `endpoint`
   */
  async wipe(endpoint: string): Promise<number> {
    const deleted = await this.client.wipe(endpoint);
    logger.info('Gateway metric groups deleted', { endpoint, deleted });
    return deleted;
  }

  private async runLoop(settings: PushLoadSettings, payloads: Map<string, string>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStart = this.clock.now();
      try {
        const stats = await this.runCycle(settings, payloads, ++this.cycles, signal);
        this.latest = stats;
        this.emit('cycle', stats);
        logger.debug('Push cycle complete', {
          cycle: stats.cycle,
          succeeded: stats.succeeded,
          failed: stats.failed,
          p95Ms: percentile(stats.latenciesMs, 95),
        });
      } catch (error) {
        logger.error('Push cycle failed', error instanceof Error ? error : undefined);
        this.emit('cycle-error', error);
      }
      const remaining = settings.intervalMs - (this.clock.now() - cycleStart);
      await this.clock.sleep(Math.max(remaining, 0), signal);
    }
  }

  /**
   * Execute one cycle and collect its results
   */
  async runCycle(
    settings: PushLoadSettings,
    payloads: ReadonlyMap<string, string>,
    cycle: number,
    signal?: AbortSignal,
  ): Promise<PushCycleStats> {
    const startedAt = this.clock.now();
    const semaphore = new Semaphore(this.maxInFlight);
    const tasks = planCycle(settings, payloads);

    const results = await Promise.all(
      tasks.map(async (task) => {
        if (settings.jitterMs > 0) {
          await this.clock.sleep(this.random() * settings.jitterMs, signal);
        }
        await semaphore.acquire();
        try {
          return await this.client.push(settings.endpoint, task.job, task.instance, task.payload, signal);
        } finally {
          semaphore.release();
        }
      }),
    );

    return summarizeCycle(cycle, new Date(startedAt), this.clock.now() - startedAt, results);
  }
}
