/**
 * Load controllers
 * @module @loadramp/core/services/load-controller
 *
 * A load controller turns "apply load of size N" into whatever the backend
 * needs: a target set for the scrape collector, or a running push loop for
 * the push gateway. Applying the same size twice is equivalent to once.
 */

import type { ITargetConfigSink, ScenarioSpec, TargetSet } from '@loadramp/shared';
import { createServiceLogger, errorMessage, isPushScenario, validateLoadSize } from '@loadramp/shared';
import type { PushLoadGenerator, PushLoadSettings } from './push-load-generator';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'loadramp',
  },
  { component: 'load-controller' },
);

// ============================================================================
// Types
// ============================================================================

/**
 * Load operation result
 */
export interface LoadOperationResult {
  success: boolean;
  data?: { size: number };
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const LoadControllerErrorCodes = {
  INVALID_SIZE: 'INVALID_SIZE',
  APPLY_FAILED: 'APPLY_FAILED',
  SCENARIO_REQUIRED: 'SCENARIO_REQUIRED',
} as const;

export interface LoadController {
  /** Size most recently applied successfully, null before the first apply */
  readonly appliedSize: number | null;
  /**
   * Apply load of `size`. Push load needs the scenario to know how to push;
   * size 0 drains and needs none.
   */
  setLoad(size: number, scenario?: ScenarioSpec): Promise<LoadOperationResult>;
  /**
   * Remove all synthetic load. `scenario` names the path to drain where a
   * controller serves several.
   */
  drain(scenario?: ScenarioSpec): Promise<LoadOperationResult>;
  /**
   * Stop driving load from this process without changing what the backend
   * was told to discover
   */
  stop(): Promise<void>;
}

function invalidSize(size: number): LoadOperationResult | null {
  const issue = validateLoadSize(size, 'size');
  if (!issue) return null;
  return {
    success: false,
    error: { code: LoadControllerErrorCodes.INVALID_SIZE, message: issue.message, details: { size } },
  };
}

function applyFailed(size: number, error: unknown): LoadOperationResult {
  return {
    success: false,
    error: {
      code: LoadControllerErrorCodes.APPLY_FAILED,
      message: errorMessage(error),
      details: { size },
    },
  };
}

// ============================================================================
// Scrape targets
// ============================================================================

export interface TargetSetOptions {
  emitters: readonly string[];
  port: number;
}

/**
 * Target descriptors for `size` synthetic nodes. Each node exposes one
 * target per emitter, labelled with its zero-padded node id. Size 0 gives
 * an empty list per emitter.
 */
export function buildTargetSet(size: number, { emitters, port }: TargetSetOptions): TargetSet {
  const targetSet: TargetSet = {};
  for (const emitter of emitters) {
    targetSet[emitter] = Array.from({ length: size }, (_, i) => ({
      targets: [`emitter-${emitter}:${port}`],
      labels: { node_id: `node-${String(i).padStart(6, '0')}` },
    }));
  }
  return targetSet;
}

/**
 * Drives the scrape path by rewriting the discovery target set
 */
export class TargetSetLoadController implements LoadController {
  private applied: number | null = null;

  constructor(
    private readonly sink: ITargetConfigSink,
    private readonly options: TargetSetOptions,
  ) {}

  get appliedSize(): number | null {
    return this.applied;
  }

  async setLoad(size: number): Promise<LoadOperationResult> {
    const invalid = invalidSize(size);
    if (invalid) return invalid;

    try {
      await this.sink.apply(buildTargetSet(size, this.options));
    } catch (error) {
      logger.error('Failed to apply target set', error instanceof Error ? error : undefined, { size });
      return applyFailed(size, error);
    }

    this.applied = size;
    logger.info('Target set applied', { size, targets: size * this.options.emitters.length });
    return { success: true, data: { size } };
  }

  drain(): Promise<LoadOperationResult> {
    return this.setLoad(0);
  }

  async stop(): Promise<void> {
    // the target set persists until the next apply
  }
}

// ============================================================================
// Push load
// ============================================================================

export interface PushLoadControllerOptions {
  /** Endpoint for in-cluster scenarios */
  clusterIpEndpoint: string;
  /** Endpoint for ingress scenarios */
  ingressEndpoint: string;
  /** Delete every metric group when draining */
  wipeOnDrain: boolean;
}

/**
 * Drives the push path by running the push generator
 */
export class PushLoadController implements LoadController {
  private applied: number | null = null;

  constructor(
    private readonly generator: PushLoadGenerator,
    private readonly options: PushLoadControllerOptions,
  ) {}

  get appliedSize(): number | null {
    return this.applied;
  }

  settingsFor(size: number, scenario: ScenarioSpec): PushLoadSettings {
    return {
      endpoint: scenario.endpointClass === 'ingress' ? this.options.ingressEndpoint : this.options.clusterIpEndpoint,
      loadSize: size,
      jobSet: scenario.jobSet,
      jitterMs: scenario.jitterMs,
      intervalMs: scenario.pollIntervalMs,
      podMultiplier: scenario.podMultiplier,
    };
  }

  async setLoad(size: number, scenario?: ScenarioSpec): Promise<LoadOperationResult> {
    const invalid = invalidSize(size);
    if (invalid) return invalid;

    if (size === 0 && !scenario) {
      return this.drain();
    }

    if (!scenario) {
      return {
        success: false,
        error: {
          code: LoadControllerErrorCodes.SCENARIO_REQUIRED,
          message: 'Push load needs a scenario to apply',
          details: { size },
        },
      };
    }

    try {
      await this.generator.start(this.settingsFor(size, scenario));
    } catch (error) {
      logger.error('Failed to start push load', error instanceof Error ? error : undefined, { size });
      return applyFailed(size, error);
    }

    this.applied = size;
    return { success: true, data: { size } };
  }

  async drain(): Promise<LoadOperationResult> {
    try {
      await this.generator.stop();
      if (this.options.wipeOnDrain) {
        for (const endpoint of new Set([this.options.clusterIpEndpoint, this.options.ingressEndpoint])) {
          await this.generator.wipe(endpoint);
        }
      }
    } catch (error) {
      logger.error('Failed to drain push load', error instanceof Error ? error : undefined);
      return applyFailed(0, error);
    }
    this.applied = 0;
    return { success: true, data: { size: 0 } };
  }

  async stop(): Promise<void> {
    await this.generator.stop();
  }
}

// ============================================================================
// Routing
// ============================================================================

/**
 * Routes each scenario to the controller for its endpoint class.
 */
export class RoutingLoadController implements LoadController {
  private lastApplied: number | null = null;

  constructor(
    private readonly scrape: LoadController,
    private readonly push: LoadController,
  ) {}

  get appliedSize(): number | null {
    return this.lastApplied;
  }

  private controllerFor(scenario: ScenarioSpec): LoadController {
    return isPushScenario(scenario) ? this.push : this.scrape;
  }

  async setLoad(size: number, scenario?: ScenarioSpec): Promise<LoadOperationResult> {
    if (!scenario) {
      return size === 0 ? this.drain() : this.scrape.setLoad(size);
    }
    const result = await this.controllerFor(scenario).setLoad(size, scenario);
    if (result.success) this.lastApplied = size;
    return result;
  }

  /**
   * Drain the path of `scenario`, or every path when none is given
   */
  async drain(scenario?: ScenarioSpec): Promise<LoadOperationResult> {
    const targets = scenario ? [this.controllerFor(scenario)] : [this.scrape, this.push];
    for (const controller of targets) {
      const result = await controller.drain();
      if (!result.success) return result;
    }
    this.lastApplied = 0;
    return { success: true, data: { size: 0 } };
  }

  async stop(): Promise<void> {
    await this.scrape.stop();
    await this.push.stop();
  }
}
