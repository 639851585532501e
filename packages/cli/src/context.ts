/**
 * Wires the core services to the runtime adapters for one CLI invocation.
 * @module @loadramp/cli/context
 */

import * as path from 'node:path';
import {
  HealthMonitor,
  MetricPoller,
  PushLoadController,
  PushLoadGenerator,
  ResultsWatcher,
  RoutingLoadController,
  RunStateStore,
  ScenarioRegistry,
  ScenarioRunner,
  SuiteSequencer,
  TargetSetLoadController,
  DetachedController,
  FsArtifactStore,
  WATCHER_LOG,
  pushProfile,
  scrapeProfile,
  type MetricProfile,
} from '@loadramp/core';
import {
  ConfigMapTargetSink,
  FilePayloadSource,
  Kubectl,
  KubectlWorkloadHealthClient,
  LocalExecutionHost,
  LocalWatcherLauncher,
  PodExecutionHost,
  PrometheusQueryClient,
  PushgatewayClient,
  isProcessAlive,
} from '@loadramp/runtime';
import {
  fileLogTarget,
  isPushScenario,
  type IExecutionHost,
  type LoadRampConfig,
  type ScenarioSpec,
} from '@loadramp/shared';

export interface CliContext {
  config: LoadRampConfig;
  store: FsArtifactStore;
  runState: RunStateStore;
  registry: ScenarioRegistry;
  generator: PushLoadGenerator;
  loadController: RoutingLoadController;
  runner: ScenarioRunner;
  sequencer: SuiteSequencer;
  /** Detached execution against the configured host */
  detached(): DetachedController;
  watcher(): ResultsWatcher;
}

export interface ContextOptions {
  /** Mirror suite log lines to stdout */
  echo?: boolean;
}

function createHost(config: LoadRampConfig, kubectl: Kubectl): IExecutionHost {
  if (config.host.kind === 'local') {
    return new LocalExecutionHost(config.resultsDir);
  }
  return new PodExecutionHost(kubectl, config.host, { payloadDir: config.pushgateway.payloadDir });
}

export function createContext(config: LoadRampConfig, options: ContextOptions = {}): CliContext {
  const { timing } = config;
  const kubectl = new Kubectl();
  const store = new FsArtifactStore(config.resultsDir);
  const runState = new RunStateStore(store, async (pid) => isProcessAlive(pid));
  const registry = new ScenarioRegistry({ emitterCount: config.targets.emitters.length });

  const generator = new PushLoadGenerator({
    client: new PushgatewayClient(config.pushgateway.pushTimeoutMs),
    payloads: new FilePayloadSource(config.pushgateway.payloadDir),
    maxInFlight: config.pushgateway.maxInFlight,
  });

  const loadController = new RoutingLoadController(
    new TargetSetLoadController(new ConfigMapTargetSink(kubectl, config.workload.namespace, config.targets.configMap), {
      emitters: config.targets.emitters,
      port: config.targets.port,
    }),
    new PushLoadController(generator, {
      clusterIpEndpoint: config.pushgateway.clusterIpEndpoint,
      ingressEndpoint: config.pushgateway.ingressEndpoint,
      wipeOnDrain: config.pushgateway.wipeOnDrain,
    }),
  );

  const scrape = scrapeProfile(config.prometheus);
  const push = pushProfile({ gatewayJob: config.pushgateway.gatewayJob, latestCycle: () => generator.latestCycle });
  const profileFor = (spec: ScenarioSpec): MetricProfile => (isPushScenario(spec) ? push : scrape);

  const runner = new ScenarioRunner({
    registry,
    loadController,
    metricPoller: new MetricPoller(new PrometheusQueryClient(config.prometheus.url, config.prometheus.queryTimeoutMs), {
      queryTimeoutMs: config.prometheus.queryTimeoutMs,
    }),
    healthMonitor: new HealthMonitor(new KubectlWorkloadHealthClient(kubectl, config.workload), {
      intervalMs: timing.healthIntervalMs,
    }),
    runState,
    store,
    profileFor,
    stopRule: { threshold: timing.stopThresholdPct, maxConsecutive: timing.stopConsecutive },
    convergence: { timeoutMs: timing.convergenceTimeoutMs, stepMs: timing.convergenceStepMs },
  });

  const sequencer = new SuiteSequencer({
    registry,
    runner,
    loadController,
    runState,
    store,
    settleMs: timing.settleMs,
    soakDurationMs: timing.soakDurationMs,
    stableThreshold: timing.stopThresholdPct,
    echo: options.echo,
  });

  let detached: DetachedController | undefined;
  const detachedController = (): DetachedController => {
    detached ??= new DetachedController({
      host: createHost(config, kubectl),
      registry,
      watcher: new LocalWatcherLauncher(),
      localResultsDir: config.resultsDir,
    });
    return detached;
  };

  return {
    config,
    store,
    runState,
    registry,
    generator,
    loadController,
    runner,
    sequencer,
    detached: detachedController,
    watcher: () => {
      const controller = detachedController();
      return new ResultsWatcher({
        runState: controller.runState,
        fetchResults: (target) => controller.fetchResults(target),
        log: fileLogTarget(path.join(config.resultsDir, WATCHER_LOG)),
        intervalMs: timing.watchIntervalMs,
        suiteIntervalMs: timing.watchSuiteIntervalMs,
      });
    },
  };
}
