/**
 * Core services exports
 * @module @loadramp/core/services
 */

export { ScenarioRegistry, type ScenarioRegistryOptions } from './scenario-registry';

export {
  TargetSetLoadController,
  PushLoadController,
  RoutingLoadController,
  LoadControllerErrorCodes,
  buildTargetSet,
  type LoadController,
  type LoadOperationResult,
  type TargetSetOptions,
  type PushLoadControllerOptions,
} from './load-controller';

export {
  PushLoadGenerator,
  Semaphore,
  planCycle,
  summarizeCycle,
  type PushLoadSettings,
  type PushLoadGeneratorOptions,
  type PushTask,
} from './push-load-generator';

export {
  HealthMonitor,
  ERROR_LINE_PATTERN,
  selectErrorLines,
  isAbnormalTermination,
  type HealthMonitorOptions,
  type HealthTickState,
  type MonitorHandle,
} from './health-monitor';

export { MetricPoller, type MetricPollerOptions } from './metric-poller';

export { StopRuleEvaluator, type StopRuleOptions, type StopDecision } from './stop-rule';

export { summarize, renderSummary, type SummaryContext } from './summary-report';

export {
  ScenarioRunner,
  type RunPhase,
  type ConvergenceOptions,
  type ConvergenceResult,
  type ScenarioRunnerDeps,
  type ScenarioRunOptions,
  type ScenarioOutcome,
} from './scenario-runner';

export {
  SuiteSequencer,
  SUITE_LOG,
  isStableRun,
  highestStableSize,
  type ScenarioExecutor,
  type SuiteSequencerDeps,
  type SuiteRunOptions,
  type SuiteEntry,
  type SuiteResult,
} from './suite-sequencer';

export {
  DetachedController,
  SUITE_OUTPUT_LOG,
  logPathFor,
  jobArgs,
  type LaunchOptions,
  type LaunchResult,
  type DetachedControllerDeps,
} from './detached-controller';

export {
  ResultsWatcher,
  WATCHER_LOG,
  type ResultsWatcherDeps,
  type WatchResult,
} from './results-watcher';

export {
  runDetachedJob,
  exitCodeForStatus,
  type DetachedJobDeps,
  type DetachedJobOptions,
} from './detached-job';
