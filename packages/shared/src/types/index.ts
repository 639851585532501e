/**
 * Shared types for loadramp
 * @module @loadramp/shared/types
 */

export type { EndpointClass, JobCategory, JobSet, ScenarioSpec, ScenarioListing } from './scenario.js';
export { SOAK_SCENARIO_ID, ALL_SCENARIOS, jobCategories, isPushScenario } from './scenario.js';

export type { MetricColumn, MetricValues, ResultsRow } from './results.js';
export { METRIC_COLUMNS, RESULTS_HEADER, emptyMetricValues } from './results.js';

export type { HealthRow, HealthEvent, HealthEventType, ResourceUsage, IWorkloadHealthClient } from './health.js';
export { HEALTH_HEADER } from './health.js';

export type { RunMarker, DoneMarker, RunState, RunStateName, LivenessCheck } from './run-state.js';

export type { ScenarioStatus, Summary } from './summary.js';

export type {
  TargetDescriptor,
  TargetSet,
  ITargetConfigSink,
  PushResult,
  IPushClient,
  IPayloadSource,
} from './load-target.js';

export type { QueryOutcome, QueryOptions, IMetricQueryClient } from './metric-query.js';

export type { IExecutionHost, IWatcherLauncher } from './execution-host.js';

export type {
  LoadRampConfig,
  LoadRampConfigInput,
  PrometheusSettings,
  WorkloadSettings,
  TargetSettings,
  PushgatewaySettings,
  HostSettings,
  HostKind,
  TimingSettings,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
