/**
 * Models
 * @module @loadramp/core/models
 */

export {
  SCRAPE_RAMP,
  PUSH_RAMP,
  SCENARIO_CATALOG,
  SUITES,
  SOAK_BASE_ID,
  SCRAPE_POLL_INTERVAL_MS,
  PUSH_INTERVAL_MS,
  isSuiteName,
  type SuiteName,
} from './scenario-catalog';
export {
  NODE_LEVEL_JOBS,
  CLUSTER_LEVEL_JOBS,
  CLUSTER_INSTANCE,
  nodeIdentity,
  nodeIdentities,
  instanceFor,
  inflatePodPayload,
  type PushJob,
  type InstanceKind,
  type NodeIdentity,
  type PushCycleStats,
} from './push-jobs';
export {
  scrapeProfile,
  pushProfile,
  successRate,
  type MetricDefinition,
  type MetricProfile,
  type ScrapeProfileOptions,
  type PushProfileOptions,
} from './metric-profile';
