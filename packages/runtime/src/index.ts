/**
 * loadramp - Node.js Runtime
 * Adapters that connect the core services to Prometheus, the Pushgateway,
 * Kubernetes and the local machine
 * @module @loadramp/runtime
 */

// HTTP
export {
  HttpAdapter,
  HttpAdapterError,
  type HttpMethod,
  type HttpAdapterConfig,
  type HttpRequestOptions,
  type HttpResponse,
} from './adapters/http-adapter';
export { PrometheusQueryClient, parseQueryResponse } from './adapters/prometheus-client';
export { PushgatewayClient, groupPath, listedGroups } from './adapters/pushgateway-client';
export { FilePayloadSource } from './adapters/payload-source';

// Kubernetes
export {
  Kubectl,
  runChecked,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
  type KubectlOptions,
} from './kubectl/kubectl';
export {
  KubectlWorkloadHealthClient,
  parseCpuMillicores,
  parseMemoryBytes,
  containerStatus,
} from './kubectl/workload-health-client';
export { ConfigMapTargetSink, buildConfigMap, targetKey } from './kubectl/configmap-target-sink';

// Execution hosts
export { PodExecutionHost, shellQuote, type PodExecutionHostOptions } from './hosts/pod-execution-host';
export { LocalExecutionHost, selfEntrypoint } from './hosts/local-execution-host';
export { LocalWatcherLauncher, watchArgs } from './hosts/watcher-launcher';
export { isProcessAlive, waitForExit } from './hosts/process';
