/**
 * Synthetic load types
 * @module @loadramp/shared/types/load-target
 */

/**
 * One synthetic scrape target in file-based discovery format.
 */
export interface TargetDescriptor {
  targets: string[];
  labels: Record<string, string>;
}

/**
 * Target descriptors keyed by emitter category.
 */
export type TargetSet = Record<string, TargetDescriptor[]>;

/**
 * Destination the scrape collector discovers targets from.
 */
export interface ITargetConfigSink {
  apply(targetSet: TargetSet): Promise<void>;
}

/**
 * Result of a single push.
 */
export interface PushResult {
  ok: boolean;
  statusCode: number | null;
  latencyMs: number;
  error?: string;
}

/**
 * Transport for the push gateway.
 */
export interface IPushClient {
  push(endpoint: string, job: string, instance: string, payload: string, signal?: AbortSignal): Promise<PushResult>;
  /** Remove every metric group held by the gateway; resolves with the number deleted */
  wipe(endpoint: string): Promise<number>;
}

/**
 * Source of raw metric payloads, one per job.
 */
export interface IPayloadSource {
  load(file: string): Promise<string>;
}
