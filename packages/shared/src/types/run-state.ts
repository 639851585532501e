/**
 * Run state types
 *
 * The run state is derived on demand from marker artifacts and process
 * liveness; nothing caches it.
 *
 * @module @loadramp/shared/types/run-state
 */

/**
 * Contents of a RUNNING marker.
 * `pid` is null between the marker being written and the process being bound.
 */
export interface RunMarker {
  scenarioId: string;
  pid: number | null;
  startedAt: Date;
}

/**
 * Contents of a DONE marker.
 */
export interface DoneMarker {
  scenarioId: string;
  finishedAt: Date;
}

export type RunState =
  | { state: 'idle' }
  | { state: 'running'; scenarioId: string; pid: number; startedAt: Date }
  | { state: 'finished'; scenarioId: string; pid: number | null; startedAt: Date }
  | { state: 'done'; scenarioId: string; finishedAt: Date };

export type RunStateName = RunState['state'];

/**
 * Liveness check for a process id on whichever host owns it.
 */
export type LivenessCheck = (pid: number) => Promise<boolean>;
