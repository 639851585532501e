/**
 * Run state store
 * @module @loadramp/core/stores/run-state-store
 *
 * Marker artifacts, all relative to the results root:
 *   RUNNING          host-level marker of a detached launch (JSON)
 *   <id>/RUNNING     scenario currently executing (JSON)
 *   <id>/DONE        ISO timestamp; written only after the summary exists
 *   ALL_DONE         ISO timestamp; written when a suite ends
 *
 * The current RunState is always derived from these artifacts and process
 * liveness; nothing caches it.
 */

import type { DoneMarker, LivenessCheck, RunMarker, RunState } from '@loadramp/shared';
import { RunError, isRecord, parseJson } from '@loadramp/shared';
import type { ArtifactStore } from './artifact-store';
import { joinArtifactPath } from './artifact-store';

export const RUNNING_MARKER = 'RUNNING';
export const DONE_MARKER = 'DONE';
export const ALL_DONE_MARKER = 'ALL_DONE';

/**
 * Scope of a RUNNING marker: a scenario id, or the host itself
 */
export type MarkerScope = { scenarioId: string } | 'host';

function runningPath(scope: MarkerScope): string {
  return scope === 'host' ? RUNNING_MARKER : joinArtifactPath(scope.scenarioId, RUNNING_MARKER);
}

export function serializeRunMarker(marker: RunMarker): string {
  return `${JSON.stringify({
    scenarioId: marker.scenarioId,
    pid: marker.pid,
    startedAt: marker.startedAt.toISOString(),
  })}\n`;
}

/**
 * Parse a RUNNING marker. Unreadable content yields a marker with no pid,
 * which status reports as finished.
 */
export function parseRunMarker(text: string, fallbackScenarioId = 'unknown'): RunMarker {
  const value = parseJson(text);
  if (isRecord(value)) {
    const startedAt = typeof value.startedAt === 'string' ? new Date(value.startedAt) : new Date(0);
    return {
      scenarioId: typeof value.scenarioId === 'string' ? value.scenarioId : fallbackScenarioId,
      pid: typeof value.pid === 'number' && Number.isInteger(value.pid) ? value.pid : null,
      startedAt: Number.isNaN(startedAt.getTime()) ? new Date(0) : startedAt,
    };
  }
  return { scenarioId: fallbackScenarioId, pid: null, startedAt: new Date(0) };
}

export function parseTimestampMarker(text: string | null): Date | null {
  if (text === null) return null;
  const date = new Date(text.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Derive the run state from a host marker, its liveness and the most
 * recent completion.
 */
export function deriveRunState(marker: RunMarker | null, alive: boolean, latestDone: DoneMarker | null): RunState {
  if (marker) {
    if (marker.pid !== null && alive) {
      return { state: 'running', scenarioId: marker.scenarioId, pid: marker.pid, startedAt: marker.startedAt };
    }
    return { state: 'finished', scenarioId: marker.scenarioId, pid: marker.pid, startedAt: marker.startedAt };
  }
  if (latestDone) {
    return { state: 'done', scenarioId: latestDone.scenarioId, finishedAt: latestDone.finishedAt };
  }
  return { state: 'idle' };
}

export class RunStateStore {
  constructor(
    private readonly store: ArtifactStore,
    private readonly isAlive: LivenessCheck,
  ) {}

  async readMarker(scope: MarkerScope): Promise<RunMarker | null> {
    const text = await this.store.read(runningPath(scope));
    if (text === null) return null;
    return parseRunMarker(text, scope === 'host' ? 'unknown' : scope.scenarioId);
  }

  /**
   * Whether the marker's process is alive
   */
  async isLive(marker: RunMarker | null): Promise<boolean> {
    if (!marker || marker.pid === null) return false;
    return this.isAlive(marker.pid);
  }

  /**
   * Write a RUNNING marker. Fails when a live process already holds the
   * scope; a stale marker is replaced, and so is one held by `adoptPid`
   * (the launcher that started the claiming process).
   */
  async claim(scope: MarkerScope, marker: RunMarker, adoptPid: number | null = null): Promise<void> {
    const existing = await this.readMarker(scope);
    const adoptable = existing !== null && adoptPid !== null && existing.pid === adoptPid;
    if (existing && existing.pid !== marker.pid && !adoptable && (await this.isLive(existing))) {
      throw RunError.alreadyRunning(existing.scenarioId, existing.pid);
    }
    await this.store.write(runningPath(scope), serializeRunMarker(marker));
  }

  /**
   * Record the pid of a marker written before its process existed.
   * Returns false when the marker is gone or belongs to another process.
   */
  async bind(scope: MarkerScope, pid: number): Promise<boolean> {
    const existing = await this.readMarker(scope);
    if (!existing || (existing.pid !== null && existing.pid !== pid)) {
      return false;
    }
    await this.store.write(runningPath(scope), serializeRunMarker({ ...existing, pid }));
    return true;
  }

  /**
   * Remove a RUNNING marker. With a pid, only a marker held by that pid
   * (or by no pid) is removed.
   */
  async release(scope: MarkerScope, pid?: number): Promise<void> {
    const existing = await this.readMarker(scope);
    if (!existing) return;
    if (pid !== undefined && existing.pid !== null && existing.pid !== pid) return;
    await this.store.remove(runningPath(scope));
  }

  async markDone(scenarioId: string, finishedAt: Date): Promise<void> {
    await this.store.write(joinArtifactPath(scenarioId, DONE_MARKER), `${finishedAt.toISOString()}\n`);
  }

  async readDone(scenarioId: string): Promise<DoneMarker | null> {
    const finishedAt = parseTimestampMarker(await this.store.read(joinArtifactPath(scenarioId, DONE_MARKER)));
    return finishedAt ? { scenarioId, finishedAt } : null;
  }

  async clearDone(scenarioId: string): Promise<void> {
    await this.store.remove(joinArtifactPath(scenarioId, DONE_MARKER));
  }

  async markAllDone(finishedAt: Date): Promise<void> {
    await this.store.write(ALL_DONE_MARKER, `${finishedAt.toISOString()}\n`);
  }

  async readAllDone(): Promise<Date | null> {
    return parseTimestampMarker(await this.store.read(ALL_DONE_MARKER));
  }

  async clearAllDone(): Promise<void> {
    await this.store.remove(ALL_DONE_MARKER);
  }

  /**
   * Most recent DONE marker across all scenario directories
   */
  async latestDone(): Promise<DoneMarker | null> {
    let latest: DoneMarker | null = null;
    for (const scenarioId of await this.store.listDirectories()) {
      const done = await this.readDone(scenarioId);
      if (done && (!latest || done.finishedAt.getTime() > latest.finishedAt.getTime())) {
        latest = done;
      }
    }
    return latest;
  }

  /**
   * Current state of the host
   */
  async resolve(): Promise<RunState> {
    const marker = await this.readMarker('host');
    const alive = await this.isLive(marker);
    const latestDone = marker ? null : await this.latestDone();
    return deriveRunState(marker, alive, latestDone);
  }
}
