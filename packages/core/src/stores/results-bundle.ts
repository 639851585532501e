/**
 * Results bundle
 * @module @loadramp/core/stores/results-bundle
 *
 * Per-scenario artifacts under `<results>/<scenarioId>/`:
 *   metrics.csv    one row per poll, fixed columns
 *   health.csv     one row per health sample
 *   monitor.log    health monitor log
 *   monitor.pid    health monitor liveness marker
 *   summary.txt    human readable summary
 *   outcome.json   terminal status used to rebuild the summary
 *   run.log        process output of a detached run
 */

import type { HealthRow, ResultsRow, ScenarioStatus } from '@loadramp/shared';
import {
  HEALTH_HEADER,
  METRIC_COLUMNS,
  RESULTS_HEADER,
  emptyMetricValues,
  formatCsvRow,
  isRecord,
  parseCsv,
  parseJson,
  parseNumericCell,
} from '@loadramp/shared';
import type { ArtifactStore } from './artifact-store';
import { joinArtifactPath } from './artifact-store';

export const BUNDLE_FILES = {
  metrics: 'metrics.csv',
  health: 'health.csv',
  monitorLog: 'monitor.log',
  monitorPid: 'monitor.pid',
  summary: 'summary.txt',
  outcome: 'outcome.json',
  runLog: 'run.log',
} as const;

export type BundleFile = keyof typeof BUNDLE_FILES;

/**
 * Terminal facts of a run, kept so the summary can be rebuilt
 */
export interface RecordedOutcome {
  status: ScenarioStatus;
  stopReason: string | null;
  startedAt: Date;
  finishedAt: Date;
}

function parseTimestamp(cell: string | undefined): Date | null {
  if (!cell) return null;
  const date = new Date(cell);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function formatResultsRow(row: ResultsRow): string {
  return formatCsvRow([row.timestamp.toISOString(), ...METRIC_COLUMNS.map((column) => row.values[column])]);
}

export function formatHealthRow(row: HealthRow): string {
  return formatCsvRow([row.timestamp.toISOString(), row.cpuMillicores, row.memoryMi, row.restarts]);
}

/**
 * Parse a results table. Rows with an unreadable timestamp are dropped;
 * unreadable cells are absent.
 */
export function parseResultsTable(text: string): ResultsRow[] {
  const { header, rows } = parseCsv(text);
  const rowsOut: ResultsRow[] = [];
  for (const cells of rows) {
    const timestamp = parseTimestamp(cells[0]);
    if (!timestamp) continue;
    const values = emptyMetricValues();
    for (const column of METRIC_COLUMNS) {
      const index = header.indexOf(column);
      values[column] = index < 0 ? null : parseNumericCell(cells[index]);
    }
    rowsOut.push({ timestamp, values });
  }
  return rowsOut;
}

/**
 * Parse a health table. Rows with an unreadable timestamp are dropped.
 */
export function parseHealthTable(text: string): HealthRow[] {
  const { rows } = parseCsv(text);
  const rowsOut: HealthRow[] = [];
  for (const cells of rows) {
    const timestamp = parseTimestamp(cells[0]);
    if (!timestamp) continue;
    rowsOut.push({
      timestamp,
      cpuMillicores: parseNumericCell(cells[1]) ?? 0,
      memoryMi: parseNumericCell(cells[2]) ?? 0,
      restarts: parseNumericCell(cells[3]) ?? 0,
    });
  }
  return rowsOut;
}

export class ResultsBundle {
  constructor(
    private readonly store: ArtifactStore,
    readonly scenarioId: string,
  ) {}

  /**
   * Artifact path of one bundle file
   */
  path(file: BundleFile): string {
    return joinArtifactPath(this.scenarioId, BUNDLE_FILES[file]);
  }

  /**
   * Remove the artifacts of a previous run of the same scenario
   */
  async reset(): Promise<void> {
    for (const file of ['metrics', 'health', 'monitorLog', 'monitorPid', 'summary', 'outcome'] as const) {
      await this.store.remove(this.path(file));
    }
  }

  async appendResultsRow(row: ResultsRow): Promise<void> {
    await this.appendRow('metrics', RESULTS_HEADER, formatResultsRow(row));
  }

  async appendHealthRow(row: HealthRow): Promise<void> {
    await this.appendRow('health', HEALTH_HEADER, formatHealthRow(row));
  }

  private async appendRow(file: BundleFile, header: readonly string[], line: string): Promise<void> {
    const target = this.path(file);
    if (!(await this.store.exists(target))) {
      await this.store.write(target, `${formatCsvRow(header)}\n`);
    }
    await this.store.append(target, `${line}\n`);
  }

  async readResultsRows(): Promise<ResultsRow[]> {
    const text = await this.store.read(this.path('metrics'));
    return text === null ? [] : parseResultsTable(text);
  }

  async readHealthRows(): Promise<HealthRow[]> {
    const text = await this.store.read(this.path('health'));
    return text === null ? [] : parseHealthTable(text);
  }

  async latestHealthRow(): Promise<HealthRow | null> {
    const rows = await this.readHealthRows();
    return rows[rows.length - 1] ?? null;
  }

  async appendMonitorLog(text: string): Promise<void> {
    await this.store.append(this.path('monitorLog'), text);
  }

  async writeMonitorMarker(pid: number, startedAt: Date): Promise<void> {
    await this.store.write(this.path('monitorPid'), `${pid} ${startedAt.toISOString()}\n`);
  }

  async hasMonitorMarker(): Promise<boolean> {
    return this.store.exists(this.path('monitorPid'));
  }

  async clearMonitorMarker(): Promise<void> {
    await this.store.remove(this.path('monitorPid'));
  }

  async writeSummary(text: string): Promise<void> {
    await this.store.write(this.path('summary'), text);
  }

  async readSummary(): Promise<string | null> {
    return this.store.read(this.path('summary'));
  }

  async writeOutcome(outcome: RecordedOutcome): Promise<void> {
    await this.store.write(
      this.path('outcome'),
      `${JSON.stringify({
        status: outcome.status,
        stopReason: outcome.stopReason,
        startedAt: outcome.startedAt.toISOString(),
        finishedAt: outcome.finishedAt.toISOString(),
      })}\n`,
    );
  }

  async readOutcome(): Promise<RecordedOutcome | null> {
    const text = await this.store.read(this.path('outcome'));
    if (text === null) return null;
    const value = parseJson(text);
    if (!isRecord(value)) return null;
    const status = value.status;
    const startedAt = parseTimestamp(typeof value.startedAt === 'string' ? value.startedAt : undefined);
    const finishedAt = parseTimestamp(typeof value.finishedAt === 'string' ? value.finishedAt : undefined);
    if (
      (status !== 'completed' && status !== 'stopped-early' && status !== 'failed' && status !== 'cancelled') ||
      !startedAt ||
      !finishedAt
    ) {
      return null;
    }
    return {
      status,
      stopReason: typeof value.stopReason === 'string' ? value.stopReason : null,
      startedAt,
      finishedAt,
    };
  }
}
