/**
 * Run-specific error class
 * @module @loadramp/shared/errors/run-error
 */

import { LoadRampError, ErrorCode } from './base-error.js';
import type { ErrorMeta } from './base-error.js';

export class RunError extends LoadRampError {
  public readonly scenarioId?: string;

  constructor(message: string, code: ErrorCode = ErrorCode.RUN_FAILED, meta: ErrorMeta = {}, cause?: Error) {
    super(message, code, meta, cause);
    this.name = 'RunError';
    this.scenarioId = meta.scenarioId;
  }

  static scenarioNotFound(scenarioId: string, known: string[] = []): RunError {
    const hint = known.length > 0 ? ` (known: ${known.join(', ')})` : '';
    return new RunError(`Scenario not found: ${scenarioId}${hint}`, ErrorCode.SCENARIO_NOT_FOUND, { scenarioId });
  }

  static alreadyRunning(scenarioId: string, pid: number | null): RunError {
    const holder = pid === null ? '' : ` (pid ${pid})`;
    return new RunError(`A run is already active: ${scenarioId}${holder}`, ErrorCode.RUN_ALREADY_ACTIVE, {
      scenarioId,
      pid,
    });
  }

  static applyFailed(size: number, cause?: Error): RunError {
    const reason = cause ? `: ${cause.message}` : '';
    return new RunError(`Failed to apply load of size ${size}${reason}`, ErrorCode.LOAD_APPLY_FAILED, { size }, cause);
  }

  static hostUnavailable(host: string, cause?: Error): RunError {
    const reason = cause ? `: ${cause.message}` : '';
    return new RunError(`Execution host unavailable: ${host}${reason}`, ErrorCode.HOST_UNAVAILABLE, { host }, cause);
  }

  static hostCommandFailed(host: string, command: string, detail: string): RunError {
    return new RunError(`Command failed on ${host}: ${command}: ${detail}`, ErrorCode.HOST_COMMAND_FAILED, {
      host,
      command,
    });
  }

  static cancelled(scenarioId: string, reason?: string): RunError {
    const suffix = reason ? `: ${reason}` : '';
    return new RunError(`Run cancelled: ${scenarioId}${suffix}`, ErrorCode.RUN_CANCELLED, { scenarioId });
  }
}

export function isRunError(error: unknown): error is RunError {
  return error instanceof RunError;
}
