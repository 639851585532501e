/**
 * Unit tests for detached execution
 * @module @loadramp/core/tests/unit/detached-controller
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode } from '@loadramp/shared';

import { DetachedController, jobArgs, logPathFor } from '../../src/services/detached-controller';
import { ScenarioRegistry } from '../../src/services/scenario-registry';
import { FakeExecutionHost, FakeWatcherLauncher, T0, VirtualClock } from '../helpers/fakes';

describe('logPathFor', () => {
  it('writes a scenario run log inside its folder', () => {
    expect(logPathFor('R2')).toBe('R2/run.log');
  });

  it('writes the suite output at the results root', () => {
    expect(logPathFor('ALL')).toBe('run_all_output.log');
  });
});

describe('jobArgs', () => {
  it('passes every suite option to the job command', () => {
    expect(
      jobArgs('ALL', { suite: 'push', resumeFrom: 'C2', withSoak: true, soakSize: 500, soakDurationMs: 7_200_000 }),
    ).toEqual(['job', 'ALL', '--suite', 'push', '--from', 'C2', '--with-soak', '--size', '500', '--duration', '7200s']);
  });

  it('runs a single scenario with no options', () => {
    expect(jobArgs('R0')).toEqual(['job', 'R0']);
  });
});

describe('DetachedController', () => {
  let host: FakeExecutionHost;
  let watcher: FakeWatcherLauncher;
  let controller: DetachedController;

  beforeEach(() => {
    host = new FakeExecutionHost();
    watcher = new FakeWatcherLauncher();
    controller = new DetachedController({
      host,
      registry: new ScenarioRegistry(),
      watcher,
      localResultsDir: '/tmp/loadramp-results',
      clock: new VirtualClock(),
    });
  });

  describe('launch', () => {
    it('starts the job in the background and hands off to the watcher', async () => {
      const result = await controller.launch('R2');

      expect(result).toEqual({
        target: 'R2',
        detached: true,
        pid: 5150,
        watcherPid: 777,
        logPath: 'R2/run.log',
        exitCode: null,
      });
      expect(host.spawned).toEqual([{ args: ['job', 'R2'], logPath: 'R2/run.log' }]);
      expect(watcher.launches).toEqual([{ target: 'R2', launchedAt: new Date(T0) }]);
    });

    it('records the job pid in the host marker', async () => {
      await controller.launch('R2');

      expect(host.files.get('RUNNING')).toBe('{"scenarioId":"R2","pid":5150,"startedAt":"2026-01-05T10:00:00.000Z"}\n');
    });

    it('refuses a second launch while the first is alive', async () => {
      await controller.launch('R2');

      await expect(controller.launch('R3')).rejects.toMatchObject({ code: ErrorCode.RUN_ALREADY_ACTIVE });
      expect(host.spawned).toHaveLength(1);
    });

    it('launches over a marker whose process has died', async () => {
      await controller.launch('R2');
      host.live.delete(5150);
      host.nextPid = 6000;

      const result = await controller.launch('R3');

      expect(result.pid).toBe(6000);
      expect(await controller.status()).toMatchObject({ state: 'running', scenarioId: 'R3', pid: 6000 });
    });

    it('removes the marker when the job cannot be spawned', async () => {
      host.spawnError = new Error('exec failed');

      await expect(controller.launch('R2')).rejects.toMatchObject({
        code: ErrorCode.HOST_COMMAND_FAILED,
        message: 'Command failed on fake-host: job R2: exec failed',
      });
      expect(host.files.has('RUNNING')).toBe(false);
      expect(watcher.launches).toEqual([]);
    });

    it('reports an unavailable host', async () => {
      host.ready = false;

      await expect(controller.launch('R2')).rejects.toMatchObject({
        code: ErrorCode.HOST_UNAVAILABLE,
        message: 'Execution host unavailable: fake-host: pod not scheduled',
      });
    });

    it('rejects unknown targets before touching the host', async () => {
      host.ready = false;

      await expect(controller.launch('Z9')).rejects.toMatchObject({ code: ErrorCode.SCENARIO_NOT_FOUND });
    });

    it('needs a size and a duration for the soak target', async () => {
      await expect(controller.launch('R5')).rejects.toMatchObject({ code: ErrorCode.VALIDATION_FAILED });

      const result = await controller.launch('R5', { soakSize: 100, soakDurationMs: 3_600_000 });
      expect(host.spawned[0]?.args).toEqual(['job', 'R5', '--size', '100', '--duration', '3600s']);
      expect(result.logPath).toBe('R5/run.log');
    });

    it('launches the whole suite', async () => {
      const result = await controller.launch('ALL', { suite: 'push', skipSoak: true });

      expect(host.spawned).toEqual([
        { args: ['job', 'ALL', '--suite', 'push', '--skip-soak'], logPath: 'run_all_output.log' },
      ]);
      expect(result.logPath).toBe('run_all_output.log');
    });

    it('runs attached, then copies the results', async () => {
      host.attachedExitCode = 130;

      const result = await controller.launch('R2', { detach: false });

      expect(result).toEqual({
        target: 'R2',
        detached: false,
        pid: null,
        watcherPid: null,
        logPath: 'R2/run.log',
        exitCode: 130,
      });
      expect(host.attached).toEqual([['job', 'R2']]);
      expect(host.copies).toEqual([{ path: 'R2', localDir: '/tmp/loadramp-results/R2' }]);
      expect(host.files.has('RUNNING')).toBe(false);
    });
  });

  describe('status', () => {
    it('is idle on a fresh host', async () => {
      expect(await controller.status()).toEqual({ state: 'idle' });
    });

    it('is running while the recorded pid is alive', async () => {
      await controller.launch('R2');

      expect(await controller.status()).toEqual({
        state: 'running',
        scenarioId: 'R2',
        pid: 5150,
        startedAt: new Date(T0),
      });
    });

    it('is finished when the process died without clearing its marker', async () => {
      await controller.launch('R2');
      host.live.delete(5150);

      expect(await controller.status()).toMatchObject({ state: 'finished', scenarioId: 'R2', pid: 5150 });
    });

    it('is done with the most recent completion when no marker exists', async () => {
      host.files.set('R0/DONE', '2026-01-05T08:00:00.000Z\n');
      host.files.set('R1/DONE', '2026-01-05T09:00:00.000Z\n');

      expect(await controller.status()).toEqual({
        state: 'done',
        scenarioId: 'R1',
        finishedAt: new Date('2026-01-05T09:00:00.000Z'),
      });
    });
  });

  describe('results and logs', () => {
    it('copies one scenario folder or the whole results root', async () => {
      expect(await controller.fetchResults('R1')).toBe('/tmp/loadramp-results/R1');
      expect(await controller.fetchResults()).toBe('/tmp/loadramp-results');
      expect(host.copies).toEqual([
        { path: 'R1', localDir: '/tmp/loadramp-results/R1' },
        { path: '', localDir: '/tmp/loadramp-results' },
      ]);
    });

    it('wraps a failed copy', async () => {
      host.copyError = new Error('tar: broken pipe');

      await expect(controller.fetchResults('R1')).rejects.toMatchObject({
        code: ErrorCode.RESULTS_COPY_FAILED,
        message: 'Failed to copy results of R1: tar: broken pipe',
      });
    });

    it('follows the log of whatever the host is running', async () => {
      await controller.launch('R3');

      await controller.followLogs();
      await controller.followLogs('R1');

      expect(host.followed).toEqual(['R3/run.log', 'R1/run.log']);
    });

    it('follows the suite log when nothing is running', async () => {
      await controller.followLogs();

      expect(host.followed).toEqual(['run_all_output.log']);
    });
  });

  describe('cleanup', () => {
    it('refuses while a run is live unless forced', async () => {
      await controller.launch('R2');

      await expect(controller.cleanup()).rejects.toMatchObject({ code: ErrorCode.RUN_ALREADY_ACTIVE });
      expect(host.destroyed).toBe(false);

      await controller.cleanup(true);
      expect(host.destroyed).toBe(true);
    });
  });
});
