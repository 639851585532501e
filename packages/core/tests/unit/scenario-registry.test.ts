/**
 * Unit tests for the scenario registry
 * @module @loadramp/core/tests/unit/scenario-registry
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@loadramp/shared';

import { ScenarioRegistry } from '../../src/services/scenario-registry';
import { SUITES } from '../../src/models/scenario-catalog';
import { scenario } from '../helpers/fakes';

describe('ScenarioRegistry', () => {
  const registry = new ScenarioRegistry();

  describe('built-in catalog', () => {
    it('lists the scrape ramp in declared order', () => {
      expect(registry.suite('scrape')).toEqual(['R0', 'R1', 'R2', 'R3', 'R4']);
      expect(SUITES.scrape.map((id) => registry.require(id).loadSize)).toEqual([10, 50, 100, 200, 250]);
    });

    it('holds every push scenario at a 60s interval', () => {
      const push = registry.suite('push');

      expect(push).toHaveLength(22);
      expect(push.every((id) => registry.require(id).pollIntervalMs === 60_000)).toBe(true);
    });

    it('describes one scenario', () => {
      expect(registry.require('R2')).toMatchObject({
        id: 'R2',
        endpointClass: 'scrape',
        loadSize: 100,
        durationMs: 30 * 60_000,
        pollIntervalMs: 30_000,
      });
    });

    it('lists scenarios with their expected targets', () => {
      const r0 = registry.list().find((listing) => listing.id === 'R0');

      expect(r0).toEqual({
        id: 'R0',
        endpointClass: 'scrape',
        loadSize: 10,
        expectedTargets: 40,
        durationMs: 15 * 60_000,
        purpose: 'Sanity baseline',
      });
    });

    it('knows its suites', () => {
      expect(registry.suiteNames()).toEqual(['scrape', 'push']);
      expect(() => registry.suite('chaos')).toThrow('Validation failed for field: suite');
    });
  });

  describe('lookup', () => {
    it('returns undefined for an unknown id', () => {
      expect(registry.lookup('Z9')).toBeUndefined();
      expect(registry.has('Z9')).toBe(false);
    });

    it('throws a not-found error naming the known ids', () => {
      expect(() => registry.require('Z9')).toThrow(expect.objectContaining({ code: ErrorCode.SCENARIO_NOT_FOUND }));
    });
  });

  describe('expectedTargets', () => {
    it('multiplies scrape load by the emitters per node', () => {
      expect(registry.expectedTargets(registry.require('R3'))).toBe(800);
      expect(new ScenarioRegistry({ emitterCount: 2 }).expectedTargets(registry.require('R3'))).toBe(400);
    });

    it('counts pushes per cycle for each job category', () => {
      expect(registry.expectedTargets(registry.require('C1'))).toBe(401);
      expect(registry.expectedTargets(registry.require('N1'))).toBe(4000);
      expect(registry.expectedTargets(registry.require('P3'))).toBe(1);
    });
  });

  describe('soak', () => {
    it('overlays size and duration on the base scenario', () => {
      const soak = registry.soak(150, 6 * 3_600_000);

      expect(soak).toMatchObject({
        id: 'R5',
        endpointClass: 'scrape',
        loadSize: 150,
        durationMs: 21_600_000,
        pollIntervalMs: 30_000,
        soak: true,
        purpose: 'Soak at 150 for 6h',
      });
    });

    it('rejects a negative size or a zero duration', () => {
      expect(() => registry.soak(-1, 60_000)).toThrow(expect.objectContaining({ code: ErrorCode.VALIDATION_FAILED }));
      expect(() => registry.soak(10, 0)).toThrow(expect.objectContaining({ code: ErrorCode.VALIDATION_FAILED }));
    });
  });

  describe('custom catalogs', () => {
    it('rejects duplicate ids', () => {
      expect(() => new ScenarioRegistry({ scenarios: [scenario({ id: 'A1' }), scenario({ id: 'A1' })] })).toThrow(
        'Duplicate scenario id: A1',
      );
    });

    it('rejects a poll interval longer than the duration', () => {
      expect(
        () => new ScenarioRegistry({ scenarios: [scenario({ id: 'A1', pollIntervalMs: 60_000, durationMs: 30_000 })] }),
      ).toThrow(expect.objectContaining({ code: ErrorCode.VALIDATION_FAILED }));
    });

    it('rejects an id that does not start with a letter', () => {
      expect(() => new ScenarioRegistry({ scenarios: [scenario({ id: '1A' })] })).toThrow(
        expect.objectContaining({ code: ErrorCode.VALIDATION_FAILED }),
      );
    });
  });
});
