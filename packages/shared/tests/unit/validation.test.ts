/**
 * Unit tests for validation module
 */

import { describe, it, expect } from 'vitest';

import {
  validateScenarioId,
  validateLoadSize,
  validateDurationMs,
  validateScenarioSpec,
  validateSoakInput,
  resolveConfig,
  validateConfig,
} from '../../src/validation';
import { DEFAULT_CONFIG } from '../../src/types';

const validSpec = {
  id: 'R2',
  endpointClass: 'scrape',
  loadSize: 100,
  jobSet: 'node+cluster',
  jitterMs: 0,
  pollIntervalMs: 30_000,
  durationMs: 1_200_000,
  purpose: 'Baseline',
  podMultiplier: 1,
};

describe('Scenario Validation', () => {
  describe('validateScenarioId', () => {
    it('should accept ids starting with a letter', () => {
      expect(validateScenarioId('R2')).toBeNull();
      expect(validateScenarioId('soak_150-b')).toBeNull();
    });

    it('should reject missing ids', () => {
      expect(validateScenarioId(undefined)?.code).toBe('REQUIRED');
      expect(validateScenarioId('')?.code).toBe('REQUIRED');
    });

    it('should reject non-string ids', () => {
      expect(validateScenarioId(7)?.code).toBe('INVALID_TYPE');
    });

    it('should reject ids with a leading digit or spaces', () => {
      expect(validateScenarioId('2R')?.code).toBe('INVALID_FORMAT');
      expect(validateScenarioId('R 2')?.code).toBe('INVALID_FORMAT');
    });

    it('should reject ids longer than 32 characters', () => {
      expect(validateScenarioId(`R${'x'.repeat(31)}`)).toBeNull();
      expect(validateScenarioId(`R${'x'.repeat(32)}`)?.code).toBe('INVALID_FORMAT');
    });
  });

  describe('validateLoadSize', () => {
    it('should accept zero and positive integers', () => {
      expect(validateLoadSize(0)).toBeNull();
      expect(validateLoadSize(1000)).toBeNull();
    });

    it('should reject fractions and negative sizes', () => {
      expect(validateLoadSize(1.5)).toEqual({ field: 'loadSize', message: 'Load size must be an integer', code: 'INVALID_TYPE' });
      expect(validateLoadSize(-1)?.code).toBe('OUT_OF_RANGE');
      expect(validateLoadSize('10', 'size')?.field).toBe('size');
    });
  });

  describe('validateDurationMs', () => {
    it('should require a positive finite number', () => {
      expect(validateDurationMs(1)).toBeNull();
      expect(validateDurationMs(0)?.code).toBe('OUT_OF_RANGE');
      expect(validateDurationMs(Number.POSITIVE_INFINITY)?.code).toBe('INVALID_TYPE');
    });
  });

  describe('validateScenarioSpec', () => {
    it('should accept a complete scenario', () => {
      expect(validateScenarioSpec(validSpec)).toEqual({ valid: true, errors: [] });
    });

    it('should reject a non-object', () => {
      const report = validateScenarioSpec('R2');
      expect(report.valid).toBe(false);
      expect(report.errors[0]?.field).toBe('input');
    });

    it('should report every invalid field', () => {
      const report = validateScenarioSpec({ ...validSpec, endpointClass: 'udp', jobSet: 'gpu', podMultiplier: 0 });

      expect(report.errors.map((issue) => issue.field)).toEqual(['endpointClass', 'jobSet', 'podMultiplier']);
    });

    it('should reject a poll interval longer than the duration', () => {
      const report = validateScenarioSpec({ ...validSpec, pollIntervalMs: 60_000, durationMs: 30_000 });

      expect(report.errors).toEqual([
        {
          field: 'pollIntervalMs',
          message: 'Poll interval cannot exceed the scenario duration',
          code: 'CONSTRAINT_VIOLATION',
        },
      ]);
    });

    it('should reject negative jitter', () => {
      expect(validateScenarioSpec({ ...validSpec, jitterMs: -5 }).errors[0]?.field).toBe('jitterMs');
    });
  });

  describe('validateSoakInput', () => {
    it('should name the soak arguments', () => {
      const report = validateSoakInput(-1, 0);

      expect(report.errors.map((issue) => issue.field)).toEqual(['size', 'duration']);
    });
  });
});

describe('Config Validation', () => {
  describe('resolveConfig', () => {
    it('should return the defaults without layers', () => {
      expect(resolveConfig([])).toEqual({ config: DEFAULT_CONFIG, issues: [] });
    });

    it('should let later layers win', () => {
      const { config, issues } = resolveConfig([
        { source: 'file', values: { prometheus: { url: 'http://prom:9090' }, timing: { settleMs: 1000 } } },
        { source: 'env', values: { prometheus: { url: 'http://other:9090' } } },
      ]);

      expect(issues).toEqual([]);
      expect(config.prometheus.url).toBe('http://other:9090');
      expect(config.prometheus.queryTimeoutMs).toBe(10_000);
      expect(config.timing.settleMs).toBe(1000);
    });

    it('should coerce string values from the environment', () => {
      const { config } = resolveConfig([
        {
          source: 'env',
          values: {
            timing: { stopThresholdPct: '90' },
            pushgateway: { wipeOnDrain: 'false' },
            targets: { emitters: 'node-exporter, gpu-exporter' },
          },
        },
      ]);

      expect(config.timing.stopThresholdPct).toBe(90);
      expect(config.pushgateway.wipeOnDrain).toBe(false);
      expect(config.targets.emitters).toEqual(['node-exporter', 'gpu-exporter']);
    });

    it('should report mismatched types and keep the previous value', () => {
      const { config, issues } = resolveConfig([
        { source: 'config.json', values: { timing: { settleMs: 'soon' }, host: { kind: 'vm' }, logLevel: 'loud' } },
      ]);

      expect(config.timing.settleMs).toBe(90_000);
      expect(config.host.kind).toBe('pod');
      expect(config.logLevel).toBe('info');
      expect(issues).toEqual([
        { field: 'logLevel', message: 'config.json: unknown log level', code: 'INVALID_VALUE' },
        { field: 'host.kind', message: 'config.json: expected "pod" or "local"', code: 'INVALID_VALUE' },
        { field: 'timing.settleMs', message: 'config.json: expected a number', code: 'INVALID_TYPE' },
      ]);
    });

    it('should reject a layer that is not an object', () => {
      const { config, issues } = resolveConfig([{ source: 'flags', values: ['x'] }]);

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(issues).toEqual([{ field: 'config', message: 'flags: expected an object', code: 'INVALID_TYPE' }]);
    });

    it('should allow clearing the host manifest', () => {
      const { config } = resolveConfig([
        { source: 'file', values: { host: { manifestPath: 'runner.yaml' } } },
        { source: 'flags', values: { host: { manifestPath: null } } },
      ]);

      expect(config.host.manifestPath).toBeNull();
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG).valid).toBe(true);
    });

    it('should reject unusable values', () => {
      const report = validateConfig({
        ...DEFAULT_CONFIG,
        prometheus: { ...DEFAULT_CONFIG.prometheus, url: 'ftp://prom' },
        timing: { ...DEFAULT_CONFIG.timing, stopThresholdPct: 120, stopConsecutive: 0 },
      });

      expect(report.errors.map((issue) => issue.field)).toEqual([
        'prometheus.url',
        'timing.stopThresholdPct',
        'timing.stopConsecutive',
      ]);
    });

    it('should reject an unparsable URL', () => {
      const report = validateConfig({
        ...DEFAULT_CONFIG,
        pushgateway: { ...DEFAULT_CONFIG.pushgateway, ingressEndpoint: 'not a url' },
      });

      expect(report.errors).toEqual([
        { field: 'pushgateway.ingressEndpoint', message: 'Invalid URL: not a url', code: 'INVALID_FORMAT' },
      ]);
    });
  });
});
