import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getConfig,
  getRuntimeOptions,
  initializeConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import { ValidationError } from '../../../src/api/errors.js';

describe('Config Loader', () => {
  let directory: string;
  const savedLogLevel = process.env.ROLLOUT_LOG_LEVEL;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'rollout-config-'));
    delete process.env.ROLLOUT_LOG_LEVEL;
    resetConfig();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
    if (savedLogLevel === undefined) {
      delete process.env.ROLLOUT_LOG_LEVEL;
    } else {
      process.env.ROLLOUT_LOG_LEVEL = savedLogLevel;
    }
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should load config/runtime.yaml from the package root', () => {
      const config = loadConfig(undefined, 'development');

      expect(config.logging.level).toBe('debug');
      expect(config.router.strategy).toBe('balanced');
      expect(config.canary.min_sample_count).toBe(100);
      expect(config.environments).toBeUndefined();
    });

    it('should merge the production section over the base', () => {
      const config = loadConfig(undefined, 'production');

      expect(config.logging.level).toBe('warn');
      expect(config.persistence.enabled).toBe(true);
      expect(config.persistence.directory).toBe('.rollout-state');
      expect(config.telemetry.enabled).toBe(true);
    });

    it('should merge nested test overrides without dropping siblings', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.canary.min_sample_count).toBe(10);
      expect(config.canary.max_deferrals).toBe(3);
      expect(config.blue_green.rollback_window_ms).toBe(5000);
      expect(config.blue_green.error_rate_threshold).toBe(0.05);
    });

    it('should let ROLLOUT_LOG_LEVEL override the file', () => {
      process.env.ROLLOUT_LOG_LEVEL = 'error';

      expect(loadConfig(undefined, 'production').logging.level).toBe('error');
    });

    it('should reject an invalid ROLLOUT_LOG_LEVEL', () => {
      process.env.ROLLOUT_LOG_LEVEL = 'verbose';

      expect(() => loadConfig(undefined, 'development')).toThrow(ValidationError);
    });

    it('should report a missing file', () => {
      const path = join(directory, 'missing.yaml');

      expect(() => loadConfig(path)).toThrow(`Configuration file not found: ${path}`);
    });

    it('should reject a file that is not a mapping', async () => {
      const path = join(directory, 'list.yaml');
      await writeFile(path, yaml.dump(['a', 'b']), 'utf8');

      expect(() => loadConfig(path)).toThrow(`Configuration file ${path} must contain a mapping`);
    });

    it('should load a custom file', async () => {
      const base = loadConfig(undefined, 'development');
      const path = join(directory, 'custom.yaml');
      await writeFile(
        path,
        yaml.dump({ ...base, router: { ...base.router, strategy: 'cost-optimized' } }),
        'utf8'
      );

      expect(loadConfig(path, 'development').router.strategy).toBe('cost-optimized');
    });
  });

  describe('validateConfig', () => {
    it('should reject a check interval longer than the rollback window', () => {
      const base = loadConfig(undefined, 'development');

      expect(() =>
        validateConfig({ ...base, blue_green: { ...base.blue_green, check_interval_ms: 700000 } })
      ).toThrow('blue_green.check_interval_ms must be <= rollback_window_ms');
    });

    it('should reject a retention shorter than the optimizer baseline', () => {
      const base = loadConfig(undefined, 'development');

      expect(() =>
        validateConfig({ ...base, metrics: { ...base.metrics, retention_ms: 60000 } })
      ).toThrow('metrics.retention_ms must be >= optimizer.baseline_window_ms');
    });

    it('should reject a missing section', () => {
      const withoutRouter: Record<string, unknown> = { ...loadConfig(undefined, 'development') };
      delete withoutRouter.router;

      expect(() => validateConfig(withoutRouter)).toThrow(ValidationError);
    });
  });

  describe('global configuration', () => {
    it('should cache the initialized config', () => {
      const config = initializeConfig(undefined, 'test');

      expect(getConfig()).toBe(config);
    });
  });

  describe('getRuntimeOptions', () => {
    it('should convert snake_case sections to component options', () => {
      const options = getRuntimeOptions(loadConfig(undefined, 'development'));

      expect(options.router).toEqual({
        strategy: 'balanced',
        hashKey: 'requestId',
        loadThreshold: 0.8,
        defaultLatencyMs: 1000,
        balancedWeights: { cost: 0.4, latency: 0.4, load: 0.2 },
      });
      expect(options.blueGreen).toEqual({
        rollbackWindowMs: 600000,
        checkIntervalMs: 30000,
        errorRateThreshold: 0.05,
        minSampleCount: 20,
        drainGraceMs: 30000,
      });
      expect(options.optimizer.zeroBaselineErrorRate).toBe(0.01);
      expect(options.optimizer.zeroBaselineLatencyMs).toBe(1000);
    });
  });
});
