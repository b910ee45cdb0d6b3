/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import { ValidationError } from '../api/errors.js';

export type { RuntimeConfig };

export type ConfigEnvironment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  if (env === 'production' || env === 'test') {
    return env;
  }
  return 'development';
}

/**
 * Load configuration from YAML file
 *
 * The environment section is merged over the base, `ROLLOUT_LOG_LEVEL` is
 * applied last, and the result is validated.
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): RuntimeConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw new ValidationError(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`,
        { field: 'configPath', path: finalPath }
      );
    }
    throw new ValidationError(
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
      { field: 'configPath', path: finalPath }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`Configuration file ${finalPath} must contain a mapping`, {
      field: 'root',
    });
  }

  const env = resolveEnvironment(environment);
  let merged = parsed;
  const environments = parsed.environments;
  if (isPlainObject(environments)) {
    const envConfig = environments[env];
    if (isPlainObject(envConfig)) {
      merged = deepMerge(parsed, envConfig);
    }
  }

  // Remove environments section from final config
  const withoutEnvironments: PlainObject = { ...merged };
  delete withoutEnvironments.environments;

  const logLevel = process.env.ROLLOUT_LOG_LEVEL;
  const finalConfig =
    logLevel && isPlainObject(withoutEnvironments.logging)
      ? { ...withoutEnvironments, logging: { ...withoutEnvironments.logging, level: logLevel } }
      : withoutEnvironments;

  return validateConfig(finalConfig);
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ValidationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): RuntimeConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * camelCase options derived from runtime.yaml
 */
export interface RuntimeOptions {
  logging: {
    level: RuntimeConfig['logging']['level'];
    name: string;
  };
  router: {
    strategy: RuntimeConfig['router']['strategy'];
    hashKey: 'requestId' | 'userId' | 'sessionId';
    loadThreshold: number;
    defaultLatencyMs: number;
    balancedWeights: { cost: number; latency: number; load: number };
  };
  metrics: {
    retentionMs: number;
    capacityPerEndpoint: number;
    latencyEwmaAlpha: number;
  };
  canary: {
    evaluationIntervalMs: number;
    minSampleCount: number;
    maxDeferrals: number;
    drainGraceMs: number;
    zeroBaselineErrorRate: number;
    zeroBaselineLatencyMs: number;
  };
  blueGreen: {
    rollbackWindowMs: number;
    checkIntervalMs: number;
    errorRateThreshold: number;
    minSampleCount: number;
    drainGraceMs: number;
  };
  optimizer: {
    baselineWindowMs: number;
    analysisWindowMs: number;
    tolerance: number;
    latencySlaMs: number;
    minSampleCount: number;
    zeroBaselineErrorRate: number;
    zeroBaselineLatencyMs: number;
  };
  persistence: {
    enabled: boolean;
    directory: string;
  };
  telemetry: {
    enabled: boolean;
    serviceName: string;
    prometheusPort: number;
  };
}

const HASH_KEYS = {
  request_id: 'requestId',
  user_id: 'userId',
  session_id: 'sessionId',
} as const;

/**
 * Convert YAML config (snake_case) to component options (camelCase)
 */
export function getRuntimeOptions(config: RuntimeConfig = getConfig()): RuntimeOptions {
  return {
    logging: {
      level: config.logging.level,
      name: config.logging.name,
    },
    router: {
      strategy: config.router.strategy,
      hashKey: HASH_KEYS[config.router.hash_key],
      loadThreshold: config.router.load_threshold,
      defaultLatencyMs: config.router.default_latency_ms,
      balancedWeights: { ...config.router.balanced_weights },
    },
    metrics: {
      retentionMs: config.metrics.retention_ms,
      capacityPerEndpoint: config.metrics.capacity_per_endpoint,
      latencyEwmaAlpha: config.metrics.latency_ewma_alpha,
    },
    canary: {
      evaluationIntervalMs: config.canary.evaluation_interval_ms,
      minSampleCount: config.canary.min_sample_count,
      maxDeferrals: config.canary.max_deferrals,
      drainGraceMs: config.canary.drain_grace_ms,
      zeroBaselineErrorRate: config.canary.zero_baseline_error_rate,
      zeroBaselineLatencyMs: config.canary.zero_baseline_latency_ms,
    },
    blueGreen: {
      rollbackWindowMs: config.blue_green.rollback_window_ms,
      checkIntervalMs: config.blue_green.check_interval_ms,
      errorRateThreshold: config.blue_green.error_rate_threshold,
      minSampleCount: config.blue_green.min_sample_count,
      drainGraceMs: config.blue_green.drain_grace_ms,
    },
    optimizer: {
      baselineWindowMs: config.optimizer.baseline_window_ms,
      analysisWindowMs: config.optimizer.analysis_window_ms,
      tolerance: config.optimizer.tolerance,
      latencySlaMs: config.optimizer.latency_sla_ms,
      minSampleCount: config.optimizer.min_sample_count,
      // Shares the canary's zero-baseline thresholds
      zeroBaselineErrorRate: config.canary.zero_baseline_error_rate,
      zeroBaselineLatencyMs: config.canary.zero_baseline_latency_ms,
    },
    persistence: {
      enabled: config.persistence.enabled,
      directory: config.persistence.directory,
    },
    telemetry: {
      enabled: config.telemetry.enabled,
      serviceName: config.telemetry.service_name,
      prometheusPort: config.telemetry.prometheus_port,
    },
  };
}
