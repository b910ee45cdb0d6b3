/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration, with cross-field
 * validation where sections constrain each other.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { Fraction, NonNegativeInteger, PositiveInteger } from './common.js';

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  name: z.string().min(1, 'Logger name cannot be empty'),
});

/**
 * Router Configuration
 */
export const RouterConfigSchema = z
  .object({
    strategy: z.enum(['cost-optimized', 'performance-optimized', 'balanced']),
    hash_key: z.enum(['request_id', 'user_id', 'session_id']),
    load_threshold: Fraction,
    default_latency_ms: z.number().positive('must be positive'),
    balanced_weights: z.object({
      cost: z.number().min(0, 'must be >= 0'),
      latency: z.number().min(0, 'must be >= 0'),
      load: z.number().min(0, 'must be >= 0'),
    }),
  })
  .refine(
    (data) =>
      data.balanced_weights.cost + data.balanced_weights.latency + data.balanced_weights.load > 0,
    {
      message: 'at least one balanced weight must be positive',
      path: ['balanced_weights'],
    }
  );

/**
 * Metrics Collector Configuration
 */
export const MetricsConfigSchema = z.object({
  retention_ms: PositiveInteger,
  capacity_per_endpoint: PositiveInteger,
  latency_ewma_alpha: z.number().gt(0, 'must be > 0').max(1, 'must be <= 1'),
});

/**
 * Canary Controller Configuration
 */
export const CanaryConfigSchema = z.object({
  evaluation_interval_ms: PositiveInteger,
  min_sample_count: PositiveInteger,
  max_deferrals: PositiveInteger,
  drain_grace_ms: NonNegativeInteger,
  zero_baseline_error_rate: Fraction,
  zero_baseline_latency_ms: z.number().positive('must be positive'),
});

/**
 * Blue-Green Controller Configuration
 */
export const BlueGreenConfigSchema = z
  .object({
    rollback_window_ms: PositiveInteger,
    check_interval_ms: PositiveInteger,
    error_rate_threshold: Fraction,
    min_sample_count: PositiveInteger,
    drain_grace_ms: NonNegativeInteger,
  })
  .refine((data) => data.check_interval_ms <= data.rollback_window_ms, {
    message: 'must be <= rollback_window_ms',
    path: ['check_interval_ms'],
  });

/**
 * Performance Optimizer Configuration
 */
export const OptimizerConfigSchema = z
  .object({
    baseline_window_ms: PositiveInteger,
    analysis_window_ms: PositiveInteger,
    tolerance: z.number().min(0, 'must be >= 0'),
    latency_sla_ms: z.number().positive('must be positive'),
    min_sample_count: PositiveInteger,
  })
  .refine((data) => data.analysis_window_ms <= data.baseline_window_ms, {
    message: 'must be <= baseline_window_ms',
    path: ['analysis_window_ms'],
  });

/**
 * Durable state persistence
 */
export const PersistenceConfigSchema = z.object({
  enabled: z.boolean(),
  directory: z.string().min(1, 'Directory cannot be empty'),
});

/**
 * Telemetry Configuration
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: z
    .number()
    .int()
    .min(1024, 'Prometheus port must be >= 1024')
    .max(65535, 'Prometheus port must be <= 65535'),
});

/**
 * Runtime Configuration Schema (Base)
 *
 * Defines the complete structure for runtime.yaml
 */
const RuntimeConfigSchemaBase = z.object({
  logging: LoggingConfigSchema,
  router: RouterConfigSchema,
  metrics: MetricsConfigSchema,
  canary: CanaryConfigSchema,
  blue_green: BlueGreenConfigSchema,
  optimizer: OptimizerConfigSchema,
  persistence: PersistenceConfigSchema,
  telemetry: TelemetryConfigSchema,
});

/**
 * Runtime Configuration Schema with Environments
 *
 * Environment sections are deep-merged over the base before validation,
 * so they are only checked for shape here.
 */
export const RuntimeConfigSchema = RuntimeConfigSchemaBase.extend({
  environments: z
    .object({
      production: z.record(z.unknown()).optional(),
      development: z.record(z.unknown()).optional(),
      test: z.record(z.unknown()).optional(),
    })
    .optional(),
}).refine((data) => data.metrics.retention_ms >= data.optimizer.baseline_window_ms, {
  message: 'must be >= optimizer.baseline_window_ms',
  path: ['metrics', 'retention_ms'],
});

/**
 * Type inference for RuntimeConfig
 */
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
