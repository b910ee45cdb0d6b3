/**
 * Rollout and registry schemas
 *
 * Validate every rollout configuration and registration before any state
 * changes, and every value read back from the durable store.
 *
 * @module schemas/rollout
 */

import { z } from 'zod';
import type { ModelEndpoint, RegistrySnapshot } from '../endpoints.js';
import type { AggregateWindow } from '../metrics.js';
import type {
  BlueGreenPlan,
  CanaryPlan,
  CriterionResult,
  EvaluationRecord,
  RolloutPlan,
} from '../rollout.js';
import {
  EndpointStateSchema,
  Fraction,
  NonEmptyString,
  NonNegativeInteger,
  NonNegativeNumber,
  Percentage,
  PositiveInteger,
} from './common.js';

/**
 * Ascending traffic step sequence, always ending at full traffic
 */
export const TrafficStepsSchema = z
  .array(z.number().gt(0, 'Traffic step must be greater than 0').max(100, 'Traffic step cannot exceed 100'))
  .min(1, 'At least one traffic step is required')
  .refine((steps) => steps.every((step, i) => i === 0 || step > steps[i - 1]), {
    message: 'Traffic steps must be strictly ascending',
  })
  .refine((steps) => steps[steps.length - 1] === 100, {
    message: 'Final traffic step must be 100',
  });

export const SuccessCriteriaSchema = z.object({
  maxErrorRateIncrease: NonNegativeNumber,
  maxLatencyIncrease: NonNegativeNumber,
});

export const EndpointDeploymentSchema = z.object({
  costPerToken: NonNegativeNumber.optional(),
  capacity: PositiveInteger.optional(),
  config: z.record(z.unknown()).optional(),
});

/**
 * Canary rollout configuration
 */
export const CanaryRolloutConfigSchema = z
  .object({
    modelName: NonEmptyString,
    canaryVersion: NonEmptyString,
    baselineVersion: NonEmptyString,
    trafficSteps: TrafficStepsSchema,
    successCriteria: SuccessCriteriaSchema,
    evaluationIntervalMs: PositiveInteger.optional(),
    minSampleCount: PositiveInteger.optional(),
    maxDeferrals: PositiveInteger.optional(),
    endpoint: EndpointDeploymentSchema.optional(),
  })
  .refine((data) => data.canaryVersion !== data.baselineVersion, {
    message: 'must differ from baselineVersion',
    path: ['canaryVersion'],
  });

/**
 * Blue-green rollout configuration
 */
export const BlueGreenRolloutConfigSchema = z
  .object({
    modelName: NonEmptyString,
    greenVersion: NonEmptyString,
    blueVersion: NonEmptyString,
    rollbackWindowMs: PositiveInteger.optional(),
    checkIntervalMs: PositiveInteger.optional(),
    errorRateThreshold: Fraction.optional(),
    minSampleCount: PositiveInteger.optional(),
    endpoint: EndpointDeploymentSchema.optional(),
  })
  .refine((data) => data.greenVersion !== data.blueVersion, {
    message: 'must differ from blueVersion',
    path: ['greenVersion'],
  });

/**
 * Endpoint registration
 */
export const EndpointRegistrationSchema = z.object({
  id: NonEmptyString,
  modelName: NonEmptyString,
  version: NonEmptyString,
  address: NonEmptyString,
  costPerToken: NonNegativeNumber,
  state: EndpointStateSchema.optional(),
  healthy: z.boolean().optional(),
  capacity: PositiveInteger.optional(),
});

export const ModelEndpointSchema: z.ZodType<ModelEndpoint> = z.object({
  id: NonEmptyString,
  modelName: NonEmptyString,
  version: NonEmptyString,
  address: NonEmptyString,
  costPerToken: NonNegativeNumber,
  state: EndpointStateSchema,
  weight: Percentage,
  healthy: z.boolean(),
  capacity: PositiveInteger,
  createdAt: NonNegativeNumber,
});

/**
 * Registry snapshot as written to the durable store
 */
export const RegistrySnapshotSchema: z.ZodType<RegistrySnapshot> = z.object({
  model: NonEmptyString,
  version: NonNegativeInteger,
  endpoints: z.array(ModelEndpointSchema),
  weights: z.record(Percentage),
  committedAt: NonNegativeNumber,
});

export const AggregateWindowSchema: z.ZodType<AggregateWindow> = z.object({
  endpointId: NonEmptyString,
  windowStart: NonNegativeNumber,
  windowEnd: NonNegativeNumber,
  sampleCount: NonNegativeInteger,
  successCount: NonNegativeInteger,
  errorCount: NonNegativeInteger,
  errorRate: Fraction,
  latency: z.object({
    mean: NonNegativeNumber,
    p50: NonNegativeNumber,
    p95: NonNegativeNumber,
    p99: NonNegativeNumber,
    max: NonNegativeNumber,
  }),
  throughput: z.object({
    requestsPerSecond: NonNegativeNumber,
    tokensPerSecond: NonNegativeNumber,
  }),
  totalTokens: NonNegativeNumber,
  derivedCost: NonNegativeNumber,
});

export const CriterionResultSchema: z.ZodType<CriterionResult> = z.object({
  metric: z.enum(['error_rate', 'latency_p95', 'cost_per_request']),
  candidateValue: z.number(),
  baselineValue: z.number(),
  delta: z.number(),
  mode: z.enum(['relative', 'absolute']),
  threshold: z.number(),
  passed: z.boolean(),
});

export const EvaluationRecordSchema: z.ZodType<EvaluationRecord> = z.object({
  timestamp: NonNegativeNumber,
  stepIndex: NonNegativeInteger,
  trafficPercentage: Percentage,
  decision: z.enum(['advance', 'succeed', 'rollback', 'defer', 'abort']),
  canary: AggregateWindowSchema,
  baseline: AggregateWindowSchema,
  criteria: z.array(CriterionResultSchema),
  confidence: Fraction,
});

const RolloutStateSchema = z.enum([
  'PENDING',
  'RAMPING',
  'EVALUATING',
  'MONITORING',
  'SUCCEEDED',
  'ROLLED_BACK',
  'ABORTED',
]);

const PlanBaseShape = {
  id: NonEmptyString,
  modelName: NonEmptyString,
  targetVersion: NonEmptyString,
  baselineVersion: NonEmptyString,
  baselineEndpointId: NonEmptyString,
  targetEndpointId: NonEmptyString.optional(),
  state: RolloutStateSchema,
  createdAt: NonNegativeNumber,
  updatedAt: NonNegativeNumber,
  completedAt: NonNegativeNumber.optional(),
  reason: z.string().optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
};

export const CanaryPlanSchema: z.ZodType<CanaryPlan> = z.object({
  ...PlanBaseShape,
  kind: z.literal('canary'),
  trafficSteps: TrafficStepsSchema,
  stepIndex: NonNegativeInteger,
  trafficPercentage: Percentage,
  successCriteria: SuccessCriteriaSchema,
  evaluationIntervalMs: PositiveInteger,
  minSampleCount: PositiveInteger,
  maxDeferrals: PositiveInteger,
  deferrals: NonNegativeInteger,
  stepStartedAt: NonNegativeNumber,
  baselineSince: NonNegativeNumber,
  evaluations: z.array(EvaluationRecordSchema),
});

export const BlueGreenPlanSchema: z.ZodType<BlueGreenPlan> = z.object({
  ...PlanBaseShape,
  kind: z.literal('blue-green'),
  rollbackWindowMs: PositiveInteger,
  checkIntervalMs: PositiveInteger,
  errorRateThreshold: Fraction,
  minSampleCount: PositiveInteger,
  smokeTestAttempts: NonNegativeInteger,
  lastSmokeTestReport: z.record(z.unknown()).optional(),
  swappedAt: NonNegativeNumber.optional(),
});

export const RolloutPlanSchema: z.ZodType<RolloutPlan> = z.union([CanaryPlanSchema, BlueGreenPlanSchema]);
