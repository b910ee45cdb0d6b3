/**
 * Performance Optimizer Types
 */

import type { AggregateWindow } from './metrics.js';
import type { CriterionResult } from './rollout.js';

export type RecommendationType =
  | 'switch-endpoint'
  | 'scale-up'
  | 'enable-caching'
  | 'investigate-errors';

/**
 * Actionable recommendation produced by the optimizer
 */
export interface Recommendation {
  type: RecommendationType;
  model: string;

  /** Endpoint the recommendation applies to */
  endpointId: string;

  /** Suggested replacement endpoint (switch-endpoint only) */
  targetEndpointId?: string;

  description: string;

  /** Estimated improvement as a fraction (0.25 = 25% better) */
  expectedImprovement: number;

  /** Confidence in the estimate (0-1), driven by sample counts */
  confidence: number;
}

/**
 * Reference aggregates captured over a stable period
 */
export interface PerformanceBaseline {
  model: string;
  establishedAt: number;
  windowMs: number;
  endpoints: Record<string, AggregateWindow>;
}

/**
 * A metric that degraded beyond tolerance
 */
export interface MetricBreach extends CriterionResult {
  endpointId: string;
}

/**
 * Result of `analyzeDegradation()`
 */
export interface DegradationReport {
  model: string;
  analyzedAt: number;
  degraded: boolean;
  breaches: MetricBreach[];
  recommendations: Recommendation[];
}
