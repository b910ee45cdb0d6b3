/**
 * Candidate-versus-baseline metric comparison
 *
 * Shared by the canary evaluator and the performance optimizer so both
 * judge an increase the same way.
 */

import type { CriterionResult } from '../types/rollout.js';

/** Absorbs float noise such as (0.021 - 0.02) / 0.02 */
const COMPARISON_EPSILON = 1e-9;

/**
 * Compare a candidate value against its baseline
 *
 * With a positive baseline the relative delta (candidate - baseline) /
 * baseline must not exceed `maxRelativeIncrease`. A zero baseline has no
 * relative delta, so the candidate value itself is compared against
 * `absoluteThreshold`.
 *
 * @example
 * ```typescript
 * checkIncrease('latency_p95', 120, 100, 0.1, 1000).passed  // => false (+20%)
 * checkIncrease('error_rate', 0.005, 0, 0.05, 0.01).passed  // => true (absolute)
 * ```
 */
export function checkIncrease(
  metric: CriterionResult['metric'],
  candidate: number,
  baseline: number,
  maxRelativeIncrease: number,
  absoluteThreshold: number
): CriterionResult {
  if (baseline > 0) {
    const delta = (candidate - baseline) / baseline;
    return {
      metric,
      candidateValue: candidate,
      baselineValue: baseline,
      delta,
      mode: 'relative',
      threshold: maxRelativeIncrease,
      passed: delta <= maxRelativeIncrease + COMPARISON_EPSILON,
    };
  }

  return {
    metric,
    candidateValue: candidate,
    baselineValue: baseline,
    delta: candidate,
    mode: 'absolute',
    threshold: absoluteThreshold,
    passed: candidate <= absoluteThreshold + COMPARISON_EPSILON,
  };
}

/**
 * Fraction of criteria that passed (1 when there are none)
 */
export function passRatio(criteria: readonly CriterionResult[]): number {
  if (criteria.length === 0) {
    return 1;
  }
  return criteria.filter((c) => c.passed).length / criteria.length;
}
