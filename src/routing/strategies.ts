/**
 * Routing strategies
 *
 * One pure selection function per strategy. Candidates arrive sorted by
 * endpoint id and every comparison is strict, so ties go to the lowest id.
 *
 * @module routing/strategies
 */

import type { ModelEndpoint } from '../types/endpoints.js';

export type RoutingStrategy = 'cost-optimized' | 'performance-optimized' | 'balanced';

export const ROUTING_STRATEGIES: readonly RoutingStrategy[] = [
  'cost-optimized',
  'performance-optimized',
  'balanced',
];

/**
 * An endpoint together with the live signals the strategies score
 */
export interface RoutingCandidate {
  endpoint: Readonly<ModelEndpoint>;
  /** Smoothed latency (ms), or the configured default before any sample */
  latencyMs: number;
  /** In-flight requests / capacity */
  load: number;
}

export interface BalancedWeights {
  cost: number;
  latency: number;
  load: number;
}

export interface StrategyOptions {
  /** performance-optimized ignores candidates at or above this load */
  loadThreshold: number;
  balancedWeights: BalancedWeights;
}

// Floor for cost and latency before inverting them
const MIN_DENOMINATOR = 1e-12;

function pickMin(
  candidates: readonly RoutingCandidate[],
  value: (candidate: RoutingCandidate) => number
): RoutingCandidate | undefined {
  let best: RoutingCandidate | undefined;
  let bestValue = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const v = value(candidate);
    if (best === undefined || v < bestValue) {
      best = candidate;
      bestValue = v;
    }
  }
  return best;
}

/**
 * Lowest cost per token
 */
export function selectCostOptimized(
  candidates: readonly RoutingCandidate[]
): RoutingCandidate | undefined {
  return pickMin(candidates, (c) => c.endpoint.costPerToken);
}

/**
 * Lowest latency among candidates below the load threshold, or among all
 * candidates when every one is saturated
 */
export function selectPerformanceOptimized(
  candidates: readonly RoutingCandidate[],
  loadThreshold: number
): RoutingCandidate | undefined {
  const unsaturated = candidates.filter((c) => c.load < loadThreshold);
  const pool = unsaturated.length > 0 ? unsaturated : candidates;
  return pickMin(pool, (c) => c.latencyMs);
}

/**
 * Balanced score per candidate
 *
 * score = w_cost · norm(1/cost) + w_latency · norm(1/latency) + w_load · (1 − load)
 *
 * Each inverse term is divided by its maximum over the candidate set so the
 * three terms share the [0, 1] range regardless of units.
 */
export function balancedScores(
  candidates: readonly RoutingCandidate[],
  weights: BalancedWeights
): number[] {
  const inverseCost = candidates.map((c) => 1 / Math.max(c.endpoint.costPerToken, MIN_DENOMINATOR));
  const inverseLatency = candidates.map((c) => 1 / Math.max(c.latencyMs, MIN_DENOMINATOR));
  const maxInverseCost = Math.max(...inverseCost);
  const maxInverseLatency = Math.max(...inverseLatency);

  return candidates.map((c, i) => {
    const costTerm = (inverseCost[i] ?? 0) / maxInverseCost;
    const latencyTerm = (inverseLatency[i] ?? 0) / maxInverseLatency;
    const loadTerm = 1 - Math.min(Math.max(c.load, 0), 1);
    return weights.cost * costTerm + weights.latency * latencyTerm + weights.load * loadTerm;
  });
}

/**
 * Highest balanced score
 */
export function selectBalanced(
  candidates: readonly RoutingCandidate[],
  weights: BalancedWeights
): RoutingCandidate | undefined {
  const scores = balancedScores(candidates, weights);
  let best: RoutingCandidate | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    const score = scores[i] ?? Number.NEGATIVE_INFINITY;
    if (candidate && (best === undefined || score > bestScore)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Dispatch to the strategy's selection function
 */
export function selectCandidate(
  strategy: RoutingStrategy,
  candidates: readonly RoutingCandidate[],
  options: StrategyOptions
): RoutingCandidate | undefined {
  switch (strategy) {
    case 'cost-optimized':
      return selectCostOptimized(candidates);
    case 'performance-optimized':
      return selectPerformanceOptimized(candidates, options.loadThreshold);
    case 'balanced':
      return selectBalanced(candidates, options.balancedWeights);
  }
}
