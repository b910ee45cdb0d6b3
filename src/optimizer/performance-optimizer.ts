/**
 * Performance Optimizer
 *
 * Captures a per-endpoint performance baseline for a model and, on demand,
 * compares current aggregates against it. Metrics that degraded beyond the
 * tolerance become breaches, and breaches become ranked recommendations.
 *
 * @module optimizer/performance-optimizer
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ValidationError } from '../api/errors.js';
import { checkIncrease } from '../metrics/comparison.js';
import type { MetricsCollector } from '../metrics/metrics-collector.js';
import type { EndpointRegistry } from '../registry/endpoint-registry.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { ModelEndpoint } from '../types/endpoints.js';
import type { NotificationSink } from '../types/integrations.js';
import type { AggregateWindow } from '../types/metrics.js';
import type { CriterionResult } from '../types/rollout.js';
import type {
  DegradationReport,
  MetricBreach,
  PerformanceBaseline,
  Recommendation,
  RecommendationType,
} from '../types/optimizer.js';
import { describeError } from '../utils/logger-helpers.js';
import { safeDivide } from '../utils/math-helpers.js';

export interface PerformanceOptimizerOptions {
  /** Window the baseline aggregates cover (ms) */
  baselineWindowMs: number;

  /** Window of the current aggregates compared against the baseline (ms) */
  analysisWindowMs: number;

  /** Max relative increase of any metric before it counts as degraded */
  tolerance: number;

  /** P95 latency an endpoint must meet to be suggested as a replacement (ms) */
  latencySlaMs: number;

  /** Samples required on both sides before an endpoint is analyzed */
  minSampleCount: number;

  zeroBaselineErrorRate: number;
  zeroBaselineLatencyMs: number;
}

export interface PerformanceOptimizerDependencies {
  registry: EndpointRegistry;
  metrics: MetricsCollector;
  notifications?: NotificationSink;
  logger?: Logger;
  telemetry?: TelemetryManager;
  now?: () => number;
}

export interface PerformanceOptimizerEvents {
  baseline: (baseline: PerformanceBaseline) => void;
  analysis: (report: DegradationReport) => void;
}

const TYPE_ORDER: Record<RecommendationType, number> = {
  'switch-endpoint': 0,
  'scale-up': 1,
  'enable-caching': 2,
  'investigate-errors': 3,
};

/**
 * Highest expected improvement first; ties by type, then endpoint id
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.expectedImprovement !== b.expectedImprovement) {
    return b.expectedImprovement - a.expectedImprovement;
  }
  if (a.type !== b.type) {
    return TYPE_ORDER[a.type] - TYPE_ORDER[b.type];
  }
  return a.endpointId < b.endpointId ? -1 : a.endpointId > b.endpointId ? 1 : 0;
}

const costPerRequest = (aggregate: AggregateWindow): number =>
  safeDivide(aggregate.derivedCost, aggregate.sampleCount);

/**
 * Performance Optimizer
 */
export class PerformanceOptimizer extends EventEmitter<PerformanceOptimizerEvents> {
  private readonly baselines = new Map<string, PerformanceBaseline>();
  private readonly registry: EndpointRegistry;
  private readonly metrics: MetricsCollector;
  private readonly deps: PerformanceOptimizerDependencies;
  private readonly options: PerformanceOptimizerOptions;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(deps: PerformanceOptimizerDependencies, options: PerformanceOptimizerOptions) {
    super();
    this.deps = deps;
    this.registry = deps.registry;
    this.metrics = deps.metrics;
    this.options = options;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Snapshot every endpoint's aggregate over the baseline window
   *
   * @throws {ValidationError} when the model has no endpoints
   */
  public establishBaseline(model: string): PerformanceBaseline {
    const endpoints = this.registry.getSnapshot(model).endpoints;
    if (endpoints.length === 0) {
      throw new ValidationError(`Model '${model}' has no registered endpoints`, { field: 'model', model });
    }

    const aggregates: Record<string, AggregateWindow> = {};
    for (const endpoint of endpoints) {
      aggregates[endpoint.id] = this.metrics.getAggregate(endpoint.id, this.options.baselineWindowMs);
    }

    const baseline: PerformanceBaseline = {
      model,
      establishedAt: this.now(),
      windowMs: this.options.baselineWindowMs,
      endpoints: aggregates,
    };
    this.baselines.set(model, baseline);

    this.logger?.info(
      {
        model,
        endpoints: endpoints.length,
        samples: Object.values(aggregates).reduce((sum, a) => sum + a.sampleCount, 0),
      },
      'Performance baseline established'
    );
    this.emit('baseline', structuredClone(baseline));
    return structuredClone(baseline);
  }

  public getBaseline(model: string): PerformanceBaseline | undefined {
    const baseline = this.baselines.get(model);
    return baseline ? structuredClone(baseline) : undefined;
  }

  public clearBaseline(model: string): void {
    this.baselines.delete(model);
  }

  /**
   * Compare current aggregates with the model's baseline
   *
   * Endpoints with fewer than `minSampleCount` samples on either side, or no
   * longer registered, are skipped.
   *
   * @throws {ValidationError} when no baseline was established
   */
  public async analyzeDegradation(model: string): Promise<DegradationReport> {
    const baseline = this.baselines.get(model);
    if (!baseline) {
      throw new ValidationError(`No performance baseline for model '${model}'`, { field: 'model', model });
    }

    const { tolerance, minSampleCount } = this.options;
    const snapshot = this.registry.getSnapshot(model);
    const breaches: MetricBreach[] = [];
    const recommendations: Recommendation[] = [];

    for (const endpoint of snapshot.endpoints) {
      const before = baseline.endpoints[endpoint.id];
      if (!before || before.sampleCount < minSampleCount) {
        continue;
      }
      const current = this.metrics.getAggregate(endpoint.id, this.options.analysisWindowMs);
      if (current.sampleCount < minSampleCount) {
        continue;
      }

      const confidence = this.confidenceFor(Math.min(before.sampleCount, current.sampleCount));
      const criteria = [
        checkIncrease(
          'latency_p95',
          current.latency.p95,
          before.latency.p95,
          tolerance,
          this.options.zeroBaselineLatencyMs
        ),
        checkIncrease(
          'error_rate',
          current.errorRate,
          before.errorRate,
          tolerance,
          this.options.zeroBaselineErrorRate
        ),
        checkIncrease('cost_per_request', costPerRequest(current), costPerRequest(before), tolerance, 0),
      ];

      const failed = criteria.filter((c) => !c.passed);
      if (failed.length === 0) {
        continue;
      }

      for (const criterion of failed) {
        breaches.push({ ...criterion, endpointId: endpoint.id });
        recommendations.push(this.recommendFor(model, endpoint.id, criterion, confidence));
      }

      const alternative = this.findCheaperAlternative(snapshot.endpoints, endpoint);
      if (alternative) {
        recommendations.push({
          type: 'switch-endpoint',
          model,
          endpointId: endpoint.id,
          targetEndpointId: alternative.endpoint.id,
          description:
            `Move traffic from ${endpoint.id} to ${alternative.endpoint.id}: ` +
            `cost per token ${alternative.endpoint.costPerToken} vs ${endpoint.costPerToken}, ` +
            `P95 ${alternative.aggregate.latency.p95.toFixed(1)}ms within the ${this.options.latencySlaMs}ms SLA`,
          expectedImprovement: safeDivide(
            endpoint.costPerToken - alternative.endpoint.costPerToken,
            endpoint.costPerToken
          ),
          confidence: Math.min(confidence, this.confidenceFor(alternative.aggregate.sampleCount)),
        });
      }
    }

    recommendations.sort(compareRecommendations);
    const report: DegradationReport = {
      model,
      analyzedAt: this.now(),
      degraded: breaches.length > 0,
      breaches,
      recommendations,
    };

    if (report.degraded) {
      this.logger?.warn(
        {
          model,
          breaches: breaches.map((b) => `${b.endpointId}:${b.metric}`),
          recommendations: recommendations.length,
        },
        'Performance degradation detected'
      );
    } else {
      this.logger?.debug({ model }, 'No performance degradation');
    }

    if (recommendations.length > 0) {
      this.deps.telemetry?.recordRecommendations(model, recommendations.length);
      await this.notify(model, recommendations);
    }

    this.emit('analysis', structuredClone(report));
    return report;
  }

  private recommendFor(
    model: string,
    endpointId: string,
    criterion: CriterionResult,
    confidence: number
  ): Recommendation {
    const current = criterion.candidateValue;
    const before = criterion.baselineValue;

    switch (criterion.metric) {
      case 'latency_p95':
        return {
          type: 'scale-up',
          model,
          endpointId,
          description: `P95 latency of ${endpointId} rose from ${before.toFixed(1)}ms to ${current.toFixed(1)}ms; add capacity`,
          expectedImprovement: safeDivide(current - before, current),
          confidence,
        };
      case 'error_rate':
        return {
          type: 'investigate-errors',
          model,
          endpointId,
          description: `Error rate of ${endpointId} rose from ${before.toFixed(4)} to ${current.toFixed(4)}`,
          expectedImprovement: safeDivide(current - before, current),
          confidence,
        };
      case 'cost_per_request':
        return {
          type: 'enable-caching',
          model,
          endpointId,
          description: `Cost per request of ${endpointId} rose from ${before.toFixed(6)} to ${current.toFixed(6)}; cache repeated prompts`,
          expectedImprovement: safeDivide(current - before, current),
          confidence,
        };
    }
  }

  /**
   * Cheapest other healthy endpoint meeting the latency SLA and undercutting
   * the endpoint's cost by more than the tolerance
   */
  private findCheaperAlternative(
    endpoints: ReadonlyArray<Readonly<ModelEndpoint>>,
    endpoint: Readonly<ModelEndpoint>
  ): { endpoint: Readonly<ModelEndpoint>; aggregate: AggregateWindow } | undefined {
    const maxCost = endpoint.costPerToken * (1 - this.options.tolerance);
    let best: { endpoint: Readonly<ModelEndpoint>; aggregate: AggregateWindow } | undefined;

    for (const candidate of endpoints) {
      if (candidate.id === endpoint.id || !candidate.healthy || candidate.state === 'retiring') {
        continue;
      }
      if (candidate.costPerToken >= maxCost) {
        continue;
      }
      const aggregate = this.metrics.getAggregate(candidate.id, this.options.analysisWindowMs);
      if (aggregate.sampleCount < this.options.minSampleCount || aggregate.latency.p95 > this.options.latencySlaMs) {
        continue;
      }
      if (!best || candidate.costPerToken < best.endpoint.costPerToken) {
        best = { endpoint: candidate, aggregate };
      }
    }
    return best;
  }

  private confidenceFor(samples: number): number {
    return Math.min(1, safeDivide(samples, this.options.minSampleCount * 2, 1));
  }

  private async notify(model: string, recommendations: Recommendation[]): Promise<void> {
    const sink = this.deps.notifications;
    if (!sink) {
      return;
    }
    try {
      await sink.notify({
        type: 'optimizer.recommendations',
        model,
        recommendations: structuredClone(recommendations),
        timestamp: this.now(),
      });
    } catch (error) {
      this.logger?.error({ model, ...describeError(error) }, 'Notification delivery failed');
    }
  }
}
