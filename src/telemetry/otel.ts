/**
 * OpenTelemetry infrastructure for the rollout controller.
 *
 * Provides metrics collection, Prometheus exporter, and standardized
 * instrumentation for routing decisions, request outcomes, weight commits
 * and rollout state transitions.
 *
 * @module telemetry/otel
 */

import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';
import type { EvaluationDecision, RolloutKind, RolloutState } from '../types/rollout.js';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'model-rollout-controller').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  /**
   * Start the Prometheus HTTP endpoint (default: true).
   */
  startServer?: boolean;
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  startServer: boolean;
  logger: Logger | undefined;
}

/**
 * Standard metrics exported by the controller.
 */
export interface RolloutMetrics {
  // Routing
  routedRequests: Counter;
  routingFailures: Counter;

  // Request outcomes
  requestLatency: Histogram;
  requestErrors: Counter;

  // Registry
  weightCommits: Counter;

  // Rollouts
  rolloutTransitions: Counter;
  canaryEvaluations: Counter;

  // Optimizer
  recommendations: Counter;
}

/**
 * OpenTelemetry telemetry manager.
 *
 * The `record*` helpers are no-ops until `start()` has run, so components
 * can hold a manager whether or not metrics are enabled.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 *
 * telemetry.recordRoute('chat', 'v2', 'ep-2');
 *
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private meter: Meter | null = null;
  private _metrics: RolloutMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || 'model-rollout-controller',
      prometheusPort: config.prometheusPort ?? 9464,
      startServer: config.startServer ?? true,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): RolloutMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Initialize the metrics provider, the Prometheus exporter and all
   * standard metrics.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled:true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      // Pull-based exporter: acts as its own metric reader
      this.prometheusExporter = new PrometheusExporter({
        port: this.config.prometheusPort,
        preventServerStart: !this.config.startServer,
      });

      this.meterProvider = new MeterProvider({
        readers: [this.prometheusExporter],
      });

      this.meter = this.meterProvider.getMeter(this.config.serviceName);
      this._metrics = this.createMetrics(this.meter);
      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          prometheusPort: this.config.prometheusPort,
          serverStarted: this.config.startServer,
        },
        'OpenTelemetry metrics started'
      );
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the telemetry manager and flush all metrics.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      await this.meterProvider?.shutdown();
      await this.prometheusExporter?.shutdown();

      this.started = false;
      this._metrics = null;
      this.meter = null;
      this.meterProvider = null;
      this.prometheusExporter = null;

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }

  public recordRoute(model: string, version: string, endpointId: string): void {
    this._metrics?.routedRequests.add(1, { model, version, endpoint: endpointId });
  }

  public recordRouteFailure(model: string, code: string): void {
    this._metrics?.routingFailures.add(1, { model, code });
  }

  public recordRequest(endpointId: string, latencyMs: number, success: boolean): void {
    if (!this._metrics) return;
    this._metrics.requestLatency.record(latencyMs, { endpoint: endpointId });
    if (!success) {
      this._metrics.requestErrors.add(1, { endpoint: endpointId });
    }
  }

  public recordWeightCommit(model: string): void {
    this._metrics?.weightCommits.add(1, { model });
  }

  public recordTransition(kind: RolloutKind, model: string, state: RolloutState): void {
    this._metrics?.rolloutTransitions.add(1, { kind, model, state });
  }

  public recordEvaluation(model: string, decision: EvaluationDecision): void {
    this._metrics?.canaryEvaluations.add(1, { model, decision });
  }

  public recordRecommendations(model: string, count: number): void {
    this._metrics?.recommendations.add(count, { model });
  }

  private createMetrics(meter: Meter): RolloutMetrics {
    return {
      routedRequests: meter.createCounter('rollout_routed_requests_total', {
        description: 'Total number of requests routed to an endpoint',
        unit: '1',
      }),
      routingFailures: meter.createCounter('rollout_routing_failures_total', {
        description: 'Total number of requests with no routable endpoint',
        unit: '1',
      }),

      requestLatency: meter.createHistogram('rollout_request_duration_ms', {
        description: 'End-to-end request latency per endpoint',
        unit: 'ms',
      }),
      requestErrors: meter.createCounter('rollout_request_errors_total', {
        description: 'Total number of failed requests per endpoint',
        unit: '1',
      }),

      weightCommits: meter.createCounter('rollout_weight_commits_total', {
        description: 'Total number of committed weight snapshots',
        unit: '1',
      }),

      rolloutTransitions: meter.createCounter('rollout_state_transitions_total', {
        description: 'Total number of rollout plan state transitions',
        unit: '1',
      }),
      canaryEvaluations: meter.createCounter('rollout_canary_evaluations_total', {
        description: 'Total number of canary evaluations by decision',
        unit: '1',
      }),

      recommendations: meter.createCounter('rollout_recommendations_total', {
        description: 'Total number of optimizer recommendations',
        unit: '1',
      }),
    };
  }
}

/**
 * Create a telemetry manager with the given configuration.
 */
export function createTelemetry(config: TelemetryConfig): TelemetryManager {
  return new TelemetryManager(config);
}
