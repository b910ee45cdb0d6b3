/**
 * Router - selects an endpoint for each inbound request
 *
 * Two stages over the model's current registry snapshot:
 *
 * 1. Version split: endpoints holding weight are grouped by version and an
 *    MD5 bucket of the request's routing key picks the version whose
 *    cumulative weight range contains it. Same key → same version.
 * 2. Strategy: the configured strategy picks among the healthy weighted
 *    endpoints of that version.
 *
 * A version with no healthy endpoint fails the request; traffic never
 * spills over to another version.
 *
 * @module routing/router
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import { NoHealthyEndpointError, ValidationError } from '../api/errors.js';
import type { MetricsCollector } from '../metrics/metrics-collector.js';
import type { EndpointRegistry } from '../registry/endpoint-registry.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { ModelEndpoint, RegistrySnapshot } from '../types/endpoints.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { safeDivide } from '../utils/math-helpers.js';
import {
  ROUTING_STRATEGIES,
  selectCandidate,
  type BalancedWeights,
  type RoutingCandidate,
  type RoutingStrategy,
} from './strategies.js';

/**
 * Per-request routing context
 */
export interface RoutingContext {
  /** Explicit key for the version split; wins over the id fields */
  routingKey?: string;
  requestId?: string;
  userId?: string;
  sessionId?: string;
}

export type RoutingHashKey = 'requestId' | 'userId' | 'sessionId';

export interface RouterOptions {
  strategy: RoutingStrategy;

  /** Context field hashed when no routingKey is given */
  hashKey: RoutingHashKey;

  loadThreshold: number;

  /** Latency assumed for endpoints without samples (ms) */
  defaultLatencyMs: number;

  balancedWeights: BalancedWeights;

  logger?: Logger;
  telemetry?: TelemetryManager;
}

export interface ExecuteOptions<T> {
  /** Tokens consumed by a successful result */
  tokensOf?: (result: T) => number;
}

/**
 * Traffic statistics for one model
 */
export interface TrafficStats {
  model: string;
  totalRequests: number;
  failedRoutes: number;
  endpoints: Array<{
    endpointId: string;
    version: string;
    requests: number;
    /** Share of routed requests (0-100) */
    percentage: number;
    configuredWeight: number;
  }>;
}

interface ModelCounters {
  total: number;
  failed: number;
  byEndpoint: Map<string, { version: string; count: number }>;
}

/**
 * Deterministic bucket in [0, 100) with 0.01 resolution
 */
export function routingBucket(key: string): number {
  const hash = createHash('md5').update(key).digest('hex');
  return (parseInt(hash.substring(0, 8), 16) % 10000) / 100;
}

/**
 * Router
 */
export class Router {
  private readonly registry: EndpointRegistry;
  private readonly metrics: MetricsCollector;
  private readonly options: RouterOptions;
  private readonly logger?: Logger;
  private strategy: RoutingStrategy;
  private readonly counters = new Map<string, ModelCounters>();

  constructor(registry: EndpointRegistry, metrics: MetricsCollector, options: RouterOptions) {
    this.registry = registry;
    this.metrics = metrics;
    this.options = options;
    this.logger = options.logger;
    this.strategy = options.strategy;
  }

  /**
   * Select an endpoint for one request
   *
   * @throws {NoHealthyEndpointError} when the selected version has no healthy endpoint
   */
  public route(
    model: string,
    context: RoutingContext = {},
    strategy: RoutingStrategy = this.strategy
  ): Readonly<ModelEndpoint> {
    const snapshot = this.registry.getSnapshot(model);
    const counters = this.countersFor(model);

    try {
      const version = this.selectVersion(snapshot, context);
      const candidates = this.buildCandidates(snapshot, version);
      const selected = selectCandidate(strategy, candidates, {
        loadThreshold: this.options.loadThreshold,
        balancedWeights: this.options.balancedWeights,
      });

      if (!selected) {
        throw new NoHealthyEndpointError(model, version);
      }

      const endpoint = selected.endpoint;
      counters.total++;
      const entry = counters.byEndpoint.get(endpoint.id);
      if (entry) {
        entry.count++;
      } else {
        counters.byEndpoint.set(endpoint.id, { version: endpoint.version, count: 1 });
      }
      this.options.telemetry?.recordRoute(model, endpoint.version, endpoint.id);

      lazyLog(
        this.logger,
        'debug',
        () => ({
          model,
          version,
          endpointId: endpoint.id,
          strategy,
          snapshotVersion: snapshot.version,
          candidates: candidates.length,
        }),
        'Request routed'
      );
      return endpoint;
    } catch (error) {
      counters.failed++;
      if (error instanceof NoHealthyEndpointError) {
        this.options.telemetry?.recordRouteFailure(model, error.code);
        lazyLog(this.logger, 'warn', () => ({ model, version: error.version }), error.message);
      }
      throw error;
    }
  }

  /**
   * Route a request, run it, and record its outcome
   *
   * Handler errors are recorded as failures and rethrown.
   */
  public async execute<T>(
    model: string,
    context: RoutingContext,
    handler: (endpoint: Readonly<ModelEndpoint>) => Promise<T>,
    options: ExecuteOptions<T> = {}
  ): Promise<T> {
    const endpoint = this.route(model, context);
    const startedAt = Date.now();
    this.metrics.beginRequest(endpoint.id);

    try {
      const result = await handler(endpoint);
      this.metrics.record(
        endpoint.id,
        Date.now() - startedAt,
        true,
        options.tokensOf?.(result) ?? 0
      );
      return result;
    } catch (error) {
      this.metrics.record(endpoint.id, Date.now() - startedAt, false, 0);
      throw error;
    } finally {
      this.metrics.endRequest(endpoint.id);
    }
  }

  public getStrategy(): RoutingStrategy {
    return this.strategy;
  }

  public setStrategy(strategy: RoutingStrategy): void {
    if (!ROUTING_STRATEGIES.includes(strategy)) {
      throw new ValidationError(`Unknown routing strategy '${String(strategy)}'`, {
        field: 'strategy',
      });
    }
    this.logger?.info({ from: this.strategy, to: strategy }, 'Routing strategy changed');
    this.strategy = strategy;
  }

  /**
   * Request counts and observed distribution for a model
   */
  public getStats(model: string): TrafficStats {
    const counters = this.countersFor(model);
    const weights = this.registry.getSnapshot(model).weights;

    const endpoints = Array.from(counters.byEndpoint.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([endpointId, entry]) => ({
        endpointId,
        version: entry.version,
        requests: entry.count,
        percentage: safeDivide(entry.count * 100, counters.total),
        configuredWeight: weights[endpointId] ?? 0,
      }));

    return {
      model,
      totalRequests: counters.total,
      failedRoutes: counters.failed,
      endpoints,
    };
  }

  public resetStats(model?: string): void {
    if (model === undefined) {
      this.counters.clear();
    } else {
      this.counters.delete(model);
    }
  }

  /**
   * Stage 1: choose the version that serves this request
   */
  private selectVersion(snapshot: RegistrySnapshot, context: RoutingContext): string {
    const versionWeights = new Map<string, number>();
    for (const endpoint of snapshot.endpoints) {
      if (endpoint.weight > 0) {
        versionWeights.set(endpoint.version, (versionWeights.get(endpoint.version) ?? 0) + endpoint.weight);
      }
    }

    const versions = Array.from(versionWeights.keys()).sort();
    if (versions.length === 0) {
      throw new NoHealthyEndpointError(snapshot.model);
    }

    const key = context.routingKey ?? context[this.options.hashKey];
    if (key === undefined || key.length === 0) {
      let heaviest = versions[0] ?? '';
      for (const version of versions) {
        if ((versionWeights.get(version) ?? 0) > (versionWeights.get(heaviest) ?? 0)) {
          heaviest = version;
        }
      }
      return heaviest;
    }

    const bucket = routingBucket(key);
    let cumulative = 0;
    for (const version of versions) {
      cumulative += versionWeights.get(version) ?? 0;
      if (bucket < cumulative) {
        return version;
      }
    }
    return versions[versions.length - 1] ?? '';
  }

  /**
   * Stage 2 input: healthy weighted endpoints of the version, sorted by id
   */
  private buildCandidates(snapshot: RegistrySnapshot, version: string): RoutingCandidate[] {
    return snapshot.endpoints
      .filter((e) => e.version === version && e.weight > 0 && e.healthy)
      .map((endpoint) => ({
        endpoint,
        latencyMs: this.metrics.getLatencyEstimate(endpoint.id) ?? this.options.defaultLatencyMs,
        load: this.metrics.getLoad(endpoint.id, endpoint.capacity),
      }));
  }

  private countersFor(model: string): ModelCounters {
    let counters = this.counters.get(model);
    if (!counters) {
      counters = { total: 0, failed: 0, byEndpoint: new Map() };
      this.counters.set(model, counters);
    }
    return counters;
  }
}
