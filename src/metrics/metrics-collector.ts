/**
 * Metrics Collector
 *
 * Per-endpoint request samples in bounded ring buffers, rolling aggregates
 * for the controllers, and O(1) latency/load signals for the router.
 *
 * `record()` is on the request hot path: it only touches the endpoint's own
 * buffer and counters, evicts expired samples lazily, and never throws on a
 * bad sample.
 *
 * @module metrics/metrics-collector
 */

import type { Logger } from 'pino';
import { ValidationError } from '../api/errors.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { AggregateWindow, RequestMetricSample } from '../types/metrics.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { percentile, safeAverage, safeDivide, safeSum } from '../utils/math-helpers.js';
import { SampleRing } from './sample-ring.js';

export interface MetricsCollectorOptions {
  /** Samples older than this are evicted (ms) */
  retentionMs: number;

  /** Ring buffer size per endpoint */
  capacityPerEndpoint: number;

  /** Smoothing factor of the latency estimate (0-1] */
  latencyEwmaAlpha: number;

  /** Cost per token of an endpoint, for derived cost */
  costOf?: (endpointId: string) => number | undefined;

  logger?: Logger;
  telemetry?: TelemetryManager;
  now?: () => number;
}

/**
 * Metrics Collector
 */
export class MetricsCollector {
  private readonly buffers = new Map<string, SampleRing>();
  private readonly latencyEstimates = new Map<string, number>();
  private readonly inFlight = new Map<string, number>();
  private readonly options: MetricsCollectorOptions;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private dropped = 0;

  constructor(options: MetricsCollectorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record one completed request
   *
   * @returns false when the sample was invalid and dropped
   */
  public record(endpointId: string, latencyMs: number, success: boolean, tokens = 0): boolean {
    const problem = this.validateSample(endpointId, latencyMs, success, tokens);
    if (problem) {
      this.dropped++;
      lazyLog(
        this.logger,
        'warn',
        () => ({ endpointId, latencyMs, success, tokens, problem, dropped: this.dropped }),
        'Dropped invalid metric sample'
      );
      return false;
    }

    const timestamp = this.now();
    let buffer = this.buffers.get(endpointId);
    if (!buffer) {
      buffer = new SampleRing(this.options.capacityPerEndpoint);
      this.buffers.set(endpointId, buffer);
    }

    buffer.evictBefore(timestamp - this.options.retentionMs);
    const sample: RequestMetricSample = { timestamp, endpointId, latencyMs, success, tokens };
    buffer.push(sample);

    const previous = this.latencyEstimates.get(endpointId);
    const alpha = this.options.latencyEwmaAlpha;
    this.latencyEstimates.set(
      endpointId,
      previous === undefined ? latencyMs : alpha * latencyMs + (1 - alpha) * previous
    );

    this.options.telemetry?.recordRequest(endpointId, latencyMs, success);
    return true;
  }

  /**
   * Aggregate the endpoint's samples over the last `windowMs`
   *
   * The window is clamped to the retention period.
   */
  public getAggregate(endpointId: string, windowMs: number): AggregateWindow {
    if (!Number.isFinite(windowMs) || windowMs < 0) {
      throw new ValidationError(`Aggregation window must be a finite, non-negative number (got ${windowMs})`, {
        field: 'windowMs',
        windowMs,
      });
    }

    const windowEnd = this.now();
    const windowStart = windowEnd - windowMs;
    const samples = this.samplesSince(endpointId, windowStart, windowEnd);

    const sampleCount = samples.length;
    const successCount = samples.filter((s) => s.success).length;
    const errorCount = sampleCount - successCount;

    const latencies = samples.map((s) => s.latencyMs).sort((a, b) => a - b);
    const totalTokens = safeSum(samples.map((s) => s.tokens));
    const windowSeconds = windowMs / 1000;
    const costPerToken = this.options.costOf?.(endpointId) ?? 0;

    return {
      endpointId,
      windowStart,
      windowEnd,
      sampleCount,
      successCount,
      errorCount,
      errorRate: safeDivide(errorCount, sampleCount),
      latency: {
        mean: safeAverage(latencies),
        p50: percentile(latencies, 50),
        p95: percentile(latencies, 95),
        p99: percentile(latencies, 99),
        max: latencies.length > 0 ? latencies[latencies.length - 1] ?? 0 : 0,
      },
      throughput: {
        requestsPerSecond: safeDivide(sampleCount, windowSeconds),
        tokensPerSecond: safeDivide(totalTokens, windowSeconds),
      },
      totalTokens,
      derivedCost: totalTokens * costPerToken,
    };
  }

  /**
   * Number of retained samples inside the last `windowMs`
   */
  public sampleCount(endpointId: string, windowMs: number): number {
    const now = this.now();
    return this.samplesSince(endpointId, now - windowMs, now).length;
  }

  /**
   * Smoothed latency (ms), undefined before the first sample
   */
  public getLatencyEstimate(endpointId: string): number | undefined {
    return this.latencyEstimates.get(endpointId);
  }

  /**
   * Mark a request as started against an endpoint
   */
  public beginRequest(endpointId: string): void {
    this.inFlight.set(endpointId, (this.inFlight.get(endpointId) ?? 0) + 1);
  }

  /**
   * Mark a request as finished (pairs with `beginRequest`)
   */
  public endRequest(endpointId: string): void {
    const current = this.inFlight.get(endpointId) ?? 0;
    if (current <= 1) {
      this.inFlight.delete(endpointId);
    } else {
      this.inFlight.set(endpointId, current - 1);
    }
  }

  public getInFlight(endpointId: string): number {
    return this.inFlight.get(endpointId) ?? 0;
  }

  /**
   * In-flight requests as a fraction of capacity
   */
  public getLoad(endpointId: string, capacity: number): number {
    return safeDivide(this.getInFlight(endpointId), capacity, 1);
  }

  /**
   * Drop everything known about an endpoint
   */
  public forget(endpointId: string): void {
    this.buffers.delete(endpointId);
    this.latencyEstimates.delete(endpointId);
    this.inFlight.delete(endpointId);
  }

  public reset(): void {
    this.buffers.clear();
    this.latencyEstimates.clear();
    this.inFlight.clear();
    this.dropped = 0;
  }

  /**
   * Count of samples dropped as invalid since construction or reset
   */
  public getDroppedCount(): number {
    return this.dropped;
  }

  private samplesSince(endpointId: string, from: number, to: number): RequestMetricSample[] {
    const buffer = this.buffers.get(endpointId);
    if (!buffer) {
      return [];
    }
    return buffer.between(Math.max(from, to - this.options.retentionMs), to);
  }

  private validateSample(
    endpointId: unknown,
    latencyMs: unknown,
    success: unknown,
    tokens: unknown
  ): string | undefined {
    if (typeof endpointId !== 'string' || endpointId.length === 0) {
      return 'endpointId must be a non-empty string';
    }
    if (typeof latencyMs !== 'number' || !Number.isFinite(latencyMs) || latencyMs < 0) {
      return 'latencyMs must be a finite, non-negative number';
    }
    if (typeof success !== 'boolean') {
      return 'success must be a boolean';
    }
    if (typeof tokens !== 'number' || !Number.isFinite(tokens) || tokens < 0) {
      return 'tokens must be a finite, non-negative number';
    }
    return undefined;
  }
}
