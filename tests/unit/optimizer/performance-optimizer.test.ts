/**
 * Unit tests for PerformanceOptimizer
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../../src/api/errors.js';
import {
  PerformanceOptimizer,
  compareRecommendations,
  type PerformanceOptimizerOptions,
} from '../../../src/optimizer/performance-optimizer.js';
import type { DegradationReport, Recommendation } from '../../../src/types/optimizer.js';
import {
  createHarness,
  recordSamples,
  silentLogger,
  useFakeClock,
  type Harness,
} from '../../helpers/rollout-fakes.js';

const OPTIONS: PerformanceOptimizerOptions = {
  baselineWindowMs: 60_000,
  analysisWindowMs: 60_000,
  tolerance: 0.1,
  latencySlaMs: 500,
  minSampleCount: 20,
  zeroBaselineErrorRate: 0.01,
  zeroBaselineLatencyMs: 1_000,
};

function recommendation(overrides: Partial<Recommendation>): Recommendation {
  return {
    type: 'scale-up',
    model: 'chat',
    endpointId: 'chat-a',
    description: '',
    expectedImprovement: 0.5,
    confidence: 1,
    ...overrides,
  };
}

describe('PerformanceOptimizer', () => {
  let harness: Harness;
  let optimizer: PerformanceOptimizer;

  beforeEach(() => {
    useFakeClock();
    harness = createHarness();
    harness.registry.register({
      id: 'chat-cheap',
      modelName: 'chat',
      version: 'v1',
      address: 'http://chat-cheap.test:8080',
      costPerToken: 0.005,
      state: 'active',
    });
    optimizer = new PerformanceOptimizer(
      {
        registry: harness.registry,
        metrics: harness.metrics,
        notifications: harness.sink,
        logger: silentLogger(),
      },
      OPTIONS
    );

    recordSamples(harness.metrics, 'chat-v1', 20, 0, 100);
    recordSamples(harness.metrics, 'chat-cheap', 20, 0, 200);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('establishBaseline', () => {
    it('should capture every endpoint over the baseline window', () => {
      const baseline = optimizer.establishBaseline('chat');

      expect(baseline.establishedAt).toBe(Date.now());
      expect(Object.keys(baseline.endpoints).sort()).toEqual(['chat-cheap', 'chat-v1']);
      expect(baseline.endpoints['chat-v1']?.latency.p95).toBe(100);
      expect(optimizer.getBaseline('chat')).toEqual(baseline);
    });

    it('should reject a model without endpoints', () => {
      expect(() => optimizer.establishBaseline('ghost')).toThrow(ValidationError);
    });

    it('should forget a cleared baseline', () => {
      optimizer.establishBaseline('chat');
      optimizer.clearBaseline('chat');

      expect(optimizer.getBaseline('chat')).toBeUndefined();
    });
  });

  describe('analyzeDegradation', () => {
    beforeEach(() => {
      optimizer.establishBaseline('chat');
      vi.advanceTimersByTime(120_000);
    });

    it('should require a baseline', async () => {
      optimizer.clearBaseline('chat');

      await expect(optimizer.analyzeDegradation('chat')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should report nothing when metrics hold steady', async () => {
      recordSamples(harness.metrics, 'chat-v1', 20, 0, 100);
      recordSamples(harness.metrics, 'chat-cheap', 20, 0, 200);

      const report = await optimizer.analyzeDegradation('chat');

      expect(report.degraded).toBe(false);
      expect(report.recommendations).toEqual([]);
      expect(harness.sink.types()).toEqual([]);
    });

    it('should turn breaches into ranked recommendations', async () => {
      recordSamples(harness.metrics, 'chat-v1', 20, 4, 300);
      recordSamples(harness.metrics, 'chat-cheap', 20, 0, 200);
      const emitted: DegradationReport[] = [];
      optimizer.on('analysis', (report) => emitted.push(report));

      const report = await optimizer.analyzeDegradation('chat');

      expect(report.degraded).toBe(true);
      expect(report.breaches.map((b) => [b.endpointId, b.metric])).toEqual([
        ['chat-v1', 'latency_p95'],
        ['chat-v1', 'error_rate'],
      ]);
      expect(report.recommendations.map((r) => r.type)).toEqual([
        'investigate-errors',
        'scale-up',
        'switch-endpoint',
      ]);

      const [investigate, scaleUp, switchEndpoint] = report.recommendations;
      expect(scaleUp?.expectedImprovement).toBeCloseTo(2 / 3, 10);
      expect(switchEndpoint?.targetEndpointId).toBe('chat-cheap');
      expect(switchEndpoint?.expectedImprovement).toBeCloseTo(0.5, 10);
      expect(switchEndpoint?.description).toBe(
        'Move traffic from chat-v1 to chat-cheap: cost per token 0.005 vs 0.01, P95 200.0ms within the 500ms SLA'
      );
      // Relative to the current rate: 0 → 0.2 removes all of it
      expect(investigate?.expectedImprovement).toBeCloseTo(1, 10);
      expect(investigate?.description).toBe('Error rate of chat-v1 rose from 0.0000 to 0.2000');
      expect(report.recommendations.every((r) => r.confidence === 0.5)).toBe(true);

      expect(harness.sink.types()).toEqual(['optimizer.recommendations']);
      expect(emitted).toEqual([report]);
    });

    it('should not suggest a retiring endpoint as the replacement', async () => {
      harness.registry.transition('chat-cheap', 'retiring');
      recordSamples(harness.metrics, 'chat-v1', 20, 0, 300);
      recordSamples(harness.metrics, 'chat-cheap', 20, 0, 200);

      const report = await optimizer.analyzeDegradation('chat');

      expect(report.recommendations.map((r) => r.type)).toEqual(['scale-up']);
    });

    it('should skip endpoints with too few current samples', async () => {
      recordSamples(harness.metrics, 'chat-v1', 5, 5, 900);

      const report = await optimizer.analyzeDegradation('chat');

      expect(report.degraded).toBe(false);
      expect(report.breaches).toEqual([]);
    });

    it('should flag a rising cost per request', async () => {
      for (let i = 0; i < 20; i++) {
        harness.metrics.record('chat-v1', 100, true, 20);
      }
      recordSamples(harness.metrics, 'chat-cheap', 20, 0, 200);

      const report = await optimizer.analyzeDegradation('chat');

      expect(report.breaches.map((b) => b.metric)).toEqual(['cost_per_request']);
      expect(report.recommendations[0]?.type).toBe('switch-endpoint');
      expect(report.recommendations[1]?.type).toBe('enable-caching');
      expect(report.recommendations[1]?.expectedImprovement).toBeCloseTo(0.5, 10);
    });
  });

  describe('compareRecommendations', () => {
    it('should order by improvement, then type, then endpoint id', () => {
      const sorted = [
        recommendation({ type: 'investigate-errors', expectedImprovement: 0.5 }),
        recommendation({ type: 'scale-up', endpointId: 'chat-b', expectedImprovement: 0.5 }),
        recommendation({ type: 'scale-up', endpointId: 'chat-a', expectedImprovement: 0.5 }),
        recommendation({ type: 'enable-caching', expectedImprovement: 0.9 }),
      ].sort(compareRecommendations);

      expect(sorted.map((r) => `${r.type}:${r.endpointId}`)).toEqual([
        'enable-caching:chat-a',
        'scale-up:chat-a',
        'scale-up:chat-b',
        'investigate-errors:chat-a',
      ]);
    });
  });
});
