/**
 * Unit tests for CanaryController
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../../src/api/errors.js';
import { CanaryController, type CanaryControllerOptions } from '../../../src/rollout/canary-controller.js';
import type { CanaryRolloutConfig } from '../../../src/types/rollout.js';
import { MemoryStateStore } from '../../../src/integrations/memory-state-store.js';
import {
  createHarness,
  recordSamples,
  useFakeClock,
  type Harness,
} from '../../helpers/rollout-fakes.js';

const OPTIONS: CanaryControllerOptions = {
  evaluationIntervalMs: 300_000,
  minSampleCount: 100,
  maxDeferrals: 3,
  drainGraceMs: 30_000,
  zeroBaselineErrorRate: 0.01,
  zeroBaselineLatencyMs: 1_000,
};

function rolloutConfig(overrides: Partial<CanaryRolloutConfig> = {}): CanaryRolloutConfig {
  return {
    modelName: 'chat',
    canaryVersion: 'v2',
    baselineVersion: 'v1',
    trafficSteps: [5, 20, 50, 100],
    successCriteria: { maxErrorRateIncrease: 0.05, maxLatencyIncrease: 0.1 },
    evaluationIntervalMs: 60_000,
    minSampleCount: 50,
    maxDeferrals: 3,
    ...overrides,
  };
}

describe('CanaryController', () => {
  let harness: Harness;
  let controller: CanaryController;

  beforeEach(() => {
    useFakeClock();
    harness = createHarness();
    controller = new CanaryController(harness.deps, OPTIONS);
  });

  afterEach(async () => {
    await controller.shutdown();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should deploy the canary and commit the first step', async () => {
      const plan = await controller.start(rolloutConfig());

      expect(plan.state).toBe('RAMPING');
      expect(plan.stepIndex).toBe(0);
      expect(plan.trafficPercentage).toBe(5);
      expect(plan.baselineEndpointId).toBe('chat-v1');

      const canaryId = plan.targetEndpointId ?? '';
      expect(canaryId).toBe('chat-v2-id000002');
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 95, [canaryId]: 5 });
      expect(harness.registry.getEndpoint(canaryId)?.state).toBe('canary');
      expect(harness.backend.created).toEqual([
        { model: 'chat', version: 'v2', config: { endpointId: canaryId } },
      ]);
    });

    it('should inherit cost and capacity from the baseline', async () => {
      const plan = await controller.start(rolloutConfig());
      const canary = harness.registry.getEndpoint(plan.targetEndpointId ?? '');

      expect(canary?.costPerToken).toBe(0.01);
      expect(canary?.capacity).toBe(100);
    });

    it('should reject steps that are not strictly ascending', async () => {
      await expect(controller.start(rolloutConfig({ trafficSteps: [20, 5, 100] }))).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(harness.backend.created).toHaveLength(0);
    });

    it('should reject steps that do not end at 100', async () => {
      await expect(controller.start(rolloutConfig({ trafficSteps: [5, 50] }))).rejects.toThrow(
        'Final traffic step must be 100'
      );
    });

    it('should reject an unknown baseline version', async () => {
      const error = await controller.start(rolloutConfig({ baselineVersion: 'v0' })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.field : undefined).toBe('baselineVersion');
    });

    it('should allow one active rollout per model', async () => {
      await controller.start(rolloutConfig());

      await expect(controller.start(rolloutConfig({ canaryVersion: 'v3' }))).rejects.toThrow(
        /already has an active rollout/
      );
    });

    it('should abort when the backend cannot create the canary', async () => {
      harness.backend.createError = new Error('quota exceeded');

      const plan = await controller.start(rolloutConfig());

      expect(plan.state).toBe('ABORTED');
      expect(plan.error).toEqual({
        code: 'BackendOperationError',
        message: 'Backend create failed: quota exceeded',
      });
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100 });
      expect(harness.sink.types()).toEqual(['rollout.aborted']);
      expect(controller.getActivePlan('chat')).toBeUndefined();
    });
  });

  describe('evaluate', () => {
    it('should roll back when the canary error rate exceeds the allowed increase', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, 'chat-v1', 100, 4);
      recordSamples(harness.metrics, canaryId, 100, 10);

      const result = await controller.evaluate(plan.id);

      expect(result.state).toBe('ROLLED_BACK');
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [canaryId]: 0 });
      expect(harness.registry.getEndpoint(canaryId)?.state).toBe('retiring');

      const evaluation = result.evaluations[0];
      expect(evaluation?.decision).toBe('rollback');
      expect(evaluation?.canary.errorRate).toBeCloseTo(0.1, 10);
      expect(evaluation?.baseline.errorRate).toBeCloseTo(0.04, 10);
      expect(evaluation?.confidence).toBe(0.5);
      expect(result.reason).toBe('Canary failed: error_rate increased 150.0% (max 5.0%)');
      expect(harness.sink.types()).toEqual(['rollout.rolled_back']);
    });

    it('should remove the rolled-back canary after the drain grace', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';
      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, 'chat-v1', 100, 4);
      recordSamples(harness.metrics, canaryId, 100, 10);
      await controller.evaluate(plan.id);

      await vi.advanceTimersByTimeAsync(30_000);

      expect(harness.registry.getEndpoint(canaryId)).toBeUndefined();
      expect(harness.backend.deleted).toEqual([canaryId]);
    });

    it('should walk every step and retire the baseline on success', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';
      const seen: number[] = [];

      for (let step = 0; step < 4; step++) {
        seen.push(harness.registry.getSnapshot('chat').weights[canaryId] ?? -1);
        vi.advanceTimersByTime(1_000);
        if (step < 3) {
          recordSamples(harness.metrics, 'chat-v1', 60);
        }
        recordSamples(harness.metrics, canaryId, 60);
        await controller.evaluate(plan.id);
      }

      const result = controller.getPlan(plan.id);
      expect(seen).toEqual([5, 20, 50, 100]);
      expect(result?.state).toBe('SUCCEEDED');
      expect(result?.evaluations.map((e) => e.decision)).toEqual(['advance', 'advance', 'advance', 'succeed']);
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 0, [canaryId]: 100 });
      expect(harness.registry.getEndpoint(canaryId)?.state).toBe('active');
      expect(harness.registry.getEndpoint('chat-v1')?.state).toBe('retiring');
      expect(harness.sink.types()).toEqual(['rollout.succeeded']);
    });

    it('should compare the final step against the previous baseline window', async () => {
      const plan = await controller.start(rolloutConfig({ trafficSteps: [50, 100] }));
      const canaryId = plan.targetEndpointId ?? '';

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, 'chat-v1', 60);
      recordSamples(harness.metrics, canaryId, 60);
      await controller.evaluate(plan.id);

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, canaryId, 60);
      const result = await controller.evaluate(plan.id);

      expect(result.state).toBe('SUCCEEDED');
      expect(result.evaluations[1]?.baseline.sampleCount).toBe(60);
      // Samples stamped at the step boundary count toward the new step too
      expect(result.evaluations[1]?.canary.sampleCount).toBe(120);
    });

    it('should compare a single full step against the interval before start', async () => {
      recordSamples(harness.metrics, 'chat-v1', 60);
      vi.advanceTimersByTime(1_000);
      const plan = await controller.start(rolloutConfig({ trafficSteps: [100] }));
      const canaryId = plan.targetEndpointId ?? '';
      expect(plan.baselineSince).toBe(Date.now() - 60_000);

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, canaryId, 60);
      const result = await controller.evaluate(plan.id);

      expect(result.state).toBe('SUCCEEDED');
      expect(result.evaluations.map((e) => e.decision)).toEqual(['succeed']);
      expect(result.evaluations[0]?.baseline.sampleCount).toBe(60);
    });

    it('should abort as inconclusive after repeated low-sample intervals', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, 'chat-v1', 3);
      recordSamples(harness.metrics, canaryId, 3);

      await controller.evaluate(plan.id);
      await controller.evaluate(plan.id);
      const result = await controller.evaluate(plan.id);

      expect(result.state).toBe('ABORTED');
      expect(result.deferrals).toBe(3);
      expect(result.error?.code).toBe('EvaluationInconclusive');
      expect(result.evaluations.map((e) => e.decision)).toEqual(['defer', 'defer', 'abort']);
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [canaryId]: 0 });
    });

    it('should evaluate on its own timer', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';
      recordSamples(harness.metrics, 'chat-v1', 60);
      recordSamples(harness.metrics, canaryId, 60);

      await vi.advanceTimersByTimeAsync(60_000);

      const result = controller.getPlan(plan.id);
      expect(result?.stepIndex).toBe(1);
      expect(result?.trafficPercentage).toBe(20);
      expect(result?.state).toBe('RAMPING');
    });

    it('should treat a zero baseline error rate as an absolute limit', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, 'chat-v1', 100, 0);
      recordSamples(harness.metrics, canaryId, 100, 2);
      const result = await controller.evaluate(plan.id);

      const errorCriterion = result.evaluations[0]?.criteria[0];
      expect(errorCriterion?.mode).toBe('absolute');
      expect(errorCriterion?.threshold).toBe(0.01);
      expect(result.state).toBe('ROLLED_BACK');
    });
  });

  describe('cancel', () => {
    it('should restore the baseline and be idempotent', async () => {
      const plan = await controller.start(rolloutConfig());
      const canaryId = plan.targetEndpointId ?? '';

      const first = await controller.cancel(plan.id);
      const second = await controller.cancel(plan.id);

      expect(first.state).toBe('ABORTED');
      expect(second.state).toBe('ABORTED');
      expect(second.completedAt).toBe(first.completedAt);
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [canaryId]: 0 });
      expect(harness.sink.types()).toEqual(['rollout.aborted']);
    });

    it('should release the model for a new rollout', async () => {
      const plan = await controller.start(rolloutConfig());
      await controller.cancel(plan.id);
      await vi.advanceTimersByTimeAsync(30_000);

      const next = await controller.start(rolloutConfig({ canaryVersion: 'v3' }));

      expect(next.state).toBe('RAMPING');
    });
  });

  describe('persistence', () => {
    it('should write the plan, the plan index and the registry snapshot', async () => {
      const store = new MemoryStateStore();
      const persisted = new CanaryController({ ...harness.deps, store }, OPTIONS);

      const plan = await persisted.start(rolloutConfig());

      expect(store.keys()).toEqual([
        'registry/chat',
        'registry/index',
        'rollout/canary/index',
        `rollout/${plan.id}`,
      ]);
      expect(await store.get('rollout/canary/index')).toEqual([plan.id]);
      await persisted.shutdown();
    });

    it('should resume a ramping plan read back from the store', async () => {
      const store = new MemoryStateStore();
      const first = new CanaryController({ ...harness.deps, store, activeRollouts: new Map() }, OPTIONS);
      const plan = await first.start(rolloutConfig());
      await first.shutdown();

      const second = new CanaryController({ ...harness.deps, store, activeRollouts: new Map() }, OPTIONS);
      const resumed = await second.resume(await store.get(`rollout/${plan.id}`));

      expect(resumed.state).toBe('RAMPING');
      expect(resumed.trafficPercentage).toBe(5);
      expect(second.getActivePlan('chat')?.id).toBe(plan.id);
      await second.shutdown();
    });
  });
});
