/**
 * Unit tests for BlueGreenController
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RolloutError, ValidationError } from '../../../src/api/errors.js';
import { CanaryController } from '../../../src/rollout/canary-controller.js';
import {
  BlueGreenController,
  type BlueGreenControllerOptions,
} from '../../../src/rollout/blue-green-controller.js';
import type { BlueGreenRolloutConfig } from '../../../src/types/rollout.js';
import {
  FakeSmokeTests,
  createHarness,
  recordSamples,
  useFakeClock,
  type Harness,
} from '../../helpers/rollout-fakes.js';

const OPTIONS: BlueGreenControllerOptions = {
  rollbackWindowMs: 600_000,
  checkIntervalMs: 30_000,
  errorRateThreshold: 0.05,
  minSampleCount: 20,
  drainGraceMs: 30_000,
};

const CONFIG: BlueGreenRolloutConfig = {
  modelName: 'chat',
  greenVersion: 'v2',
  blueVersion: 'v1',
};

describe('BlueGreenController', () => {
  let harness: Harness;
  let smokeTests: FakeSmokeTests;
  let controller: BlueGreenController;

  beforeEach(() => {
    useFakeClock();
    harness = createHarness();
    smokeTests = new FakeSmokeTests();
    controller = new BlueGreenController({ ...harness.deps, smokeTests }, OPTIONS);
  });

  afterEach(async () => {
    await controller.shutdown();
    vi.useRealTimers();
  });

  describe('smoke test gate', () => {
    it('should keep blue serving and stay pending when the smoke test fails', async () => {
      smokeTests.enqueue({ passed: false, report: { latency: 'timeout' } });

      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      expect(greenId).toBe('chat-v2-id000002');
      expect(plan.state).toBe('PENDING');
      expect(plan.smokeTestAttempts).toBe(1);
      expect(plan.lastSmokeTestReport).toEqual({ latency: 'timeout' });
      expect(plan.error).toEqual({
        code: 'SmokeTestFailure',
        message: `Smoke test failed for endpoint ${greenId}`,
      });
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [greenId]: 0 });
      expect(harness.registry.getEndpoint(greenId)?.state).toBe('draft');
      expect(harness.sink.types()).toEqual(['rollout.smoke_test_failed']);
    });

    it('should count a throwing smoke test as a failure', async () => {
      const throwing = new BlueGreenController(
        {
          ...harness.deps,
          smokeTests: {
            run: async () => {
              throw new Error('connection refused');
            },
          },
        },
        OPTIONS
      );

      const plan = await throwing.start(CONFIG);

      expect(plan.state).toBe('PENDING');
      expect(plan.lastSmokeTestReport).toEqual({ error: 'connection refused' });
      await throwing.shutdown();
    });

    it('should swap once a retried smoke test passes', async () => {
      smokeTests.enqueue({ passed: false, report: { latency: 'timeout' } });
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      const retried = await controller.retry(plan.id);

      expect(retried.state).toBe('MONITORING');
      expect(retried.smokeTestAttempts).toBe(2);
      expect(retried.error).toBeUndefined();
      expect(smokeTests.calls).toEqual([greenId, greenId]);
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 0, [greenId]: 100 });
    });

    it('should refuse a retry outside the pending state', async () => {
      const plan = await controller.start(CONFIG);

      await expect(controller.retry(plan.id)).rejects.toBeInstanceOf(RolloutError);
    });
  });

  describe('monitoring', () => {
    it('should swap in one commit and keep blue at weight 0', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      expect(plan.state).toBe('MONITORING');
      expect(plan.swappedAt).toBe(Date.now());
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 0, [greenId]: 100 });
      expect(harness.registry.getEndpoint(greenId)?.state).toBe('active');
      expect(harness.registry.getEndpoint('chat-v1')?.state).toBe('active');
    });

    it('should retire blue after a quiet rollback window', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      await vi.advanceTimersByTimeAsync(600_000);

      const result = controller.getPlan(plan.id);
      expect(result?.state).toBe('SUCCEEDED');
      expect(harness.registry.getEndpoint('chat-v1')).toBeUndefined();
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ [greenId]: 100 });
      expect(harness.backend.deleted).toEqual(['chat-v1']);
      expect(harness.sink.types()).toEqual(['rollout.succeeded']);
    });

    it('should revert to blue when the green error rate crosses the threshold', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      vi.advanceTimersByTime(1_000);
      recordSamples(harness.metrics, greenId, 20, 2);
      await vi.advanceTimersByTimeAsync(30_000);

      const result = controller.getPlan(plan.id);
      expect(result?.state).toBe('ROLLED_BACK');
      expect(result?.reason).toBe('Green error rate 0.1000 exceeded 0.05 over 20 requests');
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [greenId]: 0 });
      expect(harness.registry.getEndpoint(greenId)?.state).toBe('retiring');
      expect(harness.sink.types()).toEqual(['rollout.rolled_back']);
    });

    it('should not revert on fewer samples than required', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      recordSamples(harness.metrics, greenId, 10, 10);
      const result = await controller.check(plan.id);

      expect(result.state).toBe('MONITORING');
    });

    it('should revert on a manual rollback inside the window', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      const result = await controller.rollback(plan.id);

      expect(result.state).toBe('ROLLED_BACK');
      expect(result.reason).toBe('Manual rollback');
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [greenId]: 0 });
      await expect(controller.rollback(plan.id)).rejects.toThrow(/not inside its rollback window/);
    });
  });

  describe('cancel', () => {
    it('should remove a pending green and be idempotent', async () => {
      smokeTests.enqueue({ passed: false, report: {} });
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      await controller.cancel(plan.id);
      const again = await controller.cancel(plan.id);
      await vi.advanceTimersByTimeAsync(0);

      expect(again.state).toBe('ABORTED');
      expect(harness.registry.getEndpoint(greenId)).toBeUndefined();
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100 });
      expect(harness.backend.deleted).toEqual([greenId]);
      expect(harness.sink.types()).toEqual(['rollout.smoke_test_failed', 'rollout.aborted']);
    });

    it('should report a failed backend delete', async () => {
      smokeTests.enqueue({ passed: false, report: {} });
      const plan = await controller.start(CONFIG);
      harness.backend.deleteError = new Error('not found');

      await controller.cancel(plan.id);
      await vi.advanceTimersByTimeAsync(0);

      expect(harness.sink.types()).toEqual([
        'rollout.smoke_test_failed',
        'rollout.aborted',
        'endpoint.delete_failed',
      ]);
    });

    it('should revert a monitoring plan to blue', async () => {
      const plan = await controller.start(CONFIG);
      const greenId = plan.targetEndpointId ?? '';

      const result = await controller.cancel(plan.id);

      expect(result.state).toBe('ABORTED');
      expect(harness.registry.getSnapshot('chat').weights).toEqual({ 'chat-v1': 100, [greenId]: 0 });
    });
  });

  describe('validation', () => {
    it('should reject a check interval longer than the rollback window', async () => {
      await expect(
        controller.start({ ...CONFIG, rollbackWindowMs: 1_000, checkIntervalMs: 5_000 })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a model that already runs a canary', async () => {
      const canary = new CanaryController(harness.deps, {
        evaluationIntervalMs: 60_000,
        minSampleCount: 10,
        maxDeferrals: 3,
        drainGraceMs: 0,
        zeroBaselineErrorRate: 0.01,
        zeroBaselineLatencyMs: 1_000,
      });
      await canary.start({
        modelName: 'chat',
        canaryVersion: 'v3',
        baselineVersion: 'v1',
        trafficSteps: [10, 100],
        successCriteria: { maxErrorRateIncrease: 0.1, maxLatencyIncrease: 0.1 },
        evaluationIntervalMs: 60_000,
        minSampleCount: 10,
      });

      await expect(controller.start(CONFIG)).rejects.toThrow(/already has an active rollout/);
      await canary.shutdown();
    });
  });
});
