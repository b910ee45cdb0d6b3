/**
 * Blue-Green Controller - full parallel deployment with an atomic swap
 *
 * Green is deployed beside blue at weight 0 and smoke-tested. On a pass a
 * single commit moves all traffic to green; blue stays registered at weight
 * 0 for the rollback window while green's error rate is watched. A failed
 * smoke test leaves the plan PENDING so the test can be retried.
 *
 * @module rollout/blue-green-controller
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  RolloutError,
  SmokeTestFailure,
  ValidationError,
  zodErrorToValidationError,
} from '../api/errors.js';
import type { SmokeTestResult, SmokeTestRunner } from '../types/integrations.js';
import {
  isTerminalState,
  type BlueGreenPlan,
  type BlueGreenRolloutConfig,
  type EndpointDeploymentOptions,
  type RolloutState,
} from '../types/rollout.js';
import { BlueGreenPlanSchema, BlueGreenRolloutConfigSchema } from '../types/schemas/rollout.js';
import { describeError } from '../utils/logger-helpers.js';
import type { PlanFilter } from './canary-controller.js';
import {
  RolloutSupport,
  clonePlan,
  toPlanError,
  type RolloutDependencies,
} from './rollout-support.js';

export interface BlueGreenControllerOptions {
  rollbackWindowMs: number;
  checkIntervalMs: number;
  errorRateThreshold: number;
  minSampleCount: number;

  /** Time a retiring green keeps serving in-flight requests after a revert (ms) */
  drainGraceMs: number;

  endpointDefaults?: Partial<EndpointDeploymentOptions>;
}

export interface BlueGreenControllerEvents {
  started: (plan: BlueGreenPlan) => void;
  transition: (plan: BlueGreenPlan, from: RolloutState) => void;
  smokeTest: (plan: BlueGreenPlan, result: SmokeTestResult) => void;
  completed: (plan: BlueGreenPlan) => void;
}

/**
 * Blue-Green Controller
 */
export class BlueGreenController extends EventEmitter<BlueGreenControllerEvents> {
  private readonly plans = new Map<string, BlueGreenPlan>();
  private readonly smokeTesting = new Set<string>();
  private readonly support: RolloutSupport;
  private readonly smokeTests: SmokeTestRunner;
  private readonly options: BlueGreenControllerOptions;
  private readonly logger?: Logger;

  constructor(
    deps: RolloutDependencies & { smokeTests: SmokeTestRunner },
    options: BlueGreenControllerOptions
  ) {
    super();
    this.support = new RolloutSupport('blue-green', deps);
    this.smokeTests = deps.smokeTests;
    this.options = options;
    this.logger = deps.logger;
  }

  /**
   * Deploy green, smoke-test it and swap on a pass
   *
   * @throws {ValidationError} for an invalid config, a missing or partial
   * blue, or another active rollout on the model
   */
  public async start(config: BlueGreenRolloutConfig): Promise<BlueGreenPlan> {
    const parsed = BlueGreenRolloutConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }
    const input = parsed.data;
    const model = input.modelName;

    this.support.assertAvailable(model);
    const blue = this.support.requireServingEndpoint(model, input.blueVersion, 'blueVersion');
    if (this.support.registry.findByVersion(model, input.greenVersion).length > 0) {
      throw new ValidationError(`Version '${input.greenVersion}' of model '${model}' is already deployed`, {
        field: 'greenVersion',
        model,
        version: input.greenVersion,
      });
    }

    const rollbackWindowMs = input.rollbackWindowMs ?? this.options.rollbackWindowMs;
    const checkIntervalMs = input.checkIntervalMs ?? this.options.checkIntervalMs;
    if (checkIntervalMs > rollbackWindowMs) {
      throw new ValidationError('checkIntervalMs must not exceed rollbackWindowMs', {
        field: 'checkIntervalMs',
        checkIntervalMs,
        rollbackWindowMs,
      });
    }

    const now = this.support.now();
    const plan: BlueGreenPlan = {
      id: this.support.newId(),
      kind: 'blue-green',
      modelName: model,
      targetVersion: input.greenVersion,
      baselineVersion: input.blueVersion,
      baselineEndpointId: blue.id,
      state: 'PENDING',
      createdAt: now,
      updatedAt: now,
      rollbackWindowMs,
      checkIntervalMs,
      errorRateThreshold: input.errorRateThreshold ?? this.options.errorRateThreshold,
      minSampleCount: input.minSampleCount ?? this.options.minSampleCount,
      smokeTestAttempts: 0,
    };

    this.support.acquire(model, plan.id);
    this.plans.set(plan.id, plan);
    this.logger?.info(
      { planId: plan.id, model, greenVersion: plan.targetVersion, blueVersion: plan.baselineVersion },
      'Blue-green rollout started'
    );
    this.emit('started', clonePlan(plan));
    await this.support.persist(plan);

    const deployment: EndpointDeploymentOptions = {
      costPerToken: input.endpoint?.costPerToken ?? this.options.endpointDefaults?.costPerToken ?? blue.costPerToken,
      capacity: input.endpoint?.capacity ?? this.options.endpointDefaults?.capacity ?? blue.capacity,
      config: input.endpoint?.config ?? this.options.endpointDefaults?.config ?? {},
    };

    let greenId: string;
    try {
      const green = await this.support.deploy(model, plan.targetVersion, deployment, 'draft');
      greenId = green.id;
    } catch (error) {
      await this.abort(plan, `Green deployment failed: ${toPlanError(error).message}`, error);
      return clonePlan(plan);
    }

    if (isTerminalState(plan.state)) {
      await this.support.removeEndpoint(model, greenId);
      return clonePlan(plan);
    }

    plan.targetEndpointId = greenId;
    await this.support.persist(plan);
    await this.runSmokeTest(plan);
    return clonePlan(plan);
  }

  /**
   * Re-run the smoke test of a plan left PENDING by a failure
   */
  public async retry(planId: string): Promise<BlueGreenPlan> {
    const plan = this.requirePlan(planId);
    if (plan.state !== 'PENDING' || plan.targetEndpointId === undefined) {
      throw new RolloutError('InvalidState', `Plan '${planId}' is not awaiting a smoke test (state ${plan.state})`, {
        planId,
        state: plan.state,
      });
    }
    await this.runSmokeTest(plan);
    return clonePlan(plan);
  }

  /**
   * Revert to blue during the rollback window
   */
  public async rollback(planId: string, reason = 'Manual rollback'): Promise<BlueGreenPlan> {
    const plan = this.requirePlan(planId);
    if (plan.state !== 'MONITORING') {
      throw new RolloutError('InvalidState', `Plan '${planId}' is not inside its rollback window (state ${plan.state})`, {
        planId,
        state: plan.state,
      });
    }
    await this.revert(plan, 'ROLLED_BACK', reason);
    return clonePlan(plan);
  }

  /**
   * Abort a rollout; blue ends with all traffic. Idempotent.
   */
  public async cancel(planId: string, reason = 'Cancelled by operator'): Promise<BlueGreenPlan> {
    const plan = this.requirePlan(planId);
    if (plan.state === 'MONITORING') {
      await this.revert(plan, 'ABORTED', reason);
    } else if (!isTerminalState(plan.state)) {
      await this.abort(plan, reason);
    }
    return clonePlan(plan);
  }

  /**
   * Check green's error rate since the swap
   */
  public async check(planId: string): Promise<BlueGreenPlan> {
    const plan = this.requirePlan(planId);
    const greenId = plan.targetEndpointId;
    if (plan.state !== 'MONITORING' || greenId === undefined || plan.swappedAt === undefined) {
      return clonePlan(plan);
    }

    const aggregate = this.support.metrics.getAggregate(greenId, this.support.now() - plan.swappedAt);
    if (aggregate.sampleCount >= plan.minSampleCount && aggregate.errorRate > plan.errorRateThreshold) {
      await this.revert(
        plan,
        'ROLLED_BACK',
        `Green error rate ${aggregate.errorRate.toFixed(4)} exceeded ${plan.errorRateThreshold} over ${aggregate.sampleCount} requests`
      );
    }
    return clonePlan(plan);
  }

  public getPlan(planId: string): BlueGreenPlan | undefined {
    const plan = this.plans.get(planId);
    return plan ? clonePlan(plan) : undefined;
  }

  public listPlans(filter: PlanFilter = {}): BlueGreenPlan[] {
    return Array.from(this.plans.values())
      .filter((p) => filter.modelName === undefined || p.modelName === filter.modelName)
      .filter((p) => !filter.activeOnly || !isTerminalState(p.state))
      .sort((a, b) => a.createdAt - b.createdAt || (a.id < b.id ? -1 : 1))
      .map((p) => clonePlan(p));
  }

  public getActivePlan(model: string): BlueGreenPlan | undefined {
    const planId = this.support.activePlanId(model);
    return planId === undefined ? undefined : this.getPlan(planId);
  }

  /**
   * Re-adopt a plan read back from the durable store
   *
   * A monitoring plan keeps whatever is left of its rollback window; a
   * pending plan with a registered green waits for retry().
   */
  public async resume(value: unknown): Promise<BlueGreenPlan> {
    const parsed = BlueGreenPlanSchema.safeParse(value);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }
    const plan = parsed.data;
    if (this.plans.has(plan.id)) {
      throw new ValidationError(`Plan '${plan.id}' is already loaded`, { field: 'id', planId: plan.id });
    }

    if (!isTerminalState(plan.state)) {
      this.support.acquire(plan.modelName, plan.id);
    }
    this.plans.set(plan.id, plan);
    this.support.track(plan.id);

    if (isTerminalState(plan.state)) {
      return clonePlan(plan);
    }

    const greenId = plan.targetEndpointId;
    if (greenId === undefined || !this.support.registry.getEndpoint(greenId)) {
      await this.abort(plan, 'Rollout interrupted before the green endpoint was registered');
      return clonePlan(plan);
    }

    if (plan.state === 'MONITORING' && plan.swappedAt !== undefined) {
      const remaining = Math.max(0, plan.swappedAt + plan.rollbackWindowMs - this.support.now());
      this.scheduleMonitoring(plan, remaining);
    }

    this.logger?.info({ planId: plan.id, model: plan.modelName, state: plan.state }, 'Blue-green rollout resumed');
    return clonePlan(plan);
  }

  public async shutdown(): Promise<void> {
    this.support.shutdown();
    this.logger?.info({ plans: this.plans.size }, 'Blue-green controller shutdown');
  }

  private async runSmokeTest(plan: BlueGreenPlan): Promise<void> {
    const greenId = plan.targetEndpointId;
    if (greenId === undefined || this.smokeTesting.has(plan.id)) {
      return;
    }

    this.smokeTesting.add(plan.id);
    let result: SmokeTestResult;
    try {
      result = await this.smokeTests.run(greenId);
    } catch (error) {
      result = { passed: false, report: { error: toPlanError(error).message } };
    } finally {
      this.smokeTesting.delete(plan.id);
    }

    if (plan.state !== 'PENDING') {
      // Cancelled while the test ran
      return;
    }

    plan.smokeTestAttempts++;
    plan.lastSmokeTestReport = result.report;
    plan.updatedAt = this.support.now();
    this.emit('smokeTest', clonePlan(plan), result);

    if (!result.passed) {
      const failure = new SmokeTestFailure(greenId, result.report);
      plan.error = toPlanError(failure);
      plan.reason = failure.message;

      this.logger?.warn(
        { planId: plan.id, endpointId: greenId, attempts: plan.smokeTestAttempts, report: result.report },
        'Smoke test failed; blue keeps serving'
      );
      await this.support.persist(plan);
      await this.support.notify({
        type: 'rollout.smoke_test_failed',
        planId: plan.id,
        kind: plan.kind,
        model: plan.modelName,
        state: plan.state,
        reason: failure.message,
        timestamp: this.support.now(),
        report: result.report,
      });
      return;
    }

    this.swap(plan, greenId);
    await this.support.persist(plan);
  }

  /**
   * All traffic to green in one commit
   */
  private swap(plan: BlueGreenPlan, greenId: string): void {
    const registry = this.support.registry;
    registry.commitWeights(plan.modelName, { [greenId]: 100 });
    registry.transition(greenId, 'active');

    plan.error = undefined;
    plan.reason = undefined;
    plan.swappedAt = this.support.now();
    const from = this.support.setState(plan, 'MONITORING');
    this.scheduleMonitoring(plan, plan.rollbackWindowMs);

    this.logger?.info(
      { planId: plan.id, model: plan.modelName, greenEndpointId: greenId, rollbackWindowMs: plan.rollbackWindowMs },
      'Traffic swapped to green'
    );
    this.emit('transition', clonePlan(plan), from);
  }

  private scheduleMonitoring(plan: BlueGreenPlan, windowMs: number): void {
    const timers = this.support.timers;
    timers.setInterval(
      this.checkTimer(plan.id),
      async () => {
        await this.check(plan.id);
      },
      plan.checkIntervalMs
    );
    timers.set(
      this.windowTimer(plan.id),
      async () => {
        await this.finalize(plan.id);
      },
      windowMs
    );
  }

  /**
   * Rollback window elapsed: retire blue
   */
  private async finalize(planId: string): Promise<void> {
    const plan = this.requirePlan(planId);
    if (plan.state !== 'MONITORING') {
      return;
    }

    // Last look at green before blue goes away
    await this.check(planId);
    if (plan.state !== 'MONITORING') {
      return;
    }

    this.clearTimers(plan.id);
    plan.reason = `No incident within ${plan.rollbackWindowMs}ms rollback window`;
    plan.completedAt = this.support.now();
    const from = this.support.setState(plan, 'SUCCEEDED');
    this.support.release(plan.modelName, plan.id);

    const blueId = plan.baselineEndpointId;
    if (this.support.registry.getEndpoint(blueId)) {
      this.support.registry.transition(blueId, 'retiring');
    }

    this.logger?.info({ planId: plan.id, model: plan.modelName, version: plan.targetVersion }, 'Blue-green rollout succeeded');
    this.emit('transition', clonePlan(plan), from);
    this.emit('completed', clonePlan(plan));

    // Blue has held weight 0 for the whole window, so it is already drained
    await this.support.removeEndpoint(plan.modelName, blueId);
    await this.support.persist(plan);
    await this.support.notifyTerminal(plan, 'SUCCEEDED');
  }

  /**
   * Atomic revert to blue; green drains and is removed
   */
  private async revert(plan: BlueGreenPlan, state: 'ROLLED_BACK' | 'ABORTED', reason: string): Promise<void> {
    if (isTerminalState(plan.state)) {
      return;
    }

    this.clearTimers(plan.id);
    plan.reason = reason;
    plan.completedAt = this.support.now();
    const from = this.support.setState(plan, state);

    const registry = this.support.registry;
    const greenId = plan.targetEndpointId;
    try {
      registry.commitWeights(plan.modelName, { [plan.baselineEndpointId]: 100 });
      if (greenId !== undefined) {
        this.support.retire(plan.modelName, greenId, this.options.drainGraceMs);
      }
    } catch (error) {
      this.logger?.error({ planId: plan.id, ...describeError(error) }, 'Failed to restore blue weight');
      plan.error = toPlanError(error);
    }
    this.support.release(plan.modelName, plan.id);

    this.logger?.warn({ planId: plan.id, model: plan.modelName, state, reason }, 'Blue-green rollout reverted');
    this.emit('transition', clonePlan(plan), from);
    this.emit('completed', clonePlan(plan));

    await this.support.persist(plan);
    await this.support.notifyTerminal(plan, state);
  }

  /**
   * End a plan that never swapped; blue was never touched
   */
  private async abort(plan: BlueGreenPlan, reason: string, error?: unknown): Promise<void> {
    if (isTerminalState(plan.state)) {
      return;
    }

    this.clearTimers(plan.id);
    plan.reason = reason;
    if (error !== undefined) {
      plan.error = toPlanError(error);
    }
    plan.completedAt = this.support.now();
    const from = this.support.setState(plan, 'ABORTED');

    const greenId = plan.targetEndpointId;
    if (greenId !== undefined) {
      this.support.retire(plan.modelName, greenId, 0);
    }
    this.support.release(plan.modelName, plan.id);

    this.logger?.warn(
      { planId: plan.id, model: plan.modelName, reason, errorCode: plan.error?.code },
      'Blue-green rollout aborted'
    );
    this.emit('transition', clonePlan(plan), from);
    this.emit('completed', clonePlan(plan));

    await this.support.persist(plan);
    await this.support.notifyTerminal(plan, 'ABORTED');
  }

  private clearTimers(planId: string): void {
    this.support.timers.clear(this.checkTimer(planId));
    this.support.timers.clear(this.windowTimer(planId));
  }

  private checkTimer(planId: string): string {
    return `check:${planId}`;
  }

  private windowTimer(planId: string): string {
    return `window:${planId}`;
  }

  private requirePlan(planId: string): BlueGreenPlan {
    const plan = this.plans.get(planId);
    if (!plan) {
      throw new RolloutError('NotFound', `Blue-green plan '${planId}' not found`, { planId });
    }
    return plan;
  }
}
