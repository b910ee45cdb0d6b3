/**
 * Canary Controller - progressive rollout with automated evaluation
 *
 * PENDING → RAMPING(i) → EVALUATING → RAMPING(i+1) | SUCCEEDED | ROLLED_BACK,
 * with ABORTED reachable from any non-terminal state.
 *
 * Each plan has one evaluation timer and at most one evaluation in flight.
 * State changes and weight commits happen synchronously before any await,
 * so a cancel racing an evaluation always sees a consistent plan.
 *
 * @module rollout/canary-controller
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  EvaluationInconclusiveError,
  RolloutError,
  ValidationError,
  zodErrorToValidationError,
} from '../api/errors.js';
import { checkIncrease, passRatio } from '../metrics/comparison.js';
import type { AggregateWindow } from '../types/metrics.js';
import {
  isTerminalState,
  type CanaryPlan,
  type CanaryRolloutConfig,
  type CriterionResult,
  type EndpointDeploymentOptions,
  type EvaluationDecision,
  type EvaluationRecord,
  type RolloutState,
} from '../types/rollout.js';
import { CanaryPlanSchema, CanaryRolloutConfigSchema } from '../types/schemas/rollout.js';
import { describeError } from '../utils/logger-helpers.js';
import {
  RolloutSupport,
  clonePlan,
  toPlanError,
  type RolloutDependencies,
} from './rollout-support.js';

export interface CanaryControllerOptions {
  /** Used when a rollout config omits evaluationIntervalMs (ms) */
  evaluationIntervalMs: number;

  /** Used when a rollout config omits minSampleCount */
  minSampleCount: number;

  /** Consecutive deferrals tolerated when a rollout config omits maxDeferrals */
  maxDeferrals: number;

  /** Time a retiring endpoint keeps serving in-flight requests (ms) */
  drainGraceMs: number;

  /** Absolute error-rate limit when the baseline error rate is zero */
  zeroBaselineErrorRate: number;

  /** Absolute p95 limit (ms) when the baseline p95 is zero */
  zeroBaselineLatencyMs: number;

  /** Deployment parameters used when a rollout config omits them */
  endpointDefaults?: Partial<EndpointDeploymentOptions>;
}

export interface CanaryControllerEvents {
  started: (plan: CanaryPlan) => void;
  transition: (plan: CanaryPlan, from: RolloutState) => void;
  evaluation: (plan: CanaryPlan, record: EvaluationRecord) => void;
  completed: (plan: CanaryPlan) => void;
}

export interface PlanFilter {
  modelName?: string;
  activeOnly?: boolean;
}

/**
 * Canary Controller
 */
export class CanaryController extends EventEmitter<CanaryControllerEvents> {
  private readonly plans = new Map<string, CanaryPlan>();
  private readonly evaluating = new Set<string>();
  private readonly support: RolloutSupport;
  private readonly options: CanaryControllerOptions;
  private readonly logger?: Logger;

  constructor(deps: RolloutDependencies, options: CanaryControllerOptions) {
    super();
    this.support = new RolloutSupport('canary', deps);
    this.options = options;
    this.logger = deps.logger;
  }

  /**
   * Start a canary rollout
   *
   * Configuration problems throw before anything changes. Failures after the
   * plan exists (backend errors included) end the plan ABORTED and the plan
   * is returned.
   *
   * @throws {ValidationError} for an invalid config, a missing or partial
   * baseline, or another active rollout on the model
   */
  public async start(config: CanaryRolloutConfig): Promise<CanaryPlan> {
    const parsed = CanaryRolloutConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }
    const input = parsed.data;
    const model = input.modelName;

    this.support.assertAvailable(model);
    const baseline = this.support.requireServingEndpoint(model, input.baselineVersion, 'baselineVersion');
    if (this.support.registry.findByVersion(model, input.canaryVersion).length > 0) {
      throw new ValidationError(`Version '${input.canaryVersion}' of model '${model}' is already deployed`, {
        field: 'canaryVersion',
        model,
        version: input.canaryVersion,
      });
    }

    const now = this.support.now();
    const firstStep = input.trafficSteps[0] ?? 100;
    const evaluationIntervalMs = input.evaluationIntervalMs ?? this.options.evaluationIntervalMs;
    const plan: CanaryPlan = {
      id: this.support.newId(),
      kind: 'canary',
      modelName: model,
      targetVersion: input.canaryVersion,
      baselineVersion: input.baselineVersion,
      baselineEndpointId: baseline.id,
      state: 'PENDING',
      createdAt: now,
      updatedAt: now,
      trafficSteps: [...input.trafficSteps],
      stepIndex: 0,
      trafficPercentage: 0,
      successCriteria: { ...input.successCriteria },
      evaluationIntervalMs,
      minSampleCount: input.minSampleCount ?? this.options.minSampleCount,
      maxDeferrals: input.maxDeferrals ?? this.options.maxDeferrals,
      deferrals: 0,
      stepStartedAt: now,
      // A single 100% step leaves the baseline no traffic to sample after start
      baselineSince: firstStep < 100 ? now : now - evaluationIntervalMs,
      evaluations: [],
    };

    this.support.acquire(model, plan.id);
    this.plans.set(plan.id, plan);
    this.logger?.info(
      {
        planId: plan.id,
        model,
        canaryVersion: plan.targetVersion,
        baselineVersion: plan.baselineVersion,
        trafficSteps: plan.trafficSteps,
      },
      'Canary rollout started'
    );
    this.emit('started', clonePlan(plan));
    await this.support.persist(plan);

    const deployment: EndpointDeploymentOptions = {
      costPerToken: input.endpoint?.costPerToken ?? this.options.endpointDefaults?.costPerToken ?? baseline.costPerToken,
      capacity: input.endpoint?.capacity ?? this.options.endpointDefaults?.capacity ?? baseline.capacity,
      config: input.endpoint?.config ?? this.options.endpointDefaults?.config ?? {},
    };

    let endpointId: string;
    try {
      const endpoint = await this.support.deploy(model, plan.targetVersion, deployment, 'canary');
      endpointId = endpoint.id;
    } catch (error) {
      await this.terminate(plan, 'ABORTED', `Canary deployment failed: ${toPlanError(error).message}`, error);
      return clonePlan(plan);
    }

    if (isTerminalState(plan.state)) {
      // Cancelled while the backend was creating the deployment
      await this.support.removeEndpoint(model, endpointId);
      return clonePlan(plan);
    }

    plan.targetEndpointId = endpointId;
    try {
      this.applyStep(plan, 0);
    } catch (error) {
      await this.terminate(plan, 'ABORTED', `Initial traffic step failed: ${toPlanError(error).message}`, error);
      return clonePlan(plan);
    }

    this.logger?.info(
      { planId: plan.id, canaryEndpointId: endpointId, trafficPercentage: firstStep },
      'Canary receiving traffic'
    );
    await this.support.persist(plan);
    return clonePlan(plan);
  }

  /**
   * Evaluate the current step now
   *
   * Runs from the plan's timer; a call while another evaluation is in
   * flight, or on a plan that is not ramping, does nothing.
   */
  public async evaluate(planId: string): Promise<CanaryPlan> {
    const plan = this.requirePlan(planId);
    if (plan.state !== 'RAMPING' || this.evaluating.has(planId)) {
      return clonePlan(plan);
    }

    this.evaluating.add(planId);
    this.support.timers.clear(this.timerName(planId));
    try {
      await this.runEvaluation(plan);
    } catch (error) {
      this.logger?.error({ planId, ...describeError(error) }, 'Canary evaluation failed');
      await this.terminate(plan, 'ABORTED', `Evaluation failed: ${toPlanError(error).message}`, error);
    } finally {
      this.evaluating.delete(planId);
    }
    return clonePlan(plan);
  }

  /**
   * Abort a rollout through the rollback path. Idempotent.
   */
  public async cancel(planId: string, reason = 'Cancelled by operator'): Promise<CanaryPlan> {
    const plan = this.requirePlan(planId);
    if (!isTerminalState(plan.state)) {
      await this.terminate(plan, 'ABORTED', reason);
    }
    return clonePlan(plan);
  }

  public getPlan(planId: string): CanaryPlan | undefined {
    const plan = this.plans.get(planId);
    return plan ? clonePlan(plan) : undefined;
  }

  public listPlans(filter: PlanFilter = {}): CanaryPlan[] {
    return Array.from(this.plans.values())
      .filter((p) => filter.modelName === undefined || p.modelName === filter.modelName)
      .filter((p) => !filter.activeOnly || !isTerminalState(p.state))
      .sort((a, b) => a.createdAt - b.createdAt || (a.id < b.id ? -1 : 1))
      .map((p) => clonePlan(p));
  }

  public getActivePlan(model: string): CanaryPlan | undefined {
    const planId = this.support.activePlanId(model);
    return planId === undefined ? undefined : this.getPlan(planId);
  }

  /**
   * Re-adopt a plan read back from the durable store
   *
   * Expects the registry to be restored first. A plan that had not yet
   * registered its canary is aborted; a ramping plan gets a fresh
   * evaluation interval.
   */
  public async resume(value: unknown): Promise<CanaryPlan> {
    const parsed = CanaryPlanSchema.safeParse(value);
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

    const target = plan.targetEndpointId;
    if (target === undefined || !this.support.registry.getEndpoint(target)) {
      await this.terminate(plan, 'ABORTED', 'Rollout interrupted before the canary endpoint was registered');
      return clonePlan(plan);
    }

    const from = this.support.setState(plan, 'RAMPING');
    this.emit('transition', clonePlan(plan), from);
    this.schedule(plan);
    this.logger?.info(
      { planId: plan.id, model: plan.modelName, stepIndex: plan.stepIndex },
      'Canary rollout resumed'
    );
    await this.support.persist(plan);
    return clonePlan(plan);
  }

  /**
   * Schedule removal of a model's restored `retiring` endpoints
   *
   * Drain timers do not survive a restart; each endpoint gets a full grace
   * period from now.
   */
  public resumeDrains(model: string): string[] {
    const draining = this.support.registry
      .getSnapshot(model)
      .endpoints.filter((e) => e.state === 'retiring' && e.weight === 0)
      .map((e) => e.id);
    for (const endpointId of draining) {
      this.support.retire(model, endpointId, this.options.drainGraceMs);
    }
    if (draining.length > 0) {
      this.logger?.info({ model, endpoints: draining }, 'Endpoint drains resumed');
    }
    return draining;
  }

  /**
   * Stop all timers. Plans keep their current state for a later resume.
   */
  public async shutdown(): Promise<void> {
    this.support.shutdown();
    this.logger?.info({ plans: this.plans.size }, 'Canary controller shutdown');
  }

  private async runEvaluation(plan: CanaryPlan): Promise<void> {
    const targetId = plan.targetEndpointId;
    if (targetId === undefined) {
      throw new RolloutError('InvalidState', `Plan '${plan.id}' has no canary endpoint`, {
        planId: plan.id,
      });
    }

    const from = this.support.setState(plan, 'EVALUATING');
    this.emit('transition', clonePlan(plan), from);

    const now = this.support.now();
    const metrics = this.support.metrics;
    const canary = metrics.getAggregate(targetId, now - plan.stepStartedAt);
    const baseline = metrics.getAggregate(plan.baselineEndpointId, now - plan.baselineSince);

    if (canary.sampleCount < plan.minSampleCount || baseline.sampleCount < plan.minSampleCount) {
      plan.deferrals++;
      const exhausted = plan.deferrals >= plan.maxDeferrals;
      this.recordEvaluation(plan, exhausted ? 'abort' : 'defer', canary, baseline, [], 0);

      if (exhausted) {
        await this.terminate(
          plan,
          'ABORTED',
          `Evaluation inconclusive: fewer than ${plan.minSampleCount} samples after ${plan.deferrals} intervals`,
          new EvaluationInconclusiveError(plan.id, plan.deferrals)
        );
        return;
      }

      this.logger?.info(
        {
          planId: plan.id,
          canarySamples: canary.sampleCount,
          baselineSamples: baseline.sampleCount,
          minSampleCount: plan.minSampleCount,
          deferrals: plan.deferrals,
        },
        'Canary evaluation deferred'
      );
      const back = this.support.setState(plan, 'RAMPING');
      this.emit('transition', clonePlan(plan), back);
      this.schedule(plan);
      await this.support.persist(plan);
      return;
    }

    plan.deferrals = 0;
    const criteria = [
      checkIncrease(
        'error_rate',
        canary.errorRate,
        baseline.errorRate,
        plan.successCriteria.maxErrorRateIncrease,
        this.options.zeroBaselineErrorRate
      ),
      checkIncrease(
        'latency_p95',
        canary.latency.p95,
        baseline.latency.p95,
        plan.successCriteria.maxLatencyIncrease,
        this.options.zeroBaselineLatencyMs
      ),
    ];
    const confidence = passRatio(criteria);
    const failed = criteria.filter((c) => !c.passed);

    if (failed.length > 0) {
      this.recordEvaluation(plan, 'rollback', canary, baseline, criteria, confidence);
      await this.terminate(plan, 'ROLLED_BACK', `Canary failed: ${failed.map(describeCriterion).join('; ')}`);
      return;
    }

    if (plan.stepIndex >= plan.trafficSteps.length - 1) {
      this.recordEvaluation(plan, 'succeed', canary, baseline, criteria, confidence);
      await this.succeed(plan);
      return;
    }

    this.recordEvaluation(plan, 'advance', canary, baseline, criteria, confidence);
    this.applyStep(plan, plan.stepIndex + 1);
    this.logger?.info(
      { planId: plan.id, stepIndex: plan.stepIndex, trafficPercentage: plan.trafficPercentage },
      'Canary advanced'
    );
    await this.support.persist(plan);
  }

  /**
   * Commit the step's weights and start its evaluation interval
   */
  private applyStep(plan: CanaryPlan, stepIndex: number): void {
    const targetId = plan.targetEndpointId;
    const percentage = plan.trafficSteps[stepIndex];
    if (targetId === undefined || percentage === undefined) {
      throw new RolloutError('InvalidState', `Plan '${plan.id}' cannot enter step ${stepIndex}`, {
        planId: plan.id,
        stepIndex,
      });
    }

    this.support.registry.commitWeights(plan.modelName, {
      [plan.baselineEndpointId]: 100 - percentage,
      [targetId]: percentage,
    });

    const now = this.support.now();
    plan.stepIndex = stepIndex;
    plan.trafficPercentage = percentage;
    plan.stepStartedAt = now;
    if (percentage < 100) {
      plan.baselineSince = now;
    }

    const from = this.support.setState(plan, 'RAMPING');
    this.emit('transition', clonePlan(plan), from);
    this.schedule(plan);
  }

  private async succeed(plan: CanaryPlan): Promise<void> {
    const targetId = plan.targetEndpointId;
    if (targetId === undefined) {
      throw new RolloutError('InvalidState', `Plan '${plan.id}' has no canary endpoint`, {
        planId: plan.id,
      });
    }

    this.support.timers.clear(this.timerName(plan.id));
    plan.reason = `All ${plan.trafficSteps.length} traffic steps passed`;
    plan.completedAt = this.support.now();
    const from = this.support.setState(plan, 'SUCCEEDED');

    this.support.registry.transition(targetId, 'active');
    this.support.retire(plan.modelName, plan.baselineEndpointId, this.options.drainGraceMs);
    this.support.release(plan.modelName, plan.id);

    this.logger?.info(
      { planId: plan.id, model: plan.modelName, version: plan.targetVersion },
      'Canary rollout succeeded'
    );
    this.emit('transition', clonePlan(plan), from);
    this.emit('completed', clonePlan(plan));

    await this.support.persist(plan);
    await this.support.notifyTerminal(plan, 'SUCCEEDED');
  }

  /**
   * Rollback path shared by failed evaluations, aborts and cancel
   *
   * Baseline returns to 100 in one commit and the canary drains.
   */
  private async terminate(
    plan: CanaryPlan,
    state: 'ROLLED_BACK' | 'ABORTED',
    reason: string,
    error?: unknown
  ): Promise<void> {
    if (isTerminalState(plan.state)) {
      return;
    }

    this.support.timers.clear(this.timerName(plan.id));
    plan.reason = reason;
    if (error !== undefined) {
      plan.error = toPlanError(error);
    }
    plan.completedAt = this.support.now();
    const from = this.support.setState(plan, state);
    plan.trafficPercentage = 0;

    const targetId = plan.targetEndpointId;
    if (targetId !== undefined && this.support.registry.getEndpoint(targetId)) {
      try {
        this.support.registry.commitWeights(plan.modelName, { [plan.baselineEndpointId]: 100 });
      } catch (commitError) {
        this.logger?.error(
          { planId: plan.id, ...describeError(commitError) },
          'Failed to restore baseline weight'
        );
      }
      this.support.retire(plan.modelName, targetId, this.options.drainGraceMs);
    }
    this.support.release(plan.modelName, plan.id);

    this.logger?.warn(
      { planId: plan.id, model: plan.modelName, state, reason, errorCode: plan.error?.code },
      'Canary rollout ended'
    );
    this.emit('transition', clonePlan(plan), from);
    this.emit('completed', clonePlan(plan));

    await this.support.persist(plan);
    await this.support.notifyTerminal(plan, state);
  }

  private recordEvaluation(
    plan: CanaryPlan,
    decision: EvaluationDecision,
    canary: AggregateWindow,
    baseline: AggregateWindow,
    criteria: CriterionResult[],
    confidence: number
  ): EvaluationRecord {
    const record: EvaluationRecord = {
      timestamp: this.support.now(),
      stepIndex: plan.stepIndex,
      trafficPercentage: plan.trafficPercentage,
      decision,
      canary,
      baseline,
      criteria,
      confidence,
    };
    plan.evaluations.push(record);
    this.support.recordEvaluation(plan.modelName, decision);
    this.emit('evaluation', clonePlan(plan), record);
    return record;
  }

  private schedule(plan: CanaryPlan): void {
    this.support.timers.set(
      this.timerName(plan.id),
      async () => {
        await this.evaluate(plan.id);
      },
      plan.evaluationIntervalMs
    );
  }

  private timerName(planId: string): string {
    return `evaluate:${planId}`;
  }

  private requirePlan(planId: string): CanaryPlan {
    const plan = this.plans.get(planId);
    if (!plan) {
      throw new RolloutError('NotFound', `Canary plan '${planId}' not found`, { planId });
    }
    return plan;
  }
}

function describeCriterion(criterion: CriterionResult): string {
  return criterion.mode === 'relative'
    ? `${criterion.metric} increased ${(criterion.delta * 100).toFixed(1)}% (max ${(criterion.threshold * 100).toFixed(1)}%)`
    : `${criterion.metric} ${criterion.candidateValue} above absolute limit ${criterion.threshold}`;
}
