/**
 * Shared plumbing for the rollout controllers
 *
 * Endpoint provisioning and retirement, plan persistence, notifications and
 * the per-model rollout lock. Collaborator failures here are logged and
 * reported; they never leave the registry with a partial weight table.
 *
 * @module rollout/rollout-support
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { BackendOperationError, RolloutError, ValidationError } from '../api/errors.js';
import type { MetricsCollector } from '../metrics/metrics-collector.js';
import type { EndpointRegistry } from '../registry/endpoint-registry.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { EndpointState, ModelEndpoint } from '../types/endpoints.js';
import type {
  DeploymentBackend,
  NotificationSink,
  RolloutNotification,
  StateStore,
} from '../types/integrations.js';
import type {
  EndpointDeploymentOptions,
  EvaluationDecision,
  RolloutKind,
  RolloutPlan,
  RolloutState,
  TerminalRolloutState,
} from '../types/rollout.js';
import { describeError } from '../utils/logger-helpers.js';
import { MultiTimerGuard } from '../utils/timer-guard.js';

/**
 * Collaborators shared by both controllers
 */
export interface RolloutDependencies {
  registry: EndpointRegistry;
  metrics: MetricsCollector;
  backend: DeploymentBackend;
  notifications?: NotificationSink;
  store?: StateStore;
  logger?: Logger;
  telemetry?: TelemetryManager;

  /**
   * model → active plan id. Pass the same map to both controllers so a
   * model never runs a canary and a blue-green rollout at once.
   */
  activeRollouts?: Map<string, string>;

  now?: () => number;
  generateId?: () => string;
}

export const planStoreKey = (planId: string): string => `rollout/${planId}`;
export const planIndexKey = (kind: RolloutKind): string => `rollout/${kind}/index`;
export const registryStoreKey = (model: string): string => `registry/${model}`;
export const REGISTRY_INDEX_KEY = 'registry/index';

const TERMINAL_NOTIFICATIONS: Record<
  TerminalRolloutState,
  'rollout.succeeded' | 'rollout.rolled_back' | 'rollout.aborted'
> = {
  SUCCEEDED: 'rollout.succeeded',
  ROLLED_BACK: 'rollout.rolled_back',
  ABORTED: 'rollout.aborted',
};

export class RolloutSupport {
  readonly registry: EndpointRegistry;
  readonly metrics: MetricsCollector;
  readonly backend: DeploymentBackend;
  readonly logger?: Logger;
  readonly timers: MultiTimerGuard;

  private readonly kind: RolloutKind;
  private readonly deps: RolloutDependencies;
  private readonly activeRollouts: Map<string, string>;
  private readonly knownPlanIds = new Set<string>();
  private readonly clock: () => number;
  private readonly idGenerator: () => string;

  constructor(kind: RolloutKind, deps: RolloutDependencies) {
    this.kind = kind;
    this.deps = deps;
    this.registry = deps.registry;
    this.metrics = deps.metrics;
    this.backend = deps.backend;
    this.logger = deps.logger;
    this.activeRollouts = deps.activeRollouts ?? new Map();
    this.clock = deps.now ?? Date.now;
    this.idGenerator = deps.generateId ?? randomUUID;
    this.timers = new MultiTimerGuard((error, name) => {
      this.logger?.error({ timer: name, ...describeError(error) }, 'Rollout task failed');
    });
  }

  now(): number {
    return this.clock();
  }

  newId(): string {
    return this.idGenerator();
  }

  /**
   * Claim the model for a plan
   *
   * @throws {ValidationError} when another rollout is active for the model
   */
  acquire(model: string, planId: string): void {
    this.assertAvailable(model, planId);
    this.activeRollouts.set(model, planId);
  }

  /**
   * @throws {ValidationError} when a plan other than `planId` holds the model
   */
  assertAvailable(model: string, planId?: string): void {
    const holder = this.activeRollouts.get(model);
    if (holder !== undefined && holder !== planId) {
      throw new ValidationError(`Model '${model}' already has an active rollout (${holder})`, {
        field: 'modelName',
        model,
        planId: holder,
      });
    }
  }

  release(model: string, planId: string): void {
    if (this.activeRollouts.get(model) === planId) {
      this.activeRollouts.delete(model);
    }
  }

  activePlanId(model: string): string | undefined {
    return this.activeRollouts.get(model);
  }

  /**
   * The single endpoint of a version that currently holds all the traffic
   *
   * @throws {ValidationError} otherwise
   */
  requireServingEndpoint(model: string, version: string, field: string): Readonly<ModelEndpoint> {
    const endpoints = this.registry.findByVersion(model, version);
    if (endpoints.length === 0) {
      throw new ValidationError(`Model '${model}' has no endpoint for version '${version}'`, {
        field,
        model,
        version,
      });
    }
    const serving = endpoints.find((e) => e.weight === 100);
    if (!serving) {
      throw new ValidationError(
        `Version '${version}' of model '${model}' must serve 100% of traffic before a rollout`,
        { field, model, version }
      );
    }
    return serving;
  }

  /**
   * Create a deployment through the backend and register it at weight 0
   *
   * The endpoint id is passed to the backend as `config.endpointId`.
   *
   * @throws {BackendOperationError} when the backend fails
   */
  async deploy(
    model: string,
    version: string,
    options: EndpointDeploymentOptions,
    state: EndpointState
  ): Promise<Readonly<ModelEndpoint>> {
    const id = `${model}-${version}-${this.newId().slice(0, 8)}`;
    let address: string;
    try {
      address = await this.backend.create(model, version, { ...options.config, endpointId: id });
    } catch (error) {
      throw new BackendOperationError(
        'create',
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    let endpoint: Readonly<ModelEndpoint>;
    try {
      endpoint = this.registry.register({
        id,
        modelName: model,
        version,
        address,
        costPerToken: options.costPerToken,
        capacity: options.capacity,
        state,
      });
    } catch (error) {
      await this.backend.delete(id).catch((deleteError: unknown) => {
        this.logger?.error({ model, endpointId: id, ...describeError(deleteError) }, 'Endpoint delete failed');
      });
      throw error;
    }

    this.logger?.info({ model, version, endpointId: endpoint.id, address }, 'Endpoint deployed');
    return endpoint;
  }

  /**
   * Mark an endpoint retiring and remove it once the drain grace elapses
   */
  retire(model: string, endpointId: string, drainGraceMs: number): void {
    if (!this.registry.getEndpoint(endpointId)) {
      return;
    }
    this.registry.transition(endpointId, 'retiring');
    this.timers.set(
      `retire:${endpointId}`,
      () => this.removeEndpoint(model, endpointId),
      drainGraceMs
    );
  }

  /**
   * Deregister an endpoint, drop its metrics and delete the deployment
   */
  async removeEndpoint(model: string, endpointId: string): Promise<void> {
    this.timers.clear(`retire:${endpointId}`);

    if (this.registry.getEndpoint(endpointId)) {
      try {
        this.registry.deregister(endpointId);
      } catch (error) {
        // Still weighted: a later commit put traffic back on it
        this.logger?.warn({ model, endpointId, ...describeError(error) }, 'Endpoint kept registered');
        return;
      }
    }
    this.metrics.forget(endpointId);
    await this.persistRegistry(model);

    try {
      await this.backend.delete(endpointId);
      this.logger?.info({ model, endpointId }, 'Endpoint deleted');
    } catch (error) {
      const wrapped = new BackendOperationError(
        'delete',
        error instanceof Error ? error.message : String(error),
        error
      );
      this.logger?.error({ model, endpointId, ...describeError(wrapped) }, 'Endpoint delete failed');
      await this.notify({
        type: 'endpoint.delete_failed',
        model,
        endpointId,
        reason: wrapped.message,
        timestamp: this.now(),
      });
    }
  }

  /**
   * Write the plan and its model's registry snapshot to the store
   */
  async persist(plan: RolloutPlan): Promise<void> {
    const store = this.deps.store;
    if (!store) {
      return;
    }
    try {
      this.knownPlanIds.add(plan.id);
      await store.put(planStoreKey(plan.id), plan);
      await store.put(planIndexKey(this.kind), Array.from(this.knownPlanIds).sort());
    } catch (error) {
      this.logger?.error({ planId: plan.id, ...describeError(error) }, 'Failed to persist plan');
    }
    await this.persistRegistry(plan.modelName);
  }

  async persistRegistry(model: string): Promise<void> {
    const store = this.deps.store;
    if (!store) {
      return;
    }
    try {
      await store.put(registryStoreKey(model), this.registry.toJSON(model));
      await store.put(REGISTRY_INDEX_KEY, this.registry.listModels());
    } catch (error) {
      this.logger?.error({ model, ...describeError(error) }, 'Failed to persist registry snapshot');
    }
  }

  /**
   * Remember a plan id restored from the store so later index writes keep it
   */
  track(planId: string): void {
    this.knownPlanIds.add(planId);
  }

  async notify(event: RolloutNotification): Promise<void> {
    const sink = this.deps.notifications;
    if (!sink) {
      return;
    }
    try {
      await sink.notify(event);
    } catch (error) {
      this.logger?.error({ type: event.type, ...describeError(error) }, 'Notification delivery failed');
    }
  }

  async notifyTerminal(plan: RolloutPlan, state: TerminalRolloutState): Promise<void> {
    await this.notify({
      type: TERMINAL_NOTIFICATIONS[state],
      planId: plan.id,
      kind: plan.kind,
      model: plan.modelName,
      state,
      reason: plan.reason ?? '',
      timestamp: this.now(),
      ...(plan.error ? { errorCode: plan.error.code } : {}),
    });
  }

  /**
   * Apply a state change to a plan and report it
   */
  setState(plan: RolloutPlan, state: RolloutState): RolloutState {
    const from = plan.state;
    plan.state = state;
    plan.updatedAt = this.now();
    this.deps.telemetry?.recordTransition(plan.kind, plan.modelName, state);
    this.logger?.debug({ planId: plan.id, from, to: state }, 'Rollout state changed');
    return from;
  }

  recordEvaluation(model: string, decision: EvaluationDecision): void {
    this.deps.telemetry?.recordEvaluation(model, decision);
  }

  shutdown(): void {
    this.timers.clearAll();
  }
}

/**
 * Serializable form of a plan error
 */
export function toPlanError(error: unknown): { code: string; message: string } {
  if (error instanceof RolloutError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'UnknownError',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Deep copy handed out by getPlan/listPlans
 */
export function clonePlan<T extends RolloutPlan>(plan: T): T {
  return structuredClone(plan);
}
