/**
 * Endpoint Registry
 *
 * Source of truth for the deployments of each model and their traffic
 * weights. Every mutation builds a new frozen snapshot and swaps it in with
 * a single assignment, so readers holding a snapshot always see one
 * consistent weight table that sums to 100.
 *
 * @module registry/endpoint-registry
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { RolloutError, ValidationError, zodErrorToValidationError } from '../api/errors.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type {
  EndpointRegistration,
  EndpointState,
  ModelEndpoint,
  RegistrySnapshot,
  WeightMap,
} from '../types/endpoints.js';
import { EndpointRegistrationSchema, RegistrySnapshotSchema } from '../types/schemas/rollout.js';

/** Concurrent requests assumed when a registration omits capacity */
export const DEFAULT_ENDPOINT_CAPACITY = 100;

const TOTAL_WEIGHT = 100;
const WEIGHT_EPSILON = 1e-6;

export interface EndpointRegistryEvents {
  committed: (snapshot: RegistrySnapshot) => void;
  registered: (endpoint: Readonly<ModelEndpoint>) => void;
  deregistered: (endpoint: Readonly<ModelEndpoint>) => void;
}

export interface EndpointRegistryOptions {
  logger?: Logger;
  telemetry?: TelemetryManager;
  /** Clock (ms), injectable for tests */
  now?: () => number;
}

function emptySnapshot(model: string): RegistrySnapshot {
  const endpoints: ReadonlyArray<Readonly<ModelEndpoint>> = Object.freeze([]);
  const weights: Readonly<Record<string, number>> = Object.freeze({});
  return Object.freeze({ model, version: 0, endpoints, weights, committedAt: 0 });
}

/**
 * Endpoint Registry
 */
export class EndpointRegistry extends EventEmitter<EndpointRegistryEvents> {
  private readonly snapshots = new Map<string, RegistrySnapshot>();
  /** endpointId → modelName */
  private readonly owners = new Map<string, string>();
  private readonly logger?: Logger;
  private readonly telemetry?: TelemetryManager;
  private readonly now: () => number;

  constructor(options: EndpointRegistryOptions = {}) {
    super();
    this.logger = options.logger;
    this.telemetry = options.telemetry;
    this.now = options.now ?? Date.now;
  }

  /**
   * Register an endpoint
   *
   * The first endpoint of a model becomes active with the full weight;
   * later endpoints join at weight 0.
   */
  public register(registration: EndpointRegistration): Readonly<ModelEndpoint> {
    const parsed = EndpointRegistrationSchema.safeParse(registration);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }
    const input = parsed.data;

    if (this.owners.has(input.id)) {
      throw new ValidationError(`Endpoint '${input.id}' is already registered`, {
        field: 'id',
        endpointId: input.id,
      });
    }

    const current = this.getSnapshot(input.modelName);
    const first = current.endpoints.length === 0;
    const state: EndpointState = first ? 'active' : input.state ?? 'draft';

    if (state === 'canary') {
      this.assertNoOtherCanary(current, input.id);
    }

    const endpoint: ModelEndpoint = {
      id: input.id,
      modelName: input.modelName,
      version: input.version,
      address: input.address,
      costPerToken: input.costPerToken,
      state,
      weight: first ? TOTAL_WEIGHT : 0,
      healthy: input.healthy ?? true,
      capacity: input.capacity ?? DEFAULT_ENDPOINT_CAPACITY,
      createdAt: this.now(),
    };

    this.owners.set(endpoint.id, endpoint.modelName);
    const snapshot = this.publish(endpoint.modelName, [...current.endpoints, endpoint]);
    const published = this.requireIn(snapshot, endpoint.id);

    this.logger?.info(
      {
        endpointId: endpoint.id,
        model: endpoint.modelName,
        version: endpoint.version,
        state: endpoint.state,
        weight: endpoint.weight,
      },
      'Endpoint registered'
    );
    this.emit('registered', published);
    return published;
  }

  /**
   * Remove an endpoint that no longer holds traffic
   *
   * The last endpoint of a model may be removed while holding weight.
   */
  public deregister(endpointId: string): Readonly<ModelEndpoint> {
    const { snapshot, endpoint } = this.locate(endpointId);
    const remaining = snapshot.endpoints.filter((e) => e.id !== endpointId);

    if (endpoint.weight > 0 && remaining.length > 0) {
      throw new ValidationError(
        `Endpoint '${endpointId}' still holds weight ${endpoint.weight}; commit it to 0 first`,
        { field: 'weight', endpointId, weight: endpoint.weight }
      );
    }

    this.owners.delete(endpointId);
    this.publish(snapshot.model, remaining);

    this.logger?.info({ endpointId, model: snapshot.model }, 'Endpoint deregistered');
    this.emit('deregistered', endpoint);
    return endpoint;
  }

  /**
   * Atomically replace a model's weight table
   *
   * Ids omitted from the map get 0. The map must reference known endpoints
   * of the model and sum to 100.
   */
  public commitWeights(model: string, weights: WeightMap): RegistrySnapshot {
    const current = this.getSnapshot(model);
    if (current.endpoints.length === 0) {
      throw new ValidationError(`Model '${model}' has no registered endpoints`, {
        field: 'model',
        model,
      });
    }

    const known = new Set(current.endpoints.map((e) => e.id));
    let sum = 0;
    for (const [endpointId, weight] of Object.entries(weights)) {
      if (!known.has(endpointId)) {
        throw new ValidationError(`Unknown endpoint '${endpointId}' for model '${model}'`, {
          field: `weights.${endpointId}`,
          model,
          endpointId,
        });
      }
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ValidationError(
          `Weight for endpoint '${endpointId}' must be a finite, non-negative number`,
          { field: `weights.${endpointId}`, endpointId, weight }
        );
      }
      sum += weight;
    }

    if (Math.abs(sum - TOTAL_WEIGHT) > WEIGHT_EPSILON) {
      throw new ValidationError(`Weights for model '${model}' must sum to 100 (got ${sum})`, {
        field: 'weights',
        model,
        sum,
      });
    }

    const next = current.endpoints.map((e) => ({ ...e, weight: weights[e.id] ?? 0 }));
    const snapshot = this.publish(model, next);
    this.telemetry?.recordWeightCommit(model);

    this.logger?.info(
      { model, version: snapshot.version, weights: snapshot.weights },
      'Weights committed'
    );
    return snapshot;
  }

  /**
   * Move an endpoint to another lifecycle state
   */
  public transition(endpointId: string, state: EndpointState): Readonly<ModelEndpoint> {
    const { snapshot, endpoint } = this.locate(endpointId);
    if (endpoint.state === state) {
      return endpoint;
    }
    if (state === 'canary') {
      this.assertNoOtherCanary(snapshot, endpointId);
    }

    const next = this.publish(
      snapshot.model,
      snapshot.endpoints.map((e) => (e.id === endpointId ? { ...e, state } : e))
    );

    this.logger?.debug({ endpointId, from: endpoint.state, to: state }, 'Endpoint state changed');
    return this.requireIn(next, endpointId);
  }

  /**
   * Flip the health flag; unhealthy endpoints are skipped by the router
   */
  public setHealth(endpointId: string, healthy: boolean): Readonly<ModelEndpoint> {
    const { snapshot, endpoint } = this.locate(endpointId);
    if (endpoint.healthy === healthy) {
      return endpoint;
    }

    const next = this.publish(
      snapshot.model,
      snapshot.endpoints.map((e) => (e.id === endpointId ? { ...e, healthy } : e))
    );

    this.logger?.warn({ endpointId, model: snapshot.model, healthy }, 'Endpoint health changed');
    return this.requireIn(next, endpointId);
  }

  /**
   * Current immutable snapshot (version 0 and no endpoints for an unknown model)
   */
  public getSnapshot(model: string): RegistrySnapshot {
    return this.snapshots.get(model) ?? emptySnapshot(model);
  }

  public getEndpoint(endpointId: string): Readonly<ModelEndpoint> | undefined {
    const model = this.owners.get(endpointId);
    if (model === undefined) {
      return undefined;
    }
    return this.getSnapshot(model).endpoints.find((e) => e.id === endpointId);
  }

  public findByVersion(model: string, version: string): ReadonlyArray<Readonly<ModelEndpoint>> {
    return this.getSnapshot(model).endpoints.filter((e) => e.version === version);
  }

  /**
   * Models with at least one endpoint, sorted by name
   */
  public listModels(): string[] {
    return Array.from(this.snapshots.values())
      .filter((s) => s.endpoints.length > 0)
      .map((s) => s.model)
      .sort();
  }

  /**
   * Serializable snapshot for the durable store
   */
  public toJSON(model: string): RegistrySnapshot {
    return this.getSnapshot(model);
  }

  /**
   * Replace a model's endpoints with a snapshot read back from the store
   */
  public restore(value: unknown): RegistrySnapshot {
    const parsed = RegistrySnapshotSchema.safeParse(value);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }
    const restored = parsed.data;
    const model = restored.model;

    let sum = 0;
    let canaries = 0;
    for (const endpoint of restored.endpoints) {
      if (endpoint.modelName !== model) {
        throw new ValidationError(`Endpoint '${endpoint.id}' does not belong to model '${model}'`, {
          field: 'endpoints',
          endpointId: endpoint.id,
        });
      }
      const owner = this.owners.get(endpoint.id);
      if (owner !== undefined && owner !== model) {
        throw new ValidationError(`Endpoint '${endpoint.id}' is registered under model '${owner}'`, {
          field: 'endpoints',
          endpointId: endpoint.id,
        });
      }
      if (endpoint.state === 'canary') {
        canaries++;
      }
      sum += restored.weights[endpoint.id] ?? 0;
    }

    if (canaries > 1) {
      throw new ValidationError(`Snapshot for model '${model}' holds more than one canary`, {
        field: 'endpoints',
      });
    }
    if (restored.endpoints.length > 0 && Math.abs(sum - TOTAL_WEIGHT) > WEIGHT_EPSILON) {
      throw new ValidationError(`Snapshot weights for model '${model}' must sum to 100 (got ${sum})`, {
        field: 'weights',
        sum,
      });
    }

    for (const endpoint of this.getSnapshot(model).endpoints) {
      this.owners.delete(endpoint.id);
    }
    for (const endpoint of restored.endpoints) {
      this.owners.set(endpoint.id, model);
    }

    const snapshot = this.publish(
      model,
      restored.endpoints.map((e) => ({ ...e, weight: restored.weights[e.id] ?? 0 })),
      restored.version
    );
    this.logger?.info({ model, version: snapshot.version }, 'Registry snapshot restored');
    return snapshot;
  }

  /**
   * Build, freeze and swap in a new snapshot
   */
  private publish(
    model: string,
    endpoints: ReadonlyArray<Readonly<ModelEndpoint>>,
    minVersion = 0
  ): RegistrySnapshot {
    const previous = this.getSnapshot(model);
    const sorted = [...endpoints]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((e) => Object.freeze({ ...e }));

    const weights: Record<string, number> = {};
    for (const endpoint of sorted) {
      weights[endpoint.id] = endpoint.weight;
    }

    const snapshot: RegistrySnapshot = Object.freeze({
      model,
      version: Math.max(previous.version + 1, minVersion),
      endpoints: Object.freeze(sorted),
      weights: Object.freeze(weights),
      committedAt: this.now(),
    });

    this.snapshots.set(model, snapshot);
    this.emit('committed', snapshot);
    return snapshot;
  }

  private locate(endpointId: string): {
    snapshot: RegistrySnapshot;
    endpoint: Readonly<ModelEndpoint>;
  } {
    const model = this.owners.get(endpointId);
    const snapshot = model === undefined ? undefined : this.snapshots.get(model);
    const endpoint = snapshot?.endpoints.find((e) => e.id === endpointId);
    if (!snapshot || !endpoint) {
      throw new RolloutError('NotFound', `Endpoint '${endpointId}' is not registered`, {
        endpointId,
      });
    }
    return { snapshot, endpoint };
  }

  private requireIn(snapshot: RegistrySnapshot, endpointId: string): Readonly<ModelEndpoint> {
    const endpoint = snapshot.endpoints.find((e) => e.id === endpointId);
    if (!endpoint) {
      throw new RolloutError('NotFound', `Endpoint '${endpointId}' is not registered`, {
        endpointId,
      });
    }
    return endpoint;
  }

  private assertNoOtherCanary(snapshot: RegistrySnapshot, endpointId: string): void {
    const existing = snapshot.endpoints.find((e) => e.state === 'canary' && e.id !== endpointId);
    if (existing) {
      throw new ValidationError(
        `Model '${snapshot.model}' already has canary endpoint '${existing.id}'`,
        { field: 'state', model: snapshot.model, canaryEndpointId: existing.id }
      );
    }
  }
}
