/**
 * Endpoint Registry Types
 *
 * Deployments of a model version and the immutable weight snapshots the
 * router reads on the hot path.
 */

/**
 * Lifecycle state of a deployed endpoint
 *
 * draft → canary → active → retiring. Blue-green deployments skip canary.
 */
export type EndpointState = 'draft' | 'canary' | 'active' | 'retiring';

/**
 * A deployed, addressable instance of one model version
 */
export interface ModelEndpoint {
  /** Unique endpoint identifier */
  id: string;

  /** Logical model name (partition key for all rollout state) */
  modelName: string;

  /** Model version served by this endpoint */
  version: string;

  /** Endpoint address (URL or host:port) */
  address: string;

  /** Cost per token in the caller's billing unit */
  costPerToken: number;

  /** Lifecycle state */
  state: EndpointState;

  /** Traffic weight (0-100) */
  weight: number;

  /** Health flag, false removes the endpoint from routing candidates */
  healthy: boolean;

  /** Maximum concurrent requests, used to derive load */
  capacity: number;

  /** Registration timestamp (ms) */
  createdAt: number;
}

/**
 * Input accepted by `EndpointRegistry.register()`
 */
export interface EndpointRegistration {
  id: string;
  modelName: string;
  version: string;
  address: string;
  costPerToken: number;
  state?: EndpointState;
  healthy?: boolean;
  capacity?: number;
}

/**
 * Immutable, versioned view of one model's endpoints and weights
 *
 * A new snapshot object is published on every committed mutation, so a
 * reader holding a reference always sees one consistent weight table.
 */
export interface RegistrySnapshot {
  /** Model name */
  model: string;

  /** Monotonic snapshot version (per model) */
  version: number;

  /** Endpoints sorted by id, each carrying its committed weight */
  endpoints: ReadonlyArray<Readonly<ModelEndpoint>>;

  /** Weight table keyed by endpoint id */
  weights: Readonly<Record<string, number>>;

  /** Commit timestamp (ms) */
  committedAt: number;
}

/**
 * Weight table passed to `commitWeights()`, keyed by endpoint id
 */
export type WeightMap = Record<string, number>;
