/**
 * Rollout Plan Types
 *
 * Shared by the canary and blue-green controllers. A plan is created when a
 * rollout starts and ends in one of the terminal states.
 */

import type { AggregateWindow } from './metrics.js';

/**
 * Rollout state machine states
 *
 * Canary: PENDING → RAMPING → EVALUATING → (RAMPING | SUCCEEDED | ROLLED_BACK)
 * Blue-green: PENDING → MONITORING → (SUCCEEDED | ROLLED_BACK)
 * ABORTED is reachable from any non-terminal state.
 */
export type RolloutState =
  | 'PENDING'
  | 'RAMPING'
  | 'EVALUATING'
  | 'MONITORING'
  | 'SUCCEEDED'
  | 'ROLLED_BACK'
  | 'ABORTED';

export type TerminalRolloutState = Extract<RolloutState, 'SUCCEEDED' | 'ROLLED_BACK' | 'ABORTED'>;

export type RolloutKind = 'canary' | 'blue-green';

/**
 * Success criteria evaluated at every canary step
 */
export interface SuccessCriteria {
  /** Max relative increase of canary error rate over baseline (0.05 = +5%) */
  maxErrorRateIncrease: number;

  /** Max relative increase of canary P95 latency over baseline */
  maxLatencyIncrease: number;
}

/**
 * Deployment parameters for the endpoint a rollout creates
 */
export interface EndpointDeploymentOptions {
  costPerToken: number;
  capacity: number;
  /** Opaque backend configuration */
  config: Record<string, unknown>;
}

/**
 * Canary rollout configuration surface
 */
export interface CanaryRolloutConfig {
  modelName: string;
  canaryVersion: string;
  baselineVersion: string;

  /** Strictly ascending percentages ending at 100 */
  trafficSteps: number[];

  successCriteria: SuccessCriteria;

  /** Time between evaluations (ms) */
  evaluationIntervalMs?: number;

  /** Samples required on both sides before an evaluation counts */
  minSampleCount?: number;

  /** Consecutive deferrals tolerated before aborting as inconclusive */
  maxDeferrals?: number;

  endpoint?: Partial<EndpointDeploymentOptions>;
}

/**
 * Blue-green rollout configuration surface
 */
export interface BlueGreenRolloutConfig {
  modelName: string;
  greenVersion: string;
  blueVersion: string;
  rollbackWindowMs?: number;
  checkIntervalMs?: number;
  errorRateThreshold?: number;
  minSampleCount?: number;
  endpoint?: Partial<EndpointDeploymentOptions>;
}

/**
 * Result of comparing one metric against its baseline
 */
export interface CriterionResult {
  metric: 'error_rate' | 'latency_p95' | 'cost_per_request';

  candidateValue: number;
  baselineValue: number;

  /** Relative delta, or the absolute candidate value when the baseline is zero */
  delta: number;

  mode: 'relative' | 'absolute';

  /** Threshold the delta was compared against */
  threshold: number;

  passed: boolean;
}

export type EvaluationDecision = 'advance' | 'succeed' | 'rollback' | 'defer' | 'abort';

/**
 * One canary evaluation, kept on the plan for audit
 */
export interface EvaluationRecord {
  timestamp: number;
  stepIndex: number;
  trafficPercentage: number;
  decision: EvaluationDecision;
  canary: AggregateWindow;
  baseline: AggregateWindow;
  criteria: CriterionResult[];
  /** Fraction of criteria that passed (0-1) */
  confidence: number;
}

/**
 * Serializable error attached to a plan
 */
export interface PlanError {
  code: string;
  message: string;
}

interface RolloutPlanBase {
  id: string;
  kind: RolloutKind;
  modelName: string;

  /** Version being rolled out (canary / green) */
  targetVersion: string;

  /** Trusted version (baseline / blue) */
  baselineVersion: string;

  baselineEndpointId: string;

  /** Set once the backend deployment has been created and registered */
  targetEndpointId?: string;

  state: RolloutState;

  createdAt: number;
  updatedAt: number;
  completedAt?: number;

  /** Why the plan reached its terminal state */
  reason?: string;

  error?: PlanError;
}

/**
 * Canary rollout plan
 */
export interface CanaryPlan extends RolloutPlanBase {
  kind: 'canary';
  trafficSteps: number[];
  stepIndex: number;
  trafficPercentage: number;
  successCriteria: SuccessCriteria;
  evaluationIntervalMs: number;
  minSampleCount: number;
  maxDeferrals: number;
  deferrals: number;
  stepStartedAt: number;
  /**
   * Start of the baseline's comparison window. Follows stepStartedAt except
   * at the 100% step, where the baseline serves no traffic and keeps the
   * previous step's window.
   */
  baselineSince: number;
  evaluations: EvaluationRecord[];
}

/**
 * Blue-green rollout plan
 */
export interface BlueGreenPlan extends RolloutPlanBase {
  kind: 'blue-green';
  rollbackWindowMs: number;
  checkIntervalMs: number;
  errorRateThreshold: number;
  minSampleCount: number;
  smokeTestAttempts: number;
  lastSmokeTestReport?: Record<string, unknown>;
  swappedAt?: number;
}

export type RolloutPlan = CanaryPlan | BlueGreenPlan;

const TERMINAL_STATES: ReadonlySet<RolloutState> = new Set<RolloutState>([
  'SUCCEEDED',
  'ROLLED_BACK',
  'ABORTED',
]);

/**
 * Check whether a plan state is terminal
 */
export function isTerminalState(state: RolloutState): state is TerminalRolloutState {
  return TERMINAL_STATES.has(state);
}
