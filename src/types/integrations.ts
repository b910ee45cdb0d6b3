/**
 * External collaborator interfaces
 *
 * The controller core consumes these as opaque, fallible services. Retries
 * are the collaborator's concern.
 */

import type { Recommendation } from './optimizer.js';
import type { RolloutKind, RolloutState } from './rollout.js';

/**
 * Deployment backend that provisions and tears down endpoints
 */
export interface DeploymentBackend {
  /** Provision a deployment and return its address */
  create(
    model: string,
    version: string,
    config: Record<string, unknown>
  ): Promise<string>;

  /** Tear down a deployment */
  delete(endpointId: string): Promise<void>;
}

export interface SmokeTestResult {
  passed: boolean;
  report: Record<string, unknown>;
}

/**
 * Smoke-test runner gating blue-green swaps
 */
export interface SmokeTestRunner {
  run(endpointId: string): Promise<SmokeTestResult>;
}

/**
 * Events delivered to the notification sink
 */
export type RolloutNotification =
  | {
      type: 'rollout.succeeded' | 'rollout.rolled_back' | 'rollout.aborted';
      planId: string;
      kind: RolloutKind;
      model: string;
      state: RolloutState;
      reason: string;
      timestamp: number;
      errorCode?: string;
    }
  | {
      type: 'rollout.smoke_test_failed';
      planId: string;
      kind: RolloutKind;
      model: string;
      state: RolloutState;
      reason: string;
      timestamp: number;
      report: Record<string, unknown>;
    }
  | {
      type: 'endpoint.delete_failed';
      model: string;
      endpointId: string;
      reason: string;
      timestamp: number;
    }
  | {
      type: 'optimizer.recommendations';
      model: string;
      recommendations: Recommendation[];
      timestamp: number;
    };

export interface NotificationSink {
  notify(event: RolloutNotification): void | Promise<void>;
}

/**
 * Durable key/value store for plans and registry snapshots
 */
export interface StateStore {
  get(key: string): Promise<unknown>;
  put(key: string, value: unknown): Promise<void>;
}
