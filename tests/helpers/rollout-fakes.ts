/**
 * In-process stand-ins for the rollout controllers' collaborators
 */

import { pino, type Logger } from 'pino';
import { vi } from 'vitest';
import { MetricsCollector } from '../../src/metrics/metrics-collector.js';
import { EndpointRegistry } from '../../src/registry/endpoint-registry.js';
import type { RolloutDependencies } from '../../src/rollout/rollout-support.js';
import type {
  DeploymentBackend,
  NotificationSink,
  RolloutNotification,
  SmokeTestResult,
  SmokeTestRunner,
} from '../../src/types/integrations.js';

export const silentLogger = (): Logger => pino({ level: 'silent' });

export class FakeBackend implements DeploymentBackend {
  readonly created: Array<{ model: string; version: string; config: Record<string, unknown> }> = [];
  readonly deleted: string[] = [];
  createError?: Error;
  deleteError?: Error;

  async create(model: string, version: string, config: Record<string, unknown>): Promise<string> {
    if (this.createError) {
      throw this.createError;
    }
    this.created.push({ model, version, config });
    const id = typeof config.endpointId === 'string' ? config.endpointId : `${model}-${version}`;
    return `http://${id}.test:8080`;
  }

  async delete(endpointId: string): Promise<void> {
    if (this.deleteError) {
      throw this.deleteError;
    }
    this.deleted.push(endpointId);
  }
}

/**
 * Returns queued results in order, then passes
 */
export class FakeSmokeTests implements SmokeTestRunner {
  readonly calls: string[] = [];
  private readonly queue: SmokeTestResult[] = [];

  enqueue(...results: SmokeTestResult[]): this {
    this.queue.push(...results);
    return this;
  }

  async run(endpointId: string): Promise<SmokeTestResult> {
    this.calls.push(endpointId);
    return this.queue.shift() ?? { passed: true, report: { checks: 'all' } };
  }
}

export class RecordingSink implements NotificationSink {
  readonly events: RolloutNotification[] = [];

  notify(event: RolloutNotification): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next++;
    return `${prefix}${String(next).padStart(6, '0')}`;
  };
}

export interface Harness {
  registry: EndpointRegistry;
  metrics: MetricsCollector;
  backend: FakeBackend;
  sink: RecordingSink;
  deps: RolloutDependencies;
}

/**
 * Registry with `chat` served by one v1 endpoint, plus a metrics collector
 */
export function createHarness(): Harness {
  const logger = silentLogger();
  const registry = new EndpointRegistry({ logger });
  const metrics = new MetricsCollector({
    retentionMs: 3_600_000,
    capacityPerEndpoint: 1_000,
    latencyEwmaAlpha: 0.2,
    costOf: (id) => registry.getEndpoint(id)?.costPerToken,
    logger,
  });
  registry.register({
    id: 'chat-v1',
    modelName: 'chat',
    version: 'v1',
    address: 'http://chat-v1.test:8080',
    costPerToken: 0.01,
  });

  const backend = new FakeBackend();
  const sink = new RecordingSink();
  return {
    registry,
    metrics,
    backend,
    sink,
    deps: {
      registry,
      metrics,
      backend,
      notifications: sink,
      logger,
      activeRollouts: new Map(),
      generateId: sequentialIds(),
    },
  };
}

/**
 * Record `count` samples, the first `failures` of them failed
 */
export function recordSamples(
  metrics: MetricsCollector,
  endpointId: string,
  count: number,
  failures = 0,
  latencyMs = 100
): void {
  for (let i = 0; i < count; i++) {
    metrics.record(endpointId, latencyMs, i >= failures, 10);
  }
}

export function useFakeClock(start = Date.UTC(2026, 0, 1)): void {
  vi.useFakeTimers();
  vi.setSystemTime(start);
}
