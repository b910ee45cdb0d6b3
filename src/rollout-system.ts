/**
 * Rollout system factory
 *
 * Wires the registry, metrics collector, router, both rollout controllers
 * and the optimizer from one runtime configuration, and restores persisted
 * state on start.
 *
 * @example
 * ```typescript
 * const system = createRolloutSystem({ config: loadConfig(), backend, smokeTests });
 * await system.start();
 * const endpoint = system.router.route('chat', { userId: 'u-42' });
 * ```
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { getRuntimeOptions, type RuntimeConfig, type RuntimeOptions } from './config/loader.js';
import { FileStateStore } from './integrations/file-state-store.js';
import { LoggerNotificationSink } from './integrations/logger-notification-sink.js';
import { MetricsCollector } from './metrics/metrics-collector.js';
import { PerformanceOptimizer } from './optimizer/performance-optimizer.js';
import { EndpointRegistry } from './registry/endpoint-registry.js';
import { BlueGreenController } from './rollout/blue-green-controller.js';
import { CanaryController } from './rollout/canary-controller.js';
import {
  REGISTRY_INDEX_KEY,
  planIndexKey,
  planStoreKey,
  registryStoreKey,
  type RolloutDependencies,
} from './rollout/rollout-support.js';
import { Router } from './routing/router.js';
import { TelemetryManager } from './telemetry/otel.js';
import type {
  DeploymentBackend,
  NotificationSink,
  SmokeTestRunner,
  StateStore,
} from './types/integrations.js';
import { describeError, errorMessage } from './utils/logger-helpers.js';
import { createLogger } from './utils/logger.js';

export interface RolloutSystemOptions {
  config: RuntimeConfig;
  backend: DeploymentBackend;
  smokeTests: SmokeTestRunner;

  /** Defaults to a LoggerNotificationSink */
  notifications?: NotificationSink;

  /** Defaults to a FileStateStore when persistence is enabled */
  store?: StateStore;

  logger?: Logger;

  /** Defaults to a TelemetryManager when telemetry is enabled */
  telemetry?: TelemetryManager;

  now?: () => number;
  generateId?: () => string;
}

export interface RestoreSummary {
  models: string[];
  plans: string[];
  failures: Array<{ key: string; error: string }>;
}

export interface RolloutSystem {
  readonly options: RuntimeOptions;
  readonly logger: Logger;
  readonly registry: EndpointRegistry;
  readonly metrics: MetricsCollector;
  readonly router: Router;
  readonly canary: CanaryController;
  readonly blueGreen: BlueGreenController;
  readonly optimizer: PerformanceOptimizer;
  readonly telemetry?: TelemetryManager;
  readonly store?: StateStore;

  /** Start telemetry and restore persisted registry snapshots and plans */
  start(): Promise<RestoreSummary>;

  /** Reload persisted state; expects an empty system */
  restore(): Promise<RestoreSummary>;

  /** Stop every timer and the telemetry exporter */
  shutdown(): Promise<void>;
}

const IndexSchema = z.array(z.string());

export function createRolloutSystem(options: RolloutSystemOptions): RolloutSystem {
  const runtime = getRuntimeOptions(options.config);
  const logger =
    options.logger ?? createLogger({ level: runtime.logging.level, name: runtime.logging.name });

  const telemetry =
    options.telemetry ??
    (runtime.telemetry.enabled
      ? new TelemetryManager({
          enabled: true,
          serviceName: runtime.telemetry.serviceName,
          prometheusPort: runtime.telemetry.prometheusPort,
          logger: logger.child({ component: 'telemetry' }),
        })
      : undefined);

  const store =
    options.store ??
    (runtime.persistence.enabled
      ? new FileStateStore({
          directory: runtime.persistence.directory,
          logger: logger.child({ component: 'store' }),
        })
      : undefined);

  const notifications = options.notifications ?? new LoggerNotificationSink(logger);

  const registry = new EndpointRegistry({
    logger: logger.child({ component: 'registry' }),
    telemetry,
    now: options.now,
  });

  const metrics = new MetricsCollector({
    ...runtime.metrics,
    costOf: (endpointId) => registry.getEndpoint(endpointId)?.costPerToken,
    logger: logger.child({ component: 'metrics' }),
    telemetry,
    now: options.now,
  });

  const router = new Router(registry, metrics, {
    ...runtime.router,
    logger: logger.child({ component: 'router' }),
    telemetry,
  });

  const activeRollouts = new Map<string, string>();
  const shared = (component: string): RolloutDependencies => ({
    registry,
    metrics,
    backend: options.backend,
    notifications,
    store,
    logger: logger.child({ component }),
    telemetry,
    activeRollouts,
    now: options.now,
    generateId: options.generateId,
  });

  const canary = new CanaryController(shared('canary'), runtime.canary);

  const blueGreen = new BlueGreenController(
    { ...shared('blue-green'), smokeTests: options.smokeTests },
    runtime.blueGreen
  );

  const optimizer = new PerformanceOptimizer(
    {
      registry,
      metrics,
      notifications,
      logger: logger.child({ component: 'optimizer' }),
      telemetry,
      now: options.now,
    },
    runtime.optimizer
  );

  const readIndex = async (key: string, summary: RestoreSummary): Promise<string[]> => {
    if (!store) {
      return [];
    }
    try {
      const value = await store.get(key);
      if (value === undefined) {
        return [];
      }
      return IndexSchema.parse(value);
    } catch (error) {
      summary.failures.push({ key, error: errorMessage(error) });
      logger.error({ key, ...describeError(error) }, 'Failed to read state index');
      return [];
    }
  };

  const restore = async (): Promise<RestoreSummary> => {
    const summary: RestoreSummary = { models: [], plans: [], failures: [] };
    if (!store) {
      return summary;
    }

    // Registry first: resumed plans look up their endpoints
    for (const model of await readIndex(REGISTRY_INDEX_KEY, summary)) {
      const key = registryStoreKey(model);
      try {
        const value = await store.get(key);
        if (value !== undefined) {
          registry.restore(value);
          summary.models.push(model);
        }
      } catch (error) {
        summary.failures.push({ key, error: errorMessage(error) });
        logger.error({ key, ...describeError(error) }, 'Failed to restore registry snapshot');
      }
    }

    for (const model of summary.models) {
      canary.resumeDrains(model);
    }

    const controllers = [
      { kind: 'canary' as const, resume: (value: unknown) => canary.resume(value) },
      { kind: 'blue-green' as const, resume: (value: unknown) => blueGreen.resume(value) },
    ];
    for (const { kind, resume } of controllers) {
      for (const planId of await readIndex(planIndexKey(kind), summary)) {
        const key = planStoreKey(planId);
        try {
          const value = await store.get(key);
          if (value !== undefined) {
            await resume(value);
            summary.plans.push(planId);
          }
        } catch (error) {
          summary.failures.push({ key, error: errorMessage(error) });
          logger.error({ key, ...describeError(error) }, 'Failed to resume rollout plan');
        }
      }
    }

    logger.info(
      { models: summary.models.length, plans: summary.plans.length, failures: summary.failures.length },
      'Rollout state restored'
    );
    return summary;
  };

  return {
    options: runtime,
    logger,
    registry,
    metrics,
    router,
    canary,
    blueGreen,
    optimizer,
    telemetry,
    store,

    async start(): Promise<RestoreSummary> {
      if (telemetry && runtime.telemetry.enabled && !telemetry.isStarted()) {
        await telemetry.start();
      }
      return restore();
    },

    restore,

    async shutdown(): Promise<void> {
      await canary.shutdown();
      await blueGreen.shutdown();
      await telemetry?.shutdown();
      logger.info('Rollout system shut down');
    },
  };
}
