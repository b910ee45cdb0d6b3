/**
 * model-rollout-controller public API
 */

export {
  createRolloutSystem,
  type RolloutSystem,
  type RolloutSystemOptions,
  type RestoreSummary,
} from './rollout-system.js';

// Errors
export {
  RolloutError,
  ValidationError,
  NoHealthyEndpointError,
  EvaluationInconclusiveError,
  BackendOperationError,
  SmokeTestFailure,
  toRolloutError,
  zodErrorToValidationError,
  type RolloutErrorCode,
  type RolloutErrorShape,
} from './api/errors.js';

// Configuration
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getRuntimeOptions,
  type ConfigEnvironment,
  type RuntimeConfig,
  type RuntimeOptions,
} from './config/loader.js';

// Components
export {
  EndpointRegistry,
  DEFAULT_ENDPOINT_CAPACITY,
  type EndpointRegistryEvents,
  type EndpointRegistryOptions,
} from './registry/endpoint-registry.js';
export { MetricsCollector, type MetricsCollectorOptions } from './metrics/metrics-collector.js';
export { checkIncrease, passRatio } from './metrics/comparison.js';
export {
  Router,
  routingBucket,
  type RouterOptions,
  type RoutingContext,
  type RoutingHashKey,
  type ExecuteOptions,
  type TrafficStats,
} from './routing/router.js';
export {
  ROUTING_STRATEGIES,
  type RoutingStrategy,
  type BalancedWeights,
} from './routing/strategies.js';
export {
  CanaryController,
  type CanaryControllerOptions,
  type CanaryControllerEvents,
  type PlanFilter,
} from './rollout/canary-controller.js';
export {
  BlueGreenController,
  type BlueGreenControllerOptions,
  type BlueGreenControllerEvents,
} from './rollout/blue-green-controller.js';
export type { RolloutDependencies } from './rollout/rollout-support.js';
export {
  PerformanceOptimizer,
  compareRecommendations,
  type PerformanceOptimizerOptions,
  type PerformanceOptimizerDependencies,
  type PerformanceOptimizerEvents,
} from './optimizer/performance-optimizer.js';

// Integrations
export * from './integrations/index.js';

// Telemetry
export { TelemetryManager, createTelemetry, type TelemetryConfig, type RolloutMetrics } from './telemetry/otel.js';
export { createLogger, type LoggerOptions } from './utils/logger.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
