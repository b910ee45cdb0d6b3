/**
 * Zod schema exports
 *
 * These schemas provide runtime validation for every configuration and
 * persistence boundary.
 *
 * @example
 * ```typescript
 * import { CanaryRolloutConfigSchema } from 'model-rollout-controller';
 *
 * const result = CanaryRolloutConfigSchema.safeParse({ modelName: 'chat' });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Runtime config schemas
export * from './config.js';

// Rollout, registry and persistence schemas
export * from './rollout.js';
