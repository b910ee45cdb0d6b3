/**
 * Main type exports
 */

export * from './endpoints.js';
export * from './metrics.js';
export * from './rollout.js';
export * from './optimizer.js';
export * from './integrations.js';
