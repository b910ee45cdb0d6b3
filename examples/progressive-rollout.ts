#!/usr/bin/env tsx
/**
 * Progressive Rollout Example
 *
 * Registers a model served by one endpoint, starts a canary of a new version,
 * drives simulated traffic through the router and lets the controller walk
 * the traffic steps on its own timer.
 *
 * Usage:
 *   tsx examples/progressive-rollout.ts
 */

import {
  CompositeSmokeTestRunner,
  createRolloutSystem,
  loadConfig,
  type DeploymentBackend,
} from '../src/index.js';

/** Pretends to provision endpoints; a real backend would call the serving platform */
class SimulatedBackend implements DeploymentBackend {
  async create(model: string, version: string, config: Record<string, unknown>): Promise<string> {
    const id = typeof config.endpointId === 'string' ? config.endpointId : `${model}-${version}`;
    console.log(`  [backend] create ${id}`);
    return `http://${id}.local:8080`;
  }

  async delete(endpointId: string): Promise<void> {
    console.log(`  [backend] delete ${endpointId}`);
  }
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function main() {
  console.log('Progressive Rollout Example\n');

  const system = createRolloutSystem({
    config: loadConfig(undefined, 'test'),
    backend: new SimulatedBackend(),
    smokeTests: new CompositeSmokeTestRunner([
      { name: 'connectivity', run: async () => ({ passed: true, message: 'reachable' }) },
    ]),
  });
  await system.start();

  system.registry.register({
    id: 'chat-v1',
    modelName: 'chat',
    version: 'v1',
    address: 'http://chat-v1.local:8080',
    costPerToken: 0.002,
  });

  system.canary.on('transition', (plan, from) => {
    console.log(`  [canary] ${from} -> ${plan.state} (${plan.trafficPercentage}%)`);
  });

  const plan = await system.canary.start({
    modelName: 'chat',
    canaryVersion: 'v2',
    baselineVersion: 'v1',
    trafficSteps: [10, 50, 100],
    successCriteria: { maxErrorRateIncrease: 0.5, maxLatencyIncrease: 0.5 },
  });
  console.log(`Started canary ${plan.id}\n`);

  let request = 0;
  while (system.canary.getActivePlan('chat')) {
    await system.router.execute(
      'chat',
      { requestId: `req-${request++}` },
      async () => {
        await sleep(5 + Math.random() * 5);
        return 'completion';
      },
      { tokensOf: () => 32 }
    );
  }

  const final = system.canary.getPlan(plan.id);
  console.log(`\nRollout finished: ${final?.state} after ${request} requests`);
  console.log('Traffic:', system.router.getStats('chat').endpoints);

  await system.shutdown();
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
