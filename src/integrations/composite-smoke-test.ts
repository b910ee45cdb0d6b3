/**
 * Composite smoke-test runner
 *
 * Runs a list of named checks against an endpoint in order. The result
 * passes only when every check passes; a check that throws counts as a
 * failure and the remaining checks still run.
 *
 * @example
 * ```typescript
 * const smokeTests = new CompositeSmokeTestRunner([
 *   { name: 'connectivity', run: async (id) => ({ passed: await ping(id), message: 'ping' }) },
 * ]);
 * ```
 */

import type { Logger } from 'pino';
import type { SmokeTestResult, SmokeTestRunner } from '../types/integrations.js';
import { describeError } from '../utils/logger-helpers.js';

export interface SmokeCheckOutcome {
  passed: boolean;
  message: string;
  details?: Record<string, unknown>;
  warnings?: string[];
}

export interface SmokeCheck {
  name: string;
  run(endpointId: string): Promise<SmokeCheckOutcome>;
}

export interface SmokeCheckReport extends SmokeCheckOutcome {
  name: string;
}

export class CompositeSmokeTestRunner implements SmokeTestRunner {
  private readonly checks: readonly SmokeCheck[];
  private readonly logger?: Logger;

  constructor(checks: readonly SmokeCheck[], logger?: Logger) {
    this.checks = checks;
    this.logger = logger;
  }

  async run(endpointId: string): Promise<SmokeTestResult> {
    const checks: SmokeCheckReport[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const check of this.checks) {
      let outcome: SmokeCheckOutcome;
      try {
        outcome = await check.run(endpointId);
      } catch (error) {
        this.logger?.error({ endpointId, check: check.name, ...describeError(error) }, 'Smoke check threw');
        outcome = {
          passed: false,
          message: `Check '${check.name}' threw: ${error instanceof Error ? error.message : String(error)}`,
        };
      }

      checks.push({ name: check.name, ...outcome });
      if (!outcome.passed) {
        errors.push(outcome.message);
      }
      if (outcome.warnings) {
        warnings.push(...outcome.warnings);
      }
    }

    const passed = errors.length === 0;
    this.logger?.info({ endpointId, passed, checks: checks.length, errors: errors.length }, 'Smoke test finished');
    return {
      passed,
      report: { endpointId, passed, checks, errors, warnings },
    };
  }
}
