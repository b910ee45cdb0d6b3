/**
 * Unit tests for metric comparison
 */

import { describe, expect, it } from 'vitest';
import { checkIncrease, passRatio } from '../../../src/metrics/comparison.js';

describe('checkIncrease', () => {
  it('should compare relative to a positive baseline', () => {
    const result = checkIncrease('latency_p95', 120, 100, 0.1, 1_000);

    expect(result.mode).toBe('relative');
    expect(result.delta).toBeCloseTo(0.2, 10);
    expect(result.passed).toBe(false);
  });

  it('should pass an increase exactly at the limit', () => {
    expect(checkIncrease('error_rate', 0.021, 0.02, 0.05, 0.01).passed).toBe(true);
  });

  it('should pass an improvement', () => {
    expect(checkIncrease('latency_p95', 80, 100, 0, 1_000).passed).toBe(true);
  });

  it('should fall back to the absolute threshold for a zero baseline', () => {
    const within = checkIncrease('error_rate', 0.005, 0, 0.05, 0.01);
    const above = checkIncrease('error_rate', 0.02, 0, 0.05, 0.01);

    expect(within).toMatchObject({ mode: 'absolute', delta: 0.005, threshold: 0.01, passed: true });
    expect(above.passed).toBe(false);
  });
});

describe('passRatio', () => {
  it('should be the fraction of passed criteria', () => {
    const criteria = [
      checkIncrease('error_rate', 0.01, 0.01, 0.05, 0.01),
      checkIncrease('latency_p95', 200, 100, 0.1, 1_000),
    ];

    expect(passRatio(criteria)).toBe(0.5);
    expect(passRatio([])).toBe(1);
  });
});
