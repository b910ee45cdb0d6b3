/**
 * Unit tests for math helper utilities
 */

import { describe, it, expect } from 'vitest';
import { clamp, percentile, safeAverage, safeDivide, safeSum } from '@/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeAverage', () => {
    it('should return the default for no values', () => {
      expect(safeAverage([])).toBe(0);
      expect(safeAverage([], 250)).toBe(250);
    });

    it('should average latency samples', () => {
      expect(safeAverage([100, 200, 300])).toBe(200);
      expect(safeAverage([0.1, 0.2, 0.3])).toBeCloseTo(0.2, 10);
    });
  });

  describe('safeDivide', () => {
    it('should return the default for a zero denominator', () => {
      expect(safeDivide(5, 0)).toBe(0);
      expect(safeDivide(5, 0, 1)).toBe(1);
    });

    it('should compute an error rate', () => {
      expect(safeDivide(4, 100)).toBe(0.04);
      expect(safeDivide(0, 100)).toBe(0);
    });
  });

  describe('safeSum', () => {
    it('should sum token counts', () => {
      expect(safeSum([10, 20, 30])).toBe(60);
      expect(safeSum([])).toBe(0);
      expect(safeSum([], -1)).toBe(-1);
    });
  });

  describe('percentile', () => {
    const sorted = [10, 20, 30, 40];

    it('should interpolate between closest ranks', () => {
      expect(percentile(sorted, 50)).toBe(25);
      expect(percentile(sorted, 95)).toBeCloseTo(38.5, 10);
    });

    it('should return the bounds at 0 and 100', () => {
      expect(percentile(sorted, 0)).toBe(10);
      expect(percentile(sorted, 100)).toBe(40);
    });

    it('should handle one value and no values', () => {
      expect(percentile([70], 95)).toBe(70);
      expect(percentile([], 95)).toBe(0);
    });
  });

  describe('clamp', () => {
    it('should keep values inside the range', () => {
      expect(clamp(1.4, 0, 1)).toBe(1);
      expect(clamp(-0.2, 0, 1)).toBe(0);
      expect(clamp(0.5, 0, 1)).toBe(0.5);
    });
  });
});
