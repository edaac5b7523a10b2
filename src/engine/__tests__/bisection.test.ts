import { describe, it, expect } from 'vitest';
import { bisectIncreasing, DEFAULT_BISECTION_OPTIONS } from '../utils/bisection';

describe('bisectIncreasing', () => {
  it('finds the root of a monotonic function', () => {
    const outcome = bisectIncreasing(x => x * x, 2, 0, 2);
    expect(outcome.converged).toBe(true);
    if (!outcome.converged) return;
    expect(outcome.x).toBeCloseTo(Math.SQRT2, 5);
    expect(Math.abs(outcome.residual)).toBeLessThanOrEqual(2e-6);
  });

  it('returns a bracket end without iterating when it already meets the target', () => {
    const atLow = bisectIncreasing(x => x, 0, 0, 1);
    expect(atLow).toEqual({ converged: true, x: 0, iterations: 0, residual: 0 });

    const atHigh = bisectIncreasing(x => x, 1, 0, 1);
    expect(atHigh).toEqual({ converged: true, x: 1, iterations: 0, residual: 0 });
  });

  it('reports the last bracket when the iteration cap is reached', () => {
    const outcome = bisectIncreasing(x => x, 0.3, 0, 1, { relTol: 0, absTol: 0, maxIterations: 2 });
    expect(outcome).toEqual({ converged: false, lo: 0.25, hi: 0.5, iterations: 2, residual: 0.25 - 0.3 });
  });

  it('defaults to a 200-iteration cap with 1e-6 relative tolerance', () => {
    expect(DEFAULT_BISECTION_OPTIONS).toEqual({ relTol: 1e-6, absTol: 1e-12, maxIterations: 200 });
  });
});
