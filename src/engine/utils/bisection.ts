/**
 * Bounded bisection for a continuous, non-decreasing function.
 *
 * Returns an outcome rather than throwing so callers can decide how a
 * non-converged search is reported.
 */

export interface BisectionOptions {
  /** Convergence when |f(x) − target| ≤ max(relTol·|target|, absTol). */
  relTol: number;
  absTol: number;
  maxIterations: number;
}

export const DEFAULT_BISECTION_OPTIONS: BisectionOptions = {
  relTol: 1e-6,
  absTol: 1e-12,
  maxIterations: 200,
};

export type BisectionOutcome =
  | { converged: true; x: number; iterations: number; residual: number }
  | { converged: false; lo: number; hi: number; iterations: number; residual: number };

export function bisectIncreasing(
  f: (x: number) => number,
  target: number,
  lo: number,
  hi: number,
  options: BisectionOptions = DEFAULT_BISECTION_OPTIONS,
): BisectionOutcome {
  const tolerance = Math.max(options.relTol * Math.abs(target), options.absTol);

  const fLo = f(lo);
  if (target - fLo <= tolerance) {
    return { converged: true, x: lo, iterations: 0, residual: fLo - target };
  }
  const fHi = f(hi);
  if (fHi - target <= tolerance) {
    return { converged: true, x: hi, iterations: 0, residual: fHi - target };
  }

  let residual = Number.POSITIVE_INFINITY;
  for (let i = 1; i <= options.maxIterations; i++) {
    const mid = 0.5 * (lo + hi);
    residual = f(mid) - target;
    if (Math.abs(residual) <= tolerance) {
      return { converged: true, x: mid, iterations: i, residual };
    }
    if (residual < 0) lo = mid;
    else hi = mid;
  }

  return { converged: false, lo, hi, iterations: options.maxIterations, residual };
}
