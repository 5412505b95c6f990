import { ConvergenceError, InvalidInputError } from "./errors.js";
import { MAX_SOLVER_ITERATIONS, TEMPERATURE_TOLERANCE_C } from "./constants.js";

export interface BisectionOptions {
  /** Stop when the bracket is narrower than this. */
  tolerance?: number;
  maxIterations?: number;
  /** Included in failure details so callers can tell solves apart. */
  label?: string;
  /**
   * "non-negative" returns the final bracket end where f >= 0 instead of its
   * midpoint, so a caller feeding the root back into f never sees f < 0.
   */
  side?: "midpoint" | "non-negative";
}

/**
 * Finds x in [lo, hi] with f(x) = 0, given f(lo) and f(hi) of opposite sign
 * (or one of them zero). Throws ConvergenceError when the bracket does not
 * shrink below the tolerance within maxIterations.
 */
export function bisect(
  f: (x: number) => number,
  lo: number,
  hi: number,
  opts: BisectionOptions = {}
): number {
  const {
    tolerance = TEMPERATURE_TOLERANCE_C,
    maxIterations = MAX_SOLVER_ITERATIONS,
    label = "root",
    side = "midpoint"
  } = opts;

  let a = Math.min(lo, hi);
  let b = Math.max(lo, hi);
  let fa = f(a);
  const fb = f(b);
  if (fa === 0) return a;
  if (fb === 0) return b;
  if (!Number.isFinite(fa) || !Number.isFinite(fb) || Math.sign(fa) === Math.sign(fb)) {
    throw new InvalidInputError(`No root of ${label} inside [${a}, ${b}]`, { label, lo: a, hi: b });
  }

  for (let i = 0; i < maxIterations; i++) {
    const mid = (a + b) / 2;
    if (b - a <= tolerance) {
      if (side === "midpoint") return mid;
      return fa >= 0 ? a : b;
    }
    const fm = f(mid);
    if (fm === 0) return mid;
    if (Math.sign(fm) === Math.sign(fa)) {
      a = mid;
      fa = fm;
    } else {
      b = mid;
    }
  }

  throw new ConvergenceError(`${label} did not converge in ${maxIterations} iterations`, {
    label,
    lo: a,
    hi: b,
    maxIterations
  });
}
