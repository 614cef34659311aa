// Dense linear solve, linear least squares via normal equations, and Levenberg–Marquardt

import { FitConvergenceError } from '../../utils/errors.js';

const SINGULAR_PIVOT = 1e-12;

/**
 * Solve `A·x = b` by Gaussian elimination with partial pivoting. Returns null
 * when the system is singular.
 */
export function solveLinearSystem(matrix: readonly number[][], rhs: readonly number[]): number[] | null {
  const n = rhs.length;
  const a = matrix.map((row) => [...row]);
  const b = [...rhs];

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    const scale = Math.max(...a[col].map(Math.abs), 1);
    if (Math.abs(a[pivot][col]) < SINGULAR_PIVOT * scale) return null;

    if (pivot !== col) {
      [a[col], a[pivot]] = [a[pivot], a[col]];
      [b[col], b[pivot]] = [b[pivot], b[col]];
    }

    for (let row = col + 1; row < n; row++) {
      const factor = a[row][col] / a[col][col];
      if (factor === 0) continue;
      for (let k = col; k < n; k++) {
        a[row][k] -= factor * a[col][k];
      }
      b[row] -= factor * b[col];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = b[row];
    for (let k = row + 1; k < n; k++) {
      sum -= a[row][k] * x[k];
    }
    x[row] = sum / a[row][row];
  }
  return x;
}

function normalEquations(
  design: readonly number[][],
  y: readonly number[]
): { gram: number[][]; moment: number[] } {
  const p = design[0]?.length ?? 0;
  const gram = Array.from({ length: p }, () => new Array<number>(p).fill(0));
  const moment = new Array<number>(p).fill(0);
  for (let i = 0; i < design.length; i++) {
    const row = design[i];
    for (let j = 0; j < p; j++) {
      moment[j] += row[j] * y[i];
      for (let k = j; k < p; k++) {
        gram[j][k] += row[j] * row[k];
      }
    }
  }
  for (let j = 0; j < p; j++) {
    for (let k = 0; k < j; k++) {
      gram[j][k] = gram[k][j];
    }
  }
  return { gram, moment };
}

/** Coefficients minimising ‖design·β − y‖²; null when the design is rank-deficient. */
export function linearLeastSquares(design: readonly number[][], y: readonly number[]): number[] | null {
  const { gram, moment } = normalEquations(design, y);
  return solveLinearSystem(gram, moment);
}

export interface NonlinearProblem {
  /** Model value at each observation for parameters `p`. */
  evaluate(p: readonly number[]): number[];
  /** Row i holds ∂model_i/∂p_j. */
  jacobian(p: readonly number[]): number[][];
}

export interface LevenbergMarquardtOptions {
  maxIterations: number;
  /** Stop when an accepted step improves the residual sum by less than this fraction. */
  tolerance: number;
  initialDamping: number;
}

export const DEFAULT_LM_OPTIONS: Readonly<LevenbergMarquardtOptions> = {
  maxIterations: 200,
  tolerance: 1e-12,
  initialDamping: 1e-3,
};

export interface NonlinearFit {
  params: number[];
  residualSumOfSquares: number;
  iterations: number;
}

const MAX_DAMPING = 1e16;
const DIAGONAL_FLOOR = 1e-9;

function sumOfSquares(y: readonly number[], fitted: readonly number[]): number {
  let sse = 0;
  for (let i = 0; i < y.length; i++) {
    const r = y[i] - fitted[i];
    sse += r * r;
  }
  return sse;
}

/**
 * Levenberg–Marquardt with Marquardt's diagonal scaling. Converges when an
 * accepted step stops improving the fit, or when no damping level finds a
 * better point. Running out of iterations, or producing non-finite values,
 * raises FitConvergenceError.
 */
export function levenbergMarquardt(
  problem: NonlinearProblem,
  y: readonly number[],
  initial: readonly number[],
  options: Partial<LevenbergMarquardtOptions> = {}
): NonlinearFit {
  const { maxIterations, tolerance, initialDamping } = { ...DEFAULT_LM_OPTIONS, ...options };
  let params = [...initial];
  let sse = sumOfSquares(y, problem.evaluate(params));
  if (!Number.isFinite(sse)) {
    throw new FitConvergenceError('Initial parameters produce a non-finite residual', 0);
  }
  let damping = initialDamping;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const fitted = problem.evaluate(params);
    const residuals = y.map((value, i) => value - fitted[i]);
    const { gram, moment } = normalEquations(problem.jacobian(params), residuals);

    const damped = gram.map((row, j) =>
      row.map((value, k) => (j === k ? value + damping * Math.max(value, DIAGONAL_FLOOR) : value))
    );
    const step = solveLinearSystem(damped, moment);

    if (step === null) {
      damping *= 10;
    } else {
      const candidate = params.map((value, j) => value + step[j]);
      const candidateSse = sumOfSquares(y, problem.evaluate(candidate));
      if (!Number.isFinite(candidateSse)) {
        throw new FitConvergenceError('Solver produced a non-finite residual', iteration);
      }

      if (candidateSse < sse) {
        const improvement = sse - candidateSse;
        params = candidate;
        const previous = sse;
        sse = candidateSse;
        damping = Math.max(damping / 10, 1e-12);
        if (improvement <= tolerance * previous || sse === 0) {
          return { params, residualSumOfSquares: sse, iterations: iteration };
        }
        continue;
      }
      damping *= 10;
    }

    if (damping > MAX_DAMPING) {
      // No damping level improves on the current point: it is a minimum
      return { params, residualSumOfSquares: sse, iterations: iteration };
    }
  }

  throw new FitConvergenceError(`Did not converge within ${maxIterations} iterations`, maxIterations);
}
