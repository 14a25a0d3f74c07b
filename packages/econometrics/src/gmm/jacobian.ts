/**
 * Jacobian strategies for GMM: D = d mean(g) / d theta', q x k.
 *
 * The caller picks one explicitly; the estimator never guesses from whether a
 * problem happens to carry an analytic derivative.
 */

import {
  Vector,
  Matrix2D,
  MomentProblem,
  JacobianStrategy,
  EconometricsError,
  EconometricsErrorCode
} from '../types';
import { columnMeans, subtract, toMatrix } from '../linalg';

export const DEFAULT_FINITE_DIFFERENCE_STEP = 1e-6;

/** Column means of the moment matrix at theta. */
export function meanMoments<TData>(problem: MomentProblem<TData>, theta: Vector, data: TData): Vector {
  return columnMeans(toMatrix(problem.moments(theta, data), 'moments'));
}

/** Uses the problem's own `jacobian` function. */
export function analyticJacobian(): JacobianStrategy {
  return {
    name: 'analytic',
    compute<TData>(problem: MomentProblem<TData>, theta: Vector, data: TData): Matrix2D {
      if (!problem.jacobian) {
        throw new EconometricsError(
          EconometricsErrorCode.INVALID_ARGUMENT,
          'Analytic Jacobian requested but the moment problem defines no jacobian function'
        );
      }
      return problem.jacobian(theta, data);
    }
  };
}

/**
 * Central differences with a per-parameter step of `step * max(1, |theta_j|)`.
 */
export function finiteDifferenceJacobian(options: { step?: number } = {}): JacobianStrategy {
  const step = options.step ?? DEFAULT_FINITE_DIFFERENCE_STEP;
  if (!(step > 0)) {
    throw new EconometricsError(
      EconometricsErrorCode.INVALID_ARGUMENT,
      `Finite-difference step must be positive, got ${step}`
    );
  }

  return {
    name: 'finite-difference',
    compute<TData>(problem: MomentProblem<TData>, theta: Vector, data: TData): Matrix2D {
      const k = theta.length;
      const columns: Vector[] = [];

      for (let j = 0; j < k; j++) {
        const h = step * Math.max(1, Math.abs(theta[j]));
        const forward = theta.slice();
        const backward = theta.slice();
        forward[j] += h;
        backward[j] -= h;

        const up = meanMoments(problem, forward, data);
        const down = meanMoments(problem, backward, data);
        columns.push(up.map((value, a) => (value - down[a]) / (2 * h)));
      }

      const q = columns[0]?.length ?? 0;
      return Array.from({ length: q }, (_, a) => columns.map(column => column[a]));
    }
  };
}

export interface JacobianCheck {
  analytic: Matrix2D;
  numeric: Matrix2D;
  maxAbsDifference: number;
}

/**
 * Compare a problem's analytic Jacobian with central differences at theta.
 */
export function checkJacobian<TData>(
  problem: MomentProblem<TData>,
  theta: Vector,
  data: TData,
  step?: number
): JacobianCheck {
  const analytic = analyticJacobian().compute(problem, theta, data);
  const numeric = finiteDifferenceJacobian({ step }).compute(problem, theta, data);

  const a = toMatrix(analytic, 'analytic jacobian');
  const b = toMatrix(numeric, 'numeric jacobian');
  if (a.rows !== b.rows || a.columns !== b.columns) {
    throw new EconometricsError(
      EconometricsErrorCode.DIMENSION_MISMATCH,
      `Analytic jacobian is ${a.rows} x ${a.columns}, expected ${b.rows} x ${b.columns}`
    );
  }

  return {
    analytic,
    numeric,
    maxAbsDifference: subtract(a, b).abs().max()
  };
}
