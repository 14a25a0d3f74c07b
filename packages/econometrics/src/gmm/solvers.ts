/**
 * Iterative solvers behind the GMM estimator.
 *
 * - dampedNewton: root of F(theta) = 0 for square systems, Newton steps with
 *   step halving on ||F||.
 * - levenbergMarquardt: minimum of m(theta)' W m(theta) using Gauss-Newton
 *   steps (D'WD + lambda diag(D'WD)) delta = -D'W m.
 *
 * Both return their last iterate with a converged flag rather than throwing
 * when the iteration cap is hit. Linear solves go through `solveSquare`, which
 * equilibrates first, so parameters on very different scales are fine.
 */

import {
  Vector,
  EconometricsError,
  EconometricsErrorCode
} from '../types';
import { Matrix, solveSquare, normInf } from '../linalg';

export interface SolverOutcome {
  theta: Vector;
  /** F(theta) for root finding, m(theta) for minimization. */
  value: Vector;
  /** ||F||^2 or m'Wm at theta. */
  objective: number;
  iterations: number;
  converged: boolean;
}

export interface SolverSettings {
  tolerance: number;
  maxIterations: number;
}

const MAX_HALVINGS = 30;
const LAMBDA_INITIAL = 1e-3;
const LAMBDA_MIN = 1e-12;
const LAMBDA_MAX = 1e12;

function squaredNorm(v: Vector): number {
  return v.reduce((sum, x) => sum + x * x, 0);
}

function stepIsSmall(step: Vector, theta: Vector, tolerance: number): boolean {
  return normInf(step) <= tolerance * (1 + normInf(theta));
}

function quadraticForm(v: Vector, w: Matrix): number {
  return Matrix.rowVector(v).mmul(w).mmul(Matrix.columnVector(v)).get(0, 0);
}

/**
 * Largest drop in m'Wm a Gauss-Newton step along a single coordinate could
 * still give: max_j (D'Wm)_j^2 / (D'WD)_jj. Unaffected by the units of theta.
 */
function predictedDecrease(gradient: Matrix, hessian: Matrix): number {
  let largest = 0;
  for (let j = 0; j < gradient.rows; j++) {
    const g = gradient.get(j, 0);
    const h = hessian.get(j, j);
    const decrease = h > 0 ? (g * g) / h : g === 0 ? 0 : Infinity;
    // Math.max keeps NaN, which then fails every comparison
    largest = Math.max(largest, decrease);
  }
  return largest;
}

/**
 * Solve F(theta) = 0 where F and theta have the same length.
 *
 * @throws {EconometricsError} SINGULAR_MATRIX when the Jacobian is rank-deficient
 */
export function dampedNewton(
  evaluate: (theta: Vector) => Vector,
  jacobian: (theta: Vector) => Matrix,
  theta0: Vector,
  settings: SolverSettings
): SolverOutcome {
  let theta = theta0.slice();
  let value = evaluate(theta);
  let objective = squaredNorm(value);

  for (let iteration = 1; iteration <= settings.maxIterations; iteration++) {
    if (normInf(value) <= settings.tolerance) {
      return { theta, value, objective, iterations: iteration - 1, converged: true };
    }

    const J = jacobian(theta);
    const direction = solveSquare(J, Matrix.columnVector(value.map(v => -v)));
    if (direction === null) {
      throw new EconometricsError(
        EconometricsErrorCode.SINGULAR_MATRIX,
        'Moment Jacobian is singular at the current iterate',
        { theta }
      );
    }
    const delta = direction.getColumn(0);

    // Halve the step until ||F|| stops growing.
    let alpha = 1;
    let candidate = theta.map((t, j) => t + delta[j]);
    let candidateValue = evaluate(candidate);
    for (let h = 0; h < MAX_HALVINGS && !(squaredNorm(candidateValue) <= objective); h++) {
      alpha /= 2;
      candidate = theta.map((t, j) => t + alpha * delta[j]);
      candidateValue = evaluate(candidate);
    }

    const step = delta.map(d => alpha * d);
    theta = candidate;
    value = candidateValue;
    objective = squaredNorm(value);

    if (normInf(value) <= settings.tolerance || stepIsSmall(step, theta, settings.tolerance)) {
      return { theta, value, objective, iterations: iteration, converged: true };
    }
  }

  return { theta, value, objective, iterations: settings.maxIterations, converged: false };
}

/**
 * Minimize m(theta)' W m(theta).
 *
 * @param evaluate Moment means m(theta), length q
 * @param jacobian q x k derivative of m
 * @param weighting q x q symmetric positive semidefinite matrix
 */
export function levenbergMarquardt(
  evaluate: (theta: Vector) => Vector,
  jacobian: (theta: Vector) => Matrix,
  weighting: Matrix,
  theta0: Vector,
  settings: SolverSettings
): SolverOutcome {
  const k = theta0.length;
  let theta = theta0.slice();
  let value = evaluate(theta);
  let objective = quadraticForm(value, weighting);
  let lambda = LAMBDA_INITIAL;

  for (let iteration = 1; iteration <= settings.maxIterations; iteration++) {
    const D = jacobian(theta);
    const dw = D.transpose().mmul(weighting);
    const hessian = dw.mmul(D);
    const gradient = dw.mmul(Matrix.columnVector(value));

    let accepted = false;
    let step: Vector = new Array<number>(k).fill(0);

    while (!accepted && lambda <= LAMBDA_MAX) {
      const damped = hessian.clone();
      for (let j = 0; j < k; j++) {
        damped.set(j, j, hessian.get(j, j) * (1 + lambda) + LAMBDA_MIN);
      }

      const direction = solveSquare(damped, gradient.clone().mul(-1));
      if (direction === null) {
        lambda *= 10;
        continue;
      }

      step = direction.getColumn(0);
      const candidate = theta.map((t, j) => t + step[j]);
      const candidateValue = evaluate(candidate);
      const candidateObjective = quadraticForm(candidateValue, weighting);

      if (candidateObjective <= objective) {
        theta = candidate;
        value = candidateValue;
        objective = candidateObjective;
        lambda = Math.max(lambda / 10, LAMBDA_MIN);
        accepted = true;
      } else {
        lambda *= 10;
      }
    }

    // No downhill step at any damping. Only a vanishing gradient makes that a minimum.
    if (!accepted) {
      const stationary = predictedDecrease(gradient, hessian) <= settings.tolerance * (1 + objective);
      return { theta, value, objective, iterations: iteration, converged: stationary };
    }

    if (stepIsSmall(step, theta, settings.tolerance)) {
      return { theta, value, objective, iterations: iteration, converged: true };
    }
  }

  return { theta, value, objective, iterations: settings.maxIterations, converged: false };
}
