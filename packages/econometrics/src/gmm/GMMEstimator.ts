/**
 * @fileoverview Generalized Method of Moments
 *
 * Exactly identified models (q = k) are solved as mean(g(theta)) = 0 with a
 * damped Newton root-finder. Over-identified models (q > k) minimize
 * mean(g)' W mean(g), either for a fixed W or with iterated optimal weighting
 * W <- S(theta)^-1. A k x q combination matrix A turns q moments into k
 * estimating equations A mean(g) = 0.
 *
 * Covariances (S is the Newey-West long-run covariance of g at the estimate):
 * - optimal / exact:  (D' S^-1 D)^-1 / T
 * - fixed W:          (D'WD)^-1 D'W S W D (D'WD)^-1 / T
 * - combination A:    (AD)^-1 A S A' (AD)^-1' / T
 */

import { Logger } from 'winston';
import {
  Vector,
  Matrix2D,
  MomentProblem,
  JacobianStrategy,
  GMMOptions,
  GMMResult,
  Convergence,
  Bandwidth,
  WeightingScheme,
  EconometricsError,
  EconometricsErrorCode,
  NON_CONVERGENCE_MESSAGE
} from '../types';
import {
  Matrix,
  toMatrix,
  assertSquare,
  symmetricInverse,
  generalInverse,
  sandwich,
  symmetrize,
  scale,
  identity,
  columnMeans,
  standardErrors,
  normInf
} from '../linalg';
import { CovarianceKernel } from '../core/CovarianceKernel';
import { finiteDifferenceJacobian } from './jacobian';
import { dampedNewton, levenbergMarquardt, SolverOutcome, SolverSettings } from './solvers';

export const DEFAULT_GMM_TOLERANCE = 1e-8;
export const DEFAULT_GMM_MAX_ITERATIONS = 100;

/**
 * Loop-carried state of the iterated weighting procedure.
 */
export interface IterationState {
  theta: Vector;
  weighting: Matrix;
  iteration: number;
  /** ||theta_new - theta_old||_inf of the last re-weighting step. */
  change: number;
  converged: boolean;
  solverConverged: boolean;
}

interface ResolvedSettings extends SolverSettings {
  jacobian: JacobianStrategy;
  bandwidth: Bandwidth;
}

/**
 * Moment evaluation bound to one problem and data set for a single call.
 */
class BoundProblem<TData> {
  readonly observations: number;
  readonly moments: number;

  constructor(
    private problem: MomentProblem<TData>,
    private data: TData,
    private strategy: JacobianStrategy,
    theta0: Vector
  ) {
    const g0 = toMatrix(problem.moments(theta0, data), 'moments');
    this.observations = g0.rows;
    this.moments = g0.columns;
  }

  momentMatrix(theta: Vector): Matrix {
    const g = toMatrix(this.problem.moments(theta, this.data), 'moments');
    if (g.rows !== this.observations || g.columns !== this.moments) {
      throw new EconometricsError(
        EconometricsErrorCode.DIMENSION_MISMATCH,
        `Moment function returned ${g.rows} x ${g.columns}, expected ${this.observations} x ${this.moments}`
      );
    }
    return g;
  }

  means(theta: Vector): Vector {
    return columnMeans(this.momentMatrix(theta));
  }

  jacobian(theta: Vector): Matrix {
    const D = toMatrix(this.strategy.compute(this.problem, theta, this.data), 'jacobian');
    if (D.rows !== this.moments || D.columns !== theta.length) {
      throw new EconometricsError(
        EconometricsErrorCode.DIMENSION_MISMATCH,
        `Jacobian is ${D.rows} x ${D.columns}, expected ${this.moments} x ${theta.length}`
      );
    }
    return D;
  }
}

export class GMMEstimator {
  private logger: Logger;
  private kernel: CovarianceKernel;

  constructor(logger: Logger, kernel?: CovarianceKernel) {
    this.logger = logger;
    this.kernel = kernel ?? new CovarianceKernel(logger);
  }

  /**
   * Estimate theta from the moment conditions E[g(theta)] = 0.
   *
   * @param theta0 Starting value, length k
   * @throws {EconometricsError} DIMENSION_MISMATCH when q < k, SINGULAR_MATRIX
   */
  estimate<TData>(
    problem: MomentProblem<TData>,
    data: TData,
    theta0: Vector,
    options: GMMOptions = {}
  ): GMMResult {
    const settings = this.resolve(options);

    try {
      const bound = new BoundProblem(problem, data, settings.jacobian, theta0);
      const k = theta0.length;
      const q = bound.moments;
      this.logger.debug('Estimating GMM', {
        observations: bound.observations,
        moments: q,
        parameters: k,
        jacobian: settings.jacobian.name
      });

      if (q < k) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `model is under-identified: ${q} moments for ${k} parameters`
        );
      }

      if (q === k) {
        return this.exactlyIdentified(bound, theta0, settings);
      }

      const weighting: WeightingScheme = options.weighting ?? { type: 'iterated' };
      return weighting.type === 'fixed'
        ? this.fixedWeighting(bound, theta0, toMatrix(weighting.matrix, 'W'), settings)
        : this.iteratedWeighting(bound, theta0, weighting.initial ? toMatrix(weighting.initial, 'W0') : identity(q), settings);
    } catch (error) {
      this.logger.error('GMM estimation failed', error);
      throw error;
    }
  }

  /**
   * Solve A mean(g(theta)) = 0 for a k x q combination matrix A.
   */
  estimateWithCombination<TData>(
    problem: MomentProblem<TData>,
    data: TData,
    theta0: Vector,
    combination: Matrix2D,
    options: Omit<GMMOptions, 'weighting'> = {}
  ): GMMResult {
    const settings = this.resolve(options);

    try {
      const bound = new BoundProblem(problem, data, settings.jacobian, theta0);
      const k = theta0.length;
      const A = toMatrix(combination, 'A');
      if (A.rows !== k || A.columns !== bound.moments) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `Combination matrix must be ${k} x ${bound.moments}, got ${A.rows} x ${A.columns}`
        );
      }

      const outcome = dampedNewton(
        theta => A.mmul(Matrix.columnVector(bound.means(theta))).getColumn(0),
        theta => A.mmul(bound.jacobian(theta)),
        theta0,
        settings
      );

      const { D, S, T, g, bandwidth } = this.atEstimate(bound, outcome.theta, settings.bandwidth);
      const adInv = generalInverse(A.mmul(D));
      if (adInv === null) {
        throw new EconometricsError(EconometricsErrorCode.SINGULAR_MATRIX, 'A D is singular at the estimate');
      }
      const covariance = scale(sandwich(adInv, A.mmul(S).mmul(A.transpose())), 1 / T);

      return this.buildResult({
        theta: outcome.theta,
        covariance,
        momentMeans: g,
        D,
        S,
        // A mean(g) = 0 is the minimizer of mean(g)' A'A mean(g)
        W: A.transpose().mmul(A),
        loss: outcome.objective,
        T,
        identification: 'combination',
        degreesOfFreedom: 0,
        convergence: this.convergence(outcome.converged, outcome.iterations),
        bandwidth
      });
    } catch (error) {
      this.logger.error('GMM estimation failed', error);
      throw error;
    }
  }

  private exactlyIdentified<TData>(
    bound: BoundProblem<TData>,
    theta0: Vector,
    settings: ResolvedSettings
  ): GMMResult {
    const outcome = dampedNewton(
      theta => bound.means(theta),
      theta => bound.jacobian(theta),
      theta0,
      settings
    );

    const { D, S, T, g, bandwidth } = this.atEstimate(bound, outcome.theta, settings.bandwidth);
    const dInv = generalInverse(D);
    if (dInv === null) {
      throw new EconometricsError(EconometricsErrorCode.SINGULAR_MATRIX, 'Moment Jacobian is singular at the estimate');
    }

    return this.buildResult({
      theta: outcome.theta,
      covariance: scale(sandwich(dInv, S), 1 / T),
      momentMeans: g,
      D,
      S,
      W: identity(bound.moments),
      loss: outcome.objective,
      T,
      identification: 'exact',
      degreesOfFreedom: 0,
      convergence: this.convergence(outcome.converged, outcome.iterations),
      bandwidth
    });
  }

  private fixedWeighting<TData>(
    bound: BoundProblem<TData>,
    theta0: Vector,
    W: Matrix,
    settings: ResolvedSettings
  ): GMMResult {
    assertSquare(W, bound.moments, 'W');
    const outcome = this.minimize(bound, W, theta0, settings);

    const { D, S, T, g, bandwidth } = this.atEstimate(bound, outcome.theta, settings.bandwidth);
    const dwd = symmetricInverse(D.transpose().mmul(W).mmul(D));
    if (dwd === null) {
      throw new EconometricsError(EconometricsErrorCode.SINGULAR_MATRIX, "D'WD is singular at the estimate");
    }
    const bread = dwd.mmul(D.transpose()).mmul(W);

    return this.buildResult({
      theta: outcome.theta,
      covariance: scale(sandwich(bread, S), 1 / T),
      momentMeans: g,
      D,
      S,
      W,
      loss: outcome.objective,
      T,
      identification: 'over',
      degreesOfFreedom: bound.moments - outcome.theta.length,
      convergence: this.convergence(outcome.converged, outcome.iterations),
      bandwidth
    });
  }

  private iteratedWeighting<TData>(
    bound: BoundProblem<TData>,
    theta0: Vector,
    W0: Matrix,
    settings: ResolvedSettings
  ): GMMResult {
    assertSquare(W0, bound.moments, 'W0');

    const first = this.minimize(bound, W0, theta0, settings);
    let state: IterationState = {
      theta: first.theta,
      weighting: W0,
      iteration: 0,
      change: Infinity,
      converged: false,
      solverConverged: first.converged
    };

    while (!state.converged && state.iteration < settings.maxIterations) {
      state = this.reweight(bound, state, settings);
    }

    const { D, S, T, g, bandwidth } = this.atEstimate(bound, state.theta, settings.bandwidth);
    const sInv = this.invertMomentCovariance(S);
    const covariance = symmetricInverse(D.transpose().mmul(sInv).mmul(D));
    if (covariance === null) {
      throw new EconometricsError(EconometricsErrorCode.SINGULAR_MATRIX, "D'S^-1 D is singular at the estimate");
    }

    const gVector = Matrix.columnVector(g);
    const jStatistic = T * gVector.transpose().mmul(sInv).mmul(gVector).get(0, 0);

    this.logger.debug('Iterated GMM finished', {
      iterations: state.iteration,
      change: state.change,
      converged: state.converged
    });

    return this.buildResult({
      theta: state.theta,
      covariance: scale(symmetrize(covariance), 1 / T),
      momentMeans: g,
      D,
      S,
      W: state.weighting,
      loss: gVector.transpose().mmul(state.weighting).mmul(gVector).get(0, 0),
      T,
      identification: 'over',
      degreesOfFreedom: bound.moments - state.theta.length,
      jStatistic,
      convergence: this.convergence(state.converged && state.solverConverged, state.iteration),
      bandwidth
    });
  }

  /** One pass of W <- S(theta)^-1; theta <- argmin mean(g)' W mean(g). */
  private reweight<TData>(
    bound: BoundProblem<TData>,
    state: IterationState,
    settings: ResolvedSettings
  ): IterationState {
    const S = this.kernel.longRun(bound.momentMatrix(state.theta), settings.bandwidth).covariance;
    const weighting = this.invertMomentCovariance(S);
    const outcome = this.minimize(bound, weighting, state.theta, settings);
    const change = normInf(outcome.theta.map((t, j) => t - state.theta[j]));

    return {
      theta: outcome.theta,
      weighting,
      iteration: state.iteration + 1,
      change,
      converged: change < settings.tolerance,
      solverConverged: outcome.converged
    };
  }

  private minimize<TData>(
    bound: BoundProblem<TData>,
    W: Matrix,
    theta0: Vector,
    settings: ResolvedSettings
  ): SolverOutcome {
    return levenbergMarquardt(
      theta => bound.means(theta),
      theta => bound.jacobian(theta),
      W,
      theta0,
      settings
    );
  }

  private atEstimate<TData>(
    bound: BoundProblem<TData>,
    theta: Vector,
    bandwidth: Bandwidth
  ): { D: Matrix; S: Matrix; T: number; g: Vector; bandwidth: number } {
    const moments = bound.momentMatrix(theta);
    const longRun = this.kernel.longRun(moments, bandwidth);
    return {
      D: bound.jacobian(theta),
      S: longRun.covariance,
      T: moments.rows,
      g: columnMeans(moments),
      bandwidth: longRun.bandwidth
    };
  }

  private invertMomentCovariance(S: Matrix): Matrix {
    const inverse = symmetricInverse(S);
    if (inverse === null) {
      throw new EconometricsError(
        EconometricsErrorCode.SINGULAR_MATRIX,
        'Moment covariance S is singular; the optimal weighting matrix does not exist'
      );
    }
    return symmetrize(inverse);
  }

  private convergence(converged: boolean, iterations: number): Convergence {
    if (converged) {
      return { converged, iterations };
    }
    this.logger.warn(NON_CONVERGENCE_MESSAGE, { iterations });
    return { converged, iterations, message: NON_CONVERGENCE_MESSAGE };
  }

  private resolve(options: Omit<GMMOptions, 'weighting'>): ResolvedSettings {
    const tolerance = options.tolerance ?? DEFAULT_GMM_TOLERANCE;
    const maxIterations = options.maxIterations ?? DEFAULT_GMM_MAX_ITERATIONS;
    if (!(tolerance > 0) || !Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new EconometricsError(
        EconometricsErrorCode.INVALID_ARGUMENT,
        'GMM tolerance must be positive and maxIterations a positive integer',
        { tolerance, maxIterations }
      );
    }
    return {
      tolerance,
      maxIterations,
      jacobian: options.jacobian ?? finiteDifferenceJacobian(),
      bandwidth: options.bandwidth ?? 0
    };
  }

  private buildResult(parts: {
    theta: Vector;
    covariance: Matrix;
    momentMeans: Vector;
    D: Matrix;
    S: Matrix;
    W: Matrix;
    loss: number;
    T: number;
    identification: GMMResult['identification'];
    degreesOfFreedom: number;
    jStatistic?: number;
    convergence: Convergence;
    bandwidth: number;
  }): GMMResult {
    return {
      coefficients: parts.theta,
      covariance: parts.covariance.to2DArray(),
      standardErrors: standardErrors(parts.covariance),
      momentMeans: parts.momentMeans,
      jacobian: parts.D.to2DArray(),
      momentCovariance: parts.S.to2DArray(),
      weightingMatrix: parts.W.to2DArray(),
      jStatistic: parts.jStatistic,
      degreesOfFreedom: parts.degreesOfFreedom,
      loss: parts.loss,
      nobs: parts.T,
      identification: parts.identification,
      convergence: parts.convergence,
      bandwidth: parts.bandwidth
    };
  }
}
