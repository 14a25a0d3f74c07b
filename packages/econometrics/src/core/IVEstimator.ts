/**
 * IVEstimator - Two-stage least squares
 *
 * Stage 1 projects every regressor on the instruments; stage 2 regresses y on
 * the projections. Residuals are always formed from the original regressors.
 */

import { Logger } from 'winston';
import * as ss from 'simple-statistics';
import {
  Vector,
  Matrix2D,
  CovarianceOptions,
  CovarianceType,
  IVResult,
  FirstStageResult,
  EconometricsError,
  EconometricsErrorCode,
  INSUFFICIENT_RANK_MESSAGE
} from '../types';
import {
  Matrix,
  toMatrix,
  toResponse,
  assertRows,
  leastSquares,
  symmetricInverse,
  scaleRows,
  sandwich,
  scale,
  subtract,
  crossProduct,
  standardErrors
} from '../linalg';
import { CovarianceKernel } from './CovarianceKernel';

export class IVEstimator {
  private logger: Logger;
  private kernel: CovarianceKernel;

  constructor(logger: Logger, kernel?: CovarianceKernel) {
    this.logger = logger;
    this.kernel = kernel ?? new CovarianceKernel(logger);
  }

  /**
   * @param y T-vector response
   * @param x T x k regressors, possibly endogenous
   * @param z T x L instruments, L >= k; exogenous regressors instrument themselves
   * @throws {EconometricsError} DIMENSION_MISMATCH, INSUFFICIENT_RANK
   */
  estimate(y: Vector | Matrix2D, x: Matrix2D, z: Matrix2D, options: CovarianceOptions = {}): IVResult {
    const { robust = false, bandwidth = 0 } = options;

    try {
      const Y = toResponse(y, 'y');
      const X = toMatrix(x, 'X');
      const Z = toMatrix(z, 'Z');
      assertRows(X, Y.rows, 'X');
      assertRows(Z, Y.rows, 'Z');
      if (Y.columns !== 1) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `y must have a single column, got ${Y.columns}`
        );
      }

      const T = X.rows;
      const k = X.columns;
      const L = Z.columns;
      if (L < k) {
        throw new EconometricsError(
          EconometricsErrorCode.INSUFFICIENT_RANK,
          INSUFFICIENT_RANK_MESSAGE,
          { instruments: L, regressors: k }
        );
      }
      this.logger.debug('Estimating 2SLS', { observations: T, regressors: k, instruments: L, robust });

      const stage1 = leastSquares(Z, X);
      const szzInv = symmetricInverse(crossProduct(Z));
      if (stage1.solution === null || szzInv === null) {
        throw this.rankFailure('Z is rank-deficient');
      }
      const delta = stage1.solution;
      const xHat = Z.mmul(delta);
      const xResiduals = subtract(X, xHat);

      const stage2 = leastSquares(xHat, Y);
      if (stage2.solution === null) {
        throw this.rankFailure('projected regressors are rank-deficient');
      }
      const theta = stage2.solution;

      const fittedM = X.mmul(theta);
      const residuals = subtract(Y, fittedM).getColumn(0);
      const residualVariance = ss.variance(residuals);

      const xz = crossProduct(X, Z);
      const inner = symmetricInverse(xz.mmul(szzInv).mmul(xz.transpose()));
      if (inner === null) {
        throw this.rankFailure("X'Z (Z'Z)^-1 Z'X is singular");
      }

      let covariance: Matrix;
      let covarianceType: CovarianceType = 'iid';
      let usedBandwidth = 0;

      if (robust) {
        const B = inner.mmul(xz).mmul(szzInv);
        const longRun = this.kernel.longRun(scaleRows(residuals, Z), bandwidth);
        covariance = sandwich(B, scale(longRun.covariance, T));
        usedBandwidth = longRun.bandwidth;
        covarianceType = usedBandwidth === 0 ? 'white' : 'newey-west';
      } else {
        covariance = scale(inner, residualVariance);
      }

      const firstStage = this.firstStage(X, Z, delta, xHat, xResiduals, szzInv, robust, bandwidth);
      const coefficients = theta.getColumn(0);
      const errors = standardErrors(covariance);

      return {
        coefficients,
        covariance: covariance.to2DArray(),
        standardErrors: errors,
        tStatistics: coefficients.map((b, j) => b / errors[j]),
        residuals,
        fitted: fittedM.getColumn(0),
        rSquared: 1 - residualVariance / ss.variance(Y.getColumn(0)),
        firstStage,
        nobs: T,
        instruments: L,
        covarianceType,
        bandwidth: usedBandwidth
      };
    } catch (error) {
      this.logger.error('2SLS estimation failed', error);
      throw error;
    }
  }

  private firstStage(
    X: Matrix,
    Z: Matrix,
    delta: Matrix,
    xHat: Matrix,
    xResiduals: Matrix,
    szzInv: Matrix,
    robust: boolean,
    bandwidth: CovarianceOptions['bandwidth']
  ): FirstStageResult {
    const T = X.rows;
    const rSquared: number[] = [];
    const covariances: Matrix2D[] = [];
    const errors = new Matrix(Z.columns, X.columns);

    for (let i = 0; i < X.columns; i++) {
      const resid = xResiduals.getColumn(i);
      const totalVariance = ss.variance(X.getColumn(i));
      const residualVariance = ss.variance(resid);
      // A constant regressor has no variation to explain.
      rSquared.push(totalVariance === 0 ? NaN : 1 - residualVariance / totalVariance);

      const covariance = robust
        ? sandwich(szzInv, scale(this.kernel.longRun(scaleRows(resid, Z), bandwidth).covariance, T))
        : scale(szzInv, residualVariance);
      covariances.push(covariance.to2DArray());
      standardErrors(covariance).forEach((se, l) => errors.set(l, i, se));
    }

    return {
      coefficients: delta.to2DArray(),
      fitted: xHat.to2DArray(),
      rSquared,
      covariances,
      standardErrors: errors.to2DArray()
    };
  }

  private rankFailure(reason: string): EconometricsError {
    return new EconometricsError(
      EconometricsErrorCode.INSUFFICIENT_RANK,
      INSUFFICIENT_RANK_MESSAGE,
      { reason }
    );
  }
}
