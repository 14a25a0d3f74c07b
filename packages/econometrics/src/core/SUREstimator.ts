/**
 * SUREstimator - Seemingly-unrelated regressions sharing one design matrix
 *
 * With identical regressors in every equation the joint GLS estimate collapses
 * to equation-by-equation OLS, so point estimates come from a single QR of X.
 * Inference is joint: theta is stacked equation-major (theta[i * k + j]) and
 * the covariance carries the cross-equation terms. Restriction matrices for
 * Wald tests must use the same ordering.
 */

import { Logger } from 'winston';
import * as ss from 'simple-statistics';
import {
  Matrix2D,
  CovarianceOptions,
  CovarianceType,
  SUREResult,
  EconometricsError,
  EconometricsErrorCode,
  RANK_DEFICIENT_MESSAGE
} from '../types';
import {
  Matrix,
  toMatrix,
  assertRows,
  leastSquares,
  symmetricInverse,
  kroneckerRows,
  sandwich,
  scale,
  subtract,
  crossProduct,
  identity,
  standardErrors,
  symmetrize
} from '../linalg';
import { CovarianceKernel } from './CovarianceKernel';

export class SUREstimator {
  private logger: Logger;
  private kernel: CovarianceKernel;

  constructor(logger: Logger, kernel?: CovarianceKernel) {
    this.logger = logger;
    this.kernel = kernel ?? new CovarianceKernel(logger);
  }

  /**
   * @param y T x n responses, one column per equation
   * @param x T x k regressors shared by every equation
   */
  estimate(y: Matrix2D, x: Matrix2D, options: CovarianceOptions = {}): SUREResult {
    const { robust = false, bandwidth = 0 } = options;

    try {
      const Y = toMatrix(y, 'Y');
      const X = toMatrix(x, 'X');
      assertRows(X, Y.rows, 'X');

      const T = X.rows;
      const k = X.columns;
      const n = Y.columns;
      if (T < k) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `SURE needs at least as many observations as regressors (T=${T}, k=${k})`
        );
      }
      this.logger.debug('Estimating SURE system', { observations: T, regressors: k, equations: n, robust });

      const { solution } = leastSquares(X, Y);
      if (solution === null) {
        throw new EconometricsError(EconometricsErrorCode.RANK_DEFICIENT, RANK_DEFICIENT_MESSAGE);
      }
      const xtxInv = symmetricInverse(crossProduct(X));
      if (xtxInv === null) {
        throw new EconometricsError(EconometricsErrorCode.RANK_DEFICIENT, RANK_DEFICIENT_MESSAGE);
      }

      const fitted = X.mmul(solution);
      const residuals = subtract(Y, fitted);
      const residualCovariance = this.residualCovariance(residuals);

      let covariance: Matrix;
      let covarianceType: CovarianceType = 'iid';
      let usedBandwidth = 0;

      if (robust) {
        const longRun = this.kernel.longRun(kroneckerRows(residuals, X), bandwidth);
        const bread = identity(n).kroneckerProduct(xtxInv);
        covariance = sandwich(bread, scale(longRun.covariance, T));
        usedBandwidth = longRun.bandwidth;
        covarianceType = usedBandwidth === 0 ? 'white' : 'newey-west';
      } else {
        covariance = symmetrize(residualCovariance.kroneckerProduct(xtxInv));
      }

      const theta: number[] = [];
      for (let i = 0; i < n; i++) {
        theta.push(...solution.getColumn(i));
      }

      const rSquared = Array.from({ length: n }, (_, i) =>
        1 - ss.variance(residuals.getColumn(i)) / ss.variance(Y.getColumn(i))
      );

      return {
        coefficients: solution.to2DArray(),
        theta,
        covariance: covariance.to2DArray(),
        standardErrors: standardErrors(covariance),
        residuals: residuals.to2DArray(),
        fitted: fitted.to2DArray(),
        rSquared,
        residualCovariance: residualCovariance.to2DArray(),
        nobs: T,
        equations: n,
        covarianceType,
        bandwidth: usedBandwidth
      };
    } catch (error) {
      this.logger.error('SURE estimation failed', error);
      throw error;
    }
  }

  // Population covariance (divisor T) of the residual columns.
  private residualCovariance(residuals: Matrix): Matrix {
    const T = residuals.rows;
    const n = residuals.columns;
    const columns = Array.from({ length: n }, (_, i) => residuals.getColumn(i));
    const means = columns.map(c => ss.mean(c));
    const out = new Matrix(n, n);
    for (let a = 0; a < n; a++) {
      for (let b = a; b < n; b++) {
        let sum = 0;
        for (let t = 0; t < T; t++) {
          sum += (columns[a][t] - means[a]) * (columns[b][t] - means[b]);
        }
        out.set(a, b, sum / T);
        out.set(b, a, sum / T);
      }
    }
    return out;
  }
}
