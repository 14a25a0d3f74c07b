import { Logger } from 'winston';
import * as ss from 'simple-statistics';
import {
  Vector,
  Matrix2D,
  OLSOptions,
  OLSResult,
  CovarianceType,
  EconometricsError,
  EconometricsErrorCode,
  RANK_DEFICIENT_MESSAGE
} from '../types';
import {
  Matrix,
  toMatrix,
  toResponse,
  assertRows,
  leastSquares,
  symmetricInverse,
  pinv,
  scaleRows,
  sandwich,
  scale,
  subtract,
  crossProduct,
  standardErrors
} from '../linalg';
import { CovarianceKernel } from './CovarianceKernel';

/**
 * Single-equation least squares with iid, White or Newey-West covariance.
 */
export class OLSEstimator {
  private logger: Logger;
  private kernel: CovarianceKernel;

  constructor(logger: Logger, kernel?: CovarianceKernel) {
    this.logger = logger;
    this.kernel = kernel ?? new CovarianceKernel(logger);
  }

  /**
   * Regress y on X.
   *
   * @param y T-vector or T x 1 response
   * @param x T x k design matrix, intercept included by the caller
   * @throws {EconometricsError} DIMENSION_MISMATCH, RANK_DEFICIENT
   */
  estimate(y: Vector | Matrix2D, x: Matrix2D, options: OLSOptions = {}): OLSResult {
    const { robust = false, bandwidth = 0, allowRankDeficient = false } = options;

    try {
      const Y = toResponse(y, 'y');
      const X = toMatrix(x, 'X');
      assertRows(X, Y.rows, 'X');
      if (Y.columns !== 1) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `y must have a single column, got ${Y.columns}; use the SURE estimator for several equations`
        );
      }

      const T = X.rows;
      const k = X.columns;
      if (T < k) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `OLS needs at least as many observations as regressors (T=${T}, k=${k})`
        );
      }
      this.logger.debug('Estimating OLS', { observations: T, regressors: k, robust });

      const { solution, rankDeficient } = leastSquares(X, Y, allowRankDeficient);
      if (solution === null) {
        throw new EconometricsError(
          EconometricsErrorCode.RANK_DEFICIENT,
          RANK_DEFICIENT_MESSAGE,
          { observations: T, regressors: k }
        );
      }

      const fittedM = X.mmul(solution);
      const residualsM = subtract(Y, fittedM);
      const residuals = residualsM.getColumn(0);
      const fitted = fittedM.getColumn(0);
      const yValues = Y.getColumn(0);

      const sigma2 = ss.variance(residuals);
      const rSquared = 1 - sigma2 / ss.variance(yValues);

      const xtx = crossProduct(X);
      const xtxInv = rankDeficient ? pinv(xtx) : symmetricInverse(xtx);
      if (xtxInv === null) {
        throw new EconometricsError(EconometricsErrorCode.RANK_DEFICIENT, RANK_DEFICIENT_MESSAGE);
      }

      let covariance: Matrix;
      let covarianceType: CovarianceType = 'iid';
      let usedBandwidth = 0;

      if (robust) {
        const longRun = this.kernel.longRun(scaleRows(residuals, X), bandwidth);
        covariance = sandwich(xtxInv, scale(longRun.covariance, T));
        usedBandwidth = longRun.bandwidth;
        covarianceType = usedBandwidth === 0 ? 'white' : 'newey-west';
      } else {
        covariance = scale(xtxInv, sigma2);
      }

      const coefficients = solution.getColumn(0);
      const errors = standardErrors(covariance);

      return {
        coefficients,
        covariance: covariance.to2DArray(),
        standardErrors: errors,
        tStatistics: coefficients.map((b, j) => b / errors[j]),
        residuals,
        fitted,
        rSquared,
        sigma2,
        nobs: T,
        covarianceType,
        bandwidth: usedBandwidth,
        rankDeficient
      };
    } catch (error) {
      this.logger.error('OLS estimation failed', error);
      throw error;
    }
  }
}
