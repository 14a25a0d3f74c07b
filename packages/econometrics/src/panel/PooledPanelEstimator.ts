/**
 * PooledPanelEstimator - pooled OLS on a T x K x N panel
 *
 * All valid (t, i) cells are stacked period-major into one regression.
 * Four coefficient covariances come out of every call:
 * - traditional:    Var(e) (X'X)^-1
 * - white:          heteroskedasticity only
 * - clustered:      arbitrary dependence within caller-defined unit clusters
 * - driscollKraay:  period sums of scores fed to the Newey-West kernel, robust
 *                   to cross-sectional and serial correlation
 *
 * Period sums for Driscoll-Kraay are not rescaled by the number of valid
 * units in the period; neutralized cells simply contribute zero.
 */

import { Logger } from 'winston';
import * as ss from 'simple-statistics';
import {
  Matrix2D,
  PanelArray,
  PanelOptions,
  PanelResult,
  EconometricsError,
  EconometricsErrorCode,
  RANK_DEFICIENT_MESSAGE
} from '../types';
import {
  Matrix,
  leastSquares,
  symmetricInverse,
  sandwich,
  scale,
  crossProduct
} from '../linalg';
import { CovarianceKernel } from '../core/CovarianceKernel';
import { validatePanel, validateMask, fullMask, PanelShape } from './PanelTransform';

export class PooledPanelEstimator {
  private logger: Logger;
  private kernel: CovarianceKernel;

  constructor(logger: Logger, kernel?: CovarianceKernel) {
    this.logger = logger;
    this.kernel = kernel ?? new CovarianceKernel(logger);
  }

  /**
   * @param y T x N responses
   * @param x T x K x N regressors
   * @param options.mask Cells to use; without it every cell is used and NaN propagates
   * @param options.clusters One integer cluster id per unit
   */
  estimate(y: Matrix2D, x: PanelArray, options: PanelOptions = {}): PanelResult {
    const { bandwidth = 0 } = options;

    try {
      const shape = validatePanel(y, x);
      const mask = options.mask ?? fullMask(shape);
      validateMask(mask, shape);
      const { periods: T, regressors: K, units: N } = shape;

      const observationsPerPeriod = mask.map(row => row.filter(Boolean).length);
      const nobs = ss.sum(observationsPerPeriod);
      if (nobs < K) {
        throw new EconometricsError(
          EconometricsErrorCode.DIMENSION_MISMATCH,
          `Pooled regression needs at least ${K} valid observations, got ${nobs}`
        );
      }
      this.logger.debug('Estimating pooled panel', { periods: T, regressors: K, units: N, observations: nobs });

      const { Xs, ys } = this.stack(y, x, mask, shape, nobs);
      const { solution } = leastSquares(Xs, ys);
      const xtxInv = solution === null ? null : symmetricInverse(crossProduct(Xs));
      if (solution === null || xtxInv === null) {
        throw new EconometricsError(EconometricsErrorCode.RANK_DEFICIENT, RANK_DEFICIENT_MESSAGE);
      }
      const theta = solution.getColumn(0);

      const residuals: Matrix2D = [];
      const fitted: Matrix2D = [];
      const validResiduals: number[] = [];
      const validResponses: number[] = [];
      // scores[t] is the K x N slab of e_ti * x_ti
      const scores: Matrix2D[] = [];

      for (let t = 0; t < T; t++) {
        residuals.push(new Array<number>(N).fill(0));
        fitted.push(new Array<number>(N).fill(0));
        scores.push(Array.from({ length: K }, () => new Array<number>(N).fill(0)));
        for (let i = 0; i < N; i++) {
          if (!mask[t][i]) continue;
          let prediction = 0;
          for (let j = 0; j < K; j++) {
            prediction += x[t][j][i] * theta[j];
          }
          const e = y[t][i] - prediction;
          fitted[t][i] = prediction;
          residuals[t][i] = e;
          validResiduals.push(e);
          validResponses.push(y[t][i]);
          for (let j = 0; j < K; j++) {
            scores[t][j][i] = e * x[t][j][i];
          }
        }
      }

      const residualVariance = ss.variance(validResiduals);
      const white = this.whiteMeat(scores, K);
      const periodSums = this.periodSums(scores, K);
      const longRun = this.kernel.longRun(periodSums, bandwidth);

      let clustered: Matrix | undefined;
      let clusterCount: number | undefined;
      if (options.clusters) {
        const meat = this.clusterMeat(scores, options.clusters, shape);
        clustered = sandwich(xtxInv, meat.covariance);
        clusterCount = meat.clusters;
      }

      return {
        coefficients: theta,
        covariances: {
          traditional: scale(xtxInv, residualVariance).to2DArray(),
          white: sandwich(xtxInv, white).to2DArray(),
          clustered: clustered?.to2DArray(),
          driscollKraay: sandwich(xtxInv, scale(longRun.covariance, T)).to2DArray()
        },
        residuals,
        fitted,
        rSquared: 1 - residualVariance / ss.variance(validResponses),
        observationsPerPeriod,
        nobs,
        periods: T,
        units: N,
        clusterCount,
        bandwidth: longRun.bandwidth
      };
    } catch (error) {
      this.logger.error('Pooled panel estimation failed', error);
      throw error;
    }
  }

  private stack(
    y: Matrix2D,
    x: PanelArray,
    mask: boolean[][],
    shape: PanelShape,
    nobs: number
  ): { Xs: Matrix; ys: Matrix } {
    const Xs = new Matrix(nobs, shape.regressors);
    const ys = new Matrix(nobs, 1);
    let row = 0;
    for (let t = 0; t < shape.periods; t++) {
      for (let i = 0; i < shape.units; i++) {
        if (!mask[t][i]) continue;
        ys.set(row, 0, y[t][i]);
        for (let j = 0; j < shape.regressors; j++) {
          Xs.set(row, j, x[t][j][i]);
        }
        row++;
      }
    }
    return { Xs, ys };
  }

  private whiteMeat(scores: Matrix2D[], K: number): Matrix {
    const meat = Matrix.zeros(K, K);
    for (const slab of scores) {
      const units = slab[0].length;
      for (let i = 0; i < units; i++) {
        for (let a = 0; a < K; a++) {
          for (let b = 0; b < K; b++) {
            meat.set(a, b, meat.get(a, b) + slab[a][i] * slab[b][i]);
          }
        }
      }
    }
    return meat;
  }

  // T x K matrix, row t = sum over units of the period-t scores.
  private periodSums(scores: Matrix2D[], K: number): Matrix {
    const h = new Matrix(scores.length, K);
    scores.forEach((slab, t) => {
      for (let j = 0; j < K; j++) {
        h.set(t, j, ss.sum(slab[j]));
      }
    });
    return h;
  }

  private clusterMeat(
    scores: Matrix2D[],
    clusters: number[],
    shape: PanelShape
  ): { covariance: Matrix; clusters: number } {
    if (clusters.length !== shape.units) {
      throw new EconometricsError(
        EconometricsErrorCode.DIMENSION_MISMATCH,
        `Expected one cluster id per unit (${shape.units}), got ${clusters.length}`
      );
    }
    if (!clusters.every(Number.isInteger)) {
      throw new EconometricsError(EconometricsErrorCode.INVALID_ARGUMENT, 'Cluster ids must be integers');
    }

    const totals = new Map<number, number[]>();
    for (const id of clusters) {
      if (!totals.has(id)) totals.set(id, new Array<number>(shape.regressors).fill(0));
    }
    if (totals.size < 2) {
      throw new EconometricsError(
        EconometricsErrorCode.INSUFFICIENT_DATA,
        'Cluster covariance needs at least two clusters',
        { clusters: totals.size }
      );
    }

    for (const slab of scores) {
      clusters.forEach((id, i) => {
        const total = totals.get(id);
        if (!total) return;
        for (let j = 0; j < shape.regressors; j++) {
          total[j] += slab[j][i];
        }
      });
    }

    const meat = Matrix.zeros(shape.regressors, shape.regressors);
    for (const total of totals.values()) {
      const column = Matrix.columnVector(total);
      meat.add(column.mmul(column.transpose()));
    }
    return { covariance: meat, clusters: totals.size };
  }
}
