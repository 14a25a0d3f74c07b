/**
 * CovarianceKernel - Newey-West long-run covariance of score/moment vectors
 *
 * Given a T x q matrix of scores g, estimates Var(sqrt(T) * mean(g)) with
 * Bartlett weights 1 - s/(m+1). Bandwidth 0 is the White (heteroskedasticity
 * only) estimator. Bartlett weighting keeps the estimate positive semidefinite
 * for every bandwidth.
 *
 * Sums run in row order; results can differ in the last bits from an
 * implementation that accumulates in a different order.
 */

import { Logger } from 'winston';
import {
  Bandwidth,
  KernelResult,
  EconometricsError,
  EconometricsErrorCode,
  INSUFFICIENT_BANDWIDTH_DATA_MESSAGE
} from '../types';
import { Matrix, columnMeans, symmetrize } from '../linalg';

/**
 * Rule-of-thumb lag length floor(4 * (T/100)^(2/9)).
 */
export function automaticBandwidth(observations: number): number {
  return Math.floor(4 * Math.pow(observations / 100, 2 / 9));
}

export class CovarianceKernel {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Resolve a requested bandwidth against the number of observations.
   * Requests above T - 1 are clamped to T - 1.
   */
  resolveBandwidth(
    bandwidth: Bandwidth,
    observations: number
  ): { bandwidth: number; requested: number; clamped: boolean } {
    if (observations < 1) {
      throw new EconometricsError(
        EconometricsErrorCode.INSUFFICIENT_DATA,
        INSUFFICIENT_BANDWIDTH_DATA_MESSAGE,
        { observations, bandwidth }
      );
    }

    const requested = bandwidth === 'auto' ? automaticBandwidth(observations) : bandwidth;
    if (!Number.isInteger(requested) || requested < 0) {
      throw new EconometricsError(
        EconometricsErrorCode.INVALID_ARGUMENT,
        `Bandwidth must be a non-negative integer, got ${requested}`
      );
    }

    if (requested > observations - 1) {
      this.logger.warn('Bandwidth clamped to T - 1', { requested, observations });
      return { bandwidth: observations - 1, requested, clamped: true };
    }
    return { bandwidth: requested, requested, clamped: false };
  }

  /**
   * Newey-West covariance of the rows of `scores`.
   *
   * @param scores T x q score matrix, row t is the time-t contribution
   * @param bandwidth Number of lags with non-zero weight
   */
  estimate(scores: Matrix, bandwidth: Bandwidth = 0): KernelResult {
    const T = scores.rows;
    const q = scores.columns;
    const resolved = this.resolveBandwidth(bandwidth, T);
    const m = resolved.bandwidth;

    const means = columnMeans(scores);
    const centered = new Matrix(T, q);
    for (let t = 0; t < T; t++) {
      for (let j = 0; j < q; j++) {
        centered.set(t, j, scores.get(t, j) - means[j]);
      }
    }

    const total = centered.transpose().mmul(centered);

    for (let s = 1; s <= m; s++) {
      const weight = 1 - s / (m + 1);
      const lagged = this.autocovariance(centered, s);
      total.add(lagged.add(lagged.transpose()).mul(weight));
    }

    this.logger.debug('Computed long-run covariance', { observations: T, moments: q, bandwidth: m });

    return {
      covariance: symmetrize(total.div(T)).to2DArray(),
      bandwidth: m,
      requestedBandwidth: resolved.requested,
      clamped: resolved.clamped
    };
  }

  /** Convenience wrapper returning the covariance as a Matrix. */
  longRun(scores: Matrix, bandwidth: Bandwidth = 0): { covariance: Matrix; bandwidth: number } {
    const result = this.estimate(scores, bandwidth);
    return { covariance: new Matrix(result.covariance), bandwidth: result.bandwidth };
  }

  // sum_{t=s}^{T-1} g_t g_{t-s}'
  private autocovariance(centered: Matrix, lag: number): Matrix {
    const T = centered.rows;
    const q = centered.columns;
    const out = Matrix.zeros(q, q);
    for (let t = lag; t < T; t++) {
      for (let a = 0; a < q; a++) {
        const ga = centered.get(t, a);
        for (let b = 0; b < q; b++) {
          out.set(a, b, out.get(a, b) + ga * centered.get(t - lag, b));
        }
      }
    }
    return out;
  }
}
