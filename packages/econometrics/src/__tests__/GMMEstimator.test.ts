import { describe, it, expect, beforeEach } from '@jest/globals';
import { GMMEstimator } from '../gmm/GMMEstimator';
import { analyticJacobian, finiteDifferenceJacobian, checkJacobian } from '../gmm/jacobian';
import {
  MomentProblem,
  Matrix2D,
  Vector,
  EconometricsErrorCode,
  NON_CONVERGENCE_MESSAGE
} from '../types';
import { testLogger, errorCode, expectMatrixClose, expectVectorClose } from './helpers';

// Mean and population variance: g_t = (x_t - mu, (x_t - mu)^2 - sigma2)
const meanVariance: MomentProblem<Vector> = {
  moments: ([mu, sigma2], x) => x.map(v => [v - mu, (v - mu) * (v - mu) - sigma2]),
  jacobian: ([mu], x) => {
    const mean = x.reduce((sum, v) => sum + v, 0) / x.length;
    return [[-1, 0], [-2 * (mean - mu), -1]];
  }
};

// Two series sharing one location parameter: g_t = (a_t - mu, b_t - mu)
const commonMean: MomentProblem<Matrix2D> = {
  moments: ([mu], rows) => rows.map(([a, b]) => [a - mu, b - mu]),
  jacobian: () => [[-1], [-1]]
};

// Linear regression y = a + b x with instruments z_t: g_t = (y_t - a - b x_t) z_t
function scaledRegression(withAbsoluteX: boolean): MomentProblem<Matrix2D> {
  const instruments = (x: number): Vector => (withAbsoluteX ? [1, x, Math.abs(x) / 1e6] : [1, x]);
  return {
    moments: ([a, b], rows) => rows.map(([y, x]) => instruments(x).map(z => (y - a - b * x) * z)),
    jacobian: (_theta, rows) => {
      const D = instruments(0).map(() => [0, 0]);
      rows.forEach(([, x]) =>
        instruments(x).forEach((z, i) => {
          D[i][0] -= z / rows.length;
          D[i][1] -= (z * x) / rows.length;
        })
      );
      return D;
    }
  };
}

// y = 2 + 3e-6 x + u on a centred regressor in large units, with
// u = [0.1, -0.2, 0.2, -0.2, 0.1] orthogonal to 1, x and |x|
const LARGE_UNITS = [
  [-3.9, -2e6],
  [-1.2, -1e6],
  [2.2, 0],
  [4.8, 1e6],
  [8.1, 2e6]
];

const SERIES = [1, 2, 3, 4, 5];
// Var(a) = 1.25, Var(b) = 1, Cov(a, b) = 1; S^-1 = [[4, -4], [-4, 5]]
const PAIRS = [[1, 2], [2, 2], [3, 4], [4, 4]];

describe('GMMEstimator', () => {
  let gmm: GMMEstimator;

  beforeEach(() => {
    gmm = new GMMEstimator(testLogger);
  });

  describe('exactly identified', () => {
    it('should recover the sample mean and population variance', () => {
      const result = gmm.estimate(meanVariance, SERIES, [0, 1]);

      expectVectorClose(result.coefficients, [3, 2], 6);
      result.momentMeans.forEach(g => expect(g).toBeCloseTo(0, 6));
      expect(result.identification).toBe('exact');
      expect(result.convergence.converged).toBe(true);
      expect(result.degreesOfFreedom).toBe(0);
    });

    it('should match the closed-form covariance with the analytic Jacobian', () => {
      const result = gmm.estimate(meanVariance, SERIES, [0, 1], { jacobian: analyticJacobian() });

      expectVectorClose(result.coefficients, [3, 2], 10);
      expectMatrixClose(result.jacobian, [[-1, 0], [0, -1]], 8);
      expectMatrixClose(result.momentCovariance, [[2, 0], [0, 2.8]], 8);
      expectMatrixClose(result.covariance, [[0.4, 0], [0, 0.56]], 8);
      expectVectorClose(result.standardErrors, [Math.sqrt(0.4), Math.sqrt(0.56)], 8);
      expect(result.nobs).toBe(5);
    });

    it('should report non-convergence with the last iterate', () => {
      const result = gmm.estimate(meanVariance, SERIES, [0, 1], {
        jacobian: analyticJacobian(),
        maxIterations: 1
      });

      expect(result.convergence.converged).toBe(false);
      expect(result.convergence.message).toBe(NON_CONVERGENCE_MESSAGE);
      expect(result.convergence.iterations).toBe(1);
      // One Newton step from (0, 1)
      expectVectorClose(result.coefficients, [3, -7], 8);
    });
  });

  describe('over-identified', () => {
    it('should iterate to the optimal weighting matrix', () => {
      const result = gmm.estimate(commonMean, PAIRS, [0]);

      expect(result.coefficients[0]).toBeCloseTo(3, 6);
      expectMatrixClose(result.momentCovariance, [[1.25, 1], [1, 1]], 8);
      expectMatrixClose(result.weightingMatrix, [[4, -4], [-4, 5]], 6);
      expect(result.covariance[0][0]).toBeCloseTo(0.25, 6);
      expect(result.jStatistic).toBeCloseTo(4, 5);
      expect(result.degreesOfFreedom).toBe(1);
      expect(result.identification).toBe('over');
      expect(result.convergence.converged).toBe(true);
    });

    it('should reach the same fixed point from another starting weight', () => {
      const fromIdentity = gmm.estimate(commonMean, PAIRS, [0]);
      const fromScaled = gmm.estimate(commonMean, PAIRS, [0], {
        weighting: { type: 'iterated', initial: [[2, 0], [0, 1]] }
      });

      expect(fromScaled.coefficients[0]).toBeCloseTo(fromIdentity.coefficients[0], 6);
      expectMatrixClose(fromScaled.covariance, fromIdentity.covariance, 6);
      expectMatrixClose(fromScaled.weightingMatrix, fromIdentity.weightingMatrix, 6);
    });

    it('should use a fixed weighting matrix with the sandwich covariance', () => {
      const result = gmm.estimate(commonMean, PAIRS, [0], {
        weighting: { type: 'fixed', matrix: [[1, 0], [0, 1]] }
      });

      expect(result.coefficients[0]).toBeCloseTo(2.75, 6);
      // 0.25 * (1.25 + 2 + 1) / 4
      expect(result.covariance[0][0]).toBeCloseTo(0.265625, 6);
      expect(result.jStatistic).toBeUndefined();
      expectMatrixClose(result.weightingMatrix, [[1, 0], [0, 1]], 12);
    });

    it('should solve a combination of the moments', () => {
      const result = gmm.estimateWithCombination(commonMean, PAIRS, [0], [[1, 0]]);

      expect(result.coefficients[0]).toBeCloseTo(2.5, 8);
      expect(result.covariance[0][0]).toBeCloseTo(0.3125, 8);
      expectMatrixClose(result.weightingMatrix, [[1, 0], [0, 0]], 12);
      expect(result.identification).toBe('combination');
    });

    it('should reject a combination matrix of the wrong shape', () => {
      expect(errorCode(() => gmm.estimateWithCombination(commonMean, PAIRS, [0], [[1, 0, 0]]))).toBe(
        EconometricsErrorCode.DIMENSION_MISMATCH
      );
    });
  });

  describe('parameters on different scales', () => {
    it('should solve exactly identified moments with a badly scaled Jacobian', () => {
      const result = gmm.estimate(scaledRegression(false), LARGE_UNITS, [0, 0], { jacobian: analyticJacobian() });

      expect(result.convergence.converged).toBe(true);
      expect(result.coefficients[0]).toBeCloseTo(2, 8);
      expect(result.coefficients[1] / 3e-6).toBeCloseTo(1, 8);
      // White OLS covariance: sum(u^2) / 25 and sum(u^2 x^2) / (sum x^2)^2
      expect(result.covariance[0][0]).toBeCloseTo(0.0056, 10);
      expect(result.covariance[1][1] / 1.6e-15).toBeCloseTo(1, 6);
    });

    it('should minimize badly scaled over-identified moments', () => {
      const result = gmm.estimate(scaledRegression(true), LARGE_UNITS, [0, 0], {
        jacobian: analyticJacobian(),
        weighting: { type: 'fixed', matrix: [[1, 0, 0], [0, 1, 0], [0, 0, 1]] }
      });

      expect(result.convergence.converged).toBe(true);
      expect(result.coefficients[0]).toBeCloseTo(2, 8);
      expect(result.coefficients[1] / 3e-6).toBeCloseTo(1, 8);
      expect(result.loss).toBeCloseTo(0, 8);
      expect(result.degreesOfFreedom).toBe(1);
    });

    it('should report non-convergence when no step lowers the objective', () => {
      // Any move away from mu = 1 evaluates to NaN while the gradient is not zero
      const stuck: MomentProblem<Vector> = {
        moments: ([mu], x) => x.map(v => (mu === 1 ? [v, 2 * v] : [Number.NaN, Number.NaN])),
        jacobian: () => [[-1], [-1]]
      };
      const result = gmm.estimate(stuck, [1, 1], [1], {
        jacobian: analyticJacobian(),
        weighting: { type: 'fixed', matrix: [[1, 0], [0, 1]] }
      });

      expect(result.coefficients).toEqual([1]);
      expect(result.convergence.converged).toBe(false);
      expect(result.convergence.message).toBe(NON_CONVERGENCE_MESSAGE);
    });
  });

  describe('validation', () => {
    it('should reject an under-identified model', () => {
      const single: MomentProblem<Vector> = { moments: ([a, b], x) => x.map(v => [v - a - b]) };
      expect(errorCode(() => gmm.estimate(single, SERIES, [0, 0]))).toBe(EconometricsErrorCode.DIMENSION_MISMATCH);
    });

    it('should require a jacobian function for the analytic strategy', () => {
      const numericOnly: MomentProblem<Vector> = { moments: meanVariance.moments };
      expect(errorCode(() => gmm.estimate(numericOnly, SERIES, [0, 1], { jacobian: analyticJacobian() }))).toBe(
        EconometricsErrorCode.INVALID_ARGUMENT
      );
    });

    it('should reject a non-positive tolerance', () => {
      expect(errorCode(() => gmm.estimate(meanVariance, SERIES, [0, 1], { tolerance: 0 }))).toBe(
        EconometricsErrorCode.INVALID_ARGUMENT
      );
    });
  });
});

describe('Jacobian strategies', () => {
  it('should agree between analytic and finite differences', () => {
    const check = checkJacobian(meanVariance, [2, 1], SERIES);

    expectMatrixClose(check.analytic, [[-1, 0], [-2, -1]], 12);
    expect(check.maxAbsDifference).toBeLessThan(1e-6);
  });

  it('should differentiate the column means numerically', () => {
    const D = finiteDifferenceJacobian({ step: 1e-5 }).compute(commonMean, [1], PAIRS);
    expectMatrixClose(D, [[-1], [-1]], 8);
  });

  it('should reject a non-positive step', () => {
    expect(errorCode(() => finiteDifferenceJacobian({ step: 0 }))).toBe(EconometricsErrorCode.INVALID_ARGUMENT);
  });
});
