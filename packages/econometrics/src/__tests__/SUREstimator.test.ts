import { describe, it, expect, beforeEach } from '@jest/globals';
import { SUREstimator } from '../core/SUREstimator';
import { OLSEstimator } from '../core/OLSEstimator';
import { EconometricsErrorCode } from '../types';
import {
  testLogger,
  errorCode,
  expectMatrixClose,
  expectVectorClose,
  Y_SIMPLE,
  X_SIMPLE
} from './helpers';

describe('SUREstimator', () => {
  let sure: SUREstimator;
  let ols: OLSEstimator;

  // Second equation [2, 1, 4, 3] fits 1.6 + 0.6 x
  const Y_SYSTEM = [[1, 2], [3, 1], [2, 4], [5, 3]];

  beforeEach(() => {
    sure = new SUREstimator(testLogger);
    ols = new OLSEstimator(testLogger);
  });

  describe('single equation', () => {
    it('should reproduce OLS with the iid covariance', () => {
      const system = sure.estimate(Y_SIMPLE.map(v => [v]), X_SIMPLE);
      const single = ols.estimate(Y_SIMPLE, X_SIMPLE);

      expectVectorClose(system.theta, single.coefficients, 12);
      expectMatrixClose(system.covariance, single.covariance, 12);
      expect(system.equations).toBe(1);
    });

    it('should reproduce OLS with the Newey-West covariance', () => {
      const system = sure.estimate(Y_SIMPLE.map(v => [v]), X_SIMPLE, { robust: true, bandwidth: 2 });
      const single = ols.estimate(Y_SIMPLE, X_SIMPLE, { robust: true, bandwidth: 2 });

      expectMatrixClose(system.covariance, single.covariance, 12);
      expect(system.covarianceType).toBe('newey-west');
    });
  });

  describe('several equations', () => {
    it('should stack coefficients equation-major', () => {
      const result = sure.estimate(Y_SYSTEM, X_SIMPLE);

      expectMatrixClose(result.coefficients, [[1.1, 1.6], [1.1, 0.6]]);
      expectVectorClose(result.theta, [1.1, 1.1, 1.6, 0.6]);
      expectVectorClose(result.rSquared, [1 - 0.675 / 2.1875, 0.36]);
    });

    it('should carry cross-equation covariance terms', () => {
      const result = sure.estimate(Y_SYSTEM, X_SIMPLE);

      expectMatrixClose(result.residualCovariance, [[0.675, -0.7], [-0.7, 0.8]]);
      // Sigma (x) (X'X)^-1 with (X'X)^-1 = [[0.7, -0.3], [-0.3, 0.2]]
      expect(result.covariance[0][2]).toBeCloseTo(-0.49, 10);
      expect(result.covariance[0][3]).toBeCloseTo(0.21, 10);
      expect(result.covariance[1][3]).toBeCloseTo(-0.14, 10);
      expect(result.covariance[2][2]).toBeCloseTo(0.56, 10);
      expect(result.covariance[3][3]).toBeCloseTo(0.16, 10);
      expect(result.standardErrors[2]).toBeCloseTo(Math.sqrt(0.56), 10);
    });

    it('should give each equation its own residuals', () => {
      const result = sure.estimate(Y_SYSTEM, X_SIMPLE);

      expectVectorClose(result.residuals.map(row => row[1]), [0.4, -1.2, 1.2, -0.4]);
      expect(result.nobs).toBe(4);
    });

    it('should match OLS robust covariance on each diagonal block', () => {
      const result = sure.estimate(Y_SYSTEM, X_SIMPLE, { robust: true });

      expect(result.covarianceType).toBe('white');
      expectMatrixClose(
        result.covariance.slice(0, 2).map(row => row.slice(0, 2)),
        [[0.1386, -0.0324], [-0.0324, 0.0566]]
      );
    });
  });

  it('should reject a rank-deficient design', () => {
    const collinear = [[1, 2], [2, 4], [3, 6], [4, 8]];
    expect(errorCode(() => sure.estimate(Y_SYSTEM, collinear))).toBe(EconometricsErrorCode.RANK_DEFICIENT);
  });

  it('should reject mismatched rows', () => {
    expect(errorCode(() => sure.estimate(Y_SYSTEM.slice(0, 3), X_SIMPLE))).toBe(
      EconometricsErrorCode.DIMENSION_MISMATCH
    );
  });
});
