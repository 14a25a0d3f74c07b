import { describe, it, expect, beforeEach } from '@jest/globals';
import { PanelTransform, validatePanel } from '../panel/PanelTransform';
import { EconometricsErrorCode, Matrix2D, PanelArray } from '../types';
import { testLogger, errorCode, expectMatrixClose } from './helpers';

function smallPanel(): { y: Matrix2D; x: PanelArray } {
  return {
    y: [[1, 2], [3, 6]],
    x: [
      [[1, 1], [0, 4]],
      [[1, 1], [2, 8]]
    ]
  };
}

describe('PanelTransform', () => {
  let transform: PanelTransform;

  beforeEach(() => {
    transform = new PanelTransform(testLogger);
  });

  describe('neutralizeMissing', () => {
    it('should zero the whole row of a missing cell on copies', () => {
      const { y, x } = smallPanel();
      x[1][1][0] = Number.NaN;

      const result = transform.neutralizeMissing(y, x);

      expect(result.mask).toEqual([[true, true], [false, true]]);
      expect(result.y[1][0]).toBe(0);
      expect(result.x[1][0][0]).toBe(0);
      expect(result.x[1][1][0]).toBe(0);
      expect(result.y[1][1]).toBe(6);
      // Inputs untouched
      expect(y[1][0]).toBe(3);
      expect(Number.isNaN(x[1][1][0])).toBe(true);
    });

    it('should overwrite the inputs in the in-place variant', () => {
      const { y, x } = smallPanel();
      y[0][1] = Number.NaN;

      const mask = transform.neutralizeMissingInPlace(y, x);

      expect(mask).toEqual([[true, false], [true, true]]);
      expect(y[0][1]).toBe(0);
      expect(x[0][0][1]).toBe(0);
      expect(x[0][1][1]).toBe(0);
    });

    it('should leave a complete panel unchanged', () => {
      const { y, x } = smallPanel();
      const result = transform.neutralizeMissing(y, x);

      expect(result.y).toEqual(y);
      expect(result.x).toEqual(x);
      expect(result.mask).toEqual([[true, true], [true, true]]);
    });
  });

  describe('demean', () => {
    it('should subtract unit means', () => {
      const { y, x } = smallPanel();
      const result = transform.demean(y, x, 'individual');

      expectMatrixClose(result.y, [[-1, -2], [1, 2]], 12);
      expectMatrixClose(result.x[0], [[0, 0], [-1, -2]], 12);
      expect(result.iterations).toBe(1);
    });

    it('should subtract period means', () => {
      const { y, x } = smallPanel();
      const result = transform.demean(y, x, 'time');

      expectMatrixClose(result.y, [[-0.5, 0.5], [-1.5, 1.5]], 12);
      expectMatrixClose(result.x[1], [[0, 0], [-3, 3]], 12);
    });

    it('should remove both effects on a balanced panel', () => {
      const { y, x } = smallPanel();
      const result = transform.demean(y, x, 'both');

      expectMatrixClose(result.y, [[0.5, -0.5], [-0.5, 0.5]], 12);
      expect(result.converged).toBe(true);
      expect(result.iterations).toBe(2);
    });

    it('should report when two-way demeaning hits the iteration cap', () => {
      const capped = new PanelTransform(testLogger, { maxIterations: 1 });
      const { y, x } = smallPanel();
      const result = capped.demean(y, x, 'both');

      expect(result.converged).toBe(false);
      expect(result.iterations).toBe(1);
    });

    it('should use only valid cells and return zero elsewhere', () => {
      const { y, x } = smallPanel();
      y[1][1] = Number.NaN;
      const neutral = transform.neutralizeMissing(y, x);

      const result = transform.demean(neutral.y, neutral.x, 'individual', neutral.mask);

      expectMatrixClose(result.y, [[-1, 0], [1, 0]], 12);
    });

    it('should not modify its inputs', () => {
      const { y, x } = smallPanel();
      transform.demean(y, x, 'both');
      expect(y).toEqual(smallPanel().y);
      expect(x).toEqual(smallPanel().x);
    });
  });

  describe('setConstantColumn', () => {
    it('should restore an intercept removed by demeaning', () => {
      const { y, x } = smallPanel();
      const demeaned = transform.demean(y, x, 'individual');
      const restored = transform.setConstantColumn(demeaned.x, 0);

      expect(restored[0][0]).toEqual([1, 1]);
      expect(restored[1][0]).toEqual([1, 1]);
      expectMatrixClose([restored[1][1]], [[1, 2]], 12);
    });

    it('should zero invalid cells when given a mask', () => {
      const { x } = smallPanel();
      const restored = transform.setConstantColumn(x, 0, 2, [[true, false], [true, true]]);

      expect(restored[0][0]).toEqual([2, 0]);
      expect(restored[1][0]).toEqual([2, 2]);
    });

    it('should reject a column outside the regressor range', () => {
      expect(errorCode(() => transform.setConstantColumn(smallPanel().x, 2))).toBe(
        EconometricsErrorCode.DIMENSION_MISMATCH
      );
    });
  });

  describe('validatePanel', () => {
    it('should return the panel shape', () => {
      const { y, x } = smallPanel();
      expect(validatePanel(y, x)).toEqual({ periods: 2, regressors: 2, units: 2 });
    });

    it('should reject mismatched periods and units', () => {
      const { y, x } = smallPanel();
      expect(errorCode(() => validatePanel(y, x.slice(0, 1)))).toBe(EconometricsErrorCode.DIMENSION_MISMATCH);
      expect(errorCode(() => validatePanel([[1], [2]], x))).toBe(EconometricsErrorCode.DIMENSION_MISMATCH);
    });
  });
});
