import { expect } from '@jest/globals';
import { createLogger } from '@panelmetrics/utils';
import { EconometricsError, EconometricsErrorCode, Matrix2D } from '../types';

export const testLogger = createLogger('econometrics-test', 'error');

// y = [1, 3, 2, 5] on an intercept and x = 0..3; OLS gives [1.1, 1.1].
export const Y_SIMPLE = [1, 3, 2, 5];
export const X_SIMPLE: Matrix2D = [[1, 0], [1, 1], [1, 2], [1, 3]];

/** Code of the EconometricsError thrown by fn, undefined if nothing is thrown. */
export function errorCode(fn: () => unknown): EconometricsErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof EconometricsError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

export function expectMatrixClose(actual: Matrix2D, expected: Matrix2D, digits: number = 8): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((row, i) => {
    expect(actual[i].length).toBe(row.length);
    row.forEach((value, j) => expect(actual[i][j]).toBeCloseTo(value, digits));
  });
}

export function expectVectorClose(actual: number[], expected: number[], digits: number = 8): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits));
}
