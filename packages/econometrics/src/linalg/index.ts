/**
 * Dense linear-algebra helpers over ml-matrix.
 *
 * Public estimator signatures take plain number[][] so results can be handed to
 * any reporting layer; everything in between runs on `Matrix`. Every helper
 * returns a new matrix and leaves its arguments untouched.
 */

import {
  Matrix,
  QrDecomposition,
  LuDecomposition,
  CholeskyDecomposition,
  pseudoInverse
} from 'ml-matrix';
import {
  Vector,
  Matrix2D,
  EconometricsError,
  EconometricsErrorCode
} from '../types';

// Relative threshold on the diagonal of R (QR) or U (LU) below which a matrix is
// treated as rank-deficient. Applied after equilibration, so it measures
// conditioning and not the units of the columns. NaN never compares below it,
// so NaN inputs flow through to NaN outputs.
const RANK_TOLERANCE = 1e-10;

/**
 * Copy a rectangular row-major array into a Matrix.
 *
 * @throws {EconometricsError} DIMENSION_MISMATCH if the array is empty or ragged
 */
export function toMatrix(data: Matrix2D, name: string): Matrix {
  if (data.length === 0 || data[0].length === 0) {
    throw new EconometricsError(
      EconometricsErrorCode.DIMENSION_MISMATCH,
      `${name} must have at least one row and one column`
    );
  }
  const columns = data[0].length;
  data.forEach((row, t) => {
    if (row.length !== columns) {
      throw new EconometricsError(
        EconometricsErrorCode.DIMENSION_MISMATCH,
        `${name} row ${t} has ${row.length} columns, expected ${columns}`
      );
    }
  });
  return new Matrix(data);
}

/** Accepts a T-vector or a T x n array and returns a T x n Matrix. */
export function toResponse(y: Vector | Matrix2D, name: string): Matrix {
  if (isVector(y)) {
    if (y.length === 0) {
      throw new EconometricsError(
        EconometricsErrorCode.DIMENSION_MISMATCH,
        `${name} must have at least one observation`
      );
    }
    return Matrix.columnVector(y);
  }
  return toMatrix(y, name);
}

export function isVector(value: Vector | Matrix2D): value is Vector {
  return value.length === 0 || typeof value[0] === 'number';
}

export function assertRows(matrix: Matrix, rows: number, name: string): void {
  if (matrix.rows !== rows) {
    throw new EconometricsError(
      EconometricsErrorCode.DIMENSION_MISMATCH,
      `${name} has ${matrix.rows} rows, expected ${rows}`,
      { expected: rows, actual: matrix.rows }
    );
  }
}

export function assertSquare(matrix: Matrix, size: number, name: string): void {
  if (matrix.rows !== size || matrix.columns !== size) {
    throw new EconometricsError(
      EconometricsErrorCode.DIMENSION_MISMATCH,
      `${name} must be ${size} x ${size}, got ${matrix.rows} x ${matrix.columns}`
    );
  }
}

export interface LeastSquaresSolution {
  /** columns(A) x columns(B), null when A is rank-deficient and no fallback was requested. */
  solution: Matrix | null;
  rankDeficient: boolean;
}

/**
 * Least-squares solution of A * S = B through Householder QR.
 * When A is rank-deficient the solution is null unless `allowPseudoInverse`
 * is set, in which case the minimum-norm solution is returned.
 */
export function leastSquares(
  a: Matrix,
  b: Matrix,
  allowPseudoInverse: boolean = false
): LeastSquaresSolution {
  const columnScale = a.rows >= a.columns ? reciprocalNorms(a.transpose()) : null;
  if (columnScale !== null) {
    // Solve (A C) y = B with unit-norm columns, then S = C y.
    const qr = new QrDecomposition(scaleColumns(a, columnScale));
    if (!hasSmallPivot(qr.upperTriangularMatrix.diag())) {
      return { solution: scaleRows(columnScale, qr.solve(b)), rankDeficient: false };
    }
  }
  if (allowPseudoInverse) {
    return { solution: pseudoInverse(a).mmul(b), rankDeficient: true };
  }
  return { solution: null, rankDeficient: true };
}

/**
 * Inverse of a symmetric matrix. Cholesky when positive definite, LU otherwise.
 * Returns null when the matrix is singular.
 */
export function symmetricInverse(a: Matrix): Matrix | null {
  const sym = symmetrize(a);
  // isSymmetric is false when NaN is present; LU then carries the NaN through.
  if (sym.isSymmetric()) {
    const cholesky = new CholeskyDecomposition(sym);
    if (cholesky.isPositiveDefinite()) {
      return cholesky.solve(Matrix.eye(a.rows, a.rows));
    }
  }
  return generalInverse(sym);
}

/** LU inverse, null when singular. */
export function generalInverse(a: Matrix): Matrix | null {
  return solveSquare(a, Matrix.eye(a.rows, a.rows));
}

/**
 * Solves A * S = B for square A by LU, null when A is singular.
 * Rows and then columns are scaled to unit norm first: (R A C) y = R B, S = C y.
 */
export function solveSquare(a: Matrix, b: Matrix): Matrix | null {
  const rowScale = reciprocalNorms(a);
  if (rowScale === null) {
    return null;
  }
  const rowScaled = scaleRows(rowScale, a);
  const columnScale = reciprocalNorms(rowScaled.transpose());
  if (columnScale === null) {
    return null;
  }

  const lu = new LuDecomposition(scaleColumns(rowScaled, columnScale));
  if (lu.isSingular() || hasSmallPivot(lu.upperTriangularMatrix.diag())) {
    return null;
  }
  return scaleRows(columnScale, lu.solve(scaleRows(rowScale, b)));
}

/** Moore-Penrose pseudo-inverse. */
export function pinv(a: Matrix): Matrix {
  return pseudoInverse(a);
}

function hasSmallPivot(diagonal: number[]): boolean {
  const magnitudes = diagonal.map(Math.abs);
  const largest = Math.max(...magnitudes);
  if (largest === 0) {
    return true;
  }
  return magnitudes.some(m => m <= RANK_TOLERANCE * largest);
}

// 1 / ||row|| for each row of m, null when a row is all zero. Non-finite
// norms get a factor of 1 so NaN and Infinity reach the decomposition as is.
function reciprocalNorms(m: Matrix): Vector | null {
  const factors: Vector = [];
  for (let i = 0; i < m.rows; i++) {
    let squares = 0;
    for (let j = 0; j < m.columns; j++) {
      squares += m.get(i, j) * m.get(i, j);
    }
    const norm = Math.sqrt(squares);
    if (norm === 0) {
      return null;
    }
    factors.push(Number.isFinite(norm) ? 1 / norm : 1);
  }
  return factors;
}

// Column j of the result is u[j] * x[:, j].
function scaleColumns(x: Matrix, u: Vector): Matrix {
  const out = new Matrix(x.rows, x.columns);
  for (let t = 0; t < x.rows; t++) {
    for (let j = 0; j < x.columns; j++) {
      out.set(t, j, u[j] * x.get(t, j));
    }
  }
  return out;
}

/** Row t of the result is u[t] * x_t. */
export function scaleRows(u: Vector, x: Matrix): Matrix {
  const out = new Matrix(x.rows, x.columns);
  for (let t = 0; t < x.rows; t++) {
    for (let j = 0; j < x.columns; j++) {
      out.set(t, j, u[t] * x.get(t, j));
    }
  }
  return out;
}

/** Row t of the result is u_t (x) x_t, length n * k, ordered equation-major. */
export function kroneckerRows(u: Matrix, x: Matrix): Matrix {
  const n = u.columns;
  const k = x.columns;
  const out = new Matrix(x.rows, n * k);
  for (let t = 0; t < x.rows; t++) {
    for (let i = 0; i < n; i++) {
      const ui = u.get(t, i);
      for (let j = 0; j < k; j++) {
        out.set(t, i * k + j, ui * x.get(t, j));
      }
    }
  }
  return out;
}

/** bread * meat * bread' */
export function sandwich(bread: Matrix, meat: Matrix): Matrix {
  return symmetrize(bread.mmul(meat).mmul(bread.transpose()));
}

/** (M + M') / 2, removing rounding asymmetry from sandwich products. */
export function symmetrize(m: Matrix): Matrix {
  const out = new Matrix(m.rows, m.columns);
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.columns; j++) {
      out.set(i, j, (m.get(i, j) + m.get(j, i)) / 2);
    }
  }
  return out;
}

export function scale(m: Matrix, factor: number): Matrix {
  return m.clone().mul(factor);
}

export function subtract(a: Matrix, b: Matrix): Matrix {
  return a.clone().sub(b);
}

export function crossProduct(a: Matrix, b: Matrix = a): Matrix {
  return a.transpose().mmul(b);
}

export function columnMeans(m: Matrix): Vector {
  const means = new Array<number>(m.columns).fill(0);
  for (let t = 0; t < m.rows; t++) {
    for (let j = 0; j < m.columns; j++) {
      means[j] += m.get(t, j);
    }
  }
  return means.map(s => s / m.rows);
}

export function standardErrors(covariance: Matrix): Vector {
  return covariance.diag().map(v => Math.sqrt(v));
}

export function normInf(v: Vector): number {
  return v.reduce((max, x) => Math.max(max, Math.abs(x)), 0);
}

export function identity(size: number): Matrix {
  return Matrix.eye(size, size);
}

export { Matrix };
