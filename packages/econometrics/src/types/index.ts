// Econometrics Types
// Result records, option bags and error types shared by every estimator

// Core array types
// Matrices are row-major: vector[t] / matrix[t][j] for observation t.
export type Vector = number[];
export type Matrix2D = number[][];

/** Panel regressor array, indexed x[t][j][i] (period, regressor, unit). */
export type PanelArray = number[][][];

/** Validity mask for panels, mask[t][i] is true when the observation is usable. */
export type ValidityMask = boolean[][];

/**
 * Bandwidth for the Newey-West kernel. `'auto'` selects
 * floor(4 * (T/100)^(2/9)) from the number of observations.
 */
export type Bandwidth = number | 'auto';

export type CovarianceType = 'iid' | 'white' | 'newey-west';

export interface CovarianceOptions {
  robust?: boolean;
  bandwidth?: Bandwidth;
}

// Kernel
export interface KernelResult {
  /** q x q long-run covariance of sqrt(T) * mean(g). */
  covariance: Matrix2D;
  /** Lag count actually used, after clamping to T - 1. */
  bandwidth: number;
  requestedBandwidth: number;
  clamped: boolean;
}

// OLS
export interface OLSOptions extends CovarianceOptions {
  /**
   * Solve with the Moore-Penrose pseudo-inverse when X is rank-deficient
   * instead of failing.
   */
  allowRankDeficient?: boolean;
}

export interface OLSResult {
  coefficients: Vector;
  /** k x k */
  covariance: Matrix2D;
  standardErrors: Vector;
  tStatistics: Vector;
  residuals: Vector;
  fitted: Vector;
  rSquared: number;
  /** Population residual variance. */
  sigma2: number;
  nobs: number;
  covarianceType: CovarianceType;
  /** Effective bandwidth, 0 for iid. */
  bandwidth: number;
  rankDeficient: boolean;
}

// SURE
export interface SUREResult {
  /** k x n, column i holds equation i. */
  coefficients: Matrix2D;
  /** Stacked equation-major: theta[i * k + j]. */
  theta: Vector;
  /** nk x nk, same ordering as theta. */
  covariance: Matrix2D;
  standardErrors: Vector;
  /** T x n */
  residuals: Matrix2D;
  /** T x n */
  fitted: Matrix2D;
  rSquared: Vector;
  /** n x n population covariance of the residuals. */
  residualCovariance: Matrix2D;
  nobs: number;
  equations: number;
  covarianceType: CovarianceType;
  bandwidth: number;
}

// 2SLS
export interface FirstStageResult {
  /** L x k */
  coefficients: Matrix2D;
  /** T x k projection of X on Z. */
  fitted: Matrix2D;
  /** Per regressor column, NaN for a constant column. */
  rSquared: Vector;
  /** One L x L covariance per regressor column. */
  covariances: Matrix2D[];
  /** L x k */
  standardErrors: Matrix2D;
}

export interface IVResult {
  coefficients: Vector;
  covariance: Matrix2D;
  standardErrors: Vector;
  tStatistics: Vector;
  /** y - X theta, computed from the original regressors. */
  residuals: Vector;
  fitted: Vector;
  rSquared: number;
  firstStage: FirstStageResult;
  nobs: number;
  instruments: number;
  covarianceType: CovarianceType;
  bandwidth: number;
}

// GMM
export interface MomentProblem<TData> {
  /** T x q matrix of moment contributions at theta. */
  moments(theta: Vector, data: TData): Matrix2D;
  /** q x k derivative of the column means of the moments. */
  jacobian?(theta: Vector, data: TData): Matrix2D;
}

export interface JacobianStrategy {
  readonly name: 'analytic' | 'finite-difference';
  compute<TData>(problem: MomentProblem<TData>, theta: Vector, data: TData): Matrix2D;
}

export interface SolverOptions {
  tolerance?: number;
  maxIterations?: number;
}

export type WeightingScheme =
  | { type: 'fixed'; matrix: Matrix2D }
  | { type: 'iterated'; initial?: Matrix2D };

export interface GMMOptions extends SolverOptions {
  jacobian?: JacobianStrategy;
  bandwidth?: Bandwidth;
  /** Ignored when the model is exactly identified. Defaults to iterated. */
  weighting?: WeightingScheme;
}

export interface Convergence {
  converged: boolean;
  iterations: number;
  message?: string;
}

export interface GMMResult {
  coefficients: Vector;
  /** k x k */
  covariance: Matrix2D;
  standardErrors: Vector;
  /** Column means of the moments at the estimate. */
  momentMeans: Vector;
  /** q x k */
  jacobian: Matrix2D;
  /** q x q long-run moment covariance at the estimate. */
  momentCovariance: Matrix2D;
  /** q x q weighting matrix used for the final step, identity when exactly identified. */
  weightingMatrix: Matrix2D;
  /** Hansen J statistic, present for over-identified optimal-weight fits. */
  jStatistic?: number;
  degreesOfFreedom: number;
  loss: number;
  nobs: number;
  identification: 'exact' | 'over' | 'combination';
  convergence: Convergence;
  bandwidth: number;
}

// Panel
export type DemeanMode = 'individual' | 'time' | 'both';

export interface NeutralizedPanel {
  y: Matrix2D;
  x: PanelArray;
  mask: ValidityMask;
}

export interface DemeanResult {
  y: Matrix2D;
  x: PanelArray;
  iterations: number;
  converged: boolean;
}

export interface PanelOptions {
  mask?: ValidityMask;
  /** One integer cluster id per unit. */
  clusters?: number[];
  bandwidth?: Bandwidth;
}

export interface PanelCovariances {
  traditional: Matrix2D;
  white: Matrix2D;
  /** Present only when cluster ids were supplied. */
  clustered?: Matrix2D;
  driscollKraay: Matrix2D;
}

export interface PanelResult {
  coefficients: Vector;
  covariances: PanelCovariances;
  /** T x N, zero for invalid cells. */
  residuals: Matrix2D;
  /** T x N, zero for invalid cells. */
  fitted: Matrix2D;
  rSquared: number;
  /** Valid observations per period (Nb). */
  observationsPerPeriod: Vector;
  nobs: number;
  periods: number;
  units: number;
  clusterCount?: number;
  bandwidth: number;
}

// Inference
export interface WaldResult {
  statistic: number;
  degreesOfFreedom: number;
  /** R theta - r */
  discrepancy: Vector;
}

// Error types
export enum EconometricsErrorCode {
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  RANK_DEFICIENT = 'RANK_DEFICIENT',
  INSUFFICIENT_RANK = 'INSUFFICIENT_RANK',
  SINGULAR_MATRIX = 'SINGULAR_MATRIX',
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

export class EconometricsError extends Error {
  constructor(
    public code: EconometricsErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EconometricsError';
  }
}

export const RANK_DEFICIENT_MESSAGE = 'design matrix is rank-deficient';
export const INSUFFICIENT_RANK_MESSAGE = 'instrument matrix insufficient rank';
export const INSUFFICIENT_BANDWIDTH_DATA_MESSAGE = 'insufficient observations for requested bandwidth';
export const NON_CONVERGENCE_MESSAGE = 'GMM iteration failed to converge within max iterations';
