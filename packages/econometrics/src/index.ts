/**
 * @panelmetrics/econometrics
 *
 * Least-squares, instrumental-variable, GMM and pooled panel estimators with
 * Newey-West, White, cluster and Driscoll-Kraay covariances.
 */

export * from './types';

// Core estimators
export { CovarianceKernel, automaticBandwidth } from './core/CovarianceKernel';
export { OLSEstimator } from './core/OLSEstimator';
export { SUREstimator } from './core/SUREstimator';
export { IVEstimator } from './core/IVEstimator';

// GMM
export {
  GMMEstimator,
  IterationState,
  DEFAULT_GMM_TOLERANCE,
  DEFAULT_GMM_MAX_ITERATIONS
} from './gmm/GMMEstimator';
export {
  analyticJacobian,
  finiteDifferenceJacobian,
  checkJacobian,
  meanMoments,
  JacobianCheck,
  DEFAULT_FINITE_DIFFERENCE_STEP
} from './gmm/jacobian';

// Panel
export {
  PanelTransform,
  PanelShape,
  DemeanSettings,
  DEFAULT_DEMEAN_SETTINGS,
  validatePanel,
  fullMask
} from './panel/PanelTransform';
export { PooledPanelEstimator } from './panel/PooledPanelEstimator';

// Inference
export { waldTest, standardErrorsOf, tStatistics } from './inference/WaldTest';

// Service
export { EconometricsService, EstimationEvent } from './services/EconometricsService';

import { EconometricsService } from './services/EconometricsService';
export default EconometricsService;
