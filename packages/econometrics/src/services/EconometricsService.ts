import { Logger } from 'winston';
import { EventEmitter } from 'events';
import { EstimationConfig, defaultEstimationConfig } from '@panelmetrics/config';
import {
  Vector,
  Matrix2D,
  PanelArray,
  ValidityMask,
  DemeanMode,
  CovarianceOptions,
  OLSOptions,
  OLSResult,
  SUREResult,
  IVResult,
  GMMOptions,
  GMMResult,
  MomentProblem,
  JacobianStrategy,
  PanelOptions,
  PanelResult,
  NeutralizedPanel,
  DemeanResult,
  KernelResult,
  Bandwidth,
  WaldResult
} from '../types';
import { toMatrix } from '../linalg';
import { CovarianceKernel } from '../core/CovarianceKernel';
import { OLSEstimator } from '../core/OLSEstimator';
import { SUREstimator } from '../core/SUREstimator';
import { IVEstimator } from '../core/IVEstimator';
import { GMMEstimator } from '../gmm/GMMEstimator';
import { analyticJacobian, finiteDifferenceJacobian } from '../gmm/jacobian';
import { PanelTransform } from '../panel/PanelTransform';
import { PooledPanelEstimator } from '../panel/PooledPanelEstimator';
import { waldTest } from '../inference/WaldTest';

export interface EstimationEvent {
  estimator: 'kernel' | 'ols' | 'sure' | 'iv' | 'gmm' | 'panel';
  durationMs: number;
  nobs: number;
}

/**
 * Entry point wiring configured defaults into the estimators.
 *
 * Holds no estimation state: every call is a function of its arguments and the
 * configuration captured at construction. Emits `estimation:completed` after
 * each successful call.
 */
export class EconometricsService extends EventEmitter {
  private logger: Logger;
  private config: EstimationConfig;
  private kernel: CovarianceKernel;
  private olsEstimator: OLSEstimator;
  private sureEstimator: SUREstimator;
  private ivEstimator: IVEstimator;
  private gmmEstimator: GMMEstimator;
  private panelEstimator: PooledPanelEstimator;
  private panelTransform: PanelTransform;

  constructor(logger: Logger, config: EstimationConfig = defaultEstimationConfig) {
    super();
    this.logger = logger;
    this.config = config;

    this.kernel = new CovarianceKernel(logger);
    this.olsEstimator = new OLSEstimator(logger, this.kernel);
    this.sureEstimator = new SUREstimator(logger, this.kernel);
    this.ivEstimator = new IVEstimator(logger, this.kernel);
    this.gmmEstimator = new GMMEstimator(logger, this.kernel);
    this.panelEstimator = new PooledPanelEstimator(logger, this.kernel);
    this.panelTransform = new PanelTransform(logger, {
      tolerance: config.panel.demeanTolerance,
      maxIterations: config.panel.demeanMaxIterations
    });
  }

  longRunCovariance(scores: Matrix2D, bandwidth?: Bandwidth): KernelResult {
    return this.timed('kernel', () => this.kernel.estimate(
      toMatrix(scores, 'scores'),
      bandwidth ?? this.config.covariance.bandwidth
    ), () => scores.length);
  }

  ols(y: Vector | Matrix2D, x: Matrix2D, options: OLSOptions = {}): OLSResult {
    return this.timed('ols', () => this.olsEstimator.estimate(y, x, this.covarianceDefaults(options)), r => r.nobs);
  }

  sure(y: Matrix2D, x: Matrix2D, options: CovarianceOptions = {}): SUREResult {
    return this.timed('sure', () => this.sureEstimator.estimate(y, x, this.covarianceDefaults(options)), r => r.nobs);
  }

  iv(y: Vector | Matrix2D, x: Matrix2D, z: Matrix2D, options: CovarianceOptions = {}): IVResult {
    return this.timed('iv', () => this.ivEstimator.estimate(y, x, z, this.covarianceDefaults(options)), r => r.nobs);
  }

  gmm<TData>(problem: MomentProblem<TData>, data: TData, theta0: Vector, options: GMMOptions = {}): GMMResult {
    return this.timed(
      'gmm',
      () => this.gmmEstimator.estimate(problem, data, theta0, this.gmmDefaults(options)),
      r => r.nobs
    );
  }

  gmmWithCombination<TData>(
    problem: MomentProblem<TData>,
    data: TData,
    theta0: Vector,
    combination: Matrix2D,
    options: Omit<GMMOptions, 'weighting'> = {}
  ): GMMResult {
    return this.timed(
      'gmm',
      () => this.gmmEstimator.estimateWithCombination(problem, data, theta0, combination, this.gmmDefaults(options)),
      r => r.nobs
    );
  }

  panel(y: Matrix2D, x: PanelArray, options: PanelOptions = {}): PanelResult {
    return this.timed(
      'panel',
      () => this.panelEstimator.estimate(y, x, {
        ...options,
        bandwidth: options.bandwidth ?? this.config.covariance.bandwidth
      }),
      r => r.nobs
    );
  }

  neutralizeMissing(y: Matrix2D, x: PanelArray): NeutralizedPanel {
    return this.panelTransform.neutralizeMissing(y, x);
  }

  neutralizeMissingInPlace(y: Matrix2D, x: PanelArray): ValidityMask {
    return this.panelTransform.neutralizeMissingInPlace(y, x);
  }

  demean(y: Matrix2D, x: PanelArray, mode: DemeanMode, mask?: ValidityMask): DemeanResult {
    return this.panelTransform.demean(y, x, mode, mask);
  }

  wald(theta: Vector, covariance: Matrix2D, restrictions: Matrix2D, r?: Vector): WaldResult {
    return waldTest(theta, covariance, restrictions, r);
  }

  private covarianceDefaults<T extends CovarianceOptions>(options: T): T {
    return {
      ...options,
      robust: options.robust ?? this.config.covariance.robust,
      bandwidth: options.bandwidth ?? this.config.covariance.bandwidth
    };
  }

  private gmmDefaults<T extends Omit<GMMOptions, 'weighting'>>(options: T): T {
    return {
      ...options,
      tolerance: options.tolerance ?? this.config.gmm.tolerance,
      maxIterations: options.maxIterations ?? this.config.gmm.maxIterations,
      bandwidth: options.bandwidth ?? this.config.covariance.bandwidth,
      jacobian: options.jacobian ?? this.configuredJacobian()
    };
  }

  private configuredJacobian(): JacobianStrategy {
    return this.config.gmm.jacobian === 'analytic'
      ? analyticJacobian()
      : finiteDifferenceJacobian({ step: this.config.gmm.finiteDifferenceStep });
  }

  private timed<T>(estimator: EstimationEvent['estimator'], run: () => T, nobs: (result: T) => number): T {
    const startTime = Date.now();
    const result = run();
    const event: EstimationEvent = {
      estimator,
      durationMs: Date.now() - startTime,
      nobs: nobs(result)
    };
    this.logger.debug('Estimation completed', { ...event });
    this.emit('estimation:completed', event);
    return result;
  }
}
