/**
 * PanelTransform - missing-value neutralization and fixed-effects demeaning
 *
 * Panels are y[t][i] (T x N) and x[t][j][i] (T x K x N). An unusable cell is
 * neutralized by zeroing its whole (y, x) row and flagging it in the validity
 * mask; it keeps its slot so T and N stay intact for period-level
 * aggregation. Without neutralization, NaN cells flow into every downstream
 * result as NaN.
 */

import { Logger } from 'winston';
import {
  Matrix2D,
  PanelArray,
  ValidityMask,
  DemeanMode,
  DemeanResult,
  NeutralizedPanel,
  EconometricsError,
  EconometricsErrorCode
} from '../types';

export interface PanelShape {
  periods: number;
  regressors: number;
  units: number;
}

export interface DemeanSettings {
  tolerance: number;
  maxIterations: number;
}

export const DEFAULT_DEMEAN_SETTINGS: DemeanSettings = {
  tolerance: 1e-10,
  maxIterations: 1000
};

function mismatch(message: string): EconometricsError {
  return new EconometricsError(EconometricsErrorCode.DIMENSION_MISMATCH, message);
}

/**
 * Check that y is T x N and x is T x K x N.
 *
 * @throws {EconometricsError} DIMENSION_MISMATCH
 */
export function validatePanel(y: Matrix2D, x: PanelArray): PanelShape {
  const periods = y.length;
  if (periods === 0 || y[0].length === 0) {
    throw mismatch('Panel response must have at least one period and one unit');
  }
  const units = y[0].length;
  if (x.length !== periods) {
    throw mismatch(`Panel regressors have ${x.length} periods, expected ${periods}`);
  }
  const regressors = x[0].length;
  if (regressors === 0) {
    throw mismatch('Panel regressors must have at least one column');
  }

  for (let t = 0; t < periods; t++) {
    if (y[t].length !== units) {
      throw mismatch(`Panel response period ${t} has ${y[t].length} units, expected ${units}`);
    }
    if (x[t].length !== regressors) {
      throw mismatch(`Panel regressors period ${t} has ${x[t].length} columns, expected ${regressors}`);
    }
    for (let j = 0; j < regressors; j++) {
      if (x[t][j].length !== units) {
        throw mismatch(`Panel regressor ${j} in period ${t} has ${x[t][j].length} units, expected ${units}`);
      }
    }
  }

  return { periods, regressors, units };
}

export function validateMask(mask: ValidityMask, shape: PanelShape): void {
  if (mask.length !== shape.periods || mask.some(row => row.length !== shape.units)) {
    throw mismatch(`Validity mask must be ${shape.periods} x ${shape.units}`);
  }
}

export function fullMask(shape: PanelShape): ValidityMask {
  return Array.from({ length: shape.periods }, () => new Array<boolean>(shape.units).fill(true));
}

export function copyPanel(y: Matrix2D, x: PanelArray): { y: Matrix2D; x: PanelArray } {
  return {
    y: y.map(row => row.slice()),
    x: x.map(period => period.map(row => row.slice()))
  };
}

export class PanelTransform {
  private logger: Logger;
  private settings: DemeanSettings;

  constructor(logger: Logger, settings: Partial<DemeanSettings> = {}) {
    this.logger = logger;
    this.settings = { ...DEFAULT_DEMEAN_SETTINGS, ...settings };
  }

  /**
   * Zero every (t, i) row with a NaN in y or any regressor, on copies.
   */
  neutralizeMissing(y: Matrix2D, x: PanelArray): NeutralizedPanel {
    const copy = copyPanel(y, x);
    const mask = this.neutralizeMissingInPlace(copy.y, copy.x);
    return { y: copy.y, x: copy.x, mask };
  }

  /**
   * Same as neutralizeMissing but overwrites the caller's arrays.
   * Only the returned mask is new.
   */
  neutralizeMissingInPlace(y: Matrix2D, x: PanelArray): ValidityMask {
    const shape = validatePanel(y, x);
    const mask = fullMask(shape);
    let neutralized = 0;

    for (let t = 0; t < shape.periods; t++) {
      for (let i = 0; i < shape.units; i++) {
        let missing = Number.isNaN(y[t][i]);
        for (let j = 0; j < shape.regressors && !missing; j++) {
          missing = Number.isNaN(x[t][j][i]);
        }
        if (missing) {
          mask[t][i] = false;
          y[t][i] = 0;
          for (let j = 0; j < shape.regressors; j++) {
            x[t][j][i] = 0;
          }
          neutralized++;
        }
      }
    }

    if (neutralized > 0) {
      this.logger.info('Neutralized missing panel observations', { neutralized, ...shape });
    }
    return mask;
  }

  /**
   * Subtract unit and/or period means, computed over valid cells only.
   * Invalid cells come back as zero. After demeaning, an intercept column is
   * identically zero; use setConstantColumn to restore it.
   */
  demean(y: Matrix2D, x: PanelArray, mode: DemeanMode, mask?: ValidityMask): DemeanResult {
    const shape = validatePanel(y, x);
    const valid = mask ?? fullMask(shape);
    validateMask(valid, shape);

    // Variable 0 is y, variable j + 1 is regressor j; each is a T x N slab.
    const slabs: Matrix2D[] = [
      y.map((row, t) => row.map((v, i) => (valid[t][i] ? v : 0))),
      ...Array.from({ length: shape.regressors }, (_, j) =>
        x.map((period, t) => period[j].map((v, i) => (valid[t][i] ? v : 0)))
      )
    ];

    let iterations = 0;
    let converged = true;

    if (mode === 'individual') {
      slabs.forEach(slab => this.sweepUnits(slab, valid));
      iterations = 1;
    } else if (mode === 'time') {
      slabs.forEach(slab => this.sweepPeriods(slab, valid));
      iterations = 1;
    } else {
      // Alternating projections; exact after one sweep on a balanced panel.
      converged = false;
      while (!converged && iterations < this.settings.maxIterations) {
        let change = 0;
        for (const slab of slabs) {
          change = Math.max(change, this.sweepUnits(slab, valid), this.sweepPeriods(slab, valid));
        }
        iterations++;
        converged = iterations > 1 && change < this.settings.tolerance;
      }
      if (!converged) {
        this.logger.warn('Two-way demeaning did not converge', { iterations });
      }
    }

    const [yOut, ...regressors] = slabs;
    const xOut: PanelArray = Array.from({ length: shape.periods }, (_, t) =>
      regressors.map(slab => slab[t].slice())
    );

    return { y: yOut, x: xOut, iterations, converged };
  }

  /**
   * Copy of x with regressor `column` set to `value` in every valid cell.
   */
  setConstantColumn(x: PanelArray, column: number, value: number = 1, mask?: ValidityMask): PanelArray {
    const out = x.map(period => period.map(row => row.slice()));
    if (out.length === 0 || column < 0 || column >= out[0].length) {
      throw mismatch(`Column ${column} is outside the regressor range`);
    }
    for (let t = 0; t < out.length; t++) {
      const row = out[t][column];
      for (let i = 0; i < row.length; i++) {
        row[i] = mask && !mask[t][i] ? 0 : value;
      }
    }
    return out;
  }

  // Subtract each unit's mean in place; returns the largest mean removed.
  private sweepUnits(slab: Matrix2D, valid: ValidityMask): number {
    const T = slab.length;
    const N = slab[0].length;
    let largest = 0;
    for (let i = 0; i < N; i++) {
      let sum = 0;
      let count = 0;
      for (let t = 0; t < T; t++) {
        if (valid[t][i]) {
          sum += slab[t][i];
          count++;
        }
      }
      if (count === 0) continue;
      const mean = sum / count;
      for (let t = 0; t < T; t++) {
        if (valid[t][i]) slab[t][i] -= mean;
      }
      largest = Math.max(largest, Math.abs(mean));
    }
    return largest;
  }

  // Subtract each period's mean in place; returns the largest mean removed.
  private sweepPeriods(slab: Matrix2D, valid: ValidityMask): number {
    let largest = 0;
    slab.forEach((row, t) => {
      let sum = 0;
      let count = 0;
      row.forEach((v, i) => {
        if (valid[t][i]) {
          sum += v;
          count++;
        }
      });
      if (count === 0) return;
      const mean = sum / count;
      row.forEach((_, i) => {
        if (valid[t][i]) row[i] -= mean;
      });
      largest = Math.max(largest, Math.abs(mean));
    });
    return largest;
  }
}
