import { Logger } from 'winston';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import * as Joi from 'joi';
import _ from 'lodash';
import { EventEmitter } from 'events';

export interface EstimationConfig {
  environment: 'development' | 'test' | 'production';
  logLevel: 'error' | 'warn' | 'info' | 'debug';

  // Newey-West kernel defaults
  covariance: {
    bandwidth: number | 'auto';
    robust: boolean;
  };

  // GMM solver defaults
  gmm: {
    tolerance: number;
    maxIterations: number;
    jacobian: 'numeric' | 'analytic';
    finiteDifferenceStep: number;
  };

  // Two-way fixed-effects demeaning
  panel: {
    demeanTolerance: number;
    demeanMaxIterations: number;
  };
}

export const defaultEstimationConfig: EstimationConfig = {
  environment: 'development',
  logLevel: 'info',
  covariance: {
    bandwidth: 0,
    robust: false
  },
  gmm: {
    tolerance: 1e-8,
    maxIterations: 100,
    jacobian: 'numeric',
    finiteDifferenceStep: 1e-6
  },
  panel: {
    demeanTolerance: 1e-10,
    demeanMaxIterations: 1000
  }
};

const estimationConfigSchema = Joi.object<EstimationConfig>({
  environment: Joi.string().valid('development', 'test', 'production').required(),
  logLevel: Joi.string().valid('error', 'warn', 'info', 'debug').required(),

  covariance: Joi.object({
    bandwidth: Joi.alternatives().try(
      Joi.number().integer().min(0),
      Joi.string().valid('auto')
    ).required(),
    robust: Joi.boolean().required()
  }).required(),

  gmm: Joi.object({
    tolerance: Joi.number().positive().required(),
    maxIterations: Joi.number().integer().min(1).required(),
    jacobian: Joi.string().valid('numeric', 'analytic').required(),
    finiteDifferenceStep: Joi.number().positive().max(1).required()
  }).required(),

  panel: Joi.object({
    demeanTolerance: Joi.number().positive().required(),
    demeanMaxIterations: Joi.number().integer().min(1).required()
  }).required()
});

/**
 * Validate a configuration object built in code.
 *
 * @throws {Error} If the object does not match the schema
 */
export function validateEstimationConfig(config: unknown): EstimationConfig {
  const { error, value } = estimationConfigSchema.validate(config, { convert: true });
  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }
  return value;
}

// Environment variable -> configuration path
const ENV_MAPPINGS: Record<string, string> = {
  PANELMETRICS_LOG_LEVEL: 'logLevel',
  PANELMETRICS_BANDWIDTH: 'covariance.bandwidth',
  PANELMETRICS_ROBUST: 'covariance.robust',
  PANELMETRICS_TOLERANCE: 'gmm.tolerance',
  PANELMETRICS_MAX_ITERATIONS: 'gmm.maxIterations',
  PANELMETRICS_JACOBIAN: 'gmm.jacobian',
  PANELMETRICS_FD_STEP: 'gmm.finiteDifferenceStep'
};

export class EstimationConfigService extends EventEmitter {
  private config: EstimationConfig | null = null;
  private logger: Logger;
  private configPath: string;
  private environment: string;

  constructor(logger: Logger, configPath: string = './config') {
    super();
    this.logger = logger;
    this.configPath = configPath;
    this.environment = process.env.NODE_ENV || 'development';
  }

  /**
   * Load defaults, <environment>.json and environment overrides, in that order
   */
  async load(environment?: string): Promise<EstimationConfig> {
    if (environment) {
      this.environment = environment;
    }

    this.logger.info('Loading estimation configuration', { environment: this.environment });

    try {
      this.loadEnvironmentVariables();

      const baseConfig = await this.loadConfigFile('default.json');
      const envConfig = await this.loadConfigFile(`${this.environment}.json`);

      const merged: Record<string, unknown> = _.merge(
        {},
        defaultEstimationConfig,
        baseConfig,
        envConfig,
        { environment: this.environment }
      );
      this.applyEnvironmentOverrides(merged);

      this.config = validateEstimationConfig(merged);
      this.logger.info('Estimation configuration loaded', { config: this.config });
      this.emit('config:loaded', this.config);

      return _.cloneDeep(this.config);
    } catch (error) {
      this.logger.error('Failed to load estimation configuration', error);
      throw error;
    }
  }

  /**
   * Get configuration value by path
   */
  get<T>(configPath: string, defaultValue?: T): T {
    const config = this.requireConfig();
    const value: unknown = _.get(config, configPath, defaultValue);

    if (value === undefined) {
      throw new Error(`Configuration value not found: ${configPath}`);
    }

    return value as T;
  }

  /**
   * Set configuration value (runtime only, revalidated, not persisted)
   */
  set(configPath: string, value: unknown): void {
    const config = this.requireConfig();
    const oldValue: unknown = _.get(config, configPath);
    const next = _.cloneDeep(config);
    _.set(next, configPath, value);

    this.config = validateEstimationConfig(next);
    this.emit('config:changed', { path: configPath, oldValue, newValue: value });
    this.logger.debug('Configuration value updated', { path: configPath, value });
  }

  getAll(): EstimationConfig {
    return _.cloneDeep(this.requireConfig());
  }

  private requireConfig(): EstimationConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded');
    }
    return this.config;
  }

  private async loadConfigFile(filename: string): Promise<Record<string, unknown>> {
    const filePath = path.join(this.configPath, filename);

    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Configuration file not found: ${filename}`);
        return {};
      }
      throw error;
    }
  }

  private loadEnvironmentVariables(): void {
    dotenv.config({ path: `.env.${this.environment}` });
    dotenv.config();
  }

  private applyEnvironmentOverrides(config: Record<string, unknown>): void {
    for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
      const value = process.env[envVar];
      if (value !== undefined) {
        _.set(config, configPath, parseEnvValue(value));
        this.logger.debug(`Applied environment override: ${configPath}`);
      }
    }
  }
}

function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  const numeric = Number(value);
  return value.trim() !== '' && !Number.isNaN(numeric) ? numeric : value;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
