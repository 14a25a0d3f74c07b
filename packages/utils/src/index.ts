/**
 * @panelmetrics/utils - Shared utilities for the panelmetrics packages
 */

export { createLogger } from './logger';
