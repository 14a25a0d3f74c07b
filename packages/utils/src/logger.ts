/**
 * Logger utilities shared by the panelmetrics packages
 */

import winston from 'winston';

function isSilent(): boolean {
  return process.env.LOG_SILENT === 'true';
}

/**
 * Winston logger tagged with the component name. Estimators and services take
 * the returned instance in their constructors.
 */
export function createLogger(name: string, level: string = process.env.LOG_LEVEL || 'info'): winston.Logger {
  return winston.createLogger({
    level,
    silent: isSilent(),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: { service: name },
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ]
  });
}
