import { describe, it, expect } from '@jest/globals';
import { createLogger } from '../logger';

describe('createLogger', () => {
  it('should honour LOG_SILENT', () => {
    expect(createLogger('logger-test').silent).toBe(true);
  });

  it('should take the level from LOG_LEVEL by default', () => {
    expect(createLogger('logger-test').level).toBe('error');
  });

  it('should tag records with the service name', () => {
    const logger = createLogger('estimators', 'warn');
    expect(logger.defaultMeta).toEqual({ service: 'estimators' });
    expect(logger.level).toBe('warn');
  });

  it('should accept errors as metadata', () => {
    const logger = createLogger('logger-test');
    expect(() => logger.error('failed', new Error('boom'))).not.toThrow();
  });
});
