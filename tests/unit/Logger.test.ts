// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';
import { noopLogger, noopStatus } from '../../src/observability/types';

describe('Logger', () => {
  it('should default to the info level', () => {
    expect(new Logger({ silent: true }).level).toBe('info');
  });

  it('should honour the configured level', () => {
    expect(new Logger({ level: 'debug', silent: true }).level).toBe('debug');
  });

  it('should accept metadata in either format', () => {
    for (const format of ['json', 'pretty'] as const) {
      const logger = new Logger({ format, silent: true });
      expect(() => {
        logger.debug('debug', { page: 1 });
        logger.info('info');
        logger.warn('warn', { url: '/x.json' });
        logger.error('error', { code: 'NETWORK_ERROR' });
      }).not.toThrow();
    }
  });

  it('should provide no-op defaults', () => {
    expect(noopLogger.info('ignored')).toBeUndefined();
    expect(noopStatus.update('ignored')).toBeUndefined();
  });
});
