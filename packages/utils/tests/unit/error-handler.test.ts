import { describe, it, expect, vi, beforeEach } from 'vitest';
import { handleError } from '../../src/error-handler.js';
import { AppError, ValidationError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';

// Mock logger
vi.mock('../../src/logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('error-handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('handleError', () => {
    it('logs operational errors as warnings with their context', () => {
      const error = new ValidationError('Bad bound', { bound: 'latMin' });
      const result = handleError(error, { command: 'grid series' });

      expect(result).toEqual({ handled: true, message: 'Bad bound', code: 'VALIDATION_ERROR' });
      expect(logger.warn).toHaveBeenCalledWith(
        'Operational error occurred',
        expect.objectContaining({
          bound: 'latMin',
          command: 'grid series',
          error: {
            name: 'ValidationError',
            message: 'Bad bound',
            code: 'VALIDATION_ERROR',
          },
        })
      );
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('logs non-operational app errors as errors', () => {
      const error = new AppError('Invariant broken', 'INTERNAL', { stage: 'average' }, false);
      const result = handleError(error);

      expect(result).toEqual({ handled: true, message: 'Invariant broken', code: 'INTERNAL' });
      expect(logger.error).toHaveBeenCalledWith('Application error occurred', error, { stage: 'average' });
    });

    it('wraps non-Error values', () => {
      const result = handleError('plain failure', { source: 'hist.nc' });

      expect(result).toEqual({ handled: true, message: 'plain failure' });
      expect(logger.error).toHaveBeenCalledWith('Unknown error occurred', expect.any(Error), { source: 'hist.nc' });
    });
  });
});
