/**
 * Unit tests for CLI Error Handler
 */

import { describe, it, expect, vi } from 'vitest';
import { EmptyRegionError, handleError as logAndClassify } from '@gridtrend/utils';
import { formatError, handleError } from '../../src/core/error-handler.js';

vi.mock('@gridtrend/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@gridtrend/utils')>();
  return { ...actual, handleError: vi.fn(() => ({ handled: true, message: '' })) };
});

describe('formatError', () => {
  it('returns the message of an error on one line', () => {
    expect(formatError(new Error('first\nsecond'))).toBe('first; second');
  });

  it('passes strings through', () => {
    expect(formatError('plain failure')).toBe('plain failure');
  });

  it('falls back for anything else', () => {
    expect(formatError(42)).toBe('An unexpected error occurred');
  });
});

describe('handleError', () => {
  it('logs the error with its context and returns the display message', () => {
    const error = new EmptyRegionError('Region selects no cells in a.nc (0 lon x 2 lat)');

    expect(handleError(error, { command: 'series' })).toBe('Region selects no cells in a.nc (0 lon x 2 lat)');
    expect(logAndClassify).toHaveBeenCalledWith(error, { command: 'series' });
  });
});
