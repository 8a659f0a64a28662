import { describe, it, expect } from 'vitest';
import {
  AllMissingError,
  AppError,
  ConfigurationError,
  DatasetOpenError,
  DimensionMismatchError,
  EmptyRegionError,
  isOperationalError,
  TimeUnitsParseError,
  ValidationError,
  VariableNotFoundError,
} from '../../src/errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('defaults to an operational APP_ERROR', () => {
      const error = new AppError('Something failed');
      expect(error.code).toBe('APP_ERROR');
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });

    it('serializes to JSON with its context', () => {
      const error = new AppError('Broken', 'BROKEN', { step: 'read' }, false);
      const json = error.toJSON();
      expect(json).toMatchObject({
        name: 'AppError',
        message: 'Broken',
        code: 'BROKEN',
        context: { step: 'read' },
        isOperational: false,
      });
      expect(typeof json.stack).toBe('string');
    });
  });

  it('ValidationError carries its code and context', () => {
    const error = new ValidationError('Bad bound', { bound: 'latMin' });
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.context).toEqual({ bound: 'latMin' });
    expect(error).toBeInstanceOf(AppError);
  });

  it('ConfigurationError records the config key', () => {
    const error = new ConfigurationError('Bad format', 'GRIDTREND_FORMAT');
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.context).toEqual({ configKey: 'GRIDTREND_FORMAT' });
  });

  it('DatasetOpenError keeps the path', () => {
    const error = new DatasetOpenError('Cannot open hist.nc', 'hist.nc', { errno: 'ENOENT' });
    expect(error.path).toBe('hist.nc');
    expect(error.code).toBe('DATASET_OPEN_ERROR');
    expect(error.context).toEqual({ path: 'hist.nc', errno: 'ENOENT' });
  });

  it('VariableNotFoundError names the variable and file', () => {
    expect(new VariableNotFoundError('TS', 'hist.nc').message).toBe("Variable 'TS' not found in hist.nc");
    expect(new VariableNotFoundError('TS').message).toBe("Variable 'TS' not found");
    expect(new VariableNotFoundError('TS').variable).toBe('TS');
  });

  it('TimeUnitsParseError quotes the units and the reason', () => {
    const error = new TimeUnitsParseError('fortnights since 2000-01-01', 'unsupported unit');
    expect(error.message).toBe("Cannot parse time units 'fortnights since 2000-01-01': unsupported unit");
    expect(error.units).toBe('fortnights since 2000-01-01');
  });

  it('AllMissingError reports the time index', () => {
    const error = new AllMissingError(4, { cells: 6 });
    expect(error.message).toBe('All selected cells are missing at time index 4');
    expect(error.timeIndex).toBe(4);
    expect(error.context).toEqual({ timeIndex: 4, cells: 6 });
  });

  it('region and dimension errors have their own codes', () => {
    expect(new EmptyRegionError('empty').code).toBe('EMPTY_REGION');
    expect(new DimensionMismatchError('mismatch').code).toBe('DIMENSION_MISMATCH');
  });

  describe('isOperationalError', () => {
    it('is true for operational app errors only', () => {
      expect(isOperationalError(new ValidationError('x'))).toBe(true);
      expect(isOperationalError(new AppError('x', 'X', undefined, false))).toBe(false);
      expect(isOperationalError(new Error('x'))).toBe(false);
    });
  });
});
