import { describe, it, expect } from 'vitest';
import { TimeUnitsParseError } from '@gridtrend/utils';
import { parseTimeUnits } from '../../src/index.js';

describe('parseTimeUnits', () => {
  it('parses days since an origin with a time of day', () => {
    expect(parseTimeUnits('days since 1920-01-01 00:00:00')).toEqual({
      unit: 'day',
      originYear: 1920,
      originMonth: 1,
      originDay: 1,
    });
  });

  it('parses hours and unpadded dates', () => {
    expect(parseTimeUnits('hours since 1850-1-1')).toEqual({
      unit: 'hour',
      originYear: 1850,
      originMonth: 1,
      originDay: 1,
    });
  });

  it('ignores case and an ISO time suffix on the date', () => {
    expect(parseTimeUnits('  Days SINCE 2006-06-15T12:00:00  ')).toEqual({
      unit: 'day',
      originYear: 2006,
      originMonth: 6,
      originDay: 15,
    });
  });

  it('rejects units other than days and hours', () => {
    expect(() => parseTimeUnits('seconds since 2000-01-01')).toThrow(/unsupported unit 'seconds'/);
  });

  it('rejects a missing since keyword', () => {
    expect(() => parseTimeUnits('days after 2000-01-01')).toThrow(TimeUnitsParseError);
  });

  it('rejects too few tokens', () => {
    expect(() => parseTimeUnits('days since')).toThrow(TimeUnitsParseError);
    expect(() => parseTimeUnits('')).toThrow(TimeUnitsParseError);
  });

  it('rejects dates that are not YYYY-MM-DD', () => {
    expect(() => parseTimeUnits('days since 2000/01/01')).toThrow(/is not YYYY-MM-DD/);
    expect(() => parseTimeUnits('days since 2000-01')).toThrow(TimeUnitsParseError);
  });

  it('rejects an out-of-range month or day', () => {
    expect(() => parseTimeUnits('days since 2000-13-01')).toThrow(/month 13 out of range/);
    expect(() => parseTimeUnits('days since 2000-01-32')).toThrow(/day 32 out of range/);
  });

  it('keeps the offending text on the error', () => {
    try {
      parseTimeUnits('months since 2000-01-01');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TimeUnitsParseError);
      if (error instanceof TimeUnitsParseError) {
        expect(error.units).toBe('months since 2000-01-01');
        expect(error.code).toBe('TIME_UNITS_PARSE_ERROR');
      }
    }
  });
});
