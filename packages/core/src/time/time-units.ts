import { TimeUnitsParseError } from '@gridtrend/utils';
import type { ParsedTimeUnits, TimeUnit } from '../types/grid.js';

const UNIT_TOKENS: Record<string, TimeUnit> = {
  day: 'day',
  days: 'day',
  hour: 'hour',
  hours: 'hour',
};

const EXPECTED_FORM = 'expected "<unit> since <YYYY>-<MM>-<DD>"';

/**
 * Parse a CF-style time encoding such as `days since 1920-01-01 00:00:00`.
 *
 * Only the unit and the origin date are read; a time-of-day token or a
 * `T...` suffix on the date is ignored, so the origin is always midnight.
 */
export function parseTimeUnits(units: string): ParsedTimeUnits {
  const tokens = units.trim().split(/\s+/);
  if (tokens.length < 3) {
    throw new TimeUnitsParseError(units, EXPECTED_FORM);
  }

  const [unitToken, sinceToken, dateToken] = tokens;

  const unit = UNIT_TOKENS[unitToken.toLowerCase()];
  if (!unit) {
    throw new TimeUnitsParseError(units, `unsupported unit '${unitToken}' (use day or hour)`);
  }

  if (sinceToken.toLowerCase() !== 'since') {
    throw new TimeUnitsParseError(units, EXPECTED_FORM);
  }

  const parts = dateToken.split('T')[0].split('-');
  if (parts.length !== 3 || parts.some((part) => !/^\d+$/.test(part))) {
    throw new TimeUnitsParseError(units, `origin date '${dateToken}' is not YYYY-MM-DD`);
  }

  const [originYear, originMonth, originDay] = parts.map((part) => Number.parseInt(part, 10));

  if (originMonth < 1 || originMonth > 12) {
    throw new TimeUnitsParseError(units, `month ${originMonth} out of range`);
  }
  if (originDay < 1 || originDay > 31) {
    throw new TimeUnitsParseError(units, `day ${originDay} out of range`);
  }

  return { unit, originYear, originMonth, originDay };
}
