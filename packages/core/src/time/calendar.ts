/**
 * Time axis normalization
 * =======================
 * Turns raw model time offsets into calendar dates under an explicit
 * calendar policy.
 *
 * The calendar is always supplied by the caller. Using the wrong one does
 * not fail; it silently shifts every date after the first Feb 29 (or, for
 * 360-day runs, after the first 31st), so callers must know which calendar
 * their model ran with.
 */

import { DateTime } from 'luxon';
import { ValidationError } from '@gridtrend/utils';
import type { CalendarDate, CalendarName, CalendarTimeAxis, TimeUnit } from '../types/grid.js';

const SECONDS_PER_UNIT: Record<TimeUnit, number> = {
  day: 86_400,
  hour: 3_600,
};

const SECONDS_PER_DAY = 86_400;

const NO_LEAP_MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// Days before the first of each month in a 365-day year
const NO_LEAP_DAYS_BEFORE_MONTH = NO_LEAP_MONTH_LENGTHS.reduce<number[]>(
  (acc, _length, i) => [...acc, i === 0 ? 0 : acc[i - 1] + NO_LEAP_MONTH_LENGTHS[i - 1]],
  []
);

/**
 * Map a CF `calendar` attribute onto a calendar policy, or `undefined` when
 * the name is not one this package implements.
 */
export function resolveCalendarName(attribute: string | undefined): CalendarName | undefined {
  switch (attribute?.trim().toLowerCase()) {
    case 'standard':
    case 'gregorian':
    case 'proleptic_gregorian':
      return 'standard';
    case 'noleap':
    case 'no_leap':
    case '365_day':
      return 'noLeap';
    case '360_day':
      return 'day360';
    default:
      return undefined;
  }
}

function splitSeconds(absoluteSeconds: number): { days: number; secondOfDay: number } {
  const days = Math.floor(absoluteSeconds / SECONDS_PER_DAY);
  return { days, secondOfDay: absoluteSeconds - days * SECONDS_PER_DAY };
}

function withTimeOfDay(year: number, month: number, day: number, secondOfDay: number): CalendarDate {
  const hour = Math.floor(secondOfDay / 3600);
  const minute = Math.floor((secondOfDay % 3600) / 60);
  const second = secondOfDay % 60;
  return { year, month, day, hour, minute, second };
}

interface FixedCalendar {
  /** Day number of a date counted from year 0, day 1 */
  toDayNumber(year: number, month: number, day: number): number;
  fromDayNumber(dayNumber: number): { year: number; month: number; day: number };
  isValid(year: number, month: number, day: number): boolean;
}

const noLeapCalendar: FixedCalendar = {
  toDayNumber: (year, month, day) => year * 365 + NO_LEAP_DAYS_BEFORE_MONTH[month - 1] + day - 1,
  fromDayNumber: (dayNumber) => {
    const year = Math.floor(dayNumber / 365);
    const dayOfYear = dayNumber - year * 365;
    let month = 12;
    while (NO_LEAP_DAYS_BEFORE_MONTH[month - 1] > dayOfYear) {
      month--;
    }
    return { year, month, day: dayOfYear - NO_LEAP_DAYS_BEFORE_MONTH[month - 1] + 1 };
  },
  isValid: (_year, month, day) => month >= 1 && month <= 12 && day >= 1 && day <= NO_LEAP_MONTH_LENGTHS[month - 1],
};

const day360Calendar: FixedCalendar = {
  toDayNumber: (year, month, day) => year * 360 + (month - 1) * 30 + day - 1,
  fromDayNumber: (dayNumber) => {
    const year = Math.floor(dayNumber / 360);
    const dayOfYear = dayNumber - year * 360;
    return { year, month: Math.floor(dayOfYear / 30) + 1, day: (dayOfYear % 30) + 1 };
  },
  isValid: (_year, month, day) => month >= 1 && month <= 12 && day >= 1 && day <= 30,
};

const FIXED_CALENDARS: Record<Exclude<CalendarName, 'standard'>, FixedCalendar> = {
  noLeap: noLeapCalendar,
  day360: day360Calendar,
};

function assertAxisInput(rawTimeValues: ArrayLike<number>): void {
  for (let i = 0; i < rawTimeValues.length; i++) {
    const value = rawTimeValues[i];
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Time value at index ${i} is not finite`, { index: i, value });
    }
    if (i > 0 && value < rawTimeValues[i - 1]) {
      throw new ValidationError(`Time values decrease at index ${i}`, {
        index: i,
        previous: rawTimeValues[i - 1],
        value,
      });
    }
  }
}

function standardDates(
  rawTimeValues: ArrayLike<number>,
  originYear: number,
  originMonth: number,
  originDay: number,
  unit: TimeUnit
): CalendarDate[] {
  const origin = DateTime.fromObject(
    { year: originYear, month: originMonth, day: originDay },
    { zone: 'utc' }
  );
  if (!origin.isValid) {
    throw new ValidationError(
      `Origin ${originYear}-${originMonth}-${originDay} is not a date in the standard calendar`,
      { originYear, originMonth, originDay, reason: origin.invalidReason }
    );
  }

  const dates: CalendarDate[] = [];
  for (let i = 0; i < rawTimeValues.length; i++) {
    const seconds = Math.round(rawTimeValues[i] * SECONDS_PER_UNIT[unit]);
    const shifted = origin.plus({ seconds });
    dates.push({
      year: shifted.year,
      month: shifted.month,
      day: shifted.day,
      hour: shifted.hour,
      minute: shifted.minute,
      second: shifted.second,
    });
  }
  return dates;
}

function fixedDates(
  calendar: FixedCalendar,
  name: CalendarName,
  rawTimeValues: ArrayLike<number>,
  originYear: number,
  originMonth: number,
  originDay: number,
  unit: TimeUnit
): CalendarDate[] {
  if (!calendar.isValid(originYear, originMonth, originDay)) {
    throw new ValidationError(
      `Origin ${originYear}-${originMonth}-${originDay} is not a date in the ${name} calendar`,
      { originYear, originMonth, originDay, calendar: name }
    );
  }

  const originSeconds = calendar.toDayNumber(originYear, originMonth, originDay) * SECONDS_PER_DAY;
  const dates: CalendarDate[] = [];
  for (let i = 0; i < rawTimeValues.length; i++) {
    const absolute = originSeconds + Math.round(rawTimeValues[i] * SECONDS_PER_UNIT[unit]);
    const { days, secondOfDay } = splitSeconds(absolute);
    const { year, month, day } = calendar.fromDayNumber(days);
    dates.push(withTimeOfDay(year, month, day, secondOfDay));
  }
  return dates;
}

/**
 * Convert raw offsets from an origin date into calendar dates.
 *
 * Offsets are resolved to whole seconds. Raw values must be finite and
 * non-decreasing; the returned axis has one date per raw value.
 */
export function toCalendarDates(
  rawTimeValues: ArrayLike<number>,
  originYear: number,
  originMonth: number,
  originDay: number,
  unit: TimeUnit,
  calendar: CalendarName
): CalendarTimeAxis {
  assertAxisInput(rawTimeValues);

  const dates =
    calendar === 'standard'
      ? standardDates(rawTimeValues, originYear, originMonth, originDay, unit)
      : fixedDates(FIXED_CALENDARS[calendar], calendar, rawTimeValues, originYear, originMonth, originDay, unit);

  return Object.freeze({ calendar, dates: Object.freeze(dates) });
}

function pad(value: number, width: number): string {
  const sign = value < 0 ? '-' : '';
  return sign + String(Math.abs(value)).padStart(width, '0');
}

/**
 * `YYYY-MM-DD`, or `YYYY-MM-DDTHH:mm:ss` when the date has a time part
 */
export function formatCalendarDate(date: CalendarDate): string {
  const day = `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
  if (date.hour === 0 && date.minute === 0 && date.second === 0) {
    return day;
  }
  return `${day}T${pad(date.hour, 2)}:${pad(date.minute, 2)}:${pad(date.second, 2)}`;
}

/**
 * Negative, zero or positive as `a` is before, equal to or after `b`
 */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return (
    a.year - b.year ||
    a.month - b.month ||
    a.day - b.day ||
    a.hour - b.hour ||
    a.minute - b.minute ||
    a.second - b.second
  );
}
