/**
 * Property Tests for Time Axis Normalization
 * ==========================================
 *
 * Critical Invariants:
 * 1. A raw offset of 0 is the origin date in every calendar
 * 2. Non-decreasing offsets give non-decreasing dates
 * 3. The noLeap calendar never produces Feb 29
 * 4. The day360 calendar never produces a 31st
 * 5. standard and noLeap agree until the first Feb 29
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { CALENDAR_NAMES, compareCalendarDates, toCalendarDates } from '../../src/index.js';

const sortedOffsets = fc
  .array(fc.integer({ min: 0, max: 200_000 }), { minLength: 1, maxLength: 50 })
  .map((values) => [...values].sort((a, b) => a - b));

describe('toCalendarDates - Property Tests', () => {
  it('maps offset 0 to the origin in every calendar', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1000, max: 3000 }),
        fc.integer({ min: 1, max: 12 }),
        fc.integer({ min: 1, max: 28 }),
        fc.constantFrom(...CALENDAR_NAMES),
        (year, month, day, calendar) => {
          const [date] = toCalendarDates([0], year, month, day, 'day', calendar).dates;
          return (
            date.year === year &&
            date.month === month &&
            date.day === day &&
            date.hour === 0 &&
            date.minute === 0 &&
            date.second === 0
          );
        }
      ),
      { numRuns: 300 }
    );
  });

  it('keeps dates in order for sorted offsets', () => {
    fc.assert(
      fc.property(sortedOffsets, fc.constantFrom(...CALENDAR_NAMES), (offsets, calendar) => {
        const { dates } = toCalendarDates(offsets, 1950, 1, 1, 'day', calendar);
        return dates.every((date, i) => i === 0 || compareCalendarDates(dates[i - 1], date) <= 0);
      }),
      { numRuns: 200 }
    );
  });

  it('never produces Feb 29 in the noLeap calendar', () => {
    fc.assert(
      fc.property(sortedOffsets, (offsets) => {
        const { dates } = toCalendarDates(offsets, 1999, 12, 31, 'day', 'noLeap');
        return dates.every((date) => !(date.month === 2 && date.day === 29));
      }),
      { numRuns: 200 }
    );
  });

  it('never produces a 31st in the day360 calendar', () => {
    fc.assert(
      fc.property(sortedOffsets, (offsets) => {
        const { dates } = toCalendarDates(offsets, 1850, 1, 1, 'day', 'day360');
        return dates.every((date) => date.day >= 1 && date.day <= 30);
      }),
      { numRuns: 200 }
    );
  });

  it('agrees with the standard calendar before the first leap day', () => {
    // 2004-02-29 is 1154 days after 2001-01-01
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 1153 }), (offset) => {
        const [standard] = toCalendarDates([offset], 2001, 1, 1, 'day', 'standard').dates;
        const [noLeap] = toCalendarDates([offset], 2001, 1, 1, 'day', 'noLeap').dates;
        return compareCalendarDates(standard, noLeap) === 0;
      }),
      { numRuns: 300 }
    );
  });
});
