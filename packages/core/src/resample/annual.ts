import { ValidationError } from '@gridtrend/utils';
import type { AnnualSeries, TimeSeries } from '../types/grid.js';

/**
 * Group a series by calendar year and average each group.
 *
 * Years come back ascending. A year with a single sample yields that sample.
 */
export function toAnnualMeans(series: TimeSeries): AnnualSeries {
  if (series.dates.length !== series.values.length) {
    throw new ValidationError(
      `Series has ${series.dates.length} dates but ${series.values.length} values`,
      { dates: series.dates.length, values: series.values.length }
    );
  }

  const groups = new Map<number, { sum: number; count: number }>();
  series.dates.forEach((date, i) => {
    const group = groups.get(date.year) ?? { sum: 0, count: 0 };
    group.sum += series.values[i];
    group.count += 1;
    groups.set(date.year, group);
  });

  const year = [...groups.keys()].sort((a, b) => a - b);
  const meanValue = year.map((y) => {
    const group = groups.get(y);
    return group ? group.sum / group.count : Number.NaN;
  });

  return Object.freeze({ year: Object.freeze(year), meanValue: Object.freeze(meanValue) });
}

/**
 * Join annual series end to end, e.g. a historical run followed by a
 * scenario run. Years must be strictly ascending across the whole result.
 */
export function concatAnnualSeries(...series: AnnualSeries[]): AnnualSeries {
  const year: number[] = [];
  const meanValue: number[] = [];

  series.forEach((part, partIndex) => {
    if (part.year.length !== part.meanValue.length) {
      throw new ValidationError(`Annual series ${partIndex} has mismatched lengths`, {
        partIndex,
        years: part.year.length,
        values: part.meanValue.length,
      });
    }
    part.year.forEach((y, i) => {
      const previous = year[year.length - 1];
      if (previous !== undefined && y <= previous) {
        throw new ValidationError(`Year ${y} in series ${partIndex} does not follow ${previous}`, {
          partIndex,
          year: y,
          previous,
        });
      }
      year.push(y);
      meanValue.push(part.meanValue[i]);
    });
  });

  return Object.freeze({ year: Object.freeze(year), meanValue: Object.freeze(meanValue) });
}
