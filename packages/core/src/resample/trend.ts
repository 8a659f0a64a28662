import { ValidationError } from '@gridtrend/utils';
import type { AnnualSeries, TrendLine } from '../types/grid.js';

/**
 * Ordinary least squares line through (year, meanValue)
 */
export function fitLinearTrend(series: AnnualSeries): TrendLine {
  const n = series.year.length;
  if (n < 2 || series.meanValue.length !== n) {
    throw new ValidationError('A trend needs at least two years with one value each', {
      years: n,
      values: series.meanValue.length,
    });
  }

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += series.year[i];
    sumY += series.meanValue[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = series.year[i] - meanX;
    sxx += dx * dx;
    sxy += dx * (series.meanValue[i] - meanY);
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  return Object.freeze({
    slope,
    intercept,
    fitted: Object.freeze(series.year.map((y) => intercept + slope * y)),
  });
}
