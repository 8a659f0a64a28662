/**
 * Regional Series Workflow
 *
 * Area-mean time series, annual means and linear trend for one file.
 * Follows workflow contract: validates spec, uses WorkflowContext, returns JSON-serializable results.
 */

import { z } from 'zod';
import { formatCalendarDate, type CalendarName, type LongitudeConvention, type RegionSelection } from '@gridtrend/core';
import { BoundsSchema, CalendarSchema, CoordinateNamesSchema, parseSpec } from '../spec.js';
import type { WorkflowContext } from '../types.js';
import { analyzeRegion, type RegionAnalysis } from './analyzeRegion.js';

export const RegionalSeriesSpecSchema = z.object({
  path: z.string().min(1),
  variable: z.string().min(1),
  calendar: CalendarSchema,
  bounds: BoundsSchema,
  boundsConvention: z.enum(['0-360', '-180-180']).optional(),
  coordinates: CoordinateNamesSchema.optional(),
  label: z.string().min(1).optional(),
});

export type RegionalSeriesSpec = z.infer<typeof RegionalSeriesSpecSchema>;

export type TrendResult = {
  slope: number;
  intercept: number;
  fitted: number[];
};

export type RegionalSeriesResult = {
  label?: string;
  source: string;
  variable: string;
  units?: string;
  longName?: string;
  calendar: CalendarName;
  calendarAttribute?: string;
  timeUnits: string;
  longitudeConvention: LongitudeConvention;
  bounds: RegionSelection; // as applied to the dataset
  cells: { lon: number; lat: number };
  series: Array<{ date: string; value: number }>;
  annual: Array<{ year: number; mean: number }>;
  trend: TrendResult | null; // null for fewer than two years
  generatedAt: string; // ISO string
};

export function toRegionalSeriesResult(
  spec: RegionalSeriesSpec,
  analysis: RegionAnalysis,
  generatedAt: string
): RegionalSeriesResult {
  const { dataset, series, annual, trend } = analysis;
  return {
    label: spec.label,
    source: dataset.source,
    variable: dataset.variable,
    units: dataset.units,
    longName: dataset.longName,
    calendar: spec.calendar,
    calendarAttribute: dataset.calendarAttribute,
    timeUnits: dataset.timeUnits,
    longitudeConvention: analysis.convention,
    bounds: analysis.bounds,
    cells: { lon: analysis.selection.lonIndices.length, lat: analysis.selection.latIndices.length },
    series: series.dates.map((date, i) => ({ date: formatCalendarDate(date), value: series.values[i] })),
    annual: annual.year.map((year, i) => ({ year, mean: annual.meanValue[i] })),
    trend: trend ? { slope: trend.slope, intercept: trend.intercept, fitted: [...trend.fitted] } : null,
    generatedAt,
  };
}

/**
 * Extract the regional series of one variable
 */
export async function runRegionalSeries(
  spec: RegionalSeriesSpec,
  ctx: WorkflowContext
): Promise<RegionalSeriesResult> {
  const validated = parseSpec(RegionalSeriesSpecSchema, spec, 'regional series');
  const analysis = analyzeRegion(validated, ctx);
  return toRegionalSeriesResult(validated, analysis, ctx.clock.nowISO());
}
