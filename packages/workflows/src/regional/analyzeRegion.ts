/**
 * Regional analysis pipeline
 *
 * read -> time axis -> region -> average -> annual means -> trend
 *
 * Shared by the single-run and scenario-comparison workflows. Every stage
 * is a pure function from @gridtrend/core; this module only sequences them,
 * adds file context to their errors and logs stage timings.
 */

import {
  averageOverRegion,
  detectLongitudeConvention,
  fitLinearTrend,
  parseTimeUnits,
  resolveCalendarName,
  selectRegion,
  toAnnualMeans,
  toCalendarDates,
  toLongitudeConvention,
  toTimeSeries,
  withGridFile,
  type AnnualSeries,
  type CalendarName,
  type CalendarTimeAxis,
  type GridDataset,
  type LongitudeConvention,
  type RegionIndices,
  type RegionSelection,
  type TimeSeries,
  type TrendLine,
} from '@gridtrend/core';
import { AllMissingError, EmptyRegionError, LogHelpers } from '@gridtrend/utils';
import type { WorkflowContext } from '../types.js';

export interface RegionAnalysisInput {
  path: string;
  variable: string;
  calendar: CalendarName;
  bounds: RegionSelection;
  /** Convention the bounds are written in; converted to the dataset's when they differ */
  boundsConvention?: Exclude<LongitudeConvention, 'ambiguous'>;
  coordinates?: { lon?: string; lat?: string; time?: string };
  label?: string;
}

export interface RegionAnalysis {
  dataset: GridDataset;
  axis: CalendarTimeAxis;
  convention: LongitudeConvention;
  /** Bounds as applied to the dataset's longitudes */
  bounds: RegionSelection;
  selection: RegionIndices;
  series: TimeSeries;
  annual: AnnualSeries;
  /** Absent when the series spans fewer than two years */
  trend: TrendLine | undefined;
}

function withContext<T>(context: Record<string, unknown>, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    // core stages know nothing of files; name the file on the one error that needs it
    if (error instanceof AllMissingError) {
      throw new AllMissingError(error.timeIndex, { ...error.context, ...context });
    }
    throw error;
  }
}

function effectiveBounds(
  input: RegionAnalysisInput,
  convention: LongitudeConvention,
  ctx: WorkflowContext
): RegionSelection {
  const { bounds, boundsConvention } = input;
  if (boundsConvention && convention !== 'ambiguous' && boundsConvention !== convention) {
    const converted = toLongitudeConvention(bounds, convention);
    ctx.logger.debug('Converted region bounds to dataset longitude convention', {
      source: input.path,
      from: boundsConvention,
      to: convention,
      bounds: converted,
    });
    return converted;
  }
  return bounds;
}

/**
 * Run the regional pipeline over one file
 */
export function analyzeRegion(input: RegionAnalysisInput, ctx: WorkflowContext): RegionAnalysis {
  const logContext = { source: input.path, variable: input.variable, label: input.label };
  const timings: Record<string, number> = {};
  const timed = <T>(stage: string, fn: () => T): T => {
    const started = ctx.clock.nowMs();
    const result = withContext(logContext, fn);
    timings[stage] = ctx.clock.nowMs() - started;
    LogHelpers.stage(ctx.logger, stage, timings[stage], logContext);
    return result;
  };

  const dataset = timed('read', () =>
    withGridFile(ctx.source, input.path, (handle) =>
      handle.readDataset({
        variable: input.variable,
        lonName: input.coordinates?.lon,
        latName: input.coordinates?.lat,
        timeName: input.coordinates?.time,
      })
    )
  );

  const fileCalendar = resolveCalendarName(dataset.calendarAttribute);
  if (fileCalendar !== undefined && fileCalendar !== input.calendar) {
    ctx.logger.warn('Requested calendar differs from the file calendar attribute', {
      ...logContext,
      calendar: input.calendar,
      calendarAttribute: dataset.calendarAttribute,
    });
  }

  const axis = timed('time-axis', () => {
    const units = parseTimeUnits(dataset.timeUnits);
    return toCalendarDates(
      dataset.time,
      units.originYear,
      units.originMonth,
      units.originDay,
      units.unit,
      input.calendar
    );
  });

  const convention = detectLongitudeConvention(dataset.longitude);
  const bounds = effectiveBounds(input, convention, ctx);
  const selection = timed('select', () => selectRegion(dataset.longitude, dataset.latitude, bounds));

  if (selection.lonIndices.length === 0 || selection.latIndices.length === 0) {
    throw new EmptyRegionError(
      `Region selects no cells in ${input.path} (${selection.lonIndices.length} lon x ${selection.latIndices.length} lat)`,
      {
        ...logContext,
        bounds,
        longitudeConvention: convention,
        lonRange: [Math.min(...dataset.longitude), Math.max(...dataset.longitude)],
        latRange: [Math.min(...dataset.latitude), Math.max(...dataset.latitude)],
      }
    );
  }

  const series = timed('average', () =>
    toTimeSeries(axis, averageOverRegion(dataset, selection.lonIndices, selection.latIndices))
  );
  const annual = timed('annual', () => toAnnualMeans(series));
  const trend = annual.year.length >= 2 ? timed('trend', () => fitLinearTrend(annual)) : undefined;

  if (!trend) {
    ctx.logger.warn('Series spans fewer than two years; no trend fitted', { ...logContext, years: annual.year.length });
  }

  ctx.logger.info('Regional series extracted', {
    ...logContext,
    calendar: input.calendar,
    timeSteps: series.values.length,
    years: annual.year.length,
    cells: selection.lonIndices.length * selection.latIndices.length,
    timings,
  });

  return { dataset, axis, convention, bounds, selection, series, annual, trend };
}
