/**
 * Regional Series Handler
 */

import { runRegionalSeries, type RegionalSeriesResult } from '@gridtrend/workflows';
import type { SeriesArgs } from '../../command-defs/grid.js';
import type { CommandContext } from '../../core/command-context.js';
import type { OutputRow } from '../../types/index.js';

export async function regionalSeriesHandler(args: SeriesArgs, ctx: CommandContext): Promise<RegionalSeriesResult> {
  return runRegionalSeries(
    {
      path: args.file,
      variable: args.variable,
      calendar: args.calendar,
      bounds: { lonMin: args.lonMin, lonMax: args.lonMax, latMin: args.latMin, latMax: args.latMax },
      boundsConvention: args.boundsConvention,
      coordinates: ctx.coordinates,
      label: args.label,
    },
    ctx.workflows
  );
}

/**
 * Annual means with the fitted trend beside them. The per-step series is
 * only in JSON output.
 */
export function regionalSeriesRows(result: RegionalSeriesResult): OutputRow[] {
  return result.annual.map((point, k) => ({
    year: point.year,
    mean: point.mean,
    trend: result.trend ? result.trend.fitted[k] : null,
  }));
}
