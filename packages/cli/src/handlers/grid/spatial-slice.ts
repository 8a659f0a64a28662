/**
 * Spatial Slice Handler
 */

import { extractSpatialSlice, type SpatialSliceResult } from '@gridtrend/workflows';
import type { SliceArgs } from '../../command-defs/grid.js';
import type { CommandContext } from '../../core/command-context.js';
import type { OutputRow } from '../../types/index.js';

export async function spatialSliceHandler(args: SliceArgs, ctx: CommandContext): Promise<SpatialSliceResult> {
  return extractSpatialSlice(
    {
      path: args.file,
      variable: args.variable,
      calendar: args.calendar,
      timeIndex: args.timeIndex,
      coordinates: ctx.coordinates,
    },
    ctx.workflows
  );
}

/**
 * One row per cell, latitude-major
 */
export function spatialSliceRows(result: SpatialSliceResult): OutputRow[] {
  return result.latitude.flatMap((lat, j) =>
    result.longitude.map((lon, i) => ({ lat, lon, value: result.values[j][i] }))
  );
}
