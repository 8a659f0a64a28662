/**
 * Compare Scenarios Handler
 */

import { compareScenarios, type CompareScenariosResult } from '@gridtrend/workflows';
import type { CompareArgs } from '../../command-defs/grid.js';
import type { CommandContext } from '../../core/command-context.js';
import type { OutputRow } from '../../types/index.js';

export async function compareScenariosHandler(args: CompareArgs, ctx: CommandContext): Promise<CompareScenariosResult> {
  const bounds = { lonMin: args.lonMin, lonMax: args.lonMax, latMin: args.latMin, latMax: args.latMax };
  return compareScenarios(
    {
      runs: args.run.map((run) => ({
        label: run.label,
        path: run.path,
        variable: args.variable,
        calendar: args.calendar,
        bounds,
        boundsConvention: args.boundsConvention,
        coordinates: ctx.coordinates,
      })),
    },
    ctx.workflows
  );
}

export function compareScenariosRows(result: CompareScenariosResult): OutputRow[] {
  const { annual, trend } = result.combined;
  return annual.map((point, k) => ({
    label: point.label,
    year: point.year,
    mean: point.mean,
    trend: trend ? trend.fitted[k] : null,
  }));
}
