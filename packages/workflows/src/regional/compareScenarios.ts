/**
 * Scenario Comparison Workflow
 *
 * Runs the regional series for several files (e.g. a historical run and
 * its scenario continuations) and joins their annual means into one
 * record with a single trend.
 */

import { z } from 'zod';
import { concatAnnualSeries, fitLinearTrend, type AnnualSeries } from '@gridtrend/core';
import { ValidationError } from '@gridtrend/utils';
import { parseSpec } from '../spec.js';
import type { WorkflowContext } from '../types.js';
import {
  RegionalSeriesSpecSchema,
  runRegionalSeries,
  type RegionalSeriesResult,
  type TrendResult,
} from './runRegionalSeries.js';

export const CompareScenariosSpecSchema = z.object({
  runs: z.array(RegionalSeriesSpecSchema.extend({ label: z.string().min(1) })).min(1),
});

export type CompareScenariosSpec = z.infer<typeof CompareScenariosSpecSchema>;

export type CompareScenariosResult = {
  runs: RegionalSeriesResult[];
  combined: {
    annual: Array<{ year: number; mean: number; label: string }>;
    trend: TrendResult | null;
  };
  generatedAt: string;
};

function annualSeriesOf(result: RegionalSeriesResult): AnnualSeries {
  return {
    year: result.annual.map((point) => point.year),
    meanValue: result.annual.map((point) => point.mean),
  };
}

/**
 * Compare scenario runs over the same region
 *
 * Runs are independent and share nothing; they are joined in the order
 * given, so their years must not overlap.
 */
export async function compareScenarios(
  spec: CompareScenariosSpec,
  ctx: WorkflowContext
): Promise<CompareScenariosResult> {
  const validated = parseSpec(CompareScenariosSpecSchema, spec, 'scenario comparison');

  const labels = validated.runs.map((run) => run.label);
  const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
  if (duplicate !== undefined) {
    throw new ValidationError(`Run label '${duplicate}' is used more than once`, { labels });
  }

  const runs = await Promise.all(validated.runs.map((run) => runRegionalSeries(run, ctx)));

  const combined = concatAnnualSeries(...runs.map(annualSeriesOf));
  const trend = combined.year.length >= 2 ? fitLinearTrend(combined) : undefined;

  ctx.logger.info('Scenario runs combined', {
    runs: labels,
    years: combined.year.length,
    slope: trend?.slope,
  });

  return {
    runs,
    combined: {
      annual: runs.flatMap((run, k) => run.annual.map((point) => ({ ...point, label: labels[k] }))),
      trend: trend ? { slope: trend.slope, intercept: trend.intercept, fitted: [...trend.fitted] } : null,
    },
    generatedAt: ctx.clock.nowISO(),
  };
}
