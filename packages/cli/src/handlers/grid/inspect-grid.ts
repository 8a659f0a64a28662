/**
 * Inspect Grid Handler
 */

import { inspectGridFile, type InspectGridFileResult } from '@gridtrend/workflows';
import type { InspectArgs } from '../../command-defs/grid.js';
import type { CommandContext } from '../../core/command-context.js';
import type { OutputRow } from '../../types/index.js';

export async function inspectGridHandler(args: InspectArgs, ctx: CommandContext): Promise<InspectGridFileResult> {
  return inspectGridFile({ path: args.file, coordinates: ctx.coordinates }, ctx.workflows);
}

/**
 * One row per variable: `time(3) x lat(3) x lon(4)`
 */
export function inspectGridRows(result: InspectGridFileResult): OutputRow[] {
  return result.variables.map((variable) => {
    const units = variable.attributes.units;
    return {
      name: variable.name,
      type: variable.type,
      dimensions: variable.dimensions.map((dimension) => `${dimension.name}(${dimension.size})`).join(' x '),
      units: typeof units === 'string' ? units : null,
    };
  });
}
