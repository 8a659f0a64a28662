/**
 * Grid Commands
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { compareSchema, inspectSchema, seriesSchema, sliceSchema } from '../command-defs/grid.js';
import { inspectGridHandler, inspectGridRows } from '../handlers/grid/inspect-grid.js';
import { regionalSeriesHandler, regionalSeriesRows } from '../handlers/grid/regional-series.js';
import { spatialSliceHandler, spatialSliceRows } from '../handlers/grid/spatial-slice.js';
import { compareScenariosHandler, compareScenariosRows } from '../handlers/grid/compare-scenarios.js';

const collect = (value: string, previous: string[]): string[] => [...previous, value];

function withCommonOptions(command: Command): Command {
  return command
    .option('--lon-name <name>', 'Longitude coordinate variable')
    .option('--lat-name <name>', 'Latitude coordinate variable')
    .option('--time-name <name>', 'Time coordinate variable')
    .option('--format <format>', 'Output format (json, table, csv)');
}

function withRegionOptions(command: Command): Command {
  return command
    .option('--variable <name>', 'Data variable', 'TS')
    .requiredOption('--calendar <calendar>', 'Calendar of the time axis (standard, noLeap, day360)')
    .requiredOption('--lon-min <degrees>', 'Western bound')
    .requiredOption('--lon-max <degrees>', 'Eastern bound')
    .requiredOption('--lat-min <degrees>', 'Southern bound')
    .requiredOption('--lat-max <degrees>', 'Northern bound')
    .option('--bounds-convention <convention>', 'Longitude convention of the bounds (0-360, -180-180)');
}

function withExamples(command: Command): Command {
  return command.addHelpText('after', () => commandRegistry.generateExamplesHelp('grid', command.name()));
}

async function run(commandName: string, options: Record<string, unknown>): Promise<void> {
  const { execute } = await import('../core/execute.js');
  const commandDef = commandRegistry.getCommand('grid', commandName);
  if (!commandDef) {
    throw new Error(`Command grid ${commandName} not found in registry`);
  }
  await execute(commandDef, options);
}

/**
 * Register grid commands
 */
export function registerGridCommands(program: Command): void {
  const gridCmd = program.command('grid').description('Regional series and slices from gridded model output');

  withExamples(withCommonOptions(
    gridCmd.command('inspect').description('List variables, coordinates and time axis of a file').argument('<file>')
  )).action(async (file: string, options: Record<string, unknown>) => {
    await run('inspect', { ...options, file });
  });

  withExamples(withCommonOptions(
    withRegionOptions(
      gridCmd
        .command('series')
        .description('Area-mean series, annual means and trend over a region')
        .argument('<file>')
        .option('--label <label>', 'Label for the run')
    )
  )).action(async (file: string, options: Record<string, unknown>) => {
    await run('series', { ...options, file });
  });

  withExamples(withCommonOptions(
    gridCmd
      .command('slice')
      .description('Field values at one time step')
      .argument('<file>')
      .option('--variable <name>', 'Data variable', 'TS')
      .requiredOption('--calendar <calendar>', 'Calendar of the time axis (standard, noLeap, day360)')
      .option('--time-index <index>', 'Time step to extract', '0')
  )).action(async (file: string, options: Record<string, unknown>) => {
    await run('slice', { ...options, file });
  });

  withExamples(withCommonOptions(
    withRegionOptions(
      gridCmd
        .command('compare')
        .description('Join scenario runs into one annual series with a combined trend')
        .option('--run <label=path>', 'Run to include, repeatable, in chronological order', collect, [])
    )
  )).action(async (options: Record<string, unknown>) => {
    await run('compare', options);
  });
}

const inspectCommand: CommandDefinition<typeof inspectSchema, Awaited<ReturnType<typeof inspectGridHandler>>> = {
  name: 'inspect',
  description: 'List variables, coordinates and time axis of a file',
  schema: inspectSchema,
  handler: inspectGridHandler,
  toRows: inspectGridRows,
  examples: ['gridtrend grid inspect tas_hist.nc', 'gridtrend grid inspect tas_hist.nc --format json'],
};

const seriesCommand: CommandDefinition<typeof seriesSchema, Awaited<ReturnType<typeof regionalSeriesHandler>>> = {
  name: 'series',
  description: 'Area-mean series, annual means and trend over a region',
  schema: seriesSchema,
  handler: regionalSeriesHandler,
  toRows: regionalSeriesRows,
  examples: [
    'gridtrend grid series tas_hist.nc --calendar noLeap --lon-min 204.2 --lon-max 208.3 --lat-min 25.8 --lat-max 30.4',
  ],
};

const sliceCommand: CommandDefinition<typeof sliceSchema, Awaited<ReturnType<typeof spatialSliceHandler>>> = {
  name: 'slice',
  description: 'Field values at one time step',
  schema: sliceSchema,
  handler: spatialSliceHandler,
  toRows: spatialSliceRows,
  examples: ['gridtrend grid slice tas_hist.nc --calendar standard --time-index 11 --format csv'],
};

const compareCommand: CommandDefinition<typeof compareSchema, Awaited<ReturnType<typeof compareScenariosHandler>>> = {
  name: 'compare',
  description: 'Join scenario runs into one annual series with a combined trend',
  schema: compareSchema,
  handler: compareScenariosHandler,
  toRows: compareScenariosRows,
  examples: [
    'gridtrend grid compare --run hist=tas_hist.nc --run rcp85=tas_rcp85.nc --calendar noLeap --lon-min 204.2 --lon-max 208.3 --lat-min 25.8 --lat-max 30.4',
  ],
};

const gridModule: PackageCommandModule = {
  packageName: 'grid',
  description: 'Regional series and slices from gridded model output',
  commands: [inspectCommand, seriesCommand, sliceCommand, compareCommand],
};

commandRegistry.registerPackage(gridModule);

export { gridModule };
