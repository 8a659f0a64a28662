/**
 * Grid commands end to end: options -> schema -> handler -> workflow -> output,
 * over in-memory grids
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createGridDataset, type GridDataset } from '@gridtrend/core';
import { DatasetOpenError, EmptyRegionError, ValidationError } from '@gridtrend/utils';
import { createMemoryGridSource, type WorkflowContext } from '@gridtrend/workflows';
import { commandRegistry } from '../../../src/core/command-registry.js';
import { execute, runCommand } from '../../../src/core/execute.js';
import type { CommandDefinition } from '../../../src/types/index.js';
import '../../../src/commands/grid.js';

const FILL = -999;
const LONGITUDE = [10, 20, 30];
const LATITUDE = [0, 10];
const REGION = { lonMin: '15', lonMax: '35', latMin: '-5', latMax: '15' };

/**
 * 3 lon x 2 lat grid holding base + 10t + i + j; the region covers lon 1..2
 * and both latitudes, so its mean is base + 10t + 2.
 */
function grid(source: string, time: number[], timeUnits: string, base: number): GridDataset {
  const field: number[] = [];
  time.forEach((_, t) => {
    for (let j = 0; j < LATITUDE.length; j++) {
      for (let i = 0; i < LONGITUDE.length; i++) {
        field.push(i === 0 && j === 0 && t === 1 ? FILL : base + 10 * t + i + j);
      }
    }
  });
  return createGridDataset({
    source,
    variable: 'TS',
    longitude: LONGITUDE,
    latitude: LATITUDE,
    time,
    timeUnits,
    calendarAttribute: 'standard',
    field,
    axisOrder: ['time', 'lat', 'lon'],
    fillValue: FILL,
    units: 'K',
  });
}

function command(name: string): CommandDefinition {
  const commandDef = commandRegistry.getCommand('grid', name);
  if (!commandDef) {
    throw new Error(`grid ${name} is not registered`);
  }
  return commandDef;
}

describe('grid commands', () => {
  let workflows: WorkflowContext;

  beforeEach(() => {
    workflows = {
      // historical: 2000-01-01 and 2001-01-01; scenario: 2002-01-01
      source: createMemoryGridSource([
        grid('memory://hist.nc', [0, 366], 'days since 2000-01-01', 0),
        grid('memory://rcp.nc', [0], 'days since 2002-01-01', 20),
      ]),
      logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
      clock: { nowISO: () => '2026-01-01T00:00:00.000Z', nowMs: () => 0 },
    };
  });

  const run = (name: string, options: Record<string, unknown>, env: NodeJS.ProcessEnv = {}) =>
    runCommand(command(name), options, { workflows, file: {}, env });

  describe('inspect', () => {
    it('prints one table row per variable', async () => {
      const lines = (await run('inspect', { file: 'memory://hist.nc' })).split('\n');

      expect(lines[0]).toBe(`name | type   | dimensions                | ${'units'.padEnd(21)}`);
      expect(lines).toHaveLength(6);
      expect(lines[4]).toBe('time | double | time(2)                   | days since 2000-01-01');
      expect(lines[5]).toBe(`TS   | float  | time(2) x lat(2) x lon(3) | ${'K'.padEnd(21)}`);
    });

    it('prints the full result as JSON', async () => {
      const output = JSON.parse(await run('inspect', { file: 'memory://hist.nc', format: 'json' }));

      expect(output.variables.map((variable: { name: string }) => variable.name)).toEqual(['lon', 'lat', 'time', 'TS']);
      expect(output.time).toEqual({
        count: 2,
        units: 'days since 2000-01-01',
        calendarAttribute: 'standard',
        suggestedCalendar: 'standard',
      });
      expect(output.generatedAt).toBe('2026-01-01T00:00:00.000Z');
    });
  });

  describe('series', () => {
    it('prints annual means beside the fitted trend', async () => {
      const output = await run('series', { file: 'memory://hist.nc', calendar: 'standard', ...REGION });

      expect(output.split('\n')).toEqual([
        'year | mean | trend',
        '-----|------|------',
        '2000 | 2    | 2    ',
        '2001 | 12   | 12   ',
      ]);
    });

    it('keeps the per-step series in JSON output', async () => {
      const output = JSON.parse(
        await run('series', { file: 'memory://hist.nc', calendar: 'standard', label: 'hist', ...REGION, format: 'json' })
      );

      expect(output.label).toBe('hist');
      expect(output.series).toEqual([
        { date: '2000-01-01', value: 2 },
        { date: '2001-01-01', value: 12 },
      ]);
      expect(output.trend).toEqual({ slope: 10, intercept: -19998, fitted: [2, 12] });
      expect(output.cells).toEqual({ lon: 2, lat: 2 });
    });

    it('takes the output format from the environment when no flag is given', async () => {
      const output = await run(
        'series',
        { file: 'memory://hist.nc', calendar: 'standard', ...REGION },
        { GRIDTREND_FORMAT: 'csv' }
      );
      expect(output).toBe('year,mean,trend\n2000,2,2\n2001,12,12');
    });

    it('lets the --format flag win over the environment', async () => {
      const output = await run(
        'series',
        { file: 'memory://hist.nc', calendar: 'standard', ...REGION, format: 'csv' },
        { GRIDTREND_FORMAT: 'json' }
      );
      expect(output.split('\n')[0]).toBe('year,mean,trend');
    });

    it('passes coordinate names through to the reader', async () => {
      await expect(
        run('series', { file: 'memory://hist.nc', calendar: 'standard', ...REGION, lonName: 'longitude' })
      ).rejects.toThrow(new DatasetOpenError("memory://hist.nc has no variable 'longitude'", 'memory://hist.nc'));
    });

    it('rejects an unknown calendar before reading anything', async () => {
      await expect(run('series', { file: 'memory://hist.nc', calendar: 'julian', ...REGION })).rejects.toThrow(
        ValidationError
      );
    });

    it('rejects an unknown output format', async () => {
      await expect(
        run('series', { file: 'memory://hist.nc', calendar: 'standard', ...REGION, format: 'xml' })
      ).rejects.toThrow(/^Invalid arguments: --format: Invalid enum value/);
    });

    it('reports a region that selects no cells', async () => {
      await expect(
        run('series', { file: 'memory://hist.nc', calendar: 'standard', ...REGION, lonMin: '100', lonMax: '120' })
      ).rejects.toThrow(EmptyRegionError);
    });
  });

  describe('slice', () => {
    it('prints one CSV row per cell with blanks for missing values', async () => {
      const output = await run('slice', { file: 'memory://hist.nc', calendar: 'standard', timeIndex: '1', format: 'csv' });

      expect(output.split('\n')).toEqual([
        'lat,lon,value',
        '0,10,',
        '0,20,11',
        '0,30,12',
        '10,10,11',
        '10,20,12',
        '10,30,13',
      ]);
    });

    it('reports the date of the time step in JSON output', async () => {
      const output = JSON.parse(
        await run('slice', { file: 'memory://hist.nc', calendar: 'standard', timeIndex: '1', format: 'json' })
      );
      expect(output.date).toBe('2001-01-01');
      expect(output.values[0]).toEqual([null, 11, 12]);
    });
  });

  describe('compare', () => {
    it('joins the runs and fits one trend across them', async () => {
      const output = await run('compare', {
        run: ['hist=memory://hist.nc', 'rcp85=memory://rcp.nc'],
        calendar: 'standard',
        ...REGION,
        format: 'csv',
      });

      expect(output.split('\n')).toEqual([
        'label,year,mean,trend',
        'hist,2000,2,2',
        'hist,2001,12,12',
        'rcp85,2002,22,22',
      ]);
    });
  });

  describe('execute', () => {
    it('prints a one-line error and exits with code 1', async () => {
      const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await expect(execute(command('series'), { file: 'memory://hist.nc' })).rejects.toThrow('process.exit called');

      expect(exit).toHaveBeenCalledWith(1);
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(stderr.mock.calls[0][0]).toMatch(/^Error: Invalid arguments: --calendar: Required; --lon-min: /);
    });
  });
});
