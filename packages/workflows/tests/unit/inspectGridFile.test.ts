import { describe, it, expect } from 'vitest';
import { DatasetOpenError } from '@gridtrend/utils';
import { inspectGridFile } from '../../src/index.js';
import { createTestContext, FIXED_NOW, historicalGrid } from '../helpers/createTestContext.js';

describe('inspectGridFile', () => {
  it('describes variables and coordinates', async () => {
    const ctx = createTestContext([historicalGrid({ calendarAttribute: 'noleap' })]);
    const result = await inspectGridFile({ path: 'memory://hist' }, ctx);

    expect(result.variables.map((variable) => variable.name)).toEqual(['lon', 'lat', 'time', 'TS']);
    expect(result.variables[3]).toEqual({
      name: 'TS',
      type: 'float',
      dimensions: [
        { name: 'time', size: 4 },
        { name: 'lat', size: 4 },
        { name: 'lon', size: 4 },
      ],
      attributes: { units: 'K', _FillValue: -999 },
    });
    expect(result.longitude).toEqual({ count: 4, min: 203.75, max: 210, convention: '0-360' });
    expect(result.latitude).toEqual({ count: 4, min: 20, max: 35 });
    expect(result.time).toEqual({
      count: 4,
      units: 'days since 2000-01-01 00:00:00',
      calendarAttribute: 'noleap',
      suggestedCalendar: 'noLeap',
    });
    expect(result.generatedAt).toBe(FIXED_NOW);
    expect(ctx.source.openHandles()).toBe(0);
  });

  it('leaves out coordinates the file does not have', async () => {
    const ctx = createTestContext([historicalGrid()]);
    const result = await inspectGridFile({ path: 'memory://hist', coordinates: { lon: 'longitude' } }, ctx);
    expect(result.longitude).toBeUndefined();
    expect(result.latitude).toEqual({ count: 4, min: 20, max: 35 });
  });

  it('raises DatasetOpenError for an unknown path', async () => {
    const ctx = createTestContext([]);
    await expect(inspectGridFile({ path: 'memory://absent' }, ctx)).rejects.toThrow(DatasetOpenError);
  });
});
