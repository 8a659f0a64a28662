import { AllMissingError, EmptyRegionError, ValidationError } from '@gridtrend/utils';
import { fieldStrides, isMissing } from '../dataset/grid-dataset.js';
import type { CalendarTimeAxis, GridField, TimeSeries } from '../types/grid.js';

function assertIndices(indices: readonly number[], size: number, axis: string): void {
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      throw new ValidationError(`${axis} index ${index} is outside 0..${size - 1}`, { axis, index, size });
    }
  }
}

/**
 * Mean of the selected cells at every time step.
 *
 * Cells equal to the fill value, and NaN cells, are left out of both the sum
 * and the count. Empty index sets raise `EmptyRegionError`; a time step where
 * every selected cell is missing raises `AllMissingError`.
 */
export function averageOverRegion(
  grid: GridField,
  lonIndices: readonly number[],
  latIndices: readonly number[]
): number[] {
  if (lonIndices.length === 0 || latIndices.length === 0) {
    throw new EmptyRegionError('Region selection is empty; check the bounds and the longitude convention', {
      lonCount: lonIndices.length,
      latCount: latIndices.length,
    });
  }

  assertIndices(lonIndices, grid.shape.lon, 'lon');
  assertIndices(latIndices, grid.shape.lat, 'lat');

  const strides = fieldStrides(grid);
  const values: number[] = [];

  for (let t = 0; t < grid.shape.time; t++) {
    let sum = 0;
    let count = 0;
    for (const i of lonIndices) {
      for (const j of latIndices) {
        const value = grid.field[i * strides.lon + j * strides.lat + t * strides.time];
        if (!isMissing(value, grid.fillValue)) {
          sum += value;
          count++;
        }
      }
    }
    if (count === 0) {
      throw new AllMissingError(t, { cells: lonIndices.length * latIndices.length });
    }
    values.push(sum / count);
  }

  return values;
}

/**
 * Pair averaged values with their dates
 */
export function toTimeSeries(axis: CalendarTimeAxis, values: readonly number[]): TimeSeries {
  if (axis.dates.length !== values.length) {
    throw new ValidationError(
      `Time axis has ${axis.dates.length} dates but the series has ${values.length} values`,
      { dates: axis.dates.length, values: values.length }
    );
  }
  return Object.freeze({ dates: axis.dates, values: Object.freeze([...values]) });
}
