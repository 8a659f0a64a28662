/**
 * GridDataset construction and field indexing
 */

import { DimensionMismatchError } from '@gridtrend/utils';
import { AXIS_NAMES, type AxisName, type GridDataset, type GridField } from '../types/grid.js';

export interface GridDatasetInit {
  source: string;
  variable: string;
  longitude: ArrayLike<number>;
  latitude: ArrayLike<number>;
  time: ArrayLike<number>;
  timeUnits: string;
  calendarAttribute?: string;
  field: ArrayLike<number>;
  axisOrder: readonly AxisName[];
  /** Sizes of the field's dimensions, in `axisOrder`. Checked when given. */
  dimensionSizes?: readonly number[];
  fillValue?: number;
  units?: string;
  longName?: string;
}

function assertAxisOrder(axisOrder: readonly AxisName[], context: Record<string, unknown>): void {
  const seen = new Set(axisOrder);
  const isPermutation =
    axisOrder.length === AXIS_NAMES.length &&
    seen.size === AXIS_NAMES.length &&
    AXIS_NAMES.every((axis) => seen.has(axis));

  if (!isPermutation) {
    throw new DimensionMismatchError(
      `Field must have exactly the axes lon, lat, time (got ${axisOrder.join(', ') || 'none'})`,
      { ...context, axisOrder: [...axisOrder] }
    );
  }
}

/**
 * Validate and freeze a dataset. Field length and per-axis sizes must equal
 * the coordinate lengths exactly.
 */
export function createGridDataset(init: GridDatasetInit): GridDataset {
  const context = { source: init.source, variable: init.variable };
  assertAxisOrder(init.axisOrder, context);

  const shape: Record<AxisName, number> = {
    lon: init.longitude.length,
    lat: init.latitude.length,
    time: init.time.length,
  };

  if (init.dimensionSizes) {
    const expected = init.axisOrder.map((axis) => shape[axis]);
    const matches =
      init.dimensionSizes.length === expected.length &&
      init.dimensionSizes.every((size, i) => size === expected[i]);
    if (!matches) {
      throw new DimensionMismatchError(
        `Field dimensions [${init.dimensionSizes.join(', ')}] do not match coordinate lengths [${expected.join(', ')}]`,
        { ...context, axisOrder: [...init.axisOrder], dimensionSizes: [...init.dimensionSizes], expected }
      );
    }
  }

  const expectedLength = shape.lon * shape.lat * shape.time;
  if (init.field.length !== expectedLength) {
    throw new DimensionMismatchError(
      `Field has ${init.field.length} values, expected ${expectedLength} (${shape.lon} lon x ${shape.lat} lat x ${shape.time} time)`,
      { ...context, fieldLength: init.field.length, expectedLength }
    );
  }

  return Object.freeze({
    source: init.source,
    variable: init.variable,
    longitude: Float64Array.from(init.longitude),
    latitude: Float64Array.from(init.latitude),
    time: Float64Array.from(init.time),
    timeUnits: init.timeUnits,
    calendarAttribute: init.calendarAttribute,
    field: Float64Array.from(init.field),
    axisOrder: Object.freeze([...init.axisOrder]),
    shape: Object.freeze(shape),
    fillValue: init.fillValue,
    units: init.units,
    longName: init.longName,
  });
}

/**
 * Element strides of each axis in the flat field
 */
export function fieldStrides(grid: GridField): Record<AxisName, number> {
  const strides: Record<AxisName, number> = { lon: 0, lat: 0, time: 0 };
  let stride = 1;
  for (let k = grid.axisOrder.length - 1; k >= 0; k--) {
    const axis = grid.axisOrder[k];
    strides[axis] = stride;
    stride *= grid.shape[axis];
  }
  return strides;
}

/**
 * Read `field[lon, lat, time]` regardless of storage order
 */
export function valueAt(grid: GridField, lonIndex: number, latIndex: number, timeIndex: number): number {
  const strides = fieldStrides(grid);
  return grid.field[lonIndex * strides.lon + latIndex * strides.lat + timeIndex * strides.time];
}

/**
 * True for NaN and for the dataset's fill value
 */
export function isMissing(value: number, fillValue: number | undefined): boolean {
  return Number.isNaN(value) || (fillValue !== undefined && value === fillValue);
}
