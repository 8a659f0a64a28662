import { ValidationError } from '@gridtrend/utils';
import { fieldStrides, isMissing } from '../dataset/grid-dataset.js';
import type { CalendarTimeAxis, GridDataset, SpatialSlice } from '../types/grid.js';

/**
 * The field at one time step, laid out `values[lat][lon]` for a heat map
 */
export function sliceAtTime(dataset: GridDataset, axis: CalendarTimeAxis, timeIndex: number): SpatialSlice {
  if (!Number.isInteger(timeIndex) || timeIndex < 0 || timeIndex >= dataset.shape.time) {
    throw new ValidationError(`Time index ${timeIndex} is outside 0..${dataset.shape.time - 1}`, {
      source: dataset.source,
      timeIndex,
      timeSteps: dataset.shape.time,
    });
  }
  if (axis.dates.length !== dataset.shape.time) {
    throw new ValidationError('Time axis does not belong to this dataset', {
      source: dataset.source,
      dates: axis.dates.length,
      timeSteps: dataset.shape.time,
    });
  }

  const strides = fieldStrides(dataset);
  const values: Array<Array<number | null>> = [];
  for (let j = 0; j < dataset.shape.lat; j++) {
    const row: Array<number | null> = [];
    for (let i = 0; i < dataset.shape.lon; i++) {
      const value = dataset.field[i * strides.lon + j * strides.lat + timeIndex * strides.time];
      row.push(isMissing(value, dataset.fillValue) ? null : value);
    }
    values.push(row);
  }

  return {
    timeIndex,
    date: axis.dates[timeIndex],
    longitude: Array.from(dataset.longitude),
    latitude: Array.from(dataset.latitude),
    values,
  };
}
