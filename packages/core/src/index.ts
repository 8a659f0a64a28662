/**
 * @gridtrend/core - Gridded climate time series
 *
 * Pure pipeline stages over an in-memory GridDataset:
 * time axis normalization, regional aggregation, annual resampling,
 * trend fitting and spatial slices. File access goes through GridSourcePort.
 */

export * from './types/grid.js';

export { createGridDataset, fieldStrides, valueAt, isMissing } from './dataset/grid-dataset.js';
export type { GridDatasetInit } from './dataset/grid-dataset.js';

export { parseTimeUnits } from './time/time-units.js';
export {
  toCalendarDates,
  resolveCalendarName,
  formatCalendarDate,
  compareCalendarDates,
} from './time/calendar.js';

export { selectRegion, assertValidBounds } from './region/select-region.js';
export { averageOverRegion, toTimeSeries } from './region/average.js';
export { detectLongitudeConvention, toLongitudeConvention } from './region/longitude.js';

export { toAnnualMeans, concatAnnualSeries } from './resample/annual.js';
export { fitLinearTrend } from './resample/trend.js';

export { sliceAtTime } from './slice/spatial-slice.js';

export { withGridFile } from './ports/grid-source-port.js';
export type { GridFileHandle, GridSourcePort } from './ports/grid-source-port.js';
