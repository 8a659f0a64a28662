/**
 * @gridtrend/adapters-netcdf - NetCDF classic reader
 */

import { withGridFile, type GridDataset, type ReadDatasetOptions } from '@gridtrend/core';
import { GridDatasetReader, netcdfGridSource } from './grid-dataset-reader.js';

export { GridDatasetReader, netcdfGridSource, readFileBytes } from './grid-dataset-reader.js';
export { toAttributeValue, toFloat64 } from './netcdf-header.js';

/**
 * Open a NetCDF file, run `fn`, and close the reader on every exit path
 */
export function withGridDatasetReader<T>(path: string, fn: (reader: GridDatasetReader) => T): T {
  const reader = GridDatasetReader.open(path);
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}

/**
 * Read one variable of a NetCDF file as a GridDataset
 */
export function openGridDataset(path: string, options: ReadDatasetOptions): GridDataset {
  return withGridFile(netcdfGridSource, path, (handle) => handle.readDataset(options));
}
