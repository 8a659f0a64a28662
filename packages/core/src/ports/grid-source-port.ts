/**
 * Grid Source Port
 *
 * Read access to a self-describing gridded array file. Adapters own the
 * binary format; everything downstream only sees these accessors.
 */

import type { AttributeValue, GridDataset, ReadDatasetOptions, VariableInfo } from '../types/grid.js';

/**
 * An open grid file. Holds file-backed state until `close()`.
 */
export interface GridFileHandle {
  readonly path: string;
  listVariables(): VariableInfo[];
  /** Throws `VariableNotFoundError` when absent */
  getVariable(name: string): Float64Array;
  /** `undefined` when the attribute is absent; never confuses absence with a falsy value */
  getAttribute(variableName: string, attributeName: string): AttributeValue | undefined;
  readDataset(options: ReadDatasetOptions): GridDataset;
  close(): void;
}

export interface GridSourcePort {
  /** Throws `DatasetOpenError` when the file cannot be opened */
  open(path: string): GridFileHandle;
}

/**
 * Open, use and close a grid file. The handle is closed on every exit path.
 */
export function withGridFile<T>(source: GridSourcePort, path: string, fn: (handle: GridFileHandle) => T): T {
  const handle = source.open(path);
  try {
    return fn(handle);
  } finally {
    handle.close();
  }
}
