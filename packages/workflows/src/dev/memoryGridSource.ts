/**
 * In-memory GridSourcePort
 *
 * Serves GridDatasets built in process, keyed by path. Used by tests and
 * by callers that already hold a dataset. Tracks open handles so callers
 * can check that every handle was closed.
 */

import type {
  AttributeValue,
  GridDataset,
  GridFileHandle,
  GridSourcePort,
  ReadDatasetOptions,
  VariableInfo,
} from '@gridtrend/core';
import { DatasetOpenError, VariableNotFoundError } from '@gridtrend/utils';

export interface MemoryGridSource extends GridSourcePort {
  /** Number of handles opened and not yet closed */
  openHandles(): number;
}

const COORDINATES = { lon: 'lon', lat: 'lat', time: 'time' } as const;

function describeDataset(dataset: GridDataset): VariableInfo[] {
  const axisVariable = (name: string, size: number, attributes: Record<string, AttributeValue>): VariableInfo => ({
    name,
    type: 'double',
    dimensions: [{ name, size }],
    attributes,
  });

  const dataAttributes: Record<string, AttributeValue> = {};
  if (dataset.units !== undefined) dataAttributes.units = dataset.units;
  if (dataset.longName !== undefined) dataAttributes.long_name = dataset.longName;
  if (dataset.fillValue !== undefined) dataAttributes._FillValue = dataset.fillValue;

  const timeAttributes: Record<string, AttributeValue> = { units: dataset.timeUnits };
  if (dataset.calendarAttribute !== undefined) timeAttributes.calendar = dataset.calendarAttribute;

  return [
    axisVariable(COORDINATES.lon, dataset.shape.lon, {}),
    axisVariable(COORDINATES.lat, dataset.shape.lat, {}),
    axisVariable(COORDINATES.time, dataset.shape.time, timeAttributes),
    {
      name: dataset.variable,
      type: 'float',
      dimensions: dataset.axisOrder.map((axis) => ({ name: COORDINATES[axis], size: dataset.shape[axis] })),
      attributes: dataAttributes,
    },
  ];
}

class MemoryGridFile implements GridFileHandle {
  private closed = false;

  constructor(
    public readonly path: string,
    private readonly dataset: GridDataset,
    private readonly onClose: () => void
  ) {}

  private requireOpen(): void {
    if (this.closed) {
      throw new DatasetOpenError(`${this.path} has been closed`, this.path);
    }
  }

  listVariables(): VariableInfo[] {
    this.requireOpen();
    return describeDataset(this.dataset);
  }

  getVariable(name: string): Float64Array {
    this.requireOpen();
    switch (name) {
      case COORDINATES.lon:
        return this.dataset.longitude;
      case COORDINATES.lat:
        return this.dataset.latitude;
      case COORDINATES.time:
        return this.dataset.time;
      case this.dataset.variable:
        return this.dataset.field;
      default:
        throw new VariableNotFoundError(name, this.path);
    }
  }

  getAttribute(variableName: string, attributeName: string): AttributeValue | undefined {
    const variable = this.listVariables().find((candidate) => candidate.name === variableName);
    if (!variable) {
      throw new VariableNotFoundError(variableName, this.path);
    }
    return variable.attributes[attributeName];
  }

  readDataset(options: ReadDatasetOptions): GridDataset {
    this.requireOpen();
    const requested = [
      options.lonName ?? COORDINATES.lon,
      options.latName ?? COORDINATES.lat,
      options.timeName ?? COORDINATES.time,
      options.variable,
    ];
    const known = new Set(this.listVariables().map((variable) => variable.name));
    const absent = requested.find((name) => !known.has(name));
    if (absent !== undefined) {
      throw new DatasetOpenError(`${this.path} has no variable '${absent}'`, this.path, { variable: absent });
    }
    return this.dataset;
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.onClose();
    }
  }
}

/**
 * Build a source serving each dataset under its `source` path
 */
export function createMemoryGridSource(datasets: GridDataset[]): MemoryGridSource {
  const byPath = new Map(datasets.map((dataset) => [dataset.source, dataset] as const));
  let open = 0;

  return {
    open(path: string): GridFileHandle {
      const dataset = byPath.get(path);
      if (!dataset) {
        throw new DatasetOpenError(`Cannot open ${path}: no such grid`, path);
      }
      open++;
      return new MemoryGridFile(path, dataset, () => {
        open--;
      });
    },
    openHandles: () => open,
  };
}
