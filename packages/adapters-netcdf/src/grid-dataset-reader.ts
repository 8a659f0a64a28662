/**
 * GridDatasetReader
 * =================
 * Reads gridded fields from NetCDF classic (CDF-1/CDF-2) files through
 * netcdfjs. The file descriptor is held only while the bytes are read and
 * is closed on every exit path; the parsed file stays in memory until
 * `close()`.
 */

import * as fs from 'fs';
import { NetCDFReader } from 'netcdfjs';
import {
  createPackageLogger,
  DatasetOpenError,
  DimensionMismatchError,
  LogHelpers,
  ValidationError,
  VariableNotFoundError,
} from '@gridtrend/utils';
import {
  createGridDataset,
  type AttributeValue,
  type AxisName,
  type GridDataset,
  type GridFileHandle,
  type GridSourcePort,
  type ReadDatasetOptions,
  type VariableInfo,
} from '@gridtrend/core';
import {
  NetcdfDimensionSchema,
  NetcdfRecordDimensionSchema,
  NetcdfVariableSchema,
  toAttributeValue,
  toFloat64,
  type NetcdfHeader,
  type NetcdfVariable,
} from './netcdf-header.js';

const logger = createPackageLogger('@gridtrend/adapters-netcdf');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read a whole file through an explicitly managed descriptor
 */
export function readFileBytes(path: string): Uint8Array {
  let fd: number;
  try {
    fd = fs.openSync(path, 'r');
  } catch (error) {
    throw new DatasetOpenError(`Cannot open ${path}: ${errorMessage(error)}`, path, {
      errno: errorCode(error),
    });
  }

  try {
    const { size } = fs.fstatSync(fd);
    const bytes = new Uint8Array(size);
    let offset = 0;
    while (offset < size) {
      const read = fs.readSync(fd, bytes, offset, size - offset, offset);
      if (read === 0) {
        break;
      }
      offset += read;
    }
    if (offset !== size) {
      throw new DatasetOpenError(`Short read on ${path}: ${offset} of ${size} bytes`, path);
    }
    LogHelpers.fileRead(logger, path, size);
    return bytes;
  } catch (error) {
    if (error instanceof DatasetOpenError) {
      throw error;
    }
    throw new DatasetOpenError(`Cannot read ${path}: ${errorMessage(error)}`, path, {
      errno: errorCode(error),
    });
  } finally {
    fs.closeSync(fd);
  }
}

function parseHeader(reader: NetCDFReader, path: string): NetcdfHeader {
  const dimensions = NetcdfDimensionSchema.array().safeParse(reader.dimensions);
  const variables = NetcdfVariableSchema.array().safeParse(reader.variables);
  const recordDimension = NetcdfRecordDimensionSchema.safeParse(reader.recordDimension);

  if (!dimensions.success || !variables.success || !recordDimension.success) {
    throw new DatasetOpenError(`Unexpected NetCDF header layout in ${path}`, path);
  }

  return {
    dimensions: dimensions.data,
    variables: variables.data,
    recordDimension: recordDimension.data,
  };
}

export class GridDatasetReader implements GridFileHandle {
  private reader: NetCDFReader | undefined;
  private readonly header: NetcdfHeader;

  private constructor(
    public readonly path: string,
    reader: NetCDFReader
  ) {
    this.reader = reader;
    this.header = parseHeader(reader, path);
  }

  /**
   * Open a NetCDF classic file. Missing, unreadable and non-NetCDF files
   * fail with `DatasetOpenError`.
   */
  static open(path: string): GridDatasetReader {
    const bytes = readFileBytes(path);
    let reader: NetCDFReader;
    try {
      reader = new NetCDFReader(bytes);
    } catch (error) {
      throw new DatasetOpenError(`${path} is not a NetCDF classic file: ${errorMessage(error)}`, path);
    }
    logger.debug('Opened grid file', { source: path, variables: reader.variables.length });
    return new GridDatasetReader(path, reader);
  }

  private requireOpen(): NetCDFReader {
    if (!this.reader) {
      throw new DatasetOpenError(`${this.path} has been closed`, this.path);
    }
    return this.reader;
  }

  private findVariable(name: string): NetcdfVariable | undefined {
    this.requireOpen();
    return this.header.variables.find((variable) => variable.name === name);
  }

  private dimensionName(id: number): string {
    return this.header.dimensions[id]?.name ?? `dim${id}`;
  }

  private dimensionSize(id: number): number {
    const dimension = this.header.dimensions[id];
    if (!dimension) {
      return 0;
    }
    const { recordDimension } = this.header;
    if (dimension.size === 0 && recordDimension.id === id) {
      return recordDimension.length;
    }
    return dimension.size;
  }

  hasVariable(name: string): boolean {
    return this.findVariable(name) !== undefined;
  }

  listVariables(): VariableInfo[] {
    this.requireOpen();
    return this.header.variables.map((variable) => ({
      name: variable.name,
      type: variable.type,
      dimensions: variable.dimensions.map((id) => ({
        name: this.dimensionName(id),
        size: this.dimensionSize(id),
      })),
      attributes: Object.fromEntries(
        variable.attributes.flatMap((attribute) => {
          const value = toAttributeValue(attribute.value);
          return value === undefined ? [] : [[attribute.name, value] as const];
        })
      ),
    }));
  }

  getVariable(name: string): Float64Array {
    const reader = this.requireOpen();
    const variable = this.findVariable(name);
    if (!variable) {
      throw new VariableNotFoundError(name, this.path);
    }
    const values = toFloat64(reader.getDataVariable(name));
    if (!values) {
      throw new ValidationError(`Variable '${name}' is not numeric (type ${variable.type})`, {
        source: this.path,
        variable: name,
        type: variable.type,
      });
    }
    return values;
  }

  getAttribute(variableName: string, attributeName: string): AttributeValue | undefined {
    const variable = this.findVariable(variableName);
    if (!variable) {
      throw new VariableNotFoundError(variableName, this.path);
    }
    const attribute = variable.attributes.find((candidate) => candidate.name === attributeName);
    return attribute === undefined ? undefined : toAttributeValue(attribute.value);
  }

  private stringAttribute(variableName: string, attributeName: string): string | undefined {
    const value = this.getAttribute(variableName, attributeName);
    return typeof value === 'string' ? value : undefined;
  }

  private numericAttribute(variableName: string, attributeName: string): number | undefined {
    const value = this.getAttribute(variableName, attributeName);
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'object' && value.length > 0) {
      return value[0];
    }
    return undefined;
  }

  /**
   * Read one data variable and its lon/lat/time coordinates as a GridDataset
   */
  readDataset(options: ReadDatasetOptions): GridDataset {
    this.requireOpen();
    const names: Record<AxisName, string> = {
      lon: options.lonName ?? 'lon',
      lat: options.latName ?? 'lat',
      time: options.timeName ?? 'time',
    };

    for (const name of [names.lon, names.lat, names.time, options.variable]) {
      if (!this.hasVariable(name)) {
        throw new DatasetOpenError(`${this.path} has no variable '${name}'`, this.path, {
          variable: name,
          required: [names.lon, names.lat, names.time, options.variable],
        });
      }
    }

    // Each coordinate is one-dimensional; its dimension tells us which axis
    // of the data variable it labels.
    const axisByDimension = new Map<number, AxisName>();
    for (const axis of ['lon', 'lat', 'time'] as const) {
      const coordinate = this.findVariable(names[axis]);
      if (!coordinate || coordinate.dimensions.length !== 1) {
        throw new DimensionMismatchError(`Coordinate '${names[axis]}' must be one-dimensional`, {
          source: this.path,
          variable: names[axis],
          dimensions: coordinate?.dimensions.map((id) => this.dimensionName(id)),
        });
      }
      axisByDimension.set(coordinate.dimensions[0], axis);
    }

    const data = this.findVariable(options.variable);
    const dimensionIds = data?.dimensions ?? [];
    const axisOrder = dimensionIds.map((id) => axisByDimension.get(id));
    if (axisOrder.length !== 3 || axisOrder.some((axis) => axis === undefined)) {
      throw new DimensionMismatchError(
        `Variable '${options.variable}' must be indexed by exactly ${names.lon}, ${names.lat} and ${names.time}`,
        {
          source: this.path,
          variable: options.variable,
          dimensions: dimensionIds.map((id) => this.dimensionName(id)),
        }
      );
    }

    const longitude = this.getVariable(names.lon);
    const latitude = this.getVariable(names.lat);
    const time = this.getVariable(names.time);

    const timeUnits = this.stringAttribute(names.time, 'units');
    if (timeUnits === undefined) {
      throw new DatasetOpenError(`Time variable '${names.time}' has no units attribute`, this.path, {
        variable: names.time,
      });
    }

    const fillValue =
      this.numericAttribute(options.variable, '_FillValue') ??
      this.numericAttribute(options.variable, 'missing_value');

    const dataset = createGridDataset({
      source: this.path,
      variable: options.variable,
      longitude,
      latitude,
      time,
      timeUnits,
      calendarAttribute: this.stringAttribute(names.time, 'calendar'),
      field: this.getVariable(options.variable),
      axisOrder: axisOrder.filter((axis): axis is AxisName => axis !== undefined),
      dimensionSizes: dimensionIds.map((id) => this.dimensionSize(id)),
      fillValue,
      units: this.stringAttribute(options.variable, 'units'),
      longName: this.stringAttribute(options.variable, 'long_name'),
    });

    logger.info('Read grid dataset', {
      source: this.path,
      variable: options.variable,
      axisOrder: dataset.axisOrder,
      shape: dataset.shape,
    });
    return dataset;
  }

  /**
   * Release the parsed file. Further reads fail with DatasetOpenError.
   */
  close(): void {
    this.reader = undefined;
  }
}

/**
 * GridSourcePort backed by NetCDF files on the local filesystem
 */
export const netcdfGridSource: GridSourcePort = {
  open: (path: string) => GridDatasetReader.open(path),
};
