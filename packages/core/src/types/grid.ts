/**
 * Gridded dataset domain types
 *
 * All records are immutable value objects created once per pipeline run.
 */

/**
 * Spatial/temporal axis of a gridded field
 */
export type AxisName = 'lon' | 'lat' | 'time';

export const AXIS_NAMES: readonly AxisName[] = ['lon', 'lat', 'time'];

/**
 * Attribute value as stored in a self-describing array file
 */
export type AttributeValue = string | number | readonly number[];

/**
 * The part of a dataset that aggregation needs: a flat field plus the axis
 * order it was stored in. The order is recorded, never assumed.
 */
export interface GridField {
  /** Values in row-major order of `axisOrder` (last axis varies fastest) */
  readonly field: Float64Array;
  readonly axisOrder: readonly AxisName[];
  /** Axis sizes keyed by axis name */
  readonly shape: Readonly<Record<AxisName, number>>;
  readonly fillValue: number | undefined;
}

export interface GridDataset extends GridField {
  /** Path (or label) the dataset was read from */
  readonly source: string;
  /** Name of the data variable, e.g. `TS` */
  readonly variable: string;
  readonly longitude: Float64Array;
  readonly latitude: Float64Array;
  /** Raw time offsets, in the unit named by `timeUnits` */
  readonly time: Float64Array;
  readonly timeUnits: string;
  /** The file's own `calendar` attribute on the time variable, if any */
  readonly calendarAttribute: string | undefined;
  readonly units: string | undefined;
  readonly longName: string | undefined;
}

export type TimeUnit = 'day' | 'hour';

export interface ParsedTimeUnits {
  unit: TimeUnit;
  originYear: number;
  originMonth: number;
  originDay: number;
}

/**
 * Calendar policy used to turn raw offsets into dates.
 *
 * - `standard`: Gregorian, leap years observed
 * - `noLeap`: every year has 365 days, Feb 29 never occurs
 * - `day360`: twelve 30-day months
 */
export type CalendarName = 'standard' | 'noLeap' | 'day360';

export const CALENDAR_NAMES = ['standard', 'noLeap', 'day360'] as const;

/**
 * A date in a model calendar. Not a JS Date: a 360-day calendar has dates
 * (Feb 30) that no Gregorian type can represent.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export interface CalendarTimeAxis {
  readonly calendar: CalendarName;
  readonly dates: readonly CalendarDate[];
}

/**
 * Inclusive region bounds in the dataset's longitude convention.
 * `lonMin > lonMax` selects a band that wraps through the seam.
 */
export interface RegionSelection {
  lonMin: number;
  lonMax: number;
  latMin: number;
  latMax: number;
}

export interface RegionIndices {
  readonly lonIndices: readonly number[];
  readonly latIndices: readonly number[];
}

export type LongitudeConvention = '0-360' | '-180-180' | 'ambiguous';

export interface TimeSeries {
  readonly dates: readonly CalendarDate[];
  readonly values: readonly number[];
}

export interface AnnualSeries {
  readonly year: readonly number[];
  readonly meanValue: readonly number[];
}

export interface TrendLine {
  /** Change per year */
  readonly slope: number;
  readonly intercept: number;
  /** Trend value at each year of the fitted series */
  readonly fitted: readonly number[];
}

/**
 * One time step of the field laid out for a heat map: `values[lat][lon]`,
 * missing cells as `null`.
 */
export interface SpatialSlice {
  readonly timeIndex: number;
  readonly date: CalendarDate;
  readonly longitude: readonly number[];
  readonly latitude: readonly number[];
  readonly values: ReadonlyArray<ReadonlyArray<number | null>>;
}

/**
 * Description of one variable in a grid file
 */
export interface VariableInfo {
  name: string;
  dimensions: Array<{ name: string; size: number }>;
  type: string;
  attributes: Record<string, AttributeValue>;
}

export interface ReadDatasetOptions {
  variable: string;
  lonName?: string;
  latName?: string;
  timeName?: string;
}
