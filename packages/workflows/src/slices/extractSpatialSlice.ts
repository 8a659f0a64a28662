/**
 * Spatial Slice Workflow
 *
 * The field at one time step, ready for a heat map.
 */

import { z } from 'zod';
import {
  formatCalendarDate,
  parseTimeUnits,
  sliceAtTime,
  toCalendarDates,
  withGridFile,
  type CalendarName,
} from '@gridtrend/core';
import { CalendarSchema, CoordinateNamesSchema, parseSpec } from '../spec.js';
import type { WorkflowContext } from '../types.js';

export const SpatialSliceSpecSchema = z.object({
  path: z.string().min(1),
  variable: z.string().min(1),
  calendar: CalendarSchema,
  timeIndex: z.number().int().nonnegative(),
  coordinates: CoordinateNamesSchema.optional(),
});

export type SpatialSliceSpec = z.infer<typeof SpatialSliceSpecSchema>;

export type SpatialSliceResult = {
  source: string;
  variable: string;
  units?: string;
  calendar: CalendarName;
  timeIndex: number;
  date: string;
  longitude: number[];
  latitude: number[];
  values: Array<Array<number | null>>; // values[lat][lon], null where missing
  generatedAt: string;
};

export async function extractSpatialSlice(
  spec: SpatialSliceSpec,
  ctx: WorkflowContext
): Promise<SpatialSliceResult> {
  const validated = parseSpec(SpatialSliceSpecSchema, spec, 'spatial slice');

  const dataset = withGridFile(ctx.source, validated.path, (handle) =>
    handle.readDataset({
      variable: validated.variable,
      lonName: validated.coordinates?.lon,
      latName: validated.coordinates?.lat,
      timeName: validated.coordinates?.time,
    })
  );
  const units = parseTimeUnits(dataset.timeUnits);
  const axis = toCalendarDates(
    dataset.time,
    units.originYear,
    units.originMonth,
    units.originDay,
    units.unit,
    validated.calendar
  );
  const slice = sliceAtTime(dataset, axis, validated.timeIndex);

  ctx.logger.info('Spatial slice extracted', {
    source: validated.path,
    variable: validated.variable,
    timeIndex: validated.timeIndex,
  });

  return {
    source: dataset.source,
    variable: dataset.variable,
    units: dataset.units,
    calendar: validated.calendar,
    timeIndex: slice.timeIndex,
    date: formatCalendarDate(slice.date),
    longitude: [...slice.longitude],
    latitude: [...slice.latitude],
    values: slice.values.map((row) => [...row]),
    generatedAt: ctx.clock.nowISO(),
  };
}
