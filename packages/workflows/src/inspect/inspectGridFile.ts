/**
 * Grid File Inspection Workflow
 *
 * Lists the variables of a file and describes its coordinates, so a caller
 * can pick the variable, the calendar and bounds in the right longitude
 * convention before running a series.
 */

import { z } from 'zod';
import {
  detectLongitudeConvention,
  resolveCalendarName,
  withGridFile,
  type AttributeValue,
  type CalendarName,
  type GridFileHandle,
  type LongitudeConvention,
} from '@gridtrend/core';
import { CoordinateNamesSchema, parseSpec } from '../spec.js';
import type { WorkflowContext } from '../types.js';

export const InspectGridFileSpecSchema = z.object({
  path: z.string().min(1),
  coordinates: CoordinateNamesSchema.optional(),
});

export type InspectGridFileSpec = z.infer<typeof InspectGridFileSpecSchema>;

export type InspectGridFileResult = {
  source: string;
  variables: Array<{
    name: string;
    type: string;
    dimensions: Array<{ name: string; size: number }>;
    attributes: Record<string, string | number | number[]>;
  }>;
  longitude?: { count: number; min: number; max: number; convention: LongitudeConvention };
  latitude?: { count: number; min: number; max: number };
  time?: {
    count: number;
    units?: string;
    calendarAttribute?: string;
    /** Calendar the attribute names, when it is one the pipeline supports */
    suggestedCalendar?: CalendarName;
  };
  generatedAt: string;
};

function plainAttribute(value: AttributeValue): string | number | number[] {
  return typeof value === 'object' ? [...value] : value;
}

function coordinateRange(handle: GridFileHandle, name: string): Float64Array | undefined {
  const known = handle.listVariables().some((variable) => variable.name === name);
  return known ? handle.getVariable(name) : undefined;
}

function extent(values: Float64Array): { count: number; min: number; max: number } {
  return { count: values.length, min: Math.min(...values), max: Math.max(...values) };
}

export async function inspectGridFile(
  spec: InspectGridFileSpec,
  ctx: WorkflowContext
): Promise<InspectGridFileResult> {
  const validated = parseSpec(InspectGridFileSpecSchema, spec, 'inspect');
  const names = {
    lon: validated.coordinates?.lon ?? 'lon',
    lat: validated.coordinates?.lat ?? 'lat',
    time: validated.coordinates?.time ?? 'time',
  };

  const result = withGridFile(ctx.source, validated.path, (handle): InspectGridFileResult => {
    const variables = handle.listVariables().map((variable) => ({
      name: variable.name,
      type: variable.type,
      dimensions: variable.dimensions,
      attributes: Object.fromEntries(
        Object.entries(variable.attributes).map(([key, value]) => [key, plainAttribute(value)] as const)
      ),
    }));

    const lon = coordinateRange(handle, names.lon);
    const lat = coordinateRange(handle, names.lat);
    const time = coordinateRange(handle, names.time);

    let timeInfo: InspectGridFileResult['time'];
    if (time) {
      const units = handle.getAttribute(names.time, 'units');
      const calendar = handle.getAttribute(names.time, 'calendar');
      const calendarAttribute = typeof calendar === 'string' ? calendar : undefined;
      timeInfo = {
        count: time.length,
        units: typeof units === 'string' ? units : undefined,
        calendarAttribute,
        suggestedCalendar: resolveCalendarName(calendarAttribute),
      };
    }

    return {
      source: handle.path,
      variables,
      longitude: lon ? { ...extent(lon), convention: detectLongitudeConvention(lon) } : undefined,
      latitude: lat ? extent(lat) : undefined,
      time: timeInfo,
      generatedAt: ctx.clock.nowISO(),
    };
  });

  ctx.logger.info('Grid file inspected', { source: validated.path, variables: result.variables.length });
  return result;
}
