/**
 * Shared workflow spec schemas
 */

import { z } from 'zod';
import { CALENDAR_NAMES } from '@gridtrend/core';
import { ValidationError } from '@gridtrend/utils';

export const CalendarSchema = z.enum(CALENDAR_NAMES);

export const BoundsSchema = z
  .object({
    lonMin: z.number().finite(),
    lonMax: z.number().finite(),
    latMin: z.number().finite().min(-90).max(90),
    latMax: z.number().finite().min(-90).max(90),
  })
  .refine((bounds) => bounds.latMin <= bounds.latMax, {
    message: 'latMin must not be greater than latMax',
    path: ['latMin'],
  });

export const CoordinateNamesSchema = z
  .object({
    lon: z.string().min(1),
    lat: z.string().min(1),
    time: z.string().min(1),
  })
  .partial();

/**
 * Parse a workflow spec, reporting schema failures as ValidationError
 */
export function parseSpec<S extends z.ZodTypeAny>(schema: S, spec: unknown, workflow: string): z.output<S> {
  const parsed = schema.safeParse(spec);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid ${workflow} spec: ${issues.join('; ')}`, { workflow, issues });
  }
  return parsed.data;
}
