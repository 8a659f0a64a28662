/**
 * Grid Command Definitions
 *
 * Option schemas for `gridtrend grid ...`. Keys are the camelCase names
 * Commander gives the flags. Output format and coordinate name flags are
 * read by the executor, not here.
 */

import { z } from 'zod';
import { CALENDAR_NAMES } from '@gridtrend/core';

const fileOption = z.string().min(1, 'a file path is required');
const variableOption = z.string().min(1).default('TS');
const calendarOption = z.enum(CALENDAR_NAMES);

const regionOptions = {
  variable: variableOption,
  calendar: calendarOption,
  lonMin: z.coerce.number().finite(),
  lonMax: z.coerce.number().finite(),
  latMin: z.coerce.number().finite(),
  latMax: z.coerce.number().finite(),
  boundsConvention: z.enum(['0-360', '-180-180']).optional(),
};

/**
 * Inspect schema
 */
export const inspectSchema = z.object({
  file: fileOption,
});

export type InspectArgs = z.infer<typeof inspectSchema>;

/**
 * Series schema
 */
export const seriesSchema = z.object({
  file: fileOption,
  label: z.string().min(1).optional(),
  ...regionOptions,
});

export type SeriesArgs = z.infer<typeof seriesSchema>;

/**
 * Slice schema
 */
export const sliceSchema = z.object({
  file: fileOption,
  variable: variableOption,
  calendar: calendarOption,
  timeIndex: z.coerce.number().int().nonnegative().default(0),
});

export type SliceArgs = z.infer<typeof sliceSchema>;

/**
 * `label=path` pair given to --run
 */
export const runOptionSchema = z.string().transform((value, ctx) => {
  const separator = value.indexOf('=');
  if (separator <= 0 || separator === value.length - 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected label=path, got '${value}'` });
    return z.NEVER;
  }
  return { label: value.slice(0, separator), path: value.slice(separator + 1) };
});

/**
 * Compare schema
 */
export const compareSchema = z.object({
  run: z.array(runOptionSchema).min(1, 'at least one --run label=path is required'),
  ...regionOptions,
});

export type CompareArgs = z.infer<typeof compareSchema>;
