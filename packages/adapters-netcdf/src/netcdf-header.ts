/**
 * NetCDF header shapes
 *
 * netcdfjs exposes the parsed header as plain objects; they are validated
 * here once so the reader works with typed records only.
 */

import { z } from 'zod';
import type { AttributeValue } from '@gridtrend/core';

export const NetcdfDimensionSchema = z.object({
  name: z.string(),
  size: z.number().int().nonnegative(),
});

export const NetcdfAttributeSchema = z.object({
  name: z.string(),
  type: z.string(),
  value: z.unknown(),
});

export const NetcdfVariableSchema = z.object({
  name: z.string(),
  dimensions: z.array(z.number().int().nonnegative()),
  attributes: z.array(NetcdfAttributeSchema),
  type: z.string(),
  record: z.boolean().optional(),
});

export const NetcdfRecordDimensionSchema = z.object({
  id: z.number().int().optional(),
  name: z.string().optional(),
  length: z.number().int().nonnegative(),
});

export type NetcdfDimension = z.infer<typeof NetcdfDimensionSchema>;
export type NetcdfAttribute = z.infer<typeof NetcdfAttributeSchema>;
export type NetcdfVariable = z.infer<typeof NetcdfVariableSchema>;
export type NetcdfRecordDimension = z.infer<typeof NetcdfRecordDimensionSchema>;

export interface NetcdfHeader {
  dimensions: NetcdfDimension[];
  variables: NetcdfVariable[];
  recordDimension: NetcdfRecordDimension;
}

/**
 * Normalize a raw attribute value. Strings keep their text, single numbers
 * stay scalar, numeric arrays stay arrays; anything else is dropped.
 */
export function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is number => typeof item === 'number')) {
    return Object.freeze([...value]);
  }
  return undefined;
}

/**
 * Flatten variable data into a Float64Array. Record variables come back as
 * one array per record; those are concatenated in record order.
 */
export function toFloat64(data: unknown): Float64Array | undefined {
  if (!Array.isArray(data)) {
    return undefined;
  }
  const values: number[] = [];
  for (const item of data) {
    if (typeof item === 'number') {
      values.push(item);
    } else if (Array.isArray(item)) {
      for (const inner of item) {
        if (typeof inner !== 'number') {
          return undefined;
        }
        values.push(inner);
      }
    } else {
      return undefined;
    }
  }
  return Float64Array.from(values);
}
