/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@gridtrend/utils';

/**
 * Commander's camelCase key back to the flag the user typed
 */
export function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(schema: T, rawArgs: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(rawArgs);
  if (parsed.success) {
    return parsed.data;
  }

  const messages = parsed.error.issues.map((issue) => {
    const [first, ...rest] = issue.path;
    const flag = typeof first === 'string' ? toFlag(first) : String(first ?? 'arguments');
    return `${[flag, ...rest].join('.')}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments: ${messages.join('; ')}`, {
    issues: messages,
  });
}

/**
 * Drop options Commander left undefined so schema defaults apply
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined && value !== null));
}
