/**
 * CLI Types
 */

import type { z } from 'zod';
import type { OutputFormat } from '@gridtrend/utils';
import type { CommandContext } from '../core/command-context.js';

export type { OutputFormat };

/**
 * One line of table or CSV output
 */
export type OutputRow = Record<string, string | number | null>;

/**
 * Command definition
 *
 * `handler` receives the schema's parsed output. `toRows` flattens the
 * handler's result for table and CSV output; JSON output prints the
 * result itself.
 */
export interface CommandDefinition<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> {
  name: string;
  description: string;
  schema: S;
  handler(args: z.output<S>, ctx: CommandContext): Promise<R>;
  toRows(result: R): OutputRow[];
  examples?: string[];
}

/**
 * Package command module
 */
export interface PackageCommandModule {
  packageName: string;
  description: string;
  commands: CommandDefinition[];
}
