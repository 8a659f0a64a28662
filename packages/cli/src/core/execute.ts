/**
 * Universal Command Executor
 *
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Resolve settings (flags, gridtrend.yaml, environment, defaults)
 * - Call handler
 * - Format output
 * - Error handling
 */

import { z } from 'zod';
import { OutputFormatSchema, resolveSettings, type FileConfig } from '@gridtrend/utils';
import type { WorkflowContext } from '@gridtrend/workflows';
import type { CommandDefinition } from '../types/index.js';
import { normalizeOptions, parseArguments } from './argument-parser.js';
import { CommandContext } from './command-context.js';
import { handleError } from './error-handler.js';
import { formatOutput } from './output-formatter.js';

/**
 * Flags every command accepts that feed settings rather than the handler
 */
const SettingsFlagsSchema = z.object({
  format: OutputFormatSchema.optional(),
  lonName: z.string().min(1).optional(),
  latName: z.string().min(1).optional(),
  timeName: z.string().min(1).optional(),
});

export interface RunCommandOptions {
  workflows?: WorkflowContext;
  file?: FileConfig;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate, run and format one command. Errors propagate.
 */
export async function runCommand(
  commandDef: CommandDefinition,
  rawOptions: Record<string, unknown>,
  options: RunCommandOptions = {}
): Promise<string> {
  const normalized = normalizeOptions(rawOptions);
  const args = parseArguments(commandDef.schema, normalized);
  const flags = parseArguments(SettingsFlagsSchema, normalized);

  const settings = resolveSettings(
    {
      format: flags.format,
      coordinates: { lon: flags.lonName, lat: flags.latName, time: flags.timeName },
    },
    { file: options.file, env: options.env }
  );

  const ctx = new CommandContext({ settings, workflowsOverride: options.workflows });
  const result = await commandDef.handler(args, ctx);
  return formatOutput(result, settings.format, (value) => commandDef.toRows(value));
}

/**
 * Execute a command from Commander: print its output, or log the error and
 * exit non-zero with a one-line message.
 */
export async function execute(commandDef: CommandDefinition, rawOptions: Record<string, unknown>): Promise<void> {
  try {
    const output = await runCommand(commandDef, rawOptions);
    console.log(output);
  } catch (error) {
    const message = handleError(error, { command: commandDef.name });
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}
