/**
 * @gridtrend/cli - command line interface
 */

export { CommandRegistry, commandRegistry } from './core/command-registry.js';
export { CommandContext } from './core/command-context.js';
export type { CommandContextOptions } from './core/command-context.js';
export { runCommand, execute } from './core/execute.js';
export type { RunCommandOptions } from './core/execute.js';
export { formatJSON, formatTable, formatCSV, formatOutput } from './core/output-formatter.js';
export { formatError, handleError } from './core/error-handler.js';
export { parseArguments, normalizeOptions, toFlag } from './core/argument-parser.js';
export { registerGridCommands, gridModule } from './commands/grid.js';
export type { CommandDefinition, PackageCommandModule, OutputRow, OutputFormat } from './types/index.js';
