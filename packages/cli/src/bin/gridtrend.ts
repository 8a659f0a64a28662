#!/usr/bin/env node

/**
 * gridtrend CLI Entry Point
 *
 * Importing a command module registers its definitions in commandRegistry;
 * its register function adds the Commander options and wires them to execute().
 */

import { program } from 'commander';
import { logger } from '@gridtrend/utils';
import { handleError } from '../core/error-handler.js';
import { registerGridCommands } from '../commands/grid.js';

program
  .name('gridtrend')
  .description('Regional time series, annual means and trends from gridded climate model output')
  .version('0.1.0');

registerGridCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
