import type { GridSourcePort } from '@gridtrend/core';
import { netcdfGridSource } from '@gridtrend/adapters-netcdf';
import { createPackageLogger } from '@gridtrend/utils';
import type { WorkflowClock, WorkflowContext, WorkflowLogger } from '../types.js';

// Re-export WorkflowContext for convenience
export type { WorkflowContext } from '../types.js';

export interface ProductionContextConfig {
  /**
   * Optional logger override (defaults to the workflows package logger)
   */
  logger?: WorkflowLogger;

  /**
   * Optional clock override (for testing)
   */
  clock?: WorkflowClock;

  /**
   * Optional grid source override (defaults to NetCDF files on disk)
   */
  source?: GridSourcePort;
}

/**
 * Create a production WorkflowContext with real dependencies
 */
export function createProductionContext(config: ProductionContextConfig = {}): WorkflowContext {
  return {
    source: config.source ?? netcdfGridSource,
    logger: config.logger ?? createPackageLogger('@gridtrend/workflows'),
    // Composition root: the only place wall-clock time is read
    clock: config.clock ?? { nowISO: () => new Date().toISOString(), nowMs: () => Date.now() },
  };
}
