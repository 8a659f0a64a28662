import type { GridSourcePort } from '@gridtrend/core';
import type { Logger } from '@gridtrend/utils';

/**
 * Logger surface workflows use. The utils Logger satisfies it; tests pass
 * plain mocks.
 */
export type WorkflowLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

export type WorkflowClock = {
  nowISO: () => string;
  nowMs: () => number;
};

/**
 * Everything a workflow touches outside its own inputs
 */
export type WorkflowContext = {
  source: GridSourcePort;
  logger: WorkflowLogger;
  clock: WorkflowClock;
};
