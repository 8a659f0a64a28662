/**
 * Command Context - settings and lazily created workflow context
 *
 * Handlers never build the grid source or logger themselves; they ask the
 * context. Tests pass a WorkflowContext over in-memory grids.
 */

import type { GridSettings } from '@gridtrend/utils';
import { createProductionContext, type WorkflowContext } from '@gridtrend/workflows';

export interface CommandContextOptions {
  settings: GridSettings;
  /**
   * Override the workflow context (for testing)
   */
  workflowsOverride?: WorkflowContext;
}

export class CommandContext {
  readonly settings: GridSettings;
  private workflowContext: WorkflowContext | undefined;

  constructor(options: CommandContextOptions) {
    this.settings = options.settings;
    this.workflowContext = options.workflowsOverride;
  }

  get workflows(): WorkflowContext {
    if (!this.workflowContext) {
      this.workflowContext = createProductionContext();
    }
    return this.workflowContext;
  }

  /**
   * Coordinate variable names in the shape the workflow specs take
   */
  get coordinates(): { lon: string; lat: string; time: string } {
    return { ...this.settings.coordinates };
  }
}
