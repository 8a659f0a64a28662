/**
 * @gridtrend/workflows - Pipeline orchestration
 *
 * Each workflow validates its spec, reads through the WorkflowContext's
 * grid source and returns a JSON-serializable result.
 */

export type { WorkflowContext, WorkflowLogger, WorkflowClock } from './types.js';
export { parseSpec, BoundsSchema, CalendarSchema, CoordinateNamesSchema } from './spec.js';

export { analyzeRegion } from './regional/analyzeRegion.js';
export type { RegionAnalysis, RegionAnalysisInput } from './regional/analyzeRegion.js';

export { runRegionalSeries, RegionalSeriesSpecSchema, toRegionalSeriesResult } from './regional/runRegionalSeries.js';
export type { RegionalSeriesSpec, RegionalSeriesResult, TrendResult } from './regional/runRegionalSeries.js';

export { compareScenarios, CompareScenariosSpecSchema } from './regional/compareScenarios.js';
export type { CompareScenariosSpec, CompareScenariosResult } from './regional/compareScenarios.js';

export { extractSpatialSlice, SpatialSliceSpecSchema } from './slices/extractSpatialSlice.js';
export type { SpatialSliceSpec, SpatialSliceResult } from './slices/extractSpatialSlice.js';

export { inspectGridFile, InspectGridFileSpecSchema } from './inspect/inspectGridFile.js';
export type { InspectGridFileSpec, InspectGridFileResult } from './inspect/inspectGridFile.js';

export { createProductionContext } from './context/createProductionContext.js';
export type { ProductionContextConfig } from './context/createProductionContext.js';

export { createMemoryGridSource } from './dev/memoryGridSource.js';
export type { MemoryGridSource } from './dev/memoryGridSource.js';
