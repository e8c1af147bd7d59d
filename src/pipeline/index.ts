export { ZeroClickPipeline, processSearchAnalyticsPage } from './zero-click-pipeline';
export { summarizeRun } from './summary';
export type { PipelineOutcome, PipelineResult } from './zero-click-pipeline';
export type { RunSummary } from './summary';
