export { runPipeline } from './run.js';
export type { PipelineResult } from './types.js';
