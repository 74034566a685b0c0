export { AnalysisPipeline, type AnalysisPipelineOptions } from './AnalysisPipeline.js';
export { createAnalysisPipeline } from './createAnalysisPipeline.js';
export { toAnalysisResponse, AI_FLAG_THRESHOLD } from './reportSerializer.js';
export type { AnalysisInput, AnalysisReport, AnalysisResponse } from './types.js';
