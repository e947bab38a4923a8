export { resolveTransform, createRegistry } from './registry.js';
export { TransformPipeline, projectRow } from './transform-pipeline.js';
export type { TransformOutcome, TransformPipelineOptions } from './transform-pipeline.js';
