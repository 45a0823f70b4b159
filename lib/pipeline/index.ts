export { createPipeline, LOW_CONFIDENCE_THRESHOLD } from "./pipeline";
export type { Pipeline, PipelineOptions } from "./pipeline";
export { createRuntime } from "./setup";
export type { Runtime, RuntimeOptions } from "./setup";
