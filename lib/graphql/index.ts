export { generate, generateQuery } from "./generator";
export { getGeneratorForIntent } from "./registry";
export { renderOperation } from "./document";
export type { GenerationInput, QueryGenerator } from "./operations/shared";
