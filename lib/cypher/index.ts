export { createResolver, resolve, extractRootField } from "./resolver";
export type { CypherResolver, ResolverOptions, ResolverPolicy } from "./resolver";
export { FALLBACK_CYPHER } from "./templates";
export { formatCypher } from "./formatter";
export { validateCypher } from "./validator";
export { FalkorDBEngine, executeCypher, toRow, toRowValue } from "./executor";
export type { ExecutionResult, FalkorDBOptions, GraphEngine } from "./executor";
