import type { IntentKind } from "@/types";
import { generateAggregateQuery } from "./operations/aggregate";
import { generateListQuery } from "./operations/list";
import { generateOverviewQuery } from "./operations/overview";
import { generateSingleQuery } from "./operations/single";
import { generateTraversalQuery } from "./operations/traverse";
import type { QueryGenerator } from "./operations/shared";

const OPERATION_REGISTRY: Record<IntentKind, QueryGenerator> = {
  entity: generateSingleQuery,
  list: generateListQuery,
  traverse: generateTraversalQuery,
  aggregate: generateAggregateQuery,
  path: generateOverviewQuery,
  unknown: generateOverviewQuery,
};

export function getGeneratorForIntent(kind: IntentKind): QueryGenerator {
  return OPERATION_REGISTRY[kind];
}
