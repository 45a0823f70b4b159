import type { GeneratedQuery } from "@/types";
import { renderOperation } from "../document";
import type { QueryGenerator } from "./shared";

const OVERVIEW_FIELDS = ["id", "name", "address"];

// Path questions and unclear intents both degrade to the building listing
export const generateOverviewQuery: QueryGenerator = (_input, ontology): GeneratedQuery => ({
  query: renderOperation({
    operationName: "Overview",
    root: ontology.getObjectType("Building").collection,
    variables: {},
    selection: OVERVIEW_FIELDS,
  }),
  variables: {},
  operationName: "Overview",
  description: "Building overview",
  fields: OVERVIEW_FIELDS,
});
