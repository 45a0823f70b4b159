import type { GeneratedQuery, Scalar } from "@/types";
import { pickVariables, renderOperation } from "../document";
import { capitalize, pluralize, selectFields, subtypeFilter } from "./shared";
import type { QueryGenerator } from "./shared";

const BUILDING_LIST_FIELDS = ["id", "name", "address"];

export const generateListQuery: QueryGenerator = (input, ontology): GeneratedQuery => {
  if (!input.entityType) {
    const buildings = ontology.getObjectType("Building");
    return {
      query: renderOperation({
        operationName: "ListBuildings",
        root: buildings.collection,
        variables: {},
        selection: BUILDING_LIST_FIELDS,
      }),
      variables: {},
      operationName: "ListBuildings",
      description: "List all buildings",
      fields: BUILDING_LIST_FIELDS,
    };
  }

  const entity = ontology.getEntity(input.entityType);
  const objectType = ontology.getObjectType(entity.objectType);
  const fields = selectFields(ontology, entity.type, input.requestedFields);
  const filter = subtypeFilter(entity);

  const args = [{ name: "buildingId", variable: "buildingId" }];
  const entries: Array<[string, Scalar | undefined]> = [["buildingId", input.parameters.building_id]];
  if (filter) {
    args.unshift({ name: filter.arg, variable: filter.arg });
    entries.unshift([filter.arg, filter.value]);
  }
  const variables = pickVariables(entries);
  const operationName = `List${capitalize(objectType.collection)}`;

  return {
    query: renderOperation({ operationName, root: objectType.collection, args, variables, selection: fields }),
    variables,
    operationName,
    description: `List all ${pluralize(entity.name).toLowerCase()}`,
    fields,
  };
};
