import type { GeneratedQuery } from "@/types";
import { pickVariables, renderOperation } from "../document";
import { capitalize, nameParameter, selectFields } from "./shared";
import type { QueryGenerator } from "./shared";

// Without an entity type the lookup targets the building
export const generateSingleQuery: QueryGenerator = (input, ontology): GeneratedQuery => {
  const entity = ontology.getEntity(input.entityType ?? "Building");
  const objectType = ontology.getObjectType(entity.objectType);
  const fields = selectFields(ontology, entity.type, input.requestedFields);

  const variables = pickVariables([
    ["id", input.parameters.id],
    ["name", nameParameter(entity, input.parameters)],
  ]);
  const operationName = `Get${capitalize(objectType.single)}`;

  return {
    query: renderOperation({
      operationName,
      root: objectType.single,
      args: [
        { name: "id", variable: "id" },
        { name: "name", variable: "name" },
      ],
      variables,
      selection: fields,
    }),
    variables,
    operationName,
    description: `Get ${entity.name} by ID or name`,
    fields,
  };
};
