import type { GeneratedQuery } from "@/types";
import { pickVariables, renderOperation } from "../document";
import { capitalize, pluralize, subtypeFilter } from "./shared";
import type { QueryGenerator } from "./shared";

/** Count roots are named after the singular root field: sensorCount, floorCount, ... */
export function countRoot(single: string): string {
  return `${single}Count`;
}

export const generateAggregateQuery: QueryGenerator = (input, ontology): GeneratedQuery => {
  if (!input.entityType) {
    const sensors = ontology.getObjectType("Sensor");
    const root = countRoot(sensors.single);
    return {
      query: renderOperation({ operationName: "CountSensors", root, variables: {} }),
      variables: {},
      operationName: "CountSensors",
      description: "Count all sensors",
      fields: ["count"],
    };
  }

  const entity = ontology.getEntity(input.entityType);
  const objectType = ontology.getObjectType(entity.objectType);
  const filter = subtypeFilter(entity);
  const variables = pickVariables(filter ? [[filter.arg, filter.value]] : []);
  const operationName = `Count${capitalize(objectType.collection)}`;

  return {
    query: renderOperation({
      operationName,
      root: countRoot(objectType.single),
      args: filter ? [{ name: filter.arg, variable: filter.arg }] : [],
      variables,
    }),
    variables,
    operationName,
    description: `Count ${pluralize(entity.name).toLowerCase()}`,
    fields: ["count"],
  };
};
