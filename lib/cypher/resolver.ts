import { UnresolvedQueryError } from "@/lib/errors";
import type { Ontology } from "@/lib/ontology";
import type { ObjectTypeName, ParameterMap, ResolvedQuery } from "@/types";
import {
  FALLBACK_CYPHER,
  buildingCountTemplate,
  buildingTemplate,
  buildingsTemplate,
  equipmentCountTemplate,
  equipmentTemplate,
  floorCountTemplate,
  floorsTemplate,
  meterCountTemplate,
  metersTemplate,
  sensorCountTemplate,
  sensorsTemplate,
  systemCountTemplate,
  systemsTemplate,
  timeseriesCountTemplate,
  timeseriesTemplate,
  zoneCountTemplate,
  zonesTemplate,
} from "./templates";
import type { CypherTemplate } from "./templates";

export type ResolverPolicy = "fallback" | "error";

export interface ResolverOptions {
  policy?: ResolverPolicy;
}

interface ShapeEntry {
  name: string;
  roots: string[]; // lower-case root field names
  singleRoot?: string; // the root that asks for one entity
  template: CypherTemplate;
}

/**
 * Detection order. Collection shapes also answer their singular root field,
 * so a single floor lookup reuses the floors template with LIMIT 1.
 */
function buildShapeTable(ontology: Ontology): ShapeEntry[] {
  const objectType = (name: ObjectTypeName) => ontology.getObjectType(name);
  const collection = (name: ObjectTypeName, template: CypherTemplate): ShapeEntry => {
    const { single, collection: plural } = objectType(name);
    return {
      name: plural,
      roots: Array.from(new Set([plural.toLowerCase(), single.toLowerCase()])),
      singleRoot: single !== plural ? single.toLowerCase() : undefined,
      template,
    };
  };
  const count = (name: ObjectTypeName, template: CypherTemplate): ShapeEntry => {
    const root = `${objectType(name).single}Count`;
    return { name: root, roots: [root.toLowerCase()], template };
  };

  const building = objectType("Building");
  return [
    { name: building.single, roots: [building.single.toLowerCase()], template: buildingTemplate },
    { name: building.collection, roots: [building.collection.toLowerCase()], template: buildingsTemplate },
    collection("Floor", floorsTemplate),
    collection("HVACZone", zonesTemplate),
    collection("System", systemsTemplate),
    collection("Equipment", equipmentTemplate),
    collection("Sensor", sensorsTemplate),
    collection("Meter", metersTemplate),
    collection("Timeseries", timeseriesTemplate),
    count("Sensor", sensorCountTemplate),
    count("Equipment", equipmentCountTemplate),
    count("Floor", floorCountTemplate),
    count("HVACZone", zoneCountTemplate),
    count("System", systemCountTemplate),
    count("Meter", meterCountTemplate),
    count("Building", buildingCountTemplate),
    count("Timeseries", timeseriesCountTemplate),
  ];
}

/** First field inside the operation's selection set; nested fields never count. */
export function extractRootField(queryText: string): string | null {
  const withoutComments = queryText.replace(/#[^\n]*/g, "");
  const open = withoutComments.indexOf("{");
  if (open === -1) {
    return null;
  }
  const match = withoutComments.slice(open + 1).match(/^\s*([A-Za-z_]\w*)/);
  return match ? match[1] : null;
}

// Every non-empty scalar variable is passed through under its own key
function echoVariables(variables: ParameterMap): ParameterMap {
  const echoed: ParameterMap = {};
  for (const [key, value] of Object.entries(variables)) {
    if (value !== "" && (typeof value === "string" || typeof value === "number" || typeof value === "boolean")) {
      echoed[key] = value;
    }
  }
  return echoed;
}

export interface CypherResolver {
  resolve(queryText: string, variables?: ParameterMap): ResolvedQuery;
  readonly policy: ResolverPolicy;
}

export function createResolver(ontology: Ontology, options: ResolverOptions = {}): CypherResolver {
  const policy = options.policy ?? "fallback";
  const table = buildShapeTable(ontology);

  return {
    policy,
    resolve(queryText: string, variables: ParameterMap = {}): ResolvedQuery {
      const root = extractRootField(queryText);
      const wanted = root?.toLowerCase();
      const entry = wanted ? table.find(e => e.roots.includes(wanted)) : undefined;

      if (!entry || !wanted) {
        if (policy === "error") {
          throw new UnresolvedQueryError(root);
        }
        console.warn(`[Resolver] No template for root field "${root ?? ""}", using node-count fallback`);
        return {
          cypher: FALLBACK_CYPHER,
          parameters: {},
          description: "Node counts by type",
          fallback: true,
        };
      }

      const output = entry.template({
        ontology,
        variables,
        single: entry.singleRoot === wanted,
      });

      return {
        cypher: output.cypher,
        parameters: { ...echoVariables(variables), ...output.parameters },
        description: output.description,
        fallback: false,
      };
    },
  };
}

export function resolve(
  ontology: Ontology,
  queryText: string,
  variables: ParameterMap = {},
  options: ResolverOptions = {}
): ResolvedQuery {
  return createResolver(ontology, options).resolve(queryText, variables);
}
