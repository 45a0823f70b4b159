// Brick catalogue: loading, validation and lookups

export { Ontology, INTENT_PRIORITY } from "./ontology";
export type { Catalogue, KeywordIntent, LiteralParameter } from "./ontology";
export { loadOntology, parseCatalogue, DEFAULT_CATALOGUE_PATH } from "./loader";
