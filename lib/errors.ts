// Error types raised at the edges of the query compiler

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class CatalogueError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`${source}: ${message}`);
    this.name = "CatalogueError";
  }
}

export class GraphConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphConnectionError";
  }
}

export class GraphQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphQueryError";
  }
}

/** Raised by the resolver under the "error" policy when no query shape matches. */
export class UnresolvedQueryError extends Error {
  constructor(public readonly rootField: string | null) {
    super(rootField ? `No Cypher template for root field "${rootField}"` : "Query has no root selection");
    this.name = "UnresolvedQueryError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
