// Cypher execution against FalkorDB over the redis client's graph commands

import { createClient, Graph } from "redis";
import { GraphConnectionError, GraphQueryError, errorMessage } from "@/lib/errors";
import type { ParameterMap, Row, RowValue } from "@/types";

export interface GraphEngine {
  query(cypher: string, parameters: ParameterMap, timeoutMs: number): Promise<Row[]>;
  close(): Promise<void>;
}

export interface FalkorDBOptions {
  host: string;
  port: number;
  graph: string;
  password?: string;
  connectTimeoutMs?: number;
}

export interface ExecutionResult {
  rows: Row[] | null;
  latency_ms: number;
  row_count: number;
  error?: string;
  connection_error?: boolean;
}

type RedisClient = ReturnType<typeof createClient>;

const CONNECTION_PATTERN = /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|EHOSTUNREACH|socket closed|connection timeout|client is closed/i;

/** Graph entities become their property maps; everything else is copied structurally. */
export function toRowValue(value: unknown): RowValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toRowValue);
  }
  if (typeof value === "object") {
    if ("properties" in value && ("labels" in value || "relationshipType" in value || "type" in value)) {
      return toRowValue(value.properties);
    }
    const out: { [key: string]: RowValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toRowValue(inner);
    }
    return out;
  }
  return String(value);
}

export function toRow(record: unknown): Row {
  const value = toRowValue(record);
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return value;
  }
  return { value };
}

export class FalkorDBEngine implements GraphEngine {
  private client: RedisClient | null = null;
  private connecting: Promise<Graph> | null = null;

  constructor(private readonly options: FalkorDBOptions) {}

  private async connect(): Promise<Graph> {
    const { host, port, password, graph, connectTimeoutMs } = this.options;
    const client = createClient({
      socket: { host, port, connectTimeout: connectTimeoutMs ?? 5000, reconnectStrategy: false },
      password,
    });
    client.on("error", error => {
      console.error(`[FalkorDB] Client error: ${errorMessage(error)}`);
    });

    try {
      await client.connect();
    } catch (error) {
      throw new GraphConnectionError(`Could not connect to FalkorDB at ${host}:${port}: ${errorMessage(error)}`);
    }

    this.client = client;
    console.log(`[FalkorDB] Connected to ${host}:${port} (graph ${graph})`);
    return new Graph(client, graph);
  }

  private async graph(): Promise<Graph> {
    if (!this.connecting) {
      this.connecting = this.connect().catch(error => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  async query(cypher: string, parameters: ParameterMap, timeoutMs: number): Promise<Row[]> {
    const graph = await this.graph();
    try {
      const reply = await graph.roQuery(cypher, { params: parameters, TIMEOUT: timeoutMs });
      const data: unknown[] = reply.data ?? [];
      return data.map(toRow);
    } catch (error) {
      const message = errorMessage(error);
      if (CONNECTION_PATTERN.test(message)) {
        this.connecting = null;
        throw new GraphConnectionError(message);
      }
      throw new GraphQueryError(message);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.connecting = null;
    if (client?.isOpen) {
      await client.quit();
    }
  }
}

/**
 * Run a resolved query and report latency and row count. Failures are returned,
 * never thrown, with connection problems flagged separately.
 */
export async function executeCypher(
  engine: GraphEngine,
  cypher: string,
  parameters: ParameterMap,
  timeoutMs: number
): Promise<ExecutionResult> {
  const startTime = Date.now();
  try {
    const rows = await engine.query(cypher, parameters, timeoutMs);
    return { rows, latency_ms: Date.now() - startTime, row_count: rows.length };
  } catch (error) {
    return {
      rows: null,
      latency_ms: Date.now() - startTime,
      row_count: 0,
      error: errorMessage(error),
      connection_error: error instanceof GraphConnectionError,
    };
  }
}
