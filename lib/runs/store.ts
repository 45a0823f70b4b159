// In-memory run record storage

import { randomUUID } from "crypto";
import type { PipelineResult, RunRecord } from "@/types";
import type { RunFilters, RunStore } from "./types";

const MAX_RECORDS = 500;

export class MemoryRunStore implements RunStore {
  private records: Map<string, RunRecord> = new Map();

  constructor(private readonly capacity: number = MAX_RECORDS) {}

  save(record: RunRecord): void {
    this.records.set(record.run_id, record);
    // Maps iterate in insertion order, so the first key is the oldest run
    while (this.records.size > this.capacity) {
      const oldest = this.records.keys().next();
      if (oldest.done) break;
      this.records.delete(oldest.value);
    }
  }

  get(runId: string): RunRecord | null {
    return this.records.get(runId) || null;
  }

  list(filters?: RunFilters): RunRecord[] {
    let results = Array.from(this.records.values());

    if (filters?.success !== undefined) {
      results = results.filter(r => r.success === filters.success);
    }

    if (filters?.operation_name) {
      results = results.filter(r => r.operation_name === filters.operation_name);
    }

    if (filters?.date_range) {
      const start = new Date(filters.date_range.start);
      const end = new Date(filters.date_range.end);
      results = results.filter(r => {
        const timestamp = new Date(r.timestamp);
        return timestamp >= start && timestamp <= end;
      });
    }

    // Newest first
    results.sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime());

    return filters?.limit ? results.slice(0, filters.limit) : results;
  }
}

export function toRunRecord(result: PipelineResult, now: Date = new Date()): RunRecord {
  return {
    run_id: randomUUID(),
    timestamp: now.toISOString(),
    question: result.question,
    locale: result.locale,
    success: result.success,
    intent_json: result.intent,
    operation_name: result.generatedQuery?.operationName,
    executed_cypher: result.resolvedQuery?.cypher,
    parameters: result.resolvedQuery?.parameters,
    execution_metrics: {
      latency_ms: result.debug.latencyMs ?? 0,
      row_count: result.rows?.length ?? 0,
      error: result.debug.error,
    },
  };
}

export const runStore: RunStore = new MemoryRunStore();
