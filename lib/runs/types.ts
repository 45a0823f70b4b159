import type { RunRecord } from "@/types";

// Run record storage interface

export interface RunFilters {
  success?: boolean;
  operation_name?: string;
  date_range?: { start: string; end: string };
  limit?: number;
}

export interface RunStore {
  save(record: RunRecord): void;
  get(runId: string): RunRecord | null;
  list(filters?: RunFilters): RunRecord[];
}
