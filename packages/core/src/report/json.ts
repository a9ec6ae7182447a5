import { toRows, type FlatRow } from "../results/rows.js";
import type { ResultTable } from "../results/table.js";
import { summarize, type BatchSummary } from "./summary.js";

export interface JsonReport {
  createdAt: string;
  label?: string;
  summary: BatchSummary;
  /** The flat result rows; undefined metrics are null. */
  results: FlatRow[];
}

export function buildJsonReport(table: ResultTable, options?: { label?: string; createdAt?: Date }): JsonReport {
  const summary = summarize(table);
  return {
    createdAt: (options?.createdAt ?? new Date()).toISOString(),
    label: options?.label,
    summary: {
      ...summary,
      totalDuration: Math.round(summary.totalDuration),
      metrics: summary.metrics.map((m) => ({
        ...m,
        mean: m.mean === null ? null : Math.round(m.mean * 10000) / 10000,
      })),
    },
    results: toRows(table),
  };
}

export function generateJsonReport(table: ResultTable, options?: { label?: string; createdAt?: Date }): string {
  return JSON.stringify(buildJsonReport(table, options), null, 2);
}
