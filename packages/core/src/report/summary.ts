import type { ResultTable } from "../results/table.js";

export interface MetricSummary {
  metricId: string;
  /** Mean over defined values; null when no run defined the metric. */
  mean: number | null;
  defined: number;
  undefined: number;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  totalDuration: number;
  metrics: MetricSummary[];
}

export function summarize(table: ResultTable): BatchSummary {
  const records = table.records();
  const metrics = table.metricIds().map((metricId): MetricSummary => {
    let sum = 0;
    let defined = 0;
    let missing = 0;
    for (const record of records) {
      if (record.status !== "Success") continue;
      const result = record.metrics.find((m) => m.metricId === metricId);
      if (!result) continue;
      if (result.value === null) {
        missing++;
      } else {
        sum += result.value;
        defined++;
      }
    }
    return { metricId, mean: defined > 0 ? sum / defined : null, defined, undefined: missing };
  });

  return {
    total: records.length,
    succeeded: records.filter((r) => r.status === "Success").length,
    failed: records.filter((r) => r.status === "Failed").length,
    skipped: records.filter((r) => r.status === "Skipped").length,
    totalDuration: records.reduce((sum, r) => sum + r.durationMs, 0),
    metrics,
  };
}
