import { describeRunSpec } from "../run/spec.js";
import type { RunRecord } from "../run/types.js";
import type { ResultTable } from "../results/table.js";

export type DiffStatus = "regression" | "improvement" | "undefined-changed" | "stable" | "added" | "removed";

/** One metric of one run, compared across two batches. */
export interface MetricDiff {
  runId: string;
  run: string;
  metricId: string;
  status: DiffStatus;
  /** null when the metric was undefined or the run failed. */
  before?: number | null;
  after?: number | null;
  delta?: number;
}

export interface DiffSummary {
  total: number;
  regressions: number;
  improvements: number;
  undefinedChanged: number;
  stable: number;
  added: number;
  removed: number;
}

export interface DiffReport {
  beforeLabel: string;
  afterLabel: string;
  metrics: MetricDiff[];
  summary: DiffSummary;
  hasRegressions: boolean;
}

export interface DiffOptions {
  /** Absolute change a metric must exceed to count as improved or regressed. */
  regressionThreshold?: number;
}

const STATUS_ORDER: Record<DiffStatus, number> = {
  regression: 0,
  improvement: 1,
  "undefined-changed": 2,
  stable: 3,
  added: 4,
  removed: 5,
};

/** Records are matched by run id; every metric is treated as higher-is-better. */
export function diffTables(
  beforeLabel: string,
  before: ResultTable,
  afterLabel: string,
  after: ResultTable,
  options?: DiffOptions
): DiffReport {
  const threshold = options?.regressionThreshold ?? 0.01;
  const metrics: MetricDiff[] = [];

  for (const record of after.records()) {
    const previous = before.get(record.runId);
    for (const metricId of record.spec.metricIds) {
      const base = { runId: record.runId, run: describeRunSpec(record.spec), metricId };
      const afterValue = valueOf(record, metricId);
      if (!previous) {
        metrics.push({ ...base, status: "added", after: afterValue });
        continue;
      }
      const beforeValue = valueOf(previous, metricId);
      metrics.push({
        ...base,
        ...compare(previous, record, beforeValue, afterValue, threshold),
        before: beforeValue,
        after: afterValue,
      });
    }
  }

  for (const record of before.records()) {
    if (after.has(record.runId)) continue;
    for (const metricId of record.spec.metricIds) {
      metrics.push({
        runId: record.runId,
        run: describeRunSpec(record.spec),
        metricId,
        status: "removed",
        before: valueOf(record, metricId),
      });
    }
  }

  metrics.sort((a, b) => STATUS_ORDER[a.status] - STATUS_ORDER[b.status]);

  const count = (status: DiffStatus) => metrics.filter((m) => m.status === status).length;
  const summary: DiffSummary = {
    total: metrics.length,
    regressions: count("regression"),
    improvements: count("improvement"),
    undefinedChanged: count("undefined-changed"),
    stable: count("stable"),
    added: count("added"),
    removed: count("removed"),
  };

  return {
    beforeLabel,
    afterLabel,
    metrics,
    summary,
    hasRegressions: summary.regressions > 0,
  };
}

function compare(
  previous: RunRecord,
  current: RunRecord,
  before: number | null,
  after: number | null,
  threshold: number
): { status: DiffStatus; delta?: number } {
  const wasOk = previous.status === "Success";
  const isOk = current.status === "Success";
  if (wasOk && !isOk) return { status: "regression" };
  if (!wasOk && isOk) return { status: "improvement" };

  if (before === null && after === null) return { status: "stable" };
  if (before === null || after === null) return { status: "undefined-changed" };

  const delta = after - before;
  if (delta < -threshold) return { status: "regression", delta };
  if (delta > threshold) return { status: "improvement", delta };
  return { status: "stable", delta };
}

function valueOf(record: RunRecord, metricId: string): number | null {
  if (record.status !== "Success") return null;
  return record.metrics.find((m) => m.metricId === metricId)?.value ?? null;
}
