import { BenchError } from "../errors.js";
import type { ResultStore } from "../store/types.js";
import { diffTables, type DiffOptions, type DiffReport } from "./engine.js";

export interface RegressionCheckResult {
  diff: DiffReport;
  hasRegressions: boolean;
  regressionSummary: string;
  exitCode: number;
}

export function checkRegressions(
  store: ResultStore,
  beforeLabel: string,
  afterLabel: string,
  options?: DiffOptions
): RegressionCheckResult {
  const before = store.loadTable(beforeLabel);
  if (!before) {
    throw new BenchError("StoreError", `Batch "${beforeLabel}" not found in result store.`);
  }

  const after = store.loadTable(afterLabel);
  if (!after) {
    throw new BenchError("StoreError", `Batch "${afterLabel}" not found in result store.`);
  }

  const diff = diffTables(beforeLabel, before, afterLabel, after, options);

  const regressionSummary = diff.hasRegressions
    ? `${diff.summary.regressions} regression(s) detected comparing ${beforeLabel} to ${afterLabel}`
    : `No regressions comparing ${beforeLabel} to ${afterLabel}`;

  return {
    diff,
    hasRegressions: diff.hasRegressions,
    regressionSummary,
    exitCode: diff.hasRegressions ? 1 : 0,
  };
}

/** `latest` and `previous` name the two most recently updated batches. */
export function resolveLabel(store: ResultStore, label: string): string {
  if (label === "latest") {
    const labels = store.listLabels();
    const latest = labels[0];
    if (latest === undefined) throw new BenchError("StoreError", "No batches stored yet.");
    return latest;
  }
  if (label === "previous") {
    const labels = store.listLabels();
    const previous = labels[1];
    if (previous === undefined) throw new BenchError("StoreError", "Need at least 2 stored batches to use 'previous'.");
    return previous;
  }
  return label;
}
