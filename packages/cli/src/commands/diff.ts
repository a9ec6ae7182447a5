import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import {
  SqliteResultStore,
  checkRegressions,
  resolveLabel,
  type DiffReport,
  type MetricDiff,
  type DiffStatus,
} from "@tsbench/core";
import { loadConfig } from "../config.js";

export interface DiffOptions {
  before: string;
  after: string;
  threshold?: number;
  json?: boolean;
}

export async function runDiff(options: DiffOptions): Promise<void> {
  const { config, root } = await loadConfig();
  const store = new SqliteResultStore(resolve(root, config.store.path));

  try {
    const beforeLabel = resolveLabel(store, options.before);
    const afterLabel = resolveLabel(store, options.after);

    const result = checkRegressions(store, beforeLabel, afterLabel, {
      regressionThreshold: options.threshold ?? config.diff.regressionThreshold,
    });

    if (options.json) {
      console.log(JSON.stringify(result.diff, null, 2));
    } else {
      console.log();
      console.log(chalk.bold("  tsbench — Diff"));
      console.log(chalk.dim("  " + "─".repeat(40)));
      console.log();
      printDiffTable(result.diff);
    }

    process.exitCode = result.exitCode;
  } finally {
    store.close();
  }
}

function printDiffTable(diff: DiffReport): void {
  console.log(chalk.bold(`  Comparing: ${diff.beforeLabel} → ${diff.afterLabel}`));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Run"),
      chalk.bold("Metric"),
      chalk.bold(diff.beforeLabel),
      chalk.bold(diff.afterLabel),
      chalk.bold("Delta"),
      chalk.bold("Status"),
    ],
    style: { head: [], border: [] },
  });

  for (const m of diff.metrics) {
    table.push(formatDiffRow(m));
  }

  console.log(table.toString());
  console.log();

  const parts = [
    `${diff.summary.total} metrics`,
    diff.summary.stable > 0 ? chalk.dim(`${diff.summary.stable} stable`) : null,
    diff.summary.improvements > 0 ? chalk.green(`${diff.summary.improvements} improved`) : null,
    diff.summary.regressions > 0 ? chalk.red(`${diff.summary.regressions} regressed`) : null,
    diff.summary.undefinedChanged > 0 ? chalk.yellow(`${diff.summary.undefinedChanged} undefined changed`) : null,
    diff.summary.added > 0 ? chalk.yellow(`${diff.summary.added} added`) : null,
    diff.summary.removed > 0 ? chalk.yellow(`${diff.summary.removed} removed`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(`  ${parts}`);

  if (diff.hasRegressions) {
    console.log();
    console.log(chalk.red.bold(`  ⚠ ${diff.summary.regressions} regression(s) detected`));
  }
  console.log();
}

function formatDiffRow(m: MetricDiff): string[] {
  const deltaCol =
    m.delta !== undefined
      ? formatDelta(m.delta)
      : m.status === "added"
        ? chalk.yellow("new")
        : m.status === "removed"
          ? chalk.yellow("removed")
          : chalk.dim("—");

  return [truncate(m.run, 40), m.metricId, formatValue(m.before), formatValue(m.after), deltaCol, formatStatus(m.status)];
}

function formatValue(value: number | null | undefined): string {
  if (value === undefined) return chalk.dim("—");
  if (value === null) return chalk.yellow("n/a");
  return value.toFixed(3);
}

function formatDelta(delta: number): string {
  const text = delta.toFixed(3);
  if (text === "0.000" || text === "-0.000") return chalk.dim("—");
  if (delta > 0) return chalk.green(`+${text}`);
  return chalk.red(text);
}

function formatStatus(status: DiffStatus): string {
  switch (status) {
    case "regression":
      return chalk.red.bold("REGRESSED");
    case "improvement":
      return chalk.green("improved");
    case "undefined-changed":
      return chalk.yellow("undefined changed");
    case "stable":
      return chalk.dim("stable");
    case "added":
      return chalk.yellow("added");
    case "removed":
      return chalk.yellow("removed");
  }
}

function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + "…";
}
