import chalk from "chalk";
import Table from "cli-table3";
import { describeRunSpec } from "../run/spec.js";
import type { RunRecord } from "../run/types.js";
import type { ResultTable } from "../results/table.js";
import { summarize } from "./summary.js";

export function printTerminalReport(table: ResultTable, options?: { label?: string }): void {
  console.log(renderTerminalReport(table, options));
}

export function renderTerminalReport(table: ResultTable, options?: { label?: string }): string {
  const lines: string[] = [""];
  lines.push(chalk.bold(`  Benchmark Results${options?.label ? ` · ${options.label}` : ""}`));
  lines.push(chalk.dim("  " + "─".repeat(50)));
  lines.push("");

  const records = table.records();
  const metricIds = table.metricIds();

  const grid = new Table({
    head: [chalk.bold("Run"), chalk.bold("Status"), ...metricIds.map((id) => chalk.bold(id)), chalk.bold("Duration")],
    style: { head: [], border: [] },
  });

  for (const record of records) {
    grid.push([
      truncate(describeRunSpec(record.spec), 48),
      formatStatus(record),
      ...metricIds.map((id) => formatMetric(record, id)),
      formatDuration(record.durationMs),
    ]);
  }

  lines.push(grid.toString());
  lines.push("");

  const failed = records.filter((r) => r.error !== undefined);
  if (failed.length > 0) {
    lines.push(chalk.red.bold("  Failures:"));
    lines.push("");
    for (const record of failed) {
      lines.push(chalk.red(`  ✗ ${describeRunSpec(record.spec)}`));
      if (record.error) lines.push(chalk.dim(`    ${record.error.code}: ${record.error.message}`));
    }
    lines.push("");
  }

  const summary = summarize(table);
  if (summary.metrics.length > 0) {
    lines.push(chalk.bold("  Mean over defined values:"));
    for (const m of summary.metrics) {
      const mean = m.mean === null ? chalk.dim("—") : m.mean.toFixed(3);
      const note = m.undefined > 0 ? chalk.dim(` (${m.undefined} undefined)`) : "";
      lines.push(`    ${m.metricId}: ${mean}${note}`);
    }
    lines.push("");
  }

  lines.push(
    [
      chalk.bold(`  ${summary.total} runs`),
      chalk.green(`${summary.succeeded} succeeded`),
      summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : null,
      summary.skipped > 0 ? chalk.yellow(`${summary.skipped} skipped`) : null,
    ]
      .filter(Boolean)
      .join(chalk.dim(" · "))
  );
  lines.push(chalk.dim(`  Detector time ${formatDuration(summary.totalDuration)}`));
  lines.push("");
  return lines.join("\n");
}

function formatStatus(record: RunRecord): string {
  if (record.status === "Success") return chalk.green("OK");
  if (record.status === "Skipped") return chalk.yellow("SKIP");
  return chalk.red("FAIL");
}

function formatMetric(record: RunRecord, metricId: string): string {
  if (record.status !== "Success") return chalk.dim("·");
  const result = record.metrics.find((m) => m.metricId === metricId);
  if (!result) return chalk.dim("·");
  return result.value === null ? chalk.yellow("n/a") : result.value.toFixed(3);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
