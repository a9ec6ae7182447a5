#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { runInit } from "./commands/init.js";
import { runRun, type ReportFormat, type RunOptions } from "./commands/run.js";
import { runList, type ListOptions } from "./commands/list.js";
import { runDiff, type DiffOptions } from "./commands/diff.js";

const require = createRequire(import.meta.url);
const packageVersion =
  process.env.TSBENCH_CLI_VERSION ??
  (require("../package.json") as { version?: string }).version ??
  "0.0.0";

const REPORT_FORMATS: readonly ReportFormat[] = ["terminal", "json", "csv"];

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function parseThreshold(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative number.");
  return n;
}

function parseFormats(value: string): ReportFormat[] {
  return value.split(",").map((part) => {
    const format = REPORT_FORMATS.find((f) => f === part.trim());
    if (!format) throw new InvalidArgumentError(`Unknown format "${part}". Use ${REPORT_FORMATS.join(", ")}.`);
    return format;
  });
}

const program = new Command();

program
  .name("tsbench")
  .description("Benchmark time-series anomaly detectors across datasets and metrics")
  .version(packageVersion);

program
  .command("init")
  .description("Create tsbench.config.json and a datasets/ directory with a demonstration series")
  .action(async () => {
    await runInit();
  });

program
  .command("run")
  .description("Run every configured detector on every selected dataset")
  .option("--label <label>", "Batch label in the result store")
  .option("--resume", "Reuse stored records of the batch and run only what is missing")
  .option("--parallel <n>", "Concurrent runs", parsePositiveInt)
  .option("--format <list>", "Reports: terminal, json, csv (comma-separated)", parseFormats)
  .option("--output <file>", "Write the json or csv report to this file")
  .option("--verbose", "Log every run")
  .action(async (options: RunOptions) => {
    await runRun(options);
  });

program
  .command("list")
  .description("List stored batches, or the catalog's datasets or the available detectors; delete a batch")
  .option("--datasets", "List datasets in the catalog")
  .option("--detectors", "List registered detectors, plugins included")
  .option("--limit <n>", "Number of batches to show", parsePositiveInt)
  .option("--delete <label>", "Delete a stored batch")
  .action(async (options: ListOptions) => {
    await runList(options);
  });

program
  .command("diff")
  .description("Compare metric values between two stored batches")
  .requiredOption("--before <label>", "Base batch label (or 'previous')")
  .requiredOption("--after <label>", "Target batch label (or 'latest')")
  .option("--threshold <n>", "Metric delta threshold for regression detection", parseThreshold)
  .option("--json", "Output diff as JSON")
  .action(async (options: DiffOptions) => {
    await runDiff(options);
  });

program.parseAsync().catch((e: unknown) => {
  console.error(chalk.red(`  Error: ${e instanceof Error ? e.message : String(e)}`));
  process.exitCode = 1;
});
