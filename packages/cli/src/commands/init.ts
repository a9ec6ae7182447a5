import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";
import { demonstrationTimeSeries, type BenchConfigInput } from "@tsbench/core";

export const DEFAULT_CONFIG: BenchConfigInput = {
  datasets: [{ where: { source: "synthetic" } }],
  algorithms: [
    { algorithm: "zscore", grid: { robust: [false, true] } },
    { algorithm: "moving-average", grid: { window: [5, 20] } },
    { algorithm: "nearest-neighbor", parameters: { window: 16, stride: 4 } },
  ],
  metrics: ["auc-roc", "auc-pr", "f1", "event-recall"],
  thresholds: [{ type: "contamination", rate: 0.02 }],
  parallelism: 2,
  catalog: { path: "./datasets" },
  store: { path: ".tsbench/results.db" },
  report: { formats: ["terminal"], outputDir: ".tsbench/reports" },
};

export async function runInit(): Promise<void> {
  const cwd = process.cwd();

  console.log();
  console.log(chalk.bold("  tsbench — Initializing project"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const configPath = join(cwd, "tsbench.config.json");
  if (existsSync(configPath)) {
    console.log(chalk.yellow("  tsbench.config.json already exists, skipping"));
  } else {
    await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
    console.log(chalk.green("  Created tsbench.config.json"));
  }

  const datasetsDir = join(cwd, "datasets");
  if (existsSync(datasetsDir)) {
    console.log(chalk.yellow("  datasets/ directory already exists, skipping"));
  } else {
    await mkdir(datasetsDir, { recursive: true });
    await writeFile(join(datasetsDir, "demonstration.json"), JSON.stringify(demonstrationTimeSeries()) + "\n", "utf-8");
    console.log(chalk.green("  Created datasets/demonstration.json"));
  }

  const stateDir = join(cwd, ".tsbench");
  if (!existsSync(stateDir)) {
    await mkdir(stateDir, { recursive: true });
    console.log(chalk.green("  Created .tsbench/ directory"));
  }

  console.log();
  console.log(chalk.bold("  Next steps:"));
  console.log(chalk.dim("  1. Add datasets (JSON or CSV) under datasets/"));
  console.log(chalk.dim("  2. Edit tsbench.config.json to pick detectors and metrics"));
  console.log(chalk.dim("  3. Run: tsbench run"));
  console.log();
}
