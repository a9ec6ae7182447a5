import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import {
  BenchError,
  DirectoryCatalog,
  SqliteResultStore,
  createConsoleLogger,
  createDefaultDetectorRegistry,
  inspectDatasets,
  loadDetectorPlugins,
  type DatasetSummary,
} from "@tsbench/core";
import { loadConfig } from "../config.js";

export interface ListOptions {
  datasets?: boolean;
  detectors?: boolean;
  limit?: number;
  /** Label of a stored batch to delete instead of listing. */
  delete?: string;
}

const SIZE_KEYS: ReadonlySet<string> = new Set(["length", "dimensions", "anomalies"]);

/** Dataset, length, dimensions, anomalies, then the remaining metadata or the load error. */
export function datasetCells(summary: DatasetSummary): string[] {
  if (summary.error) {
    return [summary.id, "-", "-", "-", `${summary.error.code}: ${summary.error.message}`];
  }
  const { metadata } = summary;
  const rest = Object.entries(metadata).filter(([k]) => !SIZE_KEYS.has(k));
  return [
    summary.id,
    String(metadata.length ?? "-"),
    String(metadata.dimensions ?? "-"),
    String(metadata.anomalies ?? "-"),
    rest.map(([k, v]) => `${k}=${String(v)}`).join(", "),
  ];
}

export async function runList(options: ListOptions, searchFrom?: string): Promise<void> {
  const { config, root } = await loadConfig(searchFrom);
  console.log();

  if (options.delete !== undefined) {
    const store = new SqliteResultStore(resolve(root, config.store.path));
    try {
      if (!store.deleteBatch(options.delete)) {
        throw new BenchError("StoreError", `No stored batch labelled "${options.delete}"`);
      }
    } finally {
      store.close();
    }
    console.log(chalk.green(`  Deleted batch ${options.delete}`));
    console.log();
    return;
  }

  if (options.detectors) {
    const registry = createDefaultDetectorRegistry();
    await loadDetectorPlugins(config.plugins, registry, { baseDir: root, logger: createConsoleLogger() });
    const table = new Table({ head: [chalk.bold("Detector"), chalk.bold("Description")], style: { head: [], border: [] } });
    for (const d of registry.describe()) table.push([d.id, d.description]);
    console.log(table.toString());
    console.log();
    return;
  }

  if (options.datasets) {
    const catalog = new DirectoryCatalog(resolve(root, config.catalog.path));
    const datasets = await inspectDatasets(catalog);
    if (datasets.length === 0) {
      console.log(chalk.yellow(`  No datasets found in ${config.catalog.path}`));
      console.log();
      return;
    }
    const table = new Table({
      head: ["Dataset", "Length", "Dims", "Anomalies", "Metadata"].map((h) => chalk.bold(h)),
      style: { head: [], border: [] },
    });
    for (const d of datasets) {
      const cells = datasetCells(d);
      table.push(d.error ? cells.map((c) => chalk.red(c)) : cells);
    }
    console.log(table.toString());
    console.log();
    return;
  }

  const store = new SqliteResultStore(resolve(root, config.store.path));
  try {
    const batches = store.listBatches(options.limit);
    if (batches.length === 0) {
      console.log(chalk.yellow("  No batches stored yet. Run `tsbench run` first."));
      console.log();
      return;
    }
    const table = new Table({
      head: ["Label", "Updated", "Runs", "Succeeded", "Failed", "Detector time"].map((h) => chalk.bold(h)),
      style: { head: [], border: [] },
    });
    for (const b of batches) {
      table.push([
        b.label,
        b.updatedAt,
        String(b.recordCount),
        chalk.green(String(b.succeededCount)),
        b.failedCount > 0 ? chalk.red(String(b.failedCount)) : "0",
        `${Math.round(b.totalDuration)}ms`,
      ]);
    }
    console.log(table.toString());
    console.log();
  } finally {
    store.close();
  }
}
