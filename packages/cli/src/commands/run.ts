import { resolve, join } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import chalk from "chalk";
import {
  CatalogUnavailableError,
  DirectoryCatalog,
  SqliteResultStore,
  Workflow,
  createConsoleLogger,
  createDefaultDetectorRegistry,
  generateJsonReport,
  loadDetectorPlugins,
  printTerminalReport,
  toCsv,
  type ResultTable,
} from "@tsbench/core";
import { loadConfig } from "../config.js";

export type ReportFormat = "terminal" | "json" | "csv";

export interface RunOptions {
  label?: string;
  resume?: boolean;
  parallel?: number;
  format?: ReportFormat[];
  output?: string;
  verbose?: boolean;
}

export async function runRun(options: RunOptions): Promise<void> {
  console.log();
  console.log(chalk.bold("  tsbench — Running benchmark"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const { config, root } = await loadConfig();
  const logger = createConsoleLogger({ verbose: options.verbose ?? config.verbose });

  const detectors = createDefaultDetectorRegistry();
  const plugins = await loadDetectorPlugins(config.plugins, detectors, { baseDir: root, logger });
  if (plugins.length > 0) logger.info(chalk.dim(`Loaded plugin detectors: ${plugins.join(", ")}`));

  const catalog = new DirectoryCatalog(resolve(root, config.catalog.path));
  const store = new SqliteResultStore(resolve(root, config.store.path));
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted. Finishing in-flight runs; the batch can be resumed with --resume.");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const resume = options.resume ?? config.resume;
    const label = options.label ?? (resume ? store.listLabels()[0] : undefined) ?? newLabel();
    const prior = resume ? (store.loadTable(label) ?? undefined) : undefined;
    if (resume && !prior) logger.info(chalk.dim(`No stored batch "${label}"; starting fresh`));
    console.log(chalk.dim(`  Batch "${label}"`));

    const workflow = new Workflow(
      { ...config, resume, parallelism: options.parallel ?? config.parallelism },
      {
        catalog,
        detectors,
        logger,
        prior,
        signal: controller.signal,
        onRecord: (record, progress) => {
          if (!progress.resumed) store.saveRecord(label, record);
          logger.debug(`[${progress.completed}/${progress.total}]`);
        },
      }
    );

    let table: ResultTable;
    let cancelled = false;
    try {
      const result = await workflow.run();
      table = result.table;
      cancelled = result.state === "Cancelled";
    } catch (e) {
      if (e instanceof CatalogUnavailableError) store.saveTable(label, e.table);
      throw e;
    }

    const meta = store.saveTable(label, table);
    await writeReports(table, label, options.format ?? config.report.formats, {
      output: options.output,
      outputDir: resolve(root, config.report.outputDir),
    });

    console.log(chalk.dim(`  Saved batch "${label}" (${meta.recordCount} records)`));
    if (cancelled) {
      console.log(chalk.yellow(`  Cancelled. Resume with: tsbench run --resume --label "${label}"`));
      process.exitCode = 130;
    }
    console.log();
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    store.close();
  }
}

async function writeReports(
  table: ResultTable,
  label: string,
  formats: readonly ReportFormat[],
  target: { output?: string; outputDir: string }
): Promise<void> {
  const files = formats.filter((f) => f !== "terminal");
  if (formats.includes("terminal")) printTerminalReport(table, { label });

  for (const format of files) {
    const outputPath =
      target.output && files.length === 1
        ? resolve(target.output)
        : join(target.outputDir, `${label.replace(/[^\w.-]+/g, "_")}.${format}`);
    await mkdir(resolve(outputPath, ".."), { recursive: true });

    if (format === "json") {
      await writeFile(outputPath, generateJsonReport(table, { label }), "utf-8");
      console.log(chalk.dim(`  JSON report → ${outputPath}`));
    } else {
      await writeFile(outputPath, toCsv(table), "utf-8");
      console.log(chalk.dim(`  CSV results → ${outputPath}`));
    }
  }
}

function newLabel(): string {
  return `batch-${new Date().toISOString().replace(/[:.]/g, "-")}`;
}
