import type { BatchConfig } from "../config/schema.js";
import { BatchDatasetCache } from "../dataset/cache.js";
import type { DatasetCatalog } from "../dataset/types.js";
import { createDefaultDetectorRegistry } from "../detector/builtin.js";
import type { DetectorRegistry } from "../detector/registry.js";
import { BenchError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { MetricRegistry } from "../metrics/registry.js";
import { RunExecutor } from "../run/executor.js";
import { describeRunSpec, runSpecId } from "../run/spec.js";
import type { RunRecord, RunSpec } from "../run/types.js";
import { mergeResultTables, ResultTable } from "../results/table.js";
import { expandRunSpecs } from "./expand.js";
import { transition, type BatchState } from "./state.js";

export interface RecordProgress {
  completed: number;
  total: number;
  /** The record came from the prior table and was not executed again. */
  resumed: boolean;
}

export interface WorkflowOptions {
  catalog: DatasetCatalog;
  detectors?: DetectorRegistry;
  metrics?: MetricRegistry;
  logger?: Logger;
  /** Records reused by run id when `resume` is on. */
  prior?: ResultTable;
  /** Checked between runs; in-flight runs finish. */
  signal?: AbortSignal;
  onRecord?: (record: RunRecord, progress: RecordProgress) => void;
}

export interface WorkflowResult {
  state: "Completed" | "Cancelled";
  table: ResultTable;
  specs: RunSpec[];
  executed: number;
  resumed: number;
  /** Runs that never started because the batch was cancelled. */
  pending: RunSpec[];
}

/** Every run of a finished batch failed because its dataset could not be loaded. */
export class CatalogUnavailableError extends BenchError {
  readonly table: ResultTable;

  constructor(table: ResultTable) {
    const failed = table.records().filter((r) => r.error !== undefined).length;
    super("CatalogUnavailable", `No dataset could be loaded (${failed} runs failed)`);
    this.table = table;
  }
}

const DATASET_FAILURES: ReadonlySet<string> = new Set(["DatasetNotFound", "DatasetCorrupt"]);

function isDatasetFailure(record: RunRecord): boolean {
  return record.error !== undefined && DATASET_FAILURES.has(record.error.code);
}

/**
 * Runs one batch: expand the configuration, execute every run not already in
 * the prior table, and return the merged table frozen in expansion order.
 */
export class Workflow {
  private config: BatchConfig;
  private options: WorkflowOptions;
  private detectors: DetectorRegistry;
  private metrics: MetricRegistry;
  private logger: Logger;
  private current: BatchState = "Pending";

  constructor(config: BatchConfig, options: WorkflowOptions) {
    this.config = config;
    this.options = options;
    this.detectors = options.detectors ?? createDefaultDetectorRegistry();
    this.metrics = options.metrics ?? new MetricRegistry();
    this.logger = options.logger ?? silentLogger;
  }

  get state(): BatchState {
    return this.current;
  }

  async run(): Promise<WorkflowResult> {
    this.moveTo("Expanding");
    let specs: RunSpec[];
    try {
      specs = await expandRunSpecs(this.config, {
        catalog: this.options.catalog,
        detectors: this.detectors,
        metrics: this.metrics,
      });
    } catch (e) {
      this.moveTo("Failed");
      throw e;
    }
    this.moveTo("Running");

    const prior = this.config.resume ? (this.options.prior ?? new ResultTable()) : new ResultTable();
    const ids = specs.map(runSpecId);
    const todo = specs.filter((_, i) => !prior.has(ids[i] ?? ""));
    const resumed = specs.length - todo.length;
    this.logger.info(
      `Expanded ${specs.length} run${specs.length === 1 ? "" : "s"}` + (resumed > 0 ? ` (${resumed} resumed)` : "")
    );

    let completed = 0;
    for (const id of ids) {
      const record = prior.get(id);
      if (!record) continue;
      completed++;
      this.options.onRecord?.(record, { completed, total: specs.length, resumed: true });
    }

    const cache = new BatchDatasetCache(this.options.catalog);
    const executor = new RunExecutor(cache, this.detectors, this.metrics);
    const computed = new ResultTable();
    const signal = this.options.signal;

    let started: number;
    try {
      started = await runPool(
        todo,
        this.config.parallelism,
        async (spec) => {
          const record = await executor.execute(spec);
          computed.set(record);
          completed++;
          this.logRecord(record);
          this.options.onRecord?.(record, { completed, total: specs.length, resumed: false });
        },
        () => signal?.aborted === true
      );
    } catch (e) {
      this.moveTo("Failed");
      throw e;
    } finally {
      cache.clear();
    }

    const table = mergeResultTables(prior, computed, ids).freeze();
    const executed = computed.records();
    const cancelled = started < todo.length;

    // Judged on the whole table so a resumed batch ends like an uninterrupted one.
    if (!cancelled && table.size > 0 && table.records().every(isDatasetFailure)) {
      this.moveTo("Failed");
      throw new CatalogUnavailableError(table);
    }

    this.moveTo(cancelled ? "Cancelled" : "Completed");
    if (cancelled) this.logger.warn(`Cancelled with ${todo.length - started} runs not started`);

    return {
      state: cancelled ? "Cancelled" : "Completed",
      table,
      specs,
      executed: executed.length,
      resumed,
      pending: todo.slice(started),
    };
  }

  private logRecord(record: RunRecord): void {
    const label = describeRunSpec(record.spec);
    if (record.error) {
      this.logger.warn(`${label}: ${record.error.code}: ${record.error.message}`);
      return;
    }
    this.logger.debug(`${label} (${record.durationMs.toFixed(1)}ms)`);
  }

  private moveTo(target: BatchState): void {
    this.current = transition(this.current, target);
  }
}

/**
 * At most `parallelism` workers pull items in order until the list is done or
 * `stopped()` turns true. Returns how many items were started. The first worker
 * error stops the pool and is rethrown once in-flight items settle.
 */
async function runPool<T>(
  items: readonly T[],
  parallelism: number,
  work: (item: T) => Promise<void>,
  stopped: () => boolean
): Promise<number> {
  let next = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (next < items.length && failures.length === 0 && !stopped()) {
      const item = items[next];
      next++;
      if (item === undefined) continue;
      try {
        await work(item);
      } catch (e) {
        failures.push(e);
      }
    }
  };

  const size = Math.max(1, Math.min(parallelism, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  if (failures.length > 0) throw failures[0];
  return next;
}
