import { z } from "zod";
import type { ParameterSet } from "../detector/types.js";
import { BenchError, ConfigurationError } from "../errors.js";
import {
  THRESHOLD_FREE_KINDS,
  THRESHOLDED_KINDS,
  type MetricOptions,
  type MetricResult,
} from "../metrics/registry.js";
import { parseThreshold } from "../metrics/thresholds.js";
import { createRunSpec, runSpecId, storedMetricOptions } from "../run/spec.js";
import type { RunRecord } from "../run/types.js";
import { ResultTable } from "./table.js";

export type CellValue = string | number | null;
export type FlatRow = Record<string, CellValue>;

export const PARAM_PREFIX = "param:";
export const NOTE_SUFFIX = ":note";

const LEADING_COLUMNS = ["run_id", "dataset_id", "algorithm_id"] as const;
const TRAILING_COLUMNS = [
  "metrics",
  "metric_options",
  "normalize",
  "status",
  "duration_ms",
  "fit_ms",
  "score_ms",
  "error_code",
  "error_message",
] as const;

export const RESERVED_COLUMNS: ReadonlySet<string> = new Set([...LEADING_COLUMNS, ...TRAILING_COLUMNS]);

const statusSchema = z.enum(["Success", "Failed", "Skipped"]);
const errorCodeSchema = z.enum([
  "ConfigurationError",
  "DatasetNotFound",
  "DatasetCorrupt",
  "UnknownAlgorithm",
  "InvalidParameter",
  "DetectorRuntimeError",
  "MetricUndefined",
  "CatalogUnavailable",
  "StoreError",
]);
const metricIdsSchema = z.array(z.string());
const metricOptionsSchema = z.record(
  z.string(),
  z
    .object({
      kind: z.enum([...THRESHOLD_FREE_KINDS, ...THRESHOLDED_KINDS]),
      threshold: z.string().optional(),
      beta: z.number().optional(),
      alpha: z.number().optional(),
    })
    .strict()
);
const parameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Column order: identity, one `param:<name>` per parameter, run fields, then `<metric>` and `<metric>:note` pairs. */
export function tableColumns(table: ResultTable): string[] {
  const params = new Set<string>();
  for (const record of table.records()) {
    for (const name of Object.keys(record.spec.parameters)) params.add(name);
  }
  const metricColumns = table.metricIds().flatMap((id) => {
    if (RESERVED_COLUMNS.has(id) || id.startsWith(PARAM_PREFIX) || id.endsWith(NOTE_SUFFIX)) {
      throw new BenchError("StoreError", `Metric id "${id}" collides with a result column`);
    }
    return [id, `${id}${NOTE_SUFFIX}`];
  });

  return [
    ...LEADING_COLUMNS,
    ...[...params].sort().map((p) => `${PARAM_PREFIX}${p}`),
    ...TRAILING_COLUMNS,
    ...metricColumns,
  ];
}

export function recordToRow(record: RunRecord, columns: readonly string[]): FlatRow {
  const row: FlatRow = {};
  for (const column of columns) row[column] = null;

  row.run_id = record.runId;
  row.dataset_id = record.spec.datasetId;
  row.algorithm_id = record.spec.algorithmId;
  for (const [name, value] of Object.entries(record.spec.parameters)) {
    row[`${PARAM_PREFIX}${name}`] = JSON.stringify(value);
  }
  row.metrics = JSON.stringify(record.spec.metricIds);
  row.metric_options = JSON.stringify(storedMetricOptions(record.spec));
  row.normalize = JSON.stringify(record.spec.normalize);
  row.status = record.status;
  row.duration_ms = record.durationMs;
  row.fit_ms = record.fitMs;
  row.score_ms = record.scoreMs;
  row.error_code = record.error?.code ?? null;
  row.error_message = record.error?.message ?? null;
  for (const metric of record.metrics) {
    row[metric.metricId] = metric.value;
    row[`${metric.metricId}${NOTE_SUFFIX}`] = metric.diagnostic ?? null;
  }
  return row;
}

/** One row per record. Undefined metric values are null, never 0. */
export function toRows(table: ResultTable): FlatRow[] {
  const columns = tableColumns(table);
  return table.records().map((record) => recordToRow(record, columns));
}

/** Inverse of recordToRow. Cells may be strings (CSV) or typed values (JSON, SQLite). */
export function rowToRecord(row: Readonly<Record<string, unknown>>): RunRecord {
  const runId = requireText(row, "run_id");

  const parameters: ParameterSet = {};
  for (const [column, value] of Object.entries(row)) {
    if (!column.startsWith(PARAM_PREFIX)) continue;
    const text = optionalText(value);
    if (text !== null) {
      parameters[column.slice(PARAM_PREFIX.length)] = parseJson(runId, column, text, parameterValueSchema);
    }
  }

  const spec = createRunSpec({
    datasetId: requireText(row, "dataset_id"),
    algorithmId: requireText(row, "algorithm_id"),
    parameters,
    metricIds: parseJson(runId, "metrics", requireText(row, "metrics"), metricIdsSchema),
    metricOptions: readMetricOptions(runId, row.metric_options),
    normalize: parseJson(runId, "normalize", optionalText(row.normalize) ?? "true", z.boolean()),
  });

  if (runSpecId(spec) !== runId) {
    throw new BenchError("StoreError", `Row ${runId.slice(0, 8)} does not match its run id`);
  }

  const status = check(runId, "status", requireText(row, "status"), statusSchema);
  const errorCode = optionalText(row.error_code);

  const metrics: MetricResult[] =
    status === "Failed"
      ? []
      : spec.metricIds.map((id) => {
          const value = optionalNumber(row[id]);
          const diagnostic = optionalText(row[`${id}${NOTE_SUFFIX}`]);
          return diagnostic === null ? { metricId: id, value } : { metricId: id, value, diagnostic };
        });

  const record: RunRecord = {
    runId,
    spec,
    status,
    metrics,
    durationMs: optionalNumber(row.duration_ms) ?? 0,
    fitMs: optionalNumber(row.fit_ms) ?? 0,
    scoreMs: optionalNumber(row.score_ms) ?? 0,
  };

  if (errorCode === null) return record;
  return {
    ...record,
    error: {
      code: check(runId, "error_code", errorCode, errorCodeSchema),
      message: typeof row.error_message === "string" ? row.error_message : "",
    },
  };
}

export function fromRows(rows: Iterable<Readonly<Record<string, unknown>>>): ResultTable {
  const table = new ResultTable();
  for (const row of rows) table.set(rowToRecord(row));
  return table;
}

/** Stored thresholds are text such as `fixed:0.5`. */
function readMetricOptions(runId: string, value: unknown): Record<string, MetricOptions> {
  const text = optionalText(value);
  if (text === null) return {};
  const stored = parseJson(runId, "metric_options", text, metricOptionsSchema);
  const options: Record<string, MetricOptions> = {};
  for (const [name, { threshold, ...rest }] of Object.entries(stored)) {
    try {
      options[name] = threshold === undefined ? rest : { ...rest, threshold: parseThreshold(threshold) };
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      throw new BenchError("StoreError", `Row ${runId.slice(0, 8)}: "metric_options" has an invalid threshold for "${name}"`);
    }
  }
  return options;
}

function requireText(row: Readonly<Record<string, unknown>>, column: string): string {
  const text = optionalText(row[column]);
  if (text === null) throw new BenchError("StoreError", `Result row is missing "${column}"`);
  return text;
}

function optionalText(value: unknown): string | null {
  if (value === null || value === undefined || value === "") return null;
  return String(value);
}

function optionalNumber(value: unknown): number | null {
  if (typeof value === "number") return value;
  if (typeof value !== "string" || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseJson<T>(runId: string, column: string, text: string, schema: z.ZodType<T>): T {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new BenchError("StoreError", `Row ${runId.slice(0, 8)}: "${column}" is not valid JSON`);
  }
  return check(runId, column, data, schema);
}

function check<T>(runId: string, column: string, value: unknown, schema: z.ZodType<T>): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BenchError("StoreError", `Row ${runId.slice(0, 8)}: "${column}" has an unexpected value`);
  }
  return parsed.data;
}
