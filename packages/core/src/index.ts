// Errors & logging
export {
  BenchError,
  ConfigurationError,
  DatasetNotFoundError,
  DatasetCorruptError,
  UnknownAlgorithmError,
  InvalidParameterError,
  DetectorRuntimeError,
  MetricUndefinedError,
  classifyError,
  isBenchError,
} from "./errors.js";
export type { ErrorCode, ClassifiedError } from "./errors.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Configuration
export { parseConfig, benchConfigSchema, thresholdSchema } from "./config/schema.js";
export type {
  BenchConfig,
  BenchConfigInput,
  BatchConfig,
  DatasetSelector,
  AlgorithmEntry,
  MetricEntry,
} from "./config/schema.js";

// Datasets
export { InMemoryCatalog, DirectoryCatalog, inspectDatasets, parseCsvDataset } from "./dataset/catalog.js";
export type { DatasetSummary } from "./dataset/catalog.js";
export { BatchDatasetCache } from "./dataset/cache.js";
export { validateDataset, describeDataset } from "./dataset/validate.js";
export { makeSineWave, demonstrationTimeSeries } from "./dataset/synthetic.js";
export type { SineWaveOptions } from "./dataset/synthetic.js";
export type {
  TimeSeries,
  Label,
  MetadataValue,
  Dataset,
  DatasetInfo,
  DatasetCatalog,
  RawDataset,
} from "./dataset/types.js";

// Detectors
export { DetectorRegistry } from "./detector/registry.js";
export { createDefaultDetectorRegistry } from "./detector/builtin.js";
export { zscoreDetector, ZScoreDetector } from "./detector/zscore.js";
export { movingAverageDetector, MovingAverageDetector } from "./detector/moving-average.js";
export { nearestNeighborDetector, NearestNeighborDetector } from "./detector/nearest-neighbor.js";
export { windowStarts, slidingWindow, reverseSlidingWindow } from "./detector/window.js";
export { loadDetectorPlugins, validateDetectorFactory } from "./detector/plugins.js";
export type { ValidationResult } from "./detector/plugins.js";
export type { Detector, DetectorFactory, ParameterSet, ParameterValue } from "./detector/types.js";

// Metrics
export {
  MetricRegistry,
  buildMetric,
  metricId,
  isMetricKind,
  isThresholdedKind,
  THRESHOLD_FREE_KINDS,
  THRESHOLDED_KINDS,
} from "./metrics/registry.js";
export type {
  MetricDefinition,
  MetricResult,
  MetricKind,
  ThresholdedKind,
  MetricOptions,
  MetricFamily,
} from "./metrics/registry.js";
export { applyThreshold, parseThreshold, formatThreshold } from "./metrics/thresholds.js";
export type { ThresholdSpec } from "./metrics/thresholds.js";
export { anomalyEvents } from "./metrics/range.js";
export type { AnomalyEvent } from "./metrics/range.js";

// Runs
export { createRunSpec, runSpecId, describeRunSpec, storedMetricOptions } from "./run/spec.js";
export type { StoredMetricOptions } from "./run/spec.js";
export { RunExecutor, normalizeScores } from "./run/executor.js";
export type { RunSpec, RunRecord, RunStatus } from "./run/types.js";

// Workflow
export { Workflow, CatalogUnavailableError } from "./workflow/orchestrator.js";
export type { WorkflowOptions, WorkflowResult, RecordProgress } from "./workflow/orchestrator.js";
export { expandRunSpecs } from "./workflow/expand.js";
export type { ExpansionContext } from "./workflow/expand.js";
export { transition, isTerminal } from "./workflow/state.js";
export type { BatchState } from "./workflow/state.js";

// Results
export { ResultTable, mergeResultTables } from "./results/table.js";
export { toRows, fromRows, recordToRow, rowToRecord, tableColumns } from "./results/rows.js";
export type { FlatRow, CellValue } from "./results/rows.js";
export { toCsv, fromCsv } from "./results/csv.js";

// Reporter
export { printTerminalReport, renderTerminalReport } from "./report/terminal.js";
export { generateJsonReport, buildJsonReport } from "./report/json.js";
export type { JsonReport } from "./report/json.js";
export { summarize } from "./report/summary.js";
export type { BatchSummary, MetricSummary } from "./report/summary.js";

// Store
export type { ResultStore, BatchMeta } from "./store/types.js";
export { SqliteResultStore } from "./store/sqlite.js";

// Diff
export { diffTables } from "./diff/engine.js";
export type { DiffReport, MetricDiff, DiffStatus, DiffSummary, DiffOptions } from "./diff/engine.js";
export { checkRegressions, resolveLabel } from "./diff/regression.js";
export type { RegressionCheckResult } from "./diff/regression.js";
