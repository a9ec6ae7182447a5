export type ErrorCode =
  | "ConfigurationError"
  | "DatasetNotFound"
  | "DatasetCorrupt"
  | "UnknownAlgorithm"
  | "InvalidParameter"
  | "DetectorRuntimeError"
  | "MetricUndefined"
  | "CatalogUnavailable"
  | "StoreError";

export interface ClassifiedError {
  code: ErrorCode;
  message: string;
}

export class BenchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
  }
}

export class ConfigurationError extends BenchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("ConfigurationError", issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

export class DatasetNotFoundError extends BenchError {
  constructor(datasetId: string) {
    super("DatasetNotFound", `Dataset "${datasetId}" not found in catalog`);
  }
}

export class DatasetCorruptError extends BenchError {
  constructor(datasetId: string, reason: string) {
    super("DatasetCorrupt", `Dataset "${datasetId}" is corrupt: ${reason}`);
  }
}

export class UnknownAlgorithmError extends BenchError {
  constructor(algorithmId: string, known: string[]) {
    super(
      "UnknownAlgorithm",
      `Unknown algorithm "${algorithmId}". Known: [${known.join(", ")}]`
    );
  }
}

export class InvalidParameterError extends BenchError {
  constructor(algorithmId: string, problems: string[]) {
    super("InvalidParameter", `Invalid parameters for "${algorithmId}": ${problems.join("; ")}`);
  }
}

export class DetectorRuntimeError extends BenchError {
  constructor(message: string) {
    super("DetectorRuntimeError", message);
  }
}

export class MetricUndefinedError extends BenchError {
  readonly reason: string;

  constructor(metricId: string, reason: string) {
    super("MetricUndefined", `${metricId}: ${reason}`);
    this.reason = reason;
  }
}

/**
 * Reduce anything thrown to a code and a one-line message.
 * Unclassified errors take the fallback code; stacks are never kept.
 */
export function classifyError(error: unknown, fallback: ErrorCode): ClassifiedError {
  if (error instanceof BenchError) {
    return { code: error.code, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallback, message: message.split("\n")[0] ?? "" };
}

export function isBenchError(error: unknown, code?: ErrorCode): error is BenchError {
  return error instanceof BenchError && (code === undefined || error.code === code);
}
