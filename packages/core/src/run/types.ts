import type { ParameterSet } from "../detector/types.js";
import type { ClassifiedError } from "../errors.js";
import type { MetricOptions, MetricResult } from "../metrics/registry.js";

export interface RunSpec {
  readonly datasetId: string;
  readonly algorithmId: string;
  readonly parameters: Readonly<ParameterSet>;
  /** Ordered, no duplicates. */
  readonly metricIds: readonly string[];
  /** Options of the configured named metrics among metricIds. */
  readonly metricOptions: Readonly<Record<string, MetricOptions>>;
  /** Scores are min-max scaled before any metric sees them. */
  readonly normalize: boolean;
}

export type RunStatus = "Success" | "Failed" | "Skipped";

export interface RunRecord {
  readonly runId: string;
  readonly spec: RunSpec;
  readonly status: RunStatus;
  /** Empty when the run failed. */
  readonly metrics: readonly MetricResult[];
  /** Wall-clock fit + score; metric computation is excluded. */
  readonly durationMs: number;
  readonly fitMs: number;
  readonly scoreMs: number;
  /** Present iff status is Failed. */
  readonly error?: ClassifiedError;
}
