import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { InMemoryCatalog } from "../dataset/catalog.js";
import type { Label, RawDataset } from "../dataset/types.js";
import { createDefaultDetectorRegistry } from "../detector/builtin.js";
import type { DetectorFactory, ParameterSet } from "../detector/types.js";
import type { ClassifiedError } from "../errors.js";
import type { MetricOptions, MetricResult } from "../metrics/registry.js";
import { createRunSpec, runSpecId } from "../run/spec.js";
import type { RunRecord, RunStatus } from "../run/types.js";

export const LABELS: Label[] = [0, 0, 1, 1, 0, 0, 1, 0];
export const SCORES = [0.1, 0.2, 0.9, 0.8, 0.1, 0.3, 0.7, 0.2];

const scriptedParameters = z
  .object({
    mode: z.enum(["ok", "fit-error", "score-error", "short", "nan"]).default("ok"),
    delay: z.number().min(0).default(0),
  })
  .strict();

/** Scores each point by its first value, or fails the way `mode` says. */
export const scriptedDetector: DetectorFactory<z.infer<typeof scriptedParameters>> = {
  id: "scripted",
  description: "Test detector",
  parameters: scriptedParameters,
  create: ({ mode, delay }) => ({
    fit() {
      if (mode === "fit-error") throw new Error("fit kaboom");
    },
    async score(series) {
      if (delay > 0) await sleep(delay);
      if (mode === "score-error") throw new Error("kaboom");
      if (mode === "short") return [1, 2];
      if (mode === "nan") return series.map(() => Number.NaN);
      return series.map((point) => point[0] ?? 0);
    },
  }),
};

export function testRegistry() {
  return createDefaultDetectorRegistry().register(scriptedDetector);
}

export function testDatasets(): Record<string, RawDataset> {
  return {
    events: { series: SCORES, labels: LABELS, metadata: { domain: "unit", size: "small" } },
    quiet: { series: [0.1, 0.5, 0.2, 0.4], labels: [0, 0, 0, 0], metadata: { domain: "unit", size: "tiny" } },
    other: { series: [1, 2, 3, 9], labels: [0, 0, 0, 1], metadata: { domain: "other" } },
  };
}

export function testCatalog(): InMemoryCatalog {
  return new InMemoryCatalog(testDatasets());
}

export interface RecordInput {
  datasetId?: string;
  algorithmId?: string;
  parameters?: ParameterSet;
  /** Metric id to value; the run requests them in this order. */
  metrics?: Record<string, number | null>;
  notes?: Record<string, string>;
  metricOptions?: Record<string, MetricOptions>;
  normalize?: boolean;
  status?: RunStatus;
  error?: ClassifiedError;
  durationMs?: number;
}

/** A finished record without running anything. Failed records carry no metric values. */
export function makeRecord(input: RecordInput = {}): RunRecord {
  const values = input.metrics ?? { "auc-roc": 0.75 };
  const spec = createRunSpec({
    datasetId: input.datasetId ?? "events",
    algorithmId: input.algorithmId ?? "zscore",
    parameters: input.parameters,
    metricIds: Object.keys(values),
    metricOptions: input.metricOptions,
    normalize: input.normalize,
  });
  const status = input.status ?? (input.error ? "Failed" : "Success");
  const metrics: MetricResult[] =
    status === "Failed"
      ? []
      : Object.entries(values).map(([metricId, value]) => {
          const diagnostic = input.notes?.[metricId];
          return diagnostic === undefined ? { metricId, value } : { metricId, value, diagnostic };
        });
  const durationMs = input.durationMs ?? 12.5;
  const record: RunRecord = {
    runId: runSpecId(spec),
    spec,
    status,
    metrics,
    durationMs,
    fitMs: 2.5,
    scoreMs: durationMs - 2.5,
  };
  return input.error ? { ...record, error: input.error } : record;
}
