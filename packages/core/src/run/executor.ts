import type { BatchDatasetCache } from "../dataset/cache.js";
import type { Dataset } from "../dataset/types.js";
import type { DetectorRegistry } from "../detector/registry.js";
import type { Detector } from "../detector/types.js";
import { classifyError, DetectorRuntimeError, type ClassifiedError } from "../errors.js";
import type { MetricRegistry } from "../metrics/registry.js";
import { runSpecId } from "./spec.js";
import type { RunRecord, RunSpec } from "./types.js";

/** Min-max scaling; a constant score sequence maps to all zeros. */
export function normalizeScores(scores: number[]): number[] {
  let min = Infinity;
  let max = -Infinity;
  for (const s of scores) {
    if (s < min) min = s;
    if (s > max) max = s;
  }
  if (!(max > min)) return scores.map(() => 0);
  return scores.map((s) => (s - min) / (max - min));
}

/**
 * Executes one RunSpec. Nothing thrown inside a run escapes: every failure
 * becomes a Failed record with a classified error.
 */
export class RunExecutor {
  private datasets: BatchDatasetCache;
  private detectors: DetectorRegistry;
  private metrics: MetricRegistry;

  constructor(datasets: BatchDatasetCache, detectors: DetectorRegistry, metrics: MetricRegistry) {
    this.datasets = datasets;
    this.detectors = detectors;
    this.metrics = metrics;
  }

  async execute(spec: RunSpec): Promise<RunRecord> {
    const runId = runSpecId(spec);
    const timing = { fitMs: 0, scoreMs: 0 };

    let dataset: Dataset;
    let detector: Detector;
    try {
      dataset = await this.datasets.resolve(spec.datasetId);
    } catch (e) {
      return failed(runId, spec, timing, classifyError(e, "DatasetCorrupt"));
    }
    try {
      detector = this.detectors.instantiate(spec.algorithmId, { ...spec.parameters });
    } catch (e) {
      return failed(runId, spec, timing, classifyError(e, "InvalidParameter"));
    }

    let scores: number[];
    try {
      const fitStart = performance.now();
      await guard("fit", () => detector.fit(dataset.series));
      timing.fitMs = performance.now() - fitStart;

      const scoreStart = performance.now();
      scores = await guard("score", () => detector.score(dataset.series));
      timing.scoreMs = performance.now() - scoreStart;

      checkScores(scores, dataset.labels.length);
    } catch (e) {
      return failed(runId, spec, timing, classifyError(e, "DetectorRuntimeError"));
    }

    const scored = spec.normalize ? normalizeScores(scores) : scores;

    return {
      runId,
      spec,
      status: "Success",
      metrics: spec.metricIds.map((id) => this.metrics.evaluate(id, scored, dataset.labels, spec.metricOptions[id])),
      durationMs: timing.fitMs + timing.scoreMs,
      fitMs: timing.fitMs,
      scoreMs: timing.scoreMs,
    };
  }
}

async function guard<T>(stage: "fit" | "score", fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    throw new DetectorRuntimeError(`${stage} failed: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function checkScores(scores: unknown, expected: number): asserts scores is number[] {
  if (!Array.isArray(scores)) {
    throw new DetectorRuntimeError("score did not return an array");
  }
  if (scores.length !== expected) {
    throw new DetectorRuntimeError(`score returned ${scores.length} values for ${expected} timesteps`);
  }
  const bad = scores.findIndex((s) => typeof s !== "number" || !Number.isFinite(s));
  if (bad >= 0) {
    throw new DetectorRuntimeError(`score returned a non-finite value at timestep ${bad}`);
  }
}

function failed(
  runId: string,
  spec: RunSpec,
  timing: { fitMs: number; scoreMs: number },
  error: ClassifiedError
): RunRecord {
  return {
    runId,
    spec,
    status: "Failed",
    metrics: [],
    durationMs: timing.fitMs + timing.scoreMs,
    fitMs: timing.fitMs,
    scoreMs: timing.scoreMs,
    error,
  };
}
