import { createHash } from "node:crypto";
import type { ParameterSet } from "../detector/types.js";
import type { MetricKind, MetricOptions } from "../metrics/registry.js";
import { formatThreshold } from "../metrics/thresholds.js";
import type { RunSpec } from "./types.js";

/** Named metric options as stored: thresholds in their id form, absent options left out. */
export interface StoredMetricOptions {
  kind: MetricKind;
  threshold?: string;
  beta?: number;
  alpha?: number;
}

/** Parameters with keys sorted, so insertion order never changes identity. */
export function canonicalParameters(parameters: Readonly<ParameterSet>): ParameterSet {
  const sorted: ParameterSet = {};
  for (const key of Object.keys(parameters).sort()) sorted[key] = parameters[key];
  return sorted;
}

function canonicalMetricOptions(options: Readonly<Record<string, MetricOptions>>): Record<string, MetricOptions> {
  const sorted: Record<string, MetricOptions> = {};
  for (const name of Object.keys(options).sort()) {
    const option = options[name];
    if (!option) continue;
    const { kind, threshold, beta, alpha } = option;
    sorted[name] = Object.freeze({
      kind,
      ...(threshold === undefined ? {} : { threshold }),
      ...(beta === undefined ? {} : { beta }),
      ...(alpha === undefined ? {} : { alpha }),
    });
  }
  return sorted;
}

export function storedMetricOptions(spec: RunSpec): Record<string, StoredMetricOptions> {
  const stored: Record<string, StoredMetricOptions> = {};
  for (const [name, { kind, threshold, beta, alpha }] of Object.entries(canonicalMetricOptions(spec.metricOptions))) {
    stored[name] = {
      kind,
      ...(threshold === undefined ? {} : { threshold: formatThreshold(threshold) }),
      ...(beta === undefined ? {} : { beta }),
      ...(alpha === undefined ? {} : { alpha }),
    };
  }
  return stored;
}

export function createRunSpec(input: {
  datasetId: string;
  algorithmId: string;
  parameters?: ParameterSet;
  metricIds: readonly string[];
  metricOptions?: Readonly<Record<string, MetricOptions>>;
  normalize?: boolean;
}): RunSpec {
  return Object.freeze({
    datasetId: input.datasetId,
    algorithmId: input.algorithmId,
    parameters: Object.freeze(canonicalParameters(input.parameters ?? {})),
    metricIds: Object.freeze([...new Set(input.metricIds)]),
    metricOptions: Object.freeze(canonicalMetricOptions(input.metricOptions ?? {})),
    normalize: input.normalize ?? true,
  });
}

/**
 * SHA-256 over the canonical JSON of every field. Equal fields, equal id; a
 * named metric with different options or a different normalize flag is a different run.
 */
export function runSpecId(spec: RunSpec): string {
  const canonical = JSON.stringify([
    spec.datasetId,
    spec.algorithmId,
    Object.entries(canonicalParameters(spec.parameters)),
    spec.metricIds,
    Object.entries(storedMetricOptions(spec)),
    spec.normalize,
  ]);
  return createHash("sha256").update(canonical).digest("hex");
}

export function describeRunSpec(spec: RunSpec): string {
  const params = Object.entries(spec.parameters)
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
    .join(",");
  return `${spec.algorithmId}${params ? `(${params})` : ""} on ${spec.datasetId}`;
}
