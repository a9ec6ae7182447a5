import { ConfigurationError } from "../errors.js";
import type { Label } from "../dataset/types.js";

export type ThresholdSpec =
  | { type: "fixed"; cutoff: number }
  | { type: "contamination"; rate: number }
  | { type: "topn"; n: number };

/** Indices ordered by descending score; equal scores keep the lower index first. */
export function rankOrder(scores: number[]): number[] {
  return scores
    .map((_, i) => i)
    .sort((a, b) => scores[b] - scores[a] || a - b);
}

/** Linear-interpolated quantile, `q` in [0, 1]. */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = q * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function applyThreshold(scores: number[], spec: ThresholdSpec): Label[] {
  switch (spec.type) {
    case "fixed": {
      const cutoff = spec.cutoff;
      return scores.map((s): Label => (s >= cutoff ? 1 : 0));
    }
    case "contamination": {
      const cutoff = quantile(scores, 1 - spec.rate);
      return scores.map((s): Label => (s >= cutoff ? 1 : 0));
    }
    case "topn": {
      const predictions = scores.map((): Label => 0);
      for (const i of rankOrder(scores).slice(0, spec.n)) predictions[i] = 1;
      return predictions;
    }
  }
}

export function formatThreshold(spec: ThresholdSpec): string {
  switch (spec.type) {
    case "fixed":
      return `fixed:${spec.cutoff}`;
    case "contamination":
      return `contamination:${spec.rate}`;
    case "topn":
      return `topn:${spec.n}`;
  }
}

/** Inverse of formatThreshold, validating the domain of each kind. */
export function parseThreshold(text: string): ThresholdSpec {
  const [type, raw, ...rest] = text.split(":");
  const value = Number(raw);
  if (rest.length > 0 || raw === undefined || raw === "" || !Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid threshold "${text}"`);
  }

  switch (type) {
    case "fixed":
      return { type: "fixed", cutoff: value };
    case "contamination":
      if (value <= 0 || value >= 1) {
        throw new ConfigurationError(`Contamination rate must be in (0, 1), got ${value}`);
      }
      return { type: "contamination", rate: value };
    case "topn":
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`topn needs a positive integer, got ${value}`);
      }
      return { type: "topn", n: value };
    default:
      throw new ConfigurationError(
        `Unknown threshold type "${type}". Use fixed:<cutoff>, contamination:<rate> or topn:<n>`
      );
  }
}
