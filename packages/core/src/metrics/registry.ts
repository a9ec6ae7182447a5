import type { Label } from "../dataset/types.js";
import { ConfigurationError, MetricUndefinedError } from "../errors.js";
import { aucPr, aucRoc, fBeta, precision, recall } from "./point.js";
import { eventRecall, rangeFBeta } from "./range.js";
import { applyThreshold, formatThreshold, parseThreshold, type ThresholdSpec } from "./thresholds.js";

export type MetricFamily = "point" | "range";

export interface MetricDefinition {
  id: string;
  family: MetricFamily;
  /** Pure; throws MetricUndefinedError when its precondition does not hold. */
  compute(scores: number[], labels: Label[]): number;
}

export interface MetricResult {
  metricId: string;
  /** null means undefined, which is not the same thing as 0. */
  value: number | null;
  diagnostic?: string;
}

export const THRESHOLD_FREE_KINDS = ["auc-roc", "auc-pr"] as const;
export const THRESHOLDED_KINDS = [
  "precision",
  "recall",
  "f1",
  "fbeta",
  "event-recall",
  "range-f1",
  "range-fbeta",
] as const;

export type ThresholdedKind = (typeof THRESHOLDED_KINDS)[number];
export type MetricKind = (typeof THRESHOLD_FREE_KINDS)[number] | ThresholdedKind;

export interface MetricOptions {
  kind: MetricKind;
  threshold?: ThresholdSpec;
  beta?: number;
  alpha?: number;
}

const ALL_KINDS: ReadonlySet<string> = new Set([...THRESHOLD_FREE_KINDS, ...THRESHOLDED_KINDS]);
const THRESHOLDED: ReadonlySet<string> = new Set(THRESHOLDED_KINDS);

export function isMetricKind(value: string): value is MetricKind {
  return ALL_KINDS.has(value);
}

export function isThresholdedKind(value: string): value is ThresholdedKind {
  return THRESHOLDED.has(value);
}

/** `auc-roc`, `f1@fixed:0.5`, `range-f1@topn:3`. */
export function metricId(kind: MetricKind, threshold?: ThresholdSpec): string {
  return threshold ? `${kind}@${formatThreshold(threshold)}` : kind;
}

export function buildMetric(id: string, options: MetricOptions): MetricDefinition {
  const { kind, threshold } = options;
  const beta = options.beta ?? 1;
  const alpha = options.alpha ?? 1;

  if (!Number.isFinite(beta) || beta <= 0) {
    throw new ConfigurationError(`Metric "${id}": beta must be positive`);
  }
  if (!(alpha >= 0 && alpha <= 1)) {
    throw new ConfigurationError(`Metric "${id}": alpha must be in [0, 1]`);
  }

  switch (kind) {
    case "auc-roc":
      return { id, family: "point", compute: (scores, labels) => aucRoc(id, scores, labels) };
    case "auc-pr":
      return { id, family: "point", compute: (scores, labels) => aucPr(id, scores, labels) };
  }

  if (!threshold) {
    throw new ConfigurationError(`Metric "${id}" (${kind}) needs a threshold`);
  }
  const predict = (scores: number[]) => applyThreshold(scores, threshold);

  switch (kind) {
    case "precision":
      return { id, family: "point", compute: (s, l) => precision(id, predict(s), l) };
    case "recall":
      return { id, family: "point", compute: (s, l) => recall(id, predict(s), l) };
    case "f1":
      return { id, family: "point", compute: (s, l) => fBeta(id, predict(s), l, 1) };
    case "fbeta":
      return { id, family: "point", compute: (s, l) => fBeta(id, predict(s), l, beta) };
    case "event-recall":
      return { id, family: "range", compute: (s, l) => eventRecall(id, predict(s), l, alpha) };
    case "range-f1":
      return { id, family: "range", compute: (s, l) => rangeFBeta(id, predict(s), l, { alpha, beta: 1 }) };
    case "range-fbeta":
      return { id, family: "range", compute: (s, l) => rangeFBeta(id, predict(s), l, { alpha, beta }) };
  }
  throw new ConfigurationError(`Unknown metric kind "${String(kind)}"`);
}

/**
 * Metric lookup by id. Self-describing ids (`<kind>[@<threshold>]`) resolve
 * without registration; named metrics carry options such as beta and alpha.
 */
export class MetricRegistry {
  private metrics = new Map<string, MetricDefinition>();
  private named = new Map<string, string>();

  register(definition: MetricDefinition): this {
    const existing = this.metrics.get(definition.id);
    if (existing && existing !== definition) {
      throw new ConfigurationError(`Metric "${definition.id}" is already defined`);
    }
    this.metrics.set(definition.id, definition);
    return this;
  }

  /** Defining the same name again with identical options returns the existing metric. */
  define(name: string, options: MetricOptions): MetricDefinition {
    const key = JSON.stringify([options.kind, options.threshold ?? null, options.beta ?? null, options.alpha ?? null]);
    const existing = this.metrics.get(name);
    if (existing && this.named.get(name) === key) return existing;

    const definition = buildMetric(name, options);
    this.register(definition);
    this.named.set(name, key);
    return definition;
  }

  resolve(id: string): MetricDefinition {
    const known = this.metrics.get(id);
    if (known) return known;

    const [kind, threshold, ...rest] = id.split("@");
    if (rest.length > 0 || kind === undefined || !isMetricKind(kind)) {
      throw new ConfigurationError(
        `Unknown metric "${id}". Kinds: ${[...ALL_KINDS].join(", ")}`
      );
    }
    if (!isThresholdedKind(kind) && threshold !== undefined) {
      throw new ConfigurationError(`Metric "${kind}" does not take a threshold`);
    }

    const definition = buildMetric(id, {
      kind,
      threshold: threshold === undefined ? undefined : parseThreshold(threshold),
    });
    this.metrics.set(id, definition);
    return definition;
  }

  /**
   * Never throws: any failure becomes an undefined value with a diagnostic.
   * With `options`, `id` names a configured metric defined by them.
   */
  evaluate(id: string, scores: number[], labels: Label[], options?: MetricOptions): MetricResult {
    try {
      const definition = options ? this.define(id, options) : this.resolve(id);
      const value = definition.compute(scores, labels);
      if (!Number.isFinite(value)) {
        return { metricId: id, value: null, diagnostic: "metric produced a non-finite value" };
      }
      return { metricId: id, value };
    } catch (e) {
      const diagnostic =
        e instanceof MetricUndefinedError ? e.reason : `metric failed: ${e instanceof Error ? e.message : String(e)}`;
      return { metricId: id, value: null, diagnostic };
    }
  }
}
