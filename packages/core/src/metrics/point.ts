import type { Label } from "../dataset/types.js";
import { MetricUndefinedError } from "../errors.js";
import { rankOrder } from "./thresholds.js";

export interface Confusion {
  tp: number;
  fp: number;
  fn: number;
  tn: number;
}

export function confusion(predictions: Label[], labels: Label[]): Confusion {
  const c: Confusion = { tp: 0, fp: 0, fn: 0, tn: 0 };
  labels.forEach((label, i) => {
    const predicted = predictions[i] === 1;
    if (label === 1) {
      if (predicted) c.tp++;
      else c.fn++;
    } else if (predicted) c.fp++;
    else c.tn++;
  });
  return c;
}

export function countPositives(labels: Label[]): number {
  return labels.reduce<number>((sum, l) => sum + l, 0);
}

/** Throws MetricUndefined unless both classes are present. */
export function requireBothClasses(metricId: string, labels: Label[]): { positives: number; negatives: number } {
  const positives = countPositives(labels);
  const negatives = labels.length - positives;
  if (positives === 0) throw new MetricUndefinedError(metricId, "no anomalies in ground truth");
  if (negatives === 0) throw new MetricUndefinedError(metricId, "no normal points in ground truth");
  return { positives, negatives };
}

/**
 * Area under the ROC curve of the ranking by descending score. Equal scores are
 * ordered by index, so the curve is a deterministic staircase with no tie averaging.
 */
export function aucRoc(metricId: string, scores: number[], labels: Label[]): number {
  const { positives, negatives } = requireBothClasses(metricId, labels);
  let tp = 0;
  let area = 0;
  for (const i of rankOrder(scores)) {
    if (labels[i] === 1) tp++;
    else area += tp;
  }
  return area / (positives * negatives);
}

/** Average precision over the same ranking as aucRoc. */
export function aucPr(metricId: string, scores: number[], labels: Label[]): number {
  const { positives } = requireBothClasses(metricId, labels);
  let tp = 0;
  let sum = 0;
  rankOrder(scores).forEach((i, rank) => {
    if (labels[i] === 1) {
      tp++;
      sum += tp / (rank + 1);
    }
  });
  return sum / positives;
}

export function precision(metricId: string, predictions: Label[], labels: Label[]): number {
  const { tp, fp } = confusion(predictions, labels);
  if (tp + fp === 0) throw new MetricUndefinedError(metricId, "no predicted anomalies");
  return tp / (tp + fp);
}

export function recall(metricId: string, predictions: Label[], labels: Label[]): number {
  const { tp, fn } = confusion(predictions, labels);
  if (tp + fn === 0) throw new MetricUndefinedError(metricId, "no anomalies in ground truth");
  return tp / (tp + fn);
}

export function fBeta(metricId: string, predictions: Label[], labels: Label[], beta: number): number {
  const { tp, fp, fn } = confusion(predictions, labels);
  if (tp + fn === 0) throw new MetricUndefinedError(metricId, "no anomalies in ground truth");
  const b2 = beta * beta;
  return ((1 + b2) * tp) / ((1 + b2) * tp + b2 * fn + fp);
}
