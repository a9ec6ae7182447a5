import type { Label } from "../dataset/types.js";
import { requireBothClasses } from "./point.js";

/** A maximal run of anomalous labels, `end` inclusive. */
export interface AnomalyEvent {
  start: number;
  end: number;
}

export function anomalyEvents(labels: Label[]): AnomalyEvent[] {
  const events: AnomalyEvent[] = [];
  let start = -1;
  labels.forEach((label, i) => {
    if (label === 1 && start < 0) start = i;
    if (label === 0 && start >= 0) {
      events.push({ start, end: i - 1 });
      start = -1;
    }
  });
  if (start >= 0) events.push({ start, end: labels.length - 1 });
  return events;
}

export interface RangeOptions {
  /** Weight of the existence reward against the overlap fraction, in [0, 1]. */
  alpha: number;
  beta: number;
}

/**
 * Per-event recall averaged over events: `alpha` when any predicted point falls
 * in the event, plus `1 - alpha` times the fraction of the event predicted.
 */
export function eventRecall(metricId: string, predictions: Label[], labels: Label[], alpha: number): number {
  requireBothClasses(metricId, labels);
  const events = anomalyEvents(labels);
  const total = events.reduce((sum, { start, end }) => {
    let hits = 0;
    for (let t = start; t <= end; t++) if (predictions[t] === 1) hits++;
    const existence = hits > 0 ? 1 : 0;
    const overlap = hits / (end - start + 1);
    return sum + alpha * existence + (1 - alpha) * overlap;
  }, 0);
  return total / events.length;
}

/** Point precision over predicted anomalies; 0 when nothing is predicted. */
export function pointPrecision(predictions: Label[], labels: Label[]): number {
  let predicted = 0;
  let correct = 0;
  predictions.forEach((p, i) => {
    if (p === 1) {
      predicted++;
      if (labels[i] === 1) correct++;
    }
  });
  return predicted === 0 ? 0 : correct / predicted;
}

/** F-beta of event recall and point precision. */
export function rangeFBeta(metricId: string, predictions: Label[], labels: Label[], options: RangeOptions): number {
  const r = eventRecall(metricId, predictions, labels, options.alpha);
  const p = pointPrecision(predictions, labels);
  if (p === 0 && r === 0) return 0;
  const b2 = options.beta * options.beta;
  return ((1 + b2) * p * r) / (b2 * p + r);
}
