import { DatasetCorruptError } from "../errors.js";
import type { Dataset, Label, MetadataValue, RawDataset, TimeSeries } from "./types.js";

/**
 * Normalize a raw dataset into the engine's shape.
 * Univariate series are lifted to one-dimensional vectors; boolean labels become 0/1.
 */
export function validateDataset(id: string, raw: RawDataset): Dataset {
  const series = toSeries(id, raw.series);
  const labels = toLabels(id, raw.labels);

  if (series.length !== labels.length) {
    throw new DatasetCorruptError(
      id,
      `series has ${series.length} timesteps but labels has ${labels.length}`
    );
  }

  return {
    id,
    series,
    labels,
    metadata: toMetadata(raw.metadata),
  };
}

function toSeries(id: string, value: unknown): TimeSeries {
  if (!Array.isArray(value)) {
    throw new DatasetCorruptError(id, "series must be an array");
  }

  let dimension: number | undefined;
  const series: TimeSeries = [];

  for (const [t, point] of value.entries()) {
    const vector: unknown[] = Array.isArray(point) ? point : [point];
    if (vector.length === 0) {
      throw new DatasetCorruptError(id, `timestep ${t} is empty`);
    }
    dimension ??= vector.length;
    if (vector.length !== dimension) {
      throw new DatasetCorruptError(
        id,
        `timestep ${t} has ${vector.length} dimensions, expected ${dimension}`
      );
    }
    const numbers: number[] = [];
    for (const v of vector) {
      if (typeof v !== "number" || !Number.isFinite(v)) {
        throw new DatasetCorruptError(id, `timestep ${t} has a non-finite value`);
      }
      numbers.push(v);
    }
    series.push(numbers);
  }

  return series;
}

function toLabels(id: string, value: unknown): Label[] {
  if (!Array.isArray(value)) {
    throw new DatasetCorruptError(id, "labels must be an array");
  }
  return value.map((v, t): Label => {
    if (v === 1 || v === true) return 1;
    if (v === 0 || v === false) return 0;
    throw new DatasetCorruptError(id, `label at timestep ${t} must be 0/1 or boolean`);
  });
}

export function toMetadata(value: unknown): Record<string, MetadataValue> {
  const metadata: Record<string, MetadataValue> = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return metadata;
  }
  for (const [key, v] of Object.entries(value)) {
    if (v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      metadata[key] = v;
    }
  }
  return metadata;
}

/** Metadata every catalog adds on top of what the source declares. */
export function describeDataset(dataset: Dataset): Record<string, MetadataValue> {
  const anomalies = dataset.labels.reduce<number>((sum, l) => sum + l, 0);
  return {
    ...dataset.metadata,
    length: dataset.series.length,
    dimensions: dataset.series[0]?.length ?? 0,
    anomalies,
  };
}
