/** One numeric vector per timestep. */
export type TimeSeries = number[][];

export type Label = 0 | 1;

export type MetadataValue = string | number | boolean | null;

export interface Dataset {
  id: string;
  series: TimeSeries;
  labels: Label[];
  metadata: Record<string, MetadataValue>;
}

export interface DatasetInfo {
  id: string;
  metadata: Record<string, MetadataValue>;
}

export interface DatasetCatalog {
  /** Throws DatasetNotFound for unknown ids and DatasetCorrupt for malformed content. */
  resolve(datasetId: string): Promise<Dataset>;
  list(): Promise<DatasetInfo[]>;
}

/** Raw shape accepted from files and callers before validation. */
export interface RawDataset {
  series: unknown;
  labels: unknown;
  metadata?: unknown;
}
