import type { Dataset, DatasetCatalog } from "./types.js";

/**
 * Per-batch memo over a catalog. The first caller for an id starts the resolution;
 * concurrent and later callers share the same promise, rejections included.
 */
export class BatchDatasetCache {
  private catalog: DatasetCatalog;
  private entries = new Map<string, Promise<Dataset>>();

  constructor(catalog: DatasetCatalog) {
    this.catalog = catalog;
  }

  resolve(datasetId: string): Promise<Dataset> {
    let entry = this.entries.get(datasetId);
    if (!entry) {
      entry = this.catalog.resolve(datasetId);
      this.entries.set(datasetId, entry);
    }
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
