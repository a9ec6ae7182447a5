import type { RunRecord } from "../run/types.js";
import type { ResultTable } from "../results/table.js";

export interface BatchMeta {
  label: string;
  createdAt: string;
  updatedAt: string;
  recordCount: number;
  succeededCount: number;
  failedCount: number;
  totalDuration: number;
}

export interface ResultStore {
  /** Insert or replace one record under a batch label, keyed by run id. */
  saveRecord(label: string, record: RunRecord): void;
  /** Replace every record of a label with the table's. */
  saveTable(label: string, table: ResultTable): BatchMeta;
  loadTable(label: string): ResultTable | null;
  listBatches(limit?: number): BatchMeta[];
  /** Most recently updated first. */
  listLabels(): string[];
  /** False when no batch had the label. */
  deleteBatch(label: string): boolean;
  close(): void;
}
