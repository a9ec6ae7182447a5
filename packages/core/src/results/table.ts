import type { RunRecord } from "../run/types.js";

/**
 * Records keyed by run id, in first-insertion order. Writing an existing id
 * replaces the record in place. Once frozen, writes throw.
 */
export class ResultTable {
  private rows = new Map<string, RunRecord>();
  private frozen = false;

  constructor(records: Iterable<RunRecord> = []) {
    for (const record of records) this.set(record);
  }

  set(record: RunRecord): void {
    if (this.frozen) {
      throw new Error(`Result table is frozen; cannot write run ${record.runId.slice(0, 8)}`);
    }
    this.rows.set(record.runId, record);
  }

  get(runId: string): RunRecord | undefined {
    return this.rows.get(runId);
  }

  has(runId: string): boolean {
    return this.rows.has(runId);
  }

  get size(): number {
    return this.rows.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  records(): RunRecord[] {
    return [...this.rows.values()];
  }

  /** Every metric id requested by any record, in first-seen order. */
  metricIds(): string[] {
    const ids = new Set<string>();
    for (const record of this.rows.values()) {
      for (const id of record.spec.metricIds) ids.add(id);
    }
    return [...ids];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }
}

/**
 * prior ⊕ computed, keyed by run id: computed records win. With `order`, the
 * result holds exactly those run ids in that order (ids found in neither table
 * are left out); without it, prior order followed by new ids.
 */
export function mergeResultTables(prior: ResultTable, computed: ResultTable, order?: readonly string[]): ResultTable {
  const pick = (runId: string) => computed.get(runId) ?? prior.get(runId);

  if (order) {
    const merged = new ResultTable();
    for (const runId of order) {
      const record = pick(runId);
      if (record) merged.set(record);
    }
    return merged;
  }

  const merged = new ResultTable(prior.records());
  for (const record of computed.records()) merged.set(record);
  return merged;
}
