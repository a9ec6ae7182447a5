import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { BenchError } from "../errors.js";
import { fromRows, tableColumns, toRows } from "./rows.js";
import type { ResultTable } from "./table.js";

/** Null cells are written empty; `fromCsv` reads empty cells back as null. */
export function toCsv(table: ResultTable): string {
  return stringify(toRows(table), { header: true, columns: tableColumns(table) });
}

export function fromCsv(text: string): ResultTable {
  let rows: Record<string, string>[];
  try {
    rows = parse(text, { columns: true, skip_empty_lines: true });
  } catch (e) {
    throw new BenchError("StoreError", `Invalid results CSV: ${e instanceof Error ? e.message : String(e)}`);
  }
  return fromRows(rows);
}
