import { readdir, readFile } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  classifyError,
  DatasetCorruptError,
  DatasetNotFoundError,
  isBenchError,
  type ClassifiedError,
} from "../errors.js";
import type { Dataset, DatasetCatalog, DatasetInfo, MetadataValue, RawDataset } from "./types.js";
import { describeDataset, toMetadata, validateDataset } from "./validate.js";

export class InMemoryCatalog implements DatasetCatalog {
  private entries: Map<string, RawDataset>;

  constructor(entries: Record<string, RawDataset>) {
    this.entries = new Map(Object.entries(entries));
  }

  async resolve(datasetId: string): Promise<Dataset> {
    const raw = this.entries.get(datasetId);
    if (!raw) throw new DatasetNotFoundError(datasetId);
    return validateDataset(datasetId, raw);
  }

  async list(): Promise<DatasetInfo[]> {
    return [...this.entries.entries()]
      .map(([id, raw]) => ({ id, metadata: toMetadata(raw.metadata) }))
      .sort((a, b) => a.id.localeCompare(b.id));
  }
}

export interface DatasetSummary extends DatasetInfo {
  /** Why the dataset could not be loaded; metadata then holds only what the listing gave. */
  error?: ClassifiedError;
}

/** Loads every listed dataset in turn, keeping load failures per dataset. */
export async function inspectDatasets(catalog: DatasetCatalog): Promise<DatasetSummary[]> {
  const summaries: DatasetSummary[] = [];
  for (const info of await catalog.list()) {
    try {
      summaries.push({ id: info.id, metadata: describeDataset(await catalog.resolve(info.id)) });
    } catch (e) {
      if (!isBenchError(e)) throw e;
      summaries.push({ ...info, error: classifyError(e, "DatasetCorrupt") });
    }
  }
  return summaries;
}

const MANIFEST_FILE = "catalog.json";
const DATA_EXTENSIONS = [".json", ".csv"] as const;
type DataExtension = (typeof DATA_EXTENSIONS)[number];

const manifestSchema = z.object({
  datasets: z.record(
    z.string(),
    z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))
  ),
});

const jsonDatasetSchema = z.object({
  series: z.array(z.unknown()),
  labels: z.array(z.unknown()),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Catalog over a directory of `*.json` and `*.csv` files.
 *
 * Dataset ids are paths relative to the root, `/`-separated, without extension.
 * An optional `catalog.json` at the root maps ids to metadata used for filtering.
 */
export class DirectoryCatalog implements DatasetCatalog {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async list(): Promise<DatasetInfo[]> {
    const files = await this.scan();
    const manifest = await this.readManifest();

    return files.map(({ id, extension }) => ({
      id,
      metadata: { format: extension.slice(1), ...(manifest[id] ?? {}) },
    }));
  }

  async resolve(datasetId: string): Promise<Dataset> {
    const files = await this.scan();
    const file = files.find((f) => f.id === datasetId);
    if (!file) throw new DatasetNotFoundError(datasetId);

    const text = await readFile(file.path, "utf-8");
    const raw = file.extension === ".json" ? parseJsonDataset(datasetId, text) : parseCsvDataset(datasetId, text);

    const manifest = await this.readManifest();
    const declared = toMetadata(raw.metadata);
    return validateDataset(datasetId, {
      ...raw,
      metadata: { format: file.extension.slice(1), ...declared, ...(manifest[datasetId] ?? {}) },
    });
  }

  private async readManifest(): Promise<Record<string, Record<string, MetadataValue>>> {
    let text: string;
    try {
      text = await readFile(join(this.root, MANIFEST_FILE), "utf-8");
    } catch (e) {
      if (isNotFound(e)) return {};
      throw new DatasetCorruptError(MANIFEST_FILE, e instanceof Error ? e.message : String(e));
    }
    const parsed = manifestSchema.safeParse(safeJson(text));
    if (!parsed.success) {
      throw new DatasetCorruptError(MANIFEST_FILE, parsed.error.issues.map((i) => i.message).join("; "));
    }
    return parsed.data.datasets;
  }

  private async scan(): Promise<{ id: string; path: string; extension: DataExtension }[]> {
    const paths = await scanDir(this.root);
    const files: { id: string; path: string; extension: DataExtension }[] = [];

    for (const path of paths) {
      const extension = DATA_EXTENSIONS.find((ext) => path.endsWith(ext));
      if (!extension) continue;
      const rel = relative(this.root, path);
      if (rel === MANIFEST_FILE) continue;
      files.push({
        id: rel.slice(0, -extension.length).split(sep).join("/"),
        path,
        extension,
      });
    }

    return files.sort((a, b) => a.id.localeCompare(b.id));
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseJsonDataset(id: string, text: string): RawDataset {
  const data = safeJson(text);
  if (data === undefined) throw new DatasetCorruptError(id, "invalid JSON");
  const parsed = jsonDatasetSchema.safeParse(data);
  if (!parsed.success) {
    throw new DatasetCorruptError(id, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return parsed.data;
}

const LABEL_COLUMNS = ["is_anomaly", "label"];
const TIME_COLUMNS = ["timestamp", "time"];

/**
 * Header row required. The label column is `is_anomaly` or `label`, otherwise the last column;
 * a `timestamp`/`time` column is ignored; every other column is one dimension.
 */
export function parseCsvDataset(id: string, text: string): RawDataset {
  let rows: string[][];
  try {
    rows = parse(text, { skip_empty_lines: true, trim: true });
  } catch (e) {
    throw new DatasetCorruptError(id, e instanceof Error ? e.message : String(e));
  }

  const [header, ...body] = rows;
  if (!header || header.length < 2) {
    throw new DatasetCorruptError(id, "CSV needs a header and at least one value and one label column");
  }

  const names = header.map((h) => h.toLowerCase());
  const named = names.findIndex((n) => LABEL_COLUMNS.includes(n));
  const labelIndex = named >= 0 ? named : names.length - 1;
  const valueIndexes = names
    .map((n, i) => ({ n, i }))
    .filter(({ n, i }) => i !== labelIndex && !TIME_COLUMNS.includes(n))
    .map(({ i }) => i);

  return {
    series: body.map((row, t) =>
      valueIndexes.map((i) => {
        const cell = row[i];
        if (cell === undefined || cell === "") throw new DatasetCorruptError(id, `timestep ${t} has an empty value`);
        return Number(cell);
      })
    ),
    labels: body.map((row) => parseLabelCell(row[labelIndex])),
  };
}

function parseLabelCell(cell: string | undefined): unknown {
  if (cell === "true") return true;
  if (cell === "false") return false;
  if (cell === undefined || cell === "") return cell;
  return Number(cell);
}

async function scanDir(dir: string): Promise<string[]> {
  const files: string[] = [];
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isNotFound(e)) return files;
    throw e;
  }
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await scanDir(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
