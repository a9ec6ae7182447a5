import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { BatchDatasetCache } from "../dataset/cache.js";
import { DirectoryCatalog, InMemoryCatalog, inspectDatasets, parseCsvDataset } from "../dataset/catalog.js";
import { demonstrationTimeSeries, makeSineWave } from "../dataset/synthetic.js";
import type { Dataset, DatasetCatalog, DatasetInfo } from "../dataset/types.js";
import { describeDataset, validateDataset } from "../dataset/validate.js";
import { isBenchError } from "../errors.js";

describe("validateDataset", () => {
  it("lifts univariate series and normalizes boolean labels", () => {
    const dataset = validateDataset("d", { series: [1, 2, 3], labels: [true, false, 0], metadata: { source: "test" } });
    assert.deepEqual(dataset, {
      id: "d",
      series: [[1], [2], [3]],
      labels: [1, 0, 0],
      metadata: { source: "test" },
    });
  });

  it("rejects a length mismatch", () => {
    assert.throws(
      () => validateDataset("d", { series: [1, 2, 3], labels: [0, 1] }),
      (e: unknown) => isBenchError(e, "DatasetCorrupt") && e.message.includes("3 timesteps but labels has 2")
    );
  });

  it("rejects ragged dimensions, non-finite values and bad labels", () => {
    const cases = [
      { series: [[1, 2], [3]], labels: [0, 0] },
      { series: [1, Number.NaN], labels: [0, 0] },
      { series: [1, "2"], labels: [0, 0] },
      { series: [1, 2], labels: [0, 2] },
      { series: "1,2", labels: [0, 0] },
    ];
    for (const raw of cases) {
      assert.throws(() => validateDataset("d", raw), (e: unknown) => isBenchError(e, "DatasetCorrupt"));
    }
  });

  it("keeps only scalar metadata", () => {
    const dataset = validateDataset("d", { series: [1], labels: [0], metadata: { a: 1, b: [1], c: null } });
    assert.deepEqual(dataset.metadata, { a: 1, c: null });
  });

  it("describes length, dimensions and anomaly count", () => {
    const dataset = validateDataset("d", { series: [[1, 2], [3, 4]], labels: [0, 1], metadata: { a: "x" } });
    assert.deepEqual(describeDataset(dataset), { a: "x", length: 2, dimensions: 2, anomalies: 1 });
  });
});

describe("parseCsvDataset", () => {
  it("reads the is_anomaly column and skips timestamps", () => {
    const raw = parseCsvDataset("c", "timestamp,value,is_anomaly\nt0,1.5,0\nt1,2,1\n");
    const dataset = validateDataset("c", raw);
    assert.deepEqual(dataset.series, [[1.5], [2]]);
    assert.deepEqual(dataset.labels, [0, 1]);
  });

  it("falls back to the last column for labels", () => {
    const dataset = validateDataset("c", parseCsvDataset("c", "a,b,flag\n1,2,false\n3,4,true\n"));
    assert.deepEqual(dataset.series, [[1, 2], [3, 4]]);
    assert.deepEqual(dataset.labels, [0, 1]);
  });

  it("makes non-numeric cells a corrupt dataset", () => {
    assert.throws(
      () => validateDataset("c", parseCsvDataset("c", "value,label\nabc,0\n")),
      (e: unknown) => isBenchError(e, "DatasetCorrupt")
    );
  });

  it("rejects an empty value cell instead of reading it as zero", () => {
    assert.throws(
      () => parseCsvDataset("x", "value,is_anomaly\n1.5,0\n,1\n2.5,0\n"),
      (e: unknown) =>
        isBenchError(e, "DatasetCorrupt") && e.message === 'Dataset "x" is corrupt: timestep 1 has an empty value'
    );
  });

  it("needs a header with a value and a label column", () => {
    assert.throws(() => parseCsvDataset("c", "label\n0\n"), (e: unknown) => isBenchError(e, "DatasetCorrupt"));
  });
});

describe("InMemoryCatalog", () => {
  const catalog = new InMemoryCatalog({
    b: { series: [1, 2], labels: [0, 1], metadata: { domain: "x" } },
    a: { series: [1], labels: [0] },
  });

  it("lists ids in order with declared metadata", async () => {
    assert.deepEqual(await catalog.list(), [
      { id: "a", metadata: {} },
      { id: "b", metadata: { domain: "x" } },
    ]);
  });

  it("throws DatasetNotFound for unknown ids", async () => {
    await assert.rejects(catalog.resolve("zzz"), (e: unknown) => isBenchError(e, "DatasetNotFound"));
  });
});

describe("inspectDatasets", () => {
  it("describes loadable datasets and keeps load errors per dataset", async () => {
    const catalog = new InMemoryCatalog({
      good: { series: [[1, 2], [3, 4], [5, 6]], labels: [0, 1, 1], metadata: { domain: "x" } },
      short: { series: [1, 2, 3], labels: [0, 1], metadata: { domain: "y" } },
    });
    assert.deepEqual(await inspectDatasets(catalog), [
      { id: "good", metadata: { domain: "x", length: 3, dimensions: 2, anomalies: 2 } },
      {
        id: "short",
        metadata: { domain: "y" },
        error: { code: "DatasetCorrupt", message: 'Dataset "short" is corrupt: series has 3 timesteps but labels has 2' },
      },
    ]);
  });
});

describe("DirectoryCatalog", () => {
  let root: string;

  before(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "tsbench-catalog-"));
    fs.writeFileSync(
      path.join(root, "a.json"),
      JSON.stringify({ series: [1, 2, 3], labels: [0, 1, 0], metadata: { source: "unit" } })
    );
    fs.mkdirSync(path.join(root, "nested"));
    fs.writeFileSync(path.join(root, "nested", "b.csv"), "value,label\n1,0\n5,1\n");
    fs.writeFileSync(path.join(root, "broken.json"), "{");
    fs.writeFileSync(path.join(root, "notes.txt"), "ignored");
    fs.writeFileSync(path.join(root, "catalog.json"), JSON.stringify({ datasets: { a: { domain: "d1" } } }));
  });

  after(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists data files by relative id with manifest metadata", async () => {
    const catalog = new DirectoryCatalog(root);
    assert.deepEqual(await catalog.list(), [
      { id: "a", metadata: { format: "json", domain: "d1" } },
      { id: "broken", metadata: { format: "json" } },
      { id: "nested/b", metadata: { format: "csv" } },
    ]);
  });

  it("merges file metadata with the manifest", async () => {
    const dataset = await new DirectoryCatalog(root).resolve("a");
    assert.deepEqual(dataset.metadata, { format: "json", source: "unit", domain: "d1" });
    assert.deepEqual(dataset.labels, [0, 1, 0]);
  });

  it("loads CSV files in subdirectories", async () => {
    const dataset = await new DirectoryCatalog(root).resolve("nested/b");
    assert.deepEqual(dataset.series, [[1], [5]]);
    assert.deepEqual(dataset.labels, [0, 1]);
  });

  it("classifies missing and malformed files", async () => {
    const catalog = new DirectoryCatalog(root);
    await assert.rejects(catalog.resolve("missing"), (e: unknown) => isBenchError(e, "DatasetNotFound"));
    await assert.rejects(catalog.resolve("broken"), (e: unknown) => isBenchError(e, "DatasetCorrupt"));
  });

  it("treats a missing root as an empty catalog", async () => {
    assert.deepEqual(await new DirectoryCatalog(path.join(root, "nope")).list(), []);
  });

  it("reports an unreadable manifest instead of ignoring it", async () => {
    const other = fs.mkdtempSync(path.join(os.tmpdir(), "tsbench-manifest-"));
    try {
      fs.writeFileSync(path.join(other, "a.json"), JSON.stringify({ series: [1], labels: [0] }));
      fs.mkdirSync(path.join(other, "catalog.json"));
      await assert.rejects(
        new DirectoryCatalog(other).list(),
        (e: unknown) => isBenchError(e, "DatasetCorrupt") && e.message.startsWith('Dataset "catalog.json" is corrupt: ')
      );
    } finally {
      fs.rmSync(other, { recursive: true, force: true });
    }
  });
});

class CountingCatalog implements DatasetCatalog {
  calls = 0;
  private inner: DatasetCatalog;

  constructor(inner: DatasetCatalog) {
    this.inner = inner;
  }

  resolve(datasetId: string): Promise<Dataset> {
    this.calls++;
    return this.inner.resolve(datasetId);
  }

  list(): Promise<DatasetInfo[]> {
    return this.inner.list();
  }
}

describe("BatchDatasetCache", () => {
  it("resolves each id once, concurrent callers included", async () => {
    const catalog = new CountingCatalog(new InMemoryCatalog({ a: { series: [1], labels: [0] } }));
    const cache = new BatchDatasetCache(catalog);
    const [first, second] = await Promise.all([cache.resolve("a"), cache.resolve("a")]);
    assert.equal(first, second);
    assert.equal(catalog.calls, 1);
    assert.equal(cache.size, 1);
  });

  it("shares failures and forgets everything on clear", async () => {
    const catalog = new CountingCatalog(new InMemoryCatalog({}));
    const cache = new BatchDatasetCache(catalog);
    await assert.rejects(cache.resolve("x"), (e: unknown) => isBenchError(e, "DatasetNotFound"));
    await assert.rejects(cache.resolve("x"), (e: unknown) => isBenchError(e, "DatasetNotFound"));
    assert.equal(catalog.calls, 1);
    cache.clear();
    assert.equal(cache.size, 0);
  });
});

describe("synthetic datasets", () => {
  it("makes a sine wave of the requested length", () => {
    const wave = makeSineWave({ length: 4, period: 4, amplitude: 2 });
    assert.equal(wave.length, 4);
    assert.equal(wave[0], 0);
    assert.equal(wave[1], 2);
  });

  it("builds the demonstration series with two labelled anomalies", () => {
    const dataset = validateDataset("demo", demonstrationTimeSeries());
    assert.equal(dataset.series.length, 1000);
    assert.equal(dataset.labels.filter((l) => l === 1).length, 21);
    assert.equal(dataset.labels[700], 1);
    assert.equal(dataset.labels[299], 0);
    assert.deepEqual(dataset.metadata, { source: "synthetic", name: "demonstration" });
  });
});
