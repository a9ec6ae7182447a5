import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import { diffTables } from "../diff/engine.js";
import { checkRegressions, resolveLabel } from "../diff/regression.js";
import { isBenchError } from "../errors.js";
import { ResultTable } from "../results/table.js";
import { SqliteResultStore } from "../store/sqlite.js";
import type { RunRecord } from "../run/types.js";
import { makeRecord, type RecordInput } from "./fixtures.js";

const TWO_METRICS = ["auc-roc", "f1@fixed:0.5"];

function pair(input: RecordInput, before: (number | null)[], after: (number | null)[]): [RunRecord, RunRecord] {
  const values = (v: (number | null)[]) => Object.fromEntries(TWO_METRICS.map((id, i) => [id, v[i] ?? null]));
  return [makeRecord({ ...input, metrics: values(before) }), makeRecord({ ...input, metrics: values(after) })];
}

const [aBefore, aAfter] = pair({ datasetId: "a" }, [0.8, 0.5], [0.7, 0.505]);
const [bBefore, bAfter] = pair({ datasetId: "b" }, [0.6, 0.2], [0.65, 0.2]);
const [cBefore, cAfter] = pair({ datasetId: "c" }, [null, 0], [0.4, 0]);
const failing = makeRecord({
  datasetId: "f",
  metrics: { "auc-roc": null },
  error: { code: "DetectorRuntimeError", message: "score failed: kaboom" },
});
const working = makeRecord({ datasetId: "f", metrics: { "auc-roc": 0.9 } });
const dropped = makeRecord({ datasetId: "dropped" });
const added = makeRecord({ datasetId: "added" });

const before = new ResultTable([aBefore, bBefore, cBefore, working, dropped]);
const after = new ResultTable([aAfter, bAfter, cAfter, failing, added]);

describe("diffTables", () => {
  const report = diffTables("before", before, "after", after);
  const find = (datasetId: string, metricId: string) =>
    report.metrics.find((m) => m.run === `zscore on ${datasetId}` && m.metricId === metricId);

  it("classifies every metric of every run", () => {
    assert.deepEqual(report.summary, {
      total: 9,
      regressions: 2,
      improvements: 1,
      undefinedChanged: 1,
      stable: 3,
      added: 1,
      removed: 1,
    });
    assert.equal(report.hasRegressions, true);
  });

  it("sorts regressions first and removed runs last", () => {
    assert.deepEqual(
      report.metrics.map((m) => m.status),
      [
        "regression",
        "regression",
        "improvement",
        "undefined-changed",
        "stable",
        "stable",
        "stable",
        "added",
        "removed",
      ]
    );
  });

  it("reports deltas beyond the threshold", () => {
    const drop = find("a", "auc-roc");
    assert.equal(drop?.status, "regression");
    assert.equal(drop?.before, 0.8);
    assert.equal(drop?.after, 0.7);
    assert.ok(Math.abs((drop?.delta ?? 0) + 0.1) < 1e-9);
    assert.equal(find("a", "f1@fixed:0.5")?.status, "stable");
    assert.equal(find("b", "auc-roc")?.status, "improvement");
  });

  it("separates undefined values from numeric changes", () => {
    const change = find("c", "auc-roc");
    assert.equal(change?.status, "undefined-changed");
    assert.equal(change?.before, null);
    assert.equal(change?.after, 0.4);
    assert.equal(change?.delta, undefined);
  });

  it("counts a run that started failing as a regression", () => {
    const broke = find("f", "auc-roc");
    assert.equal(broke?.status, "regression");
    assert.equal(broke?.before, 0.9);
    assert.equal(broke?.after, null);
  });

  it("marks runs present on one side only", () => {
    assert.equal(find("added", "auc-roc")?.status, "added");
    assert.equal(find("dropped", "auc-roc")?.status, "removed");
    assert.equal(find("dropped", "auc-roc")?.before, 0.75);
  });

  it("honours a custom threshold", () => {
    const loose = diffTables("before", before, "after", after, { regressionThreshold: 0.2 });
    assert.equal(loose.summary.regressions, 1);
    assert.equal(loose.summary.improvements, 0);
    assert.equal(loose.summary.stable, 5);
  });

  it("treats two failed runs as stable", () => {
    const failed = new ResultTable([failing]);
    const same = diffTables("x", failed, "y", failed);
    assert.deepEqual(
      same.metrics.map((m) => [m.status, m.before, m.after]),
      [["stable", null, null]]
    );
    assert.equal(same.hasRegressions, false);
  });
});

describe("checkRegressions", () => {
  let store: SqliteResultStore;

  beforeEach(() => {
    store = new SqliteResultStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("fails the check when anything regressed", () => {
    store.saveTable("before", before);
    store.saveTable("after", after);
    const result = checkRegressions(store, "before", "after");
    assert.equal(result.exitCode, 1);
    assert.equal(result.regressionSummary, "2 regression(s) detected comparing before to after");
  });

  it("passes when nothing regressed", () => {
    store.saveTable("before", before);
    store.saveTable("again", before);
    const result = checkRegressions(store, "before", "again");
    assert.equal(result.exitCode, 0);
    assert.equal(result.diff.summary.stable, result.diff.summary.total);
  });

  it("needs both batches", () => {
    store.saveTable("before", before);
    assert.throws(
      () => checkRegressions(store, "before", "nope"),
      (e: unknown) => isBenchError(e, "StoreError") && e.message === 'Batch "nope" not found in result store.'
    );
  });

  it("resolves latest and previous from the store", () => {
    assert.throws(() => resolveLabel(store, "latest"), /No batches stored yet/);
    store.saveTable("monday", before);
    assert.throws(() => resolveLabel(store, "previous"), /Need at least 2 stored batches/);
    store.saveTable("tuesday", after);
    assert.equal(resolveLabel(store, "latest"), "tuesday");
    assert.equal(resolveLabel(store, "previous"), "monday");
    assert.equal(resolveLabel(store, "friday"), "friday");
  });
});
