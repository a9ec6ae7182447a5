import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parseConfig, type BenchConfigInput } from "../config/schema.js";
import { ConfigurationError } from "../errors.js";
import { MetricRegistry } from "../metrics/registry.js";
import type { RunSpec } from "../run/types.js";
import { expandRunSpecs } from "../workflow/expand.js";
import { testCatalog, testRegistry } from "./fixtures.js";

function expand(input: BenchConfigInput): Promise<RunSpec[]> {
  return expandRunSpecs(parseConfig(input), {
    catalog: testCatalog(),
    detectors: testRegistry(),
    metrics: new MetricRegistry(),
  });
}

async function expansionIssues(input: BenchConfigInput): Promise<string[]> {
  try {
    await expand(input);
  } catch (e) {
    if (e instanceof ConfigurationError) return e.issues;
    throw e;
  }
  assert.fail("expected a ConfigurationError");
}

describe("expandRunSpecs", () => {
  it("crosses datasets, algorithms and parameter sets in configuration order", async () => {
    const specs = await expand({
      datasets: ["events", "other"],
      algorithms: [
        { algorithm: "zscore", grid: { robust: [false, true] } },
        { algorithm: "moving-average", parameters: { window: 2 } },
      ],
      metrics: ["auc-roc"],
    });
    assert.deepEqual(
      specs.map((s) => [s.datasetId, s.algorithmId, s.parameters]),
      [
        ["events", "zscore", { robust: false }],
        ["events", "zscore", { robust: true }],
        ["events", "moving-average", { window: 2 }],
        ["other", "zscore", { robust: false }],
        ["other", "zscore", { robust: true }],
        ["other", "moving-average", { window: 2 }],
      ]
    );
  });

  it("varies the last grid key fastest and merges fixed parameters", async () => {
    const specs = await expand({
      datasets: ["events"],
      algorithms: [{ algorithm: "nearest-neighbor", parameters: { stride: 2 }, grid: { window: [2, 3], k: [1, 2] } }],
      metrics: ["auc-roc"],
    });
    assert.deepEqual(
      specs.map((s) => s.parameters),
      [
        { stride: 2, window: 2, k: 1 },
        { stride: 2, window: 2, k: 2 },
        { stride: 2, window: 3, k: 1 },
        { stride: 2, window: 3, k: 2 },
      ]
    );
  });

  it("adds filter matches in id order and drops repeated datasets", async () => {
    const specs = await expand({
      datasets: ["quiet", { where: { domain: "unit" } }, { where: { size: ["tiny", "small"] } }],
      algorithms: [{ algorithm: "zscore" }],
      metrics: ["auc-roc"],
    });
    assert.deepEqual(
      specs.map((s) => s.datasetId),
      ["quiet", "events"]
    );
  });

  it("drops duplicate run specs", async () => {
    const specs = await expand({
      datasets: ["events"],
      algorithms: [{ algorithm: "zscore" }, { algorithm: "zscore" }],
      metrics: ["auc-roc"],
    });
    assert.equal(specs.length, 1);
  });

  it("combines bare thresholded kinds with every threshold", async () => {
    const [spec] = await expand({
      datasets: ["events"],
      algorithms: [{ algorithm: "zscore" }],
      metrics: ["auc-roc", "f1", "f1@fixed:0.5", { name: "f2", kind: "fbeta", beta: 2, threshold: { type: "topn", n: 2 } }],
      thresholds: [
        { type: "fixed", cutoff: 0.5 },
        { type: "topn", n: 2 },
      ],
    });
    assert.deepEqual(spec?.metricIds, ["auc-roc", "f1@fixed:0.5", "f1@topn:2", "f2"]);
    assert.deepEqual(spec?.metricOptions, { f2: { kind: "fbeta", threshold: { type: "topn", n: 2 }, beta: 2 } });
  });

  it("carries the normalize flag into every run", async () => {
    const specs = await expand({
      datasets: ["events", "other"],
      algorithms: [{ algorithm: "zscore" }],
      metrics: ["auc-roc"],
      normalize: false,
    });
    assert.deepEqual(
      specs.map((s) => s.normalize),
      [false, false]
    );
  });

  it("needs a threshold for bare thresholded kinds", async () => {
    const issues = await expansionIssues({
      datasets: ["events"],
      algorithms: [{ algorithm: "zscore" }],
      metrics: ["recall"],
    });
    assert.equal(issues.length, 1);
    assert.match(issues[0] ?? "", /^metrics\.0: "recall" needs a threshold/);
  });

  it("reports every unknown reference at once", async () => {
    const issues = await expansionIssues({
      datasets: ["events", "atlantis"],
      algorithms: [{ algorithm: "isolation-forest" }],
      metrics: ["auc-roc", "accuracy"],
    });
    assert.equal(issues.length, 3);
    assert.ok(issues.some((i) => i.startsWith('datasets.1: unknown dataset "atlantis"')));
    assert.ok(issues.some((i) => i.startsWith('algorithms.0: unknown algorithm "isolation-forest"')));
    assert.ok(issues.some((i) => i.startsWith('metrics.1: Unknown metric "accuracy"')));
  });

  it("rejects filters that match nothing", async () => {
    const issues = await expansionIssues({
      datasets: [{ where: { domain: "space" } }],
      algorithms: [{ algorithm: "zscore" }],
      metrics: ["auc-roc"],
    });
    assert.deepEqual(issues, ['datasets.0: filter {"domain":"space"} matched no datasets']);
  });

  it("rejects a parameter that is both fixed and in the grid", async () => {
    const issues = await expansionIssues({
      datasets: ["events"],
      algorithms: [{ algorithm: "moving-average", parameters: { window: 2 }, grid: { window: [3, 4] } }],
      metrics: ["auc-roc"],
    });
    assert.deepEqual(issues, ["algorithms.0.grid.window: parameter is both fixed and in the grid"]);
  });

  it("leaves parameter domains to instantiation", async () => {
    const specs = await expand({
      datasets: ["events"],
      algorithms: [{ algorithm: "moving-average", parameters: { window: -1 } }],
      metrics: ["auc-roc"],
    });
    assert.equal(specs.length, 1);
  });
});
