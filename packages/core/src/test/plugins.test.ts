import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createDefaultDetectorRegistry } from "../detector/builtin.js";
import { loadDetectorPlugins, validateDetectorFactory } from "../detector/plugins.js";
import { isBenchError } from "../errors.js";
import type { Logger } from "../logger.js";

const CONSTANT = `{
  id: "constant",
  description: "Scores every point the same",
  parameters: { safeParse: (value) => ({ success: true, data: value }) },
  create: () => ({ fit() {}, score: (series) => series.map(() => 0.5) }),
}`;

function recordingLogger(lines: string[]): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: (m) => lines.push(m),
    error: () => {},
  };
}

describe("validateDetectorFactory", () => {
  it("warns about a missing description", () => {
    const result = validateDetectorFactory({
      id: "plain",
      parameters: { safeParse: () => ({ success: true }) },
      create: () => ({}),
    });
    assert.equal(result.valid, true);
    assert.deepEqual(result.warnings, ["no 'description'; it will be shown as empty"]);
  });

  it("lists what is missing", () => {
    const result = validateDetectorFactory({ id: "half", parameters: {}, create: 42 });
    assert.equal(result.valid, false);
    assert.deepEqual(result.errors, [
      "'parameters' must have a zod 'parameters' schema",
      "'create' must have a 'create' function",
    ]);
  });

  it("rejects non-objects", () => {
    assert.deepEqual(validateDetectorFactory(null).errors, ["Detector must be an object"]);
  });
});

describe("loadDetectorPlugins", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tsbench-plugins-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writePlugin(name: string, source: string): string {
    fs.writeFileSync(path.join(dir, name), source);
    return name;
  }

  it("registers valid detectors and skips invalid ones", async () => {
    const plugin = writePlugin("detectors.mjs", `export default [${CONSTANT}, { id: "broken", create: 42 }];\n`);
    const registry = createDefaultDetectorRegistry();
    const warnings: string[] = [];

    const ids = await loadDetectorPlugins([plugin], registry, { baseDir: dir, logger: recordingLogger(warnings) });

    assert.deepEqual(ids, ["constant"]);
    assert.equal(registry.has("broken"), false);
    assert.equal(warnings.length, 1);
    assert.match(warnings[0] ?? "", /^Skipping invalid detector in detectors\.mjs: /);

    const detector = registry.instantiate("constant", {});
    assert.deepEqual(await detector.score([[1], [2]]), [0.5, 0.5]);
  });

  it("picks up named exports", async () => {
    const plugin = writePlugin(
      "named.mjs",
      `export const first = ${CONSTANT};\nexport const second = { ...first, id: "constant-2" };\nexport const unrelated = 3;\n`
    );
    const registry = createDefaultDetectorRegistry();
    assert.deepEqual(await loadDetectorPlugins([plugin], registry, { baseDir: dir }), ["constant", "constant-2"]);
  });

  it("refuses to redefine a detector", async () => {
    const plugin = writePlugin("clash.mjs", `export default { ...${CONSTANT}, id: "zscore" };\n`);
    await assert.rejects(
      loadDetectorPlugins([plugin], createDefaultDetectorRegistry(), { baseDir: dir }),
      (e: unknown) => isBenchError(e, "ConfigurationError") && e.message === 'Plugin clash.mjs redefines detector "zscore"'
    );
  });

  it("fails on modules without detectors", async () => {
    const plugin = writePlugin("empty.mjs", "export const answer = 42;\n");
    await assert.rejects(
      loadDetectorPlugins([plugin], createDefaultDetectorRegistry(), { baseDir: dir }),
      (e: unknown) => isBenchError(e, "ConfigurationError") && e.message === "Plugin empty.mjs exports no detectors"
    );
  });

  it("fails on modules that cannot be imported", async () => {
    await assert.rejects(
      loadDetectorPlugins(["missing.mjs"], createDefaultDetectorRegistry(), { baseDir: dir }),
      (e: unknown) => isBenchError(e, "ConfigurationError") && e.message.startsWith("Failed to load plugin missing.mjs")
    );
  });
});
