import type { AlgorithmEntry, BatchConfig, DatasetSelector, MetricEntry } from "../config/schema.js";
import type { DatasetCatalog, DatasetInfo, MetadataValue } from "../dataset/types.js";
import type { DetectorRegistry } from "../detector/registry.js";
import type { ParameterSet } from "../detector/types.js";
import { ConfigurationError } from "../errors.js";
import { isThresholdedKind, metricId, type MetricOptions, type MetricRegistry } from "../metrics/registry.js";
import type { ThresholdSpec } from "../metrics/thresholds.js";
import { createRunSpec, runSpecId } from "../run/spec.js";
import type { RunSpec } from "../run/types.js";

export interface ExpansionContext {
  catalog: DatasetCatalog;
  detectors: DetectorRegistry;
  metrics: MetricRegistry;
}

/**
 * Turn a validated configuration into the ordered, distinct list of runs:
 * datasets × algorithms × parameter sets, each with the full metric list.
 * Every problem found is reported in one ConfigurationError before anything runs.
 */
export async function expandRunSpecs(config: BatchConfig, context: ExpansionContext): Promise<RunSpec[]> {
  const issues: string[] = [];

  const metrics = resolveMetricIds(config.metrics, config.thresholds, context.metrics, issues);
  const datasetIds = selectDatasets(config.datasets, await context.catalog.list(), issues);

  const algorithms: { id: string; parameterSets: ParameterSet[] }[] = [];
  config.algorithms.forEach((entry, i) => {
    if (!context.detectors.has(entry.algorithm)) {
      issues.push(
        `algorithms.${i}: unknown algorithm "${entry.algorithm}". Known: [${context.detectors.ids().join(", ")}]`
      );
      return;
    }
    const parameterSets = expandGrid(entry, `algorithms.${i}`, issues);
    algorithms.push({ id: entry.algorithm, parameterSets });
  });

  if (issues.length > 0) throw new ConfigurationError("Cannot expand configuration", issues);

  const specs: RunSpec[] = [];
  const seen = new Set<string>();
  for (const datasetId of datasetIds) {
    for (const algorithm of algorithms) {
      for (const parameters of algorithm.parameterSets) {
        const spec = createRunSpec({
          datasetId,
          algorithmId: algorithm.id,
          parameters,
          metricIds: metrics.ids,
          metricOptions: metrics.options,
          normalize: config.normalize,
        });
        const id = runSpecId(spec);
        if (seen.has(id)) continue;
        seen.add(id);
        specs.push(spec);
      }
    }
  }
  return specs;
}

export interface ResolvedMetrics {
  ids: string[];
  /** Options of the named entries, by name. */
  options: Record<string, MetricOptions>;
}

/** Bare thresholded kinds fan out over every configured threshold. */
export function resolveMetricIds(
  entries: readonly MetricEntry[],
  thresholds: readonly ThresholdSpec[],
  registry: MetricRegistry,
  issues: string[]
): ResolvedMetrics {
  const ids: string[] = [];
  const named: Record<string, MetricOptions> = {};
  entries.forEach((entry, i) => {
    try {
      if (typeof entry !== "string") {
        const { name, ...options } = entry;
        ids.push(registry.define(name, options).id);
        named[name] = options;
      } else if (isThresholdedKind(entry)) {
        if (thresholds.length === 0) {
          issues.push(`metrics.${i}: "${entry}" needs a threshold; add one to "thresholds" or use "${entry}@fixed:0.5"`);
          return;
        }
        for (const threshold of thresholds) {
          ids.push(registry.resolve(metricId(entry, threshold)).id);
        }
      } else {
        ids.push(registry.resolve(entry).id);
      }
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      issues.push(`metrics.${i}: ${e.message}`);
    }
  });
  return { ids: [...new Set(ids)], options: named };
}

/** Selectors in config order; a `where` filter adds its matches in id order. */
export function selectDatasets(
  selectors: readonly DatasetSelector[],
  available: readonly DatasetInfo[],
  issues: string[]
): string[] {
  const known = new Set(available.map((d) => d.id));
  const sorted = [...available].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const ids: string[] = [];

  selectors.forEach((selector, i) => {
    if (typeof selector === "string" || "id" in selector) {
      const id = typeof selector === "string" ? selector : selector.id;
      if (known.has(id)) ids.push(id);
      else issues.push(`datasets.${i}: unknown dataset "${id}"`);
      return;
    }

    const matches = sorted.filter((info) => matchesFilter(info.metadata, selector.where));
    if (matches.length === 0) {
      issues.push(`datasets.${i}: filter ${JSON.stringify(selector.where)} matched no datasets`);
      return;
    }
    for (const match of matches) ids.push(match.id);
  });

  return [...new Set(ids)];
}

function matchesFilter(
  metadata: Readonly<Record<string, MetadataValue>>,
  where: Readonly<Record<string, MetadataValue | MetadataValue[]>>
): boolean {
  return Object.entries(where).every(([key, expected]) => {
    if (!(key in metadata)) return false;
    const actual = metadata[key];
    return Array.isArray(expected) ? expected.includes(actual ?? null) : expected === actual;
  });
}

/** Cartesian product in declared key order, last key varying fastest. */
export function expandGrid(entry: AlgorithmEntry, path: string, issues: string[]): ParameterSet[] {
  const base: ParameterSet = { ...entry.parameters };
  const grid = entry.grid ?? {};
  const keys = Object.keys(grid);

  let combinations: ParameterSet[] = [base];
  for (const key of keys) {
    const values = grid[key];
    if (values === undefined || values.length === 0) {
      issues.push(`${path}.grid.${key}: grid values must be a non-empty list`);
      return [];
    }
    if (key in base) {
      issues.push(`${path}.grid.${key}: parameter is both fixed and in the grid`);
      return [];
    }
    const next: ParameterSet[] = [];
    for (const combination of combinations) {
      for (const value of values) next.push({ ...combination, [key]: value });
    }
    combinations = next;
  }
  return combinations;
}
