import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { THRESHOLD_FREE_KINDS, THRESHOLDED_KINDS } from "../metrics/registry.js";
import { RESERVED_COLUMNS } from "../results/rows.js";

const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const thresholdSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("fixed"), cutoff: z.number() }).strict(),
  z.object({ type: z.literal("contamination"), rate: z.number().gt(0).lt(1) }).strict(),
  z.object({ type: z.literal("topn"), n: z.number().int().min(1) }).strict(),
]);

export const datasetSelectorSchema = z.union([
  z.string().min(1),
  z.object({ id: z.string().min(1) }).strict(),
  z.object({ where: z.record(z.string(), z.union([scalar, z.array(scalar)])) }).strict(),
]);

export const algorithmEntrySchema = z
  .object({
    algorithm: z.string().min(1),
    parameters: z.record(z.string(), scalar).default({}),
    /** Every combination of these values is a separate parameter set. */
    grid: z.record(z.string(), z.array(scalar).min(1, "grid values must be a non-empty list")).optional(),
  })
  .strict();

export const metricEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      name: z
        .string()
        .min(1)
        .refine((name) => !name.includes("@"), "named metrics cannot contain '@'")
        .refine((name) => !RESERVED_COLUMNS.has(name), "name is a reserved result column"),
      kind: z.enum([...THRESHOLD_FREE_KINDS, ...THRESHOLDED_KINDS]),
      threshold: thresholdSchema.optional(),
      beta: z.number().positive().optional(),
      alpha: z.number().min(0).max(1).optional(),
    })
    .strict(),
]);

export const benchConfigSchema = z
  .object({
    datasets: z.array(datasetSelectorSchema).min(1, "at least one dataset is required"),
    algorithms: z.array(algorithmEntrySchema).min(1, "at least one algorithm is required"),
    metrics: z.array(metricEntrySchema).min(1, "at least one metric is required"),
    /** Combined with every bare thresholded metric kind. */
    thresholds: z.array(thresholdSchema).default([]),
    resume: z.boolean().default(false),
    parallelism: z.number().int().min(1).default(1),
    normalize: z.boolean().default(true),
    verbose: z.boolean().default(false),
    catalog: z.object({ path: z.string().default("./datasets") }).strict().default({}),
    store: z.object({ path: z.string().default(".tsbench/results.db") }).strict().default({}),
    report: z
      .object({
        formats: z.array(z.enum(["terminal", "json", "csv"])).default(["terminal"]),
        outputDir: z.string().default(".tsbench/reports"),
      })
      .strict()
      .default({}),
    diff: z.object({ regressionThreshold: z.number().min(0).default(0.01) }).strict().default({}),
    plugins: z.array(z.string()).default([]),
  })
  .strict();

export type BenchConfig = z.infer<typeof benchConfigSchema>;
export type BenchConfigInput = z.input<typeof benchConfigSchema>;
export type DatasetSelector = z.infer<typeof datasetSelectorSchema>;
export type AlgorithmEntry = z.infer<typeof algorithmEntrySchema>;
export type MetricEntry = z.infer<typeof metricEntrySchema>;

/** The part of the configuration the orchestrator consumes. */
export type BatchConfig = Pick<
  BenchConfig,
  "datasets" | "algorithms" | "metrics" | "thresholds" | "resume" | "parallelism" | "normalize"
>;

/** Validate and fill defaults; every issue is reported at once. */
export function parseConfig(input: unknown): BenchConfig {
  const result = benchConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid configuration",
      result.error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    );
  }
  return result.data;
}
