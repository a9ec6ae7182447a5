import type { ZodType, ZodTypeDef } from "zod";
import type { TimeSeries } from "../dataset/types.js";

export type ParameterValue = string | number | boolean | null;

export type ParameterSet = Record<string, ParameterValue>;

/**
 * The capability every algorithm is reduced to. Either method may be async;
 * `score` returns one real value per timestep of its input.
 */
export interface Detector {
  fit(series: TimeSeries): void | Promise<void>;
  score(series: TimeSeries): number[] | Promise<number[]>;
}

export interface DetectorFactory<P = unknown> {
  id: string;
  description: string;
  /** Strict schema with defaults; parsing it is the parameter validation. */
  parameters: ZodType<P, ZodTypeDef, unknown>;
  create(params: P): Detector;
}
