import { dirname } from "node:path";
import { cosmiconfig } from "cosmiconfig";
import { ConfigurationError, parseConfig, type BenchConfig, type BenchConfigInput } from "@tsbench/core";

export interface LoadedConfig {
  config: BenchConfig;
  filepath: string;
  /** Directory of the config file; relative paths in the config resolve against it. */
  root: string;
}

export const SEARCH_PLACES = [
  "tsbench.config.json",
  "tsbench.config.js",
  "tsbench.config.ts",
  ".tsbenchrc",
  ".tsbenchrc.json",
];

export function defineConfig(config: BenchConfigInput): BenchConfigInput {
  return config;
}

export async function loadConfig(searchFrom?: string): Promise<LoadedConfig> {
  const explorer = cosmiconfig("tsbench", { searchPlaces: SEARCH_PLACES });

  const result = searchFrom ? await explorer.search(searchFrom) : await explorer.search();

  if (!result || result.isEmpty) {
    throw new ConfigurationError("No tsbench.config.json found. Run `tsbench init` to create one.");
  }

  const raw: unknown = result.config;
  return {
    config: parseConfig(interpolateEnvVars(raw)),
    filepath: result.filepath,
    root: dirname(result.filepath),
  };
}

/** Replaces `${env.NAME}` in every string; unset variables become "". */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => interpolateEnvVars(item, env));
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateEnvVars(item, env);
    }
    return result;
  }
  return value;
}
