import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z, type ZodType, type ZodTypeDef } from "zod";
import { ConfigurationError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { DetectorRegistry } from "./registry.js";
import type { Detector, DetectorFactory } from "./types.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const factorySchema = z.object({
  id: z.string().trim().min(1, "must have a non-empty 'id' string"),
  description: z.string().optional(),
  parameters: z.custom<ZodType<unknown, ZodTypeDef, unknown>>(
    (value) => typeof value === "object" && value !== null && "safeParse" in value && typeof value.safeParse === "function",
    "must have a zod 'parameters' schema"
  ),
  create: z.custom<(params: unknown) => Detector>(
    (value) => typeof value === "function",
    "must have a 'create' function"
  ),
});

export function validateDetectorFactory(obj: unknown): ValidationResult {
  if (!obj || typeof obj !== "object") {
    return { valid: false, errors: ["Detector must be an object"], warnings: [] };
  }
  const parsed = factorySchema.safeParse(obj);
  const errors = parsed.success ? [] : parsed.error.issues.map((i) => `'${i.path.join(".")}' ${i.message}`);
  const warnings = parsed.success && !parsed.data.description ? ["no 'description'; it will be shown as empty"] : [];
  return { valid: errors.length === 0, errors, warnings };
}

function toFactory(obj: unknown): DetectorFactory | null {
  const parsed = factorySchema.safeParse(obj);
  if (!parsed.success) return null;
  const { id, description, parameters, create } = parsed.data;
  return { id, description: description ?? "", parameters, create };
}

function looksLikeFactory(obj: unknown): boolean {
  return typeof obj === "object" && obj !== null && "id" in obj && "create" in obj;
}

/**
 * Import each plugin module and register every detector factory it exports,
 * either as the default export, an array of factories, or named exports.
 */
export async function loadDetectorPlugins(
  modules: readonly string[],
  registry: DetectorRegistry,
  options?: { baseDir?: string; logger?: Logger }
): Promise<string[]> {
  const logger = options?.logger ?? silentLogger;
  const registered: string[] = [];

  for (const modulePath of modules) {
    const file = resolve(options?.baseDir ?? process.cwd(), modulePath);
    let mod: unknown;
    try {
      mod = await import(pathToFileURL(file).href);
    } catch (e) {
      throw new ConfigurationError(
        `Failed to load plugin ${modulePath}: ${e instanceof Error ? e.message : String(e)}`
      );
    }

    const candidates = collectCandidates(mod);
    if (candidates.length === 0) {
      throw new ConfigurationError(`Plugin ${modulePath} exports no detectors`);
    }

    for (const candidate of candidates) {
      const result = validateDetectorFactory(candidate);
      for (const w of result.warnings) logger.warn(`${modulePath}: ${w}`);
      const factory = toFactory(candidate);
      if (!result.valid || !factory) {
        logger.warn(`Skipping invalid detector in ${modulePath}: ${result.errors.join(", ")}`);
        continue;
      }
      if (registry.has(factory.id)) {
        throw new ConfigurationError(`Plugin ${modulePath} redefines detector "${factory.id}"`);
      }
      registry.register(factory);
      registered.push(factory.id);
      logger.debug(`Loaded detector ${factory.id} from ${modulePath}`);
    }
  }

  return registered;
}

function collectCandidates(mod: unknown): unknown[] {
  if (typeof mod !== "object" || mod === null) return [];
  const exported: unknown = "default" in mod ? mod.default : mod;

  if (looksLikeFactory(exported)) return [exported];
  if (Array.isArray(exported)) return exported.filter(looksLikeFactory);
  if (typeof exported === "object" && exported !== null) {
    return Object.values(exported).filter(looksLikeFactory);
  }
  return [];
}
