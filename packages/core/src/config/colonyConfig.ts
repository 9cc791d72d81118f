import * as fs from "node:fs";
import { z } from "zod";
import { createLogger, type Logger } from "../logging/logger";
import { DEFAULT_COLONY_CONFIG } from "./constants";

export const ColonyConfigSchema = z.object({
  alpha: z.number().min(0),
  beta: z.number().min(0),
  evaporationRate: z.number().gt(0).lt(1),
  reinforcementFactor: z.number().min(0),
  maxIterations: z.number().int().min(1),
  convergenceThreshold: z.number().min(0),
  maxPathLength: z.number().int().min(1)
});

export type ColonyConfig = z.infer<typeof ColonyConfigSchema>;

const PartialColonyConfigSchema = ColonyConfigSchema.partial();

const defaultLogger = createLogger("config");

/**
 * Merges a partial config over the defaults. Fields that fail validation are
 * dropped with a warning and take their default value instead.
 */
export const resolveColonyConfig = (
  input: unknown = {},
  logger: Logger = defaultLogger
): ColonyConfig => {
  if (input === null || typeof input !== "object" || Array.isArray(input)) {
    logger.warn("Colony config is not an object, using defaults");
    return { ...DEFAULT_COLONY_CONFIG };
  }

  const candidate: Record<string, unknown> = {};
  Object.entries(input).forEach(([key, value]) => {
    if (value !== undefined && key in ColonyConfigSchema.shape) {
      candidate[key] = value;
    }
  });

  const parsed = PartialColonyConfigSchema.safeParse(candidate);
  if (parsed.success) {
    return { ...DEFAULT_COLONY_CONFIG, ...parsed.data };
  }

  const rejected = new Set<string>();
  parsed.error.issues.forEach(issue => {
    const [field] = issue.path;
    if (typeof field === "string") {
      rejected.add(field);
    }
  });
  logger.warn("Ignoring invalid colony config fields", { fields: Array.from(rejected) });

  rejected.forEach(field => {
    delete candidate[field];
  });
  const retry = PartialColonyConfigSchema.safeParse(candidate);
  return retry.success ? { ...DEFAULT_COLONY_CONFIG, ...retry.data } : { ...DEFAULT_COLONY_CONFIG };
};

export const loadColonyConfig = (
  filePath: string,
  logger: Logger = defaultLogger
): ColonyConfig => {
  if (!fs.existsSync(filePath)) {
    logger.warn("Config file not found, using defaults", { filePath });
    return { ...DEFAULT_COLONY_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    logger.warn("Config file could not be parsed, using defaults", {
      filePath,
      error: error instanceof Error ? error.message : String(error)
    });
    return { ...DEFAULT_COLONY_CONFIG };
  }

  return resolveColonyConfig(raw, logger);
};
