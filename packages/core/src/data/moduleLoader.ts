import * as fs from "node:fs";
import Papa from "papaparse";
import { z } from "zod";
import { buildModuleGraph, detectCycles } from "../domain/moduleGraph";
import type { ModuleDefinition } from "../domain/models";
import { createLogger, type Logger } from "../logging/logger";
import defaultModules from "./defaultModules.json";

export const ModuleDefinitionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  difficulty: z.number().int().min(1).max(5),
  estimatedTime: z.number().positive(),
  prerequisites: z.array(z.string().min(1)).default([]),
  tags: z.array(z.string()).default([]),
  learningObjectives: z.array(z.string()).default([]),
  category: z.string().optional()
});

export const ModuleDefinitionListSchema = z
  .array(ModuleDefinitionSchema)
  .min(1)
  .superRefine((modules, ctx) => {
    const seen = new Set<string>();
    modules.forEach((module, index) => {
      if (seen.has(module.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `Duplicate module id "${module.id}"`
        });
      }
      seen.add(module.id);
    });
  });

export type ModuleSource = string | readonly unknown[];

interface ModuleCsvRow {
  id?: string;
  title?: string;
  difficulty?: string;
  estimatedTime?: string;
  prerequisites?: string;
  tags?: string;
  learningObjectives?: string;
  category?: string;
}

const defaultLogger = createLogger("module-loader");

const splitList = (value?: string): string[] =>
  (value ?? "")
    .split(";")
    .map(item => item.trim())
    .filter(item => item.length > 0);

const toNumber = (value?: string): number => {
  if (value === undefined || value.trim() === "") {
    return Number.NaN;
  }
  return Number(value);
};

/**
 * Reads module rows with a header line. List columns separate items with `;`.
 */
export const parseModuleCsv = (text: string): unknown[] => {
  const result = Papa.parse<ModuleCsvRow>(text.trim(), {
    header: true,
    skipEmptyLines: true
  });
  if (result.errors.length > 0) {
    const [first] = result.errors;
    throw new Error(`Module CSV row ${first.row ?? "?"}: ${first.message}`);
  }
  return result.data
    .filter(row => row.id)
    .map(row => ({
      id: row.id?.trim(),
      title: row.title?.trim(),
      difficulty: toNumber(row.difficulty),
      estimatedTime: toNumber(row.estimatedTime),
      prerequisites: splitList(row.prerequisites),
      tags: splitList(row.tags),
      learningObjectives: splitList(row.learningObjectives),
      category: row.category?.trim() || undefined
    }));
};

export const getDefaultModules = (): ModuleDefinition[] =>
  ModuleDefinitionListSchema.parse(defaultModules);

export const validateModuleDefinitions = (input: unknown): ModuleDefinition[] => {
  const modules = ModuleDefinitionListSchema.parse(input);
  // throws on prerequisites that point outside the set
  buildModuleGraph(modules);
  return modules;
};

const readSource = (source: ModuleSource): unknown => {
  if (typeof source !== "string") {
    return source;
  }
  const text = fs.readFileSync(source, "utf8");
  return source.toLowerCase().endsWith(".csv") ? parseModuleCsv(text) : JSON.parse(text);
};

/**
 * Loads module definitions from an array, a JSON file or a CSV file. Anything
 * unreadable or malformed falls back to the built-in modules with a warning.
 */
export const loadModuleDefinitions = (
  source?: ModuleSource,
  logger: Logger = defaultLogger
): ModuleDefinition[] => {
  if (source === undefined) {
    return getDefaultModules();
  }

  let modules: ModuleDefinition[];
  try {
    modules = validateModuleDefinitions(readSource(source));
  } catch (error) {
    logger.warn("Module definitions rejected, using built-in modules", {
      source: typeof source === "string" ? source : "inline",
      error: error instanceof Error ? error.message : String(error)
    });
    return getDefaultModules();
  }

  const cycles = detectCycles(buildModuleGraph(modules));
  if (cycles.length > 0) {
    logger.warn("Module prerequisites contain cycles", {
      cycles: cycles.map(cycle => cycle.join(" -> "))
    });
  }

  logger.debug("Loaded module definitions", { count: modules.length });
  return modules;
};
