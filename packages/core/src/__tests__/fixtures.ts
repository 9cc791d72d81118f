import { vi } from "vitest";
import type { RandomSource } from "../colony/selection";
import type { ModuleDefinition } from "../domain/models";
import type { Logger } from "../logging/logger";

export const moduleDefinition = (
  id: string,
  overrides: Partial<ModuleDefinition> = {}
): ModuleDefinition => ({
  id,
  title: id,
  difficulty: 1,
  estimatedTime: 30,
  prerequisites: [],
  tags: [],
  learningObjectives: [],
  ...overrides
});

/** A(d1) -> B(d2) -> C(d3), each requiring the previous one. */
export const chainModules = (): ModuleDefinition[] => [
  moduleDefinition("A", { title: "Alpha", difficulty: 1, estimatedTime: 30 }),
  moduleDefinition("B", { title: "Bravo", difficulty: 2, estimatedTime: 40, prerequisites: ["A"] }),
  moduleDefinition("C", { title: "Charlie", difficulty: 3, estimatedTime: 50, prerequisites: ["B"] })
];

export const silentLogger = () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
  return logger satisfies Logger;
};

export const seededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};
