import type { ColonyConfig } from "./colonyConfig";

export const DEFAULT_COLONY_CONFIG: Readonly<ColonyConfig> = Object.freeze({
  alpha: 1.0,
  beta: 2.0,
  evaporationRate: 0.1,
  reinforcementFactor: 1.0,
  maxIterations: 100,
  convergenceThreshold: 0.01,
  maxPathLength: 10
});

export const DEFAULT_PHEROMONE_LEVEL = 0.5;

export const ATTRACTIVENESS_WEIGHTS = {
  skillMatch: 0.4,
  styleMatch: 0.2,
  timeFit: 0.2,
  recentPerformance: 0.2
} as const;

export const EVALUATION_WEIGHTS = {
  skillProgression: 0.5,
  efficiency: 0.2,
  prerequisites: 0.3
} as const;

export const SIMULATED_SKILL_GAIN = 0.2;
