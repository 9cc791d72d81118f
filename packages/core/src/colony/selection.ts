import { DEFAULT_PHEROMONE_LEVEL } from "../config/constants";
import type { LearnerAnt } from "../domain/learnerAnt";
import type { LearningModule } from "../domain/models";
import type { TrailStore } from "../domain/trailStore";
import { attractiveness } from "./attractiveness";

export type RandomSource = () => number;

export interface SelectionCandidate {
  module: LearningModule;
  pheromone: number;
  attractiveness: number;
  weight: number;
  probability: number;
}

export interface SelectionContext {
  trails: TrailStore;
  learner: LearnerAnt;
  alpha: number;
  beta: number;
}

export const pheromoneBetween = (
  trails: TrailStore,
  fromModule: string | null,
  toModule: string
): number => {
  if (fromModule === null) {
    return DEFAULT_PHEROMONE_LEVEL;
  }
  return trails.get(fromModule, toModule)?.pheromoneLevel ?? DEFAULT_PHEROMONE_LEVEL;
};

/**
 * Weights each candidate by `pheromone^alpha * attractiveness^beta` and
 * normalizes. A zero total weight degrades to a uniform distribution.
 */
export const selectionProbabilities = (
  currentModule: string | null,
  candidates: readonly LearningModule[],
  { trails, learner, alpha, beta }: SelectionContext
): SelectionCandidate[] => {
  const weighted = candidates.map(module => {
    const pheromone = pheromoneBetween(trails, currentModule, module.id);
    const appeal = attractiveness(module, learner);
    return {
      module,
      pheromone,
      attractiveness: appeal,
      weight: Math.pow(pheromone, alpha) * Math.pow(appeal, beta)
    };
  });

  const total = weighted.reduce((sum, candidate) => sum + candidate.weight, 0);
  return weighted.map(candidate => ({
    ...candidate,
    probability: total > 0 ? candidate.weight / total : 1 / weighted.length
  }));
};

/**
 * Roulette-wheel draw over normalized candidates. Falls back to the first
 * candidate when rounding leaves the draw uncovered.
 */
export const rouletteSelect = <T extends { probability: number }>(
  candidates: readonly T[],
  random: RandomSource
): T | undefined => {
  if (candidates.length === 0) {
    return undefined;
  }
  const draw = random();
  let cumulative = 0;
  for (const candidate of candidates) {
    cumulative += candidate.probability;
    if (cumulative >= draw) {
      return candidate;
    }
  }
  return candidates[0];
};

export const selectNextModule = (
  currentModule: string | null,
  candidates: readonly LearningModule[],
  context: SelectionContext,
  random: RandomSource
): LearningModule | undefined => {
  if (candidates.length === 0) {
    return undefined;
  }
  const weighted = selectionProbabilities(currentModule, candidates, context);
  const totalWeight = weighted.reduce((sum, candidate) => sum + candidate.weight, 0);
  if (totalWeight <= 0) {
    return candidates[Math.min(candidates.length - 1, Math.floor(random() * candidates.length))];
  }
  return rouletteSelect(weighted, random)?.module;
};
