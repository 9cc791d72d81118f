import type { LearnerAnt } from "../domain/learnerAnt";
import type { ModuleGraph } from "../domain/moduleGraph";
import type { TrailStore } from "../domain/trailStore";
import { selectNextModule, type RandomSource } from "./selection";

export interface ConstructionOptions {
  graph: ModuleGraph;
  trails: TrailStore;
  alpha: number;
  beta: number;
  maxPathLength: number;
  random: RandomSource;
}

/** Module the walk starts from: the learner's current module, else the target. */
export const pathSeed = (learner: LearnerAnt, targetModuleId: string): string =>
  learner.currentModule ?? targetModuleId;

/**
 * Walks from the seed toward the target, one weighted pick at a time.
 *
 * The seed and every picked module count as done while the walk unlocks
 * further modules. The returned path excludes the seed and may stop short of
 * the target when no candidate remains.
 */
export const constructPath = (
  learner: LearnerAnt,
  targetModuleId: string,
  { graph, trails, alpha, beta, maxPathLength, random }: ConstructionOptions
): string[] => {
  const seed = pathSeed(learner, targetModuleId);
  if (seed === targetModuleId || learner.hasCompleted(targetModuleId)) {
    return [];
  }

  const path: string[] = [];
  const visited = new Set<string>([seed]);
  let current = seed;

  while (path.length < maxPathLength) {
    const candidates = learner
      .availableModules(graph, visited)
      .filter(module => !visited.has(module.id));
    if (candidates.length === 0) {
      break;
    }

    const next = selectNextModule(current, candidates, { trails, learner, alpha, beta }, random);
    if (!next) {
      break;
    }

    path.push(next.id);
    visited.add(next.id);
    current = next.id;

    if (next.id === targetModuleId) {
      break;
    }
  }

  return path;
};
