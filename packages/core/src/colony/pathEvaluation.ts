import { EVALUATION_WEIGHTS, SIMULATED_SKILL_GAIN } from "../config/constants";
import type { LearnerAnt } from "../domain/learnerAnt";
import { MAX_SKILL_LEVEL } from "../domain/learnerAnt";
import { getModule, type ModuleGraph } from "../domain/moduleGraph";
import { skillMatch } from "./attractiveness";

export const pathEfficiency = (pathLength: number): number => 1 / (1 + 0.1 * pathLength);

export const prerequisiteSatisfaction = (
  prerequisites: ReadonlySet<string>,
  completed: ReadonlySet<string>
): number => {
  if (prerequisites.size === 0) {
    return 1.0;
  }
  const satisfied = Array.from(prerequisites).filter(id => completed.has(id)).length;
  return satisfied / prerequisites.size;
};

/**
 * Average per-module quality of a path.
 *
 * Each module scores `0.5 * skill + 0.2 * efficiency + 0.3 * prerequisites`,
 * so a non-empty path lands between 0.15 (ten modules, poor fit, nothing
 * completed) and about 0.98 (one well-matched module). The running skill
 * estimate grows by 0.2 per module along the way.
 */
export const evaluatePath = (
  path: readonly string[],
  learner: LearnerAnt,
  graph: ModuleGraph
): number => {
  if (path.length === 0) {
    return 0;
  }

  const efficiency = pathEfficiency(path.length);
  let runningSkill = learner.skillLevel;
  let total = 0;

  path.forEach(moduleId => {
    const module = getModule(graph, moduleId);
    const skill = skillMatch(module.difficulty, runningSkill);
    const prereq = prerequisiteSatisfaction(module.prerequisites, learner.completedModules);

    total +=
      EVALUATION_WEIGHTS.skillProgression * skill +
      EVALUATION_WEIGHTS.efficiency * efficiency +
      EVALUATION_WEIGHTS.prerequisites * prereq;
    runningSkill = Math.min(MAX_SKILL_LEVEL, runningSkill + SIMULATED_SKILL_GAIN);
  });

  return total / path.length;
};
