import type { ColonyEngine } from "../colony/colonyEngine";
import { average } from "../colony/helpers";
import type { LearnerAnt } from "../domain/learnerAnt";
import type { ColonyStatistics } from "../domain/models";
import type { PheromoneTrail } from "../domain/pheromoneTrail";

export interface ColonySummary extends ColonyStatistics {
  moduleCount: number;
  trailCount: number;
  traversedTrailCount: number;
  averagePheromoneLevel: number;
  averageSuccessRate: number;
  learnerCount: number;
}

export interface LearnerSummary {
  learnerId: string;
  skillLevel: number;
  completedCount: number;
  attemptCount: number;
  averageScore: number;
  successRate: number;
  recommendedDifficulty: number;
}

export const summarizeColony = (engine: ColonyEngine): ColonySummary => {
  const trails = engine.getTrails();
  const traversed = trails.filter(trail => trail.traversalCount > 0);

  return {
    ...engine.getStatistics(),
    moduleCount: engine.getModules().length,
    trailCount: trails.length,
    traversedTrailCount: traversed.length,
    averagePheromoneLevel: average(trails.map(trail => trail.pheromoneLevel)),
    // only trails a learner has actually walked carry a success rate
    averageSuccessRate: average(traversed.map(trail => trail.successRate)),
    learnerCount: engine.getLearners().length
  };
};

export const strongestTrails = (engine: ColonyEngine, limit = 5): PheromoneTrail[] =>
  engine
    .getTrails()
    .sort((a, b) => b.trailStrength() - a.trailStrength())
    .slice(0, limit);

export const pathStrength = (engine: ColonyEngine, path: readonly string[]): number[] => {
  const strengths: number[] = [];
  for (let index = 1; index < path.length; index += 1) {
    strengths.push(engine.getTrail(path[index - 1], path[index])?.trailStrength() ?? 0);
  }
  return strengths;
};

export const summarizeLearner = (learner: LearnerAnt): LearnerSummary => {
  const history = learner.performanceHistory;
  return {
    learnerId: learner.learnerId,
    skillLevel: learner.skillLevel,
    completedCount: learner.completedModules.size,
    attemptCount: history.length,
    averageScore: average(history.map(record => record.score)),
    successRate:
      history.length === 0 ? 0 : history.filter(record => record.success).length / history.length,
    recommendedDifficulty: learner.recommendedDifficulty()
  };
};
