import type { ColonyEngine, OptimizeOptions } from "../colony/colonyEngine";
import { pathStrength } from "../analytics/colonyStatistics";
import type { LearningModule } from "../domain/models";

export interface PathStep {
  module: LearningModule;
  trailStrength: number;
}

export interface PathRecommendation {
  learnerId: string;
  targetModuleId: string;
  steps: PathStep[];
  score: number;
  reachedTarget: boolean;
  recommendedDifficulty: number;
  generatedAt: string;
}

export class RecommendationService {
  private engine: ColonyEngine;

  constructor(engine: ColonyEngine) {
    this.engine = engine;
  }

  public setEngine(engine: ColonyEngine): void {
    this.engine = engine;
  }

  public getEngine(): ColonyEngine {
    return this.engine;
  }

  public recommendPath(
    learnerId: string,
    targetModuleId: string,
    options?: OptimizeOptions
  ): PathRecommendation {
    const result = this.engine.optimizePath(learnerId, targetModuleId, options);
    const learner = this.engine.getLearner(learnerId);
    const origin = learner.currentModule;
    const strengths = origin ? pathStrength(this.engine, [origin, ...result.path]) : [];

    return {
      learnerId,
      targetModuleId,
      steps: result.path.map((moduleId, index) => ({
        module: this.engine.getModule(moduleId),
        trailStrength: strengths[index] ?? 0
      })),
      score: result.score,
      reachedTarget: result.reachedTarget,
      recommendedDifficulty: learner.recommendedDifficulty(),
      generatedAt: new Date().toISOString()
    };
  }
}
