import { describe, expect, it } from "vitest";
import { ColonyEngine } from "../colony/colonyEngine";
import { UnknownLearnerError } from "../errors";
import { RecommendationService } from "../services/recommendationService";
import { chainModules, seededRandom, silentLogger } from "./fixtures";

const chainEngine = () =>
  new ColonyEngine({ modules: chainModules(), random: seededRandom(3), logger: silentLogger() });

describe("RecommendationService", () => {
  it("turns an optimized path into steps with trail strengths", () => {
    const engine = chainEngine();
    engine.registerLearner({ learnerId: "l1", currentModule: "A", skillLevel: 1 });
    const service = new RecommendationService(engine);

    const recommendation = service.recommendPath("l1", "C", { iterations: 1 });

    expect(recommendation.steps.map(step => step.module.id)).toEqual(["B", "C"]);
    expect(recommendation.steps[0].trailStrength).toBeCloseTo(1.426667, 5);
    expect(recommendation.steps[1].trailStrength).toBeCloseTo(1.426667, 5);
    expect(recommendation.score).toBeCloseTo(0.526667, 5);
    expect(recommendation.reachedTarget).toBe(true);
    expect(recommendation.recommendedDifficulty).toBe(1);
  });

  it("returns no steps for a learner without a current module", () => {
    const engine = chainEngine();
    engine.registerLearner({ learnerId: "l1" });
    const service = new RecommendationService(engine);

    const recommendation = service.recommendPath("l1", "C", { iterations: 3 });
    expect(recommendation.steps).toEqual([]);
    expect(recommendation.reachedTarget).toBe(false);
  });

  it("propagates unknown learners", () => {
    const service = new RecommendationService(chainEngine());
    expect(() => service.recommendPath("ghost", "C")).toThrow(UnknownLearnerError);
  });

  it("switches engines", () => {
    const service = new RecommendationService(chainEngine());
    const next = chainEngine();
    service.setEngine(next);
    expect(service.getEngine()).toBe(next);
  });
});
