import { describe, expect, it } from "vitest";
import {
  attractiveness,
  recentPerformanceModifier,
  skillMatch,
  styleMatch,
  timeFit
} from "../colony/attractiveness";
import { LearnerAnt } from "../domain/learnerAnt";
import { buildModuleGraph, getModule } from "../domain/moduleGraph";
import type { LearningStyle } from "../domain/models";
import { moduleDefinition } from "./fixtures";

const graph = buildModuleGraph([
  moduleDefinition("visual-tag", { title: "Color Theory Walkthrough", tags: ["visual"] }),
  moduleDefinition("interface", { title: "Interface Design Basics" }),
  moduleDefinition("concepts", { title: "Data Structures Concepts", tags: ["Theory"] }),
  moduleDefinition("exercises", {
    title: "Hands-on Coding Exercises",
    difficulty: 2,
    estimatedTime: 60,
    tags: ["Hands-on"]
  }),
  moduleDefinition("neutral", { title: "Working with Databases", estimatedTime: 45 }),
  moduleDefinition("long", { title: "Capstone", estimatedTime: 120 })
]);

const learnerWith = (learningStyle: LearningStyle, skillLevel = 1) =>
  new LearnerAnt({ learnerId: "l1", learningStyle, skillLevel });

describe("skillMatch", () => {
  it("peaks when difficulty equals skill", () => {
    expect(skillMatch(3, 3)).toBe(1);
  });

  it("falls off linearly with the gap", () => {
    expect(skillMatch(2, 4.5)).toBeCloseTo(0.5, 10);
  });

  it("never drops below 0.1", () => {
    expect(skillMatch(1, 10)).toBe(0.1);
  });
});

describe("styleMatch", () => {
  it("favors visual modules for visual learners", () => {
    const learner = learnerWith("Visual");
    expect(styleMatch(getModule(graph, "visual-tag"), learner)).toBe(1.2);
    expect(styleMatch(getModule(graph, "interface"), learner)).toBe(1.2);
    expect(styleMatch(getModule(graph, "neutral"), learner)).toBe(0.8);
  });

  it("favors hands-on work for practical learners", () => {
    const learner = learnerWith("Practical");
    expect(styleMatch(getModule(graph, "exercises"), learner)).toBe(1.3);
    expect(styleMatch(getModule(graph, "concepts"), learner)).toBe(0.7);
    expect(styleMatch(getModule(graph, "neutral"), learner)).toBe(1.0);
  });

  it("mirrors practical preferences for theoretical learners", () => {
    const learner = learnerWith("Theoretical");
    expect(styleMatch(getModule(graph, "concepts"), learner)).toBe(1.3);
    expect(styleMatch(getModule(graph, "exercises"), learner)).toBe(0.7);
    expect(styleMatch(getModule(graph, "neutral"), learner)).toBe(1.0);
  });

  it("is neutral for mixed learners", () => {
    const learner = learnerWith("Mixed");
    graph.modules.forEach(module => {
      expect(styleMatch(module, learner)).toBe(1.0);
    });
  });
});

describe("timeFit", () => {
  it("is neutral without a session preference", () => {
    expect(timeFit(getModule(graph, "long"), learnerWith("Mixed"))).toBe(1.0);
  });

  it("rewards modules that fit the session", () => {
    const learner = new LearnerAnt({ learnerId: "l1", preferences: { maxSessionTime: 60 } });
    expect(timeFit(getModule(graph, "neutral"), learner)).toBe(1.2);
    expect(timeFit(getModule(graph, "exercises"), learner)).toBe(1.2);
    expect(timeFit(getModule(graph, "long"), learner)).toBe(0.8);
  });
});

describe("recentPerformanceModifier", () => {
  it("is neutral without history", () => {
    expect(recentPerformanceModifier(learnerWith("Mixed"))).toBe(1.0);
  });

  it("rewards a strong recent average", () => {
    const learner = learnerWith("Mixed");
    [90, 85, 80].forEach(score => learner.recordPerformance("neutral", score, 30, 1));
    expect(recentPerformanceModifier(learner)).toBe(1.1);
  });

  it("penalizes a weak recent average", () => {
    const learner = learnerWith("Mixed");
    [50, 55, 60].forEach(score => learner.recordPerformance("neutral", score, 30, 1));
    expect(recentPerformanceModifier(learner)).toBe(0.9);
  });

  it("only considers the last three records", () => {
    const learner = learnerWith("Mixed");
    [10, 90, 90, 90].forEach(score => learner.recordPerformance("neutral", score, 30, 1));
    expect(recentPerformanceModifier(learner)).toBe(1.1);
  });
});

describe("attractiveness", () => {
  it("is 1.0 for a perfectly neutral match", () => {
    expect(attractiveness(getModule(graph, "neutral"), learnerWith("Mixed", 1))).toBeCloseTo(1.0, 10);
  });

  it("weights the four terms 0.4/0.2/0.2/0.2", () => {
    const learner = new LearnerAnt({
      learnerId: "l1",
      learningStyle: "Practical",
      skillLevel: 3,
      preferences: { maxSessionTime: 30 }
    });
    // 0.4 * 0.8 + 0.2 * 1.3 + 0.2 * 0.8 + 0.2 * 1.0
    expect(attractiveness(getModule(graph, "exercises"), learner)).toBeCloseTo(0.94, 10);
  });
});
