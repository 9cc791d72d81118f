// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import { PathProgress } from "../components/PathProgress";
import { ColonyEngine } from "../colony/colonyEngine";
import type { PathRecommendation } from "../services/recommendationService";
import { chainModules, silentLogger } from "./fixtures";

const engine = new ColonyEngine({ modules: chainModules(), logger: silentLogger() });

const recommendation = (overrides: Partial<PathRecommendation> = {}): PathRecommendation => ({
  learnerId: "l1",
  targetModuleId: "C",
  steps: [
    { module: engine.getModule("B"), trailStrength: 1 },
    { module: engine.getModule("C"), trailStrength: 1 }
  ],
  score: 0.5,
  reachedTarget: true,
  recommendedDifficulty: 1,
  generatedAt: "2026-01-01T00:00:00.000Z",
  ...overrides
});

describe("PathProgress", () => {
  afterEach(() => {
    cleanup();
  });

  it("lists each step with its difficulty and time", () => {
    render(<PathProgress recommendation={recommendation()} />);

    expect(screen.getAllByRole("listitem")).toHaveLength(2);
    expect(screen.getByText("Bravo")).toBeTruthy();
    expect(screen.getByText("Difficulty 3")).toBeTruthy();
    expect(screen.getByText("50 min")).toBeTruthy();
    expect(screen.getByText("Reaches C in 90 min")).toBeTruthy();
  });

  it("notes a path that stops short", () => {
    render(<PathProgress recommendation={recommendation({ reachedTarget: false })} />);
    expect(screen.getByText("Stops short of C")).toBeTruthy();
  });

  it("shows an empty state without steps", () => {
    render(<PathProgress recommendation={recommendation({ steps: [], reachedTarget: false })} />);
    expect(screen.getByText("No route found to C.")).toBeTruthy();
  });
});
