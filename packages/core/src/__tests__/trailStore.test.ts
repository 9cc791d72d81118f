import { describe, expect, it } from "vitest";
import { TrailStore } from "../domain/trailStore";

describe("TrailStore", () => {
  it("creates one trail per ordered pair of distinct modules", () => {
    const store = TrailStore.forModules(["a", "b", "c"]);

    expect(store.size).toBe(6);
    expect(store.get("a", "a")).toBeUndefined();
    expect(store.get("a", "b")?.toModule).toBe("b");
    expect(store.get("b", "a")?.fromModule).toBe("b");
    expect(store.pairs()).toContainEqual(["c", "a"]);
  });

  it("keeps ids containing arrows on separate trails", () => {
    const store = TrailStore.forModules(["a->b", "c", "a", "b->c"]);

    expect(store.size).toBe(12);
    store.get("a->b", "c")?.reinforce(2);

    expect(store.get("a->b", "c")?.pheromoneLevel).toBe(3);
    expect(store.get("a", "b->c")?.pheromoneLevel).toBe(1);
    expect(store.get("a", "b->c")?.fromModule).toBe("a");
  });

  it("evaporates every trail", () => {
    const store = TrailStore.forModules(["a", "b", "c"]);
    store.evaporateAll(0.5);

    store.values().forEach(trail => {
      expect(trail.pheromoneLevel).toBeCloseTo(0.5, 10);
    });
  });

  it("reinforces consecutive edges of a path", () => {
    const store = TrailStore.forModules(["a", "b", "c"]);
    const reinforced = store.reinforcePath(["a", "b", "c"], 0.3);

    expect(reinforced).toBe(2);
    expect(store.get("a", "b")?.pheromoneLevel).toBeCloseTo(1.3, 10);
    expect(store.get("b", "c")?.pheromoneLevel).toBeCloseTo(1.3, 10);
    expect(store.get("b", "a")?.pheromoneLevel).toBe(1);
    expect(store.get("a", "c")?.pheromoneLevel).toBe(1);
  });

  it("clones into an independent store", () => {
    const store = TrailStore.forModules(["a", "b"]);
    const copy = store.clone();
    copy.evaporateAll(0.5);

    expect(store.get("a", "b")?.pheromoneLevel).toBe(1);
    expect(copy.get("a", "b")?.pheromoneLevel).toBeCloseTo(0.5, 10);
  });
});
