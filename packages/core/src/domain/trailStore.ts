import { INITIAL_PHEROMONE, PheromoneTrail } from "./pheromoneTrail";

export type TrailPair = readonly [fromModule: string, toModule: string];

/**
 * One trail per ordered pair of distinct modules, created up front.
 * Trails are indexed by source then destination module id.
 */
export class TrailStore {
  private readonly trails: Map<string, Map<string, PheromoneTrail>>;

  private constructor(trails: Map<string, Map<string, PheromoneTrail>>) {
    this.trails = trails;
  }

  public static forModules(
    moduleIds: Iterable<string>,
    initialLevel = INITIAL_PHEROMONE
  ): TrailStore {
    const ids = Array.from(new Set(moduleIds));
    const trails = new Map<string, Map<string, PheromoneTrail>>();
    ids.forEach(fromModule => {
      const outgoing = new Map<string, PheromoneTrail>();
      ids.forEach(toModule => {
        if (fromModule !== toModule) {
          outgoing.set(toModule, new PheromoneTrail(fromModule, toModule, initialLevel));
        }
      });
      trails.set(fromModule, outgoing);
    });
    return new TrailStore(trails);
  }

  public get size(): number {
    let count = 0;
    this.trails.forEach(outgoing => {
      count += outgoing.size;
    });
    return count;
  }

  public get(fromModule: string, toModule: string): PheromoneTrail | undefined {
    return this.trails.get(fromModule)?.get(toModule);
  }

  public pairs(): TrailPair[] {
    return this.values().map(trail => [trail.fromModule, trail.toModule] as const);
  }

  public values(): PheromoneTrail[] {
    const all: PheromoneTrail[] = [];
    this.trails.forEach(outgoing => {
      outgoing.forEach(trail => all.push(trail));
    });
    return all;
  }

  public evaporateAll(rate: number): void {
    const snapshot: readonly PheromoneTrail[] = this.values();
    snapshot.forEach(trail => {
      trail.evaporate(rate);
    });
  }

  public reinforcePath(path: readonly string[], amount: number): number {
    let reinforced = 0;
    for (let index = 1; index < path.length; index += 1) {
      const trail = this.get(path[index - 1], path[index]);
      if (trail) {
        trail.reinforce(amount);
        reinforced += 1;
      }
    }
    return reinforced;
  }

  public clone(): TrailStore {
    const copy = new Map<string, Map<string, PheromoneTrail>>();
    this.trails.forEach((outgoing, fromModule) => {
      const copied = new Map<string, PheromoneTrail>();
      outgoing.forEach((trail, toModule) => {
        copied.set(toModule, trail.clone());
      });
      copy.set(fromModule, copied);
    });
    return new TrailStore(copy);
  }
}
