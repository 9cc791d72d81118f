import { clamp } from "../colony/helpers";

export const MIN_PHEROMONE = 0.01;
export const MAX_PHEROMONE = 10.0;
export const INITIAL_PHEROMONE = 1.0;

export interface PheromoneTrailSnapshot {
  fromModule: string;
  toModule: string;
  pheromoneLevel: number;
  traversalCount: number;
  successRate: number;
  totalScore: number;
  averageScore: number;
  averageCompletionTime: number;
  lastUpdated: string;
  trailStrength: number;
}

export class PheromoneTrail {
  public readonly fromModule: string;
  public readonly toModule: string;
  private level: number;
  private traversals = 0;
  private rate = 0;
  private scoreTotal = 0;
  private completionAverage = 0;
  private updatedAt: Date;

  constructor(fromModule: string, toModule: string, initialLevel = INITIAL_PHEROMONE) {
    if (fromModule === toModule) {
      throw new RangeError(`A trail cannot loop on module "${fromModule}".`);
    }
    this.fromModule = fromModule;
    this.toModule = toModule;
    this.level = clamp(initialLevel, MIN_PHEROMONE, MAX_PHEROMONE);
    this.updatedAt = new Date();
  }

  public get pheromoneLevel(): number {
    return this.level;
  }

  public get traversalCount(): number {
    return this.traversals;
  }

  public get successRate(): number {
    return this.rate;
  }

  public get totalScore(): number {
    return this.scoreTotal;
  }

  public get averageScore(): number {
    return this.traversals === 0 ? 0 : this.scoreTotal / this.traversals;
  }

  public get averageCompletionTime(): number {
    return this.completionAverage;
  }

  public get lastUpdated(): Date {
    return this.updatedAt;
  }

  public evaporate(rate: number): void {
    this.level = Math.max(MIN_PHEROMONE, this.level * (1 - rate));
  }

  public reinforce(amount: number): void {
    this.level = clamp(this.level + amount, MIN_PHEROMONE, MAX_PHEROMONE);
    this.updatedAt = new Date();
  }

  /**
   * Records a real learner moving along this edge.
   *
   * The completion time follows `(previous + latest) / 2`, which weights the
   * latest traversal at one half rather than keeping a true mean. Reports
   * built on earlier values depend on that recurrence, so it is kept.
   */
  public recordTraversal(score: number, completionTime: number, success: boolean): void {
    const previousCount = this.traversals;
    const successesBefore = Math.round(this.rate * previousCount);

    this.traversals = previousCount + 1;
    this.scoreTotal += score;
    this.completionAverage = Math.floor((this.completionAverage + completionTime) / 2);
    this.rate = (successesBefore + (success ? 1 : 0)) / this.traversals;
    this.updatedAt = new Date();
  }

  public trailStrength(): number {
    return this.level * (1 + this.rate);
  }

  public clone(): PheromoneTrail {
    const copy = new PheromoneTrail(this.fromModule, this.toModule, this.level);
    copy.traversals = this.traversals;
    copy.rate = this.rate;
    copy.scoreTotal = this.scoreTotal;
    copy.completionAverage = this.completionAverage;
    copy.updatedAt = new Date(this.updatedAt.getTime());
    return copy;
  }

  public toSnapshot(): PheromoneTrailSnapshot {
    return {
      fromModule: this.fromModule,
      toModule: this.toModule,
      pheromoneLevel: this.level,
      traversalCount: this.traversals,
      successRate: this.rate,
      totalScore: this.scoreTotal,
      averageScore: this.averageScore,
      averageCompletionTime: this.completionAverage,
      lastUpdated: this.updatedAt.toISOString(),
      trailStrength: this.trailStrength()
    };
  }
}
