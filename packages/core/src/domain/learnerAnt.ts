import { average, clamp, roundTo } from "../colony/helpers";
import type {
  LearnerInit,
  LearnerPreferences,
  LearningGoal,
  LearningModule,
  LearningStyle,
  PerformanceRecord
} from "./models";
import type { ModuleGraph } from "./moduleGraph";

export const MIN_SKILL_LEVEL = 1.0;
export const MAX_SKILL_LEVEL = 10.0;
export const SUCCESS_SCORE = 70;
const MIN_DIFFICULTY = 1;
const MAX_DIFFICULTY = 5;
const RECENT_WINDOW = 5;

export interface PerformanceOutcome {
  /** Overrides the score-based outcome. */
  success?: boolean;
  timestamp?: Date;
}

export class LearnerAnt {
  public readonly learnerId: string;
  public learningStyle: LearningStyle;
  public currentModule: string | null;
  public learningGoals: LearningGoal[];
  public preferences: LearnerPreferences;
  private skill: number;
  private readonly completed: Set<string>;
  private readonly history: PerformanceRecord[] = [];

  constructor(init: LearnerInit) {
    this.learnerId = init.learnerId;
    this.skill = roundTo(clamp(init.skillLevel ?? MIN_SKILL_LEVEL, MIN_SKILL_LEVEL, MAX_SKILL_LEVEL));
    this.learningStyle = init.learningStyle ?? "Mixed";
    this.currentModule = init.currentModule ?? null;
    this.completed = new Set(init.completedModules ?? []);
    this.learningGoals = init.learningGoals ?? [];
    this.preferences = init.preferences ?? {};
  }

  public get skillLevel(): number {
    return this.skill;
  }

  public get completedModules(): ReadonlySet<string> {
    return this.completed;
  }

  public get performanceHistory(): readonly PerformanceRecord[] {
    return this.history;
  }

  public hasCompleted(moduleId: string): boolean {
    return this.completed.has(moduleId);
  }

  public markCompleted(moduleId: string): void {
    this.completed.add(moduleId);
  }

  /**
   * Appends an attempt and drifts the skill level.
   *
   * The outcome is `score >= 70` unless `outcome.success` says otherwise. A
   * successful attempt raises skill by `(score - 70) / 300`, never below zero;
   * a failed one lowers it by 0.05.
   */
  public recordPerformance(
    moduleId: string,
    score: number,
    completionTime: number,
    attempts: number,
    outcome: PerformanceOutcome = {}
  ): PerformanceRecord {
    const success = outcome.success ?? score >= SUCCESS_SCORE;
    const record: PerformanceRecord = {
      moduleId,
      score,
      completionTime,
      attemptsNeeded: attempts,
      success,
      timestamp: (outcome.timestamp ?? new Date()).toISOString(),
      skillLevelAtTime: this.skill
    };
    this.history.push(record);

    const drift = success ? Math.max(0, (score - SUCCESS_SCORE) / 300) : -0.05;
    this.skill = roundTo(clamp(this.skill + drift, MIN_SKILL_LEVEL, MAX_SKILL_LEVEL));

    return record;
  }

  /**
   * Modules not yet completed whose every prerequisite is completed.
   * `assumedCompleted` counts extra modules as done without recording them.
   */
  public availableModules(
    graph: ModuleGraph,
    assumedCompleted: ReadonlySet<string> = new Set<string>()
  ): LearningModule[] {
    const isDone = (moduleId: string) =>
      this.completed.has(moduleId) || assumedCompleted.has(moduleId);

    const available: LearningModule[] = [];
    graph.modules.forEach(module => {
      if (isDone(module.id)) {
        return;
      }
      const unlocked = Array.from(module.prerequisites).every(isDone);
      if (unlocked) {
        available.push(module);
      }
    });
    return available;
  }

  public recentPerformance(count: number): PerformanceRecord[] {
    return this.history.slice(-count);
  }

  public recommendedDifficulty(): number {
    const base = Math.floor(this.skill);
    if (this.history.length === 0) {
      return base;
    }

    const recent = this.recentPerformance(RECENT_WINDOW);
    const averageScore = average(recent.map(record => record.score));
    const successRate = recent.filter(record => record.success).length / recent.length;

    if (averageScore > 85 && successRate > 0.8) {
      return Math.min(MAX_DIFFICULTY, base + 1);
    }
    if (averageScore < 70 || successRate < 0.5) {
      return Math.max(MIN_DIFFICULTY, base - 1);
    }
    return base;
  }
}
