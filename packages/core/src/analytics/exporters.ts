import Papa from "papaparse";
import type { ColonyEngine } from "../colony/colonyEngine";
import type { LearnerAnt } from "../domain/learnerAnt";
import type { LearningGoal, LearningStyle, PerformanceRecord } from "../domain/models";
import type { PheromoneTrail, PheromoneTrailSnapshot } from "../domain/pheromoneTrail";
import { summarizeColony, type ColonySummary } from "./colonyStatistics";

export interface ModuleSnapshot {
  id: string;
  title: string;
  difficulty: number;
  estimatedTime: number;
  prerequisites: string[];
  tags: string[];
  learningObjectives: string[];
  category?: string;
}

export interface LearnerSnapshot {
  learnerId: string;
  currentModule: string | null;
  skillLevel: number;
  learningStyle: LearningStyle;
  completedModules: string[];
  performanceHistory: PerformanceRecord[];
  learningGoals: LearningGoal[];
  maxSessionTime?: number;
}

export interface ColonySnapshot {
  exportedAt: string;
  summary: ColonySummary;
  modules: ModuleSnapshot[];
  trails: PheromoneTrailSnapshot[];
  learners: LearnerSnapshot[];
}

const toLearnerSnapshot = (learner: LearnerAnt): LearnerSnapshot => ({
  learnerId: learner.learnerId,
  currentModule: learner.currentModule,
  skillLevel: learner.skillLevel,
  learningStyle: learner.learningStyle,
  completedModules: Array.from(learner.completedModules),
  performanceHistory: learner.performanceHistory.map(record => ({ ...record })),
  learningGoals: learner.learningGoals.map(goal => ({ ...goal })),
  maxSessionTime: learner.preferences.maxSessionTime
});

export const toColonySnapshot = (
  engine: ColonyEngine,
  exportedAt: Date = new Date()
): ColonySnapshot => ({
  exportedAt: exportedAt.toISOString(),
  summary: summarizeColony(engine),
  modules: engine.getModules().map(module => ({
    id: module.id,
    title: module.title,
    difficulty: module.difficulty,
    estimatedTime: module.estimatedTime,
    prerequisites: Array.from(module.prerequisites),
    tags: Array.from(module.tags),
    learningObjectives: [...module.learningObjectives],
    category: module.category
  })),
  trails: engine.getTrails().map(trail => trail.toSnapshot()),
  learners: engine.getLearners().map(toLearnerSnapshot)
});

export const TRAIL_CSV_COLUMNS = [
  "fromModule",
  "toModule",
  "pheromoneLevel",
  "traversalCount",
  "successRate",
  "averageScore",
  "averageCompletionTime",
  "trailStrength"
] as const;

export const trailsToCsv = (trails: readonly PheromoneTrail[]): string =>
  Papa.unparse(
    {
      fields: [...TRAIL_CSV_COLUMNS],
      data: trails.map(trail => {
        const snapshot = trail.toSnapshot();
        return TRAIL_CSV_COLUMNS.map(column => snapshot[column]);
      })
    },
    { newline: "\n" }
  );

const quote = (value: string): string => `"${value.replace(/"/g, '\\"')}"`;

/**
 * DOT text for the prerequisite graph. Edges that learners or the optimizer
 * have strengthened beyond `minLevel` are added as dashed pheromone edges.
 */
export const graphToDot = (engine: ColonyEngine, minLevel = 1.0): string => {
  const lines: string[] = ["digraph modules {", "  rankdir=LR;"];

  engine.getModules().forEach(module => {
    lines.push(`  ${quote(module.id)} [label=${quote(`${module.title} (d${module.difficulty})`)}];`);
  });
  engine.getModules().forEach(module => {
    module.prerequisites.forEach(prereqId => {
      lines.push(`  ${quote(prereqId)} -> ${quote(module.id)};`);
    });
  });
  engine
    .getTrails()
    .filter(trail => trail.pheromoneLevel > minLevel)
    .forEach(trail => {
      lines.push(
        `  ${quote(trail.fromModule)} -> ${quote(trail.toModule)} [style=dashed, label=${quote(
          trail.pheromoneLevel.toFixed(2)
        )}];`
      );
    });

  lines.push("}");
  return lines.join("\n");
};
