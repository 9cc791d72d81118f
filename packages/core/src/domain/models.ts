export type LearningStyle = "Visual" | "Practical" | "Theoretical" | "Mixed";

export const LEARNING_STYLES: readonly LearningStyle[] = [
  "Visual",
  "Practical",
  "Theoretical",
  "Mixed"
];

export interface ModuleDefinition {
  id: string;
  title: string;
  difficulty: number; // 1-5
  estimatedTime: number; // minutes
  prerequisites: string[];
  tags: string[];
  learningObjectives: string[];
  category?: string;
}

export interface LearningModule {
  readonly id: string;
  readonly title: string;
  readonly difficulty: number;
  readonly estimatedTime: number;
  readonly prerequisites: ReadonlySet<string>;
  readonly tags: ReadonlySet<string>;
  readonly learningObjectives: readonly string[];
  readonly category?: string;
}

export interface PerformanceRecord {
  moduleId: string;
  score: number; // 0-100
  completionTime: number; // minutes
  attemptsNeeded: number;
  success: boolean;
  timestamp: string;
  skillLevelAtTime: number;
}

export type LearningGoal =
  | { kind: "target-module"; moduleId: string }
  | { kind: "skill-level"; target: number }
  | { kind: "session-minutes"; minutesPerWeek: number };

export interface LearnerPreferences {
  maxSessionTime?: number; // minutes
}

export interface LearnerInit {
  learnerId: string;
  skillLevel?: number;
  learningStyle?: LearningStyle;
  currentModule?: string | null;
  completedModules?: Iterable<string>;
  learningGoals?: LearningGoal[];
  preferences?: LearnerPreferences;
}

export interface ProgressEvent {
  learnerId: string;
  moduleId: string;
  score: number;
  completionTime: number;
  attemptsNeeded: number;
  success?: boolean; // defaults to score >= 70
}

export interface ColonyStatistics {
  totalPathsGenerated: number;
  totalLearningEvents: number;
  optimizationRuns: number;
}

export interface OptimizationResult {
  learnerId: string;
  targetModuleId: string;
  path: string[];
  score: number;
  reachedTarget: boolean;
  iterations: number;
  failedIterations: number;
  converged: boolean;
}
