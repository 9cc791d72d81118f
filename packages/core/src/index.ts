export * from "./domain/models";
export * from "./errors";
export {
  type ModuleGraph,
  buildModuleGraph,
  getModule,
  findMissingPrerequisites,
  detectCycles,
  topologicalSort
} from "./domain/moduleGraph";
export {
  PheromoneTrail,
  MIN_PHEROMONE,
  MAX_PHEROMONE,
  INITIAL_PHEROMONE
} from "./domain/pheromoneTrail";
export type { PheromoneTrailSnapshot } from "./domain/pheromoneTrail";
export { TrailStore } from "./domain/trailStore";
export type { TrailPair } from "./domain/trailStore";
export { LearnerAnt, MIN_SKILL_LEVEL, MAX_SKILL_LEVEL, SUCCESS_SCORE } from "./domain/learnerAnt";
export type { PerformanceOutcome } from "./domain/learnerAnt";
export { ColonyEngine } from "./colony/colonyEngine";
export type { ColonyEngineOptions, OptimizeOptions } from "./colony/colonyEngine";
export { ColonySession } from "./colony/colonySession";
export {
  attractiveness,
  skillMatch,
  styleMatch,
  timeFit,
  recentPerformanceModifier
} from "./colony/attractiveness";
export {
  selectionProbabilities,
  rouletteSelect,
  selectNextModule,
  pheromoneBetween
} from "./colony/selection";
export type { RandomSource, SelectionCandidate, SelectionContext } from "./colony/selection";
export { constructPath, pathSeed } from "./colony/pathConstruction";
export type { ConstructionOptions } from "./colony/pathConstruction";
export { evaluatePath, pathEfficiency, prerequisiteSatisfaction } from "./colony/pathEvaluation";
export { ColonyConfigSchema, resolveColonyConfig, loadColonyConfig } from "./config/colonyConfig";
export type { ColonyConfig } from "./config/colonyConfig";
export { DEFAULT_COLONY_CONFIG, DEFAULT_PHEROMONE_LEVEL } from "./config/constants";
export {
  ModuleDefinitionSchema,
  getDefaultModules,
  loadModuleDefinitions,
  parseModuleCsv,
  validateModuleDefinitions
} from "./data/moduleLoader";
export type { ModuleSource } from "./data/moduleLoader";
export {
  summarizeColony,
  summarizeLearner,
  strongestTrails,
  pathStrength
} from "./analytics/colonyStatistics";
export type { ColonySummary, LearnerSummary } from "./analytics/colonyStatistics";
export { toColonySnapshot, trailsToCsv, graphToDot, TRAIL_CSV_COLUMNS } from "./analytics/exporters";
export type { ColonySnapshot, LearnerSnapshot, ModuleSnapshot } from "./analytics/exporters";
export { RecommendationService } from "./services/recommendationService";
export type { PathRecommendation, PathStep } from "./services/recommendationService";
export { useLearningPath } from "./hooks/useLearningPath";
export type { UseLearningPathArgs, UseLearningPathResult } from "./hooks/useLearningPath";
export { PathProgress } from "./components/PathProgress";
export type { PathProgressProps } from "./components/PathProgress";
export { createLogger, formatLogLine, resolveLogLevel } from "./logging/logger";
export type { Logger, LogLevel, LogFields } from "./logging/logger";
