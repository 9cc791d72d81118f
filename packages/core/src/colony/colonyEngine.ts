import { z } from "zod";
import { ColonyConfigSchema, resolveColonyConfig, type ColonyConfig } from "../config/colonyConfig";
import { loadModuleDefinitions } from "../data/moduleLoader";
import { UnknownLearnerError, InvalidProgressError } from "../errors";
import { LearnerAnt } from "../domain/learnerAnt";
import { buildModuleGraph, getModule, type ModuleGraph } from "../domain/moduleGraph";
import type {
  ColonyStatistics,
  LearnerInit,
  LearningModule,
  ModuleDefinition,
  OptimizationResult,
  PerformanceRecord,
  ProgressEvent
} from "../domain/models";
import type { PheromoneTrail } from "../domain/pheromoneTrail";
import { TrailStore } from "../domain/trailStore";
import { createLogger, type Logger } from "../logging/logger";
import { constructPath, pathSeed } from "./pathConstruction";
import { evaluatePath } from "./pathEvaluation";
import {
  selectionProbabilities,
  type RandomSource,
  type SelectionCandidate
} from "./selection";

export interface ColonyEngineOptions {
  modules?: ModuleDefinition[];
  config?: Partial<ColonyConfig>;
  random?: RandomSource;
  logger?: Logger;
}

export interface OptimizeOptions {
  /** Positive integer; anything else falls back to `maxIterations` with a warning. */
  iterations?: number;
  /** Run against a private copy of the trails and leave the shared store untouched. */
  isolateTrails?: boolean;
}

const ProgressEventSchema = z.object({
  learnerId: z.string().min(1),
  moduleId: z.string().min(1),
  score: z.number().min(0).max(100),
  completionTime: z.number().min(0),
  attemptsNeeded: z.number().int().min(1),
  success: z.boolean().optional()
});

/**
 * Owns the module graph, the pheromone trails and the learner roster for one
 * session, and searches for module sequences over them.
 *
 * Runs are synchronous. Reads of the shared trails while a run is in progress
 * observe partially updated levels.
 */
export class ColonyEngine {
  private readonly graph: ModuleGraph;
  private readonly moduleOrder: string[];
  private readonly trails: TrailStore;
  private readonly learners = new Map<string, LearnerAnt>();
  private readonly config: ColonyConfig;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly statistics: ColonyStatistics = {
    totalPathsGenerated: 0,
    totalLearningEvents: 0,
    optimizationRuns: 0
  };

  constructor(options: ColonyEngineOptions = {}) {
    this.logger = options.logger ?? createLogger("colony");
    const definitions = loadModuleDefinitions(options.modules, this.logger);
    this.graph = buildModuleGraph(definitions);
    this.moduleOrder = definitions.map(definition => definition.id);
    this.trails = TrailStore.forModules(this.moduleOrder);
    this.config = resolveColonyConfig(options.config ?? {}, this.logger);
    this.random = options.random ?? Math.random;
    this.logger.debug("Colony initialized", {
      modules: this.graph.modules.size,
      trails: this.trails.size
    });
  }

  public getConfig(): Readonly<ColonyConfig> {
    return this.config;
  }

  public getModuleGraph(): ModuleGraph {
    return this.graph;
  }

  public getModules(): LearningModule[] {
    return this.moduleOrder.map(id => getModule(this.graph, id));
  }

  public getModule(moduleId: string): LearningModule {
    return getModule(this.graph, moduleId);
  }

  public getTrailStore(): TrailStore {
    return this.trails;
  }

  public getTrails(): PheromoneTrail[] {
    return this.trails.values();
  }

  public getTrail(fromModule: string, toModule: string): PheromoneTrail | undefined {
    return this.trails.get(fromModule, toModule);
  }

  public getLearners(): LearnerAnt[] {
    return Array.from(this.learners.values());
  }

  public hasLearner(learnerId: string): boolean {
    return this.learners.has(learnerId);
  }

  public getLearner(learnerId: string): LearnerAnt {
    const learner = this.learners.get(learnerId);
    if (!learner) {
      throw new UnknownLearnerError(learnerId);
    }
    return learner;
  }

  public getStatistics(): ColonyStatistics {
    return { ...this.statistics };
  }

  /**
   * Registers a learner. An id that is already registered keeps its existing
   * profile.
   */
  public registerLearner(init: LearnerInit): LearnerAnt {
    const existing = this.learners.get(init.learnerId);
    if (existing) {
      return existing;
    }
    if (init.currentModule) {
      getModule(this.graph, init.currentModule);
    }
    // one pass only: the caller may hand over a single-use iterator
    const completedModules = Array.from(init.completedModules ?? []);
    completedModules.forEach(moduleId => getModule(this.graph, moduleId));

    const learner = new LearnerAnt({ ...init, completedModules });
    this.learners.set(learner.learnerId, learner);
    this.logger.debug("Learner registered", { learnerId: learner.learnerId });
    return learner;
  }

  /**
   * Applies a learner outcome. Unknown learners are created on their first
   * event. An explicit `success` flag decides the outcome for the stored
   * record, the skill drift and completion alike. A successful attempt that
   * follows another module also records a traversal on the trail between the
   * two.
   */
  public recordProgress(event: ProgressEvent): PerformanceRecord {
    const parsed = ProgressEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new InvalidProgressError(
        parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
      );
    }
    getModule(this.graph, event.moduleId);

    const learner = this.learners.get(event.learnerId) ?? this.registerLearner({ learnerId: event.learnerId });
    const previousModule = learner.currentModule;
    const record = learner.recordPerformance(
      event.moduleId,
      event.score,
      event.completionTime,
      event.attemptsNeeded,
      { success: event.success }
    );

    if (record.success) {
      learner.markCompleted(event.moduleId);
      if (previousModule !== null && previousModule !== event.moduleId) {
        this.trails
          .get(previousModule, event.moduleId)
          ?.recordTraversal(event.score, event.completionTime, true);
      }
    }
    learner.currentModule = event.moduleId;
    this.statistics.totalLearningEvents += 1;

    return record;
  }

  /**
   * Selection odds for the learner's next step from their current module.
   */
  public candidateProbabilities(learnerId: string): SelectionCandidate[] {
    const learner = this.getLearner(learnerId);
    const visited = new Set<string>(learner.currentModule ? [learner.currentModule] : []);
    const candidates = learner
      .availableModules(this.graph, visited)
      .filter(module => !visited.has(module.id));
    return selectionProbabilities(learner.currentModule, candidates, {
      trails: this.trails,
      learner,
      alpha: this.config.alpha,
      beta: this.config.beta
    });
  }

  public evaluatePath(learnerId: string, path: readonly string[]): number {
    return evaluatePath(path, this.getLearner(learnerId), this.graph);
  }

  private resolveIterations(requested: number | undefined): number {
    if (requested === undefined) {
      return this.config.maxIterations;
    }
    const parsed = ColonyConfigSchema.shape.maxIterations.safeParse(requested);
    if (!parsed.success) {
      this.logger.warn("Ignoring invalid iteration count", {
        requested: String(requested),
        fallback: this.config.maxIterations
      });
      return this.config.maxIterations;
    }
    return parsed.data;
  }

  public optimizePath(
    learnerId: string,
    targetModuleId: string,
    options: OptimizeOptions = {}
  ): OptimizationResult {
    const learner = this.getLearner(learnerId);
    getModule(this.graph, targetModuleId);

    const iterations = this.resolveIterations(options.iterations);
    const trails = options.isolateTrails ? this.trails.clone() : this.trails;
    const seed = pathSeed(learner, targetModuleId);
    const { alpha, beta, maxPathLength, evaporationRate, reinforcementFactor } = this.config;

    this.statistics.optimizationRuns += 1;

    let bestPath: string[] = [];
    let bestScore = 0;
    let lastScore = 0;
    let failedIterations = 0;

    for (let iteration = 0; iteration < iterations; iteration += 1) {
      try {
        const path = constructPath(learner, targetModuleId, {
          graph: this.graph,
          trails,
          alpha,
          beta,
          maxPathLength,
          random: this.random
        });
        const score = evaluatePath(path, learner, this.graph);
        if (path.length > 0) {
          this.statistics.totalPathsGenerated += 1;
        }
        if (score > bestScore) {
          bestPath = path;
          bestScore = score;
        }
        lastScore = score;

        trails.evaporateAll(evaporationRate);
        if (path.length > 0) {
          trails.reinforcePath([seed, ...path], score * reinforcementFactor);
        }
      } catch (error) {
        failedIterations += 1;
        this.logger.warn("Optimization iteration failed", {
          learnerId,
          targetModuleId,
          iteration,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    const result: OptimizationResult = {
      learnerId,
      targetModuleId,
      path: bestPath,
      score: bestScore,
      reachedTarget: bestPath.length > 0 && bestPath[bestPath.length - 1] === targetModuleId,
      iterations,
      failedIterations,
      converged: bestPath.length > 0 && Math.abs(bestScore - lastScore) <= this.config.convergenceThreshold
    };

    this.logger.info("Optimization finished", {
      learnerId,
      targetModuleId,
      pathLength: result.path.length,
      score: Number(result.score.toFixed(4)),
      reachedTarget: result.reachedTarget,
      failedIterations
    });

    return result;
  }
}
