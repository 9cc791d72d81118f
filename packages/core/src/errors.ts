export type ColonyErrorCode =
  | "UNKNOWN_MODULE"
  | "UNKNOWN_LEARNER"
  | "COLONY_NOT_INITIALIZED"
  | "INVALID_PROGRESS";

/**
 * Base class for precondition violations surfaced to callers of the colony.
 */
export class ColonyError extends Error {
  readonly code: ColonyErrorCode;

  constructor(code: ColonyErrorCode, message: string) {
    super(message);
    this.name = "ColonyError";
    this.code = code;
  }
}

export class UnknownModuleError extends ColonyError {
  readonly moduleId: string;

  constructor(moduleId: string, context?: string) {
    super(
      "UNKNOWN_MODULE",
      context
        ? `Module "${moduleId}" is not part of the module graph (${context}).`
        : `Module "${moduleId}" is not part of the module graph.`
    );
    this.name = "UnknownModuleError";
    this.moduleId = moduleId;
  }
}

export class UnknownLearnerError extends ColonyError {
  readonly learnerId: string;

  constructor(learnerId: string) {
    super("UNKNOWN_LEARNER", `Learner "${learnerId}" is not registered with the colony.`);
    this.name = "UnknownLearnerError";
    this.learnerId = learnerId;
  }
}

export class ColonyNotInitializedError extends ColonyError {
  constructor() {
    super("COLONY_NOT_INITIALIZED", "No colony has been initialized for this session.");
    this.name = "ColonyNotInitializedError";
  }
}

export class InvalidProgressError extends ColonyError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super("INVALID_PROGRESS", `Invalid progress event: ${problems.join("; ")}`);
    this.name = "InvalidProgressError";
    this.problems = problems;
  }
}
