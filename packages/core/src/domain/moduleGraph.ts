import { UnknownModuleError } from "../errors";
import type { LearningModule, ModuleDefinition } from "./models";

export interface ModuleGraph {
  modules: Map<string, LearningModule>;
  adjacency: Map<string, Set<string>>; // prerequisite -> dependents
  reverseAdjacency: Map<string, Set<string>>; // module -> prerequisites
}

const toModule = (definition: ModuleDefinition): LearningModule =>
  Object.freeze({
    id: definition.id,
    title: definition.title,
    difficulty: definition.difficulty,
    estimatedTime: definition.estimatedTime,
    prerequisites: new Set(definition.prerequisites),
    tags: new Set(definition.tags),
    learningObjectives: Object.freeze([...definition.learningObjectives]),
    category: definition.category
  });

export const buildModuleGraph = (definitions: ModuleDefinition[]): ModuleGraph => {
  const modules = new Map<string, LearningModule>();
  const adjacency = new Map<string, Set<string>>();
  const reverseAdjacency = new Map<string, Set<string>>();

  definitions.forEach(definition => {
    modules.set(definition.id, toModule(definition));
    adjacency.set(definition.id, new Set<string>());
    reverseAdjacency.set(definition.id, new Set<string>());
  });

  definitions.forEach(definition => {
    definition.prerequisites.forEach(prereqId => {
      if (!modules.has(prereqId)) {
        throw new UnknownModuleError(prereqId, `prerequisite of ${definition.id}`);
      }
      adjacency.get(prereqId)?.add(definition.id);
      reverseAdjacency.get(definition.id)?.add(prereqId);
    });
  });

  return { modules, adjacency, reverseAdjacency };
};

export const getModule = (graph: ModuleGraph, moduleId: string): LearningModule => {
  const module = graph.modules.get(moduleId);
  if (!module) {
    throw new UnknownModuleError(moduleId);
  }
  return module;
};

export const findMissingPrerequisites = (
  moduleId: string,
  graph: ModuleGraph,
  completed: ReadonlySet<string>
): string[] => {
  const upstream = graph.reverseAdjacency.get(moduleId);
  if (!upstream) {
    return [];
  }
  const missing: string[] = [];
  upstream.forEach(prereqId => {
    if (!completed.has(prereqId)) {
      missing.push(prereqId);
    }
  });
  return missing;
};

export const topologicalSort = (graph: ModuleGraph): string[] => {
  const inDegree = new Map<string, number>();
  graph.modules.forEach((_, id) => {
    inDegree.set(id, graph.reverseAdjacency.get(id)?.size ?? 0);
  });

  const queue: string[] = [];
  inDegree.forEach((count, id) => {
    if (count === 0) {
      queue.push(id);
    }
  });

  const order: string[] = [];
  let current = queue.shift();
  while (current !== undefined) {
    order.push(current);
    graph.adjacency.get(current)?.forEach(target => {
      const next = (inDegree.get(target) ?? 0) - 1;
      inDegree.set(target, next);
      if (next === 0) {
        queue.push(target);
      }
    });
    current = queue.shift();
  }

  return order;
};

export const detectCycles = (graph: ModuleGraph): string[][] => {
  const visited = new Set<string>();
  const stack = new Set<string>();
  const cycles: string[][] = [];

  const dfs = (node: string, path: string[]) => {
    if (stack.has(node)) {
      const cycleStart = path.indexOf(node);
      cycles.push(path.slice(cycleStart, -1));
      return;
    }
    if (visited.has(node)) {
      return;
    }

    visited.add(node);
    stack.add(node);
    graph.adjacency.get(node)?.forEach(next => {
      dfs(next, [...path, next]);
    });
    stack.delete(node);
  };

  graph.modules.forEach((_, id) => {
    if (!visited.has(id)) {
      dfs(id, [id]);
    }
  });

  return cycles;
};
