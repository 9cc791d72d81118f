import { ATTRACTIVENESS_WEIGHTS } from "../config/constants";
import type { LearnerAnt } from "../domain/learnerAnt";
import type { LearningModule } from "../domain/models";
import { average } from "./helpers";

const VISUAL_TITLE = /\b(gui|interface|visual|ui|design|layout)\b/i;
const HANDS_ON_TITLE = /\b(exercise|exercises|practice|project|lab|workshop|hands-on|building)\b/i;
const THEORY_TITLE = /\b(theory|concepts?|fundamentals|principles|introduction)\b/i;

const HANDS_ON_TAGS = ["hands-on", "practical", "exercise", "project"];

const hasTag = (module: LearningModule, candidates: string[]): boolean => {
  const wanted = new Set(candidates.map(tag => tag.toLowerCase()));
  return Array.from(module.tags).some(tag => wanted.has(tag.toLowerCase()));
};

const isHandsOn = (module: LearningModule): boolean =>
  hasTag(module, HANDS_ON_TAGS) || HANDS_ON_TITLE.test(module.title);

const isTheoretical = (module: LearningModule): boolean =>
  hasTag(module, ["theory", "theoretical"]) || THEORY_TITLE.test(module.title);

export const skillMatch = (difficulty: number, skillLevel: number): number =>
  Math.max(0.1, 1 - Math.abs(difficulty - skillLevel) / 5);

export const styleMatch = (module: LearningModule, learner: LearnerAnt): number => {
  switch (learner.learningStyle) {
    case "Visual":
      return hasTag(module, ["visual"]) || VISUAL_TITLE.test(module.title) ? 1.2 : 0.8;
    case "Practical":
      if (isHandsOn(module)) {
        return 1.3;
      }
      return isTheoretical(module) ? 0.7 : 1.0;
    case "Theoretical":
      if (isTheoretical(module)) {
        return 1.3;
      }
      return isHandsOn(module) ? 0.7 : 1.0;
    case "Mixed":
      return 1.0;
  }
};

export const timeFit = (module: LearningModule, learner: LearnerAnt): number => {
  const maxSessionTime = learner.preferences.maxSessionTime;
  if (maxSessionTime === undefined) {
    return 1.0;
  }
  return module.estimatedTime <= maxSessionTime ? 1.2 : 0.8;
};

export const recentPerformanceModifier = (learner: LearnerAnt): number => {
  const recent = learner.recentPerformance(3);
  if (recent.length === 0) {
    return 1.0;
  }
  const recentAverage = average(recent.map(record => record.score));
  if (recentAverage > 80) {
    return 1.1;
  }
  if (recentAverage < 60) {
    return 0.9;
  }
  return 1.0;
};

export const attractiveness = (module: LearningModule, learner: LearnerAnt): number =>
  ATTRACTIVENESS_WEIGHTS.skillMatch * skillMatch(module.difficulty, learner.skillLevel) +
  ATTRACTIVENESS_WEIGHTS.styleMatch * styleMatch(module, learner) +
  ATTRACTIVENESS_WEIGHTS.timeFit * timeFit(module, learner) +
  ATTRACTIVENESS_WEIGHTS.recentPerformance * recentPerformanceModifier(learner);
