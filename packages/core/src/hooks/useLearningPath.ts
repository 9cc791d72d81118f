import { useCallback, useEffect, useMemo, useState } from "react";
import type { ColonyEngine } from "../colony/colonyEngine";
import {
  RecommendationService,
  type PathRecommendation
} from "../services/recommendationService";

export interface UseLearningPathArgs {
  engine: ColonyEngine;
  learnerId: string;
  targetModuleId: string;
  iterations?: number;
}

export interface UseLearningPathResult {
  recommendation: PathRecommendation | null;
  error: Error | null;
  refresh: () => void;
}

export const useLearningPath = ({
  engine,
  learnerId,
  targetModuleId,
  iterations
}: UseLearningPathArgs): UseLearningPathResult => {
  const service = useMemo(() => new RecommendationService(engine), [engine]);
  const [recommendation, setRecommendation] = useState<PathRecommendation | null>(null);
  const [error, setError] = useState<Error | null>(null);

  const run = useCallback(() => {
    try {
      setRecommendation(service.recommendPath(learnerId, targetModuleId, { iterations }));
      setError(null);
    } catch (caught) {
      setRecommendation(null);
      setError(caught instanceof Error ? caught : new Error(String(caught)));
    }
  }, [service, learnerId, targetModuleId, iterations]);

  useEffect(() => {
    run();
  }, [run]);

  return {
    recommendation,
    error,
    refresh: run
  };
};
