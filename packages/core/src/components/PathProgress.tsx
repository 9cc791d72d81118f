import type { PathRecommendation } from "../services/recommendationService";

export interface PathProgressProps {
  recommendation: PathRecommendation;
}

const getDifficultyColor = (difficulty: number) => {
  if (difficulty <= 2) {
    return "#3BA272";
  }
  if (difficulty <= 3) {
    return "#F7B733";
  }
  return "#F05D5E";
};

export const PathProgress = ({ recommendation }: PathProgressProps) => {
  if (recommendation.steps.length === 0) {
    return <p>No route found to {recommendation.targetModuleId}.</p>;
  }

  const totalMinutes = recommendation.steps.reduce(
    (sum, step) => sum + step.module.estimatedTime,
    0
  );

  return (
    <div>
      <ol style={{ paddingLeft: "1.25rem", margin: 0 }}>
        {recommendation.steps.map(step => (
          <li
            key={step.module.id}
            style={{
              border: "1px solid #D9D9D9",
              borderRadius: 8,
              padding: "0.75rem",
              marginBottom: "0.5rem"
            }}
          >
            <h3 style={{ margin: "0 0 0.5rem 0", fontSize: "1rem" }}>{step.module.title}</h3>
            <span style={{ color: getDifficultyColor(step.module.difficulty) }}>
              Difficulty {step.module.difficulty}
            </span>
            <span style={{ marginLeft: "0.75rem", color: "#6F7D8C" }}>
              {step.module.estimatedTime} min
            </span>
          </li>
        ))}
      </ol>
      <p style={{ margin: "0.5rem 0 0 0", color: "#6F7D8C" }}>
        {recommendation.reachedTarget
          ? `Reaches ${recommendation.targetModuleId} in ${totalMinutes} min`
          : `Stops short of ${recommendation.targetModuleId}`}
      </p>
    </div>
  );
};
