import {
  ColonyEngine,
  graphToDot,
  loadColonyConfig,
  strongestTrails,
  summarizeColony,
  summarizeLearner
} from '../packages/core/src/index';

const main = () => {
  const configPath = process.argv[2];
  const config = configPath ? loadColonyConfig(configPath) : undefined;
  const engine = new ColonyEngine({ config });

  engine.registerLearner({
    learnerId: 'demo-learner',
    skillLevel: 2,
    learningStyle: 'Practical',
    currentModule: 'programming-basics',
    completedModules: ['programming-basics'],
    preferences: { maxSessionTime: 60 }
  });

  const first = engine.optimizePath('demo-learner', 'capstone-lab', { iterations: 50 });
  console.log('Initial path:', first.path.join(' -> '));
  console.log('Score:', first.score.toFixed(3), 'reached target:', first.reachedTarget);

  const [nextModule] = first.path;
  if (nextModule) {
    console.log('\nSimulating a strong result on:', nextModule);
    engine.recordProgress({
      learnerId: 'demo-learner',
      moduleId: nextModule,
      score: 92,
      completionTime: 55,
      attemptsNeeded: 1
    });

    const second = engine.optimizePath('demo-learner', 'capstone-lab', { iterations: 50 });
    console.log('Path after progress:', second.path.join(' -> '));
  }

  console.log('\nLearner:', summarizeLearner(engine.getLearner('demo-learner')));
  console.log('Colony:', summarizeColony(engine));
  console.log(
    'Strongest trails:',
    strongestTrails(engine, 3).map(trail => `${trail.fromModule} -> ${trail.toModule} (${trail.pheromoneLevel.toFixed(2)})`)
  );
  console.log('\n' + graphToDot(engine, 2));

  console.log('\nDone');
};

main();
