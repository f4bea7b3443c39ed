export {
  startMonteCarloSimulation,
  getSimulationProgress,
  getSimulationResult,
  MonteCarloSimulationRunner,
} from './simulationRunner';

export { simulateMonteCarlo, runTrial, aggregateTrials, calculatePercentile, MONTE_CARLO_RUNS } from './monteCarlo';

export type { MonteCarloResult, MonteCarloOptions, SimulationJob, SimulationProgress, TrialOutcome } from './types';
