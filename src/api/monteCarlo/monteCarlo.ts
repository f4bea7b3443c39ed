import { Request } from 'express';
import { getPlanInputs, getRuns, getSeed } from '../../utils/net/request';
import {
  simulateMonteCarlo,
  startMonteCarloSimulation,
  getSimulationProgress,
  getSimulationResult,
  MonteCarloSimulationRunner,
} from '../../utils/monteCarlo';
import { MonteCarloResult, SimulationProgress } from '../../utils/monteCarlo/types';
import { NotFoundError } from '../../utils/validation/errors';

/**
 * Run a Monte Carlo simulation and wait for the result
 */
export function runMonteCarlo(req: Request): MonteCarloResult {
  const inputs = getPlanInputs(req);
  return simulateMonteCarlo(inputs, getRuns(req), { seed: getSeed(req) });
}

/**
 * Start a new Monte Carlo simulation in the background
 */
export function startSimulation(req: Request): { id: string } {
  const inputs = getPlanInputs(req);
  const id = startMonteCarloSimulation(inputs, getRuns(req), undefined, getSeed(req));
  return { id };
}

/**
 * Get the status of a specific Monte Carlo simulation
 */
export function getSimulationStatus(req: Request): SimulationProgress {
  const { id } = req.params;
  const progress = getSimulationProgress(id);

  if (!progress) {
    throw new NotFoundError(`Simulation with ID ${id} not found`);
  }

  return progress;
}

/**
 * Get all Monte Carlo simulation statuses
 */
export function getAllSimulations(_req: Request): SimulationProgress[] {
  const runner = MonteCarloSimulationRunner.getInstance();
  return runner.getAllSimulations();
}

/**
 * Get the result of a completed Monte Carlo simulation
 */
export function getSimulationOutcome(req: Request): MonteCarloResult {
  const { id } = req.params;

  if (!getSimulationProgress(id)) {
    throw new NotFoundError(`Simulation with ID ${id} not found`);
  }

  const result = getSimulationResult(id);
  if (!result) {
    throw new NotFoundError(`Simulation with ID ${id} is not yet completed`);
  }

  return result;
}
