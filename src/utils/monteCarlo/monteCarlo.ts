import { PlanInputs } from '../projection/types';
import { project } from '../projection/engine';
import { netWorthsInRealDollars } from '../projection/realDollars';
import { MonteCarloOptions, MonteCarloResult, TrialOutcome } from './types';
import { RandomSource, createRandomSource, randomNormal } from './random';

export const MONTE_CARLO_RUNS = 2500;

// Standard deviations as a fraction of each rate's magnitude
export const GROWTH_VARIATION = 0.1;
export const INFLATION_VARIATION = 0.05;

/**
 * Returns a copy of the inputs with savings growth, retirement growth and inflation
 * redrawn around their configured values. A rate of 0 has no spread and stays 0.
 */
export function perturbInputs(inputs: PlanInputs, random: RandomSource): PlanInputs {
  return {
    ...inputs,
    savingsGrowth: randomNormal(random, inputs.savingsGrowth, Math.abs(inputs.savingsGrowth) * GROWTH_VARIATION),
    retirementGrowth: randomNormal(
      random,
      inputs.retirementGrowth,
      Math.abs(inputs.retirementGrowth) * GROWTH_VARIATION,
    ),
    inflation: randomNormal(random, inputs.inflation, Math.abs(inputs.inflation) * INFLATION_VARIATION),
  };
}

/**
 * Runs one perturbed projection. A trial succeeds when net worth never drops below zero.
 */
export function runTrial(inputs: PlanInputs, random: RandomSource): TrialOutcome {
  const { netWorth } = project(perturbInputs(inputs, random));
  return {
    success: netWorth.every((value) => value >= 0),
    finalNetWorth: netWorth.length > 0 ? netWorth[netWorth.length - 1] : 0,
  };
}

/**
 * Calculates percentile value from sorted array using linear interpolation
 */
export function calculatePercentile(sortedValues: number[], percentile: number): number {
  if (sortedValues.length === 0) return 0;

  const index = (percentile / 100) * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) {
    return sortedValues[lower];
  }

  const weight = index - lower;
  return sortedValues[lower] * (1 - weight) + sortedValues[upper] * weight;
}

/**
 * Folds trial outcomes into the success rate and terminal net worth statistics.
 * Real-dollar net worths are deflated with the plan's configured inflation.
 * Only call once every trial has finished.
 */
export function aggregateTrials(
  outcomes: TrialOutcome[],
  inputs: PlanInputs,
  seed: number | null = null,
): MonteCarloResult {
  const allNetWorths = outcomes.map((outcome) => outcome.finalNetWorth);
  const sorted = [...allNetWorths].sort((a, b) => a - b);
  const successes = outcomes.filter((outcome) => outcome.success).length;

  return {
    runs: outcomes.length,
    seed,
    successRate: outcomes.length > 0 ? successes / outcomes.length : 0,
    medianNetWorth: calculatePercentile(sorted, 50),
    percentile10NetWorth: calculatePercentile(sorted, 10),
    allNetWorths,
    allNetWorthsReal: netWorthsInRealDollars(allNetWorths, inputs),
  };
}

/**
 * Reruns the projection `runs` times with randomized growth and inflation.
 *
 * Pass `options.seed` for a reproducible sequence of trials.
 *
 * @example
 * ```typescript
 * const result = simulateMonteCarlo(inputs, 1000, { seed: 42 });
 * console.log(`${(result.successRate * 100).toFixed(1)}% of runs never ran out of money`);
 * ```
 */
export function simulateMonteCarlo(
  inputs: PlanInputs,
  runs: number = MONTE_CARLO_RUNS,
  options: MonteCarloOptions = {},
): MonteCarloResult {
  const seed = options.seed ?? null;
  const random = createRandomSource(seed);
  const total = Math.max(0, Math.floor(runs));
  const outcomes: TrialOutcome[] = [];

  for (let i = 0; i < total; i++) {
    outcomes.push(runTrial(inputs, random));
    options.onProgress?.(i + 1, total);
  }

  return aggregateTrials(outcomes, inputs, seed);
}
