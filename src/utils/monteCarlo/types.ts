import { PlanInputs } from '../projection/types';

export interface MonteCarloResult {
  runs: number;
  seed: number | null;
  successRate: number;
  medianNetWorth: number;
  percentile10NetWorth: number;
  // One terminal net worth per trial, in submission order
  allNetWorths: number[];
  // The same net worths deflated to starting-age dollars
  allNetWorthsReal: number[];
}

export interface TrialOutcome {
  success: boolean;
  finalNetWorth: number;
}

export interface MonteCarloOptions {
  seed?: number | null;
  onProgress?: (completed: number, total: number) => void;
}

export type SimulationStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface SimulationJob {
  id: string;
  inputs: PlanInputs;
  totalSimulations: number;
  batchSize: number;
  seed: number | null;
  status: SimulationStatus;
  progress: number;
  completedSimulations: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  duration?: number; // Duration in milliseconds
  result?: MonteCarloResult;
}

export interface SimulationProgress {
  id: string;
  status: SimulationStatus;
  progress: number;
  completedSimulations: number;
  totalSimulations: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  duration?: number; // Duration in milliseconds
}
