import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  runMonteCarlo,
  startSimulation,
  getSimulationStatus,
  getAllSimulations,
  getSimulationOutcome,
} from './monteCarlo';
import {
  simulateMonteCarlo,
  startMonteCarloSimulation,
  getSimulationProgress,
  getSimulationResult,
  MonteCarloSimulationRunner,
} from '../../utils/monteCarlo';
import { MonteCarloResult, SimulationProgress } from '../../utils/monteCarlo/types';
import { NotFoundError } from '../../utils/validation/errors';
import { createMockRequest, createPlanBody, createPlanInputs } from '../../utils/test/mockData';

// Mock dependencies
vi.mock('../../utils/monteCarlo');
vi.mock('../../utils/logger');

const result: MonteCarloResult = {
  runs: 2,
  seed: 5,
  successRate: 0.5,
  medianNetWorth: 10,
  percentile10NetWorth: 2,
  allNetWorths: [0, 20],
  allNetWorthsReal: [0, 16],
};

const progress: SimulationProgress = {
  id: 'sim-1',
  status: 'running',
  progress: 40,
  completedSimulations: 4,
  totalSimulations: 10,
  createdAt: new Date('2026-01-01T00:00:00Z'),
};

describe('Monte Carlo API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('runMonteCarlo', () => {
    it('should run with the validated inputs, runs and seed', () => {
      vi.mocked(simulateMonteCarlo).mockReturnValue(result);
      const req = createMockRequest({ body: createPlanBody(), query: { runs: '2', seed: '5' } });

      expect(runMonteCarlo(req)).toBe(result);
      expect(simulateMonteCarlo).toHaveBeenCalledWith(createPlanInputs(), 2, { seed: 5 });
    });
  });

  describe('startSimulation', () => {
    it('should start a background job and return its id', () => {
      vi.mocked(startMonteCarloSimulation).mockReturnValue('sim-1');
      const req = createMockRequest({ body: createPlanBody(), query: { runs: '10' } });

      expect(startSimulation(req)).toEqual({ id: 'sim-1' });
      expect(startMonteCarloSimulation).toHaveBeenCalledWith(createPlanInputs(), 10, undefined, null);
    });
  });

  describe('getSimulationStatus', () => {
    it('should return the progress of a known job', () => {
      vi.mocked(getSimulationProgress).mockReturnValue(progress);

      expect(getSimulationStatus(createMockRequest({ params: { id: 'sim-1' } }))).toBe(progress);
    });

    it('should throw NotFoundError for an unknown job', () => {
      vi.mocked(getSimulationProgress).mockReturnValue(null);

      expect(() => getSimulationStatus(createMockRequest({ params: { id: 'nope' } }))).toThrow(NotFoundError);
    });
  });

  describe('getAllSimulations', () => {
    it('should list jobs from the shared runner', () => {
      const getAll = vi.fn(() => [progress]);
      vi.mocked(MonteCarloSimulationRunner.getInstance).mockReturnValue({
        getAllSimulations: getAll,
      } as unknown as MonteCarloSimulationRunner);

      expect(getAllSimulations(createMockRequest())).toEqual([progress]);
    });
  });

  describe('getSimulationOutcome', () => {
    it('should return the result of a completed job', () => {
      vi.mocked(getSimulationProgress).mockReturnValue({ ...progress, status: 'completed' });
      vi.mocked(getSimulationResult).mockReturnValue(result);

      expect(getSimulationOutcome(createMockRequest({ params: { id: 'sim-1' } }))).toBe(result);
    });

    it('should throw NotFoundError while the job is still running', () => {
      vi.mocked(getSimulationProgress).mockReturnValue(progress);
      vi.mocked(getSimulationResult).mockReturnValue(null);

      expect(() => getSimulationOutcome(createMockRequest({ params: { id: 'sim-1' } }))).toThrow(
        'Simulation with ID sim-1 is not yet completed',
      );
    });

    it('should throw NotFoundError for an unknown job', () => {
      vi.mocked(getSimulationProgress).mockReturnValue(null);

      expect(() => getSimulationOutcome(createMockRequest({ params: { id: 'nope' } }))).toThrow(
        'Simulation with ID nope not found',
      );
    });
  });
});
