import { v4 as uuidv4 } from 'uuid';
import { PlanInputs } from '../projection/types';
import { SimulationJob, SimulationProgress, MonteCarloResult, TrialOutcome } from './types';
import { aggregateTrials, runTrial } from './monteCarlo';
import { createRandomSource } from './random';
import { loadConfig } from '../config/config';
import { debug, err, log } from '../logger';
import { initProgressBar, incrementProgressBar, stopProgressBar, logToFile } from '../log';

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Runs Monte Carlo simulations as in-memory background jobs.
 *
 * Trials run in batches, handing control back to the event loop between batches so
 * the server keeps answering status requests. Only the newest `maxRetainedJobs`
 * finished jobs are kept; older completed or failed jobs are evicted.
 */
export class MonteCarloSimulationRunner {
  private static instance: MonteCarloSimulationRunner;
  private jobs: Map<string, SimulationJob> = new Map();
  private running: Map<string, Promise<void>> = new Map();

  constructor(private readonly maxRetainedJobs: number = loadConfig().monteCarloMaxRetainedJobs) {}

  public static getInstance(): MonteCarloSimulationRunner {
    if (!MonteCarloSimulationRunner.instance) {
      MonteCarloSimulationRunner.instance = new MonteCarloSimulationRunner();
    }
    return MonteCarloSimulationRunner.instance;
  }

  public startSimulation(
    inputs: PlanInputs,
    totalSimulations: number,
    batchSize: number = loadConfig().monteCarloBatchSize,
    seed: number | null = null,
  ): string {
    const id = uuidv4();

    const job: SimulationJob = {
      id,
      inputs,
      totalSimulations,
      batchSize: Math.max(1, batchSize),
      seed,
      status: 'pending',
      progress: 0,
      completedSimulations: 0,
      createdAt: new Date(),
    };

    this.jobs.set(id, job);

    // Start on the next tick so the caller gets the id before any trial runs
    const run = new Promise<void>((resolve) => {
      setImmediate(() => {
        this.runSimulationInBackground(id)
          .catch((error: unknown) => {
            err(`Failed to run simulation ${id} in background:`, error);
            job.status = 'failed';
            job.error = error instanceof Error ? error.message : 'Unknown error';
          })
          .finally(() => {
            this.running.delete(id);
            this.evictSettledJobs();
            resolve();
          });
      });
    });
    this.running.set(id, run);

    return id;
  }

  public getProgress(id: string): SimulationProgress | null {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    return this.toProgress(job);
  }

  public isComplete(id: string): boolean {
    return this.jobs.get(id)?.status === 'completed';
  }

  public getResult(id: string): MonteCarloResult | null {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'completed' || !job.result) {
      return null;
    }
    return job.result;
  }

  public getAllSimulations(): SimulationProgress[] {
    return Array.from(this.jobs.values())
      .map((job) => this.toProgress(job))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Resolves once the job has finished, successfully or not.
   */
  public async whenSettled(id: string): Promise<void> {
    await this.running.get(id);
  }

  // Map iteration follows insertion order, so the first settled jobs are the oldest
  private evictSettledJobs(): void {
    const settled = Array.from(this.jobs.values()).filter(
      (job) => job.status === 'completed' || job.status === 'failed',
    );
    const excess = settled.length - this.maxRetainedJobs;
    settled.slice(0, Math.max(0, excess)).forEach((job) => {
      this.jobs.delete(job.id);
      debug('Evicted Monte Carlo job', { id: job.id, status: job.status });
    });
  }

  private toProgress(job: SimulationJob): SimulationProgress {
    return {
      id: job.id,
      status: job.status,
      progress: job.progress,
      completedSimulations: job.completedSimulations,
      totalSimulations: job.totalSimulations,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      error: job.error,
      duration: job.duration,
    };
  }

  private async runSimulationInBackground(id: string): Promise<void> {
    const job = this.jobs.get(id);
    if (!job) return;

    const startedAt = new Date();
    job.status = 'running';
    job.startedAt = startedAt;
    log('Starting Monte Carlo job', { id, totalSimulations: job.totalSimulations, batchSize: job.batchSize });
    const progressBar = initProgressBar(job.totalSimulations, id);

    const random = createRandomSource(job.seed);
    const outcomes: TrialOutcome[] = [];

    try {
      while (outcomes.length < job.totalSimulations) {
        const batchEnd = Math.min(outcomes.length + job.batchSize, job.totalSimulations);
        const batchStart = outcomes.length;
        while (outcomes.length < batchEnd) {
          outcomes.push(runTrial(job.inputs, random));
        }

        job.completedSimulations = outcomes.length;
        job.progress = Math.round((outcomes.length / job.totalSimulations) * 100);
        incrementProgressBar(progressBar, batchEnd - batchStart);

        await yieldToEventLoop();
      }
    } finally {
      stopProgressBar(progressBar);
    }

    job.result = aggregateTrials(outcomes, job.inputs, job.seed);
    job.status = 'completed';
    job.progress = 100;
    const completedAt = new Date();
    job.completedAt = completedAt;
    job.duration = completedAt.getTime() - startedAt.getTime();

    log('Monte Carlo job completed', { id, successRate: job.result.successRate, duration: job.duration });
    logToFile(
      `${completedAt.toISOString()} monte carlo ${id} runs=${job.totalSimulations} successRate=${job.result.successRate}`,
    );
  }
}

/**
 * Starts a background Monte Carlo job on the shared runner
 */
export function startMonteCarloSimulation(
  inputs: PlanInputs,
  totalSimulations: number,
  batchSize?: number,
  seed: number | null = null,
): string {
  return MonteCarloSimulationRunner.getInstance().startSimulation(inputs, totalSimulations, batchSize, seed);
}

export function getSimulationProgress(id: string): SimulationProgress | null {
  return MonteCarloSimulationRunner.getInstance().getProgress(id);
}

export function getSimulationResult(id: string): MonteCarloResult | null {
  return MonteCarloSimulationRunner.getInstance().getResult(id);
}
