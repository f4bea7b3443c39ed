import path from 'path';

export type ProjectorConfig = {
  port: number;
  jwtSecret: string;
  monteCarloRuns: number;
  monteCarloMaxRuns: number;
  monteCarloBatchSize: number;
  monteCarloMaxRetainedJobs: number;
  logFile: string;
  showProgressBar: boolean;
  scenario?: string;
};

export const DEFAULT_PORT = 5002;
export const DEFAULT_MONTE_CARLO_RUNS = 2500;
export const DEFAULT_MONTE_CARLO_MAX_RUNS = 100000;
export const DEFAULT_MONTE_CARLO_BATCH_SIZE = 250;
export const DEFAULT_MONTE_CARLO_MAX_RETAINED_JOBS = 50;
export const DEFAULT_LOG_FILE = path.join(process.cwd(), 'logs', 'projector.log');

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Reads the service configuration from environment variables.
 *
 * `dotenv/config` is imported by the entry point, so values from a `.env` file are
 * already present in `process.env` by the time this runs.
 *
 * @param env - Environment to read, defaults to `process.env`
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProjectorConfig {
  return {
    port: readPositiveInt(env.PORT, DEFAULT_PORT),
    jwtSecret: env.JWT_SECRET || '',
    monteCarloRuns: readPositiveInt(env.MONTE_CARLO_RUNS, DEFAULT_MONTE_CARLO_RUNS),
    monteCarloMaxRuns: readPositiveInt(env.MONTE_CARLO_MAX_RUNS, DEFAULT_MONTE_CARLO_MAX_RUNS),
    monteCarloBatchSize: readPositiveInt(env.MONTE_CARLO_BATCH_SIZE, DEFAULT_MONTE_CARLO_BATCH_SIZE),
    monteCarloMaxRetainedJobs: readPositiveInt(env.MONTE_CARLO_MAX_RETAINED_JOBS, DEFAULT_MONTE_CARLO_MAX_RETAINED_JOBS),
    logFile: env.LOG_FILE || DEFAULT_LOG_FILE,
    showProgressBar: readBoolean(env.SHOW_PROGRESS_BAR, false),
    scenario: env.SCENARIO || undefined,
  };
}
