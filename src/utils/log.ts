import fs from 'fs';
import path from 'path';
import cliProgress from 'cli-progress';
import { loadConfig } from './config/config';

/**
 * Logs a message to the configured log file with optional reset flag
 *
 * @param message - The message to log to the file
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(message: string, reset: boolean = false) {
  const { logFile } = loadConfig();
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const stream = fs.createWriteStream(logFile, { flags: reset ? 'w' : 'a' });
  stream.write(message + '\n');
  stream.end();
}

/**
 * Creates and starts a progress bar for one Monte Carlo job. The caller owns the bar
 * and must pass it to `stopProgressBar` when the job ends.
 *
 * @param nTrials - Total number of trials to run
 * @param label - Short label shown after the counter, usually a job id
 * @returns The started bar, or null when progress bars are disabled
 */
export function initProgressBar(nTrials: number, label: string = 'monte carlo'): cliProgress.SingleBar | null {
  if (!loadConfig().showProgressBar) {
    return null;
  }
  const progressBar = new cliProgress.SingleBar({
    format: `Progress |{bar}| {percentage}% | {value} / {total} | ${label}`,
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  progressBar.start(nTrials, 0);
  return progressBar;
}

/**
 * Advances the progress bar by `steps`
 */
export function incrementProgressBar(progressBar: cliProgress.SingleBar | null, steps: number = 1) {
  progressBar?.increment(steps);
}

/**
 * Stops the progress bar
 */
export function stopProgressBar(progressBar: cliProgress.SingleBar | null) {
  progressBar?.stop();
}
