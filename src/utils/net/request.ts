import { Request } from 'express';
import { PlanInputs } from '../projection/types';
import { validatePlanInputs } from '../validation/planInputs';
import { InputValidationError } from '../validation/errors';
import { loadConfig } from '../config/config';
import { warn } from '../logger';
import { DEFAULT_SWEEP_DELTAS, SensitivityVariable, isSensitivityVariable } from '../sensitivity/sensitivity';

/**
 * Reads a single string query parameter, ignoring repeated or nested values
 */
function getQueryString(request: Request, name: string): string | undefined {
  const value = request.query[name];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function parseQueryNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InputValidationError(name, `${name} must be a number.`);
  }
  return parsed;
}

/**
 * Validates the request body as plan inputs
 * @param request - Express request object
 * @returns Validated plan inputs with defaults applied
 */
export function getPlanInputs(request: Request): PlanInputs {
  return validatePlanInputs(request.body);
}

/**
 * Extracts the Monte Carlo run count from the query, capped by the configured maximum
 * @param request - Express request object
 * @param defaultRuns - Run count to use if none specified
 */
export function getRuns(request: Request, defaultRuns: number = loadConfig().monteCarloRuns): number {
  const value = getQueryString(request, 'runs');
  if (value === undefined) {
    return defaultRuns;
  }
  const runs = parseQueryNumber('runs', value);
  if (!Number.isInteger(runs) || runs < 0) {
    throw new InputValidationError('runs', 'runs must be a non-negative whole number.');
  }
  const { monteCarloMaxRuns } = loadConfig();
  if (runs > monteCarloMaxRuns) {
    warn('Capping Monte Carlo runs', { requested: runs, max: monteCarloMaxRuns });
    return monteCarloMaxRuns;
  }
  return runs;
}

/**
 * Extracts an optional integer seed from the query
 */
export function getSeed(request: Request): number | null {
  const value = getQueryString(request, 'seed');
  if (value === undefined) {
    return null;
  }
  const seed = parseQueryNumber('seed', value);
  if (!Number.isInteger(seed)) {
    throw new InputValidationError('seed', 'seed must be a whole number.');
  }
  return seed;
}

/**
 * Extracts the input to shift for a sensitivity run
 */
export function getSensitivityVariable(request: Request): SensitivityVariable {
  const value = getQueryString(request, 'variable');
  if (value === undefined) {
    throw new InputValidationError('variable', 'variable is required.');
  }
  if (!isSensitivityVariable(value)) {
    throw new InputValidationError('variable', `${value} is not a numeric plan input.`);
  }
  return value;
}

/**
 * Extracts the sensitivity delta from the query
 */
export function getDelta(request: Request): number {
  const value = getQueryString(request, 'delta');
  if (value === undefined) {
    throw new InputValidationError('delta', 'delta is required.');
  }
  return parseQueryNumber('delta', value);
}

/**
 * Extracts sweep deltas from a comma-separated query string
 * @param defaultDeltas - Deltas to use if none specified
 */
export function getDeltas(request: Request, defaultDeltas: number[] = DEFAULT_SWEEP_DELTAS): number[] {
  const value = getQueryString(request, 'deltas');
  if (value === undefined) {
    return defaultDeltas;
  }
  return value
    .split(',')
    .filter((part) => part.trim() !== '')
    .map((part) => parseQueryNumber('deltas', part.trim()));
}

/**
 * Reads a schedule string from a text body, or from `schedule` in a JSON body
 */
export function getScheduleText(request: Request): string {
  const body: unknown = request.body;
  if (typeof body === 'string') {
    return body;
  }
  if (typeof body === 'object' && body !== null && 'schedule' in body && typeof body.schedule === 'string') {
    return body.schedule;
  }
  throw new InputValidationError('schedule', 'schedule text is required.');
}
