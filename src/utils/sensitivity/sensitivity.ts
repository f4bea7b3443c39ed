import { PlanInputs, Projection } from '../projection/types';
import { project } from '../projection/engine';

export const SENSITIVITY_VARIABLES = [
  'startingFund',
  'startingSalary',
  'normalizedSalaryCap',
  'savingRate',
  'savingsGrowth',
  'retirementGrowth',
  'raiseRate',
  'emergencyFund',
  'retirementSpend',
  'extraExpense',
  'retirementTax',
  'inflation',
  'comfortableWithdrawalRate',
  'extraYearsOfWork',
  'minRetirementAge',
] as const satisfies readonly (keyof PlanInputs)[];

export type SensitivityVariable = (typeof SENSITIVITY_VARIABLES)[number];

export const DEFAULT_SWEEP_DELTAS = [-5, -4, -3, -2, -1, 0, 1, 2, 3, 4, 5];

export interface SensitivityResult {
  variable: SensitivityVariable;
  delta: number;
  base: Projection;
  modified: Projection;
  retirementAgeChange: number;
}

export interface SweepRow {
  delta: number;
  adjustedRate: number;
  retirementAge: number;
  finalNetWorth: number;
}

export function isSensitivityVariable(value: string): value is SensitivityVariable {
  return SENSITIVITY_VARIABLES.some((variable) => variable === value);
}

/**
 * Projects the plan with one numeric input shifted by `delta`.
 */
export function sensitivity(inputs: PlanInputs, variable: SensitivityVariable, delta: number): Projection {
  return project({ ...inputs, [variable]: inputs[variable] + delta });
}

/**
 * Projects the plan as given and with `variable` shifted, for side-by-side comparison.
 */
export function compareSensitivity(
  inputs: PlanInputs,
  variable: SensitivityVariable,
  delta: number,
): SensitivityResult {
  const base = project(inputs);
  const modified = sensitivity(inputs, variable, delta);
  return {
    variable,
    delta,
    base,
    modified,
    retirementAgeChange: modified.retirementAge - base.retirementAge,
  };
}

function clampRate(rate: number): number {
  return Math.min(100, Math.max(0, rate));
}

/**
 * Shifts the default saving rate and every scheduled rate by `delta`, clamped to 0–100.
 */
export function adjustSavingRates(inputs: PlanInputs, delta: number): PlanInputs {
  return {
    ...inputs,
    savingRate: clampRate(inputs.savingRate + delta),
    variableSavingRates: inputs.variableSavingRates.map((entry) => ({
      ...entry,
      rate: clampRate(entry.rate + delta),
    })),
  };
}

/**
 * One row per delta: the adjusted default saving rate, the retirement age it leads to
 * and the net worth left at the final age.
 */
export function savingRateSweep(inputs: PlanInputs, deltas: number[] = DEFAULT_SWEEP_DELTAS): SweepRow[] {
  return deltas.map((delta) => {
    const adjusted = adjustSavingRates(inputs, delta);
    const projection = project(adjusted);
    return {
      delta,
      adjustedRate: adjusted.savingRate,
      retirementAge: projection.retirementAge,
      finalNetWorth: projection.netWorth.length > 0 ? projection.netWorth[projection.netWorth.length - 1] : 0,
    };
  });
}
