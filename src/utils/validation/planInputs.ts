import { z } from 'zod';
import { PlanInputs, RetirementMode, SalaryUpgradeKind } from '../projection/types';
import { findUnknownSalaryUpgradeKinds, parseSalaryUpgrades, parseSavingsRates } from '../schedule/schedule';
import { InputValidationError } from './errors';

function bounded(label: string, min: number, max: number, unit: string = '%') {
  return z
    .number({ required_error: `${label} is required.`, invalid_type_error: `${label} must be a number.` })
    .min(min, `${label} must be between ${min} and ${max}${unit}.`)
    .max(max, `${label} must be between ${min} and ${max}${unit}.`);
}

function nonNegative(label: string) {
  return z
    .number({ required_error: `${label} is required.`, invalid_type_error: `${label} must be a number.` })
    .min(0, `${label} cannot be negative.`);
}

function wholeYears(label: string) {
  return z
    .number({ required_error: `${label} is required.`, invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be a whole number of years.`);
}

export const SalaryUpgradeSchema = z.object({
  age: wholeYears('Salary upgrade age'),
  kind: z.nativeEnum(SalaryUpgradeKind, {
    errorMap: () => ({ message: "Salary upgrade type must be 'raise' or 'absolute'." }),
  }),
  value: z.number().positive('Salary upgrade value must be positive.'),
});

export const SavingsRateEntrySchema = z.object({
  age: wholeYears('Savings rate age'),
  rate: bounded('Scheduled saving rate', 0, 100),
});

// Schedules arrive either as the text mini-language or as already structured lists
const SalaryUpgradesSchema = z
  .union([z.string(), z.array(z.unknown())])
  .superRefine((value, ctx) => {
    if (typeof value !== 'string') {
      return;
    }
    const [kind] = findUnknownSalaryUpgradeKinds(value);
    if (kind !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Salary upgrade type '${kind}' must be 'raise' or 'absolute'.`,
        fatal: true,
      });
    }
  })
  .transform((value) => (typeof value === 'string' ? parseSalaryUpgrades(value) : value))
  .pipe(z.array(SalaryUpgradeSchema))
  .default([]);

const SavingsRatesSchema = z
  .union([z.string().transform(parseSavingsRates), z.array(z.unknown())])
  .pipe(z.array(SavingsRateEntrySchema))
  .default([]);

export const PlanInputsSchema = z
  .object({
    startingAge: wholeYears('Starting age').min(0, 'Starting age cannot be negative.'),
    finalAge: wholeYears('Final age'),
    startingFund: nonNegative('Starting fund'),
    startingSalary: nonNegative('Starting salary'),
    normalizedSalaryCap: nonNegative('Normalized salary cap').default(0),
    savingRate: bounded('Saving rate', 0, 100),
    savingsGrowth: bounded('Savings growth rate', -10, 20),
    retirementGrowth: bounded('Retirement growth rate', -10, 20),
    raiseRate: nonNegative('Raise rate'),
    emergencyFund: bounded('Emergency fund expenditure', 0, 50).default(0),
    salaryUpgrades: SalaryUpgradesSchema,
    variableSavingRates: SavingsRatesSchema,
    retirementSpend: z
      .number({
        required_error: 'Retirement spend is required.',
        invalid_type_error: 'Retirement spend must be a number.',
      })
      .positive('Retirement spend must be positive.'),
    extraExpense: nonNegative('Extra expense').default(0),
    retirementTax: bounded('Retirement tax rate', 0, 50).default(0),
    inflation: bounded('Inflation rate', 0, 10),
    comfortableWithdrawalRate: bounded('Comfortable withdrawal rate', 2, 10),
    retirementMode: z
      .nativeEnum(RetirementMode, {
        errorMap: () => ({
          message: `Retirement mode must be '${RetirementMode.EXTRA_YEARS_OF_WORK}' or '${RetirementMode.MINIMUM_RETIREMENT_AGE}'.`,
        }),
      })
      .default(RetirementMode.EXTRA_YEARS_OF_WORK),
    extraYearsOfWork: wholeYears('Extra years of work').min(0, 'Extra years of work cannot be negative.').default(0),
    minRetirementAge: wholeYears('Minimum retirement age').nullish(),
  })
  .superRefine((value, ctx) => {
    if (value.startingAge >= value.finalAge) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['finalAge'],
        message: 'Starting age must be less than final age.',
      });
    }
    if (value.minRetirementAge != null && value.minRetirementAge < value.startingAge) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minRetirementAge'],
        message: 'Minimum retirement age cannot be before the starting age.',
      });
    }
    value.salaryUpgrades.forEach((upgrade, i) => {
      if (upgrade.age < value.startingAge || upgrade.age > value.finalAge) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['salaryUpgrades', i, 'age'],
          message: `Salary upgrade age ${upgrade.age} must be between starting age and final age.`,
        });
      }
    });
  })
  .transform(
    (value): PlanInputs => ({
      ...value,
      minRetirementAge: value.minRetirementAge ?? value.startingAge,
    }),
  );

/**
 * Validates an untrusted request body and returns plan inputs ready for simulation.
 *
 * @throws InputValidationError naming the first offending field
 */
export function validatePlanInputs(body: unknown): PlanInputs {
  const result = PlanInputsSchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new InputValidationError(field, issue.message);
  }
  return result.data;
}
