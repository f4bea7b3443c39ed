import { describe, it, expect, vi } from 'vitest';
import { validatePlanInputs } from './planInputs';
import { InputValidationError } from './errors';
import { RetirementMode, SalaryUpgradeKind } from '../projection/types';
import { createPlanBody, createPlanInputs } from '../test/mockData';

vi.mock('../logger');

function validationErrorFor(body: unknown): InputValidationError {
  try {
    validatePlanInputs(body);
  } catch (error) {
    if (error instanceof InputValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected validation to fail');
}

describe('validatePlanInputs', () => {
  it('should fill in defaults for optional inputs', () => {
    expect(validatePlanInputs(createPlanBody())).toEqual(createPlanInputs());
  });

  it('should parse schedules written as text', () => {
    const inputs = validatePlanInputs(
      createPlanBody({ salaryUpgrades: '35,raise,10;bad', variableSavingRates: '40,30' }),
    );

    expect(inputs.salaryUpgrades).toEqual([{ age: 35, kind: SalaryUpgradeKind.RAISE, value: 10 }]);
    expect(inputs.variableSavingRates).toEqual([{ age: 40, rate: 30 }]);
  });

  it('should accept structured schedules', () => {
    const inputs = validatePlanInputs(
      createPlanBody({ salaryUpgrades: [{ age: 35, kind: 'absolute', value: 120000 }] }),
    );

    expect(inputs.salaryUpgrades).toEqual([{ age: 35, kind: SalaryUpgradeKind.ABSOLUTE, value: 120000 }]);
  });

  it('should keep an explicit minimum retirement age and mode', () => {
    const inputs = validatePlanInputs(
      createPlanBody({ retirementMode: 'Minimum Retirement Age', minRetirementAge: 55 }),
    );

    expect(inputs.retirementMode).toBe(RetirementMode.MINIMUM_RETIREMENT_AGE);
    expect(inputs.minRetirementAge).toBe(55);
  });

  it('should name a missing field', () => {
    const body = createPlanBody();
    delete body.startingAge;

    const error = validationErrorFor(body);

    expect(error.field).toBe('startingAge');
    expect(error.message).toBe('Starting age is required.');
  });

  it('should reject a saving rate above 100%', () => {
    const error = validationErrorFor(createPlanBody({ savingRate: 120 }));

    expect(error.field).toBe('savingRate');
    expect(error.message).toBe('Saving rate must be between 0 and 100%.');
  });

  it('should reject a withdrawal rate outside 2-10%', () => {
    const error = validationErrorFor(createPlanBody({ comfortableWithdrawalRate: 1 }));

    expect(error.field).toBe('comfortableWithdrawalRate');
    expect(error.message).toBe('Comfortable withdrawal rate must be between 2 and 10%.');
  });

  it('should reject a non-numeric value', () => {
    const error = validationErrorFor(createPlanBody({ inflation: '2' }));

    expect(error.field).toBe('inflation');
    expect(error.message).toBe('Inflation rate must be a number.');
  });

  it('should reject a starting age at or past the final age', () => {
    const error = validationErrorFor(createPlanBody({ startingAge: 90, finalAge: 90 }));

    expect(error.field).toBe('finalAge');
    expect(error.message).toBe('Starting age must be less than final age.');
  });

  it('should reject a minimum retirement age before the starting age', () => {
    const error = validationErrorFor(createPlanBody({ minRetirementAge: 25 }));

    expect(error.field).toBe('minRetirementAge');
  });

  it('should reject a salary upgrade outside the plan', () => {
    const error = validationErrorFor(createPlanBody({ salaryUpgrades: '95,raise,10' }));

    expect(error.field).toBe('salaryUpgrades.0.age');
    expect(error.message).toBe('Salary upgrade age 95 must be between starting age and final age.');
  });

  it('should name an unknown salary upgrade type in text', () => {
    const error = validationErrorFor(createPlanBody({ salaryUpgrades: '35,raise,10;40,bonus,5' }));

    expect(error.field).toBe('salaryUpgrades');
    expect(error.message).toBe("Salary upgrade type 'bonus' must be 'raise' or 'absolute'.");
  });

  it('should reject a non-positive salary upgrade value', () => {
    const error = validationErrorFor(createPlanBody({ salaryUpgrades: [{ age: 35, kind: 'raise', value: -5 }] }));

    expect(error.field).toBe('salaryUpgrades.0.value');
    expect(error.message).toBe('Salary upgrade value must be positive.');
  });

  it('should reject an unknown retirement mode', () => {
    const error = validationErrorFor(createPlanBody({ retirementMode: 'Whenever' }));

    expect(error.field).toBe('retirementMode');
  });

  it('should report the body itself when it is not an object', () => {
    expect(validationErrorFor(null).field).toBe('body');
  });
});
