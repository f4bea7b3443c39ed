import { PlanInputs, Projection, RealDollarSeries } from './types';

/**
 * Converts nominal income and expenses to real dollars.
 *
 * Working years are deflated from the starting age. Retirement years are deflated
 * from the retirement age, so the first withdrawal year reads in retirement-day dollars.
 *
 * @param projection - Projection to convert
 * @param inflation - Annual inflation in percent
 */
export function toRealDollars(projection: Projection, inflation: number): RealDollarSeries {
  const factor = 1 + inflation / 100;
  const { ages, income, expenses, retirementAge } = projection;

  const cumulativeInflation: number[] = [];
  ages.forEach((age, i) => {
    if (i === 0) {
      cumulativeInflation.push(1);
    } else if (age < retirementAge) {
      cumulativeInflation.push(cumulativeInflation[i - 1] * factor);
    } else {
      cumulativeInflation.push(Math.pow(factor, age - retirementAge));
    }
  });

  return {
    incomeReal: income.map((value, i) => value / cumulativeInflation[i]),
    expensesReal: expenses.map((value, i) => value / cumulativeInflation[i]),
  };
}

/**
 * What one starting-age dollar is worth in nominal terms at the final age.
 */
export function totalInflationFactor(inputs: PlanInputs): number {
  return Math.pow(1 + inputs.inflation / 100, inputs.finalAge - inputs.startingAge);
}

/**
 * Deflates terminal net worths back to starting-age dollars.
 */
export function netWorthsInRealDollars(values: number[], inputs: PlanInputs): number[] {
  const factor = totalInflationFactor(inputs);
  return values.map((value) => value / factor);
}
