import { PlanInputs, Projection, RetirementMode, SalaryUpgradeKind } from './types';
import { getSavingsRateAtAge, indexSalaryUpgrades } from '../schedule/schedule';

// Floor for (1 - retirementTax / 100); a tax of 100% or more would otherwise divide by zero
export const MIN_TAX_DIVISOR = 0.01;

// The extra retirement expense is quoted as a 5-year amount
const EXTRA_EXPENSE_YEARS = 5;

function growth(ratePercent: number): number {
  return 1 + ratePercent / 100;
}

/**
 * Builds the inclusive list of ages from `startingAge` to `finalAge`.
 */
export function buildAges(startingAge: number, finalAge: number): number[] {
  const years = Math.max(0, finalAge - startingAge + 1);
  return Array.from({ length: years }, (_, i) => startingAge + i);
}

/**
 * Walks salary year by year. The first year is the starting salary as given; later
 * years take either the scheduled upgrade for that age or the default raise, then
 * the inflation-adjusted cap when one is set.
 */
export function projectSalaries(inputs: PlanInputs, ages: number[]): number[] {
  const upgrades = indexSalaryUpgrades(inputs.salaryUpgrades);
  const salary: number[] = [];

  let currentSalary = inputs.startingSalary;
  ages.forEach((age, i) => {
    if (i > 0) {
      const upgrade = upgrades.get(age);
      if (!upgrade) {
        currentSalary *= growth(inputs.raiseRate);
      } else if (upgrade.kind === SalaryUpgradeKind.RAISE) {
        currentSalary *= growth(upgrade.value);
      } else {
        currentSalary = upgrade.value;
      }

      if (inputs.normalizedSalaryCap > 0) {
        const inflatedCap = inputs.normalizedSalaryCap * Math.pow(growth(inputs.inflation), age - inputs.startingAge);
        currentSalary = Math.min(currentSalary, Math.max(inputs.normalizedSalaryCap, inflatedCap));
      }
    }
    salary.push(currentSalary);
  });

  return salary;
}

type WorkingYear = {
  netWorth: number;
  expenses: number;
};

/**
 * One working year: grow last year's net worth, add savings on last year's salary,
 * and pay the emergency expenditure out of it.
 */
function workingYear(inputs: PlanInputs, age: number, previousNetWorth: number, salaryBase: number): WorkingYear {
  const rate = getSavingsRateAtAge(age, inputs.variableSavingRates, inputs.savingRate);
  const savings = (salaryBase * rate) / 100;
  const emergency = (salaryBase * inputs.emergencyFund) / 100;
  return {
    netWorth: previousNetWorth * growth(inputs.savingsGrowth) + savings - emergency,
    expenses: salaryBase - savings,
  };
}

/**
 * Target retirement spending expressed in the dollars of `age`.
 */
function inflatedRetirementSpend(inputs: PlanInputs, age: number): number {
  return inputs.retirementSpend * Math.pow(growth(inputs.inflation), age - inputs.startingAge);
}

/**
 * Picks the retirement age from the financial readiness age and the retirement mode.
 * Never returns an age past `finalAge`.
 */
export function determineRetirementAge(inputs: PlanInputs, financialReadyAge: number | null): number {
  const baseAge = financialReadyAge ?? inputs.finalAge;

  if (inputs.retirementMode === RetirementMode.MINIMUM_RETIREMENT_AGE) {
    return Math.min(Math.max(baseAge, inputs.minRetirementAge), inputs.finalAge);
  }
  return Math.min(baseAge + inputs.extraYearsOfWork, inputs.finalAge);
}

/**
 * Runs a deterministic projection of salary, income, expenses and net worth.
 *
 * The first pass applies working-year economics through `finalAge` to find the
 * first age at which the comfortable withdrawal rate covers inflated retirement
 * spending. The retirement age follows from that and the retirement mode, and a
 * second pass replaces everything from year 1 on with working years before the
 * retirement age and withdrawal years from it.
 *
 * A retirement age equal to `finalAge` means the plan never retires: every year is
 * a working year and the average withdrawal rate is 0.
 *
 * @param inputs - Validated plan inputs, never mutated
 * @returns A fresh projection
 */
export function project(inputs: PlanInputs): Projection {
  const ages = buildAges(inputs.startingAge, inputs.finalAge);
  const years = ages.length;

  if (years === 0) {
    return {
      ages,
      salary: [],
      income: [],
      expenses: [],
      netWorth: [],
      financialReadyAge: null,
      retirementAge: inputs.startingAge,
      yearsToRetirement: 0,
      avgWithdrawalRate: 0,
    };
  }

  const salary = projectSalaries(inputs, ages);
  const income = [...salary];
  const netWorth: number[] = new Array(years).fill(0);
  const expenses: number[] = new Array(years).fill(0);

  // Readiness scan. Year 0 already includes the first year's contributions.
  let financialReadyAge: number | null = null;
  let scanNetWorth = inputs.startingFund;
  for (let i = 0; i < years; i++) {
    const age = ages[i];
    const year = workingYear(inputs, age, scanNetWorth, salary[Math.max(0, i - 1)]);
    scanNetWorth = year.netWorth;
    if (i === 0) {
      netWorth[0] = year.netWorth;
      expenses[0] = year.expenses;
    }
    if (
      financialReadyAge === null &&
      (year.netWorth * inputs.comfortableWithdrawalRate) / 100 >= inflatedRetirementSpend(inputs, age)
    ) {
      financialReadyAge = age;
    }
  }

  const retirementAge = determineRetirementAge(inputs, financialReadyAge);
  const yearsToRetirement = retirementAge - inputs.startingAge;
  const retires = retirementAge < inputs.finalAge;

  const inflationFactor = growth(inputs.inflation);
  const taxDivisor = Math.max(1 - inputs.retirementTax / 100, MIN_TAX_DIVISOR);
  const annualExtraExpense = inputs.extraExpense / EXTRA_EXPENSE_YEARS;
  let baseWithdrawal: number | null = null;

  for (let i = 1; i < years; i++) {
    const age = ages[i];

    if (!retires || age < retirementAge) {
      const year = workingYear(inputs, age, netWorth[i - 1], salary[i - 1]);
      netWorth[i] = year.netWorth;
      expenses[i] = year.expenses;
      income[i] = salary[i];
      continue;
    }

    if (baseWithdrawal === null) {
      const portfolioAtRetirement = netWorth[i - 1];
      baseWithdrawal = (portfolioAtRetirement * inputs.comfortableWithdrawalRate) / 100;
    }

    const yearsSinceRetirement = age - retirementAge;
    const retirementInflation = Math.pow(inflationFactor, yearsSinceRetirement);
    const nominalWithdrawal = baseWithdrawal * retirementInflation;
    const withdrawal = Math.min(nominalWithdrawal, inflatedRetirementSpend(inputs, age));
    const extra = annualExtraExpense * retirementInflation;
    const emergency = (withdrawal * inputs.emergencyFund) / 100;

    expenses[i] = withdrawal + extra + emergency;
    const afterTax = expenses[i] / taxDivisor;
    netWorth[i] = netWorth[i - 1] * growth(inputs.retirementGrowth) - afterTax;
    income[i] = afterTax;
  }

  return {
    ages,
    salary,
    income,
    expenses,
    netWorth,
    financialReadyAge,
    retirementAge,
    yearsToRetirement,
    avgWithdrawalRate: retires ? averageWithdrawalRate(expenses, netWorth, yearsToRetirement) : 0,
  };
}

/**
 * Mean annual spending from the retirement year on, as a percent of net worth at the
 * retirement age. 0 when that net worth is not positive.
 */
function averageWithdrawalRate(expenses: number[], netWorth: number[], retirementIndex: number): number {
  const withdrawalYears = expenses.length - retirementIndex;
  const portfolio = netWorth[retirementIndex];
  if (withdrawalYears <= 0 || portfolio <= 0) {
    return 0;
  }
  const totalWithdrawal = expenses.slice(retirementIndex).reduce((sum, amount) => sum + amount, 0);
  return (totalWithdrawal / withdrawalYears / portfolio) * 100;
}
