export enum RetirementMode {
  EXTRA_YEARS_OF_WORK = 'Extra Years of Work',
  MINIMUM_RETIREMENT_AGE = 'Minimum Retirement Age',
}

export enum SalaryUpgradeKind {
  RAISE = 'raise',
  ABSOLUTE = 'absolute',
}

export interface SalaryUpgrade {
  age: number;
  kind: SalaryUpgradeKind;
  // Percent for a raise, dollars for an absolute reset
  value: number;
}

export interface SavingsRateEntry {
  age: number;
  rate: number;
}

/**
 * Everything a single projection needs. All rates are in percent units (7 means 7%).
 */
export interface PlanInputs {
  startingAge: number;
  finalAge: number;
  startingFund: number;
  startingSalary: number;
  normalizedSalaryCap: number; // 0 disables the cap
  savingRate: number;
  savingsGrowth: number;
  retirementGrowth: number;
  raiseRate: number;
  emergencyFund: number;
  salaryUpgrades: SalaryUpgrade[];
  variableSavingRates: SavingsRateEntry[];
  retirementSpend: number; // in starting-age dollars
  extraExpense: number; // 5-year amount spread over every retirement year
  retirementTax: number;
  inflation: number;
  comfortableWithdrawalRate: number;
  retirementMode: RetirementMode;
  extraYearsOfWork: number;
  minRetirementAge: number;
}

export interface Projection {
  ages: number[];
  salary: number[];
  income: number[];
  expenses: number[];
  netWorth: number[];
  financialReadyAge: number | null;
  retirementAge: number;
  yearsToRetirement: number;
  avgWithdrawalRate: number;
}

export interface RealDollarSeries {
  incomeReal: number[];
  expensesReal: number[];
}
