import { writeToString } from 'fast-csv';
import { Projection } from '../projection/types';

export type ProjectionCsvRow = {
  Age: number;
  Salary: number;
  Income: number;
  Expenses: number;
  'Net Worth': number;
};

function toCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function projectionRows(projection: Projection): ProjectionCsvRow[] {
  return projection.ages.map((age, i) => ({
    Age: age,
    Salary: toCents(projection.salary[i]),
    Income: toCents(projection.income[i]),
    Expenses: toCents(projection.expenses[i]),
    'Net Worth': toCents(projection.netWorth[i]),
  }));
}

/**
 * One CSV row per age with a header line. Amounts are rounded to cents.
 */
export async function projectionToCsv(projection: Projection): Promise<string> {
  return writeToString(projectionRows(projection), { headers: true, includeEndRowDelimiter: true });
}
