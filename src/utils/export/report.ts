import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { PlanInputs, Projection } from '../projection/types';
import { MonteCarloResult } from '../monteCarlo/types';
import { serializeSalaryUpgrades, serializeSavingsRates } from '../schedule/schedule';
import { totalInflationFactor } from '../projection/realDollars';

dayjs.extend(utc);

export const REPORT_TITLE = 'Retirement Calculator Simulation Export';

export const REPORT_NOTES = [
  'This simulation assumes no social security or pension income',
  'All amounts are in current dollars',
  'Monte Carlo simulation includes random variations in growth rates and inflation',
];

export interface ReportSection {
  title: string;
  lines: string[];
}

export function formatNumber(value: number, fractionDigits: number = 2): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

export function formatCurrency(value: number): string {
  return `$${formatNumber(value, 0)}`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function finalNetWorth(projection: Projection): number {
  return projection.netWorth.length > 0 ? projection.netWorth[projection.netWorth.length - 1] : 0;
}

function inputLines(inputs: PlanInputs): string[] {
  const { salaryUpgrades, variableSavingRates, retirementMode, ...numericInputs } = inputs;
  return [
    ...Object.entries(numericInputs).map(([key, value]) => `  ${key}: ${formatNumber(value)}`),
    `  retirementMode: ${retirementMode}`,
    `  salaryUpgrades: ${serializeSalaryUpgrades(salaryUpgrades)}`,
    `  variableSavingRates: ${serializeSavingsRates(variableSavingRates)}`,
  ];
}

function monteCarloLines(monteCarlo: MonteCarloResult): string[] {
  return [
    `Success Rate: ${formatPercent(monteCarlo.successRate)}`,
    `Median Net Worth at Death: ${formatCurrency(monteCarlo.medianNetWorth)}`,
    `10th Percentile Net Worth at Death: ${formatCurrency(monteCarlo.percentile10NetWorth)}`,
  ];
}

/**
 * The fixed sections of the printable summary: key metrics, Monte Carlo results and notes.
 */
export function buildSummarySections(projection: Projection, monteCarlo: MonteCarloResult): ReportSection[] {
  return [
    {
      title: 'Key Metrics',
      lines: [
        `Retirement Age: ${projection.retirementAge} years`,
        `Years to Retirement: ${projection.yearsToRetirement} years`,
        `Average Withdrawal Rate: ${projection.avgWithdrawalRate.toFixed(2)}%`,
        `Monte Carlo Success Rate: ${formatPercent(monteCarlo.successRate)}`,
      ],
    },
    { title: 'Monte Carlo Simulation Results', lines: monteCarloLines(monteCarlo) },
    { title: 'Notes', lines: REPORT_NOTES.map((note) => `- ${note}`) },
  ];
}

/**
 * Renders inputs, projected outcomes, Monte Carlo results and notes as a plain text report.
 *
 * @param generatedAt - Timestamp printed in the header, in UTC
 */
export function buildTextReport(
  inputs: PlanInputs,
  projection: Projection,
  monteCarlo: MonteCarloResult,
  generatedAt: Date,
): string {
  const lines: string[] = [
    REPORT_TITLE,
    '='.repeat(50),
    `Generated: ${dayjs.utc(generatedAt).format('YYYY-MM-DD HH:mm')} UTC`,
    '',
    'INPUT ASSUMPTIONS:',
    '-'.repeat(20),
    ...inputLines(inputs),
    '',
    '',
    'PROJECTED OUTCOMES:',
    '-'.repeat(20),
    `  retirementAge: ${projection.retirementAge}`,
    `  yearsToRetirement: ${projection.yearsToRetirement}`,
    `  financialReadyAge: ${projection.financialReadyAge ?? 'never'}`,
    `  avgWithdrawalRate: ${formatNumber(projection.avgWithdrawalRate)}`,
    `  finalNetWorth: ${formatNumber(finalNetWorth(projection))}`,
    `  totalInflationFactor: ${formatNumber(totalInflationFactor(inputs))}`,
    '',
    '',
    'MONTE CARLO SIMULATION RESULTS:',
    '-'.repeat(30),
    ...monteCarloLines(monteCarlo).map((line) => `  ${line}`),
    '',
    '',
    'NOTES:',
    '-'.repeat(6),
    ...REPORT_NOTES.map((note) => `- ${note}`),
  ];
  return lines.join('\n') + '\n';
}
