import { parse as parseSync } from 'csv-parse/sync';
import { SalaryUpgrade, SalaryUpgradeKind, SavingsRateEntry } from '../projection/types';
import { debug } from '../logger';

const SEGMENT_DELIMITER = ';';
const FIELD_DELIMITER = ',';

/**
 * Splits schedule text into trimmed field lists, one per `;` segment.
 * Quoting is disabled so a stray quote only spoils its own segment.
 */
function splitSegments(text: string): string[][] {
  if (!text.trim()) {
    return [];
  }
  const records: string[][] = parseSync(text, {
    delimiter: FIELD_DELIMITER,
    record_delimiter: SEGMENT_DELIMITER,
    quote: false,
    trim: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  return records;
}

function parseAge(field: string): number | null {
  if (!/^[+-]?\d+$/.test(field)) {
    return null;
  }
  return Number(field);
}

// Decimal or exponent notation only
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseNumber(field: string): number | null {
  if (!DECIMAL_PATTERN.test(field)) {
    return null;
  }
  const value = Number(field);
  return Number.isFinite(value) ? value : null;
}

function parseKind(field: string): SalaryUpgradeKind | null {
  switch (field.toLowerCase()) {
    case SalaryUpgradeKind.RAISE:
      return SalaryUpgradeKind.RAISE;
    case SalaryUpgradeKind.ABSOLUTE:
      return SalaryUpgradeKind.ABSOLUTE;
    default:
      return null;
  }
}

/**
 * Parses salary upgrades written as `age,kind,value;age,kind,value`.
 *
 * Segments with the wrong field count, a non-integer age, an unknown kind or a
 * non-numeric value are dropped; the rest keep their input order, duplicate ages included.
 *
 * @example
 * ```typescript
 * parseSalaryUpgrades('30,raise,10;35,absolute,150000');
 * // [{ age: 30, kind: 'raise', value: 10 }, { age: 35, kind: 'absolute', value: 150000 }]
 * ```
 */
export function parseSalaryUpgrades(text: string): SalaryUpgrade[] {
  const upgrades: SalaryUpgrade[] = [];
  for (const fields of splitSegments(text)) {
    if (fields.length !== 3) {
      debug('Skipping salary upgrade segment', { segment: fields.join(FIELD_DELIMITER) });
      continue;
    }
    const age = parseAge(fields[0]);
    const kind = parseKind(fields[1]);
    const value = parseNumber(fields[2]);
    if (age === null || kind === null || value === null) {
      debug('Skipping salary upgrade segment', { segment: fields.join(FIELD_DELIMITER) });
      continue;
    }
    upgrades.push({ age, kind, value });
  }
  return upgrades;
}

/**
 * Kinds named by otherwise well-shaped salary upgrade segments that are neither
 * `raise` nor `absolute`, in input order.
 */
export function findUnknownSalaryUpgradeKinds(text: string): string[] {
  return splitSegments(text)
    .filter((fields) => fields.length === 3 && parseKind(fields[1]) === null)
    .map((fields) => fields[1]);
}

/**
 * Parses a savings rate schedule written as `age,rate;age,rate`, dropping malformed segments.
 */
export function parseSavingsRates(text: string): SavingsRateEntry[] {
  const rates: SavingsRateEntry[] = [];
  for (const fields of splitSegments(text)) {
    if (fields.length !== 2) {
      debug('Skipping savings rate segment', { segment: fields.join(FIELD_DELIMITER) });
      continue;
    }
    const age = parseAge(fields[0]);
    const rate = parseNumber(fields[1]);
    if (age === null || rate === null) {
      debug('Skipping savings rate segment', { segment: fields.join(FIELD_DELIMITER) });
      continue;
    }
    rates.push({ age, rate });
  }
  return rates;
}

export function serializeSalaryUpgrades(upgrades: SalaryUpgrade[]): string {
  return upgrades
    .map((upgrade) => [upgrade.age, upgrade.kind, upgrade.value].join(FIELD_DELIMITER))
    .join(SEGMENT_DELIMITER);
}

export function serializeSavingsRates(rates: SavingsRateEntry[]): string {
  return rates.map((entry) => [entry.age, entry.rate].join(FIELD_DELIMITER)).join(SEGMENT_DELIMITER);
}

/**
 * Returns the rate attached to the greatest scheduled age at or below `age`, or
 * `defaultRate` when nothing is scheduled yet.
 *
 * Entries are stably sorted by age, so when two entries share an age the one that
 * came later in the input wins.
 */
export function getSavingsRateAtAge(age: number, rates: SavingsRateEntry[], defaultRate: number): number {
  if (rates.length === 0) {
    return defaultRate;
  }

  const sorted = [...rates].sort((a, b) => a.age - b.age);

  let applicableRate = defaultRate;
  for (const entry of sorted) {
    if (entry.age > age) {
      break;
    }
    applicableRate = entry.rate;
  }
  return applicableRate;
}

/**
 * Indexes upgrades by age. A later upgrade at the same age replaces an earlier one.
 */
export function indexSalaryUpgrades(upgrades: SalaryUpgrade[]): Map<number, SalaryUpgrade> {
  const byAge = new Map<number, SalaryUpgrade>();
  for (const upgrade of upgrades) {
    byAge.set(upgrade.age, upgrade);
  }
  return byAge;
}
