import { describe, it, expect, vi } from 'vitest';
import { getSalaryUpgrades, getSavingsRates } from './schedules';
import { SalaryUpgradeKind } from '../../utils/projection/types';
import { createMockRequest } from '../../utils/test/mockData';

vi.mock('../../utils/logger');

describe('Schedules API', () => {
  it('should parse salary upgrades from a text body', () => {
    expect(getSalaryUpgrades(createMockRequest({ body: '30,raise,10;35,absolute,150000' }))).toEqual([
      { age: 30, kind: SalaryUpgradeKind.RAISE, value: 10 },
      { age: 35, kind: SalaryUpgradeKind.ABSOLUTE, value: 150000 },
    ]);
  });

  it('should parse savings rates from a JSON body', () => {
    expect(getSavingsRates(createMockRequest({ body: { schedule: 'bad;40,30' } }))).toEqual([{ age: 40, rate: 30 }]);
  });
});
