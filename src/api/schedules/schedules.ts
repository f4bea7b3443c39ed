import { Request } from 'express';
import { getScheduleText } from '../../utils/net/request';
import { parseSalaryUpgrades, parseSavingsRates } from '../../utils/schedule/schedule';
import { SalaryUpgrade, SavingsRateEntry } from '../../utils/projection/types';

export function getSalaryUpgrades(req: Request): SalaryUpgrade[] {
  return parseSalaryUpgrades(getScheduleText(req));
}

export function getSavingsRates(req: Request): SavingsRateEntry[] {
  return parseSavingsRates(getScheduleText(req));
}
