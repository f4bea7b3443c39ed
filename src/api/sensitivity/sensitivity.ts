import { Request } from 'express';
import { getDelta, getDeltas, getPlanInputs, getSensitivityVariable } from '../../utils/net/request';
import { SensitivityResult, SweepRow, compareSensitivity, savingRateSweep } from '../../utils/sensitivity/sensitivity';

/**
 * Projects the plan with and without one input shifted
 */
export function getSensitivity(req: Request): SensitivityResult {
  const inputs = getPlanInputs(req);
  return compareSensitivity(inputs, getSensitivityVariable(req), getDelta(req));
}

/**
 * Retirement age and final net worth across a range of saving rate shifts
 */
export function getSavingRateSweep(req: Request): SweepRow[] {
  const inputs = getPlanInputs(req);
  return savingRateSweep(inputs, getDeltas(req));
}
