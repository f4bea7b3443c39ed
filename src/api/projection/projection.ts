import { Request } from 'express';
import { getPlanInputs, getRuns, getSeed } from '../../utils/net/request';
import { project } from '../../utils/projection/engine';
import { toRealDollars } from '../../utils/projection/realDollars';
import { Projection, RealDollarSeries } from '../../utils/projection/types';
import { simulateMonteCarlo } from '../../utils/monteCarlo';
import { projectionToCsv } from '../../utils/export/csv';
import { ReportSection, buildSummarySections, buildTextReport } from '../../utils/export/report';

export type ProjectionResponse = Projection & RealDollarSeries;

/**
 * Projects the plan in the request body, with income and expenses also in real dollars
 */
export function getProjection(req: Request): ProjectionResponse {
  const inputs = getPlanInputs(req);
  const projection = project(inputs);
  return { ...projection, ...toRealDollars(projection, inputs.inflation) };
}

/**
 * The year-by-year table as CSV
 */
export async function getProjectionCsv(req: Request): Promise<string> {
  return projectionToCsv(project(getPlanInputs(req)));
}

/**
 * Plain text export of inputs, outcomes and a Monte Carlo run
 */
export function getProjectionReport(req: Request, generatedAt: Date = new Date()): string {
  const inputs = getPlanInputs(req);
  const monteCarlo = simulateMonteCarlo(inputs, getRuns(req), { seed: getSeed(req) });
  return buildTextReport(inputs, project(inputs), monteCarlo, generatedAt);
}

/**
 * Fixed sections of the printable summary
 */
export function getProjectionSummary(req: Request): ReportSection[] {
  const inputs = getPlanInputs(req);
  const monteCarlo = simulateMonteCarlo(inputs, getRuns(req), { seed: getSeed(req) });
  return buildSummarySections(project(inputs), monteCarlo);
}
