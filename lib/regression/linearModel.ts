import { PipelineError } from '../errors';
import { toEpochDays } from '../series/calendar';
import { fUpperTail, studentTTwoSided } from '../stats/distributions';
import type { SeriesTable } from '../types/series';
import { olsSums } from './periodRegressor';
import { DAYS_PER_YEAR, type CoefficientRow, type LinearModelSummary } from './types';

function coefficient(estimate: number, stdError: number, df: number): CoefficientRow {
  const tValue = estimate / stdError;
  return { estimate, stdError, tValue, pValue: studentTTwoSided(tValue, df) };
}

/**
 * Full-series fit of y ~ days since 1970-01-01 with the usual diagnostics:
 * coefficient table, residual standard error, R², adjusted R² and the
 * overall F test.
 */
export function fitLinearModel(table: SeriesTable): LinearModelSummary {
  const n = table.length;
  if (n < 3) {
    throw new PipelineError('DegenerateFit', 'period-regressor', `Linear model needs at least 3 rows, got ${n}`);
  }

  const { xMean, yMean, sxx, sxy, syy } = olsSums(
    table.map((row) => toEpochDays(row.ts)),
    table.map((row) => row.y)
  );
  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  const df = n - 2;
  let rss = 0;
  for (const row of table) {
    const residual = row.y - (intercept + slope * toEpochDays(row.ts));
    rss += residual * residual;
  }
  const sigma = Math.sqrt(rss / df);
  const rSquared = syy > 0 ? 1 - rss / syy : 0;
  const adjRSquared = 1 - ((1 - rSquared) * (n - 1)) / df;
  const fStatistic = (syy - rss) / (rss / df);

  return {
    n,
    intercept: coefficient(intercept, sigma * Math.sqrt(1 / n + (xMean * xMean) / sxx), df),
    slope: coefficient(slope, sigma / Math.sqrt(sxx), df),
    residualStdError: sigma,
    df,
    rSquared,
    adjRSquared,
    fStatistic,
    fPValue: fUpperTail(fStatistic, 1, df),
    slopePerYear: slope * DAYS_PER_YEAR,
  };
}
