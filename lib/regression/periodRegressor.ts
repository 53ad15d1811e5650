import { PipelineError } from '../errors';
import { formatDay, toEpochDays } from '../series/calendar';
import type { RegressionWindow, SeriesTable } from '../types/series';
import { DAYS_PER_MONTH, DAYS_PER_YEAR, type RegressionFit } from './types';

export interface OlsSums {
  n: number;
  xMean: number;
  yMean: number;
  sxx: number;
  sxy: number;
  syy: number;
}

/** Centered sums for a simple regression of y on x. */
export function olsSums(xs: readonly number[], ys: readonly number[]): OlsSums {
  const n = xs.length;
  const xMean = xs.reduce((s, v) => s + v, 0) / n;
  const yMean = ys.reduce((s, v) => s + v, 0) / n;
  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    const dy = ys[i] - yMean;
    sxx += dx * dx;
    sxy += dx * dy;
    syy += dy * dy;
  }
  return { n, xMean, yMean, sxx, sxy, syy };
}

export function selectWindow(table: SeriesTable, window: RegressionWindow): SeriesTable {
  const lo = window.lo.getTime();
  const hi = window.hi.getTime();
  return table.filter((row) => row.ts.getTime() >= lo && row.ts.getTime() <= hi);
}

/**
 * Ordinary least squares of y on days since 1970-01-01 over the rows with
 * lo <= ts <= hi. Slope is ppm/day; per-month and per-year rescalings are
 * reported alongside.
 */
export function fitPeriod(table: SeriesTable, window: RegressionWindow): RegressionFit {
  const label = `[${formatDay(window.lo)}, ${formatDay(window.hi)}]`;
  const subset = selectWindow(table, window);
  if (subset.length === 0) {
    throw new PipelineError('EmptySubset', 'period-regressor', `Window ${label} selects no rows`);
  }
  if (subset.length < 2) {
    throw new PipelineError('DegenerateFit', 'period-regressor', `Window ${label} selects 1 row; need at least 2`);
  }

  const { xMean, yMean, sxx, sxy } = olsSums(
    subset.map((row) => toEpochDays(row.ts)),
    subset.map((row) => row.y)
  );
  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  return {
    slope,
    intercept,
    n: subset.length,
    domain_start: subset[0].ts,
    domain_end: subset[subset.length - 1].ts,
    slopePerMonth: slope * DAYS_PER_MONTH,
    slopePerYear: slope * DAYS_PER_YEAR,
  };
}

/** late.slope / early.slope; > 1 means the rise is accelerating. */
export function slopeRatio(early: RegressionFit, late: RegressionFit): number {
  return late.slope / early.slope;
}
