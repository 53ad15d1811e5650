import type { ForecastTable } from '../forecast/types';
import type { RegressionFit } from '../regression/types';
import type { DiffSeries, MonthYearMatrix } from '../seasonal/aggregator';
import { formatMonth, toEpochDays } from '../series/calendar';
import type { SeriesTable } from '../types/series';

export interface ForecastChartPoint {
  t: number;                 // ms since epoch
  yhat: number;
  band: [number, number];    // [yhat_lower, yhat_upper]
}

export interface ObservedPoint {
  t: number;
  y: number;
  label: string;             // "yyyy-MM"
}

export interface RegressionChartPoint {
  t: number;
  y: number;
  fit: number;
}

export type MonthYearChartRow = { month: number } & Record<string, number | null>;

export interface DiffChartPoint {
  t: number;
  diff: number | null;
}

export function buildObservedPoints(series: SeriesTable): ObservedPoint[] {
  return series.map((row) => ({ t: row.ts.getTime(), y: row.y, label: formatMonth(row.ts) }));
}

export function buildForecastChartData(forecast: ForecastTable): ForecastChartPoint[] {
  return forecast.map((row) => ({
    t: row.ts.getTime(),
    yhat: row.yhat,
    band: [row.yhat_lower, row.yhat_upper],
  }));
}

/** Rows inside the fit's domain with the fitted value at each stamp. */
export function buildRegressionChartData(series: SeriesTable, fit: RegressionFit): RegressionChartPoint[] {
  const lo = fit.domain_start.getTime();
  const hi = fit.domain_end.getTime();
  return series
    .filter((row) => row.ts.getTime() >= lo && row.ts.getTime() <= hi)
    .map((row) => ({
      t: row.ts.getTime(),
      y: row.y,
      fit: fit.intercept + fit.slope * toEpochDays(row.ts),
    }));
}

/** Twelve rows (months 1..12), one key per year. */
export function buildMonthYearChartData(matrix: MonthYearMatrix): MonthYearChartRow[] {
  return matrix.cells.map((monthRow, i) => {
    const row: MonthYearChartRow = { month: i + 1 };
    matrix.years.forEach((year, col) => {
      row[String(year)] = monthRow[col];
    });
    return row;
  });
}

export function buildDiffChartData(series: SeriesTable, diffs: DiffSeries): DiffChartPoint[] {
  return series.map((row, i) => ({ t: row.ts.getTime(), diff: diffs[i] ?? null }));
}
