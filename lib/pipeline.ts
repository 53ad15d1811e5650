import { runForecast } from './forecast/driver';
import type { DecomposableForecaster, ForecastTable } from './forecast/types';
import { fitLinearModel } from './regression/linearModel';
import { fitPeriod, slopeRatio } from './regression/periodRegressor';
import type { LinearModelSummary, RegressionFit } from './regression/types';
import { buildMonthYearMatrix, computeDiffs, type DiffSeries, type MonthYearMatrix } from './seasonal/aggregator';
import { buildHorizon } from './series/horizon';
import { buildSeriesTable } from './series/loader';
import { summarize, type SummaryStats } from './summary/reporter';
import { runStage } from './errors';
import type { HorizonSpec, MonthlySeriesInput, RegressionWindow, SeriesTable } from './types/series';

export interface PipelineOptions {
  horizon: HorizonSpec;
  windows: {
    early: RegressionWindow;
    late: RegressionWindow;
  };
}

export interface PipelineResult {
  name: string;
  unit: string;
  description?: string;
  series: SeriesTable;
  timestamps: Date[];
  forecast: ForecastTable;
  regressions: {
    early: RegressionFit;
    late: RegressionFit;
    ratio: number;
  };
  linearModel: LinearModelSummary;
  matrix: MonthYearMatrix;
  diffs: DiffSeries;
  summaries: {
    historical: SummaryStats;
    forecast: SummaryStats;
  };
}

/**
 * Load → horizon → forecast, two window regressions plus the full-series
 * model, month-year matrix, first differences and summaries. Synchronous and
 * fail-fast.
 */
export function runCo2Pipeline<M>(
  input: MonthlySeriesInput,
  options: PipelineOptions,
  forecaster: DecomposableForecaster<M>
): PipelineResult {
  const series = runStage('series-loader', 'series-loader', () => buildSeriesTable(input));
  const timestamps = runStage('horizon-builder', 'horizon-builder', () => buildHorizon(series, options.horizon));
  const forecast = runStage('forecast-driver', `forecast-driver (${forecaster.name})`, () => runForecast(forecaster, series, timestamps));

  const early = runStage('period-regressor', 'period-regressor (early)', () => fitPeriod(series, options.windows.early));
  const late = runStage('period-regressor', 'period-regressor (late)', () => fitPeriod(series, options.windows.late));
  const linearModel = runStage('period-regressor', 'period-regressor (full series)', () => fitLinearModel(series));

  const matrix = runStage('seasonal-aggregator', 'seasonal-aggregator', () => buildMonthYearMatrix(series));
  const diffs = runStage('seasonal-aggregator', 'seasonal-aggregator (diffs)', () => computeDiffs(series));

  const summaries = runStage('summary-reporter', 'summary-reporter', () => ({
    historical: summarize(
      series.map((row) => row.y),
      series.map((row) => row.ts)
    ),
    forecast: summarize(
      forecast.map((row) => row.yhat),
      forecast.map((row) => row.ts)
    ),
  }));

  return {
    name: input.name,
    unit: input.unit,
    description: input.description,
    series,
    timestamps,
    forecast,
    regressions: { early, late, ratio: slopeRatio(early, late) },
    linearModel,
    matrix,
    diffs,
    summaries,
  };
}
