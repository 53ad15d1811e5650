import type { SeriesTable } from '../types/series';
import type { DecomposableForecaster, ForecastTable } from './types';

/**
 * Fit the forecaster on the prepared table and predict over `timestamps`.
 * Rows come back in the order of `timestamps`; errors from the forecaster
 * propagate as thrown.
 */
export function runForecast<M>(
  forecaster: DecomposableForecaster<M>,
  table: SeriesTable,
  timestamps: readonly Date[]
): ForecastTable {
  const model = forecaster.fit(table);
  return forecaster.predict(model, timestamps);
}
