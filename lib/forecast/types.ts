import type { SeriesTable } from '../types/series';

export type ForecastRow = {
  ts: Date;
  yhat: number;
  yhat_lower: number;        // yhat_lower <= yhat
  yhat_upper: number;        // yhat <= yhat_upper
  trend: number;
  seasonal_year: number;     // additive yearly component
};

export type ForecastTable = readonly ForecastRow[];

/**
 * Additive decomposable forecaster: fit once on the prepared table, then
 * predict for any sequence of stamps. `M` is the fitted-model handle.
 */
export interface DecomposableForecaster<M> {
  readonly name: string;
  fit(table: SeriesTable): M;
  predict(model: M, timestamps: readonly Date[]): ForecastTable;
}

export type AdditiveModelOptions = {
  nChangepoints: number;           // candidate trend changepoints (default 25)
  changepointRange: number;        // share of history holding changepoints (default 0.8)
  changepointPriorScale: number;   // shrinkage scale on slope changes (default 0.05)
  yearlyFourierOrder: number;      // default 10, capped below the sampling Nyquist limit
  seasonalityPriorScale: number;   // default 10
  intervalWidth: number;           // central band width (default 0.8)
};

export type AdditiveModel = {
  options: AdditiveModelOptions;
  tStart: number;                  // ms
  tSpan: number;                   // ms
  yScale: number;                  // max |y|
  changepoints: number[];          // scaled time in [0, 1]
  k: number;                       // base growth rate (scaled)
  m: number;                       // offset (scaled)
  delta: number[];                 // slope changes at changepoints (scaled)
  fourierOrder: number;
  beta: number[];                  // [cos1, sin1, cos2, sin2, ...] (scaled)
  sigmaObs: number;                // residual sd (scaled)
};
