import { PipelineError } from '../errors';
import { debugLog } from '../log';
import { toEpochDays } from '../series/calendar';
import { centralCritical } from '../stats/distributions';
import { solveRidge } from '../stats/linalg';
import type { SeriesTable } from '../types/series';
import type {
  AdditiveModel,
  AdditiveModelOptions,
  DecomposableForecaster,
  ForecastRow,
  ForecastTable,
} from './types';

const YEAR_DAYS = 365.25;
const MIN_SIGMA2 = 1e-6;

export const DEFAULT_ADDITIVE_OPTIONS: AdditiveModelOptions = {
  nChangepoints: 25,
  changepointRange: 0.8,
  changepointPriorScale: 0.05,
  yearlyFourierOrder: 10,
  seasonalityPriorScale: 10,
  intervalWidth: 0.8,
};

function fail(message: string): never {
  throw new PipelineError('ForecasterFailure', 'forecast-driver', message);
}

function fourierTerms(ts: Date, order: number): number[] {
  const days = toEpochDays(ts);
  const terms: number[] = [];
  for (let n = 1; n <= order; n++) {
    const angle = (2 * Math.PI * n * days) / YEAR_DAYS;
    terms.push(Math.cos(angle), Math.sin(angle));
  }
  return terms;
}

function hinges(t: number, changepoints: readonly number[]): number[] {
  return changepoints.map((s) => Math.max(0, t - s));
}

/**
 * Candidate changepoints: evenly spaced rows across the first
 * `changepointRange` of the history, first row excluded.
 */
function placeChangepoints(tScaled: readonly number[], options: AdditiveModelOptions): number[] {
  const histSize = Math.floor(tScaled.length * options.changepointRange);
  const count = Math.min(options.nChangepoints, histSize - 1);
  if (count <= 0) return [];
  const points: number[] = [];
  for (let j = 1; j <= count; j++) {
    points.push(tScaled[Math.round((j * (histSize - 1)) / count)]);
  }
  return points;
}

/**
 * Harmonics at or above half the sampling rate alias onto lower ones, so the
 * order is capped at floor((samplesPerYear - 1) / 2).
 */
function effectiveFourierOrder(table: SeriesTable, requested: number): number {
  const n = table.length;
  const spanDays = toEpochDays(table[n - 1].ts) - toEpochDays(table[0].ts);
  const samplesPerYear = YEAR_DAYS / (spanDays / (n - 1));
  return Math.max(0, Math.min(requested, Math.floor((samplesPerYear - 1) / 2)));
}

function residualVariance(X: readonly number[][], y: readonly number[], beta: readonly number[]): number {
  let rss = 0;
  for (let t = 0; t < X.length; t++) {
    let fitted = 0;
    for (let j = 0; j < beta.length; j++) fitted += X[t][j] * beta[j];
    rss += (y[t] - fitted) ** 2;
  }
  return rss / X.length;
}

function validateOptions(options: AdditiveModelOptions): void {
  const { nChangepoints, changepointRange, changepointPriorScale, yearlyFourierOrder, seasonalityPriorScale, intervalWidth } = options;
  if (!Number.isInteger(nChangepoints) || nChangepoints < 0) fail(`nChangepoints must be a non-negative integer, got ${nChangepoints}`);
  if (!(changepointRange > 0 && changepointRange <= 1)) fail(`changepointRange must be in (0, 1], got ${changepointRange}`);
  if (!(changepointPriorScale > 0)) fail(`changepointPriorScale must be positive, got ${changepointPriorScale}`);
  if (!Number.isInteger(yearlyFourierOrder) || yearlyFourierOrder < 0) fail(`yearlyFourierOrder must be a non-negative integer, got ${yearlyFourierOrder}`);
  if (!(seasonalityPriorScale > 0)) fail(`seasonalityPriorScale must be positive, got ${seasonalityPriorScale}`);
  if (!(intervalWidth > 0 && intervalWidth < 1)) fail(`intervalWidth must be in (0, 1), got ${intervalWidth}`);
}

/**
 * Additive decomposable model: piecewise-linear trend with automatic
 * changepoints plus a yearly Fourier seasonality.
 *
 *   y(t) = (k + Σ δ_j 1[t ≥ s_j]) t + m' + Σ_n (a_n cos 2πnd/P + b_n sin 2πnd/P)
 *
 * Fitted by penalised least squares on y / max|y|: slope changes carry a
 * Gaussian shrinkage of scale `changepointPriorScale`, seasonal coefficients
 * one of scale `seasonalityPriorScale`. The noise variance that sets the
 * penalty strength is estimated in a first pass and refined once.
 */
export class AdditiveForecaster implements DecomposableForecaster<AdditiveModel> {
  readonly name = 'additive-changepoint-yearly';
  private readonly options: AdditiveModelOptions;

  constructor(options: Partial<AdditiveModelOptions> = {}) {
    this.options = { ...DEFAULT_ADDITIVE_OPTIONS, ...options };
    validateOptions(this.options);
  }

  fit(table: SeriesTable): AdditiveModel {
    const n = table.length;
    if (n < 2) fail(`Need at least 2 observations to fit, got ${n}`);

    const tStart = table[0].ts.getTime();
    const tSpan = table[n - 1].ts.getTime() - tStart;
    if (!(tSpan > 0)) fail('History spans zero time');

    const yScale = Math.max(...table.map((row) => Math.abs(row.y)));
    if (!(yScale > 0) || !Number.isFinite(yScale)) fail('Series has no non-zero finite values');

    const tScaled = table.map((row) => (row.ts.getTime() - tStart) / tSpan);
    const yScaled = table.map((row) => row.y / yScale);
    const changepoints = placeChangepoints(tScaled, this.options);
    const fourierOrder = effectiveFourierOrder(table, this.options.yearlyFourierOrder);

    const X = table.map((row, i) => [1, tScaled[i], ...hinges(tScaled[i], changepoints), ...fourierTerms(row.ts, fourierOrder)]);

    const penaltyFor = (sigma2: number): number[] => [
      0,
      0,
      ...changepoints.map(() => sigma2 / this.options.changepointPriorScale ** 2),
      ...Array<number>(2 * fourierOrder).fill(sigma2 / this.options.seasonalityPriorScale ** 2),
    ];

    const yMean = yScaled.reduce((s, v) => s + v, 0) / n;
    const initialSigma2 = Math.max(yScaled.reduce((s, v) => s + (v - yMean) ** 2, 0) / n, MIN_SIGMA2);

    const first = solveRidge(X, yScaled, penaltyFor(initialSigma2));
    if (!first) fail('Design matrix is singular');
    const refinedSigma2 = Math.max(residualVariance(X, yScaled, first), MIN_SIGMA2);
    const beta = solveRidge(X, yScaled, penaltyFor(refinedSigma2));
    if (!beta) fail('Design matrix is singular');

    const S = changepoints.length;
    const model: AdditiveModel = {
      options: this.options,
      tStart,
      tSpan,
      yScale,
      changepoints,
      m: beta[0],
      k: beta[1],
      delta: beta.slice(2, 2 + S),
      fourierOrder,
      beta: beta.slice(2 + S),
      sigmaObs: Math.sqrt(residualVariance(X, yScaled, beta)),
    };

    debugLog(
      'forecast',
      `fit n=${n} changepoints=${S} fourierOrder=${fourierOrder}`,
      `k=${model.k.toFixed(6)} m=${model.m.toFixed(6)} sigma=${(model.sigmaObs * yScale).toFixed(4)}`
    );
    return model;
  }

  predict(model: AdditiveModel, timestamps: readonly Date[]): ForecastTable {
    const z = centralCritical(model.options.intervalWidth);
    const S = model.changepoints.length;
    // Mean absolute slope change sets the scale of future trend changes.
    const lambda = S > 0 ? model.delta.reduce((s, d) => s + Math.abs(d), 0) / S : 0;

    return timestamps.map((ts): ForecastRow => {
      const t = (ts.getTime() - model.tStart) / model.tSpan;
      const hinge = hinges(t, model.changepoints);
      let trend = model.m + model.k * t;
      for (let j = 0; j < S; j++) trend += model.delta[j] * hinge[j];

      const terms = fourierTerms(ts, model.fourierOrder);
      let seasonal = 0;
      for (let j = 0; j < terms.length; j++) seasonal += model.beta[j] * terms[j];

      // Changes arrive at rate S per unit of scaled time with Laplace(0, lambda)
      // size; each acts on the trend for the remaining (t - s).
      const ahead = Math.max(0, t - 1);
      const trendVar = (2 * lambda * lambda * S * ahead ** 3) / 3;
      const sigma = Math.sqrt(model.sigmaObs ** 2 + trendVar);

      const yhat = (trend + seasonal) * model.yScale;
      const half = z * sigma * model.yScale;
      return {
        ts,
        yhat,
        yhat_lower: yhat - half,
        yhat_upper: yhat + half,
        trend: trend * model.yScale,
        seasonal_year: seasonal * model.yScale,
      };
    });
  }
}
