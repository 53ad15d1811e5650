import type { PipelineResult } from '../pipeline';
import type { CoefficientRow, LinearModelSummary, RegressionFit } from '../regression/types';
import { formatDay, formatMonth } from '../series/calendar';
import type { SummaryStats } from '../summary/reporter';

const MACHINE_EPS_FLOOR = 2.2e-16;

export function formatNumber(value: number | null, digits = 4): string {
  if (value === null || !Number.isFinite(value)) return 'NA';
  return value.toFixed(digits);
}

export function formatPValue(p: number): string {
  if (p < MACHINE_EPS_FLOOR) return `< ${MACHINE_EPS_FLOOR}`;
  return p < 1e-4 ? p.toExponential(2) : p.toFixed(4);
}

export function formatSummary(label: string, stats: SummaryStats): string[] {
  const lines = [
    `${label} (n=${stats.n}, missing=${stats.missing})`,
    `  Min.    ${formatNumber(stats.min, 2)}`,
    `  1st Qu. ${formatNumber(stats.q1, 2)}`,
    `  Median  ${formatNumber(stats.median, 2)}`,
    `  Mean    ${formatNumber(stats.mean, 2)}`,
    `  3rd Qu. ${formatNumber(stats.q3, 2)}`,
    `  Max.    ${formatNumber(stats.max, 2)}`,
    `  SD      ${formatNumber(stats.sd, 3)}`,
  ];
  if (stats.range) {
    lines.push(`  Range   ${formatMonth(stats.range.start)} .. ${formatMonth(stats.range.end)}`);
  }
  return lines;
}

export function formatRegression(label: string, fit: RegressionFit): string[] {
  return [
    `${label} [${formatDay(fit.domain_start)} .. ${formatDay(fit.domain_end)}] n=${fit.n}`,
    `  slope     ${fit.slope.toFixed(6)} ppm/day`,
    `            ${fit.slopePerMonth.toFixed(4)} ppm/month (x30.4375)`,
    `            ${fit.slopePerYear.toFixed(4)} ppm/year (x365.25)`,
    `  intercept ${fit.intercept.toFixed(4)} ppm at 1970-01-01`,
  ];
}

function coefficientLine(label: string, row: CoefficientRow): string {
  return `  ${label.padEnd(11)} ${row.estimate.toExponential(4).padStart(12)} ${row.stdError.toExponential(4).padStart(12)} ${row.tValue.toFixed(2).padStart(9)} ${formatPValue(row.pValue)}`;
}

export function formatLinearModel(model: LinearModelSummary): string[] {
  return [
    `Linear model y ~ date (days since 1970-01-01), n=${model.n}`,
    `  ${'term'.padEnd(11)} ${'estimate'.padStart(12)} ${'std.error'.padStart(12)} ${'t value'.padStart(9)} Pr(>|t|)`,
    coefficientLine('(Intercept)', model.intercept),
    coefficientLine('date', model.slope),
    `  Residual standard error: ${model.residualStdError.toFixed(3)} on ${model.df} degrees of freedom`,
    `  Multiple R-squared: ${model.rSquared.toFixed(4)}, Adjusted R-squared: ${model.adjRSquared.toFixed(4)}`,
    `  F-statistic: ${model.fStatistic.toFixed(1)} on 1 and ${model.df} DF, p-value: ${formatPValue(model.fPValue)}`,
    `  Annualised slope: ${model.slopePerYear.toFixed(3)} ppm/year`,
  ];
}

/** Plain-text report printed by the CLI. */
export function formatReport(result: PipelineResult): string {
  const { summaries, regressions } = result;
  const header = [
    `${result.name} (${result.unit}): ${result.series.length} observations, ${result.forecast.length - result.series.length} forecast periods`,
  ];
  if (result.description) header.push(`Source: ${result.description}`);
  const sections = [
    header,
    formatSummary('Historical values', summaries.historical),
    formatSummary('Forecast yhat', summaries.forecast),
    formatRegression('Early window', regressions.early),
    formatRegression('Late window', regressions.late),
    [`Slope ratio late/early: ${regressions.ratio.toFixed(3)}${regressions.ratio > 2 ? ' (accelerating)' : ''}`],
    formatLinearModel(result.linearModel),
  ];
  return sections.map((lines) => lines.join('\n')).join('\n\n');
}
