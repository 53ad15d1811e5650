export const DAYS_PER_MONTH = 30.4375;
export const DAYS_PER_YEAR = 365.25;

export interface RegressionFit {
  slope: number;             // ppm per day (x = days since 1970-01-01)
  intercept: number;         // ppm at 1970-01-01
  n: number;
  domain_start: Date;
  domain_end: Date;
  slopePerMonth: number;     // slope * 30.4375
  slopePerYear: number;      // slope * 365.25
}

export interface CoefficientRow {
  estimate: number;
  stdError: number;
  tValue: number;
  pValue: number;
}

export interface LinearModelSummary {
  n: number;
  intercept: CoefficientRow;
  slope: CoefficientRow;     // per day
  residualStdError: number;
  df: number;                // n - 2
  rSquared: number;
  adjRSquared: number;
  fStatistic: number;        // on (1, df)
  fPValue: number;
  slopePerYear: number;
}
