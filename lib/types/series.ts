export type Frequency = 'monthly' | 'weekly' | 'daily';

export const FREQUENCIES: readonly Frequency[] = ['monthly', 'weekly', 'daily'];

export interface YearMonth {
  year: number;
  month: number;           // 1..12
}

/** Monthly series as declared in the bundled dataset file. */
export interface MonthlySeriesInput {
  name: string;
  unit: string;
  cadence: string;         // must be "monthly"
  start: YearMonth;
  end?: YearMonth;         // optional, checked against values.length
  length?: number;         // optional, checked against values.length
  values: Array<number | null>;
  description?: string;
}

export interface SeriesRow {
  ts: Date;                // day 1 of the month, 00:00 UTC
  y: number;               // ppm, > 0
}

export type SeriesTable = readonly SeriesRow[];

export interface HorizonSpec {
  periods: number;         // H >= 0
  freq: Frequency;
}

export interface RegressionWindow {
  lo: Date;                // inclusive
  hi: Date;                // inclusive
}
