// lib/csv.ts
import Papa from "papaparse";
import type { ForecastTable } from "./forecast/types";
import type { DiffSeries, MonthYearMatrix } from "./seasonal/aggregator";
import { formatMonth } from "./series/calendar";
import type { SeriesTable } from "./types/series";

export type CsvCell = string | number | null;
export type CsvRow = Record<string, CsvCell>;

/** Serialise rows with a header line; null cells become empty. */
export function toCsv(rows: CsvRow[], columns?: string[]): string {
  return Papa.unparse(rows, { columns, newline: "\n" });
}

export function seriesToCsv(series: SeriesTable): string {
  return toCsv(series.map((row) => ({ ts: formatMonth(row.ts), y: row.y })), ["ts", "y"]);
}

export function forecastToCsv(forecast: ForecastTable): string {
  return toCsv(
    forecast.map((row) => ({
      ts: formatMonth(row.ts),
      yhat: row.yhat,
      yhat_lower: row.yhat_lower,
      yhat_upper: row.yhat_upper,
      trend: row.trend,
      seasonal_year: row.seasonal_year,
    })),
    ["ts", "yhat", "yhat_lower", "yhat_upper", "trend", "seasonal_year"]
  );
}

/** One row per month, one column per year. */
export function matrixToCsv(matrix: MonthYearMatrix): string {
  const columns = ["month", ...matrix.years.map(String)];
  const rows = matrix.cells.map((monthRow, i) => {
    const row: CsvRow = { month: i + 1 };
    matrix.years.forEach((year, col) => {
      row[String(year)] = monthRow[col];
    });
    return row;
  });
  return toCsv(rows, columns);
}

export function diffsToCsv(series: SeriesTable, diffs: DiffSeries): string {
  return toCsv(series.map((row, i) => ({ ts: formatMonth(row.ts), diff: diffs[i] })), ["ts", "diff"]);
}
