import type { SeriesTable } from '../types/series';

export interface MonthYearMatrix {
  years: number[];                   // ascending, every year present in the table
  cells: Array<Array<number | null>>; // cells[month - 1][yearIndex], null when absent
}

export type DiffSeries = Array<number | null>;

/** Mean value per (month, year) cell. */
export function buildMonthYearMatrix(table: SeriesTable): MonthYearMatrix {
  const years = Array.from(new Set(table.map((row) => row.ts.getUTCFullYear()))).sort((a, b) => a - b);
  const yearIndex = new Map(years.map((year, i) => [year, i]));

  const sums = Array.from({ length: 12 }, () => Array<number>(years.length).fill(0));
  const counts = Array.from({ length: 12 }, () => Array<number>(years.length).fill(0));

  for (const row of table) {
    const col = yearIndex.get(row.ts.getUTCFullYear());
    if (col === undefined) continue;
    const month = row.ts.getUTCMonth();
    sums[month][col] += row.y;
    counts[month][col] += 1;
  }

  const cells = sums.map((monthSums, month) =>
    monthSums.map((sum, col) => (counts[month][col] > 0 ? sum / counts[month][col] : null))
  );
  return { years, cells };
}

/** Column of the matrix for one year, months 1..12. */
export function yearColumn(matrix: MonthYearMatrix, year: number): Array<number | null> {
  const col = matrix.years.indexOf(year);
  if (col < 0) return Array<number | null>(12).fill(null);
  return matrix.cells.map((monthRow) => monthRow[col]);
}

/** Mean of y per calendar year, computed straight from the table. */
export function annualMeans(table: SeriesTable): Map<number, number> {
  const acc = new Map<number, { sum: number; count: number }>();
  for (const row of table) {
    const year = row.ts.getUTCFullYear();
    const entry = acc.get(year) ?? { sum: 0, count: 0 };
    entry.sum += row.y;
    entry.count += 1;
    acc.set(year, entry);
  }
  return new Map(Array.from(acc, ([year, { sum, count }]) => [year, sum / count]));
}

/** diff[0] is absent; diff[i] = y[i] - y[i-1]. */
export function computeDiffs(table: SeriesTable): DiffSeries {
  return table.map((row, i) => (i === 0 ? null : row.y - table[i - 1].y));
}
