import { annualMeans, buildMonthYearMatrix, computeDiffs, yearColumn } from "@/lib/seasonal/aggregator";
import type { SeriesTable } from "@/lib/types/series";

// 1990-11 .. 1992-02, y = 1, 2, ..., 16
const TABLE: SeriesTable = Array.from({ length: 16 }, (_, i) => ({
  ts: new Date(Date.UTC(1990, 10 + i, 1)),
  y: i + 1,
}));

describe("buildMonthYearMatrix", () => {
  const matrix = buildMonthYearMatrix(TABLE);

  it("has one column per year and twelve month rows", () => {
    expect(matrix.years).toEqual([1990, 1991, 1992]);
    expect(matrix.cells).toHaveLength(12);
    matrix.cells.forEach((row) => expect(row).toHaveLength(3));
  });

  it("places each observation at (month, year)", () => {
    expect(matrix.cells[10][0]).toBe(1); // Nov 1990
    expect(matrix.cells[11][0]).toBe(2); // Dec 1990
    expect(matrix.cells[0][1]).toBe(3); // Jan 1991
    expect(matrix.cells[11][1]).toBe(14); // Dec 1991
    expect(matrix.cells[1][2]).toBe(16); // Feb 1992
  });

  it("leaves months outside the series empty", () => {
    expect(matrix.cells[0][0]).toBeNull();
    expect(matrix.cells[2][2]).toBeNull();
  });

  it("yields a full column for a complete year", () => {
    expect(yearColumn(matrix, 1991)).toEqual([3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14]);
    expect(yearColumn(matrix, 1985)).toEqual(Array(12).fill(null));
  });
});

describe("annualMeans", () => {
  it("averages each calendar year present in the table", () => {
    const means = annualMeans(TABLE);
    expect(Array.from(means.keys())).toEqual([1990, 1991, 1992]);
    expect(means.get(1990)).toBe(1.5);
    expect(means.get(1991)).toBe(8.5);
    expect(means.get(1992)).toBe(15.5);
  });

  it("matches the mean of a complete matrix column", () => {
    const column = yearColumn(buildMonthYearMatrix(TABLE), 1991);
    const sum = column.reduce<number>((s, v) => s + (v ?? 0), 0);
    expect(annualMeans(TABLE).get(1991)).toBeCloseTo(sum / 12, 12);
  });
});

describe("computeDiffs", () => {
  it("is aligned with the table and absent at the first row", () => {
    const diffs = computeDiffs([
      { ts: new Date(Date.UTC(2000, 0, 1)), y: 370.5 },
      { ts: new Date(Date.UTC(2000, 1, 1)), y: 371.25 },
      { ts: new Date(Date.UTC(2000, 2, 1)), y: 370.75 },
    ]);
    expect(diffs).toEqual([null, 0.75, -0.5]);
  });

  it("returns an empty series for an empty table", () => {
    expect(computeDiffs([])).toEqual([]);
  });
});
