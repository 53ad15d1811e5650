import fs from "fs";
import os from "os";
import path from "path";
import { PipelineError } from "@/lib/errors";
import { buildSeriesTable, loadSeriesFile, parseSeriesDocument, validateSeriesTable } from "@/lib/series/loader";
import type { MonthlySeriesInput } from "@/lib/types/series";

function input(overrides: Partial<MonthlySeriesInput> = {}): MonthlySeriesInput {
  return {
    name: "co2",
    unit: "ppm",
    cadence: "monthly",
    start: { year: 1959, month: 11 },
    values: [315.5, 316.25, 317, 317.75],
    ...overrides,
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof PipelineError ? error.code : "not-a-pipeline-error";
  }
  return undefined;
}

describe("buildSeriesTable", () => {
  it("stamps row i at start + i months, day 1, 00:00 UTC", () => {
    const table = buildSeriesTable(input());

    expect(table).toHaveLength(4);
    expect(table.map((r) => r.ts.toISOString())).toEqual([
      "1959-11-01T00:00:00.000Z",
      "1959-12-01T00:00:00.000Z",
      "1960-01-01T00:00:00.000Z",
      "1960-02-01T00:00:00.000Z",
    ]);
    expect(table.map((r) => r.y)).toEqual([315.5, 316.25, 317, 317.75]);
  });

  it("accepts a declared length and end that agree with the values", () => {
    const table = buildSeriesTable(input({ length: 4, end: { year: 1960, month: 2 } }));
    expect(table).toHaveLength(4);
  });

  it("rejects a cadence other than monthly", () => {
    expect(codeOf(() => buildSeriesTable(input({ cadence: "quarterly" })))).toBe("InvalidCadence");
  });

  it("rejects a declared length that contradicts the values", () => {
    expect(codeOf(() => buildSeriesTable(input({ length: 5 })))).toBe("LengthMismatch");
  });

  it("rejects an end month that contradicts the values", () => {
    expect(codeOf(() => buildSeriesTable(input({ end: { year: 1960, month: 3 } })))).toBe("LengthMismatch");
  });

  it("rejects an empty series", () => {
    expect(codeOf(() => buildSeriesTable(input({ values: [] })))).toBe("LengthMismatch");
  });

  it("treats a missing value as fatal and names its month", () => {
    expect(() => buildSeriesTable(input({ values: [315.5, null, 317, 317.75] }))).toThrow(
      "Missing value at index 1 (1959-12)"
    );
    expect(codeOf(() => buildSeriesTable(input({ values: [315.5, Number.NaN, 317, 317.75] })))).toBe("MissingValue");
  });

  it("rejects non-positive values and malformed starts", () => {
    expect(codeOf(() => buildSeriesTable(input({ values: [315.5, 0, 317, 317.75] })))).toBe("InvalidValue");
    expect(codeOf(() => buildSeriesTable(input({ start: { year: 1959, month: 13 } })))).toBe("InvalidValue");
  });
});

describe("validateSeriesTable", () => {
  const at = (y: number, m: number) => new Date(Date.UTC(y, m - 1, 1));

  it("flags timestamps that do not increase", () => {
    const rows = [
      { ts: at(1960, 2), y: 1 },
      { ts: at(1960, 1), y: 2 },
    ];
    expect(codeOf(() => validateSeriesTable(rows))).toBe("NonMonotoneTimestamps");
  });

  it("flags gaps in the monthly cadence", () => {
    const rows = [
      { ts: at(1960, 1), y: 1 },
      { ts: at(1960, 3), y: 2 },
    ];
    expect(codeOf(() => validateSeriesTable(rows))).toBe("InvalidCadence");
  });
});

describe("parseSeriesDocument / loadSeriesFile", () => {
  it("maps non-numeric entries to null so the table builder rejects them", () => {
    const parsed = parseSeriesDocument({
      name: "co2",
      unit: "ppm",
      cadence: "monthly",
      start: { year: 1959, month: 1 },
      values: [315.42, "NA", 316.32],
    });
    expect(parsed.values).toEqual([315.42, null, 316.32]);
    expect(codeOf(() => buildSeriesTable(parsed))).toBe("MissingValue");
  });

  it("requires a start month object", () => {
    expect(codeOf(() => parseSeriesDocument({ cadence: "monthly", values: [], start: "1959-01" }))).toBe("InvalidValue");
  });

  describe("from disk", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "co2-loader-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("reads the JSON dataset", () => {
      const file = path.join(dir, "series.json");
      fs.writeFileSync(
        file,
        JSON.stringify({ name: "test", unit: "ppm", cadence: "monthly", start: { year: 2000, month: 6 }, length: 2, values: [370.1, 369.4] })
      );

      const parsed = loadSeriesFile(file);
      expect(parsed.name).toBe("test");
      expect(parsed.length).toBe(2);
      expect(buildSeriesTable(parsed)[1].ts.toISOString()).toBe("2000-07-01T00:00:00.000Z");
    });

    it("reports a file that is not JSON", () => {
      const file = path.join(dir, "broken.json");
      fs.writeFileSync(file, "{ not json");
      expect(codeOf(() => loadSeriesFile(file))).toBe("InvalidValue");
    });

    it("reports a missing file as a loader error", () => {
      const file = path.join(dir, "absent.json");
      let caught: unknown;
      try {
        loadSeriesFile(file);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(PipelineError);
      expect(caught instanceof PipelineError && caught.component).toBe("series-loader");
      expect(caught instanceof PipelineError && caught.code).toBe("InvalidValue");
      expect(caught instanceof Error && caught.message.startsWith(`Cannot read dataset ${file}: `)).toBe(true);
    });
  });
});
