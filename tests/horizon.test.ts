import { PipelineError } from "@/lib/errors";
import { buildHorizon, parseFrequency } from "@/lib/series/horizon";
import { buildSeriesTable } from "@/lib/series/loader";

const table = buildSeriesTable({
  name: "co2",
  unit: "ppm",
  cadence: "monthly",
  start: { year: 1997, month: 10 },
  values: [360.1, 361.2, 362.3],
});

const iso = (dates: Date[]) => dates.map((d) => d.toISOString().slice(0, 10));

describe("buildHorizon", () => {
  it("appends monthly stamps one step past the last observation", () => {
    const stamps = buildHorizon(table, { periods: 3, freq: "monthly" });
    expect(iso(stamps)).toEqual(["1997-10-01", "1997-11-01", "1997-12-01", "1998-01-01", "1998-02-01", "1998-03-01"]);
  });

  it("returns only historical stamps for a zero horizon", () => {
    const stamps = buildHorizon(table, { periods: 0, freq: "monthly" });
    expect(iso(stamps)).toEqual(["1997-10-01", "1997-11-01", "1997-12-01"]);
  });

  it("supports weekly and daily cadences", () => {
    expect(iso(buildHorizon(table, { periods: 2, freq: "weekly" })).slice(3)).toEqual(["1997-12-08", "1997-12-15"]);
    expect(iso(buildHorizon(table, { periods: 2, freq: "daily" })).slice(3)).toEqual(["1997-12-02", "1997-12-03"]);
  });

  it("clamps month arithmetic to the end of shorter months", () => {
    const leap = [{ ts: new Date(Date.UTC(2024, 0, 31)), y: 420 }];
    const plain = [{ ts: new Date(Date.UTC(2023, 0, 31)), y: 418 }];
    expect(iso(buildHorizon(leap, { periods: 2, freq: "monthly" }))).toEqual(["2024-01-31", "2024-02-29", "2024-03-31"]);
    expect(iso(buildHorizon(plain, { periods: 1, freq: "monthly" }))).toEqual(["2023-01-31", "2023-02-28"]);
  });

  it("rejects negative or fractional horizons", () => {
    expect(() => buildHorizon(table, { periods: -1, freq: "monthly" })).toThrow(PipelineError);
    expect(() => buildHorizon(table, { periods: 1.5, freq: "monthly" })).toThrow("non-negative integer");
  });

  it("cannot extend an empty table", () => {
    expect(buildHorizon([], { periods: 0, freq: "monthly" })).toEqual([]);
    expect(() => buildHorizon([], { periods: 2, freq: "monthly" })).toThrow("Cannot extend an empty series");
  });
});

describe("parseFrequency", () => {
  it("normalises case and whitespace", () => {
    expect(parseFrequency(" Weekly ")).toBe("weekly");
  });

  it("rejects values outside the enumerated set", () => {
    try {
      parseFrequency("hourly");
      throw new Error("expected parseFrequency to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error instanceof PipelineError && error.code).toBe("UnknownFrequency");
    }
  });
});
