import { summarize } from "@/lib/summary/reporter";

describe("summarize", () => {
  it("computes the five-number summary, mean and sample sd", () => {
    const stats = summarize([10, 1, 4, 2, 3]);
    expect(stats).toMatchObject({ n: 5, missing: 0, min: 1, q1: 2, median: 3, mean: 4, q3: 4, max: 10 });
    expect(stats.sd).toBeCloseTo(Math.sqrt(12.5), 12);
  });

  it("interpolates quartiles for an even count", () => {
    const stats = summarize([4, 3, 2, 1]);
    expect(stats.q1).toBe(1.75);
    expect(stats.median).toBe(2.5);
    expect(stats.q3).toBe(3.25);
  });

  it("counts absent entries as missing and skips them", () => {
    const stats = summarize([null, 2, undefined, 4]);
    expect(stats.n).toBe(2);
    expect(stats.missing).toBe(2);
    expect(stats.mean).toBe(3);
  });

  it("returns empty statistics for an all-missing column", () => {
    const stats = summarize([null, null]);
    expect(stats).toEqual({
      n: 0,
      missing: 2,
      min: null,
      q1: null,
      median: null,
      mean: null,
      q3: null,
      max: null,
      sd: null,
      range: undefined,
    });
  });

  it("leaves sd empty for a single value", () => {
    expect(summarize([5]).sd).toBeNull();
  });

  it("reports the range of the timestamps", () => {
    const a = new Date(Date.UTC(1959, 0, 1));
    const b = new Date(Date.UTC(1997, 11, 1));
    const stats = summarize([1, 2], [b, a]);
    expect(stats.range).toEqual({ start: a, end: b });
  });
});
