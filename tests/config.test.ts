import path from "path";
import { loadReportConfig, parseWindow } from "@/lib/config";
import { PipelineError } from "@/lib/errors";
import { DEFAULT_DATASET_PATH, DEFAULT_OUT_DIR } from "@/lib/paths";
import { flagsToEnv, hasFlag, readFlag } from "@/scripts/_utils/cli";

const utc = (y: number, m: number, d = 1) => new Date(Date.UTC(y, m - 1, d));

describe("loadReportConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadReportConfig({});
    expect(config.dataPath).toBe(DEFAULT_DATASET_PATH);
    expect(config.outDir).toBe(DEFAULT_OUT_DIR);
    expect(config.horizon).toEqual({ periods: 12, freq: "monthly" });
    expect(config.windows.early).toEqual({ lo: utc(1959, 1), hi: utc(1964, 12) });
    expect(config.windows.late).toEqual({ lo: utc(1993, 1), hi: utc(1997, 12) });
    expect(config.intervalWidth).toBe(0.8);
    expect(config.debug).toBe(false);
  });

  it("reads overrides", () => {
    const config = loadReportConfig({
      CO2_DATA_PATH: "fixtures/series.json",
      REPORT_OUT_DIR: "/tmp/report",
      HORIZON_PERIODS: "24",
      HORIZON_FREQ: " Weekly ",
      REGRESSION_WINDOW_EARLY: "1960-01-01..1960-12-01",
      FORECAST_INTERVAL_WIDTH: "0.95",
      REPORT_DEBUG: "1",
    });
    expect(config.dataPath).toBe("fixtures/series.json");
    expect(config.outDir).toBe("/tmp/report");
    expect(config.horizon).toEqual({ periods: 24, freq: "weekly" });
    expect(config.windows.early).toEqual({ lo: utc(1960, 1), hi: utc(1960, 12) });
    expect(config.intervalWidth).toBe(0.95);
    expect(config.debug).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadReportConfig({ HORIZON_PERIODS: "  " }).horizon.periods).toBe(12);
  });

  it.each([
    [{ HORIZON_PERIODS: "-1" }, "InvalidConfig"],
    [{ HORIZON_PERIODS: "1.5" }, "InvalidConfig"],
    [{ HORIZON_FREQ: "fortnightly" }, "UnknownFrequency"],
    [{ FORECAST_INTERVAL_WIDTH: "1" }, "InvalidConfig"],
    [{ REGRESSION_WINDOW_LATE: "1997-12-01..1993-01-01" }, "InvalidConfig"],
  ])("rejects %j with %s", (env, code) => {
    let caught: unknown;
    try {
      loadReportConfig(env);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PipelineError);
    expect(caught instanceof PipelineError && caught.code).toBe(code);
  });
});

describe("parseWindow", () => {
  it("names the key in its errors", () => {
    expect(() => parseWindow("1960-01-01", "REGRESSION_WINDOW_EARLY")).toThrow(
      'REGRESSION_WINDOW_EARLY must look like 1959-01-01..1964-12-01, got "1960-01-01"'
    );
    expect(() => parseWindow("1960-13-01..1961-01-01", "W")).toThrow('W has an invalid date: "1960-13-01..1961-01-01"');
  });
});

describe("cli flags", () => {
  const argv = ["--data=custom.json", "--horizon", "6", "--debug", "--out"];

  it("reads --name=value and --name value", () => {
    expect(readFlag(argv, "data")).toBe("custom.json");
    expect(readFlag(argv, "horizon")).toBe("6");
    expect(readFlag(argv, "out")).toBe("");
    expect(readFlag(argv, "freq")).toBeNull();
  });

  it("detects boolean flags", () => {
    expect(hasFlag(argv, "debug")).toBe(true);
    expect(hasFlag(argv, "verbose")).toBe(false);
  });

  it("maps present, non-empty flags onto env keys", () => {
    expect(flagsToEnv(argv, { data: "CO2_DATA_PATH", horizon: "HORIZON_PERIODS", out: "REPORT_OUT_DIR" })).toEqual({
      CO2_DATA_PATH: "custom.json",
      HORIZON_PERIODS: "6",
    });
  });

  it("resolves the default dataset beside the project", () => {
    expect(path.basename(DEFAULT_DATASET_PATH)).toBe("co2.json");
  });
});
