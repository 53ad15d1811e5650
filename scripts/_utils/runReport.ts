import { loadedEnvFiles } from "../_loadEnv";
import { loadReportConfig } from "../../lib/config";
import { runStage } from "../../lib/errors";
import { AdditiveForecaster } from "../../lib/forecast/additiveModel";
import { debugLog } from "../../lib/log";
import { runCo2Pipeline } from "../../lib/pipeline";
import { buildReportArtifacts, writeReportArtifacts } from "../../lib/report/artifacts";
import { formatReport } from "../../lib/report/text";
import { loadSeriesFile } from "../../lib/series/loader";
import { flagsToEnv, hasFlag } from "./cli";

const FLAG_ENV: Record<string, string> = {
  data: "CO2_DATA_PATH",
  out: "REPORT_OUT_DIR",
  horizon: "HORIZON_PERIODS",
  freq: "HORIZON_FREQ",
  "interval-width": "FORECAST_INTERVAL_WIDTH",
};

/** Config → load → pipeline → artifacts. Nothing is written unless every stage succeeds. */
export async function runReport(argv: string[]): Promise<void> {
  const overrides = flagsToEnv(argv, FLAG_ENV);
  if (hasFlag(argv, "debug")) {
    overrides.REPORT_DEBUG = "1";
  }
  const config = runStage("config", "config", () => loadReportConfig({ ...process.env, ...overrides }));
  if (config.debug) {
    // debugLog reads the environment
    process.env.REPORT_DEBUG = "1";
  }
  debugLog("co2-report", "env files", loadedEnvFiles.length ? loadedEnvFiles.join(", ") : "(none)");
  debugLog("co2-report", "config", JSON.stringify(config));

  const input = runStage("series-loader", "series-loader", () => loadSeriesFile(config.dataPath));
  const result = runCo2Pipeline(
    input,
    { horizon: config.horizon, windows: config.windows },
    new AdditiveForecaster({ intervalWidth: config.intervalWidth })
  );

  const artifacts = buildReportArtifacts(result);
  console.log(formatReport(result));

  const written = await writeReportArtifacts(config.outDir, artifacts);
  console.log(`\n[co2-report] wrote ${written.join(", ")}`);
}
