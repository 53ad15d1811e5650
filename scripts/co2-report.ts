#!/usr/bin/env node
import "./_loadEnv";
import { describeError } from "../lib/errors";
import { runReport } from "./_utils/runReport";

runReport(process.argv.slice(2)).catch((err) => {
  console.error(`[co2-report] ${describeError(err)}`);
  process.exit(1);
});
