import { PipelineError } from './errors';
import { DEFAULT_DATASET_PATH, DEFAULT_OUT_DIR } from './paths';
import { parseDay } from './series/calendar';
import { parseFrequency } from './series/horizon';
import type { HorizonSpec, RegressionWindow } from './types/series';

export interface ReportConfig {
  dataPath: string;
  outDir: string;
  horizon: HorizonSpec;
  windows: {
    early: RegressionWindow;
    late: RegressionWindow;
  };
  intervalWidth: number;
  debug: boolean;
}

type EnvLike = Record<string, string | undefined>;

export const DEFAULT_WINDOWS = {
  early: '1959-01-01..1964-12-01',
  late: '1993-01-01..1997-12-01',
} as const;

function invalid(message: string): never {
  throw new PipelineError('InvalidConfig', 'config', message);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseHorizonPeriods(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    invalid(`HORIZON_PERIODS must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw.trim());
}

/** "YYYY-MM-DD..YYYY-MM-DD", both ends inclusive. */
export function parseWindow(raw: string, key: string): RegressionWindow {
  const parts = raw.split('..');
  if (parts.length !== 2) {
    invalid(`${key} must look like 1959-01-01..1964-12-01, got "${raw}"`);
  }
  const lo = parseDay(parts[0]);
  const hi = parseDay(parts[1]);
  if (!lo || !hi) {
    invalid(`${key} has an invalid date: "${raw}"`);
  }
  if (lo.getTime() > hi.getTime()) {
    invalid(`${key} starts after it ends: "${raw}"`);
  }
  return { lo, hi };
}

export function parseIntervalWidth(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    invalid(`FORECAST_INTERVAL_WIDTH must be in (0, 1), got "${raw}"`);
  }
  return value;
}

/** Resolve the report configuration from environment-style key/values. */
export function loadReportConfig(env: EnvLike = process.env): ReportConfig {
  const periodsRaw = nonEmpty(env.HORIZON_PERIODS);
  const freqRaw = nonEmpty(env.HORIZON_FREQ);
  const widthRaw = nonEmpty(env.FORECAST_INTERVAL_WIDTH);

  return {
    dataPath: nonEmpty(env.CO2_DATA_PATH) ?? DEFAULT_DATASET_PATH,
    outDir: nonEmpty(env.REPORT_OUT_DIR) ?? DEFAULT_OUT_DIR,
    horizon: {
      periods: periodsRaw === undefined ? 12 : parseHorizonPeriods(periodsRaw),
      freq: freqRaw === undefined ? 'monthly' : parseFrequency(freqRaw),
    },
    windows: {
      early: parseWindow(nonEmpty(env.REGRESSION_WINDOW_EARLY) ?? DEFAULT_WINDOWS.early, 'REGRESSION_WINDOW_EARLY'),
      late: parseWindow(nonEmpty(env.REGRESSION_WINDOW_LATE) ?? DEFAULT_WINDOWS.late, 'REGRESSION_WINDOW_LATE'),
    },
    intervalWidth: widthRaw === undefined ? 0.8 : parseIntervalWidth(widthRaw),
    debug: env.REPORT_DEBUG === '1',
  };
}
