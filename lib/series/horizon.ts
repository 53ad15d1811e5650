import { PipelineError } from '../errors';
import { FREQUENCIES, type Frequency, type HorizonSpec, type SeriesTable } from '../types/series';
import { shiftTimestamp } from './calendar';

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((f) => f === value);
}

export function parseFrequency(raw: string): Frequency {
  const value = raw.trim().toLowerCase();
  if (!isFrequency(value)) {
    throw new PipelineError(
      'UnknownFrequency',
      'horizon-builder',
      `Unknown frequency "${raw}" (expected one of ${FREQUENCIES.join(', ')})`
    );
  }
  return value;
}

/**
 * Historical stamps followed by `periods` future stamps, each one `freq` step
 * past the previous, starting one step after the last observation.
 */
export function buildHorizon(table: SeriesTable, spec: HorizonSpec): Date[] {
  const { periods, freq } = spec;
  if (!Number.isInteger(periods) || periods < 0) {
    throw new PipelineError('InvalidConfig', 'horizon-builder', `Horizon must be a non-negative integer, got ${periods}`);
  }
  if (!isFrequency(freq)) {
    throw new PipelineError('UnknownFrequency', 'horizon-builder', `Unknown frequency "${String(freq)}"`);
  }

  const stamps = table.map((row) => row.ts);
  if (periods === 0) return stamps;
  if (stamps.length === 0) {
    throw new PipelineError('InvalidConfig', 'horizon-builder', 'Cannot extend an empty series');
  }

  const last = stamps[stamps.length - 1];
  for (let step = 1; step <= periods; step++) {
    stamps.push(shiftTimestamp(last, freq, step));
  }
  return stamps;
}
