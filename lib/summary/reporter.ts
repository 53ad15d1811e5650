import { mean, quantileSorted, sampleStd } from '../stats/descriptive';

export interface SummaryStats {
  n: number;                 // present values
  missing: number;           // absent entries
  min: number | null;
  q1: number | null;
  median: number | null;
  mean: number | null;
  q3: number | null;
  max: number | null;
  sd: number | null;         // sample sd (N-1); null for fewer than 2 values
  range?: { start: Date; end: Date };
}

function isPresent(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Five-number summary plus mean, sample sd and missing count. Quartiles
 * interpolate linearly at position 1 + p(n-1). With `timestamps`, also the
 * (min, max) date range.
 */
export function summarize(
  values: ReadonlyArray<number | null | undefined>,
  timestamps?: readonly Date[]
): SummaryStats {
  const present = values.filter(isPresent);
  const missing = values.length - present.length;
  const range = summarizeRange(timestamps);

  if (present.length === 0) {
    return { n: 0, missing, min: null, q1: null, median: null, mean: null, q3: null, max: null, sd: null, range };
  }

  const sorted = [...present].sort((a, b) => a - b);
  return {
    n: present.length,
    missing,
    min: sorted[0],
    q1: quantileSorted(sorted, 0.25),
    median: quantileSorted(sorted, 0.5),
    mean: mean(sorted),
    q3: quantileSorted(sorted, 0.75),
    max: sorted[sorted.length - 1],
    sd: present.length > 1 ? sampleStd(present) : null,
    range,
  };
}

function summarizeRange(timestamps?: readonly Date[]): { start: Date; end: Date } | undefined {
  if (!timestamps || timestamps.length === 0) return undefined;
  let start = timestamps[0];
  let end = timestamps[0];
  for (const ts of timestamps) {
    if (ts.getTime() < start.getTime()) start = ts;
    if (ts.getTime() > end.getTime()) end = ts;
  }
  return { start, end };
}
