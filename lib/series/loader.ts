import fs from 'fs';
import { PipelineError } from '../errors';
import type { MonthlySeriesInput, SeriesRow, SeriesTable, YearMonth } from '../types/series';
import { formatMonth, monthStart, monthsBetween, shiftTimestamp } from './calendar';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readYearMonth(value: unknown, field: string): YearMonth {
  if (!isRecord(value) || typeof value.year !== 'number' || typeof value.month !== 'number') {
    throw new PipelineError('InvalidValue', 'series-loader', `"${field}" must be { year, month }`);
  }
  return { year: value.year, month: value.month };
}

/**
 * Validate the shape of a parsed dataset descriptor. Values stay as given
 * (null allowed here); buildSeriesTable rejects them.
 */
export function parseSeriesDocument(doc: unknown): MonthlySeriesInput {
  if (!isRecord(doc)) {
    throw new PipelineError('InvalidValue', 'series-loader', 'Dataset must be a JSON object');
  }
  const { name, unit, cadence, values, length, description } = doc;
  if (typeof cadence !== 'string') {
    throw new PipelineError('InvalidCadence', 'series-loader', 'Dataset does not declare a cadence');
  }
  if (!Array.isArray(values)) {
    throw new PipelineError('InvalidValue', 'series-loader', '"values" must be an array');
  }
  const parsedValues = values.map((v): number | null => (typeof v === 'number' ? v : null));
  if (length !== undefined && typeof length !== 'number') {
    throw new PipelineError('LengthMismatch', 'series-loader', '"length" must be a number');
  }

  return {
    name: typeof name === 'string' ? name : 'series',
    unit: typeof unit === 'string' ? unit : '',
    cadence,
    start: readYearMonth(doc.start, 'start'),
    end: doc.end === undefined ? undefined : readYearMonth(doc.end, 'end'),
    length,
    values: parsedValues,
    description: typeof description === 'string' ? description : undefined,
  };
}

/** Read and shape-check the JSON dataset file. */
export function loadSeriesFile(filePath: string): MonthlySeriesInput {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError('InvalidValue', 'series-loader', `Cannot read dataset ${filePath}: ${reason}`);
  }
  let doc: unknown;
  try {
    doc = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError('InvalidValue', 'series-loader', `Dataset ${filePath} is not valid JSON: ${reason}`);
  }
  return parseSeriesDocument(doc);
}

/**
 * Check table invariants: strictly increasing stamps, exactly one calendar
 * month apart.
 */
export function validateSeriesTable(rows: SeriesTable): void {
  for (let i = 1; i < rows.length; i++) {
    const prev = rows[i - 1].ts;
    const curr = rows[i].ts;
    if (curr.getTime() <= prev.getTime()) {
      throw new PipelineError(
        'NonMonotoneTimestamps',
        'series-loader',
        `Timestamp at row ${i} (${formatMonth(curr)}) does not follow ${formatMonth(prev)}`
      );
    }
    if (shiftTimestamp(prev, 'monthly', 1).getTime() !== curr.getTime()) {
      throw new PipelineError(
        'InvalidCadence',
        'series-loader',
        `Rows ${i - 1} and ${i} are not one month apart (${formatMonth(prev)} -> ${formatMonth(curr)})`
      );
    }
  }
}

/** Build the canonical (ts, y) table: row i is start + i months. */
export function buildSeriesTable(input: MonthlySeriesInput): SeriesTable {
  const { cadence, start, end, length, values } = input;

  if (cadence !== 'monthly') {
    throw new PipelineError('InvalidCadence', 'series-loader', `Cadence "${cadence}" is not monthly`);
  }
  if (!Number.isInteger(start.year) || !Number.isInteger(start.month) || start.month < 1 || start.month > 12) {
    throw new PipelineError('InvalidValue', 'series-loader', `Invalid start ${start.year}-${start.month}`);
  }
  if (values.length === 0) {
    throw new PipelineError('LengthMismatch', 'series-loader', `Series "${input.name}" has no observations`);
  }
  if (length !== undefined && length !== values.length) {
    throw new PipelineError(
      'LengthMismatch',
      'series-loader',
      `Declared length ${length} but ${values.length} values present`
    );
  }
  if (end !== undefined) {
    const expected = monthsBetween(start, end) + 1;
    if (expected !== values.length) {
      throw new PipelineError(
        'LengthMismatch',
        'series-loader',
        `Range ${start.year}-${start.month}..${end.year}-${end.month} spans ${expected} months but ${values.length} values present`
      );
    }
  }

  const origin = monthStart(start.year, start.month);
  const rows: SeriesRow[] = values.map((y, i) => {
    const ts = shiftTimestamp(origin, 'monthly', i);
    if (y === null || !Number.isFinite(y)) {
      throw new PipelineError('MissingValue', 'series-loader', `Missing value at index ${i} (${formatMonth(ts)})`);
    }
    if (y <= 0) {
      throw new PipelineError('InvalidValue', 'series-loader', `Non-positive value ${y} at index ${i} (${formatMonth(ts)})`);
    }
    return { ts, y };
  });

  validateSeriesTable(rows);
  return rows;
}
