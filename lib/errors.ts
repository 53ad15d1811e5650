import { debugLog } from './log';

export type PipelineErrorCode =
  | 'InvalidCadence'
  | 'LengthMismatch'
  | 'MissingValue'
  | 'InvalidValue'
  | 'NonMonotoneTimestamps'
  | 'EmptySubset'
  | 'DegenerateFit'
  | 'UnknownFrequency'
  | 'InvalidConfig'
  | 'ForecasterFailure'
  | 'RenderFailure';

export type PipelineComponent =
  | 'series-loader'
  | 'horizon-builder'
  | 'forecast-driver'
  | 'period-regressor'
  | 'seasonal-aggregator'
  | 'summary-reporter'
  | 'renderer'
  | 'config';

/**
 * Fatal pipeline error. `code` identifies the failure kind, `component` the
 * stage that rejected its input.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly component: PipelineComponent;

  constructor(code: PipelineErrorCode, component: PipelineComponent, message: string) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.component = component;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

// Errors raised by collaborators pass through untouched; these are the kinds
// they are reported under.
const FOREIGN_KINDS: Partial<Record<PipelineComponent, PipelineErrorCode>> = {
  'forecast-driver': 'ForecasterFailure',
  renderer: 'RenderFailure',
};

export interface FailedStage {
  component: PipelineComponent;
  label: string;
}

const failedStages = new WeakMap<object, FailedStage>();

export function failedStageOf(error: unknown): FailedStage | undefined {
  return typeof error === 'object' && error !== null ? failedStages.get(error) : undefined;
}

/**
 * Run one stage. A failure is rethrown as the same object, tagged with the
 * innermost stage it escaped from so describeError can name it.
 */
export function runStage<T>(component: PipelineComponent, label: string, fn: () => T): T {
  debugLog('co2-report', `stage ${label}`);
  try {
    return fn();
  } catch (error) {
    if (typeof error === 'object' && error !== null && !failedStages.has(error)) {
      failedStages.set(error, { component, label });
    }
    throw error;
  }
}

/** One-line description for the CLI, naming the failing stage when known. */
export function describeError(error: unknown): string {
  const stage = failedStageOf(error);
  if (isPipelineError(error)) {
    return `${stage?.label ?? error.component}: ${error.code}: ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (stage) {
    return `${stage.label}: ${FOREIGN_KINDS[stage.component] ?? 'Error'}: ${message}`;
  }
  return message;
}
