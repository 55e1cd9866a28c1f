/**
 * Error kinds raised by the generation pipeline.
 *
 * Only `TransportError` is retried by the fetch client; every other kind
 * surfaces to the caller on first occurrence.
 */

export class GenerationPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationPipelineError';
  }
}

/** Thrown before any I/O when a requested window is empty, inverted or not a valid date. */
export class InvalidRangeError extends GenerationPipelineError {
  readonly start: Date;
  readonly end: Date;

  constructor(start: Date, end: Date, reason = 'start must be before end') {
    super(`Invalid range ${describeDate(start)} → ${describeDate(end)}: ${reason}`);
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

/** Network failure, timeout, or a non-2xx response. Retryable. */
export class TransportError extends GenerationPipelineError {
  readonly httpStatus: number | null;
  readonly timedOut: boolean;

  constructor(message: string, options: { httpStatus?: number | null; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.httpStatus = options.httpStatus ?? null;
    this.timedOut = options.timedOut === true;
  }
}

/** A 2xx response whose body is not JSON or does not have the expected shape. Not retried. */
export class MalformedRecordError extends GenerationPipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'MalformedRecordError';
    this.issues = issues;
  }
}

/** Every attempt failed with a retryable error. `cause` holds the last one. */
export class FetchExhaustedError extends GenerationPipelineError {
  readonly attempts: number;

  constructor(label: string, attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${label} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${detail}`, { cause: lastError });
    this.name = 'FetchExhaustedError';
    this.attempts = attempts;
  }
}

/** The caller aborted a historical run between windows. */
export class FetchAbortedError extends GenerationPipelineError {
  constructor(message = 'Historical fetch aborted') {
    super(message);
    this.name = 'FetchAbortedError';
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, or an error message containing "aborted" / "aborterror"
 * (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const name = String(e.name || '');
  const message = String(e.message || err || '');
  return name === 'AbortError' || /aborted|aborterror/i.test(message);
}

export function isRetryableFetchError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}

function describeDate(value: Date): string {
  return value instanceof Date && Number.isFinite(value.getTime()) ? value.toISOString() : 'Invalid Date';
}
