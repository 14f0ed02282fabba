export type ErrorKind =
  | 'ProviderUnavailable'
  | 'ProviderFatal'
  | 'QualityRejected'
  | 'Timeout'
  | 'ApprovalRejected'
  | 'CapacityExceeded'
  | 'Cancelled';

const RETRYABLE: Record<ErrorKind, boolean> = {
  ProviderUnavailable: true,
  ProviderFatal: false,
  QualityRejected: false,
  Timeout: true,
  ApprovalRejected: false,
  CapacityExceeded: true,
  Cancelled: false,
};

/**
 * Base class for errors that cross the pipeline boundary. `kind` is what gets
 * persisted in a job's error history.
 */
export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.retryable = RETRYABLE[kind];
  }
}

export class ProviderUnavailableError extends PipelineError {
  constructor(message = 'no provider available') {
    super('ProviderUnavailable', message);
  }
}

export class ProviderFatalError extends PipelineError {
  constructor(message: string) {
    super('ProviderFatal', message);
  }
}

export class QualityRejectedError extends PipelineError {
  constructor(message: string) {
    super('QualityRejected', message);
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super('Timeout', message);
  }
}

export class ApprovalRejectedError extends PipelineError {
  constructor(message: string) {
    super('ApprovalRejected', message);
  }
}

export class CapacityExceededError extends PipelineError {
  constructor(message: string) {
    super('CapacityExceeded', message);
  }
}

export class CancelledError extends PipelineError {
  constructor(message = 'cancelled') {
    super('Cancelled', message);
  }
}

/** Lookup failures (unknown job, channel or approval). Mapped to 404 by the API. */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Operation not valid in the entity's current state. Mapped to 409 by the API. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalise an abort reason or thrown value into a PipelineError. Anything
 * not already classified counts as a fatal provider error.
 */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof Error && err.name === 'AbortError') return new CancelledError(err.message);
  return new ProviderFatalError(errorMessage(err));
}
