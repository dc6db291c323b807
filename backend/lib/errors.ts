/**
 * Failure categories shared by both jobs.
 *
 * InvalidInput, StorageError and UpstreamUnavailable abort the invocation and
 * are thrown. PartialNukeFailure and NotificationFailure never abort anything;
 * they only show up as records in a result.
 */
export type ErrorKind =
  | 'InvalidInput'
  | 'UpstreamUnavailable'
  | 'StorageError'
  | 'PartialNukeFailure'
  | 'NotificationFailure';

export class JobError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind;
    this.kind = kind;
  }
}

export class InvalidInputError extends JobError {
  constructor(message: string, cause?: unknown) {
    super('InvalidInput', message, cause);
  }
}

export class StorageError extends JobError {
  constructor(message: string, cause?: unknown) {
    super('StorageError', message, cause);
  }
}

export class UpstreamUnavailableError extends JobError {
  constructor(message: string, cause?: unknown) {
    super('UpstreamUnavailable', message, cause);
  }
}

export function isJobError(error: unknown): error is JobError {
  return error instanceof JobError;
}

/**
 * Flatten anything thrown into a log- and JSON-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
