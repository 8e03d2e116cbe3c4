export class OtaPushError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required option is missing or out of range. Raised before any I/O. */
export class ValidationError extends OtaPushError {}

/** A deployment name or release label did not match anything on the server. */
export class ResolutionError extends OtaPushError {}

export class ApiError extends OtaPushError {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`API returned HTTP ${status}: ${body}`);
  }
}

export class UploadError extends OtaPushError {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`upload failed with HTTP ${status}: ${body}`);
  }
}

export class ProcessingFailedError extends OtaPushError {
  constructor(readonly reason: string) {
    super(`package processing failed: ${reason}`);
  }
}

/**
 * The package never reached a terminal state while we were watching.
 * The server may still finish processing it.
 */
export class PollTimeoutError extends OtaPushError {
  constructor(readonly waitedMs: number) {
    super(`package processing timed out after ${formatDuration(waitedMs)}`);
  }
}

export class OperationError extends OtaPushError {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`${operation}: ${errorMessage(cause)}`, { cause });
  }
}

export function wrapError(operation: string, error: unknown): OperationError {
  return new OperationError(operation, error);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
