/**
 * Error taxonomy shared by every component.
 * A cache miss is not an error: ResponseCache.get returns null.
 */

export type OrchestratorErrorCode =
  | "OVERLOADED"
  | "RESOURCE_EXHAUSTED"
  | "BACKEND_TIMEOUT"
  | "BACKEND_ERROR"
  | "PROBE_FAILURE"
  | "INVALID_QUERY"
  | "CAPTURE_FAILURE";

export class OrchestratorError extends Error {
  readonly code: OrchestratorErrorCode;
  readonly retryable: boolean;

  constructor(code: OrchestratorErrorCode, message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/** Scheduler queue is full; try again later or drop the request */
export class OverloadedError extends OrchestratorError {
  constructor(queueDepth: number) {
    super("OVERLOADED", `Request queue is full (${queueDepth} waiting)`, true);
  }
}

/** Pressure is too high to admit non-essential work */
export class ResourceExhaustedError extends OrchestratorError {
  constructor(pressure: string) {
    super("RESOURCE_EXHAUSTED", `Inference suspended at ${pressure} pressure`, false);
  }
}

export class BackendTimeoutError extends OrchestratorError {
  constructor(timeoutMs: number) {
    super("BACKEND_TIMEOUT", `No response chunk within ${timeoutMs}ms`, true);
  }
}

export class BackendError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_ERROR", message, false, options);
  }
}

export class ProbeFailureError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROBE_FAILURE", message, true, options);
  }
}

export class InvalidQueryError extends OrchestratorError {
  constructor(message: string) {
    super("INVALID_QUERY", message, false);
  }
}

export class CaptureError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CAPTURE_FAILURE", message, true, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything a collaborator threw into an OrchestratorError.
 * Unknown failures become BackendError.
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) {
    return error;
  }
  return new BackendError(errorMessage(error), { cause: error });
}
