import type { JobStatus } from "../enums/job.status";

export type JobErrorCode =
  | "VALIDATION_ERROR"
  | "TRANSIENT_ENGINE_ERROR"
  | "FATAL_ENGINE_ERROR"
  | "NOT_FOUND"
  | "ILLEGAL_TRANSITION";

export abstract class JobError extends Error {
  abstract readonly code: JobErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad configuration or input; the job fails before any segment runs. */
export class ValidationError extends JobError {
  readonly code = "VALIDATION_ERROR";
}

/** A single engine call failed and may succeed if retried. */
export class TransientEngineError extends JobError {
  readonly code = "TRANSIENT_ENGINE_ERROR";
}

/** The engine cannot produce a result for this job; never retried. */
export class FatalEngineError extends JobError {
  readonly code = "FATAL_ENGINE_ERROR";
}

export class NotFoundError extends JobError {
  readonly code = "NOT_FOUND";
}

export class IllegalTransitionError extends JobError {
  readonly code = "ILLEGAL_TRANSITION";

  constructor(
    readonly jobId: string,
    readonly currentStatus: JobStatus,
    readonly requested: string
  ) {
    super(`Cannot ${requested} job ${jobId} while it is ${currentStatus}`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
