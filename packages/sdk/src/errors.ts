/**
 * Error types for model repository operations
 *
 * Invariants:
 * - Every failure raised by the lifecycle sequence is a BadParameterError
 * - Messages name the offending path or value
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all model repository errors
 */
export abstract class ModelRepositoryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * What made a parameter or persisted state invalid
 */
export type BadParameterReason =
  | "repository-collision"
  | "not-writable"
  | "create-failed"
  | "fetch-failed"
  | "extract-failed"
  | "config-parse"
  | "config-convert"
  | "corresp-parse"
  | "invalid-option";

/**
 * Thrown when caller input or persisted repository state is invalid
 */
export class BadParameterError extends ModelRepositoryError {
  readonly code = "BAD_PARAM";

  constructor(
    message: string,
    public readonly reason: BadParameterReason,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown by archive fetchers when a single fetch attempt fails
 *
 * `status` is the response status, or -1 when no response arrived.
 */
export class FetchError extends ModelRepositoryError {
  readonly code = "FETCH_ERROR";

  constructor(
    public readonly source: string,
    public readonly status: number,
    options?: ErrorOptions
  ) {
    super(`Failed to fetch ${source} (status ${status})`, options);
  }
}
