/**
 * Error taxonomy. Fetcher-level errors (SourceUnavailableError, ParseError) are
 * absorbed by the orchestrator; the rest surface to callers.
 */

export type LedgerErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "PARSE_ERROR"
  | "INVALID_CONFIGURATION"
  | "INVALID_PREDICTION"
  | "CONTRACT_VIOLATION"
  | "BATCH_ABORTED";

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-OK status after retries were exhausted. */
export class SourceUnavailableError extends LedgerError {
  readonly code = "SOURCE_UNAVAILABLE";

  constructor(
    readonly url: string,
    readonly attempts: number,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A response arrived but could not be understood. Not retried. */
export class ParseError extends LedgerError {
  readonly code = "PARSE_ERROR";

  constructor(
    readonly origin: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class InvalidConfigurationError extends LedgerError {
  readonly code = "INVALID_CONFIGURATION";

  constructor(
    readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid configuration: ${issues.join("; ")}`, options);
  }
}

/** A prediction that cannot be scored (zero target, empty window, unit mismatch). */
export class InvalidPredictionError extends LedgerError {
  readonly code = "INVALID_PREDICTION";

  constructor(
    readonly metric: string,
    readonly reason: string
  ) {
    super(`Invalid prediction "${metric}": ${reason}`);
  }
}

export class ContractViolationError extends LedgerError {
  readonly code = "CONTRACT_VIOLATION";
}

export class BatchAbortedError extends LedgerError {
  readonly code = "BATCH_ABORTED";

  constructor(readonly operation: string) {
    super(`Batch ${operation} was abandoned by the caller`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
