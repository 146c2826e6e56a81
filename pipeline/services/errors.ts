export type PipelineErrorCode =
  | "fetch_failed"
  | "malformed_document"
  | "oracle_unavailable"
  | "oracle_rejected"
  | "malformed_oracle_output"
  | "dangling_placeholder"
  | "unresolved_zone"
  | "incomplete_translation"
  | "invalid_transition"
  | "cancelled"
  | "retry_exhausted"
  | "state_store_failed"
  | "unexpected";

interface PipelineErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: PipelineErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

export class FetchError extends PipelineError {
  readonly status: number | null;

  constructor(
    url: string,
    message: string,
    options: { status?: number | null; retryable?: boolean; cause?: unknown } = {},
  ) {
    super("fetch_failed", `Failed to fetch ${url}: ${message}`, {
      retryable: options.retryable,
      cause: options.cause,
    });
    this.name = "FetchError";
    this.status = options.status ?? null;
  }
}

export class MalformedDocumentError extends PipelineError {
  constructor(message: string) {
    super("malformed_document", message);
    this.name = "MalformedDocumentError";
  }
}

export class OracleUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("oracle_unavailable", message, { retryable: true, cause });
    this.name = "OracleUnavailableError";
  }
}

export class OracleRejectedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("oracle_rejected", message, { cause });
    this.name = "OracleRejectedError";
  }
}

export class MalformedOracleOutputError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("malformed_oracle_output", message, { retryable: true, cause });
    this.name = "MalformedOracleOutputError";
  }
}

export class DanglingPlaceholderError extends PipelineError {
  readonly token: string;

  constructor(token: string, reason: "unknown" | "duplicated") {
    super(
      "dangling_placeholder",
      reason === "unknown"
        ? `Placeholder ${token} does not belong to this document`
        : `Placeholder ${token} appears more than once in the translation`,
    );
    this.name = "DanglingPlaceholderError";
    this.token = token;
  }
}

export class UnresolvedZoneError extends PipelineError {
  readonly tokens: string[];

  constructor(tokens: string[]) {
    super(
      "unresolved_zone",
      `Protected content missing from translation: ${tokens.join(", ")}`,
    );
    this.name = "UnresolvedZoneError";
    this.tokens = tokens;
  }
}

export class IncompleteTranslationError extends PipelineError {
  constructor(message: string) {
    super("incomplete_translation", message);
    this.name = "IncompleteTranslationError";
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super("invalid_transition", `Invalid document transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Pipeline run cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

export class StateStoreError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("state_store_failed", message, { cause });
    this.name = "StateStoreError";
  }
}

export class RetryExhaustedError extends PipelineError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      "retry_exhausted",
      `Gave up after ${attempts} attempts: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export const isPipelineError = (error: unknown): error is PipelineError =>
  error instanceof PipelineError;

export const isRetryable = (error: unknown): boolean =>
  isPipelineError(error) && error.retryable;

export interface ErrorDescription {
  code: PipelineErrorCode;
  message: string;
}

export const describeError = (error: unknown): ErrorDescription => {
  if (isPipelineError(error)) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "unexpected", message: error.message };
  }
  return { code: "unexpected", message: String(error) };
};
