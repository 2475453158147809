export const ErrorCodes = {
  MALFORMED_RECORD: "MALFORMED_RECORD",
  INPUT_TOO_LONG: "INPUT_TOO_LONG",
  INVALID_FILTER: "INVALID_FILTER",
  INVALID_QUESTION: "INVALID_QUESTION",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
  RATE_LIMITED: "RATE_LIMITED",
  REQUEST_TIMEOUT: "REQUEST_TIMEOUT",
  UPSTREAM_UNAVAILABLE: "UPSTREAM_UNAVAILABLE",
  AUTHENTICATION_FAILED: "AUTHENTICATION_FAILED",
  UPSTREAM_REQUEST_FAILED: "UPSTREAM_REQUEST_FAILED",
  DIMENSION_MISMATCH: "DIMENSION_MISMATCH",
  EMBEDDING_MODEL_MISMATCH: "EMBEDDING_MODEL_MISMATCH",
  RETRIEVAL_FAILED: "RETRIEVAL_FAILED",
  INDEX_WRITE_FAILED: "INDEX_WRITE_FAILED",
  CONTENT_FILTERED: "CONTENT_FILTERED",
  ANSWER_GENERATION_FAILED: "ANSWER_GENERATION_FAILED",
  CANCELLED: "CANCELLED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for every failure the pipelines raise on purpose.
 *
 * `transient` marks errors that the retry policy may try again (service outages,
 * rate limits, timeouts). Everything else is surfaced immediately.
 */
export class FuelQaError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly transient: boolean = false,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class MalformedRecordError extends FuelQaError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, ErrorCodes.MALFORMED_RECORD, false, { issues });
  }
}

export class InputTooLongError extends FuelQaError {
  constructor(
    public readonly length: number | null,
    public readonly limit: number | null,
  ) {
    super(
      length !== null && limit !== null
        ? `Input is ${length} characters, the model accepts at most ${limit}.`
        : "Input exceeds the model's input limit.",
      ErrorCodes.INPUT_TOO_LONG,
      false,
      { length, limit },
    );
  }
}

export class InvalidFilterError extends FuelQaError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_FILTER);
  }
}

export class InvalidQuestionError extends FuelQaError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_QUESTION);
  }
}

export class ServiceUnavailableError extends FuelQaError {
  constructor(service: string, detail: string, options?: { cause?: unknown }) {
    super(
      `${service} is unavailable: ${detail}`,
      ErrorCodes.SERVICE_UNAVAILABLE,
      true,
      { service },
      options,
    );
  }
}

export class RateLimitedError extends FuelQaError {
  constructor(
    service: string,
    public readonly retryAfterMs: number | null,
  ) {
    super(`${service} rate limit reached.`, ErrorCodes.RATE_LIMITED, true, {
      service,
      retryAfterMs,
    });
  }
}

export class RequestTimeoutError extends FuelQaError {
  constructor(service: string, timeoutMs: number) {
    super(
      `${service} did not respond within ${timeoutMs}ms.`,
      ErrorCodes.REQUEST_TIMEOUT,
      true,
      { service, timeoutMs },
    );
  }
}

export class UpstreamUnavailableError extends FuelQaError {
  constructor(
    operation: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      ErrorCodes.UPSTREAM_UNAVAILABLE,
      false,
      { operation, attempts },
      { cause },
    );
  }
}

export class AuthenticationFailedError extends FuelQaError {
  constructor(service: string) {
    super(
      `${service} rejected the configured credentials.`,
      ErrorCodes.AUTHENTICATION_FAILED,
      false,
      { service },
    );
  }
}

export class UpstreamRequestError extends FuelQaError {
  constructor(service: string, status: number, detail: string) {
    super(
      `${service} request failed (${status}): ${detail}`,
      ErrorCodes.UPSTREAM_REQUEST_FAILED,
      false,
      { service, status },
    );
  }
}

export class DimensionMismatchError extends FuelQaError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Vector dimension ${actual} does not match index dimension ${expected}.`,
      ErrorCodes.DIMENSION_MISMATCH,
      false,
      { expected, actual },
    );
  }
}

export class EmbeddingModelMismatchError extends FuelQaError {
  constructor(
    public readonly indexModel: string,
    public readonly clientModel: string,
  ) {
    super(
      `Index was built with embedding model "${indexModel}" but "${clientModel}" is configured.`,
      ErrorCodes.EMBEDDING_MODEL_MISMATCH,
      false,
      { indexModel, clientModel },
    );
  }
}

export class RetrievalFailedError extends FuelQaError {
  constructor(cause: unknown) {
    super(
      `Vector index retrieval failed: ${errorMessage(cause)}`,
      ErrorCodes.RETRIEVAL_FAILED,
      false,
      undefined,
      { cause },
    );
  }
}

/** The index could not store a change; the change was not applied. */
export class IndexWriteFailedError extends FuelQaError {
  constructor(location: string, cause: unknown) {
    super(
      `Vector index write to ${location} failed: ${errorMessage(cause)}`,
      ErrorCodes.INDEX_WRITE_FAILED,
      false,
      { location },
      { cause },
    );
  }
}

export class ContentFilteredError extends FuelQaError {
  constructor(service: string) {
    super(
      `${service} refused to answer because of its content policy.`,
      ErrorCodes.CONTENT_FILTERED,
      false,
      { service },
    );
  }
}

export interface PartialQueryContext {
  question: string;
  evidenceIds: string[];
  context: string;
}

export class AnswerGenerationError extends FuelQaError {
  public readonly reason: ErrorCode;

  constructor(
    cause: unknown,
    public readonly partial: PartialQueryContext,
  ) {
    const reason = cause instanceof FuelQaError ? cause.code : ErrorCodes.ANSWER_GENERATION_FAILED;
    super(
      `Answer generation failed: ${errorMessage(cause)}`,
      ErrorCodes.ANSWER_GENERATION_FAILED,
      false,
      { reason, evidenceIds: partial.evidenceIds },
      { cause },
    );
    this.reason = reason;
  }
}

export class OperationCancelledError extends FuelQaError {
  constructor(operation: string) {
    super(`${operation} was cancelled.`, ErrorCodes.CANCELLED);
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof FuelQaError && error.transient;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

export interface FailureDescription {
  kind: "service_error" | "invalid_request" | "cancelled";
  code: string;
  message: string;
}

const INVALID_REQUEST_CODES = new Set<string>([
  ErrorCodes.MALFORMED_RECORD,
  ErrorCodes.INPUT_TOO_LONG,
  ErrorCodes.INVALID_FILTER,
  ErrorCodes.INVALID_QUESTION,
]);

/**
 * Turns any failure into the refusal shown to a user. A question that simply
 * matches nothing is an answer, not a failure, so it never passes through here.
 */
export function describeFailure(error: unknown): FailureDescription {
  if (!(error instanceof FuelQaError)) {
    return {
      kind: "service_error",
      code: "INTERNAL_ERROR",
      message: `Service error, try again later. (${errorMessage(error)})`,
    };
  }

  if (error.code === ErrorCodes.CANCELLED) {
    return { kind: "cancelled", code: error.code, message: error.message };
  }

  if (INVALID_REQUEST_CODES.has(error.code)) {
    return {
      kind: "invalid_request",
      code: error.code,
      message: `The request could not be processed: ${error.message}`,
    };
  }

  if (error instanceof AnswerGenerationError && error.reason === ErrorCodes.CONTENT_FILTERED) {
    return {
      kind: "service_error",
      code: error.reason,
      message: "The language model declined to answer this question.",
    };
  }

  const code = error instanceof AnswerGenerationError ? error.reason : error.code;
  return {
    kind: "service_error",
    code,
    message: `Service error, try again later. (${error.message})`,
  };
}
