export type ErrorCode =
  | "plan-empty"
  | "invalid-field"
  | "read-only-request"
  | "retrieval-timeout"
  | "retrieval-failed"
  | "stale-index-entry"
  | "no-evidence"
  | "model-unavailable"
  | "insufficient-grounded-evidence";

/** Refusals caused by the question itself rather than by the data or the services. */
export const REQUEST_SHAPED_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(["plan-empty", "invalid-field", "read-only-request"]);

const USER_MESSAGES: Record<ErrorCode, string> = {
  "plan-empty": "I need a question about inspection records to answer.",
  "invalid-field": "That question refers to a field the inspection records do not have.",
  "read-only-request": "I can only provide read-only inspection data.",
  "retrieval-timeout": "Inspection data took too long to load. Please try again.",
  "retrieval-failed": "Inspection data is temporarily unavailable. Please try again later.",
  "stale-index-entry": "A matching record is no longer available.",
  "no-evidence": "No matching inspection records were found.",
  "model-unavailable": "The answering service is temporarily unavailable. Please try again later.",
  "insufficient-grounded-evidence":
    "I could not produce an answer that is fully supported by the matching inspection records."
};

export function userMessageFor(code: ErrorCode): string {
  return USER_MESSAGES[code];
}

export class EngineError extends Error {
  readonly code: ErrorCode;

  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string = userMessageFor(code), options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "EngineError";
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** Raised at startup when adapters and configuration disagree. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TimeoutError extends Error {
  readonly label: string;

  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export class AbortError extends Error {
  constructor(message = "Request was cancelled") {
    super(message);
    this.name = "AbortError";
  }
}

export function isAbortError(error: unknown): error is AbortError {
  return error instanceof AbortError;
}

/** Maps an adapter failure on a retrieval path to the engine taxonomy. */
export function toRetrievalError(error: unknown, label: string): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new EngineError("retrieval-timeout", undefined, { retryable: true, cause: error });
  }
  return new EngineError("retrieval-failed", `${label} failed`, { retryable: true, cause: error });
}
