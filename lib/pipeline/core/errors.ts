import { APICallError, RetryError } from "ai";

// ============================================================================
// Error taxonomy
// ============================================================================

/** The remote service rejected the call because of a rate limit or quota */
export class ThrottledError extends Error {
  readonly name = "ThrottledError";
  readonly statusCode?: number;
  /** Delay suggested by the service, if it sent one */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { statusCode?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class TimeoutError extends Error {
  readonly name = "TimeoutError";

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
  }
}

/** Any other failure: bad request, authentication, unsupported content */
export class RemoteError extends Error {
  readonly name = "RemoteError";
  readonly statusCode?: number;

  constructor(
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode;
  }
}

export class ExhaustedRetriesError extends Error {
  readonly name = "ExhaustedRetriesError";
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
    this.attempts = attempts;
  }
}

export type GenerationError = ThrottledError | TimeoutError | RemoteError;

// ============================================================================
// Classification
// ============================================================================

// 503 is how Gemini reports an overloaded model
const THROTTLE_STATUS = new Set([429, 503, 529]);
const TIMEOUT_STATUS = new Set([408, 504]);

const THROTTLE_PATTERNS = [/\b429\b/, /RESOURCE_EXHAUSTED/, /quota/i, /rate.?limit/i];
const TIMEOUT_PATTERNS = [/timed?\s?out/i, /ETIMEDOUT/, /deadline exceeded/i];

/**
 * Map any error thrown by a transport onto the taxonomy.
 *
 * Typed status codes win. Message matching is only used when the error
 * carries no status.
 */
export function classifyGenerationError(error: unknown): GenerationError {
  if (
    error instanceof ThrottledError ||
    error instanceof TimeoutError ||
    error instanceof RemoteError
  ) {
    return error;
  }

  if (RetryError.isInstance(error)) {
    return classifyGenerationError(error.lastError);
  }

  const message = errorMessage(error);

  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    const { statusCode } = error;
    if (THROTTLE_STATUS.has(statusCode)) {
      return new ThrottledError(message, {
        statusCode,
        retryAfterMs:
          parseRetryAfterHeader(error.responseHeaders) ?? parseRetryHint(message),
        cause: error,
      });
    }
    if (TIMEOUT_STATUS.has(statusCode)) {
      return new TimeoutError(message, { cause: error });
    }
    return new RemoteError(message, { statusCode, cause: error });
  }

  if (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  ) {
    return new TimeoutError(message, { cause: error });
  }

  if (THROTTLE_PATTERNS.some((p) => p.test(message))) {
    return new ThrottledError(message, {
      retryAfterMs: parseRetryHint(message),
      cause: error,
    });
  }
  if (TIMEOUT_PATTERNS.some((p) => p.test(message))) {
    return new TimeoutError(message, { cause: error });
  }

  return new RemoteError(message, { cause: error });
}

/** Default retry classifier: throttling and timeouts are transient */
export function isTransientError(error: unknown): boolean {
  return error instanceof ThrottledError || error instanceof TimeoutError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Helpers
// ============================================================================

function parseRetryAfterHeader(
  headers: Record<string, string> | undefined
): number | undefined {
  const value = headers?.["retry-after"];
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) && seconds >= 0
    ? Math.ceil(seconds * 1000)
    : undefined;
}

/** Gemini puts the suggested delay in the message: "Please retry in 37.2s" */
function parseRetryHint(message: string): number | undefined {
  const match = message.match(/retry in (\d+(?:\.\d+)?)\s*s/i);
  if (!match) return undefined;
  return Math.ceil(Number.parseFloat(match[1]) * 1000);
}
