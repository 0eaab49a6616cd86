import { describe, it, expect } from "vitest";
import { APICallError, RetryError } from "ai";
import {
  classifyGenerationError,
  errorMessage,
  ExhaustedRetriesError,
  isTransientError,
  RemoteError,
  ThrottledError,
  TimeoutError,
} from "../errors";

function apiError(statusCode: number, message: string, headers?: Record<string, string>) {
  return new APICallError({
    message,
    url: "https://api.example.test/v1/generate",
    requestBodyValues: {},
    statusCode,
    responseHeaders: headers,
  });
}

describe("classifyGenerationError", () => {
  describe("typed status codes", () => {
    it("maps 429 to ThrottledError with the retry-after header", () => {
      const result = classifyGenerationError(apiError(429, "Too Many Requests", { "retry-after": "12" }));

      expect(result).toBeInstanceOf(ThrottledError);
      if (!(result instanceof ThrottledError)) return;
      expect(result.statusCode).toBe(429);
      expect(result.retryAfterMs).toBe(12_000);
      expect(result.message).toBe("Too Many Requests");
    });

    it("maps an overloaded 503 to ThrottledError", () => {
      const result = classifyGenerationError(apiError(503, "The model is overloaded. Please try again later."));

      expect(result).toBeInstanceOf(ThrottledError);
      if (!(result instanceof ThrottledError)) return;
      expect(result.statusCode).toBe(503);
      expect(result.retryAfterMs).toBeUndefined();
    });

    it("maps 529 to ThrottledError", () => {
      expect(classifyGenerationError(apiError(529, "Overloaded"))).toBeInstanceOf(ThrottledError);
    });

    it("maps 408 and 504 to TimeoutError", () => {
      expect(classifyGenerationError(apiError(408, "Request Timeout"))).toBeInstanceOf(TimeoutError);
      expect(classifyGenerationError(apiError(504, "Gateway Timeout"))).toBeInstanceOf(TimeoutError);
    });

    it("maps other statuses to RemoteError even when the text mentions a quota", () => {
      const result = classifyGenerationError(apiError(400, "Invalid quota project"));

      expect(result).toBeInstanceOf(RemoteError);
      if (!(result instanceof RemoteError)) return;
      expect(result.statusCode).toBe(400);
    });

    it("reads a retry hint from the message when there is no header", () => {
      const result = classifyGenerationError(apiError(429, "Quota exceeded. Please retry in 1.5s."));

      expect(result).toBeInstanceOf(ThrottledError);
      if (!(result instanceof ThrottledError)) return;
      expect(result.retryAfterMs).toBe(1500);
    });

    it("keeps the original error as cause", () => {
      const original = apiError(503, "Service Unavailable");
      expect(classifyGenerationError(original).cause).toBe(original);
    });
  });

  it("unwraps the SDK's RetryError to its last error", () => {
    const wrapped = new RetryError({
      message: "Failed after 3 attempts",
      reason: "maxRetriesExceeded",
      errors: [apiError(500, "Internal"), apiError(429, "Too Many Requests")],
    });

    expect(classifyGenerationError(wrapped)).toBeInstanceOf(ThrottledError);
  });

  it("treats aborted requests as timeouts", () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";

    expect(classifyGenerationError(aborted)).toBeInstanceOf(TimeoutError);
  });

  describe("message fallback", () => {
    it.each([
      "429 Too Many Requests",
      "RESOURCE_EXHAUSTED: generate_content_free_tier_requests",
      "You exceeded your current quota",
      "Rate limit reached for requests",
    ])("classifies %j as throttling", (message) => {
      expect(classifyGenerationError(new Error(message))).toBeInstanceOf(ThrottledError);
    });

    it.each(["Request timed out", "connect ETIMEDOUT 10.0.0.1:443", "Deadline exceeded"])(
      "classifies %j as a timeout",
      (message) => {
        expect(classifyGenerationError(new Error(message))).toBeInstanceOf(TimeoutError);
      }
    );

    it("takes the retry hint from the message", () => {
      const result = classifyGenerationError(new Error("RESOURCE_EXHAUSTED. Please retry in 12s."));

      expect(result).toBeInstanceOf(ThrottledError);
      if (!(result instanceof ThrottledError)) return;
      expect(result.retryAfterMs).toBe(12_000);
    });

    it("falls back to RemoteError", () => {
      const result = classifyGenerationError(new Error("Invalid argument"));
      expect(result).toBeInstanceOf(RemoteError);
      expect(result.message).toBe("Invalid argument");
    });

    it("handles thrown non-errors", () => {
      const result = classifyGenerationError("boom");
      expect(result).toBeInstanceOf(RemoteError);
      expect(result.message).toBe("boom");
    });
  });

  it("returns already classified errors as they are", () => {
    const throttled = new ThrottledError("slow down");
    expect(classifyGenerationError(throttled)).toBe(throttled);
  });
});

describe("isTransientError", () => {
  it("accepts throttling and timeouts only", () => {
    expect(isTransientError(new ThrottledError("x"))).toBe(true);
    expect(isTransientError(new TimeoutError("x"))).toBe(true);
    expect(isTransientError(new RemoteError("x"))).toBe(false);
    expect(isTransientError(new Error("429"))).toBe(false);
  });
});

describe("ExhaustedRetriesError", () => {
  it("names the attempt count and the last error", () => {
    const last = new TimeoutError("timed out");
    const error = new ExhaustedRetriesError(5, last);

    expect(error.name).toBe("ExhaustedRetriesError");
    expect(error.message).toBe("Gave up after 5 attempts: timed out");
    expect(error.cause).toBe(last);
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error and stringifies anything else", () => {
    expect(errorMessage(new Error("broken"))).toBe("broken");
    expect(errorMessage(42)).toBe("42");
  });
});
