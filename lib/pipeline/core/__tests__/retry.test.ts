import { describe, it, expect, vi } from "vitest";
import { createRetryPolicy, DEFAULT_RETRY_POLICY, withRetry } from "../retry";
import {
  ExhaustedRetriesError,
  RemoteError,
  ThrottledError,
  TimeoutError,
} from "../errors";

function recordingSleep() {
  const sleeps: number[] = [];
  const sleep = (ms: number) => {
    sleeps.push(ms);
    return Promise.resolve();
  };
  return { sleeps, sleep };
}

describe("createRetryPolicy", () => {
  it("defaults to 5 attempts 40 s apart on transient errors", () => {
    expect(DEFAULT_RETRY_POLICY.maxAttempts).toBe(5);
    expect(DEFAULT_RETRY_POLICY.waitMs).toBe(40_000);
    expect(DEFAULT_RETRY_POLICY.isRetryable(new ThrottledError("slow down"))).toBe(true);
    expect(DEFAULT_RETRY_POLICY.isRetryable(new TimeoutError("timed out"))).toBe(true);
    expect(DEFAULT_RETRY_POLICY.isRetryable(new RemoteError("bad request"))).toBe(false);
  });

  it("keeps overrides", () => {
    const policy = createRetryPolicy({ maxAttempts: 2, waitMs: 10 });
    expect(policy.maxAttempts).toBe(2);
    expect(policy.waitMs).toBe(10);
  });
});

describe("withRetry", () => {
  it("returns the first success without waiting", async () => {
    const { sleeps, sleep } = recordingSleep();
    const operation = vi.fn(async () => "ok");

    const result = await withRetry(createRetryPolicy(), operation, { sleep });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it("makes exactly maxAttempts calls when every call is throttled", async () => {
    const { sleeps, sleep } = recordingSleep();
    const operation = vi.fn(async (): Promise<string> => {
      throw new ThrottledError("quota exceeded");
    });

    const policy = createRetryPolicy({ maxAttempts: 3, waitMs: 1000 });
    const error = await withRetry(policy, operation, { sleep }).catch((e: unknown) => e);

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([1000, 1000]);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    if (!(error instanceof ExhaustedRetriesError)) return;
    expect(error.attempts).toBe(3);
    expect(error.message).toBe("Gave up after 3 attempts: quota exceeded");
    expect(error.cause).toBeInstanceOf(ThrottledError);
  });

  it("passes the 1-based attempt number to the operation", async () => {
    const { sleep } = recordingSleep();
    const seen: number[] = [];

    await withRetry(
      createRetryPolicy({ maxAttempts: 5, waitMs: 1 }),
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 3) throw new TimeoutError("timed out");
        return attempt;
      },
      { sleep }
    );

    expect(seen).toEqual([1, 2, 3]);
  });

  it("propagates a non-retryable error unchanged after one call", async () => {
    const { sleeps, sleep } = recordingSleep();
    const original = new RemoteError("invalid api key", { statusCode: 401 });
    const operation = vi.fn(async (): Promise<string> => {
      throw original;
    });

    await expect(withRetry(createRetryPolicy(), operation, { sleep })).rejects.toBe(original);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it("waits the service-suggested delay when it is longer than the fixed wait", async () => {
    const { sleeps, sleep } = recordingSleep();
    let calls = 0;

    await withRetry(
      createRetryPolicy({ maxAttempts: 3, waitMs: 40_000 }),
      async () => {
        calls++;
        if (calls === 1) throw new ThrottledError("slow down", { retryAfterMs: 60_000 });
        if (calls === 2) throw new ThrottledError("slow down", { retryAfterMs: 1_000 });
        return "ok";
      },
      { sleep }
    );

    expect(sleeps).toEqual([60_000, 40_000]);
  });

  it("reports each retry before waiting", async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const failure = new ThrottledError("busy");
    let calls = 0;

    await withRetry(
      createRetryPolicy({ maxAttempts: 4, waitMs: 500 }),
      async () => {
        if (++calls < 3) throw failure;
        return "done";
      },
      { sleep, onRetry }
    );

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, {
      attempt: 1,
      maxAttempts: 4,
      delayMs: 500,
      error: failure,
    });
    expect(onRetry).toHaveBeenNthCalledWith(2, {
      attempt: 2,
      maxAttempts: 4,
      delayMs: 500,
      error: failure,
    });
  });

  it("treats maxAttempts below 1 as a single attempt", async () => {
    const { sleep } = recordingSleep();
    const operation = vi.fn(async (): Promise<string> => {
      throw new ThrottledError("busy");
    });

    const policy = createRetryPolicy({ maxAttempts: 0 });
    await expect(withRetry(policy, operation, { sleep })).rejects.toThrow(
      "Gave up after 1 attempt: busy"
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("uses a custom retry predicate", async () => {
    const { sleep } = recordingSleep();
    const policy = createRetryPolicy({
      maxAttempts: 2,
      waitMs: 1,
      isRetryable: (err) => err instanceof RemoteError,
    });
    const operation = vi.fn(async (): Promise<string> => {
      throw new RemoteError("flaky");
    });

    await expect(withRetry(policy, operation, { sleep })).rejects.toBeInstanceOf(
      ExhaustedRetriesError
    );
    expect(operation).toHaveBeenCalledTimes(2);
  });
});
