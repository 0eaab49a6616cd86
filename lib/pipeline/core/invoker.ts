/**
 * Rate-limited invoker.
 *
 * Every remote generation call in the pipeline goes through one of these.
 * It adds two things on top of a TextGenerator:
 * - bounded fixed-wait retry on throttling and timeouts (see withRetry)
 * - a minimum spacing between the start of any two calls, retries included
 */

import type { Clock, RetryPolicy, TextGenerator } from "./types";
import { systemClock } from "./types";
import { classifyGenerationError } from "./errors";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryEvent } from "./retry";

export const DEFAULT_SPACING_MS = 4_000;

export interface InvokerRetryEvent extends RetryEvent {
  modelId: string;
}

export interface RateLimitedInvokerOptions {
  generator: TextGenerator;
  spacingMs?: number;
  clock?: Clock;
  defaultPolicy?: RetryPolicy;
}

export interface InvokeOptions {
  /** Called before each wait between attempts */
  onRetry?: (event: InvokerRetryEvent) => void;
}

export class RateLimitedInvoker {
  private readonly generator: TextGenerator;
  private readonly spacingMs: number;
  private readonly clock: Clock;
  private readonly defaultPolicy: RetryPolicy;

  private lastCallAt: number | null = null;
  /** Tail of the chain that serializes access to lastCallAt */
  private slot: Promise<void> = Promise.resolve();

  constructor(options: RateLimitedInvokerOptions) {
    this.generator = options.generator;
    this.spacingMs = Math.max(0, options.spacingMs ?? DEFAULT_SPACING_MS);
    this.clock = options.clock ?? systemClock;
    this.defaultPolicy = options.defaultPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Perform one logical generation call.
   *
   * Transport errors are classified before the policy sees them, so a
   * policy predicate only has to recognise the typed errors.
   */
  invoke(
    modelId: string,
    prompt: string,
    policy?: RetryPolicy,
    options: InvokeOptions = {}
  ): Promise<string> {
    return withRetry(
      policy ?? this.defaultPolicy,
      async () => {
        await this.acquireSlot();
        try {
          return await this.generator.generate(modelId, prompt);
        } catch (err) {
          throw classifyGenerationError(err);
        }
      },
      {
        sleep: (ms) => this.clock.sleep(ms),
        onRetry: (event) => options.onRetry?.({ ...event, modelId }),
      }
    );
  }

  /**
   * Wait until spacingMs has passed since the previous call started, then
   * stamp the clock. Callers queue on `slot`, so the read-wait-write on
   * lastCallAt never interleaves.
   */
  private acquireSlot(): Promise<void> {
    const turn = this.slot.then(async () => {
      if (this.lastCallAt !== null) {
        const waitMs = this.lastCallAt + this.spacingMs - this.clock.now();
        if (waitMs > 0) await this.clock.sleep(waitMs);
      }
      this.lastCallAt = this.clock.now();
    });
    this.slot = turn.catch(() => undefined);
    return turn;
  }
}
