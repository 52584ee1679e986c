/**
 * Minimum-interval throttle for outbound search requests, with exponential
 * backoff after throttling responses. Not a concurrency limiter: concurrent
 * callers are spaced `retryAfter` apart, one slot each.
 */

import { resolveRateLimitConfig } from "../config";
import type { RateLimitConfig } from "../config";
import { RateLimitAbortedError } from "../errors";

export type Clock = () => number;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RateLimitAbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly clock: Clock;
  private lastRequest: number;
  private retryAfter: number;

  constructor(config: Partial<RateLimitConfig> = {}, clock: Clock = () => Date.now()) {
    this.config = resolveRateLimitConfig(config);
    this.clock = clock;
    this.lastRequest = clock();
    this.retryAfter = this.config.initialDelayMs;
  }

  /**
   * Resolve once `retryAfter` has passed since the previous slot, then claim
   * the slot. Rejects with RateLimitAbortedError if `signal` aborts first; an
   * aborted wait gives its slot back.
   */
  async waitForSlot(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RateLimitAbortedError(signal.reason);
    }

    const now = this.clock();
    const previous = this.lastRequest;
    const slot = Math.max(now, previous + this.retryAfter);
    this.lastRequest = slot;

    const delay = slot - now;
    if (delay <= 0) return;

    try {
      await sleep(delay, signal);
    } catch (err) {
      if (this.lastRequest === slot) this.lastRequest = previous;
      throw err;
    }
  }

  /**
   * Multiply the delay by the retry multiplier, capped at the maximum.
   * Returns the new delay.
   */
  handleTooManyRequests(): number {
    this.retryAfter = Math.min(this.retryAfter * this.config.retryMultiplier, this.config.maxDelayMs);
    return this.retryAfter;
  }

  reset(): void {
    this.retryAfter = this.config.initialDelayMs;
  }

  getRetryAfter(): number {
    return this.retryAfter;
  }
}
