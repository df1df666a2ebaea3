import { sleep as defaultSleep, type Sleep } from "../time/sleep";

export type RateLimiterOptions = {
  maxRequests: number;
  windowMs: number;
  pollIntervalMs: number;
  now?: () => number;
  sleep?: Sleep;
};

export const defaultRateLimiterOptions = {
  maxRequests: 3,
  windowMs: 10000,
  pollIntervalMs: 500
} as const;

export type RateLimitSnapshot = { inWindow: number; limit: number; windowMs: number };

/**
 * Sliding-window admission control shared by every upstream caller in the process.
 *
 * Checking and recording are separate steps: call `recordRequest()` right after the
 * permitted call. Callers that pass `canProceed()` concurrently, before anyone records,
 * can over-admit; the limit is a soft ceiling.
 */
export class SlidingWindowRateLimiter {
  private requestTimes: number[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    const { maxRequests, windowMs, pollIntervalMs } = { ...defaultRateLimiterOptions, ...options };
    if (!Number.isInteger(maxRequests) || maxRequests < 1) {
      throw new Error("maxRequests must be an integer >= 1");
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new Error("windowMs must be > 0");
    }
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new Error("pollIntervalMs must be > 0");
    }

    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.pollIntervalMs = pollIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  canProceed(): boolean {
    this.prune(this.now());
    return this.requestTimes.length < this.maxRequests;
  }

  recordRequest(): void {
    this.requestTimes.push(this.now());
  }

  /**
   * Polls until a request is permitted or `signal` aborts. Does not record.
   */
  async awaitTurn(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted && !this.canProceed()) {
      await this.sleep(this.pollIntervalMs, signal);
    }
  }

  snapshot(): RateLimitSnapshot {
    this.prune(this.now());
    return { inWindow: this.requestTimes.length, limit: this.maxRequests, windowMs: this.windowMs };
  }

  private prune(now: number): void {
    this.requestTimes = this.requestTimes.filter((t) => now - t < this.windowMs);
  }
}
