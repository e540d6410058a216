import { setTimeout as sleep } from "node:timers/promises";

export interface TokenBucketConfig {
  capacity: number;
  /** Milliseconds to refill one token. */
  refillIntervalMs: number;
}

/**
 * In-process token bucket: refills whole tokens from elapsed time, then consumes.
 * `take` waits for the next token instead of rejecting.
 */
export class TokenBucket {
  private tokens: number;
  private last: number;

  constructor(
    private config: TokenBucketConfig,
    private now: () => number = Date.now,
  ) {
    this.tokens = config.capacity;
    this.last = now();
  }

  /** Returns 0 when a token was consumed, else ms until the next token. */
  tryTake(): number {
    const now = this.now();
    const elapsed = Math.max(now - this.last, 0);
    const refill = Math.floor(elapsed / this.config.refillIntervalMs);
    this.tokens = Math.min(this.config.capacity, this.tokens + refill);
    this.last = this.tokens === this.config.capacity
      ? now
      : this.last + refill * this.config.refillIntervalMs;

    if (this.tokens > 0) {
      this.tokens -= 1;
      return 0;
    }
    return this.config.refillIntervalMs - (now - this.last);
  }

  async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const waitMs = this.tryTake();
      if (waitMs <= 0) return;
      await sleep(waitMs, undefined, { signal });
    }
  }

  available(): number {
    return this.tokens;
  }
}
