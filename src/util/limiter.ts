import { sleep, type Clock } from "./timing.js";

export type LimiterOptions = {
  /** Sustained requests per second. */
  rps?: number;
  /** Upper bound for a single `take()` wait. */
  maxWaitMs?: number;
  now?: Clock;
};

export class TokenBucketLimiter {
  private capacity: number;
  private tokens: number;
  private refillRatePerSec: number;
  private maxWaitMs: number;
  private now: Clock;
  private last: number;

  constructor({ rps = 5, maxWaitMs = 2000, now = Date.now }: LimiterOptions = {}) {
    this.capacity = Math.max(1, rps);
    this.tokens = this.capacity;
    this.refillRatePerSec = Math.max(0.001, rps);
    this.maxWaitMs = maxWaitMs;
    this.now = now;
    this.last = now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);
  }

  tryTake(): boolean {
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Waits for a token; resolves false when none frees up within `maxWaitMs`. */
  async take(): Promise<boolean> {
    const deadline = this.now() + this.maxWaitMs;
    while (!this.tryTake()) {
      const remaining = deadline - this.now();
      if (remaining <= 0) return false;
      const untilNext = ((1 - this.tokens) / this.refillRatePerSec) * 1000;
      await sleep(Math.max(1, Math.min(remaining, untilNext)));
    }
    return true;
  }
}
