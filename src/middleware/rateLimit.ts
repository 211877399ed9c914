import { err, ok } from "../errors";
import type { RateLimitExceeded, Result } from "../errors";

export type Clock = () => number;

interface RateWindow {
  startedAt: number;
  count: number;
}

export interface RateLimitState {
  limit: number;
  remaining: number;
  /** Seconds until the current window resets. */
  resetSeconds: number;
}

/**
 * Fixed-window counter per caller. A caller can burst up to twice the limit across a
 * window boundary.
 *
 * `admit` reads and writes the window without yielding to the event loop, so two
 * concurrent requests from the same caller can never both observe the same count.
 */
export class FixedWindowRateLimiter {
  private windows = new Map<string, RateWindow>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number,
    private readonly clock: Clock = Date.now,
  ) {
    if (limit < 1 || windowMs <= 0) {
      throw new RangeError("Rate limit and window must be positive");
    }
  }

  admit(key: string, now: number = this.clock()): Result<RateLimitState, RateLimitExceeded> {
    let window = this.windows.get(key);

    if (!window || now - window.startedAt >= this.windowMs) {
      window = { startedAt: now, count: 0 };
      this.windows.set(key, window);
    }

    window.count += 1;
    const resetSeconds = Math.max(0, Math.ceil((window.startedAt + this.windowMs - now) / 1000));

    if (window.count > this.limit) {
      return err({
        kind: "rate_limited",
        message: `Rate limit exceeded: ${this.limit} requests per ${this.describeWindow()}`,
        retryAfterSeconds: Math.max(1, resetSeconds),
      });
    }

    return ok({
      limit: this.limit,
      remaining: this.limit - window.count,
      resetSeconds,
    });
  }

  /** Drops windows that have elapsed. Returns how many were removed. */
  sweep(now: number = this.clock()): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (now - window.startedAt >= this.windowMs) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.windows.size;
  }

  private describeWindow(): string {
    const seconds = this.windowMs / 1000;
    if (seconds === 60) return "minute";
    if (seconds === 3600) return "hour";
    if (seconds === 1) return "second";
    return `${seconds} seconds`;
  }
}

export interface ClientAddressSource {
  header(name: string): string | undefined;
  socketAddress?: string;
}

export function resolveClientAddress(source: ClientAddressSource, trustProxy: boolean): string {
  if (trustProxy) {
    const forwarded = source.header("x-forwarded-for")?.split(",")[0]?.trim();
    if (forwarded) {
      return forwarded;
    }
  }
  return source.socketAddress || "unknown";
}
