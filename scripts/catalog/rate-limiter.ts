export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

type HeaderBag = Record<string, string | number | undefined>;

export interface RateLimiterOptions {
  threshold?: number;
  marginMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Pre-emptive pacing from the x-ratelimit-* headers of every response: once the
 * remaining budget drops below the threshold, the next request waits for the reset.
 */
export class RateLimiter {
  private remaining = 5000;
  private resetAt: Date;
  private readonly threshold: number;
  private readonly marginMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.threshold = options.threshold ?? 100;
    this.marginMs = options.marginMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.resetAt = new Date(this.now() + 60_000);
  }

  async checkAndWait(): Promise<number> {
    const now = this.now();
    if (this.remaining > this.threshold || this.resetAt.getTime() <= now) {
      return 0;
    }
    const waitMs = this.resetAt.getTime() - now + this.marginMs;
    const seconds = Math.ceil(waitMs / 1000);
    console.log(`⏸️  Rate limit low (${this.remaining} remaining). Waiting ${seconds}s until ${this.resetAt.toISOString()}…`);
    await this.sleep(waitMs);
    return waitMs;
  }

  updateFromHeaders(headers: HeaderBag) {
    const remaining = readHeaderNumber(headers["x-ratelimit-remaining"]);
    if (remaining !== null) {
      this.remaining = remaining;
    }
    const reset = readResetInstant(headers);
    if (reset !== null) {
      this.resetAt = reset;
    }
  }
}

export function readHeaderNumber(value: string | number | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/** `x-ratelimit-reset` is an epoch in seconds. */
export function readResetInstant(headers: HeaderBag): Date | null {
  const seconds = readHeaderNumber(headers["x-ratelimit-reset"]);
  return seconds === null ? null : new Date(seconds * 1000);
}
