import { RATE_LIMIT_MAX_REQUESTS, RATE_LIMIT_WINDOW_SECONDS, MS_PER_SECOND } from '../config/constants.js';
import { botLogger } from '../utils/logger.js';

export interface RateLimiterOptions {
  maxRequests?: number;
  windowSeconds?: number;
  now?: () => number;
}

/**
 * Sliding-window limiter keyed by user id.
 *
 * A request is counted while `now - timestamp < window`, so the window is (now - window, now].
 * State lives in memory for the process lifetime. checkAndRecord is synchronous, which keeps
 * prune, check and append atomic on the event loop.
 */
export class RateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly requests = new Map<string, number[]>();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? RATE_LIMIT_MAX_REQUESTS;
    this.windowSeconds = options.windowSeconds ?? RATE_LIMIT_WINDOW_SECONDS;
    this.windowMs = this.windowSeconds * MS_PER_SECOND;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admits the request and records it, or rejects it without recording
   */
  checkAndRecord(identity: string | number): boolean {
    const key = String(identity);
    const now = this.now();
    const recent = (this.requests.get(key) ?? []).filter((ts) => now - ts < this.windowMs);

    if (recent.length >= this.maxRequests) {
      this.requests.set(key, recent);
      botLogger.warn({ identity: key, count: recent.length }, 'Rate limit exceeded');
      return false;
    }

    recent.push(now);
    this.requests.set(key, recent);
    return true;
  }

  /**
   * Seconds until the oldest tracked request leaves the window, or null if nothing is tracked
   */
  getWaitTime(identity: string | number): number | null {
    const timestamps = this.requests.get(String(identity));
    if (!timestamps || timestamps.length === 0) {
      return null;
    }

    // Timestamps are appended in order, so the first one is the oldest
    const elapsedSeconds = Math.floor((this.now() - timestamps[0]) / MS_PER_SECOND);
    return Math.max(0, this.windowSeconds - elapsedSeconds);
  }

  reset(identity: string | number): void {
    this.requests.delete(String(identity));
  }
}
