import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../rate-limiter.js';

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 0;
    limiter = new RateLimiter({ maxRequests: 3, windowSeconds: 60, now: () => now });
  });

  it('admits up to the quota and rejects the next request', () => {
    expect(limiter.checkAndRecord(1)).toBe(true);
    expect(limiter.checkAndRecord(1)).toBe(true);
    expect(limiter.checkAndRecord(1)).toBe(true);
    expect(limiter.checkAndRecord(1)).toBe(false);
  });

  it('keeps identities independent', () => {
    for (let i = 0; i < 3; i++) limiter.checkAndRecord(1);

    expect(limiter.checkAndRecord(1)).toBe(false);
    expect(limiter.checkAndRecord(2)).toBe(true);
  });

  it('treats numeric and string ids as the same identity', () => {
    for (let i = 0; i < 3; i++) limiter.checkAndRecord(42);

    expect(limiter.checkAndRecord('42')).toBe(false);
  });

  it('still counts a request one millisecond before the window closes', () => {
    for (let i = 0; i < 3; i++) limiter.checkAndRecord(1);

    now = 59_999;
    expect(limiter.checkAndRecord(1)).toBe(false);
  });

  it('forgets requests exactly one window old', () => {
    for (let i = 0; i < 3; i++) limiter.checkAndRecord(1);

    now = 60_000;
    expect(limiter.checkAndRecord(1)).toBe(true);
  });

  it('does not record rejected requests', () => {
    const small = new RateLimiter({ maxRequests: 2, windowSeconds: 60, now: () => now });
    small.checkAndRecord(1);
    small.checkAndRecord(1);

    now = 30_000;
    expect(small.checkAndRecord(1)).toBe(false);

    now = 60_000;
    expect(small.checkAndRecord(1)).toBe(true);
    expect(small.checkAndRecord(1)).toBe(true);
    expect(small.checkAndRecord(1)).toBe(false);
  });

  describe('getWaitTime', () => {
    it('returns null for an unknown identity', () => {
      expect(limiter.getWaitTime(99)).toBeNull();
    });

    it('counts down from the oldest tracked request', () => {
      for (let i = 0; i < 3; i++) limiter.checkAndRecord(1);

      expect(limiter.getWaitTime(1)).toBe(60);

      now = 10_500;
      expect(limiter.getWaitTime(1)).toBe(50);

      now = 59_000;
      expect(limiter.getWaitTime(1)).toBe(1);
    });

    it('measures from the oldest request still in the window', () => {
      limiter.checkAndRecord(1);
      now = 30_000;
      limiter.checkAndRecord(1);
      now = 61_000;
      limiter.checkAndRecord(1);

      expect(limiter.getWaitTime(1)).toBe(29);
    });

    it('never goes below zero', () => {
      limiter.checkAndRecord(1);

      now = 70_000;
      expect(limiter.getWaitTime(1)).toBe(0);
    });

    it('does not grow while time passes', () => {
      limiter.checkAndRecord(1);
      now = 20_000;
      limiter.checkAndRecord(1);

      const readings: number[] = [];
      for (const t of [20_000, 30_000, 45_000, 59_999]) {
        now = t;
        const wait = limiter.getWaitTime(1);
        expect(wait).not.toBeNull();
        readings.push(wait ?? -1);
      }

      expect(readings).toEqual([40, 30, 15, 1]);
    });
  });

  it('reset clears the identity', () => {
    for (let i = 0; i < 3; i++) limiter.checkAndRecord(1);

    limiter.reset(1);

    expect(limiter.getWaitTime(1)).toBeNull();
    expect(limiter.checkAndRecord(1)).toBe(true);
  });

  it('uses ten requests per sixty seconds by default', () => {
    const defaults = new RateLimiter();

    expect(defaults.maxRequests).toBe(10);
    expect(defaults.windowSeconds).toBe(60);
  });
});
