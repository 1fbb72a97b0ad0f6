/**
 * Rate Limiter and Circuit Breaker Tests
 *
 * These tests define the contract for LLM call protection:
 * - Sliding-window limits per request kind
 * - Circuit opening after consecutive failures and half-open recovery
 *
 * The implementation lives in: src/services/rate-limiter.ts, src/services/circuit-breaker.ts
 */

import { describe, it, expect } from 'vitest';
import { CircuitBreaker } from '../src/services/circuit-breaker.js';
import { RateLimiter } from '../src/services/rate-limiter.js';

// ============================================================================
// Helper Functions
// ============================================================================

function manualClock(start: number = 0) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('Rate Limiter', () => {
  it('should allow calls up to the limit', () => {
    const clock = manualClock();
    const limiter = new RateLimiter<'classify' | 'generate'>(2, 60_000, clock.now);
    expect(limiter.acquire('generate')).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.acquire('generate')).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.acquire('generate')).toEqual({ allowed: false, retry_after_seconds: 60 });
  });

  it('should count each kind separately', () => {
    const limiter = new RateLimiter<'classify' | 'generate'>(1, 60_000, manualClock().now);
    expect(limiter.acquire('generate').allowed).toBe(true);
    expect(limiter.acquire('classify').allowed).toBe(true);
    expect(limiter.usage('generate')).toBe(1);
  });

  it('should free capacity as the window slides', () => {
    const clock = manualClock();
    const limiter = new RateLimiter(1, 60_000, clock.now);
    limiter.acquire('generate');
    clock.advance(59_500);
    expect(limiter.acquire('generate')).toEqual({ allowed: false, retry_after_seconds: 1 });
    clock.advance(500);
    expect(limiter.acquire('generate')).toEqual({ allowed: true, remaining: 0 });
  });

  it('should forget everything on reset', () => {
    const limiter = new RateLimiter(1, 60_000, manualClock().now);
    limiter.acquire('generate');
    limiter.reset();
    expect(limiter.usage('generate')).toBe(0);
  });
});

describe('Circuit Breaker', () => {
  it('should open after the failure threshold', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker({ failure_threshold: 2, reset_timeout_ms: 10_000, clock: clock.now });
    breaker.recordFailure();
    expect(breaker.state).toBe('closed');
    breaker.recordFailure();
    expect(breaker.state).toBe('open');
    expect(breaker.canRequest()).toBe(false);
    expect(breaker.retryAfterSeconds()).toBe(10);
  });

  it('should reset the count on success', () => {
    const breaker = new CircuitBreaker({ failure_threshold: 2, reset_timeout_ms: 10_000, clock: manualClock().now });
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    expect(breaker.state).toBe('closed');
    expect(breaker.consecutiveFailures).toBe(1);
  });

  it('should let a trial request through after the reset timeout', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker({ failure_threshold: 1, reset_timeout_ms: 10_000, clock: clock.now });
    breaker.recordFailure();
    clock.advance(10_000);
    expect(breaker.state).toBe('half_open');
    expect(breaker.canRequest()).toBe(true);

    breaker.recordFailure();
    expect(breaker.state).toBe('open');

    clock.advance(10_000);
    breaker.recordSuccess();
    expect(breaker.state).toBe('closed');
  });

  it('should admit only one trial while half-open', () => {
    const clock = manualClock();
    const breaker = new CircuitBreaker({ failure_threshold: 1, reset_timeout_ms: 10_000, clock: clock.now });
    breaker.recordFailure();
    clock.advance(10_000);

    expect(breaker.admit()).toBe('trial');
    expect(breaker.admit()).toBeNull();
    expect(breaker.canRequest()).toBe(false);
    expect(breaker.retryAfterSeconds()).toBe(1);

    breaker.releaseTrial();
    expect(breaker.admit()).toBe('trial');

    breaker.recordSuccess();
    expect(breaker.admit()).toBe('normal');
    expect(breaker.admit()).toBe('normal');
  });
});
