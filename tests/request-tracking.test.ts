/**
 * Request Tracking Tests
 *
 * These tests define the contract for request bookkeeping:
 * - In-flight, timed out and failed requests counted for the health endpoint
 * - Finished records removed after the cleanup delay
 * - Counters, latency percentiles and cache hit rate for the metrics endpoint
 *
 * The implementation lives in: src/request-tracker.ts, src/metrics.ts
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { MetricsCollector, percentile } from '../src/metrics.js';
import { RequestTracker } from '../src/request-tracker.js';

describe('Request Tracker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should count requests by status', () => {
    const tracker = new RequestTracker(60_000, () => 100);
    tracker.start('a');
    tracker.start('b');
    tracker.start('c');
    tracker.complete('a');
    tracker.fail('b', 'timeout');

    expect(tracker.counts()).toEqual({ active: 1, recent_timeouts: 1, recent_errors: 0 });
    expect(tracker.activeCount()).toBe(1);
    tracker.dispose();
  });

  it('should keep the error message and finish time', () => {
    const tracker = new RequestTracker(60_000, () => 100);
    tracker.start('a');
    tracker.fail('a', 'error', 'boom');

    expect(tracker.get('a')).toEqual({
      request_id: 'a',
      started_at: 100,
      status: 'error',
      finished_at: 100,
      error: 'boom',
    });
    tracker.dispose();
  });

  it('should ignore unknown request ids', () => {
    const tracker = new RequestTracker(60_000);
    tracker.complete('missing');
    expect(tracker.get('missing')).toBeUndefined();
  });

  it('should forget finished requests after the cleanup delay', () => {
    vi.useFakeTimers();
    const tracker = new RequestTracker(1_000);
    tracker.start('a');
    tracker.fail('a', 'timeout');

    vi.advanceTimersByTime(999);
    expect(tracker.get('a')).toBeDefined();
    vi.advanceTimersByTime(1);
    expect(tracker.get('a')).toBeUndefined();
  });

  it('should drop everything on dispose', () => {
    const tracker = new RequestTracker(60_000);
    tracker.start('a');
    tracker.dispose();
    expect(tracker.counts()).toEqual({ active: 0, recent_timeouts: 0, recent_errors: 0 });
  });
});

describe('Metrics Collector', () => {
  it('should compute nearest-rank percentiles', () => {
    expect(percentile([], 50)).toBe(0);
    expect(percentile([10, 20, 30, 40], 50)).toBe(20);
    expect(percentile([10, 20, 30, 40], 95)).toBe(40);
    expect(percentile([7], 0)).toBe(7);
  });

  it('should aggregate request samples', () => {
    let time = 1_000;
    const metrics = new MetricsCollector(() => time);

    metrics.record({
      outcome: 'success',
      latency_ms: 10,
      subject: 'math',
      cached: false,
      tools: [
        { tool_type: 'calculator', input_data: {}, result: 8, success: true, duration_ms: 1 },
        { tool_type: 'equation_solver', input_data: {}, result: null, success: false, error_message: 'no equation', duration_ms: 1 },
      ],
    });
    metrics.record({ outcome: 'success', latency_ms: 20, subject: 'math', cached: true });
    metrics.record({ outcome: 'timeout', latency_ms: 40, error_code: 'TIMEOUT' });
    time = 1_500;

    const snapshot = metrics.snapshot();
    expect(snapshot.uptime_ms).toBe(500);
    expect(snapshot.requests).toEqual({ total: 3, succeeded: 2, failed: 0, timed_out: 1 });
    expect(snapshot.latency_ms).toEqual({ avg: 23, p50: 20, p95: 40, max: 40 });
    expect(snapshot.subjects).toEqual({ math: 2, physics: 0, chemistry: 0, unknown: 0 });
    expect(snapshot.tools).toEqual({
      calculator: { calls: 1, failures: 0 },
      equation_solver: { calls: 1, failures: 1 },
    });
    expect(snapshot.cache).toEqual({ hits: 1, misses: 1, hit_rate: 0.5 });
    expect(snapshot.errors).toEqual({ TIMEOUT: 1 });
    expect(snapshot.llm).toBeUndefined();
  });

  it('should report zeros before any request', () => {
    const snapshot = new MetricsCollector(() => 0).snapshot();
    expect(snapshot.latency_ms).toEqual({ avg: 0, p50: 0, p95: 0, max: 0 });
    expect(snapshot.cache.hit_rate).toBe(0);
  });
});
