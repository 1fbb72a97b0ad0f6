/**
 * Subject Tutor: Metrics
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { LlmStats } from "./services/gemini-client.js";
import type { ErrorCode, Subject, ToolResult } from "./types.js";

export type RequestOutcome = "success" | "error" | "timeout";

export interface RequestSample {
  outcome: RequestOutcome;
  latency_ms: number;
  subject?: Subject;
  cached?: boolean;
  tools?: ToolResult[];
  error_code?: ErrorCode;
}

export interface LatencySummary {
  avg: number;
  p50: number;
  p95: number;
  max: number;
}

export interface MetricsSnapshot {
  uptime_ms: number;
  requests: {
    total: number;
    succeeded: number;
    failed: number;
    timed_out: number;
  };
  latency_ms: LatencySummary;
  subjects: Record<Subject, number>;
  tools: Record<string, { calls: number; failures: number }>;
  cache: { hits: number; misses: number; hit_rate: number };
  errors: Partial<Record<ErrorCode, number>>;
  llm?: LlmStats;
}

const MAX_SAMPLES = 1000;

/**
 * Nearest-rank percentile of an ascending list
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}

export class MetricsCollector {
  private readonly startedAt: number;
  private readonly latencies: number[] = [];
  private total = 0;
  private succeeded = 0;
  private failed = 0;
  private timedOut = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private readonly subjects: Record<Subject, number> = { math: 0, physics: 0, chemistry: 0, unknown: 0 };
  private readonly tools = new Map<string, { calls: number; failures: number }>();
  private readonly errors = new Map<ErrorCode, number>();

  constructor(private readonly clock: () => number = Date.now) {
    this.startedAt = clock();
  }

  record(sample: RequestSample): void {
    this.total++;
    if (sample.outcome === "success") this.succeeded++;
    else if (sample.outcome === "timeout") this.timedOut++;
    else this.failed++;

    this.latencies.push(sample.latency_ms);
    if (this.latencies.length > MAX_SAMPLES) {
      this.latencies.shift();
    }

    if (sample.subject) {
      this.subjects[sample.subject]++;
    }
    if (sample.cached !== undefined) {
      if (sample.cached) this.cacheHits++;
      else this.cacheMisses++;
    }
    for (const tool of sample.tools ?? []) {
      const stats = this.tools.get(tool.tool_type) ?? { calls: 0, failures: 0 };
      stats.calls++;
      if (!tool.success) stats.failures++;
      this.tools.set(tool.tool_type, stats);
    }
    if (sample.error_code) {
      this.errors.set(sample.error_code, (this.errors.get(sample.error_code) ?? 0) + 1);
    }
  }

  snapshot(llm?: LlmStats): MetricsSnapshot {
    const sorted = [...this.latencies].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, value) => acc + value, 0);
    const lookups = this.cacheHits + this.cacheMisses;
    const errors: Partial<Record<ErrorCode, number>> = {};
    for (const [code, count] of this.errors) {
      errors[code] = count;
    }

    return {
      uptime_ms: this.clock() - this.startedAt,
      requests: {
        total: this.total,
        succeeded: this.succeeded,
        failed: this.failed,
        timed_out: this.timedOut,
      },
      latency_ms: {
        avg: sorted.length > 0 ? Math.round(sum / sorted.length) : 0,
        p50: percentile(sorted, 50),
        p95: percentile(sorted, 95),
        max: sorted.length > 0 ? sorted[sorted.length - 1] : 0,
      },
      subjects: { ...this.subjects },
      tools: Object.fromEntries(this.tools),
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        hit_rate: lookups > 0 ? Math.round((this.cacheHits / lookups) * 100) / 100 : 0,
      },
      errors,
      ...(llm ? { llm } : {}),
    };
  }
}
