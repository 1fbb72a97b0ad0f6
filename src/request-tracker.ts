/**
 * Subject Tutor: Request Tracker
 *
 * Records in-flight requests for the health endpoint. Finished records stay
 * for `cleanup_delay_ms` so recent timeouts and errors remain visible.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

export type RequestStatus = "processing" | "completed" | "timeout" | "error";

export interface RequestRecord {
  request_id: string;
  started_at: number;
  status: RequestStatus;
  finished_at?: number;
  error?: string;
}

export interface RequestCounts {
  active: number;
  recent_timeouts: number;
  recent_errors: number;
}

export class RequestTracker {
  private readonly records = new Map<string, RequestRecord>();
  private readonly timers = new Map<string, NodeJS.Timeout>();

  constructor(
    private readonly cleanupDelayMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  start(requestId: string): RequestRecord {
    const record: RequestRecord = { request_id: requestId, started_at: this.clock(), status: "processing" };
    this.records.set(requestId, record);
    return record;
  }

  complete(requestId: string): void {
    this.finish(requestId, "completed");
  }

  fail(requestId: string, status: "timeout" | "error", error?: string): void {
    this.finish(requestId, status, error);
  }

  get(requestId: string): RequestRecord | undefined {
    return this.records.get(requestId);
  }

  activeCount(): number {
    let active = 0;
    for (const record of this.records.values()) {
      if (record.status === "processing") active++;
    }
    return active;
  }

  counts(): RequestCounts {
    const counts: RequestCounts = { active: 0, recent_timeouts: 0, recent_errors: 0 };
    for (const record of this.records.values()) {
      if (record.status === "processing") counts.active++;
      else if (record.status === "timeout") counts.recent_timeouts++;
      else if (record.status === "error") counts.recent_errors++;
    }
    return counts;
  }

  /** Drops every record and pending cleanup timer */
  dispose(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.records.clear();
  }

  private finish(requestId: string, status: Exclude<RequestStatus, "processing">, error?: string): void {
    const record = this.records.get(requestId);
    if (!record) return;

    record.status = status;
    record.finished_at = this.clock();
    if (error !== undefined) record.error = error;

    clearTimeout(this.timers.get(requestId));
    const timer = setTimeout(() => {
      this.records.delete(requestId);
      this.timers.delete(requestId);
    }, this.cleanupDelayMs);
    timer.unref();
    this.timers.set(requestId, timer);
  }
}
