/**
 * Subject Tutor: Circuit Breaker
 *
 * closed -> open after `failure_threshold` consecutive failures;
 * open -> half_open once `reset_timeout_ms` has passed;
 * half_open -> closed on the next success, back to open on the next failure.
 * While half_open only one trial request is admitted at a time.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

export type CircuitState = "closed" | "open" | "half_open";

/** How a request got through: normally, or as the half-open trial */
export type Admission = "normal" | "trial";

export interface CircuitBreakerOptions {
  failure_threshold: number;
  reset_timeout_ms: number;
  clock?: () => number;
}

export class CircuitBreaker {
  private failures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;
  private readonly clock: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.clock = options.clock ?? Date.now;
  }

  get state(): CircuitState {
    if (this.openedAt === null) return "closed";
    return this.clock() - this.openedAt >= this.options.reset_timeout_ms ? "half_open" : "open";
  }

  /** Whether `admit()` would let a request through right now */
  canRequest(): boolean {
    const state = this.state;
    return state === "closed" || (state === "half_open" && !this.trialInFlight);
  }

  /**
   * Let a request through, or return null when the circuit refuses it. A
   * "trial" admission must end in recordSuccess, recordFailure or
   * releaseTrial.
   */
  admit(): Admission | null {
    const state = this.state;
    if (state === "closed") return "normal";
    if (state === "open" || this.trialInFlight) return null;
    this.trialInFlight = true;
    return "trial";
  }

  /** Frees the trial slot when the trial ended without an outcome */
  releaseTrial(): void {
    this.trialInFlight = false;
  }

  /** Seconds until the circuit lets a trial request through */
  retryAfterSeconds(): number {
    if (this.openedAt === null) return 0;
    const remaining = this.openedAt + this.options.reset_timeout_ms - this.clock();
    if (remaining <= 0) return this.trialInFlight ? 1 : 0;
    return Math.ceil(remaining / 1000);
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
  }

  recordFailure(): void {
    this.trialInFlight = false;
    if (this.state === "half_open") {
      this.openedAt = this.clock();
      return;
    }
    this.failures++;
    if (this.failures >= this.options.failure_threshold) {
      this.openedAt = this.clock();
    }
  }

  get consecutiveFailures(): number {
    return this.failures;
  }
}
