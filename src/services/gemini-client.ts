/**
 * Subject Tutor: Gemini LLM Client
 *
 * Wraps `@google/genai` behind the `LlmClient` interface the agents use.
 * Each call passes through, in order:
 * - configuration check (no API key -> LLM_NOT_CONFIGURED)
 * - circuit breaker (open -> LLM_UNAVAILABLE)
 * - per-kind sliding-window rate limit (-> LLM_RATE_LIMITED)
 * - the request itself, under a per-call timeout, retried on transient
 *   failures and empty responses
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { GoogleGenAI } from "@google/genai";
import type { GenerateContentParameters } from "@google/genai";
import type { TutorConfig } from "../config.js";
import { preview, silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { withContext } from "../prompts.js";
import type { ToolError } from "../types.js";
import { createToolError, errorMessage, isToolError, sleep, withTimeout } from "../utils.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import type { CircuitState } from "./circuit-breaker.js";
import { RateLimiter } from "./rate-limiter.js";

// ============================================================================
// Types
// ============================================================================

export type LlmRequestKind = "classify" | "generate";

export interface GenerateOptions {
  kind?: LlmRequestKind;
  signal?: AbortSignal;
  /** Recent conversation turns prepended to the prompt */
  context?: string;
}

export interface LlmStats {
  model: string;
  configured: boolean;
  requests: number;
  successes: number;
  failures: number;
  retries: number;
  rate_limited: number;
  avg_latency_ms: number;
  circuit_state: CircuitState;
  last_error?: string;
}

export interface LlmClient {
  readonly model: string;
  isConfigured(): boolean;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  getStats(): LlmStats;
  circuitState(): CircuitState;
}

/**
 * The slice of `GoogleGenAI.models` the client calls; tests supply a fake
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface GeminiClientOptions {
  gemini: TutorConfig["gemini"];
  rate_limit_per_minute: number;
  circuit_breaker: TutorConfig["circuit_breaker"];
  generator?: ContentGenerator;
  logger?: Logger;
  clock?: () => number;
}

// ============================================================================
// Error Mapping
// ============================================================================

const DEFAULT_RETRY_AFTER_SECONDS = 60;

function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Read "retryDelay": "17s" or "retry in 17.2s" out of a 429 message
 */
export function parseRetryAfter(message: string): number {
  const match = /retry(?:[_ ]?delay)?["':\s]*(?:in\s+)?(\d+(?:\.\d+)?)\s*s/i.exec(message);
  return match ? Math.ceil(Number(match[1])) : DEFAULT_RETRY_AFTER_SECONDS;
}

interface MappedError {
  error: ToolError;
  retryable: boolean;
}

function mapError(err: unknown, model: string): MappedError {
  if (isToolError(err)) {
    return { error: err, retryable: err.code === "LLM_TIMEOUT" || err.code === "LLM_EMPTY_RESPONSE" };
  }

  const message = errorMessage(err);
  const status = httpStatusOf(err);

  if (status === 429) {
    const retry_after_seconds = parseRetryAfter(message);
    return {
      error: createToolError("LLM_RATE_LIMITED", "The language model is rate limited. Please try again shortly.", {
        details: { status, retry_after_seconds },
        recoverable: true,
      }),
      retryable: false,
    };
  }
  if (status === 404) {
    return {
      error: createToolError("LLM_MODEL_NOT_FOUND", `Model '${model}' was not found`, {
        details: { status },
        suggestion: "Set GEMINI_MODEL to an available model",
      }),
      retryable: false,
    };
  }

  return {
    error: createToolError("LLM_ERROR", `Language model request failed: ${message}`, {
      details: status !== undefined ? { status } : undefined,
      recoverable: true,
    }),
    retryable: status === undefined || status === 408 || status >= 500,
  };
}

// ============================================================================
// Client
// ============================================================================

interface Counters {
  requests: number;
  successes: number;
  failures: number;
  retries: number;
  rate_limited: number;
  total_latency_ms: number;
  last_error?: string;
}

export class GeminiClient implements LlmClient {
  readonly model: string;
  private readonly generator: ContentGenerator | null;
  private readonly settings: TutorConfig["gemini"];
  private readonly limiter: RateLimiter<LlmRequestKind>;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  private readonly stats: Counters = {
    requests: 0,
    successes: 0,
    failures: 0,
    retries: 0,
    rate_limited: 0,
    total_latency_ms: 0,
  };

  constructor(options: GeminiClientOptions) {
    this.settings = options.gemini;
    this.model = options.gemini.model;
    this.logger = (options.logger ?? silentLogger).child("gemini");
    this.limiter = new RateLimiter<LlmRequestKind>(options.rate_limit_per_minute, 60_000, options.clock);
    this.breaker = new CircuitBreaker({ ...options.circuit_breaker, clock: options.clock });

    if (options.generator) {
      this.generator = options.generator;
    } else if (options.gemini.api_key) {
      this.generator = new GoogleGenAI({ apiKey: options.gemini.api_key }).models;
    } else {
      this.generator = null;
    }
  }

  isConfigured(): boolean {
    return this.generator !== null;
  }

  circuitState(): CircuitState {
    return this.breaker.state;
  }

  getStats(): LlmStats {
    return {
      model: this.model,
      configured: this.isConfigured(),
      requests: this.stats.requests,
      successes: this.stats.successes,
      failures: this.stats.failures,
      retries: this.stats.retries,
      rate_limited: this.stats.rate_limited,
      avg_latency_ms: this.stats.successes > 0
        ? Math.round(this.stats.total_latency_ms / this.stats.successes)
        : 0,
      circuit_state: this.breaker.state,
      ...(this.stats.last_error !== undefined ? { last_error: this.stats.last_error } : {}),
    };
  }

  /**
   * Generate text for a prompt.
   *
   * @throws {ToolError} LLM_NOT_CONFIGURED, LLM_UNAVAILABLE, LLM_RATE_LIMITED,
   * LLM_TIMEOUT, LLM_MODEL_NOT_FOUND, LLM_EMPTY_RESPONSE, LLM_ERROR; or the
   * signal's reason when the caller aborts
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const kind = options.kind ?? "generate";
    const generator = this.generator;

    if (!generator) {
      throw createToolError("LLM_NOT_CONFIGURED", "GEMINI_API_KEY is not set", {
        suggestion: "Set GEMINI_API_KEY to enable language model answers",
      });
    }

    const admission = this.breaker.admit();
    if (!admission) {
      throw createToolError("LLM_UNAVAILABLE", "The language model is temporarily unavailable", {
        details: { circuit_state: this.breaker.state, retry_after_seconds: this.breaker.retryAfterSeconds() },
        recoverable: true,
      });
    }

    try {
      return await this.generateAdmitted(generator, prompt, kind, options);
    } finally {
      // No-op once the trial has recorded its outcome
      if (admission === "trial") this.breaker.releaseTrial();
    }
  }

  private async generateAdmitted(
    generator: ContentGenerator,
    prompt: string,
    kind: LlmRequestKind,
    options: GenerateOptions
  ): Promise<string> {
    const decision = this.limiter.acquire(kind);
    if (!decision.allowed) {
      this.stats.rate_limited++;
      this.logger.warn("Rate limit reached", { kind, retry_after_seconds: decision.retry_after_seconds });
      throw createToolError("LLM_RATE_LIMITED", `Too many ${kind} requests. Please try again shortly.`, {
        details: { kind, retry_after_seconds: decision.retry_after_seconds },
        recoverable: true,
      });
    }

    this.stats.requests++;
    const fullPrompt = withContext(prompt, options.context);
    this.logger.debug("Generating", { kind, prompt: preview(fullPrompt) });

    for (let attempt = 0; ; attempt++) {
      const start = performance.now();
      try {
        const text = await this.attempt(generator, fullPrompt, options.signal);
        this.breaker.recordSuccess();
        this.stats.successes++;
        this.stats.total_latency_ms += performance.now() - start;
        return text;
      } catch (err) {
        if (options.signal?.aborted) {
          throw options.signal.reason;
        }

        const { error, retryable } = mapError(err, this.model);
        if (retryable && attempt < this.settings.max_retries) {
          this.stats.retries++;
          this.logger.warn("Retrying request", { kind, attempt: attempt + 1, error: error.message });
          await sleep(this.settings.retry_delay_ms * (attempt + 1), options.signal);
          continue;
        }

        this.breaker.recordFailure();
        this.stats.failures++;
        this.stats.last_error = error.message;
        this.logger.error("Request failed", { kind, code: error.code, error: error.message, circuit_state: this.breaker.state });
        throw error;
      }
    }
  }

  private async attempt(generator: ContentGenerator, prompt: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const forward = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forward, { once: true });

    try {
      const response = await withTimeout(
        generator.generateContent({
          model: this.model,
          contents: prompt,
          config: {
            temperature: this.settings.temperature,
            topP: this.settings.top_p,
            topK: this.settings.top_k,
            maxOutputTokens: this.settings.max_output_tokens,
            abortSignal: controller.signal,
          },
        }),
        this.settings.timeout_ms,
        () => createToolError("LLM_TIMEOUT", `Language model did not respond within ${this.settings.timeout_ms} ms`, {
          recoverable: true,
        }),
        controller
      );

      const text = response.text?.trim();
      if (!text) {
        throw createToolError("LLM_EMPTY_RESPONSE", "Language model returned an empty response", {
          recoverable: true,
        });
      }
      return text;
    } finally {
      signal?.removeEventListener("abort", forward);
    }
  }
}
