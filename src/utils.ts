/**
 * Subject Tutor: Core Utilities
 *
 * Error construction, ID generation, timing and numeric helpers shared by
 * the tools, agents and server.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { v4 as uuidv4, v7 as uuidv7 } from "uuid";
import type { z } from "zod";
import type { ErrorCode, ErrorResponse, ToolError } from "./types.js";

// ============================================================================
// ID Generation
// ============================================================================

/**
 * Generate time-ordered UUID v7 for request IDs
 */
export function generateRequestId(): string {
  return uuidv7();
}

/**
 * Generate random UUID v4 for new sessions
 */
export function generateSessionId(): string {
  return uuidv4();
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Create a standardized tool error
 */
export function createToolError(
  code: ErrorCode,
  message: string,
  options?: {
    details?: unknown;
    recoverable?: boolean;
    suggestion?: string;
  }
): ToolError {
  return {
    isError: true,
    code,
    message,
    details: options?.details,
    recoverable: options?.recoverable ?? false,
    suggestion: options?.suggestion,
  };
}

export function isToolError(value: unknown): value is ToolError {
  return (
    typeof value === "object" &&
    value !== null &&
    "isError" in value &&
    value.isError === true &&
    "code" in value &&
    typeof value.code === "string" &&
    "message" in value &&
    typeof value.message === "string"
  );
}

/**
 * Coerce anything thrown into a ToolError, keeping ToolErrors as they are
 */
export function toToolError(error: unknown, fallbackCode: ErrorCode = "INTERNAL_ERROR"): ToolError {
  if (isToolError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return createToolError(fallbackCode, message);
}

/**
 * Validate tool input against its schema, applying defaults.
 *
 * @throws {ToolError} INVALID_INPUT listing each failing field
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join(".") : "input"}: ${issue.message}`
    );
    throw createToolError("INVALID_INPUT", `Invalid input: ${issues.join("; ")}`, {
      details: parsed.error.issues,
      recoverable: true,
    });
  }
  return parsed.data;
}

export function errorMessage(error: unknown): string {
  if (isToolError(error) || error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for MCP response
 */
export function formatErrorResponse(error: ToolError): { isError: true; content: Array<{ type: "text"; text: string }> } {
  const text = [
    `Error: ${error.code}`,
    error.message,
    error.suggestion ? `Suggestion: ${error.suggestion}` : "",
    error.details ? `Details: ${JSON.stringify(error.details)}` : "",
  ].filter(Boolean).join("\n");

  return {
    isError: true,
    content: [{ type: "text", text }],
  };
}

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  INVALID_INPUT: 400,
  NOT_FOUND: 404,
  LLM_RATE_LIMITED: 429,
  LLM_NOT_CONFIGURED: 503,
  LLM_UNAVAILABLE: 503,
  LLM_TIMEOUT: 504,
  TIMEOUT: 504,
  LLM_MODEL_NOT_FOUND: 502,
  LLM_EMPTY_RESPONSE: 502,
  LLM_ERROR: 502,
  CALCULATION_ERROR: 422,
  UNSUPPORTED_EQUATION: 422,
  UNKNOWN_UNIT: 422,
  INCOMPATIBLE_UNITS: 422,
  INVALID_FORMULA: 422,
  UNBALANCED_EQUATION: 422,
  CANNOT_BALANCE: 422,
  SPECIES_NOT_FOUND: 422,
};

export function httpStatusForError(code: ErrorCode): number {
  return STATUS_BY_CODE[code] ?? 500;
}

/**
 * Seconds a client should wait before retrying, when the error carries one
 */
export function retryAfterSeconds(error: ToolError): number | undefined {
  const details = error.details;
  if (
    typeof details === "object" &&
    details !== null &&
    "retry_after_seconds" in details &&
    typeof details.retry_after_seconds === "number"
  ) {
    return details.retry_after_seconds;
  }
  return undefined;
}

/**
 * Build the HTTP error body; internal details are only exposed in debug mode
 */
export function toErrorResponse(error: ToolError, debug: boolean): ErrorResponse {
  const status = httpStatusForError(error.code);
  const internal = status >= 500 && error.code === "INTERNAL_ERROR";
  return {
    error: error.code,
    message: internal && !debug
      ? "An error occurred while processing your question. Please try again."
      : error.message,
    status_code: status,
    details: internal && !debug ? undefined : error.details,
    retry_after_seconds: retryAfterSeconds(error),
  };
}

// ============================================================================
// Time Utilities
// ============================================================================

/**
 * Get current ISO8601 timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Resolve after `ms`, or reject early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race a promise against a deadline. The deadline rejects with `onTimeout()`
 * and aborts `controller` so in-flight work can stop early.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  onTimeout: () => unknown,
  controller?: AbortController
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const reason = onTimeout();
      controller?.abort(reason);
      reject(reason);
    }, ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Text & Number Utilities
// ============================================================================

/**
 * Lowercase, trim and collapse whitespace for matching and cache keys
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Round to a number of significant digits, dropping binary noise
 * (0.1 + 0.2 -> 0.3) and normalising -0 to 0.
 */
export function roundSignificant(value: number, digits: number = 12): number {
  if (!Number.isFinite(value) || value === 0) {
    return value === 0 ? 0 : value;
  }
  const rounded = Number(value.toPrecision(digits));
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Round to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Human-readable number: plain notation for ordinary magnitudes,
 * exponent notation for very large or very small values.
 */
export function formatNumber(value: number): string {
  const abs = Math.abs(value);
  if (abs !== 0 && (abs >= 1e9 || abs < 1e-4)) {
    return roundSignificant(value, 10).toExponential().replace("e+", "e");
  }
  return String(roundSignificant(value, 10));
}
