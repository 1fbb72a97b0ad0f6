/**
 * Subject Tutor: Configuration
 *
 * Reads the process environment once, validates it, and derives the
 * timeouts and limits that depend on where the server runs (serverless
 * deployments get tighter limits).
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as path from "path";
import { z } from "zod";
import { PROJECT_ROOT } from "./data.js";
import type { LogLevel } from "./types.js";
import { createToolError } from "./utils.js";

// ============================================================================
// Types
// ============================================================================

export type Environment = "development" | "production" | "test";

export interface TutorConfig {
  environment: Environment;
  debug: boolean;
  is_vercel: boolean;
  transport: "http" | "stdio";

  server: {
    host: string;
    port: number;
    public_dir: string;
    max_active_requests: number;   // /api/health reports "overloaded" above this
    request_timeout_ms: number;
    request_cleanup_delay_ms: number;
  };

  gemini: {
    api_key?: string;
    model: string;
    temperature: number;
    top_p: number;
    top_k: number;
    max_output_tokens: number;
    timeout_ms: number;
    max_retries: number;
    retry_delay_ms: number;
  };

  rate_limit: {
    per_minute: number;            // Per request kind (classify / generate)
  };

  circuit_breaker: {
    failure_threshold: number;
    reset_timeout_ms: number;
  };

  history: {
    max_entries_per_session: number;
    max_sessions: number;
    context_turns: number;
  };

  cache: {
    ttl_ms: number;
    max_entries: number;
  };

  logging: {
    level: LogLevel;
    log_dir?: string;
  };
}

export type ConfigOverrides = {
  [K in keyof TutorConfig]?: TutorConfig[K] extends object ? Partial<TutorConfig[K]> : TutorConfig[K];
};

// ============================================================================
// Environment Schema
// ============================================================================

const BooleanFlagSchema = z.string().trim().toLowerCase()
  .transform(value => ["true", "1", "yes", "on"].includes(value));

export const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().optional()
    .describe("API key for the Gemini API; without it answers fall back to tool output"),
  GEMINI_MODEL: z.string().trim().min(1).default("gemini-2.0-flash"),
  DEBUG: BooleanFlagSchema.optional(),
  ENVIRONMENT: z.string().trim().toLowerCase()
    .pipe(z.enum(["development", "production", "test"]))
    .default("development"),
  VERCEL: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.string().trim().toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .optional(),
  LOG_DIR: z.string().trim().min(1).optional(),
  TRANSPORT: z.string().trim().toLowerCase()
    .pipe(z.enum(["http", "stdio"]))
    .default("http"),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).max(10000).default(30),
});

// ============================================================================
// Loading
// ============================================================================

/**
 * Empty strings in the environment mean "unset"
 */
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      picked[key] = value;
    }
  }
  return picked;
}

/**
 * Freeze the config and each of its sections
 */
function freezeConfig(config: TutorConfig): TutorConfig {
  for (const section of Object.values(config)) {
    if (typeof section === "object" && section !== null) {
      Object.freeze(section);
    }
  }
  return Object.freeze(config);
}

/**
 * Load configuration from environment variables. The result is frozen.
 *
 * @throws {ToolError} CONFIG_INVALID - when a variable fails validation
 *
 * @example
 * const config = loadConfig({ ENVIRONMENT: "production", VERCEL: "1" });
 * // config.server.request_timeout_ms === 8000
 * // config.logging.level === "info"
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): TutorConfig {
  const parsed = EnvSchema.safeParse(pickDefined(env));
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join(".")))];
    throw createToolError("CONFIG_INVALID", `Invalid environment configuration: ${keys.join(", ")}`, {
      details: parsed.error.issues.map(issue => ({ key: issue.path.join("."), message: issue.message })),
      suggestion: "Check the listed environment variables",
    });
  }

  const vars = parsed.data;
  const isVercel = vars.VERCEL === "1";

  const base: TutorConfig = {
    environment: vars.ENVIRONMENT,
    debug: vars.DEBUG ?? false,
    is_vercel: isVercel,
    transport: vars.TRANSPORT,

    server: {
      host: vars.HOST,
      port: vars.PORT,
      public_dir: path.join(PROJECT_ROOT, "public"),
      max_active_requests: isVercel ? 5 : 10,
      request_timeout_ms: isVercel ? 8_000 : 30_000,
      request_cleanup_delay_ms: isVercel ? 60_000 : 300_000,
    },

    gemini: {
      api_key: vars.GEMINI_API_KEY,
      model: vars.GEMINI_MODEL,
      temperature: 0.7,
      top_p: 0.8,
      top_k: 40,
      max_output_tokens: 2048,
      timeout_ms: isVercel ? 8_000 : 30_000,
      max_retries: 2,
      retry_delay_ms: 1_000,
    },

    rate_limit: {
      per_minute: vars.RATE_LIMIT_PER_MINUTE,
    },

    circuit_breaker: {
      failure_threshold: 5,
      reset_timeout_ms: 60_000,
    },

    history: {
      max_entries_per_session: 50,
      max_sessions: 1_000,
      context_turns: 3,
    },

    cache: {
      ttl_ms: 5 * 60_000,
      max_entries: 500,
    },

    logging: {
      level: vars.LOG_LEVEL ?? (vars.ENVIRONMENT === "production" ? "info" : "debug"),
      log_dir: vars.LOG_DIR,
    },
  };

  return freezeConfig({
    ...base,
    ...(overrides.environment !== undefined ? { environment: overrides.environment } : {}),
    ...(overrides.debug !== undefined ? { debug: overrides.debug } : {}),
    ...(overrides.is_vercel !== undefined ? { is_vercel: overrides.is_vercel } : {}),
    ...(overrides.transport !== undefined ? { transport: overrides.transport } : {}),
    server: { ...base.server, ...overrides.server },
    gemini: { ...base.gemini, ...overrides.gemini },
    rate_limit: { ...base.rate_limit, ...overrides.rate_limit },
    circuit_breaker: { ...base.circuit_breaker, ...overrides.circuit_breaker },
    history: { ...base.history, ...overrides.history },
    cache: { ...base.cache, ...overrides.cache },
    logging: { ...base.logging, ...overrides.logging },
  });
}
