/**
 * Subject Tutor: Canonical Data Types
 *
 * These types define the request/response records that flow from the HTTP
 * and MCP surfaces through the tutor, the subject agents and their tools.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

// ============================================================================
// Subjects & Tools
// ============================================================================

export const SUBJECTS = ["math", "physics", "chemistry"] as const;

/** A subject the tutor has a dedicated agent for */
export type TutorSubject = (typeof SUBJECTS)[number];

/** `unknown` covers greetings and anything outside the three subjects */
export type Subject = TutorSubject | "unknown";

export const TOOL_TYPES = [
  "calculator",
  "equation_solver",
  "constant_lookup",
  "unit_converter",
  "formula_fetcher",
  "periodic_table",
  "molar_mass",
  "stoichiometry",
] as const;

export type ToolType = (typeof TOOL_TYPES)[number];

export function isTutorSubject(value: string): value is TutorSubject {
  return SUBJECTS.some(subject => subject === value);
}

// ============================================================================
// Agent Records
// ============================================================================

export interface ToolResult<T = unknown> {
  tool_type: ToolType;
  input_data: Record<string, unknown>;
  result: T | null;
  success: boolean;
  error_message?: string;
  duration_ms: number;
}

export interface AgentResponse {
  agent_type: Subject;
  answer: string;
  tools_used: ToolResult[];
  confidence: number;          // 0-1
  degraded?: boolean;          // Answer composed from tool output without the LLM
}

export type ClassificationMethod = "heuristic" | "llm" | "conversational" | "fallback";

export interface QueryResponse {
  request_id: string;
  question: string;
  subject_identified: Subject;
  classification: {
    method: ClassificationMethod;
    confidence: number;
  };
  response: AgentResponse;
  session_id: string;
  cached: boolean;
  timestamp: string;           // ISO8601
  processing_time_ms: number;
}

export interface HistoryEntry {
  question: string;
  response: QueryResponse;
  timestamp: string;
}

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "INVALID_INPUT"
  | "CONFIG_INVALID"
  | "NOT_FOUND"
  // Tool errors
  | "CALCULATION_ERROR"
  | "UNSUPPORTED_EQUATION"
  | "UNKNOWN_UNIT"
  | "INCOMPATIBLE_UNITS"
  | "INVALID_FORMULA"
  | "UNBALANCED_EQUATION"
  | "CANNOT_BALANCE"
  | "SPECIES_NOT_FOUND"
  // LLM errors
  | "LLM_NOT_CONFIGURED"
  | "LLM_RATE_LIMITED"
  | "LLM_UNAVAILABLE"
  | "LLM_TIMEOUT"
  | "LLM_MODEL_NOT_FOUND"
  | "LLM_EMPTY_RESPONSE"
  | "LLM_ERROR"
  // Server errors
  | "TIMEOUT"
  | "INTERNAL_ERROR";

export interface ToolError {
  isError: true;
  code: ErrorCode;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestion?: string;
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  status_code: number;
  details?: unknown;
  retry_after_seconds?: number;
}

// ============================================================================
// Event Types (for logging)
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EventLogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}
