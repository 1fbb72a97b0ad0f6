/**
 * Subject Tutor: Query Pipeline
 *
 * One tutor request end to end: validation, request tracking, history
 * context, the tutor call under the request deadline, then history and
 * metrics bookkeeping. Shared by the HTTP route and the `tutor_ask` MCP tool.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import type { TutorAgent } from "./agents/tutor-agent.js";
import type { TutorConfig } from "./config.js";
import type { HistoryManager } from "./history-manager.js";
import { preview, silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { MetricsCollector } from "./metrics.js";
import type { RequestTracker } from "./request-tracker.js";
import type { QueryResponse } from "./types.js";
import {
  createToolError,
  generateRequestId,
  generateSessionId,
  now,
  parseInput,
  toToolError,
  withTimeout,
} from "./utils.js";

export const SessionIdSchema = z.string().trim()
  .min(1, "Session ID cannot be empty")
  .max(128, "Session ID is too long")
  .regex(/^[A-Za-z0-9_-]+$/, "Session ID may only contain letters, digits, '-' and '_'");

export const QueryRequestSchema = z.object({
  question: z.string().trim().min(1, "Question cannot be empty").max(2000, "Question is too long (max 2000 characters)")
    .describe("❓ The student's question in math, physics or chemistry"),
  session_id: SessionIdSchema.optional()
    .describe("💬 Conversation to continue; a new one is started when omitted"),
});

export type QueryRequest = z.input<typeof QueryRequestSchema>;

export interface QueryHandlerDeps {
  config: TutorConfig;
  tutor: TutorAgent;
  history: HistoryManager;
  tracker: RequestTracker;
  metrics: MetricsCollector;
  logger?: Logger;
}

export class QueryHandler {
  private readonly logger: Logger;

  constructor(private readonly deps: QueryHandlerDeps) {
    this.logger = (deps.logger ?? silentLogger).child("query");
  }

  /**
   * @throws {ToolError} INVALID_INPUT, TIMEOUT, or whatever the tutor raised
   */
  async handle(input: unknown, requestId: string = generateRequestId()): Promise<QueryResponse> {
    const { config, tutor, history, tracker, metrics } = this.deps;
    const request = parseInput(QueryRequestSchema, input);
    const sessionId = request.session_id ?? generateSessionId();
    const timeoutMs = config.server.request_timeout_ms;

    tracker.start(requestId);
    const start = performance.now();
    this.logger.info("Query received", { request_id: requestId, session_id: sessionId, question: preview(request.question) });

    const controller = new AbortController();
    try {
      const context = history.getContext(sessionId, config.history.context_turns) || undefined;
      const answer = await withTimeout(
        tutor.answer(request.question, { signal: controller.signal, context }),
        timeoutMs,
        () => createToolError("TIMEOUT", `Request timed out after ${timeoutMs / 1000} seconds`, {
          recoverable: true,
          suggestion: "Try a shorter or simpler question",
        }),
        controller
      );

      const processingTime = Math.round(performance.now() - start);
      const response: QueryResponse = {
        request_id: requestId,
        question: request.question,
        subject_identified: answer.subject,
        classification: answer.classification,
        response: answer.response,
        session_id: sessionId,
        cached: answer.cached,
        timestamp: now(),
        processing_time_ms: processingTime,
      };

      history.addEntry(sessionId, request.question, response);
      tracker.complete(requestId);
      metrics.record({
        outcome: "success",
        latency_ms: processingTime,
        subject: answer.subject,
        cached: answer.cached,
        tools: answer.cached ? [] : answer.response.tools_used,
      });
      this.logger.info("Query answered", {
        request_id: requestId,
        subject: answer.subject,
        method: answer.classification.method,
        cached: answer.cached,
        degraded: answer.response.degraded ?? false,
        processing_time_ms: processingTime,
      });
      return response;
    } catch (err) {
      const error = toToolError(err);
      const timedOut = error.code === "TIMEOUT";
      tracker.fail(requestId, timedOut ? "timeout" : "error", error.message);
      metrics.record({
        outcome: timedOut ? "timeout" : "error",
        latency_ms: Math.round(performance.now() - start),
        error_code: error.code,
      });
      this.logger.error("Query failed", {
        request_id: requestId,
        code: error.code,
        error: error.message,
        ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
      });
      throw error;
    }
  }
}
