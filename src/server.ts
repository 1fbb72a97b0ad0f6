/**
 * Subject Tutor: HTTP Server
 *
 * Routes:
 * - GET  /                      static tutor page
 * - GET  /static/*              static assets
 * - POST /api/query             ask the tutor
 * - GET  /api/health            liveness and load
 * - GET  /api/metrics           request, tool, cache and LLM counters
 * - GET  /api/history/:id       conversation history (?limit=N)
 * - DELETE /api/history/:id     forget a conversation
 * - POST /mcp                   MCP over stateless streamable HTTP
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { ServerResponse } from "http";
import * as path from "path";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { TutorConfig } from "./config.js";
import type { HistoryManager } from "./history-manager.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { createMcpServer } from "./mcp.js";
import type { MetricsCollector } from "./metrics.js";
import { SessionIdSchema } from "./query-handler.js";
import type { QueryHandler } from "./query-handler.js";
import type { RequestTracker } from "./request-tracker.js";
import type { LlmClient } from "./services/gemini-client.js";
import type { ToolError } from "./types.js";
import {
  createToolError,
  errorMessage,
  generateRequestId,
  now,
  toErrorResponse,
  toToolError,
} from "./utils.js";

export interface AppDependencies {
  config: TutorConfig;
  queries: QueryHandler;
  history: HistoryManager;
  tracker: RequestTracker;
  metrics: MetricsCollector;
  llm: LlmClient;
  logger?: Logger;
}

interface RequestTiming {
  request_id: string;
  started: number;
}

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

/**
 * Express's body parser errors carry a `type` such as "entity.parse.failed"
 */
function isBodyParserError(err: unknown): boolean {
  return err instanceof Error && "type" in err && typeof err.type === "string" && err.type.startsWith("entity.");
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, queries, history, tracker, metrics, llm } = deps;
  const logger = (deps.logger ?? silentLogger).child("http");
  const startedAt = Date.now();
  const timings = new WeakMap<ServerResponse, RequestTiming>();

  const timingOf = (res: ServerResponse): RequestTiming => {
    const timing = timings.get(res);
    if (timing) return timing;
    const fresh = { request_id: generateRequestId(), started: performance.now() };
    timings.set(res, fresh);
    return fresh;
  };

  const stampProcessTime = (res: ServerResponse): void => {
    const elapsed = (performance.now() - timingOf(res).started) / 1000;
    res.setHeader("X-Process-Time", elapsed.toFixed(4));
  };

  const sendJson = (res: Response, statusCode: number, data: unknown): void => {
    stampProcessTime(res);
    res.status(statusCode).json(data);
  };

  const sendError = (res: Response, error: ToolError): void => {
    const body = toErrorResponse(error, config.debug);
    if (body.retry_after_seconds !== undefined) {
      res.setHeader("Retry-After", String(body.retry_after_seconds));
    }
    sendJson(res, body.status_code, body);
  };

  const app = express();
  app.disable("x-powered-by");

  // Request ID, CORS and access log
  app.use((req, res, next) => {
    const timing = timingOf(res);
    res.setHeader("X-Request-Id", timing.request_id);
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, Mcp-Session-Id");
    res.setHeader("Access-Control-Expose-Headers", "X-Request-Id, X-Process-Time, Retry-After");

    res.on("finish", () => {
      logger.debug("Request handled", {
        request_id: timing.request_id,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(performance.now() - timing.started),
      });
    });

    if (req.method === "OPTIONS") {
      stampProcessTime(res);
      res.status(204).end();
      return;
    }
    next();
  });

  app.use(express.json({ limit: "1mb" }));

  // ==========================================================================
  // Static page
  // ==========================================================================

  app.get("/", (_req, res) => {
    stampProcessTime(res);
    res.sendFile(path.join(config.server.public_dir, "index.html"), (err) => {
      if (err && !res.headersSent) {
        sendError(res, createToolError("NOT_FOUND", "Tutor page is not available"));
      }
    });
  });

  app.use("/static", express.static(config.server.public_dir, {
    setHeaders: (res) => stampProcessTime(res),
  }));

  // ==========================================================================
  // API
  // ==========================================================================

  app.post("/api/query", async (req, res) => {
    try {
      const response = await queries.handle(req.body, timingOf(res).request_id);
      sendJson(res, 200, response);
    } catch (err) {
      sendError(res, toToolError(err));
    }
  });

  app.get("/api/health", (_req, res) => {
    const counts = tracker.counts();
    const overloaded = counts.active > config.server.max_active_requests;
    sendJson(res, overloaded ? 503 : 200, {
      status: overloaded ? "overloaded" : "healthy",
      environment: config.environment,
      is_vercel: config.is_vercel,
      timestamp: now(),
      uptime_ms: Date.now() - startedAt,
      active_requests: counts.active,
      recent_timeouts: counts.recent_timeouts,
      recent_errors: counts.recent_errors,
      llm: {
        configured: llm.isConfigured(),
        model: llm.model,
        circuit_state: llm.circuitState(),
      },
    });
  });

  app.get("/api/metrics", (_req, res) => {
    sendJson(res, 200, {
      ...metrics.snapshot(llm.getStats()),
      active_requests: tracker.activeCount(),
      sessions: history.getSessionCount(),
      history_entries: history.getTotalEntries(),
    });
  });

  app.get("/api/history/:sessionId", (req, res) => {
    const sessionId = SessionIdSchema.safeParse(req.params.sessionId);
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!sessionId.success || !query.success) {
      const issues = [
        ...(sessionId.success ? [] : sessionId.error.issues),
        ...(query.success ? [] : query.error.issues),
      ];
      sendError(res, createToolError("INVALID_INPUT", `Invalid input: ${issues.map(issue => issue.message).join("; ")}`, {
        details: issues,
        recoverable: true,
      }));
      return;
    }

    if (!history.hasSession(sessionId.data)) {
      sendError(res, createToolError("NOT_FOUND", `No history for session '${sessionId.data}'`, { recoverable: true }));
      return;
    }

    const entries = history.getHistory(sessionId.data, query.data.limit);
    sendJson(res, 200, { session_id: sessionId.data, count: entries.length, entries });
  });

  app.delete("/api/history/:sessionId", (req, res) => {
    const sessionId = SessionIdSchema.safeParse(req.params.sessionId);
    if (!sessionId.success) {
      sendError(res, createToolError("INVALID_INPUT", sessionId.error.issues[0].message, { recoverable: true }));
      return;
    }
    const cleared = history.clearSession(sessionId.data);
    logger.info("History cleared", { session_id: sessionId.data, cleared });
    sendJson(res, 200, { session_id: sessionId.data, cleared });
  });

  // ==========================================================================
  // MCP endpoint
  // ==========================================================================

  app.post("/mcp", async (req, res) => {
    const server = createMcpServer({ queries, llm, logger: deps.logger });
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      transport.close().catch((err) => logger.warn("MCP transport close failed", { error: errorMessage(err) }));
      server.close().catch((err) => logger.warn("MCP server close failed", { error: errorMessage(err) }));
    });

    try {
      await server.connect(transport);
      stampProcessTime(res);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error("MCP request failed", { error: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  app.all("/mcp", (_req, res) => {
    sendJson(res, 405, {
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  // ==========================================================================
  // Fallthrough
  // ==========================================================================

  app.use((req, res) => {
    sendError(res, createToolError("NOT_FOUND", `Route ${req.method} ${req.path} not found`));
  });

  // Express recognises error handlers by their four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err)) {
      sendError(res, createToolError("INVALID_INPUT", `Invalid request body: ${errorMessage(err)}`, { recoverable: true }));
      return;
    }
    logger.error("Unhandled error", { error: errorMessage(err) });
    sendError(res, toToolError(err));
  });

  return app;
}
