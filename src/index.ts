#!/usr/bin/env node
/**
 * Subject Tutor: Main Server Entry Point
 *
 * TRANSPORT=http (default) serves the web API, the tutor page and /mcp;
 * TRANSPORT=stdio serves MCP over stdin/stdout.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type { Server } from "http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createRuntime } from "./app.js";
import type { TutorRuntime } from "./app.js";
import { loadConfig } from "./config.js";
import { FileLogSink, Logger, stderrSink } from "./logger.js";
import type { LogSink } from "./logger.js";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./mcp.js";
import { errorMessage } from "./utils.js";

async function runStdio(runtime: TutorRuntime): Promise<void> {
  const server = createMcpServer({ queries: runtime.queries, llm: runtime.llm, logger: runtime.logger });
  await server.connect(new StdioServerTransport());
  runtime.logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

function runHttp(runtime: TutorRuntime): Promise<Server> {
  const { host, port } = runtime.config.server;
  return new Promise((resolve, reject) => {
    const server = runtime.app.listen(port, host, () => {
      runtime.logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on http://${host}:${port}`, {
        environment: runtime.config.environment,
        llm_configured: runtime.llm.isConfigured(),
        model: runtime.llm.model,
      });
      resolve(server);
    });
    server.on("error", reject);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  const sinks: LogSink[] = [stderrSink];
  const fileSink = config.logging.log_dir ? new FileLogSink(config.logging.log_dir) : null;
  if (fileSink) {
    sinks.push(entry => fileSink.write(entry));
  }
  const logger = new Logger({ level: config.logging.level, component: "main", sinks });

  if (!config.gemini.api_key) {
    logger.warn("GEMINI_API_KEY is not set; answers will come from tools only");
  }

  const runtime = createRuntime(config, { logger });
  const httpServer = config.transport === "stdio" ? null : await runHttp(runtime);
  if (!httpServer) {
    await runStdio(runtime);
  }

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    runtime.dispose();
    const closeHttp = new Promise<void>((resolve) => {
      if (!httpServer) return resolve();
      httpServer.close(() => resolve());
    });
    closeHttp
      .then(() => fileSink?.close())
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("Shutdown failed:", errorMessage(error));
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  console.error("Fatal error:", errorMessage(error));
  process.exit(1);
});
