/**
 * Subject Tutor: Application Wiring
 *
 * Builds every long-lived component from a config once, so the HTTP server,
 * the stdio MCP server and the tests share the same construction.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import type express from "express";
import { TutorAgent } from "./agents/tutor-agent.js";
import type { SubjectAgent } from "./agents/base-agent.js";
import type { TutorConfig } from "./config.js";
import { HistoryManager } from "./history-manager.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { MetricsCollector } from "./metrics.js";
import { QueryHandler } from "./query-handler.js";
import { RequestTracker } from "./request-tracker.js";
import { createApp } from "./server.js";
import { GeminiClient } from "./services/gemini-client.js";
import type { ContentGenerator, LlmClient } from "./services/gemini-client.js";
import type { TutorSubject } from "./types.js";

export interface RuntimeOptions {
  logger?: Logger;
  /** Replaces the Gemini client entirely */
  llm?: LlmClient;
  /** Keeps the Gemini client but swaps its transport */
  generator?: ContentGenerator;
  agents?: Partial<Record<TutorSubject, SubjectAgent>>;
}

export interface TutorRuntime {
  config: TutorConfig;
  logger: Logger;
  llm: LlmClient;
  tutor: TutorAgent;
  history: HistoryManager;
  tracker: RequestTracker;
  metrics: MetricsCollector;
  queries: QueryHandler;
  app: express.Express;
  /** Cancels pending cleanup timers */
  dispose(): void;
}

export function createRuntime(config: TutorConfig, options: RuntimeOptions = {}): TutorRuntime {
  const logger = options.logger ?? silentLogger;

  const llm = options.llm ?? new GeminiClient({
    gemini: config.gemini,
    rate_limit_per_minute: config.rate_limit.per_minute,
    circuit_breaker: config.circuit_breaker,
    generator: options.generator,
    logger,
  });

  const tutor = new TutorAgent({ llm, cache: config.cache, logger, agents: options.agents });
  const history = new HistoryManager(config.history);
  const tracker = new RequestTracker(config.server.request_cleanup_delay_ms);
  const metrics = new MetricsCollector();
  const queries = new QueryHandler({ config, tutor, history, tracker, metrics, logger });
  const app = createApp({ config, queries, history, tracker, metrics, llm, logger });

  return {
    config,
    logger,
    llm,
    tutor,
    history,
    tracker,
    metrics,
    queries,
    app,
    dispose: () => tracker.dispose(),
  };
}
