/**
 * Subject Tutor: Subject Agent Base
 *
 * A subject agent runs its tools into a per-call `ToolTrace`, then asks the
 * LLM for an explanation that embeds the verified tool output. When the LLM
 * call fails and a tool produced something usable, the answer is composed
 * from the tool output alone and marked `degraded`.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { LlmClient } from "../services/gemini-client.js";
import type { AgentResponse, ToolResult, ToolType, TutorSubject } from "../types.js";
import { errorMessage, isToolError } from "../utils.js";

export const SUCCESS_CONFIDENCE = 0.9;
export const DEGRADED_CONFIDENCE = 0.6;

export const DEGRADED_NOTE = "A detailed explanation is not available right now; the result above was computed directly.";

export interface AgentRunOptions {
  signal?: AbortSignal;
  /** Rendered conversation history for follow-up questions */
  context?: string;
}

// ============================================================================
// Tool Trace
// ============================================================================

/**
 * Tool calls made while answering one question
 */
export class ToolTrace {
  readonly results: ToolResult[] = [];
  private readonly lines: string[] = [];

  /**
   * Run a tool and record it. Tool errors are recorded as failed results and
   * yield null; anything else is a bug and propagates.
   */
  run<T extends { formatted: string }>(
    tool_type: ToolType,
    input_data: Record<string, unknown>,
    fn: () => T,
    summarize?: (result: T) => string | null
  ): T | null;
  run<T>(
    tool_type: ToolType,
    input_data: Record<string, unknown>,
    fn: () => T,
    summarize: (result: T) => string | null
  ): T | null;
  run<T extends { formatted: string }>(
    tool_type: ToolType,
    input_data: Record<string, unknown>,
    fn: () => T,
    summarize: (result: T) => string | null = result => result.formatted
  ): T | null {
    const start = performance.now();
    try {
      const result = fn();
      this.results.push({
        tool_type,
        input_data,
        result,
        success: true,
        duration_ms: Math.round(performance.now() - start),
      });
      const line = summarize(result);
      if (line) this.lines.push(line);
      return result;
    } catch (err) {
      if (!isToolError(err)) throw err;
      this.results.push({
        tool_type,
        input_data,
        result: null,
        success: false,
        error_message: err.message,
        duration_ms: Math.round(performance.now() - start),
      });
      return null;
    }
  }

  get hasOutput(): boolean {
    return this.lines.length > 0;
  }

  /** Tool output formatted for inclusion in a prompt */
  promptSection(): string | undefined {
    return this.hasOutput ? `Verified tool results:\n${this.lines.map(line => `- ${line}`).join("\n")}` : undefined;
  }

  /** Answer built from tool output alone, or null when there is none */
  degradedAnswer(): string | null {
    return this.hasOutput ? `${this.lines.join("\n\n")}\n\n${DEGRADED_NOTE}` : null;
  }
}

// ============================================================================
// Base Agent
// ============================================================================

export interface ComposeOptions extends AgentRunOptions {
  confidence?: number;
  /** Overrides the trace's own degraded answer */
  fallback?: () => string | null;
}

export abstract class SubjectAgent {
  abstract readonly subject: TutorSubject;
  protected readonly logger: Logger;

  constructor(protected readonly llm: LlmClient, logger?: Logger) {
    this.logger = (logger ?? silentLogger).child(this.constructor.name);
  }

  /**
   * Answer a question routed to this agent
   */
  abstract answer(question: string, options?: AgentRunOptions): Promise<AgentResponse>;

  /**
   * Ask the LLM for the final answer, degrading to tool output on failure.
   *
   * @throws the LLM error when the trace has nothing to fall back on, or the
   * abort reason when the caller cancelled
   */
  protected async compose(prompt: string, trace: ToolTrace, options: ComposeOptions = {}): Promise<AgentResponse> {
    try {
      const answer = await this.llm.generate(prompt, {
        kind: "generate",
        signal: options.signal,
        context: options.context,
      });
      return {
        agent_type: this.subject,
        answer,
        tools_used: trace.results,
        confidence: options.confidence ?? SUCCESS_CONFIDENCE,
      };
    } catch (err) {
      if (options.signal?.aborted) throw err;

      const fallback = options.fallback ? options.fallback() : trace.degradedAnswer();
      if (fallback === null) throw err;

      this.logger.warn("LLM unavailable, answering from tool output", { error: errorMessage(err) });
      return {
        agent_type: this.subject,
        answer: fallback,
        tools_used: trace.results,
        confidence: DEGRADED_CONFIDENCE,
        degraded: true,
      };
    }
  }

  /**
   * Optional LLM call whose failure only loses a hint
   */
  protected async tryGenerate(prompt: string, options: AgentRunOptions): Promise<string | null> {
    try {
      return await this.llm.generate(prompt, { kind: "generate", signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      this.logger.warn("Auxiliary LLM call failed", { error: errorMessage(err) });
      return null;
    }
  }
}
