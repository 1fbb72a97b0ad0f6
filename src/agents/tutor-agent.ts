/**
 * Subject Tutor: Tutor Agent
 *
 * Classifies a question, hands it to the subject agent, and caches answers
 * to context-free questions for a few minutes.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { classifySubject } from "../classifier.js";
import type { ClassifySubjectResult } from "../classifier.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { UNKNOWN_SUBJECT_ANSWER } from "../prompts.js";
import type { LlmClient } from "../services/gemini-client.js";
import type { AgentResponse, ClassificationMethod, Subject, TutorSubject } from "../types.js";
import { normalizeText } from "../utils.js";
import type { AgentRunOptions, SubjectAgent } from "./base-agent.js";
import { ChemistryAgent } from "./chemistry-agent.js";
import { MathAgent } from "./math-agent.js";
import { PhysicsAgent } from "./physics-agent.js";

export interface TutorAnswer {
  subject: Subject;
  classification: {
    method: ClassificationMethod;
    confidence: number;
  };
  response: AgentResponse;
  cached: boolean;
}

export interface TutorAgentOptions {
  llm: LlmClient;
  cache: { ttl_ms: number; max_entries: number };
  logger?: Logger;
  /** Replaces the default agent for a subject */
  agents?: Partial<Record<TutorSubject, SubjectAgent>>;
  clock?: () => number;
}

interface CacheEntry {
  answer: Omit<TutorAnswer, "cached">;
  expires_at: number;
}

export class TutorAgent {
  private readonly llm: LlmClient;
  private readonly logger: Logger;
  private readonly agents: Record<TutorSubject, SubjectAgent>;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(options: TutorAgentOptions) {
    this.llm = options.llm;
    this.logger = (options.logger ?? silentLogger).child("tutor");
    this.ttlMs = options.cache.ttl_ms;
    this.maxEntries = options.cache.max_entries;
    this.clock = options.clock ?? Date.now;
    this.agents = {
      math: options.agents?.math ?? new MathAgent(this.llm, options.logger),
      physics: options.agents?.physics ?? new PhysicsAgent(this.llm, options.logger),
      chemistry: options.agents?.chemistry ?? new ChemistryAgent(this.llm, options.logger),
    };
  }

  /**
   * Answer a question. Questions asked with conversation context bypass the
   * cache in both directions.
   */
  async answer(question: string, options: AgentRunOptions = {}): Promise<TutorAnswer> {
    const useCache = !options.context && this.ttlMs > 0 && this.maxEntries > 0;
    const key = normalizeText(question);

    if (useCache) {
      const hit = this.lookup(key);
      if (hit) {
        this.logger.debug("Cache hit", { subject: hit.subject });
        return { ...hit, cached: true };
      }
    }

    const classification = await this.classify(question, options);
    const response = await this.dispatch(question, classification, options);
    const answer: Omit<TutorAnswer, "cached"> = {
      subject: classification.subject,
      classification: { method: classification.method, confidence: classification.confidence },
      response,
    };

    if (useCache && !response.degraded) {
      this.store(key, answer);
    }
    return { ...answer, cached: false };
  }

  classify(question: string, options: AgentRunOptions = {}): Promise<ClassifySubjectResult> {
    return classifySubject({ question }, { llm: this.llm, logger: this.logger, signal: options.signal });
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async dispatch(
    question: string,
    classification: ClassifySubjectResult,
    options: AgentRunOptions
  ): Promise<AgentResponse> {
    const subject = classification.subject;
    this.logger.info("Routing question", {
      subject,
      method: classification.method,
      confidence: classification.confidence,
    });

    if (subject === "unknown") {
      return {
        agent_type: "unknown",
        answer: UNKNOWN_SUBJECT_ANSWER,
        tools_used: [],
        confidence: 1,
      };
    }
    return this.agents[subject].answer(question, options);
  }

  private lookup(key: string): Omit<TutorAnswer, "cached"> | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (entry.expires_at <= this.clock()) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.answer;
  }

  private store(key: string, answer: Omit<TutorAnswer, "cached">): void {
    this.cache.delete(key);
    this.cache.set(key, { answer, expires_at: this.clock() + this.ttlMs });
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
