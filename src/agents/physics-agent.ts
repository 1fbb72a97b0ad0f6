/**
 * Subject Tutor: Physics Agent
 *
 * Routing inside the agent, first match wins:
 * 1. unit conversion requests ("convert 5 km to miles") -> unit converter
 * 2. constants named in the question -> constant lookup
 * 3. LLM analysis of the question; a constant it names -> constant lookup
 * 4. otherwise a general explanation backed by the formula library
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { preview } from "../logger.js";
import { physicsAnalysisPrompt, physicsConstantPrompt, physicsExplanationPrompt } from "../prompts.js";
import { findConstantsInText, lookupConstant } from "../tools/constant-lookup.js";
import { findFormulas } from "../tools/formula-lookup.js";
import { convertUnits, parseConversionRequest } from "../tools/unit-converter.js";
import type { AgentResponse } from "../types.js";
import { formatNumber } from "../utils.js";
import { SUCCESS_CONFIDENCE, SubjectAgent, ToolTrace } from "./base-agent.js";
import type { AgentRunOptions } from "./base-agent.js";

/** Confidence when the analysis step returned something unreadable */
export const UNPARSED_ANALYSIS_CONFIDENCE = 0.8;

const GENERAL_FOCUS = "the underlying physics concepts";

export const PhysicsAnalysisSchema = z.object({
  needs_constant: z.boolean(),
  constant_name: z.string().trim().min(1).nullish(),
  explanation_needed: z.string().trim().min(1).nullish(),
});

export type PhysicsAnalysis = z.infer<typeof PhysicsAnalysisSchema>;

/**
 * Parse the analysis JSON, tolerating markdown code fences and text around
 * the object. Returns null when no valid object can be read.
 */
export function parseAnalysis(text: string): PhysicsAnalysis | null {
  const unfenced = text.replace(/```(?:json)?/gi, "").trim();
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(unfenced.slice(start, end + 1));
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }

  const parsed = PhysicsAnalysisSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class PhysicsAgent extends SubjectAgent {
  readonly subject = "physics" as const;

  async answer(question: string, options: AgentRunOptions = {}): Promise<AgentResponse> {
    const trace = new ToolTrace();

    const conversion = parseConversionRequest(question);
    if (conversion) {
      trace.run("unit_converter", { ...conversion }, () => convertUnits(conversion));
      const prompt = physicsExplanationPrompt(question, "the unit conversion and how the two units relate", trace.promptSection());
      return this.compose(prompt, trace, options);
    }

    const [mentioned] = findConstantsInText(question);
    if (mentioned) {
      const response = await this.explainConstant(question, mentioned.symbol, trace, options);
      if (response) return response;
    }

    const raw = await this.tryGenerate(physicsAnalysisPrompt(question), options);
    const analysis = raw === null ? null : parseAnalysis(raw);
    if (raw !== null && analysis === null) {
      this.logger.warn("Could not parse question analysis", { response: preview(raw) });
    }

    if (analysis?.needs_constant && analysis.constant_name) {
      const response = await this.explainConstant(question, analysis.constant_name, trace, options);
      if (response) return response;
    }

    const formulaQuery = { query: question, subject: "physics" as const, limit: 2 };
    trace.run("formula_fetcher", formulaQuery, () => findFormulas(formulaQuery),
      result => (result.formulas.length > 0 ? result.formatted : null));

    const focus = analysis?.explanation_needed ?? GENERAL_FOCUS;
    return this.compose(physicsExplanationPrompt(question, focus, trace.promptSection()), trace, {
      ...options,
      confidence: raw !== null && analysis === null ? UNPARSED_ANALYSIS_CONFIDENCE : SUCCESS_CONFIDENCE,
    });
  }

  /**
   * Look up a constant and explain it. Null when the lookup finds nothing.
   */
  private async explainConstant(
    question: string,
    query: string,
    trace: ToolTrace,
    options: AgentRunOptions
  ): Promise<AgentResponse | null> {
    const input = { query, subject: "physics" as const };
    const constant = trace.run("constant_lookup", input, () => lookupConstant(input));
    if (!constant) return null;

    return this.compose(physicsConstantPrompt(question, constant.formatted), trace, {
      ...options,
      fallback: () => `${constant.symbol} = ${formatNumber(constant.value)} ${constant.unit}\n\n${constant.description}`,
    });
  }
}
