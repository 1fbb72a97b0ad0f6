/**
 * Subject Tutor: Math Agent
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { NO_CALCULATION, expressionExtractionPrompt, mathExplanationPrompt } from "../prompts.js";
import { calculate, collectVariables, isConstantName, parseExpression } from "../tools/calculator.js";
import type { CalculateResult } from "../tools/calculator.js";
import { solveEquation } from "../tools/equation-solver.js";
import type { AgentResponse } from "../types.js";
import { isToolError } from "../utils.js";
import { SubjectAgent, ToolTrace } from "./base-agent.js";
import type { AgentRunOptions } from "./base-agent.js";

const LEADING_PHRASE =
  /^(?:please\s+)?(?:what\s+is|what's|whats|calculate|compute|evaluate|simplify|find|work\s+out|how\s+much\s+is|solve)\s+(?:the\s+value\s+of\s+)?/i;

/** Spoken operators rewritten into the calculator grammar */
const WORD_OPERATORS: ReadonlyArray<[RegExp, string]> = [
  [/\bsquare root of\b/gi, "sqrt "],
  [/\bcube root of\b/gi, "cbrt "],
  [/\bto the power of\b/gi, "^"],
  [/\bmultiplied by\b/gi, "*"],
  [/\bdivided by\b/gi, "/"],
  [/\btimes\b/gi, "*"],
  [/\bplus\b/gi, "+"],
  [/\bminus\b/gi, "-"],
  [/\bsquared\b/gi, "^2"],
  [/\bcubed\b/gi, "^3"],
  [/\bthe\b/gi, ""],
];

/**
 * Reduce a question to the math it asks about:
 * "What is the square root of 144?" -> "sqrt 144"
 */
export function extractMathText(question: string): string {
  let text = question.trim()
    .replace(/[?!.]+$/, "")
    .replace(LEADING_PHRASE, "")
    .replace(/^(?:the\s+)?(?:equation|expression)\s*:?\s*/i, "");
  for (const [pattern, replacement] of WORD_OPERATORS) {
    text = text.replace(pattern, replacement);
  }
  return text.replace(/\s*=\s*\??\s*$/, "").replace(/\s+/g, " ").trim();
}

/**
 * A closed arithmetic expression: parses, and every identifier is a
 * function or constant
 */
export function isPlainExpression(text: string): boolean {
  if (!/\d/.test(text)) return false;
  try {
    return collectVariables(parseExpression(text)).every(isConstantName);
  } catch (err) {
    if (isToolError(err)) return false;
    throw err;
  }
}

function summarizeCalculation(result: CalculateResult): string {
  return `${result.expression} = ${result.formatted}`;
}

export class MathAgent extends SubjectAgent {
  readonly subject = "math" as const;

  async answer(question: string, options: AgentRunOptions = {}): Promise<AgentResponse> {
    const trace = new ToolTrace();
    const text = extractMathText(question);

    if (text.includes("=") && /[A-Za-z]/.test(text)) {
      const match = /^(.*?)\s+for\s+([A-Za-z])$/i.exec(text);
      const input = match ? { equation: match[1], variable: match[2] } : { equation: text };
      trace.run("equation_solver", input, () => solveEquation(input),
        result => `${result.equation}: ${result.formatted}`);
    } else if (isPlainExpression(text)) {
      trace.run("calculator", { expression: text }, () => calculate({ expression: text }), summarizeCalculation);
    } else {
      await this.calculateExtracted(question, trace, options);
    }

    return this.compose(mathExplanationPrompt(question, trace.promptSection()), trace, options);
  }

  /**
   * Ask the LLM which calculation a worded problem needs, then run it
   */
  private async calculateExtracted(question: string, trace: ToolTrace, options: AgentRunOptions): Promise<void> {
    const extracted = await this.tryGenerate(expressionExtractionPrompt(question), options);
    if (extracted === null) return;

    const expression = extracted.trim().replace(/^[`"']+|[`"']+$/g, "").trim();
    if (!expression || expression.toLowerCase().includes(NO_CALCULATION)) {
      this.logger.debug("No calculation needed", { question });
      return;
    }
    trace.run("calculator", { expression }, () => calculate({ expression }), summarizeCalculation);
  }
}
