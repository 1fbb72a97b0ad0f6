/**
 * 🧭 Subject Classification - Subject Tutor
 *
 * Decides whether a question belongs to math, physics or chemistry.
 * Heuristic pattern scoring runs first and needs no LLM; the LLM is only
 * asked when the heuristics are tied or unsure.
 *
 * Features:
 * - Conversational detection (greetings, acknowledgments, very short input)
 * - Weighted pattern scores per subject, with element names and chemical
 *   formulas counting toward chemistry
 * - Confidence from the margin between the two best scores
 * - One-word LLM classification as a second opinion
 * - Deterministic fallback when the LLM is unavailable
 *
 * @module classifier
 * @see tests/subject-classification.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { preview, silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { classificationPrompt } from "./prompts.js";
import type { LlmClient } from "./services/gemini-client.js";
import { extractFormulas } from "./tools/molar-mass.js";
import { findElementsInText } from "./tools/periodic-table.js";
import { SUBJECTS, isTutorSubject } from "./types.js";
import type { ClassificationMethod, Subject, TutorSubject } from "./types.js";
import { errorMessage, parseInput, roundTo } from "./utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Complete classification result for a question
 */
export interface ClassifySubjectResult {
  /** The question as classified (trimmed) */
  question: string;
  /** Winning subject, `unknown` for greetings and off-topic questions */
  subject: Subject;
  /** Which stage produced the decision */
  method: ClassificationMethod;
  /** Confidence score (0-1) */
  confidence: number;
  /** Heuristic score per subject */
  scores: Record<TutorSubject, number>;
}

export interface ClassifyOptions {
  llm?: LlmClient;
  logger?: Logger;
  signal?: AbortSignal;
}

// ============================================================================
// Input Schema
// ============================================================================

export const ClassifySubjectInputSchema = z.object({
  question: z.string().trim().min(1, "Question cannot be empty").max(2000)
    .describe("❓ The student's question"),
  use_llm: z.boolean().default(true)
    .describe("🤖 Ask the language model when the heuristics are unsure"),
  threshold: z.number().min(0).max(1).default(0.6)
    .describe("⚖️ Minimum heuristic confidence to accept without the LLM (0-1)"),
});

export type ClassifySubjectInput = z.input<typeof ClassifySubjectInputSchema>;

// ============================================================================
// Pattern Definitions - Organized by Subject
// ============================================================================

interface WeightedPatterns {
  weight: number;
  patterns: readonly RegExp[];
}

/**
 * Pattern groups per subject. A group contributes `weight` for each of its
 * patterns that matches.
 */
export const SUBJECT_PATTERNS: Record<TutorSubject, readonly WeightedPatterns[]> = {
  math: [
    {
      weight: 2,
      patterns: [
        /\b(calculate|compute|evaluate|simplify|factori[sz]e|expand)\b/i,
        /\b(solve|equation|algebra|polynomial|quadratic|linear)\b/i,
        /\b(integral|integrate|derivative|differentiate|limit|calculus)\b/i,
        /\b(square root|cube root|sqrt|logarithm|log|exponent|factorial)\b/i,
        /\b(triangle|circle|rectangle|angle|area|perimeter|volume of|hypotenuse|pythagoras|geometry)\b/i,
        /\b(sum|product|difference|quotient|percent(age)?|fraction|ratio|average|mean|median)\b/i,
        /\b(sin|cos|tan|trigonometry|matrix|vector|probability|statistics)\b/i,
        /\d+\s*[-+*/^×÷]\s*\d+/,
      ],
    },
    {
      weight: 1,
      patterns: [
        /\b[xyz]\s*[=+\-*/^]|[=+\-*/^]\s*[xyz]\b/i,
        /\d+\s*%/,
        /\b(plus|minus|times|divided by|multiplied by|squared|cubed)\b/i,
      ],
    },
  ],

  physics: [
    {
      weight: 2,
      patterns: [
        /\b(force|velocity|acceleration|momentum|inertia|friction|newton'?s?)\b/i,
        /\b(energy|kinetic|potential|work done|power|joules?|watts?)\b/i,
        /\b(gravity|gravitational|orbit|projectile|free fall|mass of the earth)\b/i,
        /\b(wave|frequency|wavelength|amplitude|oscillation|pendulum|sound|light)\b/i,
        /\b(electric|current|voltage|resistance|ohm'?s?|circuit|charge|magnetic|capacitor)\b/i,
        /\b(thermodynamics|heat|temperature|entropy|pressure)\b/i,
        /\b(quantum|photon|relativity|nuclear|radiation|planck)\b/i,
        /\b(speed of light|boltzmann|permittivity|permeability|elementary charge)\b/i,
        /\b(convert|conversion)\b/i,
      ],
    },
    {
      weight: 1,
      patterns: [
        /\d+(\.\d+)?\s*(m\/s|km\/h|mph|N|J|W|Pa|Hz|V|A|kg|g|m|km|s)\b/,
        /\b(speed|distance|displacement|mass|weight|time)\b/i,
      ],
    },
  ],

  chemistry: [
    {
      weight: 2,
      patterns: [
        /\b(chemical|chemistry|molecule|molecular|compound|element|atom|atomic|ion|ionic|isotope)\b/i,
        /\b(reaction|react|reactant|product|balance|stoichiometry|yield|catalyst)\b/i,
        /\b(mole|moles|molar|molarity|avogadro|concentration|solution|solute|solvent)\b/i,
        /\b(acid|base|ph|salt|oxidation|reduction|redox|titration)\b/i,
        /\b(periodic table|electron configuration|valence|bond|covalent|electronegativity)\b/i,
        /(->|→|⟶|⇌|<=>|=>)/,
      ],
    },
  ],
} as const;

/**
 * Greetings, thanks and acknowledgments
 */
export const CONVERSATIONAL_PATTERNS = [
  /^(hi|hello|hey|greetings|good (morning|afternoon|evening))\b/i,
  /^(thanks|thank you|thx)\b/i,
  /^(ok|okay|alright|cool|great)\b/i,
  /^(bye|goodbye|see you)\b/i,
  /^(yes|no|sure|yep|nope|yeah|nah)(\b|$)/i,
  /^how are you\b/i,
  /\bwho are you\b/i,
  /^[?!.,;:\-_@#$%^&*()[\]{}<>~`+=\\/|]+$/,
] as const;

/** Element names contribute to chemistry up to this many */
const MAX_ELEMENT_MENTIONS = 2;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Count patterns that match the text
 */
function countPatternMatches(text: string, patterns: readonly RegExp[]): number {
  return patterns.filter(pattern => pattern.test(text)).length;
}

/**
 * Check if any pattern matches the text
 */
function matchesPatterns(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => pattern.test(text));
}

/**
 * Heuristic score per subject
 */
export function scoreSubjects(question: string): Record<TutorSubject, number> {
  const scores: Record<TutorSubject, number> = { math: 0, physics: 0, chemistry: 0 };

  for (const subject of SUBJECTS) {
    for (const group of SUBJECT_PATTERNS[subject]) {
      scores[subject] += group.weight * countPatternMatches(question, group.patterns);
    }
  }

  if (extractFormulas(question).length > 0) {
    scores.chemistry += 2;
  }
  scores.chemistry += Math.min(MAX_ELEMENT_MENTIONS, findElementsInText(question).length);

  return scores;
}

/**
 * Confidence from the best and second-best scores.
 *
 * The share of the best score is damped while the best score is small, so a
 * single keyword is never decisive on its own.
 */
export function scoreConfidence(best: number, second: number): number {
  if (best <= 0) return 0;
  const share = best / (best + second);
  const strength = Math.min(1, 0.5 + 0.25 * best);
  return roundTo(Math.min(0.95, share * strength), 2);
}

function rank(scores: Record<TutorSubject, number>): { best: TutorSubject | null; top: number; second: number } {
  const ordered = [...SUBJECTS].sort((a, b) => scores[b] - scores[a]);
  const [first, runnerUp] = ordered;
  const top = scores[first];
  const second = scores[runnerUp];
  return { best: top > 0 && top > second ? first : null, top, second };
}

export function isConversational(question: string): boolean {
  return question.length < 3 || matchesPatterns(question, CONVERSATIONAL_PATTERNS);
}

/**
 * Parse a one-word LLM classification
 */
export function parseSubjectAnswer(answer: string): Subject | null {
  const word = answer.trim().toLowerCase().replace(/[^a-z]/g, "");
  if (word === "unknown") return "unknown";
  return isTutorSubject(word) ? word : null;
}

// ============================================================================
// Main Classification Function
// ============================================================================

/**
 * Classify a question by subject.
 *
 * @example
 * await classifySubject({ question: "What is 5 + 3?" });
 * // { subject: "math", method: "heuristic", confidence: 0.95, ... }
 */
export async function classifySubject(
  input: ClassifySubjectInput,
  options: ClassifyOptions = {}
): Promise<ClassifySubjectResult> {
  const { question, use_llm, threshold } = parseInput(ClassifySubjectInputSchema, input);
  const logger = options.logger ?? silentLogger;

  const scores = scoreSubjects(question);
  const { best, top, second } = rank(scores);
  const result = (subject: Subject, method: ClassificationMethod, confidence: number): ClassifySubjectResult =>
    ({ question, subject, method, confidence, scores });

  if (top === 0 && isConversational(question)) {
    return result("unknown", "conversational", 0.9);
  }

  const confidence = scoreConfidence(top, second);
  if (best && confidence >= threshold) {
    return result(best, "heuristic", confidence);
  }

  const llm = options.llm;
  if (use_llm && llm?.isConfigured()) {
    try {
      const answer = await llm.generate(classificationPrompt(question), {
        kind: "classify",
        signal: options.signal,
      });
      const subject = parseSubjectAnswer(answer);
      if (subject) {
        return result(subject, "llm", 0.8);
      }
      logger.warn("Unrecognised classification answer", { answer: preview(answer) });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      logger.warn("LLM classification failed, using heuristic fallback", { error: errorMessage(err) });
    }
  }

  if (best) {
    return result(best, "fallback", confidence);
  }
  return result("unknown", "fallback", 0);
}
