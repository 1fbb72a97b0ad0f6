/**
 * 📚 Formula Fetcher Tool - Subject Tutor
 *
 * Keyword search over a library of standard formulas (kinematics, energy,
 * electricity, gas laws, geometry, algebra, calculus).
 *
 * Scoring per formula:
 * - keyword phrase found in the query: 2 per word of the phrase
 * - formula name found in the query: 5
 * - 1 per significant query word appearing in the name, topic or keywords
 *
 * @module tools/formula-lookup
 * @see tests/formula-lookup.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { parseInput } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

const FormulaEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  subject: z.enum(["math", "physics", "chemistry"]),
  topic: z.string().min(1),
  expression: z.string().min(1),
  variables: z.record(z.string()),
  keywords: z.array(z.string()).min(1),
});

export type FormulaEntry = z.infer<typeof FormulaEntrySchema>;

export interface FormulaMatch {
  id: string;
  name: string;
  subject: FormulaEntry["subject"];
  topic: string;
  expression: string;
  variables: Record<string, string>;
  score: number;
}

export interface FindFormulasResult {
  query: string;
  formulas: FormulaMatch[];
  formatted: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const FindFormulasInputSchema = z.object({
  query: z.string().trim().min(1, "Query cannot be empty").max(500)
    .describe("📚 Topic or question, e.g. 'kinetic energy' or 'ohm's law'"),
  subject: z.enum(["math", "physics", "chemistry"]).optional()
    .describe("🎓 Restrict results to one subject"),
  limit: z.number().int().min(1).max(10).default(3)
    .describe("🔢 Maximum number of formulas to return"),
});

export type FindFormulasInput = z.input<typeof FindFormulasInputSchema>;

// ============================================================================
// Library
// ============================================================================

const STOPWORDS = new Set([
  "the", "what", "whats", "how", "for", "and", "with", "formula", "equation",
  "find", "calculate", "does", "from", "that", "this", "use", "using", "give",
]);

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

interface IndexedFormula {
  entry: FormulaEntry;
  name: string;
  keywords: string[];
  words: Set<string>;
}

let library: IndexedFormula[] | null = null;

function getLibrary(): IndexedFormula[] {
  if (!library) {
    library = loadDataFile("formulas.json", z.array(FormulaEntrySchema).min(1)).map(entry => {
      const keywords = [...new Set(entry.keywords.map(normalize).filter(Boolean))];
      const words = new Set(
        [entry.name, entry.topic, ...keywords].flatMap(text => normalize(text).split(" "))
      );
      return { entry, name: normalize(entry.name), keywords, words };
    });
  }
  return library;
}

export function listFormulas(): FormulaEntry[] {
  return getLibrary().map(indexed => indexed.entry);
}

function score(query: string, formula: IndexedFormula): number {
  const padded = ` ${query} `;
  let total = 0;

  for (const keyword of formula.keywords) {
    if (padded.includes(` ${keyword} `)) {
      total += 2 * keyword.split(" ").length;
    }
  }

  if (padded.includes(` ${formula.name} `)) {
    total += 5;
  }

  const queryWords = new Set(query.split(" ").filter(word => word.length >= 3 && !STOPWORDS.has(word)));
  for (const word of queryWords) {
    if (formula.words.has(word)) total += 1;
  }

  return total;
}

/**
 * Find the formulas most relevant to a query. An empty list means nothing
 * matched.
 *
 * @example
 * findFormulas({ query: "kinetic energy of a moving car" }).formulas[0].id;   // "kinetic-energy"
 */
export function findFormulas(input: FindFormulasInput): FindFormulasResult {
  const { query, subject, limit } = parseInput(FindFormulasInputSchema, input);
  const normalized = normalize(query);

  const ranked = getLibrary()
    .filter(formula => !subject || formula.entry.subject === subject)
    .map((formula, order) => ({ formula, order, score: score(normalized, formula) }))
    .filter(candidate => candidate.score > 0)
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, limit);

  const formulas: FormulaMatch[] = ranked.map(({ formula, score: points }) => ({
    id: formula.entry.id,
    name: formula.entry.name,
    subject: formula.entry.subject,
    topic: formula.entry.topic,
    expression: formula.entry.expression,
    variables: formula.entry.variables,
    score: points,
  }));

  const formatted = formulas.length === 0
    ? `No formulas found for '${query}'`
    : formulas.map(formula => {
        const variables = Object.entries(formula.variables)
          .map(([symbol, meaning]) => `${symbol}: ${meaning}`)
          .join("; ");
        return `${formula.name}: ${formula.expression} (${variables})`;
      }).join("\n");

  return { query, formulas, formatted };
}
