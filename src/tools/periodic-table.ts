/**
 * ⚛️ Periodic Table Tool - Subject Tutor
 *
 * Element lookup by atomic number, symbol or name (including alternate
 * spellings such as aluminium, sulphur and caesium), plus detection of
 * element names in free text.
 *
 * @module tools/periodic-table
 * @see tests/periodic-table.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { createToolError, parseInput } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

export const ElementSchema = z.object({
  number: z.number().int().min(1).max(118),
  symbol: z.string().regex(/^[A-Z][a-z]?$/),
  name: z.string().min(1),
  atomic_mass: z.number().positive(),
  group: z.number().int().min(1).max(18).nullable(),
  period: z.number().int().min(1).max(7),
  category: z.string().min(1),
  aliases: z.array(z.string()).default([]),
});

export type ChemicalElement = z.infer<typeof ElementSchema>;

export type ElementMatch = "atomic_number" | "symbol" | "name";

export interface LookupElementResult extends ChemicalElement {
  match: ElementMatch;
  formatted: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const LookupElementInputSchema = z.object({
  query: z.string().trim().min(1, "Query cannot be empty").max(50)
    .describe("⚛️ Atomic number, symbol or element name, e.g. '26', 'Fe', 'iron'"),
});

export type LookupElementInput = z.input<typeof LookupElementInputSchema>;

// ============================================================================
// Data
// ============================================================================

let elements: ChemicalElement[] | null = null;
let bySymbol: Map<string, ChemicalElement> | null = null;

export function getElements(): ChemicalElement[] {
  if (!elements) {
    elements = loadDataFile("elements.json", z.array(ElementSchema).length(118));
  }
  return elements;
}

/**
 * Case-sensitive symbol lookup (used by the formula parser)
 */
export function getElementBySymbol(symbol: string): ChemicalElement | undefined {
  if (!bySymbol) {
    bySymbol = new Map(getElements().map(element => [element.symbol, element]));
  }
  return bySymbol.get(symbol);
}

// ============================================================================
// Lookup
// ============================================================================

function describeElement(element: ChemicalElement): string {
  const group = element.group === null ? "f-block" : `group ${element.group}`;
  return `${element.name} (${element.symbol}): atomic number ${element.number}, ` +
    `atomic mass ${element.atomic_mass} u, ${group}, period ${element.period}, ${element.category}`;
}

function toResult(element: ChemicalElement, match: ElementMatch): LookupElementResult {
  return { ...element, match, formatted: describeElement(element) };
}

/**
 * Look up an element.
 *
 * @throws {ToolError} NOT_FOUND when nothing matches
 *
 * @example
 * lookupElement({ query: "26" }).symbol;         // "Fe"
 * lookupElement({ query: "sulphur" }).name;      // "Sulfur"
 */
export function lookupElement(input: LookupElementInput): LookupElementResult {
  const { query } = parseInput(LookupElementInputSchema, input);
  const all = getElements();

  if (/^\d+$/.test(query)) {
    const number = Number(query);
    const element = all.find(candidate => candidate.number === number);
    if (element) return toResult(element, "atomic_number");
    throw createToolError("NOT_FOUND", `No element has atomic number ${number}`, {
      recoverable: true,
      suggestion: "Atomic numbers run from 1 to 118",
    });
  }

  const exact = getElementBySymbol(query);
  if (exact) return toResult(exact, "symbol");

  const lowered = query.toLowerCase();
  const symbol = all.find(element => element.symbol.toLowerCase() === lowered);
  if (symbol) return toResult(symbol, "symbol");

  const named = all.find(element =>
    element.name.toLowerCase() === lowered || element.aliases.includes(lowered)
  );
  if (named) return toResult(named, "name");

  throw createToolError("NOT_FOUND", `No element matches '${query}'`, {
    recoverable: true,
    suggestion: "Use an atomic number (1-118), a symbol like 'Na' or a name like 'sodium'",
  });
}

/**
 * Elements named in free text, in order of first mention
 *
 * @example
 * findElementsInText("Compare sodium and chlorine").map(e => e.symbol);  // ["Na", "Cl"]
 */
export function findElementsInText(text: string): ChemicalElement[] {
  const lowered = text.toLowerCase();
  const found: Array<{ element: ChemicalElement; index: number }> = [];

  for (const element of getElements()) {
    let first = -1;
    for (const name of [element.name.toLowerCase(), ...element.aliases]) {
      const match = new RegExp(`\\b${name}\\b`).exec(lowered);
      if (match && (first === -1 || match.index < first)) {
        first = match.index;
      }
    }
    if (first !== -1) {
      found.push({ element, index: first });
    }
  }

  return found.sort((a, b) => a.index - b.index).map(entry => entry.element);
}
