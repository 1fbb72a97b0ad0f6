/**
 * ⚖️ Molar Mass Tool - Subject Tutor
 *
 * Parses chemical formulas (element symbols, counts, nested ()/[] groups and
 * hydrate dots such as CuSO4·5H2O) and computes molar mass, per-element
 * composition and mass/moles/particles conversions.
 *
 * @module tools/molar-mass
 * @see tests/molar-mass.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { createToolError, isToolError, parseInput, roundSignificant, roundTo } from "../utils.js";
import { getElementBySymbol } from "./periodic-table.js";

// ============================================================================
// Type Definitions
// ============================================================================

export const AVOGADRO = 6.02214076e23;

export interface ElementComposition {
  symbol: string;
  name: string;
  count: number;
  atomic_mass: number;
  mass_contribution: number;
  mass_percent: number;
}

export interface AmountConversion {
  mass_g: number;
  moles: number;
  particles: number;
}

export interface MolarMassResult {
  formula: string;
  /** g/mol, 3 decimals */
  molar_mass: number;
  composition: ElementComposition[];
  conversion?: AmountConversion;
  formatted: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const MolarMassInputSchema = z.object({
  formula: z.string().trim().min(1, "Formula cannot be empty").max(100)
    .describe("⚖️ Chemical formula, e.g. 'H2O', 'Ca(OH)2', 'CuSO4·5H2O'"),
  mass_g: z.number().positive().finite().optional()
    .describe("🧪 Sample mass in grams, converted to moles and particles"),
  moles: z.number().positive().finite().optional()
    .describe("🔢 Amount in moles, converted to grams and particles"),
});

export type MolarMassInput = z.input<typeof MolarMassInputSchema>;

// ============================================================================
// Formula Parsing
// ============================================================================

const HYDRATE_SEPARATOR = /[·•.*]/;
const CLOSING: Record<string, string> = { "(": ")", "[": "]" };

function invalidFormula(formula: string, reason: string) {
  return createToolError("INVALID_FORMULA", `Invalid formula '${formula}': ${reason}`, {
    recoverable: true,
    suggestion: "Write symbols with correct case (NaCl, not nacl) and balanced parentheses",
  });
}

function addCount(into: Map<string, number>, symbol: string, count: number): void {
  into.set(symbol, (into.get(symbol) ?? 0) + count);
}

class FormulaParser {
  private index = 0;

  constructor(private readonly text: string, private readonly formula: string) {}

  parse(): Map<string, number> {
    const counts = this.group(undefined);
    if (this.index < this.text.length) {
      throw invalidFormula(this.formula, `unexpected '${this.text[this.index]}'`);
    }
    return counts;
  }

  private readCount(): number {
    const match = /^\d+/.exec(this.text.slice(this.index));
    if (!match) return 1;
    this.index += match[0].length;
    const count = Number(match[0]);
    if (count === 0) {
      throw invalidFormula(this.formula, "counts must be at least 1");
    }
    return count;
  }

  private group(closing: string | undefined): Map<string, number> {
    const counts = new Map<string, number>();

    while (this.index < this.text.length) {
      const ch = this.text[this.index];

      if (closing !== undefined && ch === closing) {
        this.index++;
        return counts;
      }

      if (/[A-Z]/.test(ch)) {
        const next = this.text[this.index + 1];
        const symbol = next !== undefined && /[a-z]/.test(next) ? ch + next : ch;
        if (!getElementBySymbol(symbol)) {
          throw invalidFormula(this.formula, `unknown element '${symbol}'`);
        }
        this.index += symbol.length;
        addCount(counts, symbol, this.readCount());
        continue;
      }

      if (ch in CLOSING) {
        this.index++;
        const inner = this.group(CLOSING[ch]);
        if (inner.size === 0) {
          throw invalidFormula(this.formula, "empty group");
        }
        const multiplier = this.readCount();
        for (const [symbol, count] of inner) {
          addCount(counts, symbol, count * multiplier);
        }
        continue;
      }

      throw invalidFormula(this.formula, `unexpected '${ch}'`);
    }

    if (closing !== undefined) {
      throw invalidFormula(this.formula, `missing '${closing}'`);
    }
    return counts;
  }
}

/**
 * Element counts of a formula, in order of first appearance.
 *
 * @throws {ToolError} INVALID_FORMULA
 *
 * @example
 * parseFormula("Ca(OH)2");      // Map { Ca => 1, O => 2, H => 2 }
 * parseFormula("CuSO4·5H2O");   // Map { Cu => 1, S => 1, O => 9, H => 10 }
 */
export function parseFormula(formula: string): Map<string, number> {
  const compact = formula.replace(/\s+/g, "");
  if (!compact) {
    throw invalidFormula(formula, "formula is empty");
  }

  const total = new Map<string, number>();
  for (const part of compact.split(HYDRATE_SEPARATOR)) {
    const match = /^(\d*)(.*)$/.exec(part);
    const body = match ? match[2] : part;
    const multiplier = match && match[1] ? Number(match[1]) : 1;
    if (!body || multiplier === 0) {
      throw invalidFormula(formula, "empty part around a hydrate dot");
    }
    for (const [symbol, count] of new FormulaParser(body, formula).parse()) {
      addCount(total, symbol, count * multiplier);
    }
  }
  return total;
}

/**
 * Molar mass in g/mol, unrounded
 */
export function molarMassOf(counts: Map<string, number>): number {
  let mass = 0;
  for (const [symbol, count] of counts) {
    const element = getElementBySymbol(symbol);
    if (element) mass += element.atomic_mass * count;
  }
  return mass;
}

/**
 * Parse a formula, returning null instead of throwing INVALID_FORMULA
 */
export function tryParseFormula(formula: string): Map<string, number> | null {
  try {
    return parseFormula(formula);
  } catch (err) {
    if (isToolError(err)) return null;
    throw err;
  }
}

function trimUnbalanced(token: string): string {
  let result = token;
  const count = (pattern: RegExp) => (result.match(pattern) ?? []).length;
  while (/[)\]]$/.test(result) && count(/[)\]]/g) > count(/[([]/g)) {
    result = result.slice(0, -1);
  }
  return result;
}

/**
 * All-caps words such as "SOS" or "INPUT" parse as symbol runs; a formula
 * written that way only counts when it carries a number.
 */
function looksLikeWord(token: string): boolean {
  return !/[a-z0-9]/.test(token);
}

/**
 * Tokens in free text that read as chemical formulas. A lone symbol such as
 * "He" or "I" only counts when it carries a number.
 *
 * @example
 * extractFormulas("What is the molar mass of water (H2O)?");   // ["H2O"]
 */
export function extractFormulas(text: string): string[] {
  const found: string[] = [];
  for (const candidate of text.match(/[A-Z][A-Za-z0-9()[\]·•]*/g) ?? []) {
    const token = trimUnbalanced(candidate);
    if (looksLikeWord(token)) continue;
    const counts = tryParseFormula(token);
    if (!counts) continue;
    const atoms = [...counts.values()].reduce((sum, count) => sum + count, 0);
    if ((counts.size >= 2 || atoms >= 2) && !found.includes(token)) {
      found.push(token);
    }
  }
  return found;
}

// ============================================================================
// Tool Entry Point
// ============================================================================

/**
 * Calculate molar mass and composition.
 *
 * @throws {ToolError} INVALID_FORMULA, INVALID_INPUT when both mass_g and moles are given
 *
 * @example
 * calculateMolarMass({ formula: "H2O" }).molar_mass;   // 18.015
 */
export function calculateMolarMass(input: MolarMassInput): MolarMassResult {
  const { formula, mass_g, moles } = parseInput(MolarMassInputSchema, input);
  if (mass_g !== undefined && moles !== undefined) {
    throw createToolError("INVALID_INPUT", "Give either mass_g or moles, not both", { recoverable: true });
  }

  const counts = parseFormula(formula);
  const rawMass = molarMassOf(counts);
  const molarMass = roundTo(rawMass, 3);

  const composition: ElementComposition[] = [];
  for (const [symbol, count] of counts) {
    const element = getElementBySymbol(symbol);
    if (!element) continue;
    const contribution = element.atomic_mass * count;
    composition.push({
      symbol,
      name: element.name,
      count,
      atomic_mass: element.atomic_mass,
      mass_contribution: roundTo(contribution, 3),
      mass_percent: roundTo((contribution / rawMass) * 100, 2),
    });
  }

  let conversion: AmountConversion | undefined;
  if (mass_g !== undefined) {
    const amount = mass_g / molarMass;
    conversion = {
      mass_g,
      moles: roundSignificant(amount, 6),
      particles: roundSignificant(amount * AVOGADRO, 6),
    };
  } else if (moles !== undefined) {
    conversion = {
      mass_g: roundSignificant(moles * molarMass, 6),
      moles,
      particles: roundSignificant(moles * AVOGADRO, 6),
    };
  }

  const lines = [`Molar mass of ${formula}: ${molarMass} g/mol`];
  for (const part of composition) {
    lines.push(`  ${part.symbol} × ${part.count}: ${part.mass_contribution} g/mol (${part.mass_percent}%)`);
  }
  if (conversion) {
    lines.push(`${conversion.mass_g} g = ${conversion.moles} mol = ${conversion.particles.toExponential()} particles`);
  }

  return {
    formula,
    molar_mass: molarMass,
    composition,
    ...(conversion ? { conversion } : {}),
    formatted: lines.join("\n"),
  };
}
