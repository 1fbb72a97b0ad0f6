/**
 * 📏 Constant Lookup Tool - Subject Tutor
 *
 * Physical and chemical constants by symbol, name or a loose description.
 *
 * Matching order:
 * 1. Exact symbol (case-sensitive, so `g` and `G` differ)
 * 2. Symbol ignoring case
 * 3. Exact name or alias (apostrophes and punctuation ignored)
 * 4. Best partial-match score
 *
 * @module tools/constant-lookup
 * @see tests/constant-lookup.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { createToolError, formatNumber, parseInput } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

export interface PhysicalConstant {
  symbol: string;
  name: string;
  value: number;
  unit: string;
  aliases: string[];
  subjects: Array<"physics" | "chemistry">;
  description: string;
}

export type ConstantMatch = "symbol" | "symbol_case_insensitive" | "name" | "partial";

export interface LookupConstantResult {
  symbol: string;
  name: string;
  value: number;
  unit: string;
  description: string;
  match: ConstantMatch;
  /** Partial-match score; only set for `partial` matches */
  score?: number;
  formatted: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const LookupConstantInputSchema = z.object({
  query: z.string().trim().min(1, "Query cannot be empty").max(200)
    .describe("📏 Constant symbol or name, e.g. 'c', 'G', 'Planck constant', 'speed of light'"),
  subject: z.enum(["physics", "chemistry"]).optional()
    .describe("📚 Prefer constants used in this subject"),
});

export type LookupConstantInput = z.input<typeof LookupConstantInputSchema>;

// ============================================================================
// Constant Table
// ============================================================================

export const CONSTANTS: readonly PhysicalConstant[] = [
  {
    symbol: "c", name: "speed of light", value: 299_792_458, unit: "m/s",
    aliases: ["speed of light in vacuum", "light speed", "velocity of light"],
    subjects: ["physics"], description: "Speed of light in vacuum (exact)",
  },
  {
    symbol: "g", name: "standard gravity", value: 9.80665, unit: "m/s²",
    aliases: ["acceleration due to gravity", "gravitational acceleration", "earth's gravity", "free fall acceleration"],
    subjects: ["physics"], description: "Standard acceleration of free fall at the Earth's surface",
  },
  {
    symbol: "G", name: "gravitational constant", value: 6.6743e-11, unit: "N·m²/kg²",
    aliases: ["newton's gravitational constant", "universal gravitational constant", "big g"],
    subjects: ["physics"], description: "Newtonian constant of gravitation",
  },
  {
    symbol: "h", name: "planck constant", value: 6.62607015e-34, unit: "J·s",
    aliases: ["planck's constant"],
    subjects: ["physics", "chemistry"], description: "Quantum of action (exact)",
  },
  {
    symbol: "hbar", name: "reduced planck constant", value: 1.054571817e-34, unit: "J·s",
    aliases: ["h-bar", "h bar", "dirac constant", "reduced planck's constant"],
    subjects: ["physics"], description: "Planck constant divided by 2π",
  },
  {
    symbol: "k", name: "boltzmann constant", value: 1.380649e-23, unit: "J/K",
    aliases: ["boltzmann's constant", "k_b"],
    subjects: ["physics", "chemistry"], description: "Relates particle energy to temperature (exact)",
  },
  {
    symbol: "e", name: "elementary charge", value: 1.602176634e-19, unit: "C",
    aliases: ["charge of an electron", "electron charge", "proton charge", "charge of a proton"],
    subjects: ["physics", "chemistry"], description: "Magnitude of the electron's charge (exact)",
  },
  {
    symbol: "m_e", name: "electron mass", value: 9.1093837015e-31, unit: "kg",
    aliases: ["mass of an electron", "mass of electron", "electron rest mass"],
    subjects: ["physics", "chemistry"], description: "Rest mass of the electron",
  },
  {
    symbol: "m_p", name: "proton mass", value: 1.67262192369e-27, unit: "kg",
    aliases: ["mass of a proton", "mass of proton", "proton rest mass"],
    subjects: ["physics", "chemistry"], description: "Rest mass of the proton",
  },
  {
    symbol: "m_n", name: "neutron mass", value: 1.67492749804e-27, unit: "kg",
    aliases: ["mass of a neutron", "mass of neutron", "neutron rest mass"],
    subjects: ["physics", "chemistry"], description: "Rest mass of the neutron",
  },
  {
    symbol: "N_A", name: "avogadro constant", value: 6.02214076e23, unit: "1/mol",
    aliases: ["avogadro's number", "avogadro number", "avogadro's constant"],
    subjects: ["chemistry", "physics"], description: "Particles per mole (exact)",
  },
  {
    symbol: "R", name: "gas constant", value: 8.314462618, unit: "J/(mol·K)",
    aliases: ["ideal gas constant", "universal gas constant", "molar gas constant"],
    subjects: ["chemistry", "physics"], description: "Molar gas constant, N_A·k",
  },
  {
    symbol: "F", name: "faraday constant", value: 96_485.33212, unit: "C/mol",
    aliases: ["faraday's constant"],
    subjects: ["chemistry"], description: "Charge of one mole of electrons",
  },
  {
    symbol: "epsilon_0", name: "vacuum permittivity", value: 8.8541878128e-12, unit: "F/m",
    aliases: ["permittivity of free space", "electric constant", "ε0", "epsilon naught"],
    subjects: ["physics"], description: "Electric permittivity of vacuum",
  },
  {
    symbol: "mu_0", name: "vacuum permeability", value: 1.25663706212e-6, unit: "N/A²",
    aliases: ["permeability of free space", "magnetic constant", "μ0", "mu naught"],
    subjects: ["physics"], description: "Magnetic permeability of vacuum",
  },
  {
    symbol: "k_e", name: "coulomb constant", value: 8.9875517923e9, unit: "N·m²/C²",
    aliases: ["coulomb's constant", "electrostatic constant"],
    subjects: ["physics"], description: "1/(4π·ε0)",
  },
  {
    symbol: "sigma", name: "stefan-boltzmann constant", value: 5.670374419e-8, unit: "W/(m²·K⁴)",
    aliases: ["stefan boltzmann constant", "stefan's constant"],
    subjects: ["physics"], description: "Black-body radiated power per area per K⁴",
  },
  {
    symbol: "P_std", name: "standard atmospheric pressure", value: 101_325, unit: "Pa",
    aliases: ["standard pressure", "atmospheric pressure", "stp pressure", "one atmosphere"],
    subjects: ["chemistry", "physics"], description: "1 atm",
  },
  {
    symbol: "T_std", name: "standard temperature", value: 273.15, unit: "K",
    aliases: ["stp temperature", "standard temperature at stp"],
    subjects: ["chemistry", "physics"], description: "0 °C, used for STP",
  },
  {
    symbol: "V_m", name: "molar volume of an ideal gas", value: 22.414, unit: "L/mol",
    aliases: ["molar volume", "molar volume at stp"],
    subjects: ["chemistry"], description: "Volume of one mole of ideal gas at 0 °C and 1 atm",
  },
];

// ============================================================================
// Matching
// ============================================================================

const STOPWORDS = new Set([
  "the", "what", "whats", "value", "constant", "number", "and", "for", "how",
  "much", "does", "tell", "give", "about", "with", "its", "use", "used", "find",
]);

/**
 * Lowercase, drop apostrophes, turn other punctuation into spaces
 */
export function normalizeConstantName(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^a-z0-9εμ_]+/g, " ")
    .trim();
}

function significantWords(text: string): Set<string> {
  return new Set(
    normalizeConstantName(text)
      .split(" ")
      .filter(word => word.length >= 3 && !STOPWORDS.has(word))
  );
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function names(constant: PhysicalConstant): string[] {
  return [constant.name, ...constant.aliases].map(normalizeConstantName);
}

/**
 * Partial-match score of `query` against one constant.
 *
 * Whole-word symbol match 50, name/alias contained in query 25, query
 * contained in name/alias 25, 10 per shared significant word.
 */
export function scoreConstant(query: string, constant: PhysicalConstant): number {
  const normalized = normalizeConstantName(query);
  const candidates = names(constant);
  let score = 0;

  const symbolPattern = new RegExp(`(^|[^A-Za-z0-9_])${escapeRegex(constant.symbol)}($|[^A-Za-z0-9_])`);
  if (symbolPattern.test(query)) {
    score += 50;
  }

  if (candidates.some(name => normalized.includes(name))) {
    score += 25;
  }

  if (normalized.length >= 3 && candidates.some(name => name.includes(normalized))) {
    score += 25;
  }

  const queryWords = significantWords(query);
  const constantWords = new Set(candidates.flatMap(name => [...significantWords(name)]));
  for (const word of queryWords) {
    if (constantWords.has(word)) score += 10;
  }

  return score;
}

function toResult(constant: PhysicalConstant, match: ConstantMatch, score?: number): LookupConstantResult {
  return {
    symbol: constant.symbol,
    name: constant.name,
    value: constant.value,
    unit: constant.unit,
    description: constant.description,
    match,
    ...(score !== undefined ? { score } : {}),
    formatted: `${constant.name} (${constant.symbol}) = ${formatNumber(constant.value)} ${constant.unit}`,
  };
}

function search(query: string, pool: readonly PhysicalConstant[]): LookupConstantResult | undefined {
  const exact = pool.find(constant => constant.symbol === query);
  if (exact) return toResult(exact, "symbol");

  const lowered = query.toLowerCase();
  const insensitive = pool.find(constant => constant.symbol.toLowerCase() === lowered);
  if (insensitive) return toResult(insensitive, "symbol_case_insensitive");

  const normalized = normalizeConstantName(query);
  const named = pool.find(constant => names(constant).includes(normalized));
  if (named) return toResult(named, "name");

  let best: { constant: PhysicalConstant; score: number } | undefined;
  for (const constant of pool) {
    const score = scoreConstant(query, constant);
    if (score > 0 && (!best || score > best.score)) {
      best = { constant, score };
    }
  }
  return best ? toResult(best.constant, "partial", best.score) : undefined;
}

/**
 * Look up a constant.
 *
 * @throws {ToolError} NOT_FOUND when nothing matches
 *
 * @example
 * lookupConstant({ query: "speed of light" }).value;   // 299792458
 * lookupConstant({ query: "G" }).name;                 // "gravitational constant"
 */
export function lookupConstant(input: LookupConstantInput): LookupConstantResult {
  const { query, subject } = parseInput(LookupConstantInputSchema, input);

  const preferred = subject ? CONSTANTS.filter(constant => constant.subjects.includes(subject)) : CONSTANTS;
  const found = search(query, preferred) ?? (subject ? search(query, CONSTANTS) : undefined);
  if (found) return found;

  throw createToolError("NOT_FOUND", `No constant matches '${query}'`, {
    recoverable: true,
    suggestion: `Known constants: ${CONSTANTS.map(constant => constant.symbol).join(", ")}`,
  });
}

/**
 * Constants named (by name or alias) somewhere in free text
 */
export function findConstantsInText(text: string): PhysicalConstant[] {
  const normalized = ` ${normalizeConstantName(text)} `;
  return CONSTANTS.filter(constant =>
    names(constant).some(name => normalized.includes(` ${name} `))
  );
}
