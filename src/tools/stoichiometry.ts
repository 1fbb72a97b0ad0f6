/**
 * 🧪 Stoichiometry Tool - Subject Tutor
 *
 * Balances chemical equations and converts amounts between species of a
 * reaction via the mole ratio.
 *
 * Balancing builds the element × species matrix (reactants positive,
 * products negative) and finds its null space with fraction-free integer
 * Gaussian elimination. A balanceable equation has a null space of
 * dimension exactly one; its smallest positive integer vector gives the
 * coefficients.
 *
 * @module tools/stoichiometry
 * @see tests/stoichiometry.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { createToolError, formatNumber, parseInput, roundSignificant, roundTo } from "../utils.js";
import { molarMassOf, parseFormula } from "./molar-mass.js";

// ============================================================================
// Type Definitions
// ============================================================================

export type ReactionSide = "reactant" | "product";

export interface Species {
  formula: string;
  side: ReactionSide;
  /** Coefficient as written, null when omitted */
  written_coefficient: number | null;
  counts: Map<string, number>;
}

export interface BalancedTerm {
  formula: string;
  coefficient: number;
}

export interface BalanceEquationResult {
  equation: string;
  balanced: string;
  reactants: BalancedTerm[];
  products: BalancedTerm[];
  /** Reactants then products, in written order */
  coefficients: number[];
  /** True when the coefficients as written already balance */
  already_balanced: boolean;
}

export interface SpeciesAmount {
  formula: string;
  molar_mass: number;
  coefficient: number;
  moles: number;
  mass_g: number;
}

export interface StoichiometryResult {
  equation_used: string;
  coefficients_source: "written" | "balanced";
  given: SpeciesAmount;
  target: SpeciesAmount;
  mole_ratio: string;
  formatted: string;
}

// ============================================================================
// Input Schemas
// ============================================================================

export const BalanceEquationInputSchema = z.object({
  equation: z.string().trim().min(3, "Equation is too short").max(300)
    .describe("🧪 Chemical equation, e.g. 'H2 + O2 -> H2O' (arrows: ->, →, =, =>)"),
});

export type BalanceEquationInput = z.input<typeof BalanceEquationInputSchema>;

export const StoichiometryInputSchema = z.object({
  equation: z.string().trim().min(3, "Equation is too short").max(300)
    .describe("🧪 Reaction, balanced or not, e.g. '2H2 + O2 -> 2H2O'"),
  given: z.object({
    formula: z.string().trim().min(1)
      .describe("Species whose amount is known"),
    amount: z.number().positive().finite()
      .describe("Known amount"),
    unit: z.enum(["g", "mol"]).default("g")
      .describe("Unit of the known amount"),
  }).describe("📦 Known quantity"),
  target: z.string().trim().min(1)
    .describe("🎯 Species to compute the amount of"),
  auto_balance: z.boolean().default(true)
    .describe("⚖️ Balance the equation when the written coefficients do not balance"),
});

export type StoichiometryInput = z.input<typeof StoichiometryInputSchema>;

// ============================================================================
// Equation Parsing
// ============================================================================

const ARROW = /\s*(?:<=>|<->|⇌|→|⟶|->|=>|=)\s*/;
const STATE_SUFFIX = /\((?:s|l|g|aq)\)$/i;

function parseTerms(text: string, side: ReactionSide, equation: string): Species[] {
  return text.split(/\s+\+\s+|\s*\+\s*(?=\d*\s*[A-Z(\[])/).map(raw => {
    const term = raw.trim();
    const match = /^(\d+)?\s*(.+)$/.exec(term);
    if (!term || !match) {
      throw createToolError("INVALID_FORMULA", `Empty term in equation '${equation}'`, { recoverable: true });
    }
    const formula = match[2].replace(STATE_SUFFIX, "").trim();
    const written = match[1] ? Number(match[1]) : null;
    if (written === 0) {
      throw createToolError("INVALID_FORMULA", `Coefficient of ${formula} cannot be zero`, { recoverable: true });
    }
    return { formula, side, written_coefficient: written, counts: parseFormula(formula) };
  });
}

/**
 * Split an equation into reactant and product species.
 *
 * @throws {ToolError} INVALID_FORMULA
 */
export function parseEquation(equation: string): Species[] {
  const sides = equation.split(ARROW);
  if (sides.length !== 2 || !sides[0].trim() || !sides[1].trim()) {
    throw createToolError("INVALID_FORMULA", `Equation '${equation}' needs exactly one arrow between reactants and products`, {
      recoverable: true,
      suggestion: "Write it as 'A + B -> C'",
    });
  }
  return [
    ...parseTerms(sides[0], "reactant", equation),
    ...parseTerms(sides[1], "product", equation),
  ];
}

function elementsOf(species: Species[]): string[] {
  const elements: string[] = [];
  for (const entry of species) {
    for (const symbol of entry.counts.keys()) {
      if (!elements.includes(symbol)) elements.push(symbol);
    }
  }
  return elements;
}

/**
 * Whether the given coefficients conserve every element
 */
export function isBalanced(species: Species[], coefficients: number[]): boolean {
  return elementsOf(species).every(symbol => {
    let net = 0;
    species.forEach((entry, i) => {
      const atoms = (entry.counts.get(symbol) ?? 0) * coefficients[i];
      net += entry.side === "reactant" ? atoms : -atoms;
    });
    return net === 0;
  });
}

// ============================================================================
// Balancing
// ============================================================================

const abs = (n: bigint) => (n < 0n ? -n : n);

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

const lcm = (a: bigint, b: bigint) => (a === 0n || b === 0n ? 0n : abs(a * b) / gcd(a, b));

function reduceRow(row: bigint[]): bigint[] {
  const divisor = row.reduce((acc, value) => gcd(acc, value), 0n);
  return divisor > 1n ? row.map(value => value / divisor) : row;
}

function cannotBalance(equation: string, reason: string) {
  return createToolError("CANNOT_BALANCE", `Cannot balance '${equation}': ${reason}`, {
    recoverable: true,
    suggestion: "Check that every element appears on both sides and that no species is missing",
  });
}

/**
 * Smallest positive integer coefficients for the species, in order.
 *
 * @throws {ToolError} CANNOT_BALANCE
 */
export function solveCoefficients(species: Species[], equation: string): number[] {
  const columns = species.length;
  const matrix = elementsOf(species).map(symbol =>
    reduceRow(species.map(entry => {
      const count = BigInt(entry.counts.get(symbol) ?? 0);
      return entry.side === "reactant" ? count : -count;
    }))
  );

  const pivots: Array<{ row: number; column: number }> = [];
  let rank = 0;
  for (let column = 0; column < columns && rank < matrix.length; column++) {
    const pivotRow = matrix.findIndex((row, index) => index >= rank && row[column] !== 0n);
    if (pivotRow === -1) continue;
    [matrix[rank], matrix[pivotRow]] = [matrix[pivotRow], matrix[rank]];

    const pivot = matrix[rank][column];
    for (let i = 0; i < matrix.length; i++) {
      const factor = matrix[i][column];
      if (i === rank || factor === 0n) continue;
      matrix[i] = reduceRow(matrix[i].map((value, j) => value * pivot - matrix[rank][j] * factor));
    }
    pivots.push({ row: rank, column });
    rank++;
  }

  const nullity = columns - rank;
  if (nullity !== 1) {
    throw cannotBalance(
      equation,
      nullity === 0 ? "no non-trivial solution exists" : "the equation combines independent reactions"
    );
  }

  const pivotColumns = new Set(pivots.map(pivot => pivot.column));
  let free = 0;
  while (pivotColumns.has(free)) free++;

  const scale = pivots.reduce((acc, pivot) => lcm(acc, matrix[pivot.row][pivot.column]), 1n);
  const solution = new Array<bigint>(columns).fill(0n);
  solution[free] = scale;
  for (const pivot of pivots) {
    solution[pivot.column] = (-matrix[pivot.row][free] * scale) / matrix[pivot.row][pivot.column];
  }

  const divisor = solution.reduce((acc, value) => gcd(acc, value), 0n);
  let coefficients = solution.map(value => value / divisor);
  if (coefficients.every(value => value <= 0n)) {
    coefficients = coefficients.map(value => -value);
  }
  if (coefficients.some(value => value <= 0n)) {
    throw cannotBalance(equation, "no solution with all coefficients positive");
  }
  return coefficients.map(value => Number(value));
}

function formatSide(terms: BalancedTerm[]): string {
  return terms.map(term => `${term.coefficient === 1 ? "" : term.coefficient}${term.formula}`).join(" + ");
}

function buildBalanced(equation: string, species: Species[], coefficients: number[], alreadyBalanced: boolean): BalanceEquationResult {
  const terms = species.map((entry, i) => ({ formula: entry.formula, coefficient: coefficients[i], side: entry.side }));
  const reactants = terms.filter(term => term.side === "reactant").map(({ formula, coefficient }) => ({ formula, coefficient }));
  const products = terms.filter(term => term.side === "product").map(({ formula, coefficient }) => ({ formula, coefficient }));
  return {
    equation,
    balanced: `${formatSide(reactants)} -> ${formatSide(products)}`,
    reactants,
    products,
    coefficients,
    already_balanced: alreadyBalanced,
  };
}

/**
 * Balance a chemical equation.
 *
 * @throws {ToolError} INVALID_FORMULA, CANNOT_BALANCE
 *
 * @example
 * balanceEquation({ equation: "C3H8 + O2 -> CO2 + H2O" }).balanced;
 * // "C3H8 + 5O2 -> 3CO2 + 4H2O"
 */
export function balanceEquation(input: BalanceEquationInput): BalanceEquationResult {
  const { equation } = parseInput(BalanceEquationInputSchema, input);
  const species = parseEquation(equation);
  const coefficients = solveCoefficients(species, equation);
  const written = species.map(entry => entry.written_coefficient ?? 1);
  const alreadyBalanced = written.every((value, i) => value === coefficients[i]);
  return buildBalanced(equation, species, coefficients, alreadyBalanced);
}

// ============================================================================
// Reaction Stoichiometry
// ============================================================================

function sameComposition(a: Map<string, number>, b: Map<string, number>): boolean {
  return a.size === b.size && [...a].every(([symbol, count]) => b.get(symbol) === count);
}

function findSpecies(species: Species[], formula: string): number {
  const compact = formula.replace(/\s+/g, "").replace(STATE_SUFFIX, "");
  const exact = species.findIndex(entry => entry.formula.replace(/\s+/g, "") === compact);
  if (exact !== -1) return exact;

  const counts = parseFormula(compact);
  const index = species.findIndex(entry => sameComposition(entry.counts, counts));
  if (index === -1) {
    throw createToolError("SPECIES_NOT_FOUND", `${formula} does not appear in the equation`, {
      recoverable: true,
      details: { species: species.map(entry => entry.formula) },
    });
  }
  return index;
}

/**
 * Convert a known amount of one species into the amount of another.
 *
 * @throws {ToolError} INVALID_FORMULA, CANNOT_BALANCE, UNBALANCED_EQUATION, SPECIES_NOT_FOUND
 *
 * @example
 * reactionStoichiometry({
 *   equation: "2H2 + O2 -> 2H2O",
 *   given: { formula: "H2", amount: 4.032, unit: "g" },
 *   target: "H2O",
 * }).target.mass_g;   // 36.03
 */
export function reactionStoichiometry(input: StoichiometryInput): StoichiometryResult {
  const { equation, given, target, auto_balance } = parseInput(StoichiometryInputSchema, input);
  const species = parseEquation(equation);

  const written = species.map(entry => entry.written_coefficient ?? 1);
  let coefficients = written;
  let source: StoichiometryResult["coefficients_source"] = "written";
  if (!isBalanced(species, written)) {
    if (!auto_balance) {
      throw createToolError("UNBALANCED_EQUATION", `'${equation}' is not balanced`, {
        recoverable: true,
        suggestion: "Balance the equation first or allow automatic balancing",
      });
    }
    coefficients = solveCoefficients(species, equation);
    source = "balanced";
  }

  const givenIndex = findSpecies(species, given.formula);
  const targetIndex = findSpecies(species, target);
  const givenSpecies = species[givenIndex];
  const targetSpecies = species[targetIndex];

  const givenMolarMass = roundTo(molarMassOf(givenSpecies.counts), 3);
  const targetMolarMass = roundTo(molarMassOf(targetSpecies.counts), 3);
  const givenMoles = given.unit === "mol" ? given.amount : given.amount / givenMolarMass;
  const targetMoles = (givenMoles * coefficients[targetIndex]) / coefficients[givenIndex];

  const givenAmount: SpeciesAmount = {
    formula: givenSpecies.formula,
    molar_mass: givenMolarMass,
    coefficient: coefficients[givenIndex],
    moles: roundSignificant(givenMoles, 6),
    mass_g: roundSignificant(givenMoles * givenMolarMass, 6),
  };
  const targetAmount: SpeciesAmount = {
    formula: targetSpecies.formula,
    molar_mass: targetMolarMass,
    coefficient: coefficients[targetIndex],
    moles: roundSignificant(targetMoles, 6),
    mass_g: roundSignificant(targetMoles * targetMolarMass, 6),
  };

  const used = buildBalanced(equation, species, coefficients, source === "written").balanced;
  const ratio = `${givenAmount.coefficient}:${targetAmount.coefficient}`;

  return {
    equation_used: used,
    coefficients_source: source,
    given: givenAmount,
    target: targetAmount,
    mole_ratio: ratio,
    formatted: [
      `Equation: ${used}`,
      `${formatNumber(givenAmount.mass_g)} g ${givenAmount.formula} = ${formatNumber(givenAmount.moles)} mol`,
      `Mole ratio ${givenAmount.formula}:${targetAmount.formula} = ${ratio}`,
      `${formatNumber(targetAmount.moles)} mol ${targetAmount.formula} = ${formatNumber(targetAmount.mass_g)} g`,
    ].join("\n"),
  };
}
