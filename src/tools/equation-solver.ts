/**
 * 🟰 Equation Solver Tool - Subject Tutor
 *
 * Solves linear and quadratic equations in one variable. Both sides are
 * parsed with the calculator grammar; the polynomial coefficients of
 * `lhs - rhs` are recovered by sampling and then verified at further points,
 * so anything that is not a polynomial of degree ≤ 2 is rejected.
 *
 * @module tools/equation-solver
 * @see tests/equation-solver.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { createToolError, formatNumber, isToolError, parseInput, roundSignificant } from "../utils.js";
import { collectVariables, evaluateExpression, parseExpression, type ExprNode } from "./calculator.js";

// ============================================================================
// Type Definitions
// ============================================================================

export type EquationKind = "linear" | "quadratic" | "identity" | "contradiction";

export interface ComplexRoot {
  re: number;
  im: number;
}

export interface SolveEquationResult {
  equation: string;
  variable: string;
  kind: EquationKind;
  /** Real solutions, ascending */
  solutions: number[];
  complex_solutions?: ComplexRoot[];
  /** lhs - rhs = a·v² + b·v + c */
  coefficients: { a: number; b: number; c: number };
  formatted: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const SolveEquationInputSchema = z.object({
  equation: z.string().trim().min(3, "Equation is too short").max(500)
    .describe("🟰 Equation with exactly one '=', e.g. '2x + 3 = 7' or 'x^2 - 5x + 6 = 0'"),
  variable: z.string().trim().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Variable must be an identifier").optional()
    .describe("🔤 Variable to solve for (detected when omitted)"),
});

export type SolveEquationInput = z.input<typeof SolveEquationInputSchema>;

// ============================================================================
// Solver
// ============================================================================

const EPSILON = 1e-12;
const VERIFY_POINTS = [2, -3, 0.5, 7, -11.25];

function unsupported(message: string, details?: unknown) {
  return createToolError("UNSUPPORTED_EQUATION", message, {
    details,
    recoverable: true,
    suggestion: "Only linear and quadratic equations in one variable can be solved exactly",
  });
}

function splitSides(equation: string): [string, string] {
  const parts = equation.split("=");
  if (parts.length !== 2) {
    throw unsupported(`Equation must contain exactly one '=', found ${parts.length - 1}`);
  }
  const [lhs, rhs] = parts.map(part => part.trim());
  if (!lhs || !rhs) {
    throw unsupported("Both sides of the equation must be non-empty");
  }
  return [lhs, rhs];
}

/**
 * Zero relative to the magnitude of the values it was computed from
 */
function nearlyZero(value: number, scale: number): boolean {
  return Math.abs(value) <= EPSILON * scale;
}

function zeroed(value: number, scale: number): number {
  return nearlyZero(value, scale) ? 0 : value;
}

interface Sample {
  /** lhs - rhs */
  value: number;
  /** Larger magnitude of the two sides */
  scale: number;
}

/**
 * Samples f(v) = lhs(v) - rhs(v), unrounded and in radians so that sampled
 * trig terms are not mistaken for polynomials
 */
function residual(lhs: ExprNode, rhs: ExprNode, variable: string) {
  return (value: number): Sample => {
    const options = { variables: { [variable]: value }, angle_unit: "radians" as const, round: false };
    try {
      const left = evaluateExpression(lhs, options);
      const right = evaluateExpression(rhs, options);
      return { value: left - right, scale: Math.max(Math.abs(left), Math.abs(right)) };
    } catch (err) {
      if (isToolError(err)) {
        throw unsupported(`Equation cannot be evaluated at ${variable} = ${value}: ${err.message}`);
      }
      throw err;
    }
  };
}

function formatSolutions(variable: string, kind: EquationKind, solutions: number[], complex?: ComplexRoot[]): string {
  if (kind === "identity") return `true for every ${variable}`;
  if (kind === "contradiction") return "no solution";
  if (complex) {
    const [root] = complex;
    return `${variable} = ${formatNumber(root.re)} ± ${formatNumber(Math.abs(root.im))}i`;
  }
  return solutions.map(solution => `${variable} = ${formatNumber(solution)}`).join(" or ");
}

/**
 * Solve a linear or quadratic equation.
 *
 * @throws {ToolError} UNSUPPORTED_EQUATION for anything else
 *
 * @example
 * solveEquation({ equation: "2x + 3 = 7" });          // solutions: [2]
 * solveEquation({ equation: "x^2 - 5x + 6 = 0" });    // solutions: [2, 3]
 */
export function solveEquation(input: SolveEquationInput): SolveEquationResult {
  const { equation, variable: requested } = parseInput(SolveEquationInputSchema, input);
  const [lhsText, rhsText] = splitSides(equation);

  let lhs: ExprNode;
  let rhs: ExprNode;
  try {
    lhs = parseExpression(lhsText);
    rhs = parseExpression(rhsText);
  } catch (err) {
    if (isToolError(err)) {
      throw unsupported(`Could not parse equation: ${err.message}`);
    }
    throw err;
  }

  const variables = collectVariables(rhs, collectVariables(lhs));
  let variable: string;
  if (requested) {
    const others = variables.filter(name => name !== requested);
    if (others.length > 0) {
      throw unsupported(`Equation has other unknowns besides '${requested}': ${others.join(", ")}`);
    }
    variable = requested;
  } else if (variables.length === 1) {
    variable = variables[0];
  } else if (variables.length === 0) {
    throw unsupported("Equation has no variable to solve for");
  } else {
    throw unsupported(`Equation has more than one unknown: ${variables.join(", ")}`, { variables });
  }

  const f = residual(lhs, rhs, variable);
  const s0 = f(0);
  const s1 = f(1);
  const sm1 = f(-1);
  const scale = Math.max(s0.scale, s1.scale, sm1.scale);

  // c = f(0) exactly; a and b carry the cancellation noise of the samples
  const a = zeroed((s1.value + sm1.value) / 2 - s0.value, scale);
  const b = zeroed((s1.value - sm1.value) / 2, scale);
  const c = zeroed(s0.value, s0.scale);

  for (const point of VERIFY_POINTS) {
    const actual = f(point);
    const predicted = a * point * point + b * point + c;
    const tolerance = Math.max(actual.scale, Math.abs(predicted), scale) * 1e3;
    if (!nearlyZero(actual.value - predicted, tolerance)) {
      throw unsupported("Equation is not linear or quadratic");
    }
  }

  let kind: EquationKind;
  let solutions: number[] = [];
  let complex: ComplexRoot[] | undefined;

  if (a === 0) {
    if (b === 0) {
      kind = c === 0 ? "identity" : "contradiction";
    } else {
      kind = "linear";
      solutions = [roundSignificant(-c / b, 12)];
    }
  } else {
    kind = "quadratic";
    const discriminant = zeroed(b * b - 4 * a * c, Math.max(b * b, Math.abs(4 * a * c)));
    if (discriminant > 0) {
      const root = Math.sqrt(discriminant);
      solutions = [(-b - root) / (2 * a), (-b + root) / (2 * a)]
        .map(solution => roundSignificant(solution, 12))
        .sort((x, y) => x - y);
    } else if (discriminant === 0) {
      solutions = [roundSignificant(-b / (2 * a), 12)];
    } else {
      const re = roundSignificant(-b / (2 * a), 12);
      const im = roundSignificant(Math.sqrt(-discriminant) / (2 * Math.abs(a)), 12);
      complex = [{ re, im }, { re, im: -im }];
    }
  }

  const coefficients = {
    a: roundSignificant(a, 12),
    b: roundSignificant(b, 12),
    c: roundSignificant(c, 12),
  };

  return {
    equation,
    variable,
    kind,
    solutions,
    ...(complex ? { complex_solutions: complex } : {}),
    coefficients,
    formatted: formatSolutions(variable, kind, solutions, complex),
  };
}
