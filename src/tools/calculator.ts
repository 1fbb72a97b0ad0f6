/**
 * 🧮 Calculator Tool - Subject Tutor
 *
 * Evaluates arithmetic expressions without `eval`: a tokenizer feeds a
 * recursive-descent parser that builds an expression tree, which is then
 * evaluated. The tree is exported so the equation solver can evaluate the
 * same grammar with variable bindings.
 *
 * Grammar (lowest to highest precedence):
 *   expression := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary | implicit-operand)*
 *   unary      := ("-" | "+") unary | power
 *   power      := postfix ("^" unary)?
 *   postfix    := primary ("!" | "%")*
 *   primary    := number | constant | variable | function call | "(" expression ")"
 *
 * @module tools/calculator
 * @see tests/calculator.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { createToolError, formatNumber, parseInput, roundSignificant } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

export type AngleUnit = "degrees" | "radians";

export type ExprNode =
  | { kind: "number"; value: number }
  | { kind: "variable"; name: string }
  | { kind: "unary"; operand: ExprNode }
  | { kind: "binary"; op: "+" | "-" | "*" | "/" | "^" | "%"; left: ExprNode; right: ExprNode }
  | { kind: "call"; name: string; args: ExprNode[] }
  | { kind: "factorial"; operand: ExprNode }
  | { kind: "percent"; operand: ExprNode };

export interface CalculateResult {
  /** Expression after symbol normalisation */
  expression: string;
  result: number;
  formatted: string;
}

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "ident"; value: string; pos: number }
  | { type: "op"; value: string; pos: number };

// ============================================================================
// Input Schema
// ============================================================================

export const CalculateInputSchema = z.object({
  expression: z.string().trim().min(1, "Expression cannot be empty").max(500)
    .describe("🧮 Arithmetic expression, e.g. '2^10 / (3 + 1)' or 'sqrt(16) + sin(30)'"),
  angle_unit: z.enum(["degrees", "radians"]).default("degrees")
    .describe("📐 Unit used by trigonometric functions"),
});

export type CalculateInput = z.input<typeof CalculateInputSchema>;

// ============================================================================
// Function & Constant Tables
// ============================================================================

interface MathFunction {
  min_args: number;
  max_args: number;
  apply: (args: number[], angle: AngleUnit) => number;
}

const toRadians = (value: number, angle: AngleUnit) =>
  angle === "degrees" ? (value * Math.PI) / 180 : value;
const fromRadians = (value: number, angle: AngleUnit) =>
  angle === "degrees" ? (value * 180) / Math.PI : value;

const unary = (fn: (x: number) => number): MathFunction => ({
  min_args: 1,
  max_args: 1,
  apply: ([x]) => fn(x),
});

const logarithm = (fn: (x: number) => number): MathFunction => unary(x => {
  if (x === 0) {
    throw createToolError("CALCULATION_ERROR", "Logarithm of zero is undefined", { recoverable: true });
  }
  return fn(x);
});

const FUNCTIONS: Record<string, MathFunction> = {
  sqrt: unary(Math.sqrt),
  cbrt: unary(Math.cbrt),
  abs: unary(Math.abs),
  ln: logarithm(Math.log),
  log: logarithm(Math.log10),
  log10: logarithm(Math.log10),
  log2: logarithm(Math.log2),
  exp: unary(Math.exp),
  round: unary(Math.round),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  sin: { min_args: 1, max_args: 1, apply: ([x], angle) => Math.sin(toRadians(x, angle)) },
  cos: { min_args: 1, max_args: 1, apply: ([x], angle) => Math.cos(toRadians(x, angle)) },
  tan: { min_args: 1, max_args: 1, apply: ([x], angle) => Math.tan(toRadians(x, angle)) },
  asin: { min_args: 1, max_args: 1, apply: ([x], angle) => fromRadians(Math.asin(x), angle) },
  acos: { min_args: 1, max_args: 1, apply: ([x], angle) => fromRadians(Math.acos(x), angle) },
  atan: { min_args: 1, max_args: 1, apply: ([x], angle) => fromRadians(Math.atan(x), angle) },
  min: { min_args: 1, max_args: Infinity, apply: (args) => Math.min(...args) },
  max: { min_args: 1, max_args: Infinity, apply: (args) => Math.max(...args) },
  pow: { min_args: 2, max_args: 2, apply: ([base, exponent]) => Math.pow(base, exponent) },
};

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
};

export function isFunctionName(name: string): boolean {
  return Object.hasOwn(FUNCTIONS, name.toLowerCase());
}

export function isConstantName(name: string): boolean {
  return Object.hasOwn(CONSTANTS, name.toLowerCase());
}

// ============================================================================
// Tokenizer
// ============================================================================

/**
 * Map typographic operators onto the ASCII grammar
 */
export function normalizeExpression(expression: string): string {
  return expression
    .replace(/\*\*/g, "^")
    .replace(/[×·]/g, "*")
    .replace(/÷/g, "/")
    .replace(/[−–]/g, "-")
    .replace(/π/g, "pi")
    .replace(/√/g, "sqrt ")
    .replace(/²/g, "^2")
    .replace(/³/g, "^3")
    .replace(/%\s*of\b/gi, "% *")
    .replace(/\s+/g, " ")
    .trim();
}

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const OPERATORS = new Set(["+", "-", "*", "/", "^", "%", "!", "(", ")", ","]);

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const rest = source.slice(pos);
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ type: "number", value: Number(number[0]), pos });
      pos += number[0].length;
      continue;
    }

    const ident = IDENT_PATTERN.exec(rest);
    if (ident) {
      tokens.push({ type: "ident", value: ident[0], pos });
      pos += ident[0].length;
      continue;
    }

    if (OPERATORS.has(ch)) {
      tokens.push({ type: "op", value: ch, pos });
      pos++;
      continue;
    }

    throw createToolError("CALCULATION_ERROR", `Unexpected character '${ch}' at position ${pos + 1}`, {
      recoverable: true,
      suggestion: "Use numbers, + - * / ^ %, parentheses and functions like sqrt(), sin(), log()",
    });
  }

  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

function startsOperand(token: Token | undefined): boolean {
  if (!token) return false;
  return token.type === "number" || token.type === "ident" || (token.type === "op" && token.value === "(");
}

class ExpressionParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    if (this.tokens.length === 0) {
      throw createToolError("CALCULATION_ERROR", "Expression is empty", { recoverable: true });
    }
    const node = this.expression();
    const leftover = this.peek();
    if (leftover) {
      throw createToolError(
        "CALCULATION_ERROR",
        `Unexpected '${String(leftover.value)}' at position ${leftover.pos + 1}`,
        { recoverable: true }
      );
    }
    return node;
  }

  private peek(offset: number = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw createToolError("CALCULATION_ERROR", "Unexpected end of expression", { recoverable: true });
    }
    this.index++;
    return token;
  }

  private atOp(value: string): boolean {
    const token = this.peek();
    return token !== undefined && token.type === "op" && token.value === value;
  }

  private expect(value: string): void {
    if (!this.atOp(value)) {
      const token = this.peek();
      const found = token ? `'${String(token.value)}'` : "end of expression";
      throw createToolError("CALCULATION_ERROR", `Expected '${value}' but found ${found}`, { recoverable: true });
    }
    this.index++;
  }

  private expression(): ExprNode {
    let node = this.term();
    while (this.atOp("+") || this.atOp("-")) {
      const op = this.atOp("+") ? "+" : "-";
      this.index++;
      node = { kind: "binary", op, left: node, right: this.term() };
    }
    return node;
  }

  private term(): ExprNode {
    let node = this.unary();
    for (;;) {
      if (this.atOp("*") || this.atOp("/") || this.atOp("%")) {
        const op = this.atOp("*") ? "*" : this.atOp("/") ? "/" : "%";
        this.index++;
        node = { kind: "binary", op, left: node, right: this.unary() };
      } else if (startsOperand(this.peek())) {
        // Implicit multiplication: 2pi, 3(x + 1), (a)(b); never two bare numbers
        const previous = this.tokens[this.index - 1];
        const following = this.peek();
        if (previous?.type === "number" && following?.type === "number") {
          throw createToolError(
            "CALCULATION_ERROR",
            `Missing operator between ${previous.value} and ${following.value} at position ${following.pos + 1}`,
            { recoverable: true }
          );
        }
        node = { kind: "binary", op: "*", left: node, right: this.unary() };
      } else {
        return node;
      }
    }
  }

  private unary(): ExprNode {
    if (this.atOp("-")) {
      this.index++;
      return { kind: "unary", operand: this.unary() };
    }
    if (this.atOp("+")) {
      this.index++;
      return this.unary();
    }
    return this.power();
  }

  private power(): ExprNode {
    const base = this.postfix();
    if (this.atOp("^")) {
      this.index++;
      return { kind: "binary", op: "^", left: base, right: this.unary() };
    }
    return base;
  }

  private postfix(): ExprNode {
    let node = this.primary();
    for (;;) {
      if (this.atOp("!")) {
        this.index++;
        node = { kind: "factorial", operand: node };
      } else if (this.atOp("%") && !startsOperand(this.peek(1))) {
        this.index++;
        node = { kind: "percent", operand: node };
      } else {
        return node;
      }
    }
  }

  private primary(): ExprNode {
    const token = this.next();

    if (token.type === "number") {
      return { kind: "number", value: token.value };
    }

    if (token.type === "ident") {
      const name = token.value.toLowerCase();
      if (isFunctionName(name)) {
        return { kind: "call", name, args: this.callArguments() };
      }
      if (isConstantName(name)) {
        return { kind: "number", value: CONSTANTS[name] };
      }
      return { kind: "variable", name: token.value };
    }

    if (token.value === "(") {
      const inner = this.expression();
      this.expect(")");
      return inner;
    }

    throw createToolError("CALCULATION_ERROR", `Unexpected '${token.value}' at position ${token.pos + 1}`, {
      recoverable: true,
    });
  }

  private callArguments(): ExprNode[] {
    if (!this.atOp("(")) {
      // sqrt 16, sin 30
      return [this.power()];
    }
    this.index++;
    const args: ExprNode[] = [];
    if (!this.atOp(")")) {
      args.push(this.expression());
      while (this.atOp(",")) {
        this.index++;
        args.push(this.expression());
      }
    }
    this.expect(")");
    return args;
  }
}

/**
 * Parse an expression into a tree.
 *
 * @throws {ToolError} CALCULATION_ERROR on malformed input
 */
export function parseExpression(expression: string): ExprNode {
  return new ExpressionParser(tokenize(normalizeExpression(expression))).parse();
}

/**
 * Names of the free variables in a tree, in order of first appearance
 */
export function collectVariables(node: ExprNode, into: string[] = []): string[] {
  switch (node.kind) {
    case "variable":
      if (!into.includes(node.name)) into.push(node.name);
      break;
    case "unary":
    case "factorial":
    case "percent":
      collectVariables(node.operand, into);
      break;
    case "binary":
      collectVariables(node.left, into);
      collectVariables(node.right, into);
      break;
    case "call":
      for (const arg of node.args) collectVariables(arg, into);
      break;
    case "number":
      break;
  }
  return into;
}

// ============================================================================
// Evaluation
// ============================================================================

export interface EvaluationOptions {
  angle_unit?: AngleUnit;
  variables?: Record<string, number>;
  /** Round to 12 significant digits (default true) */
  round?: boolean;
}

function factorial(n: number): number {
  if (!Number.isInteger(n) || n < 0 || n > 170) {
    throw createToolError("CALCULATION_ERROR", `Factorial is only defined here for integers 0..170, got ${n}`, {
      recoverable: true,
    });
  }
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

function evaluateNode(node: ExprNode, angle: AngleUnit, variables: Record<string, number>): number {
  switch (node.kind) {
    case "number":
      return node.value;

    case "variable": {
      if (Object.hasOwn(variables, node.name)) {
        return variables[node.name];
      }
      throw createToolError("CALCULATION_ERROR", `Unknown identifier '${node.name}'`, {
        recoverable: true,
        suggestion: "Supported constants are pi and e; use the equation solver for expressions with variables",
      });
    }

    case "unary":
      return -evaluateNode(node.operand, angle, variables);

    case "factorial":
      return factorial(evaluateNode(node.operand, angle, variables));

    case "percent":
      return evaluateNode(node.operand, angle, variables) / 100;

    case "call": {
      const fn = FUNCTIONS[node.name];
      if (node.args.length < fn.min_args || node.args.length > fn.max_args) {
        const expected = fn.min_args === fn.max_args
          ? String(fn.min_args)
          : fn.max_args === Infinity ? `at least ${fn.min_args}` : `${fn.min_args}-${fn.max_args}`;
        throw createToolError(
          "CALCULATION_ERROR",
          `${node.name}() takes ${expected} argument(s), got ${node.args.length}`,
          { recoverable: true }
        );
      }
      return fn.apply(node.args.map(arg => evaluateNode(arg, angle, variables)), angle);
    }

    case "binary": {
      const left = evaluateNode(node.left, angle, variables);
      const right = evaluateNode(node.right, angle, variables);
      switch (node.op) {
        case "+": return left + right;
        case "-": return left - right;
        case "*": return left * right;
        case "^": return Math.pow(left, right);
        case "/":
        case "%":
          if (right === 0) {
            throw createToolError("CALCULATION_ERROR", node.op === "/" ? "Division by zero" : "Modulo by zero", {
              recoverable: true,
            });
          }
          return node.op === "/" ? left / right : left % right;
      }
    }
  }
}

/**
 * Evaluate a parsed tree. Results are rounded to 12 significant digits
 * unless `round` is false.
 *
 * @throws {ToolError} CALCULATION_ERROR on unknown identifiers, division by
 * zero or a result that is not a finite real number
 */
export function evaluateExpression(node: ExprNode, options: EvaluationOptions = {}): number {
  const value = evaluateNode(node, options.angle_unit ?? "degrees", options.variables ?? {});
  if (!Number.isFinite(value)) {
    throw createToolError(
      "CALCULATION_ERROR",
      Number.isNaN(value) ? "Result is not a real number" : "Result is too large",
      { recoverable: true }
    );
  }
  return options.round === false ? value : roundSignificant(value, 12);
}

// ============================================================================
// Tool Entry Point
// ============================================================================

/**
 * Evaluate an arithmetic expression.
 *
 * @example
 * calculate({ expression: "0.1 + 0.2" });       // result: 0.3
 * calculate({ expression: "sin(30)" });         // result: 0.5 (degrees)
 * calculate({ expression: "-2^2" });            // result: -4
 */
export function calculate(input: CalculateInput): CalculateResult {
  const { expression, angle_unit } = parseInput(CalculateInputSchema, input);
  const normalized = normalizeExpression(expression);
  const tree = parseExpression(normalized);
  const result = evaluateExpression(tree, { angle_unit });

  return {
    expression: normalized,
    result,
    formatted: formatNumber(result),
  };
}
