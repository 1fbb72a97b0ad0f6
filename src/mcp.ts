/**
 * Subject Tutor: MCP Server
 *
 * Exposes the tutor and each deterministic tool as MCP tools. Served over
 * stdio (TRANSPORT=stdio) or statelessly over HTTP at /mcp.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { classifySubject, ClassifySubjectInputSchema } from "./classifier.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { QueryRequestSchema } from "./query-handler.js";
import type { QueryHandler } from "./query-handler.js";
import type { LlmClient } from "./services/gemini-client.js";
import { calculate, CalculateInputSchema } from "./tools/calculator.js";
import { lookupConstant, LookupConstantInputSchema } from "./tools/constant-lookup.js";
import { solveEquation, SolveEquationInputSchema } from "./tools/equation-solver.js";
import { FindFormulasInputSchema, findFormulas } from "./tools/formula-lookup.js";
import { calculateMolarMass, MolarMassInputSchema } from "./tools/molar-mass.js";
import { lookupElement, LookupElementInputSchema } from "./tools/periodic-table.js";
import {
  balanceEquation,
  BalanceEquationInputSchema,
  reactionStoichiometry,
  StoichiometryInputSchema,
} from "./tools/stoichiometry.js";
import { convertUnits, ConvertUnitsInputSchema } from "./tools/unit-converter.js";
import { formatErrorResponse, toToolError } from "./utils.js";

export const SERVER_NAME = "subject-tutor";
export const SERVER_VERSION = "0.1.0";

export interface McpDependencies {
  queries: QueryHandler;
  llm: LlmClient;
  logger?: Logger;
}

const READ_ONLY = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
} as const;

/**
 * Run a tool body, returning its JSON result or the formatted error
 */
async function respond(logger: Logger, tool: string, fn: () => unknown): Promise<CallToolResult> {
  try {
    const result = await fn();
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    const error = toToolError(err);
    logger.warn("Tool call failed", { tool, code: error.code, error: error.message });
    return formatErrorResponse(error);
  }
}

export function createMcpServer(deps: McpDependencies): McpServer {
  const logger = (deps.logger ?? silentLogger).child("mcp");
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // ==========================================================================
  // Tutor
  // ==========================================================================

  server.registerTool(
    "tutor_ask",
    {
      title: "Ask the Tutor",
      description: `Answer a math, physics or chemistry question.

The question is classified by subject and answered by that subject's agent,
which runs deterministic tools (calculator, unit converter, periodic table,
...) and explains the result. Pass session_id to continue a conversation.

Questions outside the three subjects get a fixed refusal message.`,
      inputSchema: QueryRequestSchema.shape,
      annotations: { ...READ_ONLY, idempotentHint: false, openWorldHint: true },
    },
    (args) => respond(logger, "tutor_ask", () => deps.queries.handle(args))
  );

  server.registerTool(
    "tutor_classify_subject",
    {
      title: "Classify Subject",
      description: `Classify a question as math, physics, chemistry or unknown.

Heuristic pattern scoring first; the language model is consulted only when
the heuristics are below the threshold and use_llm is true.`,
      inputSchema: ClassifySubjectInputSchema.shape,
      annotations: { ...READ_ONLY, openWorldHint: true },
    },
    (args) => respond(logger, "tutor_classify_subject", () => classifySubject(args, { llm: deps.llm, logger }))
  );

  // ==========================================================================
  // Math
  // ==========================================================================

  server.registerTool(
    "tutor_calculate",
    {
      title: "Calculator",
      description: "Evaluate an arithmetic expression: + - * / ^ %, factorial, parentheses, sqrt, log, trig (degrees by default), pi and e.",
      inputSchema: CalculateInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_calculate", () => calculate(args))
  );

  server.registerTool(
    "tutor_solve_equation",
    {
      title: "Equation Solver",
      description: "Solve a linear or quadratic equation in one variable, e.g. '2x + 3 = 7'. Complex roots are reported separately.",
      inputSchema: SolveEquationInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_solve_equation", () => solveEquation(args))
  );

  // ==========================================================================
  // Physics
  // ==========================================================================

  server.registerTool(
    "tutor_lookup_constant",
    {
      title: "Physical Constant Lookup",
      description: "Look up a physical constant by symbol ('c', 'G', 'h') or name ('speed of light').",
      inputSchema: LookupConstantInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_lookup_constant", () => lookupConstant(args))
  );

  server.registerTool(
    "tutor_convert_units",
    {
      title: "Unit Converter",
      description: "Convert a value between units of the same quantity: length, mass, time, temperature, energy, pressure, speed, volume, area, force, power, amount.",
      inputSchema: ConvertUnitsInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_convert_units", () => convertUnits(args))
  );

  server.registerTool(
    "tutor_find_formula",
    {
      title: "Formula Finder",
      description: "Find standard formulas for a topic, e.g. 'kinetic energy' or 'ideal gas law'. Returns an empty list when nothing matches.",
      inputSchema: FindFormulasInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_find_formula", () => findFormulas(args))
  );

  // ==========================================================================
  // Chemistry
  // ==========================================================================

  server.registerTool(
    "tutor_lookup_element",
    {
      title: "Periodic Table Lookup",
      description: "Look up an element by atomic number, symbol or name.",
      inputSchema: LookupElementInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_lookup_element", () => lookupElement(args))
  );

  server.registerTool(
    "tutor_molar_mass",
    {
      title: "Molar Mass",
      description: "Molar mass and mass composition of a formula such as 'Ca(OH)2' or 'CuSO4·5H2O'; optionally converts a mass or mole amount.",
      inputSchema: MolarMassInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_molar_mass", () => calculateMolarMass(args))
  );

  server.registerTool(
    "tutor_balance_equation",
    {
      title: "Balance Chemical Equation",
      description: "Balance a chemical equation with the smallest whole-number coefficients, e.g. 'H2 + O2 -> H2O'.",
      inputSchema: BalanceEquationInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_balance_equation", () => balanceEquation(args))
  );

  server.registerTool(
    "tutor_stoichiometry",
    {
      title: "Reaction Stoichiometry",
      description: "Convert a known amount (g or mol) of one species in a reaction into the amount of another, balancing the equation when needed.",
      inputSchema: StoichiometryInputSchema.shape,
      annotations: READ_ONLY,
    },
    (args) => respond(logger, "tutor_stoichiometry", () => reactionStoichiometry(args))
  );

  return server;
}
