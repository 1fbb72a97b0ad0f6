/**
 * Subject Tutor: Chemistry Agent
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { chemistryPrompt } from "../prompts.js";
import { calculateMolarMass, extractFormulas, tryParseFormula } from "../tools/molar-mass.js";
import type { MolarMassInput } from "../tools/molar-mass.js";
import { findElementsInText, lookupElement } from "../tools/periodic-table.js";
import { balanceEquation, reactionStoichiometry } from "../tools/stoichiometry.js";
import type { StoichiometryInput } from "../tools/stoichiometry.js";
import type { AgentResponse } from "../types.js";
import { SubjectAgent, ToolTrace } from "./base-agent.js";
import type { AgentRunOptions } from "./base-agent.js";

const REACTION_ARROW = /\s*(?:<=>|<->|⇌|→|⟶|->|=>)\s*/;
const TRAILING_PUNCTUATION = /[,;:?!.]+$/;
const MAX_ELEMENT_LOOKUPS = 3;

const MOLAR_WORDING = /molar mass|molecular (?:weight|mass)|formula (?:mass|weight)|g\/mol|\bmoles?\b|\bgrams?\b|\bmass\b/i;
const MASS_AMOUNT = /(\d+(?:\.\d+)?)\s*(?:g|grams?)\b/i;
const MOLE_AMOUNT = /(\d+(?:\.\d+)?)\s*(?:mol|moles?)\b/i;
const GIVEN_AMOUNT = /(\d+(?:\.\d+)?)\s*(g|grams?|mol|moles?)\s+(?:of\s+)?(\S+)/i;
const TARGET_SPECIES = /(?:how\s+many\s+(?:g|grams?|mol|moles?)|what\s+mass|how\s+much)\s+of\s+(\S+)/i;
const ATOMIC_NUMBER = /\b(?:atomic number|element(?: number)?)\s+(\d{1,3})\b/i;

function isSpeciesToken(token: string): boolean {
  const body = token.replace(/^\d+/, "").replace(/\((?:s|l|g|aq)\)$/i, "");
  return body.length > 0 && tryParseFormula(body) !== null;
}

function collectTerms(tokens: string[], side: "left" | "right"): string[] {
  const taken: string[] = [];
  for (const raw of tokens) {
    if (!raw) continue;
    const token = raw.replace(TRAILING_PUNCTUATION, "");
    const punctuated = token !== raw;
    // Reading leftwards, punctuation closes the previous clause
    if (side === "left" && punctuated) break;
    if (token !== "+" && !isSpeciesToken(token)) break;
    taken.push(token);
    if (punctuated) break;
  }
  while (taken[0] === "+") taken.shift();
  while (taken[taken.length - 1] === "+") taken.pop();
  return taken;
}

/**
 * Pull a reaction out of free text.
 *
 * @example
 * extractReaction("Balance H2 + O2 -> H2O please");   // "H2 + O2 -> H2O"
 */
export function extractReaction(text: string): string | null {
  const arrow = REACTION_ARROW.exec(text);
  if (!arrow) return null;

  const before = text.slice(0, arrow.index).split(/\s+/).reverse();
  const after = text.slice(arrow.index + arrow[0].length).split(/\s+/);
  const reactants = collectTerms(before, "left").reverse();
  const products = collectTerms(after, "right");

  if (reactants.length === 0 || products.length === 0) return null;
  return `${reactants.join(" ")} -> ${products.join(" ")}`;
}

function speciesOf(token: string): string | null {
  const formula = token.replace(TRAILING_PUNCTUATION, "");
  return tryParseFormula(formula) ? formula : null;
}

/**
 * Read "how many grams of X ... from N g of Y" into a stoichiometry request
 */
export function parseStoichiometryRequest(question: string, equation: string): StoichiometryInput | null {
  const given = GIVEN_AMOUNT.exec(question);
  const target = TARGET_SPECIES.exec(question);
  if (!given || !target) return null;

  const givenFormula = speciesOf(given[3]);
  const targetFormula = speciesOf(target[1]);
  if (!givenFormula || !targetFormula || givenFormula === targetFormula) return null;

  return {
    equation,
    given: {
      formula: givenFormula,
      amount: Number(given[1]),
      unit: /^mol/i.test(given[2]) ? "mol" : "g",
    },
    target: targetFormula,
  };
}

export class ChemistryAgent extends SubjectAgent {
  readonly subject = "chemistry" as const;

  async answer(question: string, options: AgentRunOptions = {}): Promise<AgentResponse> {
    const trace = new ToolTrace();

    if (!this.runReactionTools(question, trace) && !this.runMolarMass(question, trace)) {
      this.runElementLookups(question, trace);
    }

    return this.compose(chemistryPrompt(question, trace.promptSection()), trace, options);
  }

  private runReactionTools(question: string, trace: ToolTrace): boolean {
    const equation = extractReaction(question);
    if (!equation) return false;

    const request = parseStoichiometryRequest(question, equation);
    if (request) {
      trace.run("stoichiometry", { ...request }, () => reactionStoichiometry(request));
    } else {
      trace.run("stoichiometry", { equation }, () => balanceEquation({ equation }),
        result => (result.already_balanced ? `${result.balanced} (already balanced)` : `Balanced: ${result.balanced}`));
    }
    return true;
  }

  private runMolarMass(question: string, trace: ToolTrace): boolean {
    const [formula] = extractFormulas(question);
    if (!formula || !MOLAR_WORDING.test(question)) return false;

    const mass = MASS_AMOUNT.exec(question);
    const moles = MOLE_AMOUNT.exec(question);
    const input: MolarMassInput = mass
      ? { formula, mass_g: Number(mass[1]) }
      : moles
        ? { formula, moles: Number(moles[1]) }
        : { formula };

    trace.run("molar_mass", { ...input }, () => calculateMolarMass(input));
    return true;
  }

  private runElementLookups(question: string, trace: ToolTrace): void {
    const numbered = ATOMIC_NUMBER.exec(question);
    const queries = numbered
      ? [numbered[1]]
      : findElementsInText(question).slice(0, MAX_ELEMENT_LOOKUPS).map(element => element.name);

    for (const query of queries) {
      trace.run("periodic_table", { query }, () => lookupElement({ query }));
    }
  }
}
