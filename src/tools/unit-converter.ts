/**
 * 📐 Unit Converter Tool - Subject Tutor
 *
 * Converts values between units of the same physical quantity. Each unit
 * maps onto its category's base unit as `base = value × factor + offset`;
 * only temperature scales carry an offset.
 *
 * @module tools/unit-converter
 * @see tests/unit-converter.test.ts for the test contract
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import { z } from "zod";
import { loadDataFile } from "../data.js";
import { createToolError, formatNumber, parseInput, roundSignificant } from "../utils.js";

// ============================================================================
// Type Definitions
// ============================================================================

const UnitSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  factor: z.number().positive(),
  offset: z.number().default(0),
});

const UnitTableSchema = z.object({
  categories: z.array(z.object({
    category: z.string().min(1),
    base: z.string().min(1),
    units: z.array(UnitSchema).min(1),
  })).min(1),
});

export interface UnitDefinition extends z.infer<typeof UnitSchema> {
  category: string;
}

export interface ConvertUnitsResult {
  value: number;
  from: { symbol: string; name: string };
  to: { symbol: string; name: string };
  category: string;
  result: number;
  formatted: string;
}

export interface ConversionRequest {
  value: number;
  from: string;
  to: string;
}

// ============================================================================
// Input Schema
// ============================================================================

export const ConvertUnitsInputSchema = z.object({
  value: z.number().finite()
    .describe("🔢 Value to convert"),
  from: z.string().trim().min(1, "Source unit cannot be empty")
    .describe("📐 Source unit symbol or name, e.g. 'km', 'miles', '°C'"),
  to: z.string().trim().min(1, "Target unit cannot be empty")
    .describe("🎯 Target unit symbol or name"),
});

export type ConvertUnitsInput = z.input<typeof ConvertUnitsInputSchema>;

// ============================================================================
// Unit Index
// ============================================================================

interface UnitIndex {
  bySymbol: Map<string, UnitDefinition>;
  byName: Map<string, UnitDefinition>;
}

let index: UnitIndex | null = null;

function getIndex(): UnitIndex {
  if (index) return index;

  const table = loadDataFile("units.json", UnitTableSchema);
  const bySymbol = new Map<string, UnitDefinition>();
  const byName = new Map<string, UnitDefinition>();

  for (const category of table.categories) {
    for (const unit of category.units) {
      const definition: UnitDefinition = { ...unit, category: category.category };
      bySymbol.set(unit.symbol, definition);
      for (const key of [unit.symbol, unit.name, ...unit.aliases]) {
        const normalized = key.toLowerCase();
        if (!byName.has(normalized)) byName.set(normalized, definition);
      }
    }
  }

  index = { bySymbol, byName };
  return index;
}

/**
 * Resolve a unit by symbol (case-sensitive first), name or alias
 */
export function findUnit(text: string): UnitDefinition | undefined {
  const { bySymbol, byName } = getIndex();
  const trimmed = text.trim().replace(/\.$/, "");

  const exact = bySymbol.get(trimmed);
  if (exact) return exact;

  const normalized = trimmed.toLowerCase().replace(/\s+/g, " ").replace(/^degrees? (?=[cfk]$)/, "°");
  const named = byName.get(normalized);
  if (named) return named;

  if (normalized.endsWith("s")) {
    return byName.get(normalized.slice(0, -1));
  }
  return undefined;
}

function resolve(text: string): UnitDefinition {
  const unit = findUnit(text);
  if (!unit) {
    throw createToolError("UNKNOWN_UNIT", `Unknown unit '${text}'`, {
      recoverable: true,
      suggestion: "Use a symbol such as km, kg, °C, atm or a name such as 'miles'",
    });
  }
  return unit;
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a value between units.
 *
 * @throws {ToolError} UNKNOWN_UNIT, INCOMPATIBLE_UNITS, INVALID_INPUT (below absolute zero)
 *
 * @example
 * convertUnits({ value: 100, from: "C", to: "F" }).result;   // 212
 */
export function convertUnits(input: ConvertUnitsInput): ConvertUnitsResult {
  const { value, from, to } = parseInput(ConvertUnitsInputSchema, input);
  const source = resolve(from);
  const target = resolve(to);

  if (source.category !== target.category) {
    throw createToolError(
      "INCOMPATIBLE_UNITS",
      `Cannot convert ${source.name} (${source.category}) to ${target.name} (${target.category})`,
      { recoverable: true, details: { from: source.category, to: target.category } }
    );
  }

  const base = value * source.factor + source.offset;
  if (source.category === "temperature" && base < -1e-9) {
    throw createToolError("INVALID_INPUT", `${value} ${source.symbol} is below absolute zero`, {
      recoverable: true,
    });
  }

  const result = roundSignificant((base - target.offset) / target.factor, 10);
  return {
    value,
    from: { symbol: source.symbol, name: source.name },
    to: { symbol: target.symbol, name: target.name },
    category: source.category,
    result,
    formatted: `${formatNumber(value)} ${source.symbol} = ${formatNumber(result)} ${target.symbol}`,
  };
}

// ============================================================================
// Free-text Requests
// ============================================================================

const NUMBER = String.raw`(-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)`;
const UNIT = String.raw`([^\d\s?!,][^\d?!,]*?)`;

const HOW_MANY = new RegExp(
  String.raw`how\s+many\s+${UNIT}\s+(?:are\s+)?(?:there\s+)?(?:in|is|are|make\s+up)\s+(?:an?\s+)?${NUMBER}?\s*${UNIT}\s*[?.!]*$`,
  "i"
);
const CONVERT = new RegExp(
  String.raw`${NUMBER}\s*${UNIT}\s+(?:to|into|in|as)\s+${UNIT}\s*[?.!]*$`,
  "i"
);

/**
 * Extract `{ value, from, to }` from phrasings such as "convert 5 km to
 * miles" or "how many meters are in 3 km". Returns null unless both units
 * resolve.
 */
export function parseConversionRequest(text: string): ConversionRequest | null {
  const question = text.trim();

  const howMany = HOW_MANY.exec(question);
  if (howMany) {
    const [, to, amount, from] = howMany;
    if (findUnit(to) && findUnit(from)) {
      return { value: amount === undefined ? 1 : Number(amount), from: from.trim(), to: to.trim() };
    }
  }

  const convert = CONVERT.exec(question);
  if (convert) {
    const [, amount, from, to] = convert;
    if (findUnit(from) && findUnit(to)) {
      return { value: Number(amount), from: from.trim(), to: to.trim() };
    }
  }

  return null;
}
