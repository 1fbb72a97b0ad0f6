/**
 * Subject Tutor: Reference Data Loading
 *
 * Element, unit and formula tables ship as JSON under data/ and are
 * validated on first use.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { z } from "zod";
import { createToolError, errorMessage } from "./utils.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Repository root; src/ and dist/ both sit one level below it */
export const PROJECT_ROOT = path.resolve(__dirname, "..");
export const DATA_DIR = path.join(PROJECT_ROOT, "data");

/**
 * Read and validate a JSON file from data/.
 *
 * @throws {ToolError} CONFIG_INVALID when the file is missing or malformed
 */
export function loadDataFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.output<S> {
  const filePath = path.join(DATA_DIR, fileName);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw createToolError("CONFIG_INVALID", `Cannot read data file ${fileName}: ${errorMessage(err)}`, {
      details: { path: filePath },
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    throw createToolError(
      "CONFIG_INVALID",
      `Data file ${fileName} is invalid at ${first.path.join(".")}: ${first.message}`,
      { details: parsed.error.issues.slice(0, 10) }
    );
  }
  return parsed.data;
}
