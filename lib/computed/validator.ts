/**
 * Formula Validation
 *
 * Design-time check run before a template is saved or applied:
 * 1. The formula is not blank
 * 2. Every referenced channel exists (all missing names reported together)
 * 3. The prepared expression parses and evaluates with every reference bound to 1.0
 *
 * Step 3 is a structural smoke test only; no log data is read.
 */

import { compileExpression } from "@/lib/formula"
import type { ExtractorOptions, ValidationResult } from "./types"
import { referencedChannelNames } from "./references"
import { findChannelIndex } from "./bindings"
import { prepareFormula } from "./sanitize"

const DUMMY_VALUE = 1.0

export function validateFormula(
  formula: string,
  availableChannelNames: readonly string[],
  options: ExtractorOptions = {}
): ValidationResult {
  if (!formula.trim()) {
    return { ok: false, kind: "empty_formula", error: "Formula cannot be empty" }
  }

  const prepared = prepareFormula(formula, options)

  const missing = referencedChannelNames(prepared.references).filter(
    (name) => findChannelIndex(availableChannelNames, name) === -1
  )
  if (missing.length > 0) {
    return {
      ok: false,
      kind: "unknown_channels",
      error: `Unknown channels: ${missing.join(", ")}`,
      missing,
    }
  }

  const compiled = compileExpression(prepared.text)
  if (!compiled.ok) {
    return { ok: false, kind: "syntax_error", error: `Parse error: ${compiled.error}` }
  }

  const scope = new Map<string, number>()
  for (const variable of prepared.variables.values()) {
    scope.set(variable, DUMMY_VALUE)
  }

  const result = compiled.expression.evaluate(scope)
  if (!result.ok) {
    return { ok: false, kind: "syntax_error", error: `Evaluation error: ${result.error}` }
  }

  return { ok: true }
}
