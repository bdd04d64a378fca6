import type { ChannelReference, ExtractorOptions } from "./types"
import { extractReferences, findReferenceOccurrences } from "./references"

/**
 * Map a matched reference text to an expression identifier.
 * Every character outside [A-Za-z0-9] becomes "_"; a leading digit gets a "v_" prefix.
 */
export function sanitizeVariableName(fullMatch: string): string {
  const sanitized = fullMatch.replace(/[^A-Za-z0-9]/gu, "_")

  if (sanitized === "" || /^[0-9]/.test(sanitized)) {
    return `v_${sanitized}`
  }
  return sanitized
}

/**
 * Assign one identifier per distinct matched text.
 *
 * Texts that sanitize identically (RPM[-1] and RPM[+1] both give RPM__1_)
 * are disambiguated with a numeric suffix in reference order.
 */
export function buildVariableNames(references: ChannelReference[]): Map<string, string> {
  const variables = new Map<string, string>()
  const used = new Set<string>()

  for (const ref of references) {
    if (variables.has(ref.fullMatch)) continue

    const base = sanitizeVariableName(ref.fullMatch)
    let name = base
    for (let n = 2; used.has(name); n++) {
      name = `${base}_${n}`
    }

    used.add(name)
    variables.set(ref.fullMatch, name)
  }

  return variables
}

export interface PreparedFormula {
  /** Formula text with every reference replaced by its identifier */
  text: string
  /** Distinct references, longest match first */
  references: ChannelReference[]
  /** fullMatch -> identifier */
  variables: Map<string, string>
}

/**
 * Rewrite a formula into a plain arithmetic expression.
 *
 * Substitution works on the scanned spans, so a reference can never be
 * partially overwritten by a shorter one sharing its prefix.
 */
export function prepareFormula(formula: string, options: ExtractorOptions = {}): PreparedFormula {
  const references = extractReferences(formula, options)
  const variables = buildVariableNames(references)

  let text = ""
  let cursor = 0
  for (const occurrence of findReferenceOccurrences(formula, options)) {
    const variable = variables.get(occurrence.reference.fullMatch) ?? sanitizeVariableName(occurrence.reference.fullMatch)
    text += formula.slice(cursor, occurrence.start) + variable
    cursor = occurrence.end
  }
  text += formula.slice(cursor)

  return { text, references, variables }
}
