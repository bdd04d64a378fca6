/**
 * Channel Reference Extraction
 *
 * Scans a formula left to right and recognizes channel references.
 *
 * Rules, applied at each position:
 * 1. Quoted: `"` + one or more non-quote characters + `"`, then an optional
 *    shift suffix. An empty pair `""` is skipped; an unterminated quote is
 *    skipped as a single character.
 * 2. Number: numeric literals (with exponents) are consumed whole, so the
 *    `e5` in `1e5` is never a reference.
 * 3. Identifier: [A-Za-z_][A-Za-z0-9_]* plus an optional shift suffix.
 * 4. Reserved: identifiers whose lower-cased name is reserved are dropped.
 * 5. Statistic: identifiers with a statistic prefix (`_mean_RPM`) reference
 *    the remaining name as a whole-column statistic.
 *
 * Quoted text is consumed by rule 1, so nothing inside quotes is ever read as
 * an identifier.
 *
 * Shift suffix grammar:
 *   [±int]      sample offset
 *   @±float s   time offset in seconds (the trailing `s` is mandatory)
 */

import { scanNumber, SUPPORTED_CONSTANTS, SUPPORTED_FUNCTIONS } from "@/lib/formula"
import type {
  ChannelReference,
  ChannelStatistic,
  ExtractorOptions,
  ReferenceOccurrence,
  TimeShift,
} from "./types"
import { NO_TIME_SHIFT } from "./types"

export const DEFAULT_RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...SUPPORTED_FUNCTIONS,
  ...SUPPORTED_CONSTANTS,
])

export const DEFAULT_STATISTIC_PREFIXES: ReadonlyMap<string, ChannelStatistic> = new Map([
  ["_mean_", "mean"],
  ["_stdev_", "stdev"],
  ["_min_", "min"],
  ["_max_", "max"],
  ["_range_", "range"],
])

const INDEX_SUFFIX = /^\[([+-]?\d+)\]/
const TIME_SUFFIX = /^@([+-]?\d+\.?\d*)s/
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647

/**
 * Convert captured offset text into a time shift.
 * Text that does not hold a usable number yields no shift.
 */
export function parseTimeShift(indexText: string | undefined, timeText: string | undefined): TimeShift {
  if (indexText !== undefined) {
    const offset = Number(indexText)
    if (Number.isInteger(offset) && offset >= INT32_MIN && offset <= INT32_MAX) {
      return { kind: "index", offset }
    }
    return NO_TIME_SHIFT
  }

  if (timeText !== undefined) {
    const seconds = Number(timeText)
    if (Number.isFinite(seconds)) {
      return { kind: "time", seconds }
    }
    return NO_TIME_SHIFT
  }

  return NO_TIME_SHIFT
}

/**
 * Read an optional shift suffix at `start`.
 */
function scanShiftSuffix(formula: string, start: number): { length: number; timeShift: TimeShift } {
  const rest = formula.slice(start)

  const index = INDEX_SUFFIX.exec(rest)
  if (index) {
    return { length: index[0].length, timeShift: parseTimeShift(index[1], undefined) }
  }

  const time = TIME_SUFFIX.exec(rest)
  if (time) {
    return { length: time[0].length, timeShift: parseTimeShift(undefined, time[1]) }
  }

  return { length: 0, timeShift: NO_TIME_SHIFT }
}

function matchStatistic(
  identifier: string,
  prefixes: ReadonlyMap<string, ChannelStatistic>
): { statistic: ChannelStatistic; name: string } | null {
  for (const [prefix, statistic] of prefixes) {
    if (identifier.startsWith(prefix) && identifier.length > prefix.length) {
      return { statistic, name: identifier.slice(prefix.length) }
    }
  }
  return null
}

/**
 * Find every reference occurrence in the formula, in text order.
 */
export function findReferenceOccurrences(formula: string, options: ExtractorOptions = {}): ReferenceOccurrence[] {
  const reservedNames = options.reservedNames ?? DEFAULT_RESERVED_NAMES
  const statisticPrefixes = options.statisticPrefixes ?? DEFAULT_STATISTIC_PREFIXES
  const occurrences: ReferenceOccurrence[] = []
  let pos = 0

  while (pos < formula.length) {
    const char = formula[pos]

    // Rule 1: quoted reference
    if (char === '"') {
      const close = formula.indexOf('"', pos + 1)
      if (close === -1) {
        pos++
        continue
      }
      if (close === pos + 1) {
        pos += 2
        continue
      }

      const suffix = scanShiftSuffix(formula, close + 1)
      const end = close + 1 + suffix.length
      occurrences.push({
        reference: {
          name: formula.slice(pos + 1, close),
          timeShift: suffix.timeShift,
          fullMatch: formula.slice(pos, end),
        },
        start: pos,
        end,
      })
      pos = end
      continue
    }

    // Rule 2: number literal
    if (/[0-9.]/.test(char)) {
      const length = scanNumber(formula, pos)
      pos += length > 0 ? length : 1
      continue
    }

    // Rule 3: identifier
    const identifier = IDENTIFIER.exec(formula.slice(pos))
    if (identifier) {
      const name = identifier[0]
      const suffix = scanShiftSuffix(formula, pos + name.length)
      const start = pos
      const end = pos + name.length + suffix.length
      pos = end

      // Rule 4: reserved function/constant names
      if (reservedNames.has(name.toLowerCase())) {
        continue
      }

      const fullMatch = formula.slice(start, end)

      // Rule 5: statistic reference
      const statistic = matchStatistic(name, statisticPrefixes)
      if (statistic) {
        occurrences.push({
          reference: { name: statistic.name, timeShift: NO_TIME_SHIFT, fullMatch, statistic: statistic.statistic },
          start,
          end,
        })
        continue
      }

      occurrences.push({
        reference: { name, timeShift: suffix.timeShift, fullMatch },
        start,
        end,
      })
      continue
    }

    pos++
  }

  return occurrences
}

/**
 * Extract the distinct channel references of a formula.
 *
 * References are deduplicated by their matched text and ordered longest match
 * first (ties keep formula order).
 */
export function extractReferences(formula: string, options: ExtractorOptions = {}): ChannelReference[] {
  const seen = new Set<string>()
  const references: ChannelReference[] = []

  for (const { reference } of findReferenceOccurrences(formula, options)) {
    if (seen.has(reference.fullMatch)) continue
    seen.add(reference.fullMatch)
    references.push(reference)
  }

  return references.sort((a, b) => b.fullMatch.length - a.fullMatch.length)
}

/**
 * Distinct channel names read by the references, in reference order.
 */
export function referencedChannelNames(references: ChannelReference[]): string[] {
  const names: string[] = []
  for (const ref of references) {
    if (!names.includes(ref.name)) {
      names.push(ref.name)
    }
  }
  return names
}
