/**
 * Computed Channel Types
 *
 * Formula Syntax:
 * - Bare channel reference: RPM
 * - Quoted channel reference: "Manifold Pressure"
 * - Sample offset: RPM[-1], RPM[+2]
 * - Time offset in seconds: RPM@-0.1s
 * - Channel statistics: _mean_RPM, _stdev_RPM, _min_RPM, _max_RPM, _range_RPM
 * - Arithmetic and functions from @/lib/formula
 */

// ============================================
// References
// ============================================

export type TimeShift =
  | { kind: "none" }
  | { kind: "index"; offset: number }
  | { kind: "time"; seconds: number }

export const NO_TIME_SHIFT: TimeShift = { kind: "none" }

export type ChannelStatistic = "mean" | "stdev" | "min" | "max" | "range"

/**
 * A channel reference found in a formula.
 */
export interface ChannelReference {
  /** Channel name, without quotes or shift suffix */
  name: string
  timeShift: TimeShift
  /** Exact text matched in the formula, suffix included */
  fullMatch: string
  /** Set when the reference reads a whole-column statistic instead of a sample */
  statistic?: ChannelStatistic
}

/**
 * One place in the formula text where a reference occurs.
 */
export interface ReferenceOccurrence {
  reference: ChannelReference
  /** Start offset in the formula (inclusive) */
  start: number
  /** End offset in the formula (exclusive) */
  end: number
}

export interface ExtractorOptions {
  /** Lower-case names never treated as channels */
  reservedNames?: ReadonlySet<string>
  /** Identifier prefixes mapped to statistics (e.g. "_mean_" -> "mean") */
  statisticPrefixes?: ReadonlyMap<string, ChannelStatistic>
}

// ============================================
// Log Data
// ============================================

/**
 * Normalized log produced by the parser subsystem.
 */
export interface LogData {
  /** Channel names, in column order */
  channelNames: string[]
  /** Row-major samples: data[row][column] */
  data: number[][]
  /** Sample time in seconds for each row, non-decreasing */
  times: number[]
  /** Optional unit for each channel, in column order */
  units?: string[]
}

/**
 * Channel name -> column index within one log's data matrix.
 */
export type ChannelBindings = Map<string, number>

// ============================================
// Results
// ============================================

export type FormulaErrorKind =
  | "empty_formula"
  | "unknown_channels"
  | "binding_error"
  | "syntax_error"
  | "cancelled"

export type FormulaError =
  | { ok: false; kind: "empty_formula"; error: string }
  | { ok: false; kind: "unknown_channels"; error: string; missing: string[] }
  | { ok: false; kind: "binding_error"; error: string; channel: string }
  | { ok: false; kind: "syntax_error"; error: string }
  | { ok: false; kind: "cancelled"; error: string }

export type ValidationResult = { ok: true } | FormulaError

export type BindingResult = { ok: true; bindings: ChannelBindings } | FormulaError

export type EvaluationResult = { ok: true; values: number[] } | FormulaError

export type DetailedEvaluationResult =
  | {
      ok: true
      values: number[]
      /** Record indices whose value was replaced by 0 after an error or non-finite result */
      degraded: number[]
    }
  | FormulaError
