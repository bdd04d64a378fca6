/**
 * Record Evaluator
 *
 * Evaluates a formula once per data row and returns a dense array.
 *
 * The formula is re-scanned and compiled on every call; nothing is carried
 * over from validation.
 *
 * Per-record failures (evaluation error, NaN, +/-Infinity) produce 0 for that
 * record. Only problems affecting the whole formula (parse error, missing
 * binding, cancellation) are returned as errors.
 */

import { compileExpression } from "@/lib/formula"
import type {
  ChannelBindings,
  ChannelReference,
  DetailedEvaluationResult,
  EvaluationResult,
  ExtractorOptions,
  TimeShift,
} from "./types"
import { prepareFormula } from "./sanitize"
import { findNearestTime } from "./time-align"
import { computeColumnStatistics, type ColumnStatistics } from "./statistics"

/** Records between two cancellation checks */
const CANCELLATION_CHECK_INTERVAL = 1024

export interface EvaluateOptions extends ExtractorOptions {
  /** Checked periodically; an aborted signal stops evaluation */
  signal?: AbortSignal
}

interface ResolvedReference {
  variable: string
  column: number
  timeShift: TimeShift
  /** Whole-column value for statistic references */
  constant?: number
}

function readValue(data: readonly (readonly number[])[], row: number, column: number): number {
  return data[row]?.[column] ?? 0
}

/**
 * Row index to read for a reference at record `row`.
 */
function shiftedRow(row: number, timeShift: TimeShift, rowCount: number, times: readonly number[]): number {
  switch (timeShift.kind) {
    case "none":
      return row
    case "index":
      return Math.min(Math.max(row + timeShift.offset, 0), rowCount - 1)
    case "time":
      return findNearestTime(times, (times[row] ?? 0) + timeShift.seconds)
  }
}

function resolveReferences(
  references: ChannelReference[],
  variables: Map<string, string>,
  bindings: ChannelBindings,
  data: readonly (readonly number[])[]
): { ok: true; resolved: ResolvedReference[] } | { ok: false; channel: string } {
  const statistics = new Map<number, ColumnStatistics>()
  const resolved: ResolvedReference[] = []

  for (const ref of references) {
    const column = bindings.get(ref.name)
    const variable = variables.get(ref.fullMatch)
    if (column === undefined || variable === undefined) {
      return { ok: false, channel: ref.name }
    }

    if (ref.statistic) {
      let stats = statistics.get(column)
      if (!stats) {
        stats = computeColumnStatistics(data, column)
        statistics.set(column, stats)
      }
      resolved.push({ variable, column, timeShift: ref.timeShift, constant: stats[ref.statistic] })
    } else {
      resolved.push({ variable, column, timeShift: ref.timeShift })
    }
  }

  return { ok: true, resolved }
}

/**
 * Evaluate a formula for every record and report which records were degraded to 0.
 */
export function evaluateRecordsDetailed(
  formula: string,
  bindings: ChannelBindings,
  data: readonly (readonly number[])[],
  times: readonly number[],
  options: EvaluateOptions = {}
): DetailedEvaluationResult {
  if (data.length === 0) {
    return { ok: true, values: [], degraded: [] }
  }

  const prepared = prepareFormula(formula, options)
  const compiled = compileExpression(prepared.text)
  if (!compiled.ok) {
    return { ok: false, kind: "syntax_error", error: `Parse error: ${compiled.error}` }
  }

  const resolution = resolveReferences(prepared.references, prepared.variables, bindings, data)
  if (!resolution.ok) {
    return {
      ok: false,
      kind: "binding_error",
      error: `Channel not bound: ${resolution.channel}`,
      channel: resolution.channel,
    }
  }

  const { expression } = compiled
  const { resolved } = resolution
  const rowCount = data.length
  const values = new Array<number>(rowCount)
  const degraded: number[] = []
  const scope = new Map<string, number>()

  for (let row = 0; row < rowCount; row++) {
    if (options.signal?.aborted && row % CANCELLATION_CHECK_INTERVAL === 0) {
      return { ok: false, kind: "cancelled", error: "Evaluation cancelled" }
    }

    for (const ref of resolved) {
      const value =
        ref.constant !== undefined
          ? ref.constant
          : readValue(data, shiftedRow(row, ref.timeShift, rowCount, times), ref.column)
      scope.set(ref.variable, value)
    }

    const result = expression.evaluate(scope)
    if (result.ok && Number.isFinite(result.value)) {
      values[row] = result.value
    } else {
      values[row] = 0
      degraded.push(row)
    }
  }

  return { ok: true, values, degraded }
}

/**
 * Evaluate a formula for every record of a log.
 *
 * @returns One value per row of `data` (empty for empty data)
 */
export function evaluateRecords(
  formula: string,
  bindings: ChannelBindings,
  data: readonly (readonly number[])[],
  times: readonly number[],
  options: EvaluateOptions = {}
): EvaluationResult {
  const result = evaluateRecordsDetailed(formula, bindings, data, times, options)
  if (!result.ok) {
    return result
  }
  return { ok: true, values: result.values }
}

/**
 * First `count` values of the full evaluation.
 */
export function generatePreview(
  formula: string,
  bindings: ChannelBindings,
  data: readonly (readonly number[])[],
  times: readonly number[],
  count: number,
  options: EvaluateOptions = {}
): EvaluationResult {
  const result = evaluateRecords(formula, bindings, data, times, options)
  if (!result.ok) {
    return result
  }
  return { ok: true, values: result.values.slice(0, Math.max(0, count)) }
}
