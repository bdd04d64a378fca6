/**
 * Computed Channel Instance
 *
 * A template applied to one open log: resolved bindings, cached values and
 * the last error. Applying either fills the cache or records an error, never
 * both. Instances share no state, so each log keeps its own.
 */

import { logger } from "@/lib/logger"
import type { ChannelBindings, LogData } from "./types"
import type { ComputedChannelTemplate } from "./template"
import { extractReferences } from "./references"
import { buildChannelBindings } from "./bindings"
import { evaluateRecords, type EvaluateOptions } from "./evaluator"

const log = logger.child({ service: "ComputedChannelInstance" })

export class ComputedChannelInstance {
  readonly template: ComputedChannelTemplate
  private bindings: ChannelBindings = new Map()
  private bound = false
  private cachedData: number[] | null = null
  private error: string | null = null

  private constructor(template: ComputedChannelTemplate) {
    this.template = { ...template }
  }

  static fromTemplate(template: ComputedChannelTemplate): ComputedChannelInstance {
    return new ComputedChannelInstance(template)
  }

  get name(): string {
    return this.template.name
  }

  get formula(): string {
    return this.template.formula
  }

  get unit(): string {
    return this.template.unit
  }

  get channelBindings(): ReadonlyMap<string, number> {
    return this.bindings
  }

  get data(): readonly number[] | null {
    return this.cachedData
  }

  get lastError(): string | null {
    return this.error
  }

  isValid(): boolean {
    return this.error === null && this.cachedData !== null
  }

  /**
   * Resolve bindings against the log and evaluate every record.
   * Returns true when values were cached.
   */
  apply(logData: LogData, options: EvaluateOptions = {}): boolean {
    const references = extractReferences(this.template.formula, options)
    const binding = buildChannelBindings(references, logData.channelNames)
    if (!binding.ok) {
      this.bindings = new Map()
      this.bound = false
      this.fail(binding.error)
      return false
    }

    this.bindings = binding.bindings
    this.bound = true
    return this.evaluate(logData, options)
  }

  /**
   * Drop cached values; bindings and error are kept.
   */
  invalidateCache(): void {
    this.cachedData = null
  }

  /**
   * Cached values. After invalidateCache() the existing bindings are reused;
   * an instance that was never bound is applied first.
   * Returns null when binding or evaluation fails, and keeps returning null
   * until the next apply() while that failure stands.
   */
  getData(logData: LogData, options: EvaluateOptions = {}): readonly number[] | null {
    if (this.cachedData !== null) {
      return this.cachedData
    }
    if (this.error !== null) {
      return null
    }
    const ok = this.bound ? this.evaluate(logData, options) : this.apply(logData, options)
    return ok ? this.cachedData : null
  }

  /**
   * Value at one record, or 0 when unavailable.
   */
  valueAt(logData: LogData, row: number): number {
    return this.getData(logData)?.[row] ?? 0
  }

  private evaluate(logData: LogData, options: EvaluateOptions): boolean {
    const result = evaluateRecords(this.template.formula, this.bindings, logData.data, logData.times, options)
    if (!result.ok) {
      this.fail(result.error)
      return false
    }

    this.cachedData = result.values
    this.error = null
    return true
  }

  private fail(message: string): void {
    this.cachedData = null
    this.error = message
    log.warn("Computed channel could not be applied", { name: this.template.name, reason: message }, {
      templateId: this.template.id,
    })
  }
}
