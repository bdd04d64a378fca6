/**
 * Computed Channels
 *
 * Virtual channels derived from formulas over the channels of a log.
 *
 * Usage:
 * ```typescript
 * import { validateFormula, ComputedChannelInstance, createTemplate } from "@/lib/computed"
 *
 * const check = validateFormula("RPM - RPM[-1]", log.channelNames)
 * if (check.ok) {
 *   const instance = ComputedChannelInstance.fromTemplate(
 *     createTemplate({ name: "RPM delta", formula: "RPM - RPM[-1]", unit: "rpm" })
 *   )
 *   instance.apply(log)
 * }
 * ```
 */

// Types
export type {
  TimeShift,
  ChannelStatistic,
  ChannelReference,
  ReferenceOccurrence,
  ExtractorOptions,
  LogData,
  ChannelBindings,
  FormulaErrorKind,
  FormulaError,
  ValidationResult,
  BindingResult,
  EvaluationResult,
  DetailedEvaluationResult,
} from "./types"
export { NO_TIME_SHIFT } from "./types"

// Reference extraction
export {
  DEFAULT_RESERVED_NAMES,
  DEFAULT_STATISTIC_PREFIXES,
  extractReferences,
  findReferenceOccurrences,
  parseTimeShift,
  referencedChannelNames,
} from "./references"

// Sanitizing
export { sanitizeVariableName, buildVariableNames, prepareFormula } from "./sanitize"
export type { PreparedFormula } from "./sanitize"

// Validation and binding
export { validateFormula } from "./validator"
export { buildChannelBindings, findChannelIndex } from "./bindings"

// Evaluation
export { evaluateRecords, evaluateRecordsDetailed, generatePreview } from "./evaluator"
export type { EvaluateOptions } from "./evaluator"
export { findNearestTime } from "./time-align"
export { computeColumnStatistics } from "./statistics"
export type { ColumnStatistics } from "./statistics"

// Templates and instances
export { createTemplate, touchTemplate, editTemplate, duplicateTemplate } from "./template"
export type { ComputedChannelTemplate, CreateTemplateInput, TemplateChanges } from "./template"
export { ComputedChannelInstance } from "./instance"

// Channel sources
export { channelName, channelUnit, channelValueAt, listChannelSources } from "./channel-source"
export type { ChannelSource } from "./channel-source"

// Library file format
export { CURRENT_LIBRARY_VERSION, parseLibraryDocument, serializeLibrary } from "./library-schema"
export type { StoredLibrary, StoredTemplate, LibraryDocumentResult } from "./library-schema"
