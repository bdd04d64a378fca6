/**
 * Computed Channel Templates
 *
 * A template is the file-independent definition of a computed channel.
 * Templates are treated as immutable values: edits return a new object with
 * the same id and a refreshed modifiedAt.
 */

import { v4 as uuidv4 } from "uuid"
import { getUnixTime } from "date-fns"

export interface ComputedChannelTemplate {
  /** Stable unique id (UUID v4), unchanged by edits */
  readonly id: string
  readonly name: string
  /** Formula source text (e.g., "RPM * 0.5 + Boost") */
  readonly formula: string
  readonly unit: string
  readonly description: string
  /** Free-form grouping label used by library search */
  readonly category: string
  /** Unix seconds */
  readonly createdAt: number
  /** Unix seconds */
  readonly modifiedAt: number
}

export interface CreateTemplateInput {
  name: string
  formula: string
  unit?: string
  description?: string
  category?: string
}

export type TemplateChanges = Partial<Pick<ComputedChannelTemplate, "name" | "formula" | "unit" | "description" | "category">>

function nowUnixSeconds(): number {
  return getUnixTime(new Date())
}

export function createTemplate(input: CreateTemplateInput): ComputedChannelTemplate {
  const now = nowUnixSeconds()
  return {
    id: uuidv4(),
    name: input.name,
    formula: input.formula,
    unit: input.unit ?? "",
    description: input.description ?? "",
    category: input.category ?? "",
    createdAt: now,
    modifiedAt: now,
  }
}

/**
 * Copy of the template with modifiedAt set to the current time.
 */
export function touchTemplate(template: ComputedChannelTemplate): ComputedChannelTemplate {
  return { ...template, modifiedAt: nowUnixSeconds() }
}

/**
 * Apply edits to a template. Identity and createdAt are preserved.
 */
export function editTemplate(template: ComputedChannelTemplate, changes: TemplateChanges): ComputedChannelTemplate {
  return touchTemplate({
    ...template,
    name: changes.name ?? template.name,
    formula: changes.formula ?? template.formula,
    unit: changes.unit ?? template.unit,
    description: changes.description ?? template.description,
    category: changes.category ?? template.category,
  })
}

/**
 * New template with the same definition, a fresh id and " (copy)" appended to the name.
 */
export function duplicateTemplate(template: ComputedChannelTemplate): ComputedChannelTemplate {
  const now = nowUnixSeconds()
  return {
    ...template,
    id: uuidv4(),
    name: `${template.name} (copy)`,
    createdAt: now,
    modifiedAt: now,
  }
}
