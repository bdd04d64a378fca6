/**
 * Library File Format
 *
 * On disk:
 *   { "version": 1, "templates": [{ "id", "name", "formula", "unit",
 *     "description", "category", "created_at", "modified_at" }] }
 *
 * Optional fields that are missing or of the wrong type fall back to
 * defaults, and unknown fields are ignored. A template without a usable
 * id, name or formula is dropped on its own; the rest of the file still loads.
 */

import { z } from "zod"
import type { ComputedChannelTemplate } from "./template"

export const CURRENT_LIBRARY_VERSION = 1

const timestampSchema = z.number().int().nonnegative().catch(0)

const storedTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  formula: z.string(),
  unit: z.string().catch(""),
  description: z.string().catch(""),
  category: z.string().catch(""),
  created_at: timestampSchema,
  modified_at: timestampSchema,
})

export type StoredTemplate = z.infer<typeof storedTemplateSchema>

const storedLibrarySchema = z.object({
  version: z.number().int().nonnegative().catch(CURRENT_LIBRARY_VERSION),
  templates: z.array(z.unknown()).catch([]),
})

export interface StoredLibrary {
  version: number
  templates: StoredTemplate[]
}

export type LibraryDocumentResult =
  | {
      ok: true
      version: number
      templates: ComputedChannelTemplate[]
      /** Number of template entries that could not be read */
      dropped: number
    }
  | { ok: false; error: string }

function fromStored(stored: StoredTemplate): ComputedChannelTemplate {
  return {
    id: stored.id,
    name: stored.name,
    formula: stored.formula,
    unit: stored.unit,
    description: stored.description,
    category: stored.category,
    createdAt: stored.created_at,
    modifiedAt: stored.modified_at,
  }
}

export function toStored(template: ComputedChannelTemplate): StoredTemplate {
  return {
    id: template.id,
    name: template.name,
    formula: template.formula,
    unit: template.unit,
    description: template.description,
    category: template.category,
    created_at: template.createdAt,
    modified_at: template.modifiedAt,
  }
}

/**
 * Decode a parsed JSON document into library contents.
 */
export function parseLibraryDocument(raw: unknown): LibraryDocumentResult {
  const result = storedLibrarySchema.safeParse(raw)
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    return { ok: false, error: errors.join("; ") }
  }

  const templates: ComputedChannelTemplate[] = []
  let dropped = 0
  for (const entry of result.data.templates) {
    const parsed = storedTemplateSchema.safeParse(entry)
    if (parsed.success) {
      templates.push(fromStored(parsed.data))
    } else {
      dropped++
    }
  }

  return { ok: true, version: result.data.version, templates, dropped }
}

export function serializeLibrary(version: number, templates: readonly ComputedChannelTemplate[]): StoredLibrary {
  return { version, templates: templates.map(toStored) }
}
