/**
 * ComputedChannelLibrary - Ordered, versioned collection of computed channel templates.
 *
 * Persisted once per user as JSON (see library-schema for the file format).
 * Loading never fails: a missing, unreadable or corrupt file yields an empty
 * library. Saving reports failures to the caller and leaves the in-memory
 * templates untouched.
 */

import fs from "fs/promises"
import path from "path"
import { v4 as uuidv4 } from "uuid"
import { logger } from "@/lib/logger"
import { resolveLibraryPath } from "@/lib/config"
import {
  CURRENT_LIBRARY_VERSION,
  parseLibraryDocument,
  serializeLibrary,
  type StoredLibrary,
} from "@/lib/computed/library-schema"
import {
  duplicateTemplate,
  editTemplate,
  type ComputedChannelTemplate,
  type TemplateChanges,
} from "@/lib/computed/template"

const log = logger.child({ service: "ComputedChannelLibrary" })

export interface LibraryStorageOptions {
  /** Library file path; resolved from the environment when omitted */
  path?: string
  /** Environment used for path resolution (defaults to process.env) */
  env?: Record<string, string | undefined>
}

export type SaveResult = { ok: true; path: string } | { ok: false; error: string }

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function libraryPath(options: LibraryStorageOptions): string {
  return options.path ?? resolveLibraryPath(options.env)
}

export class ComputedChannelLibrary {
  static readonly CURRENT_VERSION = CURRENT_LIBRARY_VERSION

  version: number
  private templates: ComputedChannelTemplate[]

  constructor(templates: ComputedChannelTemplate[] = [], version: number = CURRENT_LIBRARY_VERSION) {
    this.templates = [...templates]
    this.version = version
  }

  /**
   * Empty library at the current format version.
   */
  static empty(): ComputedChannelLibrary {
    return new ComputedChannelLibrary()
  }

  get size(): number {
    return this.templates.length
  }

  /**
   * Templates in library order.
   */
  list(): readonly ComputedChannelTemplate[] {
    return this.templates
  }

  add(template: ComputedChannelTemplate): void {
    this.templates.push(template)
  }

  /**
   * Remove a template by id.
   * Returns the removed template, or undefined when no template has that id.
   */
  removeById(id: string): ComputedChannelTemplate | undefined {
    const index = this.templates.findIndex((t) => t.id === id)
    if (index === -1) {
      return undefined
    }
    const [removed] = this.templates.splice(index, 1)
    return removed
  }

  findById(id: string): ComputedChannelTemplate | undefined {
    return this.templates.find((t) => t.id === id)
  }

  /**
   * Replace a template with an edited copy (same id, refreshed modifiedAt).
   * Returns the updated template, or undefined when the id is unknown.
   */
  updateById(id: string, changes: TemplateChanges): ComputedChannelTemplate | undefined {
    const index = this.templates.findIndex((t) => t.id === id)
    if (index === -1) {
      return undefined
    }
    const updated = editTemplate(this.templates[index], changes)
    this.templates[index] = updated
    return updated
  }

  /**
   * Append a copy of a template under a new id.
   */
  duplicate(id: string): ComputedChannelTemplate | undefined {
    const source = this.findById(id)
    if (!source) {
      return undefined
    }
    const copy = duplicateTemplate(source)
    this.templates.push(copy)
    return copy
  }

  /**
   * Case-insensitive match against name, formula and category.
   * A blank query returns every template.
   */
  search(query: string): ComputedChannelTemplate[] {
    const needle = query.trim().toLowerCase()
    if (!needle) {
      return [...this.templates]
    }
    return this.templates.filter(
      (t) =>
        t.name.toLowerCase().includes(needle) ||
        t.formula.toLowerCase().includes(needle) ||
        t.category.toLowerCase().includes(needle)
    )
  }

  toJSON(): StoredLibrary {
    return serializeLibrary(this.version, this.templates)
  }

  /**
   * Load the library from disk.
   */
  static async load(options: LibraryStorageOptions = {}): Promise<ComputedChannelLibrary> {
    let filePath: string
    try {
      filePath = libraryPath(options)
    } catch (error) {
      log.warn("Could not determine library path, using empty library", { reason: errorMessage(error) })
      return ComputedChannelLibrary.empty()
    }

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        log.info("Computed channels library not found, using empty library", { path: filePath })
      } else {
        log.error("Failed to read computed channels library", error, { path: filePath })
      }
      return ComputedChannelLibrary.empty()
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (error) {
      log.warn("Computed channels library is not valid JSON, using empty library", {
        path: filePath,
        reason: errorMessage(error),
      })
      return ComputedChannelLibrary.empty()
    }

    const document = parseLibraryDocument(raw)
    if (!document.ok) {
      log.warn("Computed channels library has an unexpected shape, using empty library", {
        path: filePath,
        reason: document.error,
      })
      return ComputedChannelLibrary.empty()
    }

    if (document.dropped > 0) {
      log.warn("Skipped unreadable templates in computed channels library", {
        path: filePath,
        dropped: document.dropped,
      })
    }

    log.info("Loaded computed channels library", { path: filePath, templateCount: document.templates.length })
    return new ComputedChannelLibrary(document.templates, document.version)
  }

  /**
   * Write the library to disk.
   *
   * The file is written to a temporary sibling and renamed into place, so
   * an interrupted write never leaves a truncated library behind.
   */
  async save(options: LibraryStorageOptions = {}): Promise<SaveResult> {
    let filePath: string
    try {
      filePath = libraryPath(options)
    } catch (error) {
      return { ok: false, error: `Could not determine config directory: ${errorMessage(error)}` }
    }

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
    } catch (error) {
      return { ok: false, error: `Failed to create config directory: ${errorMessage(error)}` }
    }

    const content = JSON.stringify(this.toJSON(), null, 2)
    const tempPath = `${filePath}.${uuidv4()}.tmp`

    try {
      await fs.writeFile(tempPath, content, "utf-8")
      await fs.rename(tempPath, filePath)
    } catch (error) {
      await removeTempFile(tempPath)
      log.error("Failed to write computed channels library", error, { path: filePath })
      return { ok: false, error: `Failed to write library file: ${errorMessage(error)}` }
    }

    log.info("Saved computed channels library", { path: filePath, templateCount: this.templates.length })
    return { ok: true, path: filePath }
  }
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await fs.unlink(tempPath)
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      log.warn("Failed to remove temporary library file", { path: tempPath, reason: errorMessage(error) })
    }
  }
}
