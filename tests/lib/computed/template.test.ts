import { describe, it, expect, vi, beforeEach } from "vitest"
import { createTemplate, duplicateTemplate, editTemplate, touchTemplate } from "@/lib/computed"

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe("computed channel templates", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"))
  })

  it("creates a template with an id and timestamps", () => {
    const template = createTemplate({ name: "Test Channel", formula: "RPM * 2", unit: "RPM", description: "A test channel" })

    expect(template.id).toMatch(UUID_PATTERN)
    expect(template).toMatchObject({
      name: "Test Channel",
      formula: "RPM * 2",
      unit: "RPM",
      description: "A test channel",
      category: "",
      createdAt: 1704067200,
      modifiedAt: 1704067200,
    })
  })

  it("gives every template its own id", () => {
    const a = createTemplate({ name: "A", formula: "RPM" })
    const b = createTemplate({ name: "A", formula: "RPM" })
    expect(a.id).not.toBe(b.id)
  })

  it("touch refreshes only modifiedAt", () => {
    const template = createTemplate({ name: "A", formula: "RPM" })
    vi.setSystemTime(new Date("2024-01-01T00:01:40Z"))

    const touched = touchTemplate(template)
    expect(touched).toEqual({ ...template, modifiedAt: 1704067300 })
    expect(template.modifiedAt).toBe(1704067200)
  })

  it("edits keep the identity and creation time", () => {
    const template = createTemplate({ name: "Boost", formula: "MAP - 101.3", unit: "kPa" })
    vi.setSystemTime(new Date("2024-01-02T00:00:00Z"))

    const edited = editTemplate(template, { name: "Boost (psi)", formula: "(MAP - 101.3) * 0.145", unit: "psi" })
    expect(edited).toEqual({
      ...template,
      name: "Boost (psi)",
      formula: "(MAP - 101.3) * 0.145",
      unit: "psi",
      modifiedAt: 1704153600,
    })
  })

  it("duplicates under a new id", () => {
    const template = createTemplate({ name: "AFR error", formula: "(AFR - 14.7) / 14.7 * 100", category: "Fuel" })
    const copy = duplicateTemplate(template)

    expect(copy.id).not.toBe(template.id)
    expect(copy.name).toBe("AFR error (copy)")
    expect(copy.formula).toBe(template.formula)
    expect(copy.category).toBe("Fuel")
  })
})
