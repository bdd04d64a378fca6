import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import fs from "fs/promises"
import os from "os"
import path from "path"
import { ComputedChannelLibrary } from "@/lib/services/computed-channel-library.service"
import { createTemplate } from "@/lib/computed"

describe("ComputedChannelLibrary", () => {
  describe("in-memory operations", () => {
    it("starts empty at the current version", () => {
      const library = ComputedChannelLibrary.empty()
      expect(library.size).toBe(0)
      expect(library.version).toBe(ComputedChannelLibrary.CURRENT_VERSION)
    })

    it("adds, finds and removes templates by id", () => {
      const library = ComputedChannelLibrary.empty()
      const boost = createTemplate({ name: "Boost", formula: "MAP - 101.3" })
      const afr = createTemplate({ name: "AFR", formula: "Lambda * 14.7" })
      library.add(boost)
      library.add(afr)

      expect(library.list().map((t) => t.name)).toEqual(["Boost", "AFR"])
      expect(library.findById(afr.id)).toEqual(afr)

      expect(library.removeById(boost.id)).toEqual(boost)
      expect(library.size).toBe(1)
      expect(library.removeById(boost.id)).toBeUndefined()
      expect(library.findById(boost.id)).toBeUndefined()
    })

    it("updates a template in place", () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date("2024-01-01T00:00:00Z"))
      const library = ComputedChannelLibrary.empty()
      const template = createTemplate({ name: "Boost", formula: "MAP - 101.3" })
      library.add(template)

      vi.setSystemTime(new Date("2024-01-02T00:00:00Z"))
      const updated = library.updateById(template.id, { unit: "kPa" })

      expect(updated).toEqual({ ...template, unit: "kPa", modifiedAt: 1704153600 })
      expect(library.list()).toEqual([updated])
      expect(library.updateById("missing", { unit: "psi" })).toBeUndefined()
    })

    it("appends duplicates after existing templates", () => {
      const library = ComputedChannelLibrary.empty()
      const template = createTemplate({ name: "Boost", formula: "MAP - 101.3" })
      library.add(template)

      const copy = library.duplicate(template.id)
      expect(copy?.name).toBe("Boost (copy)")
      expect(library.list().map((t) => t.id)).toEqual([template.id, copy?.id])
      expect(library.duplicate("missing")).toBeUndefined()
    })

    it("searches name, formula and category case-insensitively", () => {
      const library = new ComputedChannelLibrary([
        createTemplate({ name: "Boost", formula: "MAP - 101.3", category: "Intake" }),
        createTemplate({ name: "AFR", formula: "Lambda * 14.7", category: "Fuel" }),
        createTemplate({ name: "Power estimate", formula: "RPM * MAP / 1000" }),
      ])

      expect(library.search("boost").map((t) => t.name)).toEqual(["Boost"])
      expect(library.search("map").map((t) => t.name)).toEqual(["Boost", "Power estimate"])
      expect(library.search("FUEL").map((t) => t.name)).toEqual(["AFR"])
      expect(library.search("  ")).toHaveLength(3)
    })
  })

  describe("persistence", () => {
    let dir: string

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "computed-channels-"))
    })

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true })
    })

    it("loads an empty library when the file does not exist", async () => {
      const library = await ComputedChannelLibrary.load({ path: path.join(dir, "computed_channels.json") })
      expect(library.size).toBe(0)
      expect(library.version).toBe(1)
    })

    it("round-trips templates through the file", async () => {
      const file = path.join(dir, "nested", "computed_channels.json")
      const library = new ComputedChannelLibrary([
        createTemplate({ name: "Boost", formula: "MAP - 101.3", unit: "kPa", category: "Intake" }),
        createTemplate({ name: "Manifold delta", formula: '"Manifold Pressure" - "Manifold Pressure"[-1]' }),
      ])

      expect(await library.save({ path: file })).toEqual({ ok: true, path: file })

      const loaded = await ComputedChannelLibrary.load({ path: file })
      expect(loaded.list()).toEqual(library.list())
      expect(loaded.version).toBe(1)
    })

    it("writes the documented file layout", async () => {
      const file = path.join(dir, "computed_channels.json")
      const template = createTemplate({ name: "Boost", formula: "MAP - 101.3" })
      await new ComputedChannelLibrary([template]).save({ path: file })

      const written = JSON.parse(await fs.readFile(file, "utf-8"))
      expect(written).toEqual({
        version: 1,
        templates: [
          {
            id: template.id,
            name: "Boost",
            formula: "MAP - 101.3",
            unit: "",
            description: "",
            category: "",
            created_at: template.createdAt,
            modified_at: template.modifiedAt,
          },
        ],
      })
    })

    it("leaves no temporary file behind", async () => {
      const file = path.join(dir, "computed_channels.json")
      await new ComputedChannelLibrary([createTemplate({ name: "A", formula: "RPM" })]).save({ path: file })
      expect(await fs.readdir(dir)).toEqual(["computed_channels.json"])
    })

    it("falls back to an empty library for a corrupt file", async () => {
      const file = path.join(dir, "computed_channels.json")
      await fs.writeFile(file, "{ not json", "utf-8")

      const library = await ComputedChannelLibrary.load({ path: file })
      expect(library.size).toBe(0)

      const warn = vi.mocked(console.warn)
      expect(warn).toHaveBeenCalledTimes(1)
      expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
        level: "warn",
        service: "ComputedChannelLibrary",
        message: "Computed channels library is not valid JSON, using empty library",
      })
    })

    it("keeps readable templates when others are damaged", async () => {
      const file = path.join(dir, "computed_channels.json")
      await fs.writeFile(
        file,
        JSON.stringify({
          version: 1,
          templates: [{ id: "a", name: "Good", formula: "RPM" }, { name: "No id" }],
        }),
        "utf-8"
      )

      const library = await ComputedChannelLibrary.load({ path: file })
      expect(library.list().map((t) => t.name)).toEqual(["Good"])
      expect(JSON.parse(String(vi.mocked(console.warn).mock.calls[0][0]))).toMatchObject({
        message: "Skipped unreadable templates in computed channels library",
        data: { dropped: 1 },
      })
    })

    it("resolves the file from the configured directory", async () => {
      const env = { COMPUTED_CHANNELS_CONFIG_DIR: dir }
      const library = new ComputedChannelLibrary([createTemplate({ name: "A", formula: "RPM" })])

      expect(await library.save({ env })).toEqual({ ok: true, path: path.join(dir, "computed_channels.json") })
      expect((await ComputedChannelLibrary.load({ env })).size).toBe(1)
    })

    it("reports an invalid configured path without throwing", async () => {
      const env = { COMPUTED_CHANNELS_LIBRARY_PATH: "relative/computed_channels.json" }

      expect((await ComputedChannelLibrary.load({ env })).size).toBe(0)
      const result = await ComputedChannelLibrary.empty().save({ env })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toMatch(/^Could not determine config directory: Invalid computed channels configuration/)
      }
    })

    it("reports a directory that cannot be created", async () => {
      const blocker = path.join(dir, "blocker")
      await fs.writeFile(blocker, "", "utf-8")

      const result = await ComputedChannelLibrary.empty().save({ path: path.join(blocker, "computed_channels.json") })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toMatch(/^Failed to create config directory: /)
      }
    })

    it("reports a failed write and cleans up the temporary file", async () => {
      const target = path.join(dir, "computed_channels.json")
      await fs.mkdir(target)

      const result = await ComputedChannelLibrary.empty().save({ path: target })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toMatch(/^Failed to write library file: /)
      }
      expect(await fs.readdir(dir)).toEqual(["computed_channels.json"])
      expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1)
    })
  })
})
