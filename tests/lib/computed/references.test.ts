import { describe, it, expect } from "vitest"
import {
  extractReferences,
  findReferenceOccurrences,
  parseTimeShift,
  referencedChannelNames,
} from "@/lib/computed"

describe("channel reference extraction", () => {
  it("extracts a bare reference", () => {
    expect(extractReferences("RPM * 2")).toEqual([
      { name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM" },
    ])
  })

  it("extracts a quoted reference with spaces", () => {
    expect(extractReferences('"Manifold Pressure" + 10')).toEqual([
      { name: "Manifold Pressure", timeShift: { kind: "none" }, fullMatch: '"Manifold Pressure"' },
    ])
  })

  it("reads sample offsets", () => {
    const [ref] = extractReferences("RPM[-1]")
    expect(ref.name).toBe("RPM")
    expect(ref.timeShift).toEqual({ kind: "index", offset: -1 })
    expect(ref.fullMatch).toBe("RPM[-1]")

    expect(extractReferences("RPM[+2]")[0].timeShift).toEqual({ kind: "index", offset: 2 })
  })

  it("reads time offsets with the trailing s", () => {
    const [ref] = extractReferences("RPM@-0.1s")
    expect(ref.name).toBe("RPM")
    expect(ref.timeShift).toEqual({ kind: "time", seconds: -0.1 })
  })

  it("requires the trailing s on time offsets", () => {
    const refs = extractReferences("RPM@-0.1")
    expect(refs).toEqual([{ name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM" }])
  })

  it("applies shift suffixes to quoted references", () => {
    const [ref] = extractReferences('"Oil Temp"@+2s')
    expect(ref).toEqual({ name: "Oil Temp", timeShift: { kind: "time", seconds: 2 }, fullMatch: '"Oil Temp"@+2s' })
  })

  it("skips reserved function and constant names", () => {
    const names = extractReferences("sin(RPM) + cos(Boost)").map((r) => r.name)
    expect(names.sort()).toEqual(["Boost", "RPM"])
  })

  it("matches reserved names case-insensitively", () => {
    expect(extractReferences("SQRT(RPM) * PI + E")).toEqual([
      { name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM" },
    ])
  })

  it("never reads identifiers inside quotes", () => {
    const refs = extractReferences('"Boost Target" - Boost')
    expect(refs.map((r) => r.fullMatch)).toEqual(['"Boost Target"', "Boost"])
  })

  it("does not read the exponent of a number as a channel", () => {
    expect(extractReferences("1e5 * RPM + 2.5e-3").map((r) => r.name)).toEqual(["RPM"])
  })

  it("deduplicates by matched text and orders longest first", () => {
    const refs = extractReferences("RPM + RPM[-1] + RPM + TPS")
    expect(refs.map((r) => r.fullMatch)).toEqual(["RPM[-1]", "RPM", "TPS"])
  })

  it("skips empty and unterminated quotes", () => {
    expect(extractReferences('"" + RPM')).toEqual([{ name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM" }])
    expect(extractReferences('RPM + "Boost').map((r) => r.name)).toEqual(["Boost", "RPM"])
  })

  it("recognizes statistic references", () => {
    expect(extractReferences("(RPM - _mean_RPM) / _stdev_RPM")).toEqual([
      { name: "RPM", timeShift: { kind: "none" }, fullMatch: "_stdev_RPM", statistic: "stdev" },
      { name: "RPM", timeShift: { kind: "none" }, fullMatch: "_mean_RPM", statistic: "mean" },
      { name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM" },
    ])
  })

  it("accepts a custom reserved name list", () => {
    const refs = extractReferences("gain * RPM", { reservedNames: new Set(["gain"]) })
    expect(refs.map((r) => r.name)).toEqual(["RPM"])
  })

  it("reports every occurrence with its span", () => {
    const occurrences = findReferenceOccurrences('RPM + "Boost"[1] + RPM')
    expect(occurrences.map(({ reference, start, end }) => [reference.fullMatch, start, end])).toEqual([
      ["RPM", 0, 3],
      ['"Boost"[1]', 6, 16],
      ["RPM", 19, 22],
    ])
  })

  it("lists distinct channel names", () => {
    expect(referencedChannelNames(extractReferences("RPM[-1] - RPM + MAP"))).toEqual(["RPM", "MAP"])
  })
})

describe("parseTimeShift", () => {
  it("returns no shift without captures", () => {
    expect(parseTimeShift(undefined, undefined)).toEqual({ kind: "none" })
  })

  it("falls back to no shift for an index outside int32", () => {
    expect(parseTimeShift("99999999999", undefined)).toEqual({ kind: "none" })
  })

  it("keeps the full suffix in the match when the offset is unusable", () => {
    const [ref] = extractReferences("RPM[99999999999]")
    expect(ref).toEqual({ name: "RPM", timeShift: { kind: "none" }, fullMatch: "RPM[99999999999]" })
  })

  it("parses time offsets with a bare trailing dot", () => {
    expect(parseTimeShift(undefined, "1.")).toEqual({ kind: "time", seconds: 1 })
  })
})
