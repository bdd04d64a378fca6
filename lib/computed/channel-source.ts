import type { LogData } from "./types"
import type { ComputedChannelInstance } from "./instance"

/**
 * A channel as seen by chart and analysis consumers: either a column of the
 * log or a computed channel applied to it.
 */
export type ChannelSource =
  | { kind: "log"; columnIndex: number; name: string; unit: string }
  | { kind: "computed"; instance: ComputedChannelInstance }

export function channelName(source: ChannelSource): string {
  return source.kind === "log" ? source.name : source.instance.name
}

export function channelUnit(source: ChannelSource): string {
  return source.kind === "log" ? source.unit : source.instance.unit
}

export function channelValueAt(source: ChannelSource, logData: LogData, row: number): number {
  switch (source.kind) {
    case "log":
      return logData.data[row]?.[source.columnIndex] ?? 0
    case "computed":
      return source.instance.valueAt(logData, row)
  }
}

/**
 * Every log column followed by the computed channels applied to the log.
 */
export function listChannelSources(logData: LogData, instances: readonly ComputedChannelInstance[]): ChannelSource[] {
  const columns: ChannelSource[] = logData.channelNames.map((name, columnIndex) => ({
    kind: "log",
    columnIndex,
    name,
    unit: logData.units?.[columnIndex] ?? "",
  }))
  const computed: ChannelSource[] = instances.map((instance) => ({ kind: "computed", instance }))
  return [...columns, ...computed]
}
