import type { BindingResult, ChannelBindings, ChannelReference } from "./types"
import { referencedChannelNames } from "./references"

/**
 * Index of the first channel whose name matches case-insensitively, or -1.
 */
export function findChannelIndex(availableChannelNames: readonly string[], name: string): number {
  const target = name.toLowerCase()
  return availableChannelNames.findIndex((channel) => channel.toLowerCase() === target)
}

/**
 * Resolve the channel names of a formula's references to column indices in one log.
 *
 * References sharing a name (RPM and RPM[-1]) share one binding. Fails on the
 * first name that has no matching channel.
 */
export function buildChannelBindings(
  references: ChannelReference[],
  availableChannelNames: readonly string[]
): BindingResult {
  const bindings: ChannelBindings = new Map()

  for (const name of referencedChannelNames(references)) {
    const index = findChannelIndex(availableChannelNames, name)
    if (index === -1) {
      return {
        ok: false,
        kind: "binding_error",
        error: `Channel not found: ${name}`,
        channel: name,
      }
    }
    bindings.set(name, index)
  }

  return { ok: true, bindings }
}
