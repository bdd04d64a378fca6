/**
 * Configuration
 *
 * Validates the environment variables that locate the computed channel
 * library file. Uses Zod for schema validation.
 *
 * - COMPUTED_CHANNELS_LIBRARY_PATH: absolute path of the library file
 * - COMPUTED_CHANNELS_CONFIG_DIR: absolute directory holding computed_channels.json
 * - XDG_CONFIG_HOME / APPDATA: platform config roots used for the default location
 */

import { z } from "zod"
import os from "os"
import path from "path"

export const LIBRARY_FILE_NAME = "computed_channels.json"

const absolutePath = (name: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined))
    .refine((value) => value === undefined || path.isAbsolute(value), `${name} must be an absolute path`)

const configEnvSchema = z.object({
  COMPUTED_CHANNELS_LIBRARY_PATH: absolutePath("COMPUTED_CHANNELS_LIBRARY_PATH"),
  COMPUTED_CHANNELS_CONFIG_DIR: absolutePath("COMPUTED_CHANNELS_CONFIG_DIR"),
  XDG_CONFIG_HOME: z.string().optional(),
  APPDATA: z.string().optional(),
})

export type ConfigEnv = z.infer<typeof configEnvSchema>

type Env = Record<string, string | undefined>

/**
 * Validate configuration environment variables.
 * Throws with one line per invalid variable.
 */
export function validateConfigEnv(env: Env = process.env): ConfigEnv {
  const result = configEnvSchema.safeParse(env)

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n")

    throw new Error(`Invalid computed channels configuration:\n${errors}`)
  }

  return result.data
}

/**
 * Per-user configuration directory for the current platform.
 */
export function defaultConfigDir(
  env: ConfigEnv,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  switch (platform) {
    case "darwin":
      return path.join(homeDir, "Library", "Application Support", "ComputedChannels")
    case "win32":
      return path.win32.join(env.APPDATA || path.win32.join(homeDir, "AppData", "Roaming"), "ComputedChannels")
    default:
      return path.join(env.XDG_CONFIG_HOME || path.join(homeDir, ".config"), "computed-channels")
  }
}

/**
 * Resolve where the library file lives.
 *
 * Precedence: COMPUTED_CHANNELS_LIBRARY_PATH, then COMPUTED_CHANNELS_CONFIG_DIR,
 * then the platform default directory.
 */
export function resolveLibraryPath(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  const config = validateConfigEnv(env)

  if (config.COMPUTED_CHANNELS_LIBRARY_PATH) {
    return config.COMPUTED_CHANNELS_LIBRARY_PATH
  }

  const dir = config.COMPUTED_CHANNELS_CONFIG_DIR ?? defaultConfigDir(config, platform, homeDir)
  const join = platform === "win32" ? path.win32.join : path.join
  return join(dir, LIBRARY_FILE_NAME)
}
