import {
  createPinoLogger,
  type LogContext,
  logLevelNames,
  type PinoLoggerDeps,
} from "@pipeconf/logger"
import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { FragmentReader } from "../../ports/fragment-reader"
import type { SettingsSource } from "../../ports/settings-source"
import { type ConfigEngine, loadConfiguration } from "../engine"
import { HostSettings } from "./host-settings"

function splitList(text: string): string[] {
  return text
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

export const settingsSchema = z.object({
  ROOT: z.string().min(1),
  PROFILES: z.string().transform(splitList).default([]),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  PRETTY_LOGS: z.stringbool().default(false),
})

export type Settings = z.infer<typeof settingsSchema>

export type LoadSettingsOptions = {
  /** Later sources override earlier ones. @default [new EnvSource()] */
  sources?: readonly SettingsSource[]
}

/**
 * Loads and validates host settings.
 *
 * @throws Error listing every invalid or missing setting.
 */
export async function loadSettings({
  sources,
}: LoadSettingsOptions = {}): Promise<HostSettings<Settings>> {
  const merged: Record<string, string> = {}
  const provenance = new Map<string, string>()

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance.set(key, source.name)
      }
    }
  }

  const result = settingsSchema.safeParse(merged)

  if (!result.success) {
    throw new Error(`Settings validation failed:\n${z.prettifyError(result.error)}`)
  }

  return new HostSettings(result.data, provenance, new Set(Object.keys(merged)))
}

export type LoadFromSettingsOptions = {
  reader?: FragmentReader
  /** Log destination, e.g. a file stream; stdout by default */
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Loads the configuration the settings point at, logging through pino at
 * the configured level.
 */
export async function loadConfigurationFromSettings(
  settings: Settings,
  options: LoadFromSettingsOptions = {},
): Promise<ConfigEngine> {
  const logger = createPinoLogger<LogContext>(
    { ...(options.destination && { destination: options.destination }) },
    { level: settings.LOG_LEVEL, prettify: settings.PRETTY_LOGS },
    { service: "pipeconf" },
  )

  return loadConfiguration({
    root: settings.ROOT,
    profiles: settings.PROFILES,
    logger,
    ...(options.reader && { reader: options.reader }),
  })
}
